/**
 * Ghostline — src/commands/prefix.ts
 * WHAT: /prefix set|reset|show for message commands.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  SlashCommandBuilder,
  PermissionFlagsBits,
  MessageFlags,
  type ChatInputCommandInteraction,
} from "discord.js";
import type { CommandContext } from "../lib/cmdWrap.js";
import { requirePermission } from "../lib/permissions.js";
import { ValidationError } from "../lib/validation.js";
import { getPrefix, PREFIX_MAX_LENGTH, resetPrefix, setPrefix } from "../config/prefixStore.js";
import { requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("prefix")
  .setDescription("Message-command prefix for this server.")
  .setDMPermission(false)
  .addSubcommand((sc) =>
    sc
      .setName("set")
      .setDescription("Change the prefix")
      .addStringOption((o) =>
        o
          .setName("value")
          .setDescription(`New prefix (up to ${PREFIX_MAX_LENGTH} characters)`)
          .setRequired(true)
      )
  )
  .addSubcommand((sc) => sc.setName("reset").setDescription("Go back to the default prefix"))
  .addSubcommand((sc) => sc.setName("show").setDescription("Show the current prefix"));

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;

  const sub = interaction.options.getSubcommand();
  ctx.step(sub);

  if (sub === "show") {
    await interaction.reply({ content: `Current prefix: \`${getPrefix(guild.id)}\``, flags: MessageFlags.Ephemeral });
    return;
  }

  if (!(await requirePermission(interaction, PermissionFlagsBits.ManageGuild, "Manage Server"))) return;

  if (sub === "reset") {
    const prefix = resetPrefix(guild.id);
    await interaction.reply({ content: `✅ Prefix reset to \`${prefix}\`.`, flags: MessageFlags.Ephemeral });
    return;
  }

  try {
    const prefix = setPrefix(guild.id, interaction.options.getString("value", true));
    await interaction.reply({ content: `✅ Prefix set to \`${prefix}\`.`, flags: MessageFlags.Ephemeral });
  } catch (err) {
    if (err instanceof ValidationError) {
      await interaction.reply({ content: `❌ ${err.message}`, flags: MessageFlags.Ephemeral });
      return;
    }
    throw err;
  }
}
