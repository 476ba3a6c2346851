/**
 * Ghostline — src/commands/muterole.ts
 * WHAT: /muterole set|clear|show — the role /mute hands out.
 * FLOWS:
 *  - set role → hierarchy check → setMuteRole
 *  - clear → clearMuteRole
 *  - show → getMuteRole
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
import { clearMuteRole, getMuteRole, setMuteRole } from "../config/muteRoleStore.js";
import { requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("muterole")
  .setDescription("Configure the role applied by /mute.")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .setDMPermission(false)
  .addSubcommand((sc) =>
    sc
      .setName("set")
      .setDescription("Set the mute role")
      .addRoleOption((o) => o.setName("role").setDescription("Role to apply on mute").setRequired(true))
  )
  .addSubcommand((sc) => sc.setName("clear").setDescription("Forget the mute role"))
  .addSubcommand((sc) => sc.setName("show").setDescription("Show the current mute role"));

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;
  if (!(await requirePermission(interaction, PermissionFlagsBits.ManageRoles, "Manage Roles"))) return;

  const sub = interaction.options.getSubcommand();
  ctx.step(sub);

  if (sub === "set") {
    const role = interaction.options.getRole("role", true);
    if (role.id === guild.id) {
      await interaction.reply({ content: "❌ @everyone can't be the mute role.", flags: MessageFlags.Ephemeral });
      return;
    }
    if ("managed" in role && role.managed) {
      await interaction.reply({
        content: "❌ That role is managed by an integration and can't be assigned.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
    const me = guild.members.me;
    if (me && me.roles.highest.position <= role.position) {
      await interaction.reply({
        content: `❌ <@&${role.id}> is above my highest role, so I couldn't assign it.`,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
    setMuteRole(guild.id, role.id);
    await interaction.reply({ content: `✅ Mute role set to <@&${role.id}>.`, flags: MessageFlags.Ephemeral });
    return;
  }

  if (sub === "clear") {
    const cleared = clearMuteRole(guild.id);
    await interaction.reply({
      content: cleared ? "✅ Mute role cleared." : "ℹ️ No mute role was configured.",
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const roleId = getMuteRole(guild.id);
  await interaction.reply({
    content: roleId ? `Mute role: <@&${roleId}>` : "No mute role is configured.",
    flags: MessageFlags.Ephemeral,
  });
}
