/**
 * Ghostline — src/commands/mute.ts
 * WHAT: /mute, /unmute and /mutes.
 * WHY: Role-based mutes with an optional duration; the expiry scheduler lifts timed ones.
 * FLOWS:
 *  - /mute member duration? reason? → parseDuration → applyMute → reply
 *  - /unmute member reason? → liftMute → reply
 *  - /mutes → listMutes(guild) → embed
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  SlashCommandBuilder,
  PermissionFlagsBits,
  EmbedBuilder,
  MessageFlags,
  type ChatInputCommandInteraction,
} from "discord.js";
import { withStep, type CommandContext } from "../lib/cmdWrap.js";
import { requirePermission } from "../lib/permissions.js";
import { formatDuration, parseDuration, toDiscordTimestamp } from "../lib/time.js";
import { applyMute, liftMute, MuteError } from "../features/moderation/muteActions.js";
import { listMutes, muteExpiresAt } from "../store/muteStore.js";
import { fetchMemberOrNull, requireGuild } from "./shared.js";

const REASON_MAX = 512;

export const data = new SlashCommandBuilder()
  .setName("mute")
  .setDescription("Mute a member with the guild's mute role.")
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .setDMPermission(false)
  .addUserOption((o) => o.setName("member").setDescription("Member to mute").setRequired(true))
  .addStringOption((o) =>
    o.setName("duration").setDescription("How long, e.g. 10m, 2h, 1d, 1w. Omit for indefinite.")
  )
  .addStringOption((o) => o.setName("reason").setDescription("Why").setMaxLength(REASON_MAX));

export const unmuteData = new SlashCommandBuilder()
  .setName("unmute")
  .setDescription("Lift a member's mute.")
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .setDMPermission(false)
  .addUserOption((o) => o.setName("member").setDescription("Member to unmute").setRequired(true))
  .addStringOption((o) => o.setName("reason").setDescription("Why").setMaxLength(REASON_MAX));

export const mutesData = new SlashCommandBuilder()
  .setName("mutes")
  .setDescription("List muted members in this server.")
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .setDMPermission(false);

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;
  if (!(await requirePermission(interaction, PermissionFlagsBits.ModerateMembers, "Moderate Members"))) return;

  ctx.step("parse");
  const user = interaction.options.getUser("member", true);
  const rawDuration = interaction.options.getString("duration");
  const reason = interaction.options.getString("reason");

  let durationSec: number | null = null;
  if (rawDuration) {
    durationSec = parseDuration(rawDuration);
    if (durationSec === null) {
      await interaction.reply({
        content: `❌ Invalid duration \`${rawDuration}\`. Use something like \`10m\`, \`2h\`, \`1d\` or \`1w\` (max 28 days).`,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
  }

  if (user.id === interaction.user.id) {
    await interaction.reply({ content: "❌ You can't mute yourself.", flags: MessageFlags.Ephemeral });
    return;
  }

  const member = await withStep(ctx, "fetch_member", () => fetchMemberOrNull(guild, user.id));
  if (!member) {
    await interaction.reply({ content: `❌ <@${user.id}> is not in this server.`, flags: MessageFlags.Ephemeral });
    return;
  }

  ctx.step("apply");
  try {
    await applyMute(guild, member, { authorId: interaction.user.id, reason, durationSec });
  } catch (err) {
    if (err instanceof MuteError) {
      await interaction.reply({ content: `❌ ${err.message}`, flags: MessageFlags.Ephemeral });
      return;
    }
    throw err;
  }

  ctx.step("reply");
  const span = durationSec === null ? "" : ` for ${formatDuration(durationSec)}`;
  await interaction.reply({
    content: `✅ Muted <@${user.id}>${span}.`,
    allowedMentions: { parse: [] },
  });
}

export async function executeUnmute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;
  if (!(await requirePermission(interaction, PermissionFlagsBits.ModerateMembers, "Moderate Members"))) return;

  const user = interaction.options.getUser("member", true);
  const reason = interaction.options.getString("reason") ?? `Unmuted by ${interaction.user.id}`;

  const result = await withStep(ctx, "lift", () => liftMute(guild, user.id, reason));

  ctx.step("reply");
  await interaction.reply({
    content: result === "unmuted" ? `✅ Unmuted <@${user.id}>.` : `ℹ️ <@${user.id}> is not muted.`,
    allowedMentions: { parse: [] },
  });
}

export async function executeMutes(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;
  if (!(await requirePermission(interaction, PermissionFlagsBits.ModerateMembers, "Moderate Members"))) return;

  const mutes = await withStep(ctx, "db_read", () => listMutes(guild.id));
  if (mutes.length === 0) {
    await interaction.reply({ content: "No one is muted.", flags: MessageFlags.Ephemeral });
    return;
  }

  // Embed description caps at 4096; 25 lines stays well under
  const shown = mutes.slice(0, 25);
  const lines = shown.map((mute) => {
    const expires = muteExpiresAt(mute);
    const until = expires === null ? "indefinite" : `expires ${toDiscordTimestamp(expires)}`;
    const why = mute.reason ? ` (${mute.reason.slice(0, 80)})` : "";
    return `<@${mute.memberId}> by <@${mute.authorId}>, ${until}${why}`;
  });

  const embed = new EmbedBuilder()
    .setTitle(`Muted members (${mutes.length})`)
    .setDescription(lines.join("\n"))
    .setColor(0xed4245);
  if (mutes.length > shown.length) {
    embed.setFooter({ text: `${mutes.length - shown.length} more not shown` });
  }

  await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral });
}
