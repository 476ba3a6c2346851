/**
 * Ghostline — src/commands/moderation.ts
 * WHAT: /kick and /ban.
 * WHY: Thin wrappers over guild.members.kick / guild.bans.create with an audit-log reason.
 * PITFALLS: Role hierarchy can still block the call (50013); that surfaces as a plain reply.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  SlashCommandBuilder,
  PermissionFlagsBits,
  MessageFlags,
  type ChatInputCommandInteraction,
  type User,
} from "discord.js";
import { withStep, type CommandContext } from "../lib/cmdWrap.js";
import { classifyError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { requirePermission } from "../lib/permissions.js";
import { fetchMemberOrNull, requireGuild } from "./shared.js";

const REASON_MAX = 512;

export const kickData = new SlashCommandBuilder()
  .setName("kick")
  .setDescription("Kick a member from the server.")
  .setDefaultMemberPermissions(PermissionFlagsBits.KickMembers)
  .setDMPermission(false)
  .addUserOption((o) => o.setName("member").setDescription("Member to kick").setRequired(true))
  .addStringOption((o) => o.setName("reason").setDescription("Reason (audit log)").setMaxLength(REASON_MAX));

export const banData = new SlashCommandBuilder()
  .setName("ban")
  .setDescription("Ban a user from the server.")
  .setDefaultMemberPermissions(PermissionFlagsBits.BanMembers)
  .setDMPermission(false)
  .addUserOption((o) => o.setName("member").setDescription("User to ban").setRequired(true))
  .addStringOption((o) => o.setName("reason").setDescription("Reason (audit log)").setMaxLength(REASON_MAX))
  .addIntegerOption((o) =>
    o
      .setName("delete_days")
      .setDescription("Delete this many days of their messages (0-7)")
      .setMinValue(0)
      .setMaxValue(7)
  );

/** "Member name has been kicked for spam." / "Member name has been kicked." */
export function actionSummary(user: User, action: "kicked" | "banned", reason: string | null): string {
  const base = `Member ${user.tag} has been ${action}`;
  return reason ? `${base} for ${reason}.` : `${base}.`;
}

function isMissingPermissions(err: unknown): boolean {
  const classified = classifyError(err);
  return classified.kind === "permission" || (classified.kind === "discord_api" && classified.code === 50013);
}

export async function executeKick(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;
  if (!(await requirePermission(interaction, PermissionFlagsBits.KickMembers, "Kick Members"))) return;

  const user = interaction.options.getUser("member", true);
  const reason = interaction.options.getString("reason");

  const member = await withStep(ctx, "fetch_member", () => fetchMemberOrNull(guild, user.id));
  if (!member) {
    await interaction.reply({ content: "Couldn't find that member in this server.", flags: MessageFlags.Ephemeral });
    return;
  }
  if (!member.kickable) {
    await interaction.reply({ content: `❌ I can't kick <@${user.id}>.`, flags: MessageFlags.Ephemeral });
    return;
  }

  ctx.step("kick");
  try {
    await member.kick(reason ?? undefined);
  } catch (err) {
    if (!isMissingPermissions(err)) throw err;
    logger.warn({ err, guildId: guild.id, userId: user.id }, "[moderation] kick blocked by permissions");
    await interaction.reply({ content: "❌ I lack the permissions to kick that member.", flags: MessageFlags.Ephemeral });
    return;
  }

  logger.info({ guildId: guild.id, userId: user.id, moderatorId: interaction.user.id }, "[moderation] member kicked");
  await interaction.reply({ content: actionSummary(user, "kicked", reason), allowedMentions: { parse: [] } });
}

export async function executeBan(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guild = await requireGuild(interaction);
  if (!guild) return;
  if (!(await requirePermission(interaction, PermissionFlagsBits.BanMembers, "Ban Members"))) return;

  const user = interaction.options.getUser("member", true);
  const reason = interaction.options.getString("reason");
  const deleteDays = interaction.options.getInteger("delete_days") ?? 0;

  // Users who already left can still be banned; only a present member is checked for hierarchy
  const member = await withStep(ctx, "fetch_member", () => fetchMemberOrNull(guild, user.id));
  if (member && !member.bannable) {
    await interaction.reply({ content: `❌ I can't ban <@${user.id}>.`, flags: MessageFlags.Ephemeral });
    return;
  }

  ctx.step("ban");
  try {
    await guild.bans.create(user.id, {
      reason: reason ?? undefined,
      deleteMessageSeconds: deleteDays * 24 * 60 * 60,
    });
  } catch (err) {
    if (!isMissingPermissions(err)) throw err;
    logger.warn({ err, guildId: guild.id, userId: user.id }, "[moderation] ban blocked by permissions");
    await interaction.reply({ content: "❌ I lack the permissions to ban that user.", flags: MessageFlags.Ephemeral });
    return;
  }

  logger.info(
    { guildId: guild.id, userId: user.id, moderatorId: interaction.user.id, deleteDays },
    "[moderation] user banned"
  );
  await interaction.reply({ content: actionSummary(user, "banned", reason), allowedMentions: { parse: [] } });
}
