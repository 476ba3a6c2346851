/**
 * Ghostline — src/features/moderation/muteActions.ts
 * WHAT: Apply and lift mutes: the guild role plus the mutes row, kept in step.
 * WHY: /mute, /unmute and the expiry scheduler all need the same two-sided update.
 * FLOWS:
 *  - applyMute(guild, member, opts) → checks → addMute → roles.add (row dropped again if that fails)
 *  - liftMute(guild, memberId) → getMute (this guild only) → roles.remove (if still a member) → removeMute
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember } from "discord.js";
import { logger } from "../../lib/logger.js";
import { getMuteRole } from "../../config/muteRoleStore.js";
import { addMute, getMute, removeMute, type MuteRecord } from "../../store/muteStore.js";

export type MuteErrorCode = "NO_ROLE" | "ALREADY_MUTED" | "NOT_MODERATABLE";

export class MuteError extends Error {
  constructor(
    public readonly code: MuteErrorCode,
    message: string
  ) {
    super(message);
    this.name = "MuteError";
  }
}

export type LiftResult = "unmuted" | "not_muted";

// Unknown Member: the user left (or was banned) since the mute
const UNKNOWN_MEMBER = 10007;

function isUnknownMember(err: unknown): boolean {
  return !!err && typeof err === "object" && "code" in err && err.code === UNKNOWN_MEMBER;
}

/**
 * @throws MuteError NO_ROLE when the guild has no mute role configured
 * @throws MuteError ALREADY_MUTED when a mute row exists for the member
 * @throws MuteError NOT_MODERATABLE when the bot can't manage the member's roles
 */
export async function applyMute(
  guild: Guild,
  member: GuildMember,
  opts: { authorId: string; reason?: string | null; durationSec?: number | null }
): Promise<MuteRecord> {
  const roleId = getMuteRole(guild.id);
  if (!roleId) {
    throw new MuteError("NO_ROLE", "No mute role is configured. Use `/muterole set` first.");
  }
  if (getMute(member.id)) {
    throw new MuteError("ALREADY_MUTED", `Member ${member.id} is already muted.`);
  }
  if (member.manageable === false) {
    throw new MuteError("NOT_MODERATABLE", `I can't manage roles for <@${member.id}>.`);
  }

  // Row first: a role without a row would never be lifted by the sweep
  const record = addMute({
    memberId: member.id,
    guildId: guild.id,
    authorId: opts.authorId,
    reason: opts.reason,
    durationSec: opts.durationSec,
  });

  const auditReason = opts.reason ? `Muted by ${opts.authorId}: ${opts.reason}` : `Muted by ${opts.authorId}`;
  try {
    await member.roles.add(roleId, auditReason);
  } catch (err) {
    removeMute(member.id);
    logger.warn({ err, guildId: guild.id, memberId: member.id }, "[mute] Role add failed; mute row dropped");
    throw err;
  }
  logger.info(
    { guildId: guild.id, memberId: member.id, authorId: opts.authorId, durationSec: record.durationSec },
    "[mute] Member muted"
  );
  return record;
}

/**
 * Removes the mute role (when the member is still around) and the row.
 * A member who left only loses the row. A mute recorded by another guild
 * counts as not muted here.
 */
export async function liftMute(guild: Guild, memberId: string, reason = "Mute lifted"): Promise<LiftResult> {
  const record = getMute(memberId);
  if (!record || record.guildId !== guild.id) return "not_muted";

  const roleId = getMuteRole(guild.id);
  if (roleId) {
    let member: GuildMember | null = null;
    try {
      member = await guild.members.fetch(memberId);
    } catch (err) {
      if (!isUnknownMember(err)) throw err;
      logger.info({ guildId: guild.id, memberId }, "[mute] Member left; clearing mute row only");
    }
    if (member && member.roles.cache.has(roleId)) {
      await member.roles.remove(roleId, reason);
    }
  }

  removeMute(memberId);
  logger.info({ guildId: guild.id, memberId, reason }, "[mute] Mute lifted");
  return "unmuted";
}
