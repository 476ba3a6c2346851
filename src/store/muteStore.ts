/**
 * Ghostline — src/store/muteStore.ts
 * WHAT: Persistence for active mutes.
 * WHY: The role alone can't tell us who muted whom, why, or when it should lift.
 * FLOWS:
 *  - addMute(input) → insert-or-replace one row per member
 *  - removeMute(memberId) → true if a row was deleted, false if the member wasn't muted
 *  - listExpiredMutes(now) → rows the expiry scheduler should lift
 * DOCS:
 *  - better-sqlite3 prepared statements: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { nowUtc } from "../lib/time.js";

export interface MuteRow {
  member_id: string;
  guild_id: string;
  author_id: string;
  muted_at: number;
  why: string | null;
  duration: number | null;
}

export interface MuteRecord {
  memberId: string;
  guildId: string;
  authorId: string;
  mutedAt: number;
  reason: string | null;
  /** Seconds; null means the mute never lifts on its own */
  durationSec: number | null;
}

export interface AddMuteInput {
  memberId: string;
  guildId: string;
  authorId: string;
  reason?: string | null;
  durationSec?: number | null;
  mutedAt?: number;
}

const upsertMuteStmt = db.prepare<[string, string, string, number, string | null, number | null]>(
  `INSERT OR REPLACE INTO mutes (member_id, guild_id, author_id, muted_at, why, duration)
   VALUES (?, ?, ?, ?, ?, ?)`
);

const deleteMuteStmt = db.prepare<[string]>(`DELETE FROM mutes WHERE member_id = ?`);

const getMuteStmt = db.prepare<[string], MuteRow>(
  `SELECT member_id, guild_id, author_id, muted_at, why, duration FROM mutes WHERE member_id = ?`
);

const listGuildMutesStmt = db.prepare<[string], MuteRow>(
  `SELECT member_id, guild_id, author_id, muted_at, why, duration
   FROM mutes WHERE guild_id = ? ORDER BY muted_at ASC`
);

const listExpiredStmt = db.prepare<[number], MuteRow>(
  `SELECT member_id, guild_id, author_id, muted_at, why, duration
   FROM mutes
   WHERE duration IS NOT NULL AND muted_at + duration <= ?
   ORDER BY muted_at ASC`
);

function toRecord(row: MuteRow): MuteRecord {
  return {
    memberId: row.member_id,
    guildId: row.guild_id,
    authorId: row.author_id,
    mutedAt: row.muted_at,
    reason: row.why,
    durationSec: row.duration,
  };
}

/**
 * Records a mute. A second call for the same member replaces the first row,
 * so re-muting resets the clock.
 */
export function addMute(input: AddMuteInput): MuteRecord {
  const mutedAt = input.mutedAt ?? nowUtc();
  const reason = input.reason?.trim() || null;
  const durationSec = input.durationSec ?? null;
  try {
    upsertMuteStmt.run(input.memberId, input.guildId, input.authorId, mutedAt, reason, durationSec);
    logger.info(
      { memberId: input.memberId, guildId: input.guildId, authorId: input.authorId, durationSec },
      "[muteStore] Mute recorded"
    );
    return {
      memberId: input.memberId,
      guildId: input.guildId,
      authorId: input.authorId,
      mutedAt,
      reason,
      durationSec,
    };
  } catch (err) {
    logger.error({ err, memberId: input.memberId, guildId: input.guildId }, "[muteStore] Failed to add mute");
    throw err;
  }
}

/**
 * @returns true when a row was deleted; false when the member was not muted
 */
export function removeMute(memberId: string): boolean {
  try {
    const result = deleteMuteStmt.run(memberId);
    return result.changes > 0;
  } catch (err) {
    logger.error({ err, memberId }, "[muteStore] Failed to remove mute");
    throw err;
  }
}

export function getMute(memberId: string): MuteRecord | null {
  try {
    const row = getMuteStmt.get(memberId);
    return row ? toRecord(row) : null;
  } catch (err) {
    logger.error({ err, memberId }, "[muteStore] Failed to get mute");
    throw err;
  }
}

export function isMuted(memberId: string): boolean {
  return getMute(memberId) !== null;
}

export function listMutes(guildId: string): MuteRecord[] {
  try {
    return listGuildMutesStmt.all(guildId).map(toRecord);
  } catch (err) {
    logger.error({ err, guildId }, "[muteStore] Failed to list mutes");
    throw err;
  }
}

export function listExpiredMutes(nowSec: number = nowUtc()): MuteRecord[] {
  try {
    return listExpiredStmt.all(nowSec).map(toRecord);
  } catch (err) {
    logger.error({ err, nowSec }, "[muteStore] Failed to list expired mutes");
    throw err;
  }
}

/** Epoch seconds the mute lifts at, or null for an indefinite mute. */
export function muteExpiresAt(record: MuteRecord): number | null {
  return record.durationSec === null ? null : record.mutedAt + record.durationSec;
}
