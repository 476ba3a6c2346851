/**
 * Ghostline — src/scheduler/muteExpiryScheduler.ts
 * WHAT: Periodic sweep that lifts timed mutes once their duration has elapsed.
 * WHY: Mutes carry a duration; nothing else takes the role back off.
 * FLOWS:
 *  - Every MUTE_SWEEP_INTERVAL_MS → sweepExpiredMutes(client)
 *  - listExpiredMutes(now) → liftMute per row (one failure doesn't stop the rest)
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { RESTJSONErrorCodes, type Client, type Guild } from "discord.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { runWithCtx } from "../lib/reqctx.js";
import { nowUtc } from "../lib/time.js";
import { liftMute } from "../features/moderation/muteActions.js";
import { listExpiredMutes, removeMute } from "../store/muteStore.js";

let _activeInterval: NodeJS.Timeout | null = null;
let _sweeping = false;

// Discord's answer when the bot is no longer in the guild
const GONE_CODES = new Set<unknown>([RESTJSONErrorCodes.UnknownGuild, RESTJSONErrorCodes.MissingAccess]);

function codeOf(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

/**
 * @returns null only when the bot has left the guild; other fetch failures throw
 */
async function resolveGuild(client: Client, guildId: string): Promise<Guild | null> {
  const cached = client.guilds.cache.get(guildId);
  if (cached) return cached;
  try {
    return await client.guilds.fetch(guildId);
  } catch (err) {
    if (!GONE_CODES.has(codeOf(err))) throw err;
    logger.info({ guildId, code: codeOf(err) }, "[mute-expiry] bot is no longer in guild");
    return null;
  }
}

/**
 * Lifts every mute that has expired at `nowSec`.
 * @returns number of mutes lifted
 */
export async function sweepExpiredMutes(client: Client, nowSec: number = nowUtc()): Promise<number> {
  const expired = listExpiredMutes(nowSec);
  if (expired.length === 0) return 0;

  let lifted = 0;
  for (const mute of expired) {
    try {
      const guild = await resolveGuild(client, mute.guildId);
      if (!guild) {
        // Bot was removed from the guild; nothing left to unmute
        removeMute(mute.memberId);
        lifted += 1;
        continue;
      }
      const result = await liftMute(guild, mute.memberId, "Mute expired");
      if (result === "unmuted") lifted += 1;
    } catch (err) {
      logger.error({ err, memberId: mute.memberId, guildId: mute.guildId }, "[mute-expiry] failed to lift mute");
    }
  }

  logger.info({ expired: expired.length, lifted }, "[mute-expiry] sweep complete");
  return lifted;
}

async function tick(client: Client): Promise<void> {
  // A slow sweep (rate limits) must not overlap the next one
  if (_sweeping) return;
  _sweeping = true;
  try {
    await runWithCtx({ kind: "scheduler", cmd: "mute-expiry" }, () => sweepExpiredMutes(client));
  } catch (err) {
    logger.error({ err }, "[mute-expiry] sweep failed");
  } finally {
    _sweeping = false;
  }
}

export function startMuteExpiryScheduler(client: Client, intervalMs: number = env.MUTE_SWEEP_INTERVAL_MS): void {
  if (process.env.MUTE_SCHEDULER_DISABLED === "1") {
    logger.debug("[mute-expiry] scheduler disabled via env flag");
    return;
  }
  if (_activeInterval) return;

  logger.info({ intervalMs }, "[mute-expiry] scheduler starting");

  // Catch up on mutes that expired while the bot was offline
  void tick(client);

  const interval = setInterval(() => {
    void tick(client);
  }, intervalMs);
  interval.unref();
  _activeInterval = interval;
}

export function stopMuteExpiryScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[mute-expiry] scheduler stopped");
  }
}
