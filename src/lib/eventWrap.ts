/**
 * Ghostline — src/lib/eventWrap.ts
 * WHAT: Wraps discord.js listeners so a throw or a hang is logged instead of escaping into the client.
 * USAGE:
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", (message) => ...));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type Listener<A extends unknown[]> = (...args: A) => Promise<void> | void;

const EVENT_TIMEOUT_MS = 10_000;

/**
 * The returned listener always resolves. After `timeoutMs` it stops waiting and logs a
 * timeout; the original handler is not cancelled.
 */
export function wrapEvent<A extends unknown[]>(
  eventName: string,
  listener: Listener<A>,
  timeoutMs = EVENT_TIMEOUT_MS
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${eventName} handler timed out after ${timeoutMs}ms`)), timeoutMs);
      timer.unref();
    });

    try {
      await Promise.race([listener(...args), deadline]);
    } catch (err) {
      const classified = classifyError(err);
      const ids = extractEventContext(args);
      logger.error(
        { evt: "event_error", event: eventName, ...errorContext(classified, ids), err },
        `[${eventName}] listener failed: ${classified.message}`
      );
      if (shouldReportToSentry(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, ...ids });
      }
    } finally {
      clearTimeout(timer);
    }
  };
}

function idOf(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("id" in value)) return undefined;
  return typeof value.id === "string" ? value.id : undefined;
}

function stringField(value: object, key: string): string | undefined {
  const v: unknown = Reflect.get(value, key);
  return typeof v === "string" ? v : undefined;
}

/**
 * Guild, user, channel and first entity id from whatever the event passed:
 * Message (author), GuildMember (user, guild), Interaction (user, guildId).
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const found: Record<string, string> = {};
  for (const arg of args) {
    if (typeof arg !== "object" || arg === null) continue;

    const guildId = stringField(arg, "guildId") ?? idOf(Reflect.get(arg, "guild"));
    const userId = idOf(Reflect.get(arg, "author")) ?? idOf(Reflect.get(arg, "user"));
    const channelId = stringField(arg, "channelId");
    const entityId = idOf(arg);

    if (guildId) found.guildId = guildId;
    if (userId) found.userId = userId;
    if (channelId) found.channelId = channelId;
    if (entityId && !found.entityId) found.entityId = entityId;
  }
  return found;
}
