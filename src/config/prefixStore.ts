/**
 * Ghostline — src/config/prefixStore.ts
 * WHAT: Per-guild message-command prefix with env fallback.
 * WHY: messageCreate fires for every message; the prefix lookup sits on that hot path.
 * FLOWS:
 *  - getPrefix(guildId) → cache → kv_store → BOT_PREFIX
 *  - setPrefix(guildId, prefix) → validate → kv_store → invalidate cache
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { LRUCache } from "../lib/lruCache.js";
import { requireSingleToken, ValidationError } from "../lib/validation.js";
import { kvDelete, kvGet, kvSet } from "../store/kvStore.js";

export const PREFIX_MAX_LENGTH = 5;

const CACHE_TTL_MS = 5 * 60 * 1000;
const CACHE_MAX_SIZE = 1000;

const prefixCache = new LRUCache<string, string>({ max: CACHE_MAX_SIZE, ttlMs: CACHE_TTL_MS });

export function defaultPrefix(): string {
  return env.BOT_PREFIX;
}

export function getPrefix(guildId: string): string {
  return prefixCache.remember(guildId, (id) => kvGet("prefixes", id) ?? defaultPrefix());
}

/**
 * @throws ValidationError for empty or over-long prefixes
 */
export function validatePrefix(raw: string): string {
  const prefix = raw.trim();
  if (prefix.length === 0) {
    throw new ValidationError("You must provide a prefix.", "prefix");
  }
  if (prefix.length > PREFIX_MAX_LENGTH) {
    throw new ValidationError(`Prefix length cannot be more than ${PREFIX_MAX_LENGTH}`, "prefix");
  }
  return requireSingleToken(prefix, "Prefix");
}

export function setPrefix(guildId: string, raw: string): string {
  const prefix = validatePrefix(raw);
  kvSet("prefixes", guildId, prefix);
  prefixCache.delete(guildId);
  logger.info({ guildId, prefix }, "[prefixStore] Prefix changed");
  return prefix;
}

/** @returns the prefix now in effect (the default) */
export function resetPrefix(guildId: string): string {
  kvDelete("prefixes", guildId);
  prefixCache.delete(guildId);
  logger.info({ guildId }, "[prefixStore] Prefix reset");
  return defaultPrefix();
}

/** Test hook and guildDelete cleanup. */
export function clearPrefixCache(guildId?: string): void {
  if (guildId) {
    prefixCache.delete(guildId);
  } else {
    prefixCache.clear();
  }
}
