/**
 * Ghostline — src/config/muteRoleStore.ts
 * WHAT: Per-guild mute role id.
 * FLOWS: getMuteRole(guildId) → cache → kv_store → null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { LRUCache } from "../lib/lruCache.js";
import { kvDelete, kvGet, kvSet } from "../store/kvStore.js";

// null is cached as "no role configured"; only undefined is a miss.
const roleCache = new LRUCache<string, string | null>({ max: 1000, ttlMs: 5 * 60 * 1000 });

export function getMuteRole(guildId: string): string | null {
  return roleCache.remember(guildId, (id) => kvGet("mute_roles", id));
}

export function setMuteRole(guildId: string, roleId: string): void {
  kvSet("mute_roles", guildId, roleId);
  roleCache.delete(guildId);
  logger.info({ guildId, roleId }, "[muteRoleStore] Mute role set");
}

/** @returns true if a role was configured */
export function clearMuteRole(guildId: string): boolean {
  const removed = kvDelete("mute_roles", guildId);
  roleCache.delete(guildId);
  logger.info({ guildId, removed }, "[muteRoleStore] Mute role cleared");
  return removed;
}

export function clearMuteRoleCache(): void {
  roleCache.clear();
}
