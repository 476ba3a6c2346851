/**
 * Ghostline — src/store/kvStore.ts
 * WHAT: Namespaced key-value storage with optional TTL, backed by the kv_store table.
 * WHY: Guild prefixes, mute roles and OAuth2 tokens are small blobs keyed by one id;
 *      they don't deserve their own tables.
 * FLOWS:
 *  - kvSet(ns, key, value, { ttlMs }) → upsert
 *  - kvGet(ns, key) → value | null (expired rows are deleted on read)
 *  - kvGetJson(ns, key, schema) → parsed value | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { z } from "zod";
import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";

export type KvNamespace = "prefixes" | "mute_roles" | "bungie_tokens";

interface KvRow {
  value: string;
  expires_at: number | null;
}

const getStmt = db.prepare<[string, string], KvRow>(
  `SELECT value, expires_at FROM kv_store WHERE namespace = ? AND key = ?`
);

const upsertStmt = db.prepare<[string, string, string, number | null, number]>(
  `INSERT INTO kv_store (namespace, key, value, expires_at, updated_at)
   VALUES (?, ?, ?, ?, ?)
   ON CONFLICT(namespace, key) DO UPDATE SET
     value = excluded.value,
     expires_at = excluded.expires_at,
     updated_at = excluded.updated_at`
);

const deleteStmt = db.prepare<[string, string]>(`DELETE FROM kv_store WHERE namespace = ? AND key = ?`);

const purgeStmt = db.prepare<[number]>(
  `DELETE FROM kv_store WHERE expires_at IS NOT NULL AND expires_at <= ?`
);

export function kvGet(ns: KvNamespace, key: string, nowMs: number = Date.now()): string | null {
  try {
    const row = getStmt.get(ns, key);
    if (!row) return null;
    if (row.expires_at !== null && row.expires_at <= nowMs) {
      deleteStmt.run(ns, key);
      return null;
    }
    return row.value;
  } catch (err) {
    logger.error({ err, ns, key }, "[kvStore] Failed to read key");
    throw err;
  }
}

export function kvSet(
  ns: KvNamespace,
  key: string,
  value: string,
  opts: { ttlMs?: number; nowMs?: number } = {}
): void {
  const nowMs = opts.nowMs ?? Date.now();
  const expiresAt = opts.ttlMs !== undefined ? nowMs + opts.ttlMs : null;
  try {
    upsertStmt.run(ns, key, value, expiresAt, nowMs);
  } catch (err) {
    logger.error({ err, ns, key }, "[kvStore] Failed to write key");
    throw err;
  }
}

export function kvDelete(ns: KvNamespace, key: string): boolean {
  try {
    return deleteStmt.run(ns, key).changes > 0;
  } catch (err) {
    logger.error({ err, ns, key }, "[kvStore] Failed to delete key");
    throw err;
  }
}

/**
 * Reads and validates a JSON value. Corrupt or outdated payloads read as
 * absent (and are logged) rather than crashing the caller.
 */
export function kvGetJson<S extends z.ZodTypeAny>(
  ns: KvNamespace,
  key: string,
  schema: S,
  nowMs: number = Date.now()
): z.infer<S> | null {
  const raw = kvGet(ns, key, nowMs);
  if (raw === null) return null;

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    logger.warn({ err, ns, key }, "[kvStore] Stored value is not valid JSON");
    return null;
  }

  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    logger.warn({ ns, key, issues: parsed.error.issues.length }, "[kvStore] Stored value failed validation");
    return null;
  }
  return parsed.data;
}

export function kvSetJson(
  ns: KvNamespace,
  key: string,
  value: unknown,
  opts: { ttlMs?: number; nowMs?: number } = {}
): void {
  kvSet(ns, key, JSON.stringify(value), opts);
}

/** @returns number of expired entries removed */
export function kvPurgeExpired(nowMs: number = Date.now()): number {
  try {
    const removed = purgeStmt.run(nowMs).changes;
    if (removed > 0) {
      logger.debug({ removed }, "[kvStore] Purged expired entries");
    }
    return removed;
  } catch (err) {
    logger.error({ err }, "[kvStore] Failed to purge expired entries");
    throw err;
  }
}
