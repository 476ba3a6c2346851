/**
 * Ghostline — src/features/destiny/tokenStore.ts
 * WHAT: Per-user Bungie OAuth2 tokens in kv_store, refreshed on demand.
 * WHY: Access tokens live for an hour; refresh tokens for ~90 days. Users sync once
 *      and we keep them authorized until the refresh token itself runs out.
 * FLOWS:
 *  - saveTokens(userId, grant) → kv_store "bungie_tokens/<userId>", expiring with the refresh token
 *  - getValidAccessToken(userId, client) → stored | refreshed | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { kvDelete, kvGetJson, kvSetJson } from "../../store/kvStore.js";
import { BungieApiError, type BungieClient, type TokenGrant } from "./bungieClient.js";

const storedTokensSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  /** epoch ms */
  expiresAt: z.number(),
  /** epoch ms */
  refreshExpiresAt: z.number(),
  membershipId: z.string(),
  /** epoch ms */
  createdAt: z.number(),
});
export type StoredTokens = z.infer<typeof storedTokensSchema>;

// Treat a token as expired slightly early so it never dies mid-request.
const EXPIRY_FACTOR = 0.99;

export function expiryFrom(nowMs: number, seconds: number): number {
  return nowMs + Math.floor(seconds * EXPIRY_FACTOR) * 1000;
}

export function saveTokens(userId: string, grant: TokenGrant, nowMs: number = Date.now()): StoredTokens {
  const record: StoredTokens = {
    accessToken: grant.accessToken,
    refreshToken: grant.refreshToken,
    expiresAt: expiryFrom(nowMs, grant.expiresIn),
    refreshExpiresAt: expiryFrom(nowMs, grant.refreshExpiresIn),
    membershipId: grant.membershipId,
    createdAt: nowMs,
  };
  kvSetJson("bungie_tokens", userId, record, { ttlMs: record.refreshExpiresAt - nowMs, nowMs });
  logger.info({ userId, membershipId: grant.membershipId }, "[tokenStore] Tokens saved");
  return record;
}

export function loadTokens(userId: string, nowMs: number = Date.now()): StoredTokens | null {
  return kvGetJson("bungie_tokens", userId, storedTokensSchema, nowMs);
}

export function deleteTokens(userId: string): boolean {
  return kvDelete("bungie_tokens", userId);
}

// One refresh per user at a time; concurrent commands share the same promise.
const inflight = new Map<string, Promise<string | null>>();

// 400 invalid_grant or 401: the refresh token itself is dead. Anything else may pass.
function isGrantRejected(err: unknown): boolean {
  return err instanceof BungieApiError && (err.httpStatus === 400 || err.httpStatus === 401);
}

async function refreshFor(userId: string, stored: StoredTokens, client: BungieClient): Promise<string | null> {
  try {
    const grant = await client.refreshTokens(stored.refreshToken);
    return saveTokens(userId, grant).accessToken;
  } catch (err) {
    if (isGrantRejected(err)) {
      logger.warn({ err, userId }, "[tokenStore] Refresh token rejected; dropping stored tokens");
      deleteTokens(userId);
    } else {
      logger.warn({ err, userId }, "[tokenStore] Token refresh failed; keeping stored tokens");
    }
    throw err;
  }
}

function dedupedRefresh(userId: string, stored: StoredTokens, client: BungieClient): Promise<string | null> {
  const pending = inflight.get(userId);
  if (pending) return pending;

  const refresh = refreshFor(userId, stored, client).finally(() => inflight.delete(userId));
  inflight.set(userId, refresh);
  return refresh;
}

/**
 * Returns a usable access token, refreshing it when expired.
 * @returns null when the user never synced or the refresh token has expired
 * @throws BungieApiError when Bungie rejects the refresh (stored tokens are dropped on 400/401)
 * @throws whatever the refresh request threw otherwise; stored tokens are kept for the next attempt
 */
export async function getValidAccessToken(
  userId: string,
  client: BungieClient,
  nowMs: number = Date.now()
): Promise<string | null> {
  const stored = loadTokens(userId, nowMs);
  if (!stored) return null;

  if (stored.expiresAt > nowMs) {
    return stored.accessToken;
  }

  if (stored.refreshExpiresAt <= nowMs) {
    logger.info({ userId }, "[tokenStore] Refresh token expired; user must sync again");
    deleteTokens(userId);
    return null;
  }

  return dedupedRefresh(userId, stored, client);
}

function isUnauthorized(err: unknown): boolean {
  return err instanceof BungieApiError && (err.httpStatus === 401 || err.errorStatus === "WebAuthRequired");
}

/**
 * Runs `fn` with the user's access token. A 401 from Bungie (token revoked or
 * expired early) triggers one refresh and one retry.
 * @returns null when the user is not authorized
 */
export async function withAccessToken<T>(
  userId: string,
  client: BungieClient,
  fn: (accessToken: string) => Promise<T>
): Promise<T | null> {
  const token = await getValidAccessToken(userId, client);
  if (!token) return null;

  try {
    return await fn(token);
  } catch (err) {
    if (!isUnauthorized(err)) throw err;
    const stored = loadTokens(userId);
    if (!stored) throw err;
    logger.info({ userId }, "[tokenStore] Access token rejected; refreshing once");
    const refreshed = await dedupedRefresh(userId, stored, client);
    if (!refreshed) return null;
    return fn(refreshed);
  }
}
