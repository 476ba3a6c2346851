/**
 * Ghostline — src/features/destiny/bungieClient.ts
 * WHAT: Typed Bungie.net client: OAuth2 token exchange plus the handful of
 *       Destiny 2 / GroupV2 endpoints the /destiny commands render.
 * WHY: Every call needs the same API key header, timeout, envelope check and
 *      schema validation; commands only deal with parsed objects.
 * FLOWS:
 *  - request(path, schema) → fetch → envelope.ErrorCode === 1 ? schema.parse(Response) : BungieApiError
 *  - exchangeCode(code) / refreshTokens(refresh) → TokenGrant
 *  - fetchPostGameReport(id) → stats.bungie.net (PGCRs are served from there)
 * DOCS:
 *  - Platform API: https://bungie-net.github.io/multi/index.html
 *  - OAuth2: https://github.com/Bungie-net/api/wiki/OAuth-Documentation
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { z } from "zod";
import { env } from "../../lib/env.js";
import { logger } from "../../lib/logger.js";
import { LRUCache } from "../../lib/lruCache.js";
import { MembershipType } from "./enums.js";
import {
  activityDefinitionSchema,
  entitySearchSchema,
  envelopeSchema,
  friendListSchema,
  friendRequestsSchema,
  globalNameSearchSchema,
  groupSchema,
  inventoryItemSchema,
  membershipsSchema,
  oauthErrorSchema,
  playerSearchSchema,
  postGameReportSchema,
  profileCharactersSchema,
  tokenResponseSchema,
  type ActivityDefinition,
  type Character,
  type EntitySearchResult,
  type Friend,
  type FriendRequests,
  type GlobalNameSearchPage,
  type Group,
  type InventoryItem,
  type MembershipsForCurrentUser,
  type PostGameReport,
  type UserInfoCard,
} from "./schemas.js";

export const BUNGIE_ROOT = "https://www.bungie.net";
const PLATFORM_URL = `${BUNGIE_ROOT}/Platform`;
const STATS_PLATFORM_URL = "https://stats.bungie.net/Platform";
const AUTHORIZE_URL = `${BUNGIE_ROOT}/en/OAuth/Authorize`;
const TOKEN_URL = `${PLATFORM_URL}/App/OAuth/Token/`;
const TIMEOUT_MS = 10_000;

/** PlatformErrorCodes.Success */
const SUCCESS = 1;

export class BungieApiError extends Error {
  constructor(
    message: string,
    public readonly errorCode: number,
    public readonly errorStatus: string,
    public readonly httpStatus?: number
  ) {
    super(message);
    this.name = "BungieApiError";
  }
}

export class BungieNameError extends Error {
  constructor(public readonly input: string) {
    super(
      `Player name \`${input}\` not found. Make sure you include the full name, which looks like this: \`Fate#0123\`.`
    );
    this.name = "BungieNameError";
  }
}

export interface TokenGrant {
  accessToken: string;
  refreshToken: string;
  /** Seconds until the access token expires */
  expiresIn: number;
  /** Seconds until the refresh token expires */
  refreshExpiresIn: number;
  /** Bungie.net membership id (not a Destiny membership id) */
  membershipId: string;
}

export interface BungieName {
  name: string;
  code: number;
}

/**
 * "Fate#0123" → { name: "Fate", code: 123 }. Splits on the last '#', since
 * display names may contain one.
 * @throws BungieNameError
 */
export function parseBungieName(input: string): BungieName {
  const trimmed = input.trim();
  const hashAt = trimmed.lastIndexOf("#");
  if (hashAt <= 0) throw new BungieNameError(trimmed);

  const name = trimmed.slice(0, hashAt).trim();
  const codeText = trimmed.slice(hashAt + 1).trim();
  if (name.length === 0 || !/^\d{1,4}$/.test(codeText)) {
    throw new BungieNameError(trimmed);
  }
  return { name, code: parseInt(codeText, 10) };
}

/** Bungie displays codes zero-padded to four digits. */
export function formatBungieName(name: string, code: number | undefined): string {
  return code === undefined ? name : `${name}#${String(code).padStart(4, "0")}`;
}

export function bungieAsset(path: string | undefined): string | undefined {
  if (!path) return undefined;
  return path.startsWith("http") ? path : `${BUNGIE_ROOT}${path}`;
}

export interface BungieClientOptions {
  apiKey: string;
  clientId: string;
  clientSecret: string;
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** undefined when the body is not JSON (HTML error pages from the CDN, empty bodies). */
async function readJson(response: Response, path: string): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    logger.debug({ err, path, status: response.status }, "[bungie] Non-JSON response body");
    return undefined;
  }
}

export class BungieClient {
  // Manifest definitions only change with game patches
  private readonly itemCache = new LRUCache<number, InventoryItem>({ max: 500, ttlMs: 6 * 60 * 60 * 1000 });
  private readonly activityCache = new LRUCache<number, ActivityDefinition>({ max: 200, ttlMs: 6 * 60 * 60 * 1000 });
  // A finished activity's report never changes
  private readonly reportCache = new LRUCache<string, PostGameReport>({ max: 100, ttlMs: 60 * 60 * 1000 });

  constructor(private readonly options: BungieClientOptions) {}

  buildAuthorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.options.clientId,
      response_type: "code",
      state,
    });
    return `${AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<TokenGrant> {
    return this.tokenRequest({ grant_type: "authorization_code", code });
  }

  async refreshTokens(refreshToken: string): Promise<TokenGrant> {
    return this.tokenRequest({ grant_type: "refresh_token", refresh_token: refreshToken });
  }

  async fetchMembershipsForCurrentUser(accessToken: string): Promise<MembershipsForCurrentUser> {
    return this.request("/User/GetMembershipsForCurrentUser/", membershipsSchema, { accessToken });
  }

  async searchPlayerByBungieName(
    name: string,
    code: number,
    membershipType: number = MembershipType.All
  ): Promise<UserInfoCard[]> {
    return this.request(`/Destiny2/SearchDestinyPlayerByBungieName/${membershipType}/`, playerSearchSchema, {
      method: "POST",
      body: { displayName: name, displayNameCode: code },
    });
  }

  async searchByGlobalName(prefix: string, page = 0): Promise<GlobalNameSearchPage> {
    return this.request(`/User/Search/GlobalName/${page}/`, globalNameSearchSchema, {
      method: "POST",
      body: { displayNamePrefix: prefix },
    });
  }

  /** Characters sorted by most recently played. */
  async fetchCharacters(membershipType: number, membershipId: string): Promise<Character[]> {
    const profile = await this.request(
      `/Destiny2/${membershipType}/Profile/${encodeURIComponent(membershipId)}/?components=200`,
      profileCharactersSchema
    );
    const characters = Object.values(profile.characters?.data ?? {});
    return characters.sort((a, b) => Date.parse(b.dateLastPlayed) - Date.parse(a.dateLastPlayed));
  }

  async fetchClanById(groupId: string): Promise<Group> {
    return this.request(`/GroupV2/${encodeURIComponent(groupId)}/`, groupSchema);
  }

  /** groupType 1 = clan */
  async fetchClanByName(name: string): Promise<Group> {
    return this.request(`/GroupV2/Name/${encodeURIComponent(name)}/1/`, groupSchema);
  }

  async fetchInventoryItem(hash: number): Promise<InventoryItem> {
    const cached = this.itemCache.get(hash);
    if (cached) return cached;

    const item = await this.request(
      `/Destiny2/Manifest/DestinyInventoryItemDefinition/${hash}/`,
      inventoryItemSchema
    );
    this.itemCache.set(hash, item);
    return item;
  }

  async fetchFriends(accessToken: string): Promise<Friend[]> {
    const list = await this.request("/Social/Friends/", friendListSchema, { accessToken });
    return list.friends;
  }

  async fetchFriendRequests(accessToken: string): Promise<FriendRequests> {
    return this.request("/Social/Friends/Requests/", friendRequestsSchema, { accessToken });
  }

  async searchEntities(definition: string, term: string): Promise<EntitySearchResult> {
    return this.request(
      `/Destiny2/Armory/Search/${encodeURIComponent(definition)}/${encodeURIComponent(term)}/`,
      entitySearchSchema
    );
  }

  async fetchPostGameReport(instanceId: string): Promise<PostGameReport> {
    const cached = this.reportCache.get(instanceId);
    if (cached) return cached;

    const report = await this.request(
      `/Destiny2/Stats/PostGameCarnageReport/${encodeURIComponent(instanceId)}/`,
      postGameReportSchema,
      { baseUrl: STATS_PLATFORM_URL }
    );
    this.reportCache.set(instanceId, report);
    return report;
  }

  async fetchActivityDefinition(hash: number): Promise<ActivityDefinition> {
    const cached = this.activityCache.get(hash);
    if (cached) return cached;

    const activity = await this.request(
      `/Destiny2/Manifest/DestinyActivityDefinition/${hash}/`,
      activityDefinitionSchema
    );
    this.activityCache.set(hash, activity);
    return activity;
  }

  private async request<T>(
    path: string,
    schema: Schema<T>,
    init: { method?: "GET" | "POST"; body?: unknown; accessToken?: string; baseUrl?: string } = {}
  ): Promise<T> {
    const headers: Record<string, string> = {
      "X-API-Key": this.options.apiKey,
      Accept: "application/json",
    };
    if (init.accessToken) headers.Authorization = `Bearer ${init.accessToken}`;
    if (init.body !== undefined) headers["Content-Type"] = "application/json";

    const method = init.method ?? "GET";
    const response = await fetch(`${init.baseUrl ?? PLATFORM_URL}${path}`, {
      method,
      headers,
      body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    // Bungie answers most failures with an envelope even on 4xx/5xx
    const payload = await readJson(response, path);
    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      logger.warn({ path, status: response.status }, "[bungie] Response missing platform envelope");
      throw new BungieApiError(`Bungie.net returned HTTP ${response.status}`, 0, "HttpError", response.status);
    }

    const { ErrorCode, ErrorStatus, Message, Response } = envelope.data;
    if (ErrorCode !== SUCCESS) {
      logger.warn({ path, method, ErrorCode, ErrorStatus, status: response.status }, "[bungie] Platform error");
      throw new BungieApiError(Message || ErrorStatus, ErrorCode, ErrorStatus, response.status);
    }

    const parsed = schema.safeParse(Response);
    if (!parsed.success) {
      logger.error(
        { path, issues: parsed.error.issues.slice(0, 5) },
        "[bungie] Response failed validation"
      );
      throw new BungieApiError("Bungie.net returned an unexpected response.", 0, "InvalidResponse", response.status);
    }
    return parsed.data;
  }

  private async tokenRequest(form: Record<string, string>): Promise<TokenGrant> {
    const credentials = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString("base64");
    const response = await fetch(TOKEN_URL, {
      method: "POST",
      headers: {
        "X-API-Key": this.options.apiKey,
        Authorization: `Basic ${credentials}`,
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: new URLSearchParams(form).toString(),
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    const payload = await readJson(response, TOKEN_URL);

    if (!response.ok) {
      const oauthError = oauthErrorSchema.safeParse(payload);
      const status = oauthError.success ? oauthError.data.error : "HttpError";
      const message = oauthError.success
        ? (oauthError.data.error_description ?? oauthError.data.error)
        : `Token endpoint returned HTTP ${response.status}`;
      logger.warn({ grantType: form.grant_type, status: response.status, error: status }, "[bungie] Token request rejected");
      throw new BungieApiError(message, 0, status, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new BungieApiError("Token endpoint returned an unexpected response.", 0, "InvalidResponse", response.status);
    }
    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiresIn: parsed.data.expires_in,
      refreshExpiresIn: parsed.data.refresh_expires_in,
      membershipId: parsed.data.membership_id,
    };
  }
}

let sharedClient: BungieClient | null = null;

/**
 * Process-wide client, or null when BUNGIE_* credentials are missing.
 */
export function getBungieClient(): BungieClient | null {
  if (sharedClient) return sharedClient;
  if (!env.BUNGIE_API_KEY || !env.BUNGIE_CLIENT_ID || !env.BUNGIE_CLIENT_SECRET) {
    return null;
  }
  sharedClient = new BungieClient({
    apiKey: env.BUNGIE_API_KEY,
    clientId: env.BUNGIE_CLIENT_ID,
    clientSecret: env.BUNGIE_CLIENT_SECRET,
  });
  return sharedClient;
}
