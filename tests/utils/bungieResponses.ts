/**
 * Ghostline — tests/utils/bungieResponses.ts
 * WHAT: Canned Bungie.net responses for a stubbed global fetch.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";

/** Platform envelope around a successful Response; override ErrorCode etc. for failures. */
export function envelope(response: unknown, overrides: Record<string, unknown> = {}) {
  return {
    Response: response,
    ErrorCode: 1,
    ErrorStatus: "Success",
    Message: "Ok",
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export function createFetchMock() {
  return vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
}

export const STEAM_CARD = {
  membershipId: "4611686018400000001",
  membershipType: 3,
  displayName: "Fate",
  bungieGlobalDisplayName: "Fate",
  bungieGlobalDisplayNameCode: 123,
};

/** Body of a successful OAuth2 token exchange. */
export const TOKEN_BODY = {
  access_token: "test-access",
  token_type: "Bearer",
  expires_in: 3600,
  refresh_token: "test-refresh",
  refresh_expires_in: 7_776_000,
  membership_id: "99",
};

function stat(value: number, displayValue = String(value)) {
  return { basic: { value, displayValue } };
}

/** Two-player dungeon clear where one player died once. */
export const REPORT_BODY = {
  period: "2024-05-01T20:00:00Z",
  activityDetails: {
    referenceId: 2032534090,
    instanceId: "13000000001",
    mode: 82,
    membershipType: 3,
  },
  entries: [
    {
      characterId: "2305843009200000001",
      player: { destinyUserInfo: STEAM_CARD, characterClass: "Hunter", lightLevel: 1990 },
      values: { kills: stat(120), deaths: stat(0), timePlayedSeconds: stat(1800, "30m 0s") },
    },
    {
      characterId: "2305843009200000002",
      player: {
        destinyUserInfo: {
          membershipId: "4611686018400000002",
          membershipType: 3,
          displayName: "Osiris",
          bungieGlobalDisplayName: "Osiris",
          bungieGlobalDisplayNameCode: 7,
        },
        characterClass: "Warlock",
      },
      values: { kills: stat(98), deaths: stat(1), timePlayedSeconds: stat(1750, "29m 10s") },
    },
  ],
};

export const ACTIVITY_BODY = {
  hash: 2032534090,
  displayProperties: { name: "Dungeon: Duality", description: "", hasIcon: false },
  pgcrImage: "/img/theme/destiny/bgs/pgcrs/duality.jpg",
};
