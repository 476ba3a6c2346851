/**
 * Ghostline — src/commands/destiny/shared.ts
 * WHAT: Pieces the /destiny subcommand handlers share: messages, player resolution, auth-code parsing.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export { type ChatInputCommandInteraction, MessageFlags } from "discord.js";
export { type CommandContext, ensureDeferred, replyOrEdit, withStep } from "../../lib/cmdWrap.js";
export { logger } from "../../lib/logger.js";

import type { BungieClient } from "../../features/destiny/bungieClient.js";
import { BungieNameError, parseBungieName } from "../../features/destiny/bungieClient.js";
import { MembershipType, membershipTypeName, type MembershipTypeName } from "../../features/destiny/enums.js";
import type { UserInfoCard } from "../../features/destiny/schemas.js";

export const NOT_CONFIGURED_MESSAGE = "Destiny features are not configured.";
export const NOT_AUTHORIZED_MESSAGE = "You're not authorized. Use `/destiny sync` to sync your account.";
export const DESYNCED_MESSAGE = "Successfully desynced your membership.";
export const INVALID_CODE_MESSAGE = "Invalid URL. Please run the command again and send the URL.";

export function notSyncedMessage(username: string): string {
  return `Member \`${username}\` is not synced yet.`;
}

/**
 * Picks the membership Bungie treats as canonical: the cross-save primary when
 * one is set, otherwise the first card.
 */
export function primaryMembership(cards: UserInfoCard[]): UserInfoCard | null {
  if (cards.length === 0) return null;
  const crossSave = cards.find(
    (card) => card.crossSaveOverride !== undefined && card.crossSaveOverride !== 0 && card.crossSaveOverride === card.membershipType
  );
  return crossSave ?? cards[0];
}

export interface ResolvedPlayer {
  membershipId: string;
  membershipType: MembershipTypeName;
  name: string;
  code: number;
}

/**
 * "Name#1234" → the player's primary Destiny membership.
 * @throws BungieNameError when the name is malformed or nobody has it
 */
export async function resolvePlayerByName(client: BungieClient, input: string): Promise<ResolvedPlayer> {
  const parsed = parseBungieName(input);
  const cards = await client.searchPlayerByBungieName(parsed.name, parsed.code, MembershipType.All);
  const card = primaryMembership(cards);
  const type = card ? membershipTypeName(card.membershipType) : null;
  if (!card || !type) throw new BungieNameError(input.trim());

  return {
    membershipId: card.membershipId,
    membershipType: type,
    name: card.bungieGlobalDisplayName || parsed.name,
    code: card.bungieGlobalDisplayNameCode ?? parsed.code,
  };
}

export interface AuthCode {
  code: string;
  state: string | null;
}

const RAW_CODE_RE = /^[A-Za-z0-9]+$/;

/**
 * Accepts the page Bungie redirected to (`https://…?code=abc&state=…`), a bare
 * query string, or the code by itself.
 * @returns null when no code can be found
 */
export function extractAuthCode(input: string): AuthCode | null {
  const trimmed = input.trim();
  if (trimmed.length === 0) return null;

  if (trimmed.includes("code=")) {
    const query = /^https?:\/\//i.test(trimmed)
      ? safeQuery(trimmed)
      : trimmed.slice(trimmed.indexOf("?") + 1);
    if (query === null) return null;
    const params = new URLSearchParams(query);
    const code = params.get("code");
    if (!code || !RAW_CODE_RE.test(code)) return null;
    return { code, state: params.get("state") };
  }

  return RAW_CODE_RE.test(trimmed) ? { code: trimmed, state: null } : null;
}

function safeQuery(url: string): string | null {
  if (!URL.canParse(url)) return null;
  return new URL(url).search.slice(1);
}
