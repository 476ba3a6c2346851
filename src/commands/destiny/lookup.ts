/**
 * Ghostline — src/commands/destiny/lookup.ts
 * WHAT: Public Bungie lookups: characters, player search, clan, item definition, Armory
 *       entity search and post-game reports.
 * WHY: None of these need OAuth2; they only need the API key.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  type ChatInputCommandInteraction,
  type CommandContext,
  ensureDeferred,
  replyOrEdit,
  withStep,
  logger,
  notSyncedMessage,
  resolvePlayerByName,
  type ResolvedPlayer,
} from "./shared.js";
import { env } from "../../lib/env.js";
import { formatBungieName, type BungieClient } from "../../features/destiny/bungieClient.js";
import {
  buildCharacterEmbed,
  buildClanEmbed,
  buildEntitySearchEmbed,
  buildItemEmbed,
  buildPostGameEmbed,
  buildSearchEmbed,
} from "../../features/destiny/embeds.js";
import { ENTITY_DEFINITIONS, membershipTypeValue } from "../../features/destiny/enums.js";
import { getLinkedAccount } from "../../store/destinyStore.js";

// A Destiny account has at most three characters
const MAX_CHARACTERS = 3;

export async function executeCharacters(
  ctx: CommandContext<ChatInputCommandInteraction>,
  client: BungieClient
): Promise<void> {
  const { interaction } = ctx;
  const playerName = interaction.options.getString("player");
  const user = interaction.options.getUser("member") ?? interaction.user;

  await withStep(ctx, "defer", () => ensureDeferred(interaction, false));

  let player: ResolvedPlayer;
  if (playerName) {
    player = await withStep(ctx, "bungie_search", () => resolvePlayerByName(client, playerName));
  } else {
    const account = await withStep(ctx, "db_read", () => getLinkedAccount(user.id));
    if (!account) {
      await replyOrEdit(interaction, { content: notSyncedMessage(user.username) }, { publicReply: true });
      return;
    }
    player = account;
  }

  const characters = await withStep(ctx, "bungie_fetch", () =>
    client.fetchCharacters(membershipTypeValue(player.membershipType), player.membershipId)
  );
  if (characters.length === 0) {
    await replyOrEdit(interaction, { content: "No characters found." }, { publicReply: true });
    return;
  }

  const owner = formatBungieName(player.name, player.code);
  const embeds = characters.slice(0, MAX_CHARACTERS).map((character) => buildCharacterEmbed(character, owner));
  await replyOrEdit(interaction, { embeds }, { publicReply: true });
}

export async function executeSearch(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  const name = interaction.options.getString("name", true).trim();

  await withStep(ctx, "defer", () => ensureDeferred(interaction, false));
  const page = await withStep(ctx, "bungie_search", () => client.searchByGlobalName(name));

  if (page.searchResults.length === 0) {
    await replyOrEdit(interaction, { content: "No players found." }, { publicReply: true });
    return;
  }
  await replyOrEdit(interaction, { embeds: [buildSearchEmbed(name, page)] }, { publicReply: true });
}

export async function executeClan(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  const name = interaction.options.getString("name")?.trim();

  await withStep(ctx, "defer", () => ensureDeferred(interaction, false));
  const clan = await withStep(ctx, "bungie_fetch", () =>
    name ? client.fetchClanByName(name) : client.fetchClanById(env.BUNGIE_DEFAULT_CLAN_ID)
  );
  await replyOrEdit(interaction, { embeds: [buildClanEmbed(clan)] }, { publicReply: true });
}

export async function executeItem(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  const hash = interaction.options.getInteger("hash", true);

  await withStep(ctx, "defer", () => ensureDeferred(interaction, false));
  const item = await withStep(ctx, "bungie_fetch", () => client.fetchInventoryItem(hash));
  await replyOrEdit(interaction, { embeds: [buildItemEmbed(item)] }, { publicReply: true });
}

const DEFAULT_DEFINITION = "DestinyInventoryItemDefinition";

export async function executeEntity(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  const term = interaction.options.getString("name", true).trim();
  const definition = interaction.options.getString("definition") ?? DEFAULT_DEFINITION;
  const label = ENTITY_DEFINITIONS.find(([name]) => name === definition)?.[1] ?? definition;

  await withStep(ctx, "defer", () => ensureDeferred(interaction, false));
  const result = await withStep(ctx, "bungie_search", () => client.searchEntities(definition, term));
  await replyOrEdit(interaction, { embeds: [buildEntitySearchEmbed(term, label, result)] }, { publicReply: true });
}

export async function executePost(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  const instanceId = interaction.options.getString("instance", true).trim();
  if (!/^\d{1,20}$/.test(instanceId)) {
    await replyOrEdit(interaction, { content: "❌ Activity instance ids are numbers." });
    return;
  }

  await withStep(ctx, "defer", () => ensureDeferred(interaction, false));
  const report = await withStep(ctx, "bungie_fetch", () => client.fetchPostGameReport(instanceId));
  const activity = await withStep(ctx, "bungie_manifest", async () => {
    try {
      return await client.fetchActivityDefinition(report.activityDetails.referenceId);
    } catch (err) {
      // The report still renders without the activity's name and image
      logger.warn(
        { err, referenceId: report.activityDetails.referenceId },
        "[destiny] Activity definition unavailable"
      );
      return null;
    }
  });
  await replyOrEdit(interaction, { embeds: [buildPostGameEmbed(report, activity)] }, { publicReply: true });
}
