/**
 * Ghostline — src/commands/destiny/account.ts
 * WHAT: Account-level /destiny subcommands: sync (OAuth2), link, desync, profile, whoami, friends.
 * FLOWS:
 *  - sync → authorize link + "Enter code" button → modal → exchangeCode → verified link → saveTokens
 *  - link player → SearchDestinyPlayerByBungieName → linkAccount (no OAuth2)
 *  - desync → deleteTokens + unlinkAccount
 *  - whoami / friends → withAccessToken → authorized Bungie.net endpoints
 * DOCS:
 *  - Bungie OAuth: https://github.com/Bungie-net/api/wiki/OAuth-Documentation
 *  - Modals: https://discordjs.guide/interactions/modals.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
  type ButtonInteraction,
  type ModalSubmitInteraction,
} from "discord.js";
import {
  type ChatInputCommandInteraction,
  type CommandContext,
  MessageFlags,
  ensureDeferred,
  replyOrEdit,
  withStep,
  logger,
  DESYNCED_MESSAGE,
  INVALID_CODE_MESSAGE,
  NOT_AUTHORIZED_MESSAGE,
  NOT_CONFIGURED_MESSAGE,
  extractAuthCode,
  notSyncedMessage,
  primaryMembership,
  resolvePlayerByName,
} from "./shared.js";
import {
  BungieApiError,
  formatBungieName,
  getBungieClient,
  type BungieClient,
  type TokenGrant,
} from "../../features/destiny/bungieClient.js";
import { buildFriendsEmbed, buildLinkedAccountEmbed, buildWhoamiEmbed } from "../../features/destiny/embeds.js";
import { membershipTypeName } from "../../features/destiny/enums.js";
import { deleteTokens, saveTokens, withAccessToken } from "../../features/destiny/tokenStore.js";
import {
  DestinyLinkError,
  getLinkedAccount,
  linkAccount,
  unlinkAccount,
  type LinkedAccount,
} from "../../store/destinyStore.js";
import { DESTINY_SYNC_FIELD_ID, destinySyncButtonId, destinySyncModalId } from "../../lib/modalPatterns.js";

export async function executeSync(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  // state ties the redirect back to the Discord user who started the flow
  const url = client.buildAuthorizeUrl(interaction.user.id);

  const embed = new EmbedBuilder()
    .setTitle("How to sync your account")
    .setDescription(
      [
        "1) Open the **Authorize** link below.",
        "2) Log in with your Bungie account and accept.",
        "3) You'll be redirected to a Bungie page. Copy that page's URL, press **Enter code** and paste it.",
      ].join("\n")
    );

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setStyle(ButtonStyle.Link).setLabel("Authorize").setURL(url),
    new ButtonBuilder()
      .setStyle(ButtonStyle.Primary)
      .setLabel("Enter code")
      .setCustomId(destinySyncButtonId(interaction.user.id))
  );

  ctx.step("reply");
  await interaction.reply({ embeds: [embed], components: [row], flags: MessageFlags.Ephemeral });
}

export function buildSyncModal(userId: string): ModalBuilder {
  const input = new TextInputBuilder()
    .setCustomId(DESTINY_SYNC_FIELD_ID)
    .setLabel("Redirected URL or code")
    .setPlaceholder("https://www.bungie.net/...?code=...")
    .setStyle(TextInputStyle.Paragraph)
    .setRequired(true)
    .setMaxLength(1000);

  return new ModalBuilder()
    .setCustomId(destinySyncModalId(userId))
    .setTitle("Sync your Bungie account")
    .addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
}

/**
 * "Enter code" button. The button carries the id of the user who ran /destiny sync.
 */
export async function handleSyncButton(ctx: CommandContext<ButtonInteraction>, ownerId: string): Promise<void> {
  const { interaction } = ctx;
  if (interaction.user.id !== ownerId) {
    await interaction.reply({ content: "❌ This button belongs to someone else.", flags: MessageFlags.Ephemeral });
    return;
  }
  ctx.step("show_modal");
  await interaction.showModal(buildSyncModal(ownerId));
}

export async function handleSyncModal(ctx: CommandContext<ModalSubmitInteraction>, ownerId: string): Promise<void> {
  const { interaction } = ctx;
  const client = getBungieClient();
  if (!client) {
    await replyOrEdit(interaction, { content: NOT_CONFIGURED_MESSAGE });
    return;
  }
  if (interaction.user.id !== ownerId) {
    await replyOrEdit(interaction, { content: "❌ This sync session belongs to someone else." });
    return;
  }

  const auth = extractAuthCode(interaction.fields.getTextInputValue(DESTINY_SYNC_FIELD_ID));
  if (!auth || (auth.state !== null && auth.state !== ownerId)) {
    await replyOrEdit(interaction, { content: `❌ ${INVALID_CODE_MESSAGE}` });
    return;
  }

  await withStep(ctx, "defer", () => ensureDeferred(interaction));

  let grant: TokenGrant;
  try {
    grant = await withStep(ctx, "bungie_token", () => client.exchangeCode(auth.code));
  } catch (err) {
    if (!(err instanceof BungieApiError)) throw err;
    logger.info({ userId: ownerId, error: err.errorStatus }, "[destiny] code exchange rejected");
    await replyOrEdit(interaction, { content: `❌ ${INVALID_CODE_MESSAGE}` });
    return;
  }

  const accessToken = grant.accessToken;
  const memberships = await withStep(ctx, "bungie_memberships", () =>
    client.fetchMembershipsForCurrentUser(accessToken)
  );

  ctx.step("db_write");
  const card = primaryMembership(memberships.destinyMemberships);
  const type = card ? membershipTypeName(card.membershipType) : null;
  if (!card || !type) {
    saveTokens(ownerId, grant);
    await replyOrEdit(interaction, {
      content: "👍 Authorized, but your Bungie account has no Destiny 2 memberships to link.",
    });
    return;
  }

  let linked: LinkedAccount;
  try {
    linked = linkAccount({
      ctxId: ownerId,
      membershipId: card.membershipId,
      name: card.bungieGlobalDisplayName || card.displayName,
      code: card.bungieGlobalDisplayNameCode ?? 0,
      membershipType: type,
      verified: true,
    });
  } catch (err) {
    if (!(err instanceof DestinyLinkError)) throw err;
    await replyOrEdit(interaction, { content: `❌ ${err.message}` });
    return;
  }
  // Tokens are stored only after the link succeeds
  saveTokens(ownerId, grant);

  await replyOrEdit(interaction, { content: `👍 Synced as **${formatBungieName(linked.name, linked.code)}**.` });
}

export async function executeLink(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  const input = interaction.options.getString("player", true);

  await withStep(ctx, "defer", () => ensureDeferred(interaction));
  const player = await withStep(ctx, "bungie_search", () => resolvePlayerByName(client, input));

  ctx.step("db_write");
  const linked = linkAccount({ ctxId: interaction.user.id, ...player });

  await replyOrEdit(interaction, {
    content: `👍 Linked to **${formatBungieName(linked.name, linked.code)}** (${linked.membershipType}).`,
  });
}

export async function executeDesync(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  ctx.step("db_write");
  const hadTokens = deleteTokens(interaction.user.id);
  const hadLink = unlinkAccount(interaction.user.id);

  await interaction.reply({
    content: hadTokens || hadLink ? DESYNCED_MESSAGE : "You're not synced.",
    flags: MessageFlags.Ephemeral,
  });
}

export async function executeProfile(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const user = interaction.options.getUser("member") ?? interaction.user;
  const account = await withStep(ctx, "db_read", () => getLinkedAccount(user.id));

  if (!account) {
    await interaction.reply({ content: notSyncedMessage(user.username), flags: MessageFlags.Ephemeral });
    return;
  }
  await interaction.reply({ embeds: [buildLinkedAccountEmbed(account, user.username)] });
}

export async function executeWhoami(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  await withStep(ctx, "defer", () => ensureDeferred(interaction));

  const memberships = await withStep(ctx, "bungie_fetch", () =>
    withAccessToken(interaction.user.id, client, (token) => client.fetchMembershipsForCurrentUser(token))
  );

  if (!memberships) {
    await replyOrEdit(interaction, { content: NOT_AUTHORIZED_MESSAGE });
    return;
  }
  await replyOrEdit(interaction, { embeds: [buildWhoamiEmbed(memberships)] });
}

export async function executeFriends(ctx: CommandContext<ChatInputCommandInteraction>, client: BungieClient): Promise<void> {
  const { interaction } = ctx;
  await withStep(ctx, "defer", () => ensureDeferred(interaction));

  const social = await withStep(ctx, "bungie_fetch", () =>
    withAccessToken(interaction.user.id, client, async (token) => {
      const [friends, requests] = await Promise.all([
        client.fetchFriends(token),
        client.fetchFriendRequests(token),
      ]);
      return { friends, requests };
    })
  );

  if (!social) {
    await replyOrEdit(interaction, { content: NOT_AUTHORIZED_MESSAGE });
    return;
  }
  await replyOrEdit(interaction, { embeds: [buildFriendsEmbed(social.friends, social.requests)] });
}
