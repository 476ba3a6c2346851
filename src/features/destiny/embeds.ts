/**
 * Ghostline — src/features/destiny/embeds.ts
 * WHAT: Embed builders for /destiny replies: linked profile, characters, clan, item and player
 *       search, plus friends, Armory search results and post-game reports.
 * WHY: Keeps Bungie response shapes out of the command handlers.
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/#/docs/builders/main/class/EmbedBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import type { LinkedAccount } from "../../store/destinyStore.js";
import { bungieAsset, formatBungieName } from "./bungieClient.js";
import {
  ACTIVITY_MODE_NAMES,
  CHARACTER_STATS,
  CLASS_NAMES,
  GENDER_NAMES,
  RACE_NAMES,
  membershipTypeName,
} from "./enums.js";
import type {
  ActivityDefinition,
  Character,
  EntitySearchResult,
  Friend,
  FriendRequests,
  GlobalNameSearchPage,
  Group,
  InventoryItem,
  MembershipsForCurrentUser,
  PostGameEntry,
  PostGameReport,
} from "./schemas.js";

const DESTINY_COLOR = 0x3b7dd8;
const POWER_STAT = "1935470627";
// Armor stats at or above this get a star
const HIGH_STAT = 90;
const MAX_SEARCH_RESULTS = 10;
const MAX_FRIENDS_PER_FIELD = 15;
const MAX_REPORT_PLAYERS = 12;

export function buildLinkedAccountEmbed(account: LinkedAccount, displayName: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(formatBungieName(account.name, account.code))
    .setDescription(`Linked to **${displayName}**`)
    .addFields(
      { name: "Platform", value: account.membershipType, inline: true },
      { name: "Membership ID", value: `\`${account.membershipId}\``, inline: true },
      { name: "Verified", value: account.verified ? "Yes (OAuth2)" : "No", inline: true }
    );
}

export function buildWhoamiEmbed(memberships: MembershipsForCurrentUser): EmbedBuilder {
  const user = memberships.bungieNetUser;
  const embed = new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(user.uniqueName ?? user.displayName ?? user.membershipId)
    .addFields({ name: "Bungie.net ID", value: `\`${user.membershipId}\``, inline: true });

  const icon = bungieAsset(user.profilePicturePath);
  if (icon) embed.setThumbnail(icon);
  if (user.about) embed.setDescription(user.about.slice(0, 1024));

  const lines = memberships.destinyMemberships.map((card) => {
    const platform = membershipTypeName(card.membershipType) ?? `Type ${card.membershipType}`;
    const primary = card.membershipId === memberships.primaryMembershipId ? " (primary)" : "";
    return `${platform}: \`${card.membershipId}\`${primary}`;
  });
  embed.addFields({ name: "Destiny memberships", value: lines.join("\n") || "None" });
  return embed;
}

/**
 * Stat lines in a fixed order. Power is shown in the title, so it is left out here.
 */
export function formatCharacterStats(stats: Record<string, number>): string {
  const lines: string[] = [];
  for (const [hash, label] of CHARACTER_STATS) {
    if (hash === POWER_STAT) continue;
    const value = stats[hash];
    if (value === undefined) continue;
    const star = value >= HIGH_STAT ? " ⭐" : "";
    lines.push(`${label}: **${value}**${star}`);
  }
  return lines.join("\n");
}

export function buildCharacterEmbed(character: Character, ownerName: string): EmbedBuilder {
  const className = CLASS_NAMES[character.classType] ?? "Unknown";
  const race = RACE_NAMES[character.raceType] ?? "Unknown";
  const gender = GENDER_NAMES[character.genderType] ?? "Unknown";
  const hours = Math.floor(character.minutesPlayedTotal / 60);
  const lastPlayed = Math.floor(Date.parse(character.dateLastPlayed) / 1000);

  const embed = new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setAuthor({ name: ownerName })
    .setTitle(`${className} ✦ ${character.light}`)
    .setDescription(`${race} ${gender}`)
    .addFields(
      { name: "Time played", value: `${hours}h`, inline: true },
      { name: "Last played", value: Number.isNaN(lastPlayed) ? "Unknown" : `<t:${lastPlayed}:R>`, inline: true }
    );

  const stats = formatCharacterStats(character.stats);
  if (stats) embed.addFields({ name: "Stats", value: stats });

  const emblem = bungieAsset(character.emblemPath);
  if (emblem) embed.setThumbnail(emblem);
  return embed;
}

export function buildClanEmbed(group: Group): EmbedBuilder {
  const { detail } = group;
  const created = Math.floor(Date.parse(detail.creationDate) / 1000);
  const callsign = detail.clanInfo?.clanCallsign;

  const embed = new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(callsign ? `${detail.name} [${callsign}]` : detail.name)
    .setURL(`https://www.bungie.net/en/ClanV2?groupid=${detail.groupId}`)
    .addFields(
      { name: "Members", value: String(detail.memberCount), inline: true },
      { name: "Created", value: Number.isNaN(created) ? "Unknown" : `<t:${created}:D>`, inline: true }
    );

  if (detail.motto) embed.setDescription(`*${detail.motto}*`);
  if (detail.about) embed.addFields({ name: "About", value: detail.about.slice(0, 1024) });

  const founder = group.founder?.destinyUserInfo;
  if (founder) {
    const founderName = founder.bungieGlobalDisplayName
      ? formatBungieName(founder.bungieGlobalDisplayName, founder.bungieGlobalDisplayNameCode)
      : founder.displayName;
    embed.addFields({ name: "Founder", value: founderName || "Unknown", inline: true });
  }
  return embed;
}

export function buildItemEmbed(item: InventoryItem): EmbedBuilder {
  const { displayProperties } = item;
  const embed = new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(displayProperties.name || `Item ${item.hash}`)
    .setFooter({ text: `Hash ${item.hash}` });

  const description = [displayProperties.description, item.flavorText ? `*${item.flavorText}*` : ""]
    .filter((part) => part.length > 0)
    .join("\n\n");
  if (description) embed.setDescription(description.slice(0, 4096));
  if (item.itemTypeAndTierDisplayName) embed.setAuthor({ name: item.itemTypeAndTierDisplayName });

  const icon = displayProperties.hasIcon ? bungieAsset(displayProperties.icon) : undefined;
  if (icon) embed.setThumbnail(icon);
  const screenshot = bungieAsset(item.screenshot);
  if (screenshot) embed.setImage(screenshot);
  return embed;
}

export function buildSearchEmbed(query: string, page: GlobalNameSearchPage): EmbedBuilder {
  const results = page.searchResults.slice(0, MAX_SEARCH_RESULTS);
  const lines = results.map((result) => {
    const name = formatBungieName(result.bungieGlobalDisplayName, result.bungieGlobalDisplayNameCode);
    const platforms = result.destinyMemberships
      .map((card) => membershipTypeName(card.membershipType))
      .filter((platform) => platform !== null);
    return platforms.length > 0 ? `• ${name} (${platforms.join(", ")})` : `• ${name}`;
  });

  const more = page.searchResults.length > MAX_SEARCH_RESULTS || page.hasMore;
  return new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(`Players matching "${query}"`)
    .setDescription(lines.join("\n"))
    .setFooter({ text: more ? "More results available; refine the name to narrow it down." : `${results.length} result(s)` });
}

function friendName(friend: Friend): string {
  if (friend.bungieGlobalDisplayName) {
    return formatBungieName(friend.bungieGlobalDisplayName, friend.bungieGlobalDisplayNameCode);
  }
  return friend.bungieNetUser?.uniqueName ?? friend.bungieNetUser?.displayName ?? "Unknown";
}

/** `🟢 \`Fate#0123\` - \`4611…\``, truncated with a count of the rest. */
export function formatFriendList(friends: readonly Friend[]): string {
  if (friends.length === 0) return "None";
  const lines = friends.slice(0, MAX_FRIENDS_PER_FIELD).map((friend) => {
    const status = friend.onlineStatus === 1 ? "🟢" : "⚫";
    return `${status} \`${friendName(friend)}\` - \`${friend.lastSeenAsMembershipId}\``;
  });
  const rest = friends.length - MAX_FRIENDS_PER_FIELD;
  if (rest > 0) lines.push(`…and ${rest} more`);
  return lines.join("\n");
}

export function buildFriendsEmbed(friends: readonly Friend[], requests: FriendRequests): EmbedBuilder {
  // Online first, then by name
  const sorted = [...friends].sort(
    (a, b) => b.onlineStatus - a.onlineStatus || friendName(a).localeCompare(friendName(b))
  );
  const online = friends.filter((friend) => friend.onlineStatus === 1).length;

  return new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(`(${online}/${friends.length}) Online`)
    .addFields(
      { name: "Friends", value: formatFriendList(sorted) },
      { name: "Incoming requests", value: formatFriendList(requests.incomingRequestList) },
      { name: "Sent requests", value: formatFriendList(requests.outgoingRequestList) }
    );
}

export function buildEntitySearchEmbed(term: string, label: string, result: EntitySearchResult): EmbedBuilder {
  const { results, totalResults, hasMore } = result.results;
  const shown = results.slice(0, MAX_SEARCH_RESULTS);
  const lines = shown.map(
    (entity) => `• **${entity.displayProperties.name || "Unnamed"}** \`${entity.hash}\``
  );

  const embed = new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(`${label} results for "${term}"`)
    .setDescription(lines.length > 0 ? lines.join("\n") : "No entities found.");

  const footer: string[] = [];
  if (lines.length > 0) {
    const more = hasMore || totalResults > shown.length;
    footer.push(more ? `${shown.length} of ${totalResults}` : `${shown.length} result(s)`);
  }
  if (result.suggestedWords.length > 0) footer.push(`Try: ${result.suggestedWords.slice(0, 5).join(", ")}`);
  if (footer.length > 0) embed.setFooter({ text: footer.join(" · ") });

  const first = shown[0];
  const icon = first?.displayProperties.hasIcon ? bungieAsset(first.displayProperties.icon) : undefined;
  if (icon) embed.setThumbnail(icon);
  return embed;
}

function statValue(entry: PostGameEntry, stat: string): number {
  return entry.values[stat]?.basic.value ?? 0;
}

function statDisplay(entry: PostGameEntry, stat: string): string {
  const basic = entry.values[stat]?.basic;
  if (!basic) return "-";
  return basic.displayValue || String(basic.value);
}

/**
 * Tags a finished activity earns: a single player with no deaths is a solo flawless,
 * a fireteam with no deaths is flawless, and a single player is a solo.
 */
export function reportFeatures(report: PostGameReport): string[] {
  const { entries } = report;
  if (entries.length === 0) return [];
  const deathless = entries.every((entry) => statValue(entry, "deaths") === 0);
  if (entries.length === 1) return deathless ? ["Solo Flawless"] : ["Solo"];
  return deathless ? ["Flawless"] : [];
}

export function buildPostGameEmbed(report: PostGameReport, activity: ActivityDefinition | null): EmbedBuilder {
  const { activityDetails } = report;
  const mode = ACTIVITY_MODE_NAMES[activityDetails.mode];
  const title = activity?.displayProperties.name || `Activity ${activityDetails.referenceId}`;
  const period = Math.floor(Date.parse(report.period) / 1000);

  const embed = new EmbedBuilder()
    .setColor(DESTINY_COLOR)
    .setTitle(title)
    .setURL(`https://www.bungie.net/en/PGCR/${activityDetails.instanceId}`)
    .setFooter({ text: `Instance ${activityDetails.instanceId}` });

  const description = [
    mode ? `**${mode}**` : "",
    Number.isNaN(period) ? "" : `<t:${period}:f>`,
    ...reportFeatures(report).map((feature) => `🏅 ${feature}`),
  ].filter((part) => part.length > 0);
  if (description.length > 0) embed.setDescription(description.join("\n"));

  const image = bungieAsset(activity?.pgcrImage);
  if (image) embed.setImage(image);

  for (const entry of report.entries.slice(0, MAX_REPORT_PLAYERS)) {
    const card = entry.player.destinyUserInfo;
    const name = card.bungieGlobalDisplayName
      ? formatBungieName(card.bungieGlobalDisplayName, card.bungieGlobalDisplayNameCode)
      : card.displayName || card.membershipId;
    embed.addFields({
      name,
      value: [
        entry.player.characterClass ?? "Unknown",
        `Time: ${statDisplay(entry, "timePlayedSeconds")}`,
        `Kills: ${statDisplay(entry, "kills")}`,
        `Deaths: ${statDisplay(entry, "deaths")}`,
      ].join("\n"),
      inline: true,
    });
  }
  return embed;
}
