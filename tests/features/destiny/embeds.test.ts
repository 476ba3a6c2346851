/**
 * Ghostline — tests/features/destiny/embeds.test.ts
 * WHAT: Embed content for linked profiles, characters, search results, friends and post-game reports.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  buildCharacterEmbed,
  buildClanEmbed,
  buildEntitySearchEmbed,
  buildFriendsEmbed,
  buildLinkedAccountEmbed,
  buildPostGameEmbed,
  buildSearchEmbed,
  formatCharacterStats,
  formatFriendList,
  reportFeatures,
} from "../../../src/features/destiny/embeds.js";
import {
  activityDefinitionSchema,
  entitySearchSchema,
  postGameReportSchema,
  type Character,
  type Friend,
  type GlobalNameSearchPage,
} from "../../../src/features/destiny/schemas.js";
import { ACTIVITY_BODY, REPORT_BODY } from "../../utils/bungieResponses.js";

describe("formatCharacterStats", () => {
  it("lists stats in display order, skips Power and stars high values", () => {
    const stats = {
      "144602215": 40, // Intellect
      "1935470627": 1810, // Power
      "2996146975": 100, // Mobility
      "392767087": 89, // Resilience
    };

    expect(formatCharacterStats(stats)).toBe(
      ["Mobility: **100** ⭐", "Resilience: **89**", "Intellect: **40**"].join("\n")
    );
  });

  it("returns an empty string when no known stats are present", () => {
    expect(formatCharacterStats({ "123": 5 })).toBe("");
  });
});

describe("buildCharacterEmbed", () => {
  const character: Character = {
    characterId: "c1",
    membershipId: "m1",
    membershipType: 3,
    dateLastPlayed: "2024-03-01T00:00:00Z",
    minutesPlayedTotal: 125,
    light: 1810,
    stats: { "2996146975": 30 },
    raceType: 1,
    classType: 2,
    genderType: 1,
  };

  it("puts class and power in the title", () => {
    const data = buildCharacterEmbed(character, "Fate#0123").toJSON();

    expect(data.title).toBe("Warlock ✦ 1810");
    expect(data.description).toBe("Awoken Female");
    expect(data.author?.name).toBe("Fate#0123");
    expect(data.fields).toEqual([
      { name: "Time played", value: "2h", inline: true },
      { name: "Last played", value: "<t:1709251200:R>", inline: true },
      { name: "Stats", value: "Mobility: **30**" },
    ]);
  });
});

describe("buildLinkedAccountEmbed", () => {
  it("shows the padded Bungie name and platform", () => {
    const data = buildLinkedAccountEmbed(
      { ctxId: "u1", membershipId: "4611686018400000001", name: "Fate", code: 7, membershipType: "Psn", verified: true },
      "testuser"
    ).toJSON();

    expect(data.title).toBe("Fate#0007");
    expect(data.description).toBe("Linked to **testuser**");
    expect(data.fields?.[0]).toEqual({ name: "Platform", value: "Psn", inline: true });
    expect(data.fields?.[2]).toEqual({ name: "Verified", value: "Yes (OAuth2)", inline: true });
  });
});

describe("buildClanEmbed", () => {
  it("adds the callsign and founder", () => {
    const data = buildClanEmbed({
      detail: {
        groupId: "4389205",
        name: "Test Clan",
        about: "",
        motto: "Eyes up",
        memberCount: 42,
        creationDate: "not a date",
        clanInfo: { clanCallsign: "TC" },
      },
      founder: {
        destinyUserInfo: {
          membershipId: "m1",
          membershipType: 3,
          displayName: "Fate",
          bungieGlobalDisplayName: "Fate",
          bungieGlobalDisplayNameCode: 123,
        },
      },
    }).toJSON();

    expect(data.title).toBe("Test Clan [TC]");
    expect(data.url).toBe("https://www.bungie.net/en/ClanV2?groupid=4389205");
    expect(data.description).toBe("*Eyes up*");
    expect(data.fields).toEqual([
      { name: "Members", value: "42", inline: true },
      { name: "Created", value: "Unknown", inline: true },
      { name: "Founder", value: "Fate#0123", inline: true },
    ]);
  });
});

describe("buildSearchEmbed", () => {
  it("lists names with their platforms", () => {
    const page: GlobalNameSearchPage = {
      page: 0,
      hasMore: false,
      searchResults: [
        {
          bungieGlobalDisplayName: "Fate",
          bungieGlobalDisplayNameCode: 123,
          destinyMemberships: [
            { membershipId: "m1", membershipType: 3, displayName: "", bungieGlobalDisplayName: "" },
            { membershipId: "m2", membershipType: 2, displayName: "", bungieGlobalDisplayName: "" },
          ],
        },
        { bungieGlobalDisplayName: "Faten", bungieGlobalDisplayNameCode: 9, destinyMemberships: [] },
      ],
    };

    const data = buildSearchEmbed("Fat", page).toJSON();

    expect(data.title).toBe('Players matching "Fat"');
    expect(data.description).toBe("• Fate#0123 (Steam, Psn)\n• Faten#0009");
    expect(data.footer?.text).toBe("2 result(s)");
  });

  it("caps the list at ten and hints at more", () => {
    const page: GlobalNameSearchPage = {
      page: 0,
      hasMore: false,
      searchResults: Array.from({ length: 12 }, (_, i) => ({
        bungieGlobalDisplayName: `P${i}`,
        bungieGlobalDisplayNameCode: 1000 + i,
        destinyMemberships: [],
      })),
    };

    const data = buildSearchEmbed("P", page).toJSON();

    expect(data.description?.split("\n")).toHaveLength(10);
    expect(data.footer?.text).toBe("More results available; refine the name to narrow it down.");
  });
});

function friend(id: string, name: string, code: number, online: boolean): Friend {
  return {
    lastSeenAsMembershipId: id,
    bungieGlobalDisplayName: name,
    bungieGlobalDisplayNameCode: code,
    onlineStatus: online ? 1 : 0,
  };
}

describe("buildFriendsEmbed", () => {
  it("counts online friends and lists them first", () => {
    const friends = [friend("id1", "Zed", 42, false), friend("id2", "Osiris", 7, true), friend("id3", "Ana", 1, true)];

    const requests = { incomingRequestList: [], outgoingRequestList: [friend("id4", "Eris", 9, false)] };

    const { data } = buildFriendsEmbed(friends, requests);

    expect(data.title).toBe("(2/3) Online");
    expect(data.fields).toEqual([
      {
        name: "Friends",
        value: ["🟢 `Ana#0001` - `id3`", "🟢 `Osiris#0007` - `id2`", "⚫ `Zed#0042` - `id1`"].join("\n"),
      },
      { name: "Incoming requests", value: "None" },
      { name: "Sent requests", value: "⚫ `Eris#0009` - `id4`" },
    ]);
  });

  it("truncates long lists with a count of the rest", () => {
    const friends = Array.from({ length: 17 }, (_, i) => friend(`id${i}`, `P${i}`, i, false));

    const lines = formatFriendList(friends).split("\n");

    expect(lines).toHaveLength(16);
    expect(lines[15]).toBe("…and 2 more");
  });

  it("falls back to the Bungie.net unique name", () => {
    const legacy: Friend = {
      lastSeenAsMembershipId: "id9",
      bungieGlobalDisplayName: "",
      onlineStatus: 0,
      bungieNetUser: { uniqueName: "oldname" },
    };

    expect(formatFriendList([legacy])).toBe("⚫ `oldname` - `id9`");
  });
});

describe("buildEntitySearchEmbed", () => {
  it("lists names with hashes and suggested words", () => {
    const result = entitySearchSchema.parse({
      suggestedWords: ["ace"],
      results: {
        results: [
          { hash: 347366834, entityType: "DestinyInventoryItemDefinition", displayProperties: { name: "Ace of Spades" } },
          { hash: 1, entityType: "DestinyInventoryItemDefinition", displayProperties: { name: "Ace of Spades Ornament" } },
        ],
        totalResults: 2,
        hasMore: false,
      },
    });

    const { data } = buildEntitySearchEmbed("ace", "Item", result);

    expect(data.title).toBe('Item results for "ace"');
    expect(data.description).toBe("• **Ace of Spades** `347366834`\n• **Ace of Spades Ornament** `1`");
    expect(data.footer?.text).toBe("2 result(s) · Try: ace");
  });

  it("says so when nothing matches", () => {
    const result = entitySearchSchema.parse({ results: {} });

    const { data } = buildEntitySearchEmbed("zzz", "Vendor", result);

    expect(data.description).toBe("No entities found.");
    expect(data.footer).toBeUndefined();
  });
});

describe("reportFeatures", () => {
  const report = postGameReportSchema.parse(REPORT_BODY);
  const [hunter, warlock] = report.entries;

  it("tags a deathless solo clear", () => {
    expect(reportFeatures({ ...report, entries: [hunter] })).toEqual(["Solo Flawless"]);
  });

  it("tags a solo clear with deaths", () => {
    expect(reportFeatures({ ...report, entries: [warlock] })).toEqual(["Solo"]);
  });

  it("tags a fireteam with no deaths", () => {
    expect(reportFeatures({ ...report, entries: [hunter, hunter] })).toEqual(["Flawless"]);
  });

  it("tags nothing when someone died in a fireteam", () => {
    expect(reportFeatures(report)).toEqual([]);
  });
});

describe("buildPostGameEmbed", () => {
  const report = postGameReportSchema.parse(REPORT_BODY);

  it("shows the activity and a field per player", () => {
    const { data } = buildPostGameEmbed(report, activityDefinitionSchema.parse(ACTIVITY_BODY));

    expect(data.title).toBe("Dungeon: Duality");
    expect(data.url).toBe("https://www.bungie.net/en/PGCR/13000000001");
    expect(data.description).toBe("**Dungeon**\n<t:1714593600:f>");
    expect(data.image?.url).toBe("https://www.bungie.net/img/theme/destiny/bgs/pgcrs/duality.jpg");
    expect(data.footer?.text).toBe("Instance 13000000001");
    expect(data.fields).toEqual([
      { name: "Fate#0123", value: "Hunter\nTime: 30m 0s\nKills: 120\nDeaths: 0", inline: true },
      { name: "Osiris#0007", value: "Warlock\nTime: 29m 10s\nKills: 98\nDeaths: 1", inline: true },
    ]);
  });

  it("falls back to the reference id without a definition", () => {
    const { data } = buildPostGameEmbed(report, null);

    expect(data.title).toBe("Activity 2032534090");
    expect(data.image).toBeUndefined();
  });
});
