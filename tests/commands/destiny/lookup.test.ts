/**
 * Ghostline — tests/commands/destiny/lookup.test.ts
 * WHAT: characters, search, clan, item, entity and post handlers against a fake BungieClient.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { MessageFlags } from "discord.js";
import { db } from "../../../src/db/db.js";
import type { BungieClient } from "../../../src/features/destiny/bungieClient.js";
import { postGameReportSchema, type Character } from "../../../src/features/destiny/schemas.js";
import { linkAccount } from "../../../src/store/destinyStore.js";
import {
  executeCharacters,
  executeClan,
  executeEntity,
  executeItem,
  executePost,
  executeSearch,
} from "../../../src/commands/destiny/lookup.js";
import { createMockInteraction, embedsFromCall, TEST_USER_ID } from "../../utils/discordMocks.js";
import { createTestCommandContext } from "../../utils/contextFactory.js";
import { ACTIVITY_BODY, REPORT_BODY, STEAM_CARD } from "../../utils/bungieResponses.js";

const hunter: Character = {
  characterId: "2305843009200000001",
  membershipId: STEAM_CARD.membershipId,
  membershipType: 3,
  dateLastPlayed: "2024-03-01T00:00:00Z",
  minutesPlayedTotal: 600,
  light: 1810,
  stats: {},
  raceType: 2,
  classType: 1,
  genderType: 1,
};

function fakeClient(methods: Partial<Record<keyof BungieClient, unknown>>): BungieClient {
  return methods as unknown as BungieClient;
}

describe("/destiny characters", () => {
  beforeEach(() => {
    db.exec("DELETE FROM destiny;");
  });

  it("shows the caller's linked account publicly", async () => {
    linkAccount({ ctxId: TEST_USER_ID, membershipId: STEAM_CARD.membershipId, name: "Fate", code: 123, membershipType: "Steam" });
    const fetchCharacters = vi.fn().mockResolvedValue([hunter]);
    const interaction = createMockInteraction();

    await executeCharacters(createTestCommandContext(interaction), fakeClient({ fetchCharacters }));

    expect(interaction.deferReply).toHaveBeenCalledWith({});
    expect(fetchCharacters).toHaveBeenCalledWith(3, STEAM_CARD.membershipId);
    const [embed] = embedsFromCall(interaction.editReply);
    expect(embed.title).toBe("Hunter ✦ 1810");
    expect(embed.author?.name).toBe("Fate#0123");
    expect(embed.description).toBe("Exo Female");
    expect(embed.fields?.[0]).toEqual({ name: "Time played", value: "10h", inline: true });
  });

  it("says when the member never synced", async () => {
    const fetchCharacters = vi.fn();
    const interaction = createMockInteraction();

    await executeCharacters(createTestCommandContext(interaction), fakeClient({ fetchCharacters }));

    expect(fetchCharacters).not.toHaveBeenCalled();
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "Member `testuser` is not synced yet." });
  });

  it("looks up a player by name", async () => {
    const searchPlayerByBungieName = vi.fn().mockResolvedValue([STEAM_CARD]);
    const fetchCharacters = vi.fn().mockResolvedValue([]);
    const interaction = createMockInteraction({ options: { getString: { player: "Fate#0123" } } });

    await executeCharacters(
      createTestCommandContext(interaction),
      fakeClient({ searchPlayerByBungieName, fetchCharacters })
    );

    expect(fetchCharacters).toHaveBeenCalledWith(3, STEAM_CARD.membershipId);
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "No characters found." });
  });
});

describe("/destiny search", () => {
  it("trims the query and says when nobody matches", async () => {
    const searchByGlobalName = vi.fn().mockResolvedValue({ searchResults: [], page: 0, hasMore: false });
    const interaction = createMockInteraction({ options: { getString: { name: "  Fa " } } });

    await executeSearch(createTestCommandContext(interaction), fakeClient({ searchByGlobalName }));

    expect(searchByGlobalName).toHaveBeenCalledWith("Fa");
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "No players found." });
  });

  it("lists matches with their platforms", async () => {
    const searchByGlobalName = vi.fn().mockResolvedValue({
      searchResults: [
        { bungieGlobalDisplayName: "Fate", bungieGlobalDisplayNameCode: 123, destinyMemberships: [STEAM_CARD] },
      ],
      page: 0,
      hasMore: false,
    });
    const interaction = createMockInteraction({ options: { getString: { name: "Fa" } } });

    await executeSearch(createTestCommandContext(interaction), fakeClient({ searchByGlobalName }));

    const [embed] = embedsFromCall(interaction.editReply);
    expect(embed.title).toBe('Players matching "Fa"');
    expect(embed.description).toBe("• Fate#0123 (Steam)");
    expect(embed.footer?.text).toBe("1 result(s)");
  });
});

describe("/destiny clan", () => {
  const group = {
    detail: {
      groupId: "4389205",
      name: "Home Clan",
      about: "",
      motto: "",
      memberCount: 42,
      creationDate: "2024-03-01T00:00:00Z",
      clanInfo: { clanCallsign: "HOME" },
    },
  };

  it("falls back to the configured home clan", async () => {
    const fetchClanById = vi.fn().mockResolvedValue(group);
    const fetchClanByName = vi.fn();
    const interaction = createMockInteraction();

    await executeClan(createTestCommandContext(interaction), fakeClient({ fetchClanById, fetchClanByName }));

    expect(fetchClanById).toHaveBeenCalledWith("4389205");
    expect(fetchClanByName).not.toHaveBeenCalled();
    const [embed] = embedsFromCall(interaction.editReply);
    expect(embed.title).toBe("Home Clan [HOME]");
    expect(embed.fields).toEqual([
      { name: "Members", value: "42", inline: true },
      { name: "Created", value: "<t:1709251200:D>", inline: true },
    ]);
  });

  it("looks up a clan by name", async () => {
    const fetchClanById = vi.fn();
    const fetchClanByName = vi.fn().mockResolvedValue(group);
    const interaction = createMockInteraction({ options: { getString: { name: " Home Clan " } } });

    await executeClan(createTestCommandContext(interaction), fakeClient({ fetchClanById, fetchClanByName }));

    expect(fetchClanByName).toHaveBeenCalledWith("Home Clan");
    expect(fetchClanById).not.toHaveBeenCalled();
  });
});

describe("/destiny item", () => {
  it("shows the item definition", async () => {
    const fetchInventoryItem = vi.fn().mockResolvedValue({
      hash: 1234,
      displayProperties: { name: "Gjallarhorn", description: "", hasIcon: false },
    });
    const interaction = createMockInteraction({ options: { getInteger: { hash: 1234 } } });

    await executeItem(createTestCommandContext(interaction), fakeClient({ fetchInventoryItem }));

    expect(fetchInventoryItem).toHaveBeenCalledWith(1234);
    const [embed] = embedsFromCall(interaction.editReply);
    expect(embed.title).toBe("Gjallarhorn");
    expect(embed.footer?.text).toBe("Hash 1234");
    expect(embed.description).toBeUndefined();
  });
});

describe("/destiny entity", () => {
  const emptyResult = { suggestedWords: [], results: { results: [], totalResults: 0, hasMore: false } };

  it("searches items by default", async () => {
    const searchEntities = vi.fn().mockResolvedValue(emptyResult);
    const interaction = createMockInteraction({ options: { getString: { name: " Ace " } } });

    await executeEntity(createTestCommandContext(interaction), fakeClient({ searchEntities }));

    expect(searchEntities).toHaveBeenCalledWith("DestinyInventoryItemDefinition", "Ace");
    const [embed] = embedsFromCall(interaction.editReply);
    expect(embed.title).toBe('Item results for "Ace"');
    expect(embed.description).toBe("No entities found.");
  });

  it("labels the chosen definition", async () => {
    const searchEntities = vi.fn().mockResolvedValue(emptyResult);
    const interaction = createMockInteraction({
      options: { getString: { name: "Xur", definition: "DestinyVendorDefinition" } },
    });

    await executeEntity(createTestCommandContext(interaction), fakeClient({ searchEntities }));

    expect(searchEntities).toHaveBeenCalledWith("DestinyVendorDefinition", "Xur");
    expect(embedsFromCall(interaction.editReply)[0].title).toBe('Vendor results for "Xur"');
  });
});

describe("/destiny post", () => {
  const report = postGameReportSchema.parse(REPORT_BODY);

  it("renders the report with the activity's name", async () => {
    const fetchPostGameReport = vi.fn().mockResolvedValue(report);
    const fetchActivityDefinition = vi.fn().mockResolvedValue(ACTIVITY_BODY);
    const interaction = createMockInteraction({ options: { getString: { instance: "13000000001" } } });

    await executePost(
      createTestCommandContext(interaction),
      fakeClient({ fetchPostGameReport, fetchActivityDefinition })
    );

    expect(interaction.deferReply).toHaveBeenCalledWith({});
    expect(fetchPostGameReport).toHaveBeenCalledWith("13000000001");
    expect(fetchActivityDefinition).toHaveBeenCalledWith(2032534090);
    const [embed] = embedsFromCall(interaction.editReply);
    expect(embed.title).toBe("Dungeon: Duality");
    expect(embed.fields).toHaveLength(2);
  });

  it("still renders when the activity definition fails", async () => {
    const fetchPostGameReport = vi.fn().mockResolvedValue(report);
    const fetchActivityDefinition = vi.fn().mockRejectedValue(new Error("manifest down"));
    const interaction = createMockInteraction({ options: { getString: { instance: "13000000001" } } });

    await executePost(
      createTestCommandContext(interaction),
      fakeClient({ fetchPostGameReport, fetchActivityDefinition })
    );

    expect(embedsFromCall(interaction.editReply)[0].title).toBe("Activity 2032534090");
  });

  it("refuses ids that are not numbers", async () => {
    const fetchPostGameReport = vi.fn();
    const interaction = createMockInteraction({ options: { getString: { instance: "latest" } } });

    await executePost(createTestCommandContext(interaction), fakeClient({ fetchPostGameReport }));

    expect(fetchPostGameReport).not.toHaveBeenCalled();
    expect(interaction.reply).toHaveBeenCalledWith({
      content: "❌ Activity instance ids are numbers.",
      flags: MessageFlags.Ephemeral,
    });
  });
});
