/**
 * Ghostline — tests/commands/destiny/router.test.ts
 * WHAT: /destiny subcommand routing and which failures become a ❌ reply.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { MessageFlags } from "discord.js";
import { db } from "../../../src/db/db.js";
import { BungieApiError } from "../../../src/features/destiny/bungieClient.js";
import { linkAccount } from "../../../src/store/destinyStore.js";
import { execute } from "../../../src/commands/destiny/index.js";
import { createMockInteraction } from "../../utils/discordMocks.js";
import { createTestCommandContext } from "../../utils/contextFactory.js";
import { createFetchMock, envelope, jsonResponse, STEAM_CARD } from "../../utils/bungieResponses.js";

const fetchMock = createFetchMock();

function run(sub: string, strings: Record<string, string | null> = {}) {
  const interaction = createMockInteraction({ options: { getSubcommand: sub, getString: strings } });
  return { interaction, done: execute(createTestCommandContext(interaction)) };
}

describe("/destiny router", () => {
  beforeEach(() => {
    db.exec("DELETE FROM destiny; DELETE FROM kv_store;");
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  it("passes Bungie platform errors on to the user", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(envelope(undefined, { ErrorCode: 686, ErrorStatus: "ClanNotFound", Message: "The clan was not found." }))
    );

    const { interaction, done } = run("clan", { name: "Nobody" });
    await done;

    expect(interaction.editReply).toHaveBeenCalledWith({ content: "❌ The clan was not found." });
  });

  it("rethrows outages so the error card reports them", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>Bad gateway</html>", { status: 502 }));

    const { done } = run("clan", { name: "Nobody" });

    await expect(done).rejects.toBeInstanceOf(BungieApiError);
  });

  it("answers a malformed Bungie name with the expected format", async () => {
    const { interaction, done } = run("link", { player: "Fate" });
    await done;

    expect(fetchMock).not.toHaveBeenCalled();
    expect(interaction.editReply).toHaveBeenCalledWith({
      content:
        "❌ Player name `Fate` not found. Make sure you include the full name, which looks like this: `Fate#0123`.",
    });
  });

  it("refuses to link a membership someone else holds", async () => {
    linkAccount({
      ctxId: "200000000000000099",
      membershipId: STEAM_CARD.membershipId,
      name: "Fate",
      code: 123,
      membershipType: "Steam",
    });
    fetchMock.mockResolvedValueOnce(jsonResponse(envelope([STEAM_CARD])));

    const { interaction, done } = run("link", { player: "Fate#0123" });
    await done;

    expect(interaction.editReply).toHaveBeenCalledWith({
      content: `❌ Membership ${STEAM_CARD.membershipId} is already linked to another Discord account.`,
    });
  });

  it("handles desync without calling Bungie", async () => {
    const { interaction, done } = run("desync");
    await done;

    expect(fetchMock).not.toHaveBeenCalled();
    expect(interaction.reply).toHaveBeenCalledWith({ content: "You're not synced.", flags: MessageFlags.Ephemeral });
  });

  it("asks unsynced users to sync before whoami", async () => {
    const { interaction, done } = run("whoami");
    await done;

    expect(fetchMock).not.toHaveBeenCalled();
    expect(interaction.editReply).toHaveBeenCalledWith({
      content: "You're not authorized. Use `/destiny sync` to sync your account.",
    });
  });
});
