/**
 * Ghostline — tests/commands/utility.test.ts
 * WHAT: /ping, /avatar, /about and /colour.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { MessageFlags } from "discord.js";
import {
  INVALID_COLOUR_MESSAGE,
  buildAboutEmbed,
  executeAbout,
  executeAvatar,
  executeColour,
  executePing,
  parseHexColour,
  pingMessage,
} from "../../src/commands/utility.js";
import { createMockInteraction, createMockUser, embedsFromCall, TEST_USER_ID } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

describe("pingMessage", () => {
  it("rounds the heartbeat", () => {
    expect(pingMessage(41.6)).toBe("Pong! 42ms");
  });

  it("shows 0 before the first heartbeat", () => {
    expect(pingMessage(-1)).toBe("Pong! 0ms");
  });
});

describe("/ping", () => {
  it("replies with the gateway latency", async () => {
    const interaction = createMockInteraction();
    await executePing(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({ content: "Pong! 42ms" });
  });
});

describe("/avatar", () => {
  it("defaults to the caller", async () => {
    const interaction = createMockInteraction();
    await executeAvatar(createTestCommandContext(interaction));

    const [embed] = embedsFromCall(interaction.reply);
    expect(embed.title).toBe("testuser");
    expect(embed.image?.url).toBe(`https://cdn.discordapp.com/avatars/${TEST_USER_ID}/abc.png`);
  });

  it("shows the chosen member", async () => {
    const other = createMockUser({ id: "200000000000000002", username: "other" });
    const interaction = createMockInteraction({ options: { getUser: { member: other } } });
    await executeAvatar(createTestCommandContext(interaction));

    const [embed] = embedsFromCall(interaction.reply);
    expect(embed.title).toBe("other");
    expect(embed.image?.url).toBe("https://cdn.discordapp.com/avatars/200000000000000002/abc.png");
    expect(other.displayAvatarURL).toHaveBeenCalledWith({ size: 1024 });
  });
});

describe("buildAboutEmbed", () => {
  it("shows servers, uptime, latency and versions", () => {
    const { data } = buildAboutEmbed({
      guilds: 3,
      uptimeSec: 5400.7,
      wsPing: 41.6,
      nodeVersion: "v20.11.0",
      libraryVersion: "14.16.3",
    });

    expect(data.fields).toEqual([
      { name: "Servers", value: "3", inline: true },
      { name: "Uptime", value: "1h 30m", inline: true },
      { name: "Latency", value: "42ms", inline: true },
      { name: "Versions", value: "Node.js v20.11.0 · discord.js v14.16.3" },
    ]);
  });
});

describe("/about", () => {
  it("reads guild count and latency from the client", async () => {
    const interaction = createMockInteraction();
    await executeAbout(createTestCommandContext(interaction));

    const [embed] = embedsFromCall(interaction.reply);
    expect(embed.title).toBe("About Ghostline");
    expect(embed.fields?.[0]).toEqual({ name: "Servers", value: "0", inline: true });
    expect(embed.fields?.[2]).toEqual({ name: "Latency", value: "42ms", inline: true });
  });
});

describe("parseHexColour", () => {
  it("reads six-digit forms with or without a prefix", () => {
    expect(parseHexColour("#3b7dd8")).toEqual({ hex: "#3B7DD8", value: 3898840, rgb: [59, 125, 216] });
    expect(parseHexColour("3B7DD8")?.value).toBe(3898840);
    expect(parseHexColour(" 0x00ff00 ")).toEqual({ hex: "#00FF00", value: 65280, rgb: [0, 255, 0] });
  });

  it("expands the short form", () => {
    expect(parseHexColour("#fff")).toEqual({ hex: "#FFFFFF", value: 16777215, rgb: [255, 255, 255] });
  });

  it.each(["", "#12345", "blue", "#ggg", "#1234567"])("rejects %j", (input) => {
    expect(parseHexColour(input)).toBeNull();
  });
});

describe("/colour", () => {
  it("shows a swatch for the colour", async () => {
    const interaction = createMockInteraction({ options: { getString: { hex: "#fff" } } });
    await executeColour(createTestCommandContext(interaction));

    const [embed] = embedsFromCall(interaction.reply);
    expect(embed.title).toBe("#FFFFFF");
    expect(embed.color).toBe(16777215);
    expect(embed.fields).toEqual([
      { name: "RGB", value: "255, 255, 255", inline: true },
      { name: "Integer", value: "16777215", inline: true },
    ]);
  });

  it("explains a bad value privately", async () => {
    const interaction = createMockInteraction({ options: { getString: { hex: "blue" } } });
    await executeColour(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({ content: INVALID_COLOUR_MESSAGE, flags: MessageFlags.Ephemeral });
  });
});
