/**
 * Ghostline — src/commands/utility.ts
 * WHAT: /ping, /avatar, /about and /colour.
 * WHY: No database, no Bungie calls: a quick "is it up?" check, an avatar viewer,
 *      bot stats and a colour swatch.
 * DOCS:
 *  - client.ws.ping: https://discord.js.org/#/docs/discord.js/main/class/WebSocketManager?scrollTo=ping
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  SlashCommandBuilder,
  EmbedBuilder,
  MessageFlags,
  version as discordJsVersion,
  type ChatInputCommandInteraction,
  type User,
} from "discord.js";
import type { CommandContext } from "../lib/cmdWrap.js";
import { formatDuration } from "../lib/time.js";

export const pingData = new SlashCommandBuilder().setName("ping").setDescription("Check the bot's latency.");

export const avatarData = new SlashCommandBuilder()
  .setName("avatar")
  .setDescription("Show a member's avatar.")
  .addUserOption((o) => o.setName("member").setDescription("Whose avatar (defaults to you)"));

export const aboutData = new SlashCommandBuilder().setName("about").setDescription("Bot stats: servers, uptime, latency.");

export const colourData = new SlashCommandBuilder()
  .setName("colour")
  .setDescription("Preview a hex colour.")
  .addStringOption((o) =>
    o.setName("hex").setDescription("e.g. #3b7dd8, 3b7dd8 or #fff").setRequired(true).setMaxLength(9)
  );

/**
 * Gateway heartbeat latency. -1 before the first heartbeat ACK, shown as 0.
 */
export function pingMessage(wsPing: number): string {
  return `Pong! ${Math.max(0, Math.round(wsPing))}ms`;
}

export function buildAvatarEmbed(user: User): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(user.username)
    .setImage(user.displayAvatarURL({ size: 1024 }));
}

export interface AboutStats {
  guilds: number;
  uptimeSec: number;
  wsPing: number;
  nodeVersion: string;
  libraryVersion: string;
}

export function buildAboutEmbed(stats: AboutStats): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("About Ghostline")
    .addFields(
      { name: "Servers", value: String(stats.guilds), inline: true },
      { name: "Uptime", value: formatDuration(Math.floor(stats.uptimeSec)), inline: true },
      { name: "Latency", value: `${Math.max(0, Math.round(stats.wsPing))}ms`, inline: true },
      { name: "Versions", value: `Node.js ${stats.nodeVersion} · discord.js v${stats.libraryVersion}` }
    );
}

export function aboutStats(client: ChatInputCommandInteraction["client"]): AboutStats {
  return {
    guilds: client.guilds.cache.size,
    uptimeSec: process.uptime(),
    wsPing: client.ws.ping,
    nodeVersion: process.version,
    libraryVersion: discordJsVersion,
  };
}

/** Packed 24-bit RGB, as Discord stores embed colours. */
export interface Colour {
  hex: string;
  value: number;
  rgb: readonly [r: number, g: number, b: number];
}

/**
 * Accepts "#3b7dd8", "3b7dd8", "0x3b7dd8" and the short "#fff" form.
 * @returns null for anything else
 */
export function parseHexColour(input: string): Colour | null {
  let digits = input.trim().replace(/^(#|0x)/i, "");
  if (/^[0-9a-f]{3}$/i.test(digits)) {
    digits = [...digits].map((d) => d + d).join("");
  }
  if (!/^[0-9a-f]{6}$/i.test(digits)) return null;

  const value = parseInt(digits, 16);
  return {
    hex: `#${digits.toUpperCase()}`,
    value,
    rgb: [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff],
  };
}

export function buildColourEmbed(colour: Colour): EmbedBuilder {
  const [r, g, b] = colour.rgb;
  return new EmbedBuilder()
    .setColor(colour.value)
    .setTitle(colour.hex)
    .addFields(
      { name: "RGB", value: `${r}, ${g}, ${b}`, inline: true },
      { name: "Integer", value: String(colour.value), inline: true }
    );
}

export const INVALID_COLOUR_MESSAGE = "❌ That isn't a hex colour. Try `#3b7dd8` or `#fff`.";

export async function executePing(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  await interaction.reply({ content: pingMessage(interaction.client.ws.ping) });
}

export async function executeAvatar(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const user = interaction.options.getUser("member") ?? interaction.user;
  await interaction.reply({ embeds: [buildAvatarEmbed(user)] });
}

export async function executeAbout(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  await interaction.reply({ embeds: [buildAboutEmbed(aboutStats(interaction.client))] });
}

export async function executeColour(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const colour = parseHexColour(interaction.options.getString("hex", true));
  if (!colour) {
    await interaction.reply({ content: INVALID_COLOUR_MESSAGE, flags: MessageFlags.Ephemeral });
    return;
  }
  await interaction.reply({ embeds: [buildColourEmbed(colour)] });
}
