/**
 * Ghostline — src/listeners/prefixCommands.ts
 * WHAT: Message commands behind the per-guild prefix: ping, say, avatar, about, colour, prefix.
 * HOW: "<prefix><name> args..." → handler. Bots and webhooks are ignored.
 * SECURITY:
 *  - say echoes user text with every mention type disabled
 * DOCS:
 *  - Discord.js Message: https://discord.js.org/#/docs/discord.js/main/class/Message
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type Message } from "discord.js";
import { logger } from "../lib/logger.js";
import { getPrefix, defaultPrefix } from "../config/prefixStore.js";
import {
  INVALID_COLOUR_MESSAGE,
  aboutStats,
  buildAboutEmbed,
  buildAvatarEmbed,
  buildColourEmbed,
  parseHexColour,
  pingMessage,
} from "../commands/utility.js";

export const name = Events.MessageCreate;

export interface ParsedPrefixCommand {
  command: string;
  args: string;
}

/**
 * "?say hello there" with prefix "?" → { command: "say", args: "hello there" }
 */
export function parsePrefixCommand(content: string, prefix: string): ParsedPrefixCommand | null {
  if (!content.startsWith(prefix)) return null;
  const body = content.slice(prefix.length).trimStart();
  if (body.length === 0) return null;

  const match = body.match(/^(\S+)\s*([\s\S]*)$/);
  if (!match) return null;
  return { command: match[1].toLowerCase(), args: match[2].trim() };
}

const MENTION_RE = /^<@!?(\d{17,20})>$/;

async function handleAvatar(message: Message, args: string): Promise<void> {
  let user = message.author;
  const target = args.match(MENTION_RE)?.[1] ?? (/^\d{17,20}$/.test(args) ? args : null);
  if (target) {
    const mentioned = message.mentions.users.get(target);
    user = mentioned ?? (await message.client.users.fetch(target));
  }
  await message.reply({ embeds: [buildAvatarEmbed(user)], allowedMentions: { repliedUser: false } });
}

export async function execute(message: Message): Promise<void> {
  if (message.author.bot || message.webhookId) return;

  const content = message.content?.trim();
  if (!content) return;

  const prefix = message.guildId ? getPrefix(message.guildId) : defaultPrefix();
  const parsed = parsePrefixCommand(content, prefix);
  if (!parsed) return;

  switch (parsed.command) {
    case "ping":
      await message.reply({ content: pingMessage(message.client.ws.ping), allowedMentions: { repliedUser: false } });
      break;

    case "say":
      if (!parsed.args) return;
      if (!message.channel.isSendable()) return;
      await message.channel.send({ content: parsed.args.slice(0, 2000), allowedMentions: { parse: [] } });
      break;

    case "avatar":
      await handleAvatar(message, parsed.args);
      break;

    case "about":
      await message.reply({
        embeds: [buildAboutEmbed(aboutStats(message.client))],
        allowedMentions: { repliedUser: false },
      });
      break;

    case "colour":
    case "color": {
      const colour = parseHexColour(parsed.args);
      await message.reply(
        colour
          ? { embeds: [buildColourEmbed(colour)], allowedMentions: { repliedUser: false } }
          : { content: INVALID_COLOUR_MESSAGE, allowedMentions: { repliedUser: false } }
      );
      break;
    }

    case "prefix":
      await message.reply({
        content: `My prefix here is \`${prefix}\`. Change it with \`/prefix set\`.`,
        allowedMentions: { repliedUser: false },
      });
      break;

    default:
      return;
  }

  logger.debug(
    { evt: "prefix_cmd", command: parsed.command, guildId: message.guildId ?? "dm", userId: message.author.id },
    "[prefix] command handled"
  );
}
