/**
 * Ghostline — src/commands/registry.ts
 * WHAT: The one list of slash commands: each builder paired with its handler.
 * FLOWS:
 *  - getAllSlashCommands() → JSON bodies for the bulk PUT in sync.ts
 *  - buildExecutors() → name → wrapped handler for the interaction router
 * Global registration can take up to an hour to show up; set GUILD_ID while developing.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  Collection,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import { wrapCommand, type CommandContext } from "../lib/cmdWrap.js";
import * as mute from "./mute.js";
import * as muterole from "./muterole.js";
import * as moderation from "./moderation.js";
import * as note from "./note.js";
import * as destiny from "./destiny/index.js";
import * as prefix from "./prefix.js";
import * as utility from "./utility.js";

export type SlashExecutor = (interaction: ChatInputCommandInteraction) => Promise<void>;

interface SlashCommand {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute: (ctx: CommandContext<ChatInputCommandInteraction>) => Promise<void>;
}

// Registration order is the order Discord lists them in the picker.
const COMMANDS: readonly SlashCommand[] = [
  { data: mute.data, execute: mute.execute },
  { data: mute.unmuteData, execute: mute.executeUnmute },
  { data: mute.mutesData, execute: mute.executeMutes },
  { data: muterole.data, execute: muterole.execute },
  { data: moderation.kickData, execute: moderation.executeKick },
  { data: moderation.banData, execute: moderation.executeBan },
  { data: note.data, execute: note.execute },
  { data: destiny.data, execute: destiny.execute },
  { data: prefix.data, execute: prefix.execute },
  { data: utility.pingData, execute: utility.executePing },
  { data: utility.avatarData, execute: utility.executeAvatar },
  { data: utility.aboutData, execute: utility.executeAbout },
  { data: utility.colourData, execute: utility.executeColour },
];

export function getAllSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return COMMANDS.map((command) => command.data.toJSON());
}

export function buildExecutors(): Collection<string, SlashExecutor> {
  return new Collection(
    COMMANDS.map(({ data, execute }): [string, SlashExecutor] => [data.name, wrapCommand(data.name, execute)])
  );
}
