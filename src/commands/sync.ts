/**
 * Ghostline — src/commands/sync.ts
 * WHAT: Pushes slash-command definitions to Discord with a bulk overwrite.
 * WHY: PUT replaces the whole set in one call, so removed commands disappear too.
 * FLOWS:
 *  - deployCommands({ guildId }) → guild-scoped PUT (instant)
 *  - deployCommands({}) → global PUT (up to an hour to propagate)
 * DOCS:
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { getAllSlashCommands } from "./registry.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";

export interface DeployOptions {
  guildId?: string;
  /** Injected by tests */
  rest?: Pick<REST, "put">;
}

/**
 * @returns number of commands registered
 */
export async function deployCommands(options: DeployOptions = {}): Promise<number> {
  const body = getAllSlashCommands();
  const rest = options.rest ?? new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const route = options.guildId
    ? Routes.applicationGuildCommands(env.CLIENT_ID, options.guildId)
    : Routes.applicationCommands(env.CLIENT_ID);

  try {
    await rest.put(route, { body });
  } catch (err) {
    logger.error({ err, guildId: options.guildId ?? "global" }, "[cmdsync] failed to deploy commands");
    throw err;
  }

  logger.info({ guildId: options.guildId ?? "global", count: body.length }, "[cmdsync] commands deployed");
  return body.length;
}
