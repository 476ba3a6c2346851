/**
 * Ghostline — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite slash commands.
 * WHY: Guild-scoped deploys show up instantly; global ones take up to an hour.
 * FLOWS: build commands → REST PUT (GUILD_ID set: that guild, else global) → close DB
 * USAGE:
 *   npm run deploy:cmds
 *   npm run deploy:cmds -- --global   # ignore GUILD_ID
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { deployCommands } from "../src/commands/sync.js";
import { closeDatabase } from "../src/db/db.js";
import { env } from "../src/lib/env.js";
import { logger } from "../src/lib/logger.js";

const forceGlobal = process.argv.includes("--global");
const guildId = forceGlobal ? undefined : env.GUILD_ID;

deployCommands({ guildId })
  .then((count) => {
    console.log(`[deploy] ${count} commands registered ${guildId ? `in guild ${guildId}` : "globally"}`);
  })
  .catch((err: unknown) => {
    logger.error({ err }, "[deploy] command deployment failed");
    process.exitCode = 1;
  })
  .finally(() => {
    closeDatabase();
  });
