/**
 * Ghostline — src/commands/destiny/index.ts
 * WHAT: Execute router for /destiny.
 * WHY: Routes subcommands and turns expected Bungie/link failures into a ❌ reply;
 *      anything else goes on to wrapCommand's error card.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  type ChatInputCommandInteraction,
  type CommandContext,
  MessageFlags,
  replyOrEdit,
  logger,
  NOT_CONFIGURED_MESSAGE,
} from "./shared.js";
import { BungieApiError, BungieNameError, getBungieClient } from "../../features/destiny/bungieClient.js";
import { DestinyLinkError } from "../../store/destinyStore.js";
import { executeDesync, executeFriends, executeLink, executeProfile, executeSync, executeWhoami } from "./account.js";
import { executeCharacters, executeClan, executeEntity, executeItem, executePost, executeSearch } from "./lookup.js";

export { data } from "./data.js";
export { handleSyncButton, handleSyncModal } from "./account.js";

/**
 * Bungie answers "not found" style lookups with platform errors; those are user-facing,
 * while 5xx and unexpected shapes are ours to report.
 */
function userFacingMessage(err: unknown): string | null {
  if (err instanceof BungieNameError || err instanceof DestinyLinkError) return err.message;
  if (err instanceof BungieApiError) {
    if (err.errorStatus === "InvalidResponse" || (err.httpStatus !== undefined && err.httpStatus >= 500)) {
      return null;
    }
    return err.message;
  }
  return null;
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const sub = interaction.options.getSubcommand();

  // These two never call Bungie
  if (sub === "desync") return executeDesync(ctx);
  if (sub === "profile") return executeProfile(ctx);

  const client = getBungieClient();
  if (!client) {
    await interaction.reply({ content: NOT_CONFIGURED_MESSAGE, flags: MessageFlags.Ephemeral });
    return;
  }

  try {
    switch (sub) {
      case "sync":
        return await executeSync(ctx, client);
      case "link":
        return await executeLink(ctx, client);
      case "whoami":
        return await executeWhoami(ctx, client);
      case "characters":
        return await executeCharacters(ctx, client);
      case "search":
        return await executeSearch(ctx, client);
      case "clan":
        return await executeClan(ctx, client);
      case "item":
        return await executeItem(ctx, client);
      case "friends":
        return await executeFriends(ctx, client);
      case "entity":
        return await executeEntity(ctx, client);
      case "post":
        return await executePost(ctx, client);
      default:
        await interaction.reply({ content: `Unknown subcommand: ${sub}`, flags: MessageFlags.Ephemeral });
    }
  } catch (err) {
    const message = userFacingMessage(err);
    if (message === null) throw err;
    logger.info({ sub, userId: interaction.user.id, err }, "[destiny] lookup failed");
    await replyOrEdit(interaction, { content: `❌ ${message}` });
  }
}
