/**
 * Ghostline — src/commands/destiny/data.ts
 * WHAT: Slash command definition for /destiny.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder } from "discord.js";
import { ENTITY_DEFINITIONS } from "../../features/destiny/enums.js";

// DestinyInventoryItemDefinition hashes are uint32
const MAX_ITEM_HASH = 4_294_967_295;

export const data = new SlashCommandBuilder()
  .setName("destiny")
  .setDescription("Destiny 2 account linking and lookups.")
  .addSubcommand((sc) => sc.setName("sync").setDescription("Sync your Bungie account through Bungie.net login"))
  .addSubcommand((sc) =>
    sc
      .setName("link")
      .setDescription("Link a Destiny 2 account by its Bungie name")
      .addStringOption((o) =>
        o.setName("player").setDescription("Full Bungie name, e.g. Fate#0123").setRequired(true).setMaxLength(32)
      )
  )
  .addSubcommand((sc) => sc.setName("desync").setDescription("Remove your linked account and stored authorization"))
  .addSubcommand((sc) =>
    sc
      .setName("profile")
      .setDescription("Show the account a member linked")
      .addUserOption((o) => o.setName("member").setDescription("Defaults to you"))
  )
  .addSubcommand((sc) => sc.setName("whoami").setDescription("Show your authorized Bungie.net profile"))
  .addSubcommand((sc) =>
    sc
      .setName("characters")
      .setDescription("A player's characters")
      .addStringOption((o) => o.setName("player").setDescription("Bungie name, e.g. Fate#0123").setMaxLength(32))
      .addUserOption((o) => o.setName("member").setDescription("A linked member (defaults to you)"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("search")
      .setDescription("Search players by Bungie name")
      .addStringOption((o) => o.setName("name").setDescription("Name or name prefix").setRequired(true).setMaxLength(32))
  )
  .addSubcommand((sc) =>
    sc
      .setName("clan")
      .setDescription("Look up a clan")
      .addStringOption((o) => o.setName("name").setDescription("Clan name (defaults to the home clan)").setMaxLength(64))
  )
  .addSubcommand((sc) =>
    sc
      .setName("item")
      .setDescription("Inventory item definition by hash")
      .addIntegerOption((o) =>
        o.setName("hash").setDescription("Item hash").setRequired(true).setMinValue(0).setMaxValue(MAX_ITEM_HASH)
      )
  )
  .addSubcommand((sc) => sc.setName("friends").setDescription("Your Bungie.net friends and friend requests"))
  .addSubcommand((sc) =>
    sc
      .setName("entity")
      .setDescription("Search the Armory for a named definition")
      .addStringOption((o) => o.setName("name").setDescription("Name to search for").setRequired(true).setMaxLength(64))
      .addStringOption((o) =>
        o
          .setName("definition")
          .setDescription("What to search (defaults to items)")
          .addChoices(...ENTITY_DEFINITIONS.map(([value, name]) => ({ name, value })))
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("post")
      .setDescription("Post-game report for an activity")
      .addStringOption((o) =>
        o.setName("instance").setDescription("Activity instance id").setRequired(true).setMaxLength(20)
      )
  );
