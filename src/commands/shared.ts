/**
 * Ghostline — src/commands/shared.ts
 * WHAT: Small guards shared by the guild-only command handlers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, type ChatInputCommandInteraction, type Guild, type GuildMember } from "discord.js";

export const GUILD_ONLY_MESSAGE = "This command can only be used in a server.";

// Unknown Member / Unknown User
const MISSING_MEMBER_CODES = new Set([10007, 10013]);

/**
 * Resolves the interaction's guild, or replies with the guild-only notice and returns null.
 */
export async function requireGuild(interaction: ChatInputCommandInteraction): Promise<Guild | null> {
  if (interaction.inGuild() && interaction.guild) return interaction.guild;
  await interaction.reply({ content: GUILD_ONLY_MESSAGE, flags: MessageFlags.Ephemeral });
  return null;
}

/**
 * @returns null when the user is not (or no longer) a member; other API errors propagate
 */
export async function fetchMemberOrNull(guild: Guild, userId: string): Promise<GuildMember | null> {
  try {
    return await guild.members.fetch(userId);
  } catch (err) {
    if (err && typeof err === "object" && "code" in err && typeof err.code === "number" && MISSING_MEMBER_CODES.has(err.code)) {
      return null;
    }
    throw err;
  }
}
