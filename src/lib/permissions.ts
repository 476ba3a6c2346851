/**
 * Ghostline — src/lib/permissions.ts
 * WHAT: Runtime permission gate for moderation commands.
 * WHY: setDefaultMemberPermissions is only a UI hint; guild admins can override it
 *      in Integrations settings, so handlers check again.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, type ChatInputCommandInteraction } from "discord.js";
import { isOwner } from "./owner.js";

/**
 * @returns true when the caller has `flag` (or is a bot owner); otherwise replies and returns false
 */
export async function requirePermission(
  interaction: ChatInputCommandInteraction,
  flag: bigint,
  label: string
): Promise<boolean> {
  if (isOwner(interaction.user.id)) return true;
  if (interaction.memberPermissions?.has(flag)) return true;

  await interaction.reply({
    content: `❌ You need the **${label}** permission to use this.`,
    flags: MessageFlags.Ephemeral,
  });
  return false;
}

export function hasPermission(interaction: ChatInputCommandInteraction, flag: bigint): boolean {
  return isOwner(interaction.user.id) || !!interaction.memberPermissions?.has(flag);
}
