/**
 * Ghostline — src/lib/owner.ts
 * WHAT: Owner override for moderation permission checks.
 * FLOWS: OWNER_IDS (comma-separated) parsed once → isOwner(userId)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env } from "./env.js";

export function parseOwnerIds(raw: string | undefined): string[] {
  return raw
    ? raw
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    : [];
}

// SECURITY: these IDs bypass every moderation permission check. Keep the list short.
const ownerIds = parseOwnerIds(env.OWNER_IDS);

export function isOwner(userId: string): boolean {
  return ownerIds.includes(userId);
}
