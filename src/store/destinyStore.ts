/**
 * Ghostline — src/store/destinyStore.ts
 * WHAT: Discord user ↔ Bungie account links.
 * WHY: Lookup commands resolve "@member" to a Destiny membership without asking for a name again.
 * FLOWS:
 *  - linkAccount(input) → validate code → ownership check → upsert on ctx_id
 *    A verified (OAuth2) link displaces an unverified link of the same membership held by someone else.
 *  - unlinkAccount(ctxId) → boolean
 *  - getLinkedAccount(ctxId) → LinkedAccount | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { classifyError, isConstraintViolation } from "../lib/errors.js";
import { isMembershipTypeName, type MembershipTypeName } from "../features/destiny/enums.js";

export interface DestinyRow {
  ctx_id: string;
  membership_id: string;
  name: string;
  code: number;
  membership_type: string;
  verified: number;
}

export interface LinkedAccount {
  ctxId: string;
  membershipId: string;
  name: string;
  code: number;
  membershipType: MembershipTypeName;
  /** Linked through OAuth2, so the user proved they own the membership */
  verified: boolean;
}

export type LinkInput = Omit<LinkedAccount, "verified"> & { verified?: boolean };

export type DestinyLinkErrorCode = "INVALID_CODE" | "MEMBERSHIP_TAKEN";

export class DestinyLinkError extends Error {
  constructor(
    public readonly code: DestinyLinkErrorCode,
    message: string
  ) {
    super(message);
    this.name = "DestinyLinkError";
  }
}

const COLUMNS = `ctx_id, membership_id, name, code, membership_type, verified`;

const getByCtxStmt = db.prepare<[string], DestinyRow>(`SELECT ${COLUMNS} FROM destiny WHERE ctx_id = ?`);

const getByMembershipStmt = db.prepare<[string], DestinyRow>(`SELECT ${COLUMNS} FROM destiny WHERE membership_id = ?`);

const upsertStmt = db.prepare<[string, string, string, number, string, number]>(
  `INSERT INTO destiny (ctx_id, membership_id, name, code, membership_type, verified)
   VALUES (?, ?, ?, ?, ?, ?)
   ON CONFLICT(ctx_id) DO UPDATE SET
     membership_id = excluded.membership_id,
     name = excluded.name,
     code = excluded.code,
     membership_type = excluded.membership_type,
     verified = excluded.verified`
);

const deleteStmt = db.prepare<[string]>(`DELETE FROM destiny WHERE ctx_id = ?`);

function toAccount(row: DestinyRow): LinkedAccount {
  // Rows written by hand with an unknown platform read back as "Bungie"
  const membershipType = isMembershipTypeName(row.membership_type) ? row.membership_type : "Bungie";
  return {
    ctxId: row.ctx_id,
    membershipId: row.membership_id,
    name: row.name,
    code: row.code,
    membershipType,
    verified: row.verified === 1,
  };
}

function membershipTakenError(membershipId: string): DestinyLinkError {
  return new DestinyLinkError(
    "MEMBERSHIP_TAKEN",
    `Membership ${membershipId} is already linked to another Discord account.`
  );
}

/**
 * Links (or re-links) a Discord user to a Bungie membership.
 *
 * @throws DestinyLinkError INVALID_CODE when code <= 1
 * @throws DestinyLinkError MEMBERSHIP_TAKEN when another user owns the membership, unless
 *   this link is verified and theirs is not
 */
export function linkAccount(input: LinkInput): LinkedAccount {
  if (!Number.isInteger(input.code) || input.code <= 1) {
    throw new DestinyLinkError("INVALID_CODE", `Bungie name code must be greater than 1, got ${input.code}.`);
  }
  const account: LinkedAccount = { ...input, verified: input.verified ?? false };

  const run = db.transaction((next: LinkedAccount): string | null => {
    const owner = getByMembershipStmt.get(next.membershipId);
    let displaced: string | null = null;
    if (owner && owner.ctx_id !== next.ctxId) {
      if (!next.verified || owner.verified === 1) {
        throw membershipTakenError(next.membershipId);
      }
      deleteStmt.run(owner.ctx_id);
      displaced = owner.ctx_id;
    }
    upsertStmt.run(next.ctxId, next.membershipId, next.name, next.code, next.membershipType, next.verified ? 1 : 0);
    return displaced;
  });

  try {
    const displaced = run(account);
    if (displaced) {
      logger.warn(
        { ctxId: account.ctxId, displacedCtxId: displaced, membershipId: account.membershipId },
        "[destinyStore] Verified link replaced an unverified claim"
      );
    }
    logger.info(
      {
        ctxId: account.ctxId,
        membershipId: account.membershipId,
        membershipType: account.membershipType,
        verified: account.verified,
      },
      "[destinyStore] Account linked"
    );
    return account;
  } catch (err) {
    if (err instanceof DestinyLinkError) throw err;
    if (isConstraintViolation(classifyError(err))) {
      // Lost a race against another link of the same membership
      throw membershipTakenError(input.membershipId);
    }
    logger.error({ err, ctxId: input.ctxId }, "[destinyStore] Failed to link account");
    throw err;
  }
}

export function unlinkAccount(ctxId: string): boolean {
  try {
    const result = deleteStmt.run(ctxId);
    if (result.changes > 0) {
      logger.info({ ctxId }, "[destinyStore] Account unlinked");
    }
    return result.changes > 0;
  } catch (err) {
    logger.error({ err, ctxId }, "[destinyStore] Failed to unlink account");
    throw err;
  }
}

export function getLinkedAccount(ctxId: string): LinkedAccount | null {
  try {
    const row = getByCtxStmt.get(ctxId);
    return row ? toAccount(row) : null;
  } catch (err) {
    logger.error({ err, ctxId }, "[destinyStore] Failed to get linked account");
    throw err;
  }
}
