/**
 * Ghostline — src/store/notesStore.ts
 * WHAT: Named text notes. Names are globally unique; only the author edits.
 * FLOWS:
 *  - createNote(input) → Note (NoteError NAME_TAKEN on duplicate name)
 *  - updateNote(name, content, actorId) → "updated" | "not_found" | "not_author"
 *  - deleteNote(name, actorId, { moderatorOf }) → "deleted" | "not_found" | "not_author"
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { classifyError, isConstraintViolation } from "../lib/errors.js";
import { nowUtc } from "../lib/time.js";
import { requireLength, ValidationError } from "../lib/validation.js";

export const NOTE_NAME_MAX = 64;
export const NOTE_CONTENT_MAX = 2000;

export interface NoteRow {
  id: number;
  name: string;
  content: string;
  author_id: string;
  guild_id: string | null;
  created_at: number;
}

export interface Note {
  id: number;
  name: string;
  content: string;
  authorId: string;
  guildId: string | null;
  createdAt: number;
}

export type NoteErrorCode = "NAME_TAKEN" | "INVALID";

export class NoteError extends Error {
  constructor(
    public readonly code: NoteErrorCode,
    message: string
  ) {
    super(message);
    this.name = "NoteError";
  }
}

export type NoteUpdateResult = "updated" | "not_found" | "not_author";
export type NoteDeleteResult = "deleted" | "not_found" | "not_author";

const COLUMNS = `id, name, content, author_id, guild_id, created_at`;

const insertStmt = db.prepare<[string, string, string, string | null, number]>(
  `INSERT INTO notes (name, content, author_id, guild_id, created_at) VALUES (?, ?, ?, ?, ?)`
);
const getByNameStmt = db.prepare<[string], NoteRow>(`SELECT ${COLUMNS} FROM notes WHERE name = ?`);
const listByAuthorStmt = db.prepare<[string], NoteRow>(
  `SELECT ${COLUMNS} FROM notes WHERE author_id = ? ORDER BY created_at ASC, id ASC`
);
const updateContentStmt = db.prepare<[string, number]>(`UPDATE notes SET content = ? WHERE id = ?`);
const deleteByIdStmt = db.prepare<[number]>(`DELETE FROM notes WHERE id = ?`);
const deleteByAuthorStmt = db.prepare<[string]>(`DELETE FROM notes WHERE author_id = ?`);

function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    name: row.name,
    content: row.content,
    authorId: row.author_id,
    guildId: row.guild_id,
    createdAt: row.created_at,
  };
}

function checked<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new NoteError("INVALID", err.message);
    }
    throw err;
  }
}

function normalizeName(name: string): string {
  return checked(() => requireLength(name, "Note name", NOTE_NAME_MAX));
}

function normalizeContent(content: string): string {
  return checked(() => requireLength(content, "Note content", NOTE_CONTENT_MAX));
}

export function createNote(input: {
  name: string;
  content: string;
  authorId: string;
  guildId: string | null;
  createdAt?: number;
}): Note {
  const name = normalizeName(input.name);
  const content = normalizeContent(input.content);
  const createdAt = input.createdAt ?? nowUtc();

  try {
    const result = insertStmt.run(name, content, input.authorId, input.guildId, createdAt);
    logger.info({ name, authorId: input.authorId, guildId: input.guildId }, "[notesStore] Note created");
    return {
      id: Number(result.lastInsertRowid),
      name,
      content,
      authorId: input.authorId,
      guildId: input.guildId,
      createdAt,
    };
  } catch (err) {
    if (isConstraintViolation(classifyError(err))) {
      throw new NoteError("NAME_TAKEN", `A note named ${name} already exists.`);
    }
    logger.error({ err, name, authorId: input.authorId }, "[notesStore] Failed to create note");
    throw err;
  }
}

export function getNote(name: string): Note | null {
  try {
    const row = getByNameStmt.get(name.trim());
    return row ? toNote(row) : null;
  } catch (err) {
    logger.error({ err, name }, "[notesStore] Failed to get note");
    throw err;
  }
}

export function listNotesFor(authorId: string): Note[] {
  try {
    return listByAuthorStmt.all(authorId).map(toNote);
  } catch (err) {
    logger.error({ err, authorId }, "[notesStore] Failed to list notes for author");
    throw err;
  }
}

export function updateNote(name: string, content: string, actorId: string): NoteUpdateResult {
  const nextContent = normalizeContent(content);
  const existing = getNote(name);
  if (!existing) return "not_found";
  if (existing.authorId !== actorId) return "not_author";

  try {
    updateContentStmt.run(nextContent, existing.id);
    logger.info({ name: existing.name, actorId }, "[notesStore] Note updated");
    return "updated";
  } catch (err) {
    logger.error({ err, name, actorId }, "[notesStore] Failed to update note");
    throw err;
  }
}

/**
 * The author can always delete. `moderatorOf` is the guild where the actor holds
 * Manage Messages; it only reaches notes created in that guild.
 */
export function deleteNote(
  name: string,
  actorId: string,
  opts: { moderatorOf?: string | null } = {}
): NoteDeleteResult {
  const existing = getNote(name);
  if (!existing) return "not_found";
  const moderated = !!opts.moderatorOf && existing.guildId === opts.moderatorOf;
  if (existing.authorId !== actorId && !moderated) return "not_author";

  try {
    deleteByIdStmt.run(existing.id);
    logger.info(
      { name: existing.name, actorId, authorId: existing.authorId, moderated },
      "[notesStore] Note deleted"
    );
    return "deleted";
  } catch (err) {
    logger.error({ err, name, actorId }, "[notesStore] Failed to delete note");
    throw err;
  }
}

/** @returns number of notes removed */
export function deleteAllNotesFor(authorId: string): number {
  try {
    return deleteByAuthorStmt.run(authorId).changes;
  } catch (err) {
    logger.error({ err, authorId }, "[notesStore] Failed to delete notes for author");
    throw err;
  }
}
