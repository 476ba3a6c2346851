/**
 * Ghostline — src/lib/reqctx.ts
 * WHAT: Async-local trace context for one interaction, prefix message or scheduler tick.
 * The logger mixes these fields into every line written while a context is active.
 * DOCS:
 *  - AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

export type TraceKind = "slash" | "button" | "modal" | "prefix" | "scheduler";

export interface ReqContext {
  traceId: string;
  kind?: TraceKind;
  /** Command name, component customId or scheduler job name. */
  cmd?: string;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
}

const storage = new AsyncLocalStorage<ReqContext>();

/** First 12 hex chars of a v4 UUID; enough to grep one request out of the logs. */
export function newTraceId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12);
}

/**
 * Runs fn with `meta` layered over the enclosing context, if any.
 * A fresh trace ID is minted only when neither supplies one.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const merged: ReqContext = { ...parent, ...stripUndefined(meta), traceId: meta.traceId ?? parent?.traceId ?? newTraceId() };
  return storage.run(merged, fn);
}

export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}

function stripUndefined(meta: Partial<ReqContext>): Partial<ReqContext> {
  const out: Partial<ReqContext> = {};
  if (meta.kind !== undefined) out.kind = meta.kind;
  if (meta.cmd !== undefined) out.cmd = meta.cmd;
  if (meta.userId !== undefined) out.userId = meta.userId;
  if (meta.guildId !== undefined) out.guildId = meta.guildId;
  if (meta.channelId !== undefined) out.channelId = meta.channelId;
  return out;
}
