/**
 * Ghostline — src/lib/errors.ts
 * WHAT: Sorts anything a handler can throw into a tagged union, then answers the
 * questions the wrappers ask of it: retry it, report it, and what to tell the user.
 * USAGE:
 *  const classified = classifyError(err);
 *  if (isConstraintViolation(classified)) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { RESTJSONErrorCodes } from "discord.js";

interface Classified<K extends string> {
  kind: K;
  message: string;
  cause?: Error;
}

/** SQLite failure; `code` is the extended result code, e.g. SQLITE_CONSTRAINT_UNIQUE. */
export interface DbError extends Classified<"db_error"> {
  code: string;
  table?: string;
}

export interface DiscordApiError extends Classified<"discord_api"> {
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** A non-Success ErrorCode from Bungie.net, or an HTTP failure talking to it. */
export interface BungiePlatformError extends Classified<"bungie_api"> {
  code: number;
  status: string;
  httpStatus?: number;
}

export interface InputError extends Classified<"validation"> {
  field: string;
}

/** Missing Permissions / Missing Access from Discord, without a known permission name. */
export interface PermissionError extends Classified<"permission"> {
  needed: string[];
}

/** The request never completed: reset, refused, DNS. */
export interface NetworkError extends Classified<"network"> {
  code: string;
  host?: string;
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | BungiePlatformError
  | InputError
  | PermissionError
  | NetworkError
  | Classified<"unknown">;

const NETWORK_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"]);

// Bungie ErrorCodes: SystemDisabled, ThrottleLimitExceededMinutes, PerEndpointRequestThrottleExceeded.
const BUNGIE_TRANSIENT = new Set([5, 36, 51]);

const QUIET_DISCORD_CODES = new Set<number>([
  RESTJSONErrorCodes.UnknownInteraction,
  RESTJSONErrorCodes.InteractionHasAlreadyBeenAcknowledged,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownMember,
  RESTJSONErrorCodes.MissingPermissions,
]);

function field(source: unknown, key: string): unknown {
  return typeof source === "object" && source !== null ? Reflect.get(source, key) : undefined;
}

function text(source: unknown, key: string): string | undefined {
  const v = field(source, key);
  return typeof v === "string" ? v : undefined;
}

function num(source: unknown, key: string): number | undefined {
  const v = field(source, key);
  return typeof v === "number" ? v : undefined;
}

function tableIn(sql: string | undefined): string | undefined {
  return sql?.match(/(?:FROM|INTO|UPDATE|JOIN)\s+(\w+)/i)?.[1];
}

/**
 * Matches by `name` and `code` rather than instanceof so errors from any copy of
 * a library still classify. Checked in order: SQLite, Discord, Bungie, input,
 * network, bare Discord permission codes.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const message = text(err, "message") ?? String(err);
  const name = text(err, "name");
  const code = field(err, "code");
  const cause = err instanceof Error ? err : undefined;

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      table: tableIn(text(err, "sql")),
      message,
      cause,
    };
  }

  if (typeof code === "number" && name?.includes("Discord")) {
    return {
      kind: "discord_api",
      code,
      httpStatus: num(err, "status") ?? num(err, "httpStatus"),
      method: text(err, "method"),
      path: text(err, "url") ?? text(err, "path"),
      message,
      cause,
    };
  }

  if (name === "BungieApiError") {
    return {
      kind: "bungie_api",
      code: num(err, "errorCode") ?? 0,
      status: text(err, "errorStatus") ?? "Unknown",
      httpStatus: num(err, "httpStatus"),
      message,
      cause,
    };
  }

  if (name === "ValidationError") {
    return { kind: "validation", field: text(err, "field") ?? "input", message, cause };
  }

  // fetch() reports socket failures as TypeError("fetch failed") with the system error as cause.
  const netCode = typeof code === "string" ? code : text(field(err, "cause"), "code");
  if (netCode && NETWORK_CODES.has(netCode)) {
    return { kind: "network", code: netCode, host: text(err, "hostname"), message, cause };
  }

  if (code === RESTJSONErrorCodes.MissingPermissions) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === RESTJSONErrorCodes.MissingAccess) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  return { kind: "unknown", message, cause };
}

/** Worth another attempt later. discord.js retries 429s on its own. */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;
    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";
    case "discord_api":
      return (err.httpStatus ?? 0) >= 500;
    case "bungie_api":
      return BUNGIE_TRANSIENT.has(err.code) || (err.httpStatus ?? 0) >= 500;
    default:
      return false;
  }
}

/** False for expired interactions, bad input, Bungie maintenance and network blips. */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api":
      return !QUIET_DISCORD_CODES.has(err.code);
    case "bungie_api":
      return !isRecoverable(err);
    case "network":
    case "validation":
    case "permission":
      return false;
    default:
      return true;
  }
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === RESTJSONErrorCodes.UnknownInteraction;
}

/** UNIQUE, CHECK, NOT NULL or FK failure. Retrying gives the same result. */
export function isConstraintViolation(err: ClassifiedError): boolean {
  return err.kind === "db_error" && err.code.startsWith("SQLITE_CONSTRAINT");
}

/** Flat fields for a log line or a Sentry context. */
export function errorContext(err: ClassifiedError, extra: Record<string, unknown> = {}): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };
  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, table: err.table };
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "bungie_api":
      return { ...base, bungieCode: err.code, bungieStatus: err.status, httpStatus: err.httpStatus };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed };
    default:
      return base;
  }
}

/** Chat-safe sentence. Never includes SQL or stack traces. */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (err.code === "SQLITE_BUSY") return "Database is temporarily busy. Please try again.";
      return isConstraintViolation(err) ? "This operation conflicts with existing data." : "A database error occurred.";
    case "discord_api":
      if (err.code === RESTJSONErrorCodes.UnknownInteraction) {
        return "This interaction has expired. Please try the command again.";
      }
      return "Discord API error occurred.";
    case "bungie_api":
      return err.code === 5 ? "Bungie.net is down for maintenance. Try again later." : `Bungie.net error: ${err.message}`;
    case "network":
      return "Network error. Please try again.";
    case "permission":
      return `Missing permissions: ${err.needed.join(", ")}`;
    case "validation":
      return `Invalid ${err.field}: ${err.message}`;
    default:
      return "An unexpected error occurred.";
  }
}
