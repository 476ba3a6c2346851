/**
 * Ghostline — src/lib/logger.ts
 * WHAT: Shared pino logger. Lines carry the active trace context, OAuth secrets are
 * censored by path, and error-level lines with an Error attached go to Sentry.
 * DOCS:
 *  - pino: https://getpino.io
 *  - pino redaction: https://getpino.io/#/docs/redaction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";
import { ctx } from "./reqctx.js";

// Discord bot token, Bungie bearer header, credentials inside a DSN.
const discordTokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const bearerRe = /(Bearer\s+)[A-Za-z0-9._~+/=-]+/gi;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const massMentionRe = /@(everyone|here)/gi;

const REDACT_MAX = 300;

/**
 * Collapses whitespace, masks secrets and mass mentions, and caps the length.
 * For free text that came from users or from Bungie before it lands in a log or embed.
 */
export function redact(value: string): string {
  if (!value) return "";
  const cleaned = value
    .replace(/\s+/g, " ")
    .trim()
    .replace(discordTokenRe, "[redacted_token]")
    .replace(bearerRe, "$1[redacted]")
    .replace(dsnRe, "$1$2:[redacted]@")
    .replace(massMentionRe, "@redacted");
  return cleaned.length > REDACT_MAX ? `${cleaned.slice(0, REDACT_MAX)}...` : cleaned;
}

function serializeError(e: unknown): Record<string, unknown> {
  if (e instanceof Error) {
    const code = "code" in e ? e.code : undefined;
    const status = "status" in e ? e.status : undefined;
    return { name: e.name, message: e.message, code, status, stack: e.stack };
  }
  if (typeof e === "object" && e !== null) {
    return { ...e };
  }
  return { message: String(e) };
}

function errorIn(arg: unknown): Error | undefined {
  if (arg instanceof Error) return arg;
  if (typeof arg === "object" && arg !== null && "err" in arg && arg.err instanceof Error) return arg.err;
  return undefined;
}

const pretty = Boolean(process.env.VITEST_WORKER_ID) || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);
let sentryLoadFailed = false;

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: undefined,
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
      }
    : undefined,
  redact: {
    paths: ["accessToken", "refreshToken", "tokens.accessToken", "tokens.refreshToken", "headers.authorization"],
    censor: "[redacted]",
  },
  serializers: { err: serializeError },
  mixin() {
    const { traceId, kind, cmd } = ctx();
    return traceId ? { traceId, kind, cmd } : {};
  },
  hooks: {
    logMethod(args, method, level) {
      const err = level >= pino.levels.values.error ? errorIn(args[0]) : undefined;
      if (err) {
        const message = typeof args[1] === "string" ? args[1] : undefined;
        // Lazy: sentry.ts imports this module.
        import("./sentry.js")
          .then(({ captureException, isSentryEnabled }) => {
            if (isSentryEnabled()) captureException(err, { message, level: pino.levels.labels[level] ?? "error" });
          })
          .catch((loadErr: unknown) => {
            if (sentryLoadFailed) return;
            sentryLoadFailed = true;
            console.warn("[logger] Sentry module failed to load:", serializeError(loadErr).message);
          });
      }
      return method.apply(this, args);
    },
  },
});
