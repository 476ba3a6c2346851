/**
 * Ghostline — src/lib/sentry.ts
 * WHAT: Sentry setup plus thin helpers that do nothing until a valid DSN has been loaded.
 * Events are scrubbed of Discord tokens, Bungie bearer tokens and OAuth codes before they leave.
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import type { ErrorEvent } from "@sentry/node";
import { env } from "./env.js";
import { logger, redact } from "./logger.js";

let enabled = false;

/** `https://<key>@<host>/<project>`; anything else leaves Sentry off. */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn || !URL.canParse(dsn)) return false;
  const { protocol, username, pathname } = new URL(dsn);
  return (protocol === "https:" || protocol === "http:") && username.length > 0 && pathname.length > 1;
}

const oauthParamRe = /([?&](?:code|state)=)[^&\s]+/g;

/** Masks OAuth query params in a URL or message. */
export function scrubOAuthParams(text: string): string {
  return text.replace(oauthParamRe, "$1[redacted]");
}

/** Applied to every outgoing event. Mutates and returns the event. */
export function scrubEvent(event: ErrorEvent): ErrorEvent {
  if (event.message) event.message = redact(scrubOAuthParams(event.message));
  if (event.request?.url) event.request.url = scrubOAuthParams(event.request.url);
  for (const crumb of event.breadcrumbs ?? []) {
    if (typeof crumb.data?.url === "string") crumb.data.url = scrubOAuthParams(crumb.data.url);
    if (crumb.message) crumb.message = scrubOAuthParams(crumb.message);
  }
  return event;
}

export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("[sentry] no valid SENTRY_DSN, error tracking off");
    return;
  }

  const environment = env.SENTRY_ENVIRONMENT || env.NODE_ENV;
  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment,
      release: `ghostline@${process.env.npm_package_version ?? "unknown"}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
      integrations: [Sentry.onUnhandledRejectionIntegration({ mode: "warn" })],
      beforeSend: scrubEvent,
      // Expired interactions and socket resets are logged locally with more context.
      ignoreErrors: ["Unknown interaction", "AbortError", "ECONNRESET", "ETIMEDOUT"],
    });
    enabled = true;
    logger.info({ environment }, "[sentry] initialized");
  } catch (err) {
    enabled = false;
    logger.error({ err }, "[sentry] init failed");
  }
}

export function isSentryEnabled(): boolean {
  return enabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!enabled) return null;
  return Sentry.captureException(error, context ? { contexts: { custom: context } } : undefined);
}

export function addBreadcrumb(breadcrumb: Sentry.Breadcrumb): void {
  if (enabled) Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (enabled) Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (enabled) Sentry.setContext(name, context);
}

/** Drains queued events before shutdown. Resolves true when there was nothing to send. */
export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!enabled) return true;
  try {
    return await Sentry.close(timeoutMs);
  } catch (err) {
    logger.error({ err }, "[sentry] flush failed");
    return false;
  }
}
