/**
 * Ghostline — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → trim raw values → validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so values set by tests/setup.ts win over a local .env
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Every variable gets trimmed; copy-pasted .env lines often carry stray whitespace.
 */
export function readRawEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    DISCORD_TOKEN: source.DISCORD_TOKEN?.trim(),
    CLIENT_ID: source.CLIENT_ID?.trim(),
    GUILD_ID: source.GUILD_ID?.trim(),
    NODE_ENV: source.NODE_ENV?.trim(),
    DB_PATH: source.DB_PATH?.trim(),
    LOG_LEVEL: source.LOG_LEVEL?.trim(),
    SENTRY_DSN: source.SENTRY_DSN?.trim(),
    SENTRY_ENVIRONMENT: source.SENTRY_ENVIRONMENT?.trim(),
    SENTRY_TRACES_SAMPLE_RATE: source.SENTRY_TRACES_SAMPLE_RATE?.trim(),
    OWNER_IDS: source.OWNER_IDS?.trim(),
    BOT_PREFIX: source.BOT_PREFIX?.trim(),

    // Bungie.net application (optional - /destiny is disabled without it)
    BUNGIE_API_KEY: source.BUNGIE_API_KEY?.trim(),
    BUNGIE_CLIENT_ID: source.BUNGIE_CLIENT_ID?.trim(),
    BUNGIE_CLIENT_SECRET: source.BUNGIE_CLIENT_SECRET?.trim(),
    BUNGIE_DEFAULT_CLAN_ID: source.BUNGIE_DEFAULT_CLAN_ID?.trim(),

    MUTE_SWEEP_INTERVAL_MS: source.MUTE_SWEEP_INTERVAL_MS?.trim(),
  };
}

// Empty strings from `FOO=` lines count as unset.
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.length > 0 ? v : undefined));

export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: optionalString, // Only needed for guild-scoped command deployment
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),
  LOG_LEVEL: optionalString,

  SENTRY_DSN: optionalString,
  SENTRY_ENVIRONMENT: optionalString,
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  OWNER_IDS: optionalString,

  // Discord prefixes are capped at 5 characters everywhere else, so the default is too.
  BOT_PREFIX: z.string().min(1).max(5).default("?"),

  BUNGIE_API_KEY: optionalString,
  BUNGIE_CLIENT_ID: optionalString,
  BUNGIE_CLIENT_SECRET: optionalString,
  BUNGIE_DEFAULT_CLAN_ID: z.string().regex(/^\d+$/, "BUNGIE_DEFAULT_CLAN_ID must be numeric").default("4389205"),

  MUTE_SWEEP_INTERVAL_MS: z.coerce.number().int().min(5_000).default(60_000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Formats zod issues one per line so a broken deploy shows every problem at once.
 */
export function formatEnvIssues(error: z.ZodError): string {
  return error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
}

const parsed = envSchema.safeParse(readRawEnv());
if (!parsed.success) {
  console.error(`Environment validation failed:\n${formatEnvIssues(parsed.error)}`);
  process.exit(1);
}
export const env: Env = parsed.data;

/** True when every Bungie credential needed for lookups and OAuth2 is present. */
export function isBungieConfigured(source: Env = env): boolean {
  return !!(source.BUNGIE_API_KEY && source.BUNGIE_CLIENT_ID && source.BUNGIE_CLIENT_SECRET);
}
