/**
 * Ghostline — src/lib/time.ts
 * WHAT: Epoch helpers and mute-duration parsing/formatting.
 * WHY: SQLite columns store Unix seconds; explicit timestamps keep tests deterministic.
 * FLOWS:
 *  - nowUtc() → current Unix seconds
 *  - parseDuration("2h") → 7200
 *  - formatDuration(7200) → "2h"
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Floor so a fresh timestamp never reads as "in the future".
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
  w: 7 * 24 * 60 * 60,
};

const UNIT_ALIASES: Record<string, string> = {
  s: "s", sec: "s", secs: "s", second: "s", seconds: "s",
  m: "m", min: "m", mins: "m", minute: "m", minutes: "m",
  h: "h", hr: "h", hrs: "h", hour: "h", hours: "h",
  d: "d", day: "d", days: "d",
  w: "w", wk: "w", wks: "w", week: "w", weeks: "w",
};

// Discord caps member timeouts at 28 days; mutes follow the same ceiling.
export const MAX_MUTE_SECONDS = 28 * 24 * 60 * 60;

/**
 * Parses "90s", "10m", "2h", "1d", "1w", "1h30m" or "2 hours" into seconds.
 * @returns seconds, or null for anything unparseable, zero, or above MAX_MUTE_SECONDS
 */
export function parseDuration(input: string): number | null {
  const normalized = input.trim().toLowerCase();
  if (normalized.length === 0) return null;

  const partRe = /(\d+)\s*([a-z]+)\s*/y;
  let total = 0;
  let pos = 0;
  while (pos < normalized.length) {
    partRe.lastIndex = pos;
    const match = partRe.exec(normalized);
    if (!match) return null;
    const unit = UNIT_ALIASES[match[2]];
    if (!unit) return null;
    total += parseInt(match[1], 10) * UNIT_SECONDS[unit];
    pos = partRe.lastIndex;
  }

  if (total <= 0 || total > MAX_MUTE_SECONDS) return null;
  return total;
}

/**
 * Compact duration: 7200 → "2h", 5400 → "1h 30m", 694800 → "1w 1d 1h".
 */
export function formatDuration(totalSeconds: number): string {
  if (totalSeconds <= 0) return "0s";
  const parts: string[] = [];
  let rest = totalSeconds;
  for (const unit of ["w", "d", "h", "m", "s"]) {
    const size = UNIT_SECONDS[unit];
    const count = Math.floor(rest / size);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      rest -= count * size;
    }
  }
  return parts.join(" ");
}

/** Discord timestamp markup, e.g. `<t:1700000000:R>`. */
export function toDiscordTimestamp(epochSec: number, style: "R" | "f" | "F" | "d" = "R"): string {
  return `<t:${epochSec}:${style}>`;
}
