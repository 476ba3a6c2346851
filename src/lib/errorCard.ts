/**
 * Ghostline — src/lib/errorCard.ts
 * WHAT: The ephemeral "Command failed" embed: a one-line hint, where it failed, and a trace ID
 * the user can hand to staff. Posting is cmdWrap's job.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Colors, EmbedBuilder, RESTJSONErrorCodes } from "discord.js";
import { redact } from "./logger.js";
import { classifyError, userFriendlyMessage } from "./errors.js";

export interface ErrorSummary {
  name?: string;
  code?: unknown;
  message?: string;
}

export interface ErrorCardDetails {
  traceId: string;
  cmd: string;
  kind: "slash" | "button" | "modal";
  phase: string;
  err: ErrorSummary;
}

const ERROR_FIELD_MAX = 200;

const CODE_HINTS = new Map<unknown, string>([
  [RESTJSONErrorCodes.UnknownInteraction, "Interaction expired; handler didn't defer in time."],
  [RESTJSONErrorCodes.InteractionHasAlreadyBeenAcknowledged, "Already acknowledged; avoid double reply."],
  [RESTJSONErrorCodes.MissingPermissions, "Missing Discord permission in this channel. Check the bot's role position."],
  [RESTJSONErrorCodes.MissingAccess, "Bot lacks access to this resource. Check channel visibility and role permissions."],
]);

export function hintFor(err: ErrorSummary): string {
  const message = err.message ?? "";
  if (err.name === "SqliteError" && /no such table/i.test(message)) {
    return "Database schema is missing; run `npm run db:init`.";
  }
  const byCode = CODE_HINTS.get(err.code);
  if (byCode) return byCode;
  if (err.name === "AbortError" || err.name === "TimeoutError") {
    return "An upstream service took too long to answer. Try again in a moment.";
  }

  const classified = classifyError({ name: err.name, code: err.code, message });
  return classified.kind === "unknown" ? "Unexpected error. Try again or contact staff." : userFriendlyMessage(classified);
}

function commandLabel({ kind, cmd }: ErrorCardDetails): string {
  return kind === "slash" ? `/${cmd}` : `${kind}: ${cmd}`;
}

function errorField(message: string | undefined): string {
  if (!message) return "No message provided";
  const safe = redact(message);
  return safe.length <= ERROR_FIELD_MAX ? safe : `${safe.slice(0, ERROR_FIELD_MAX)}...`;
}

export function buildErrorCard(details: ErrorCardDetails): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Command failed")
    .setColor(Colors.Red)
    .setDescription(hintFor(details.err))
    .addFields(
      { name: "Command", value: commandLabel(details), inline: true },
      { name: "Phase", value: details.phase, inline: true },
      { name: "Error", value: errorField(details.err.message) }
    )
    .setFooter({ text: `Trace: ${details.traceId}` });
}
