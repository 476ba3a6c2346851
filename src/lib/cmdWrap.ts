/**
 * Ghostline — src/lib/cmdWrap.ts
 * WHAT: The lifecycle every slash command, button and modal handler runs inside.
 * FLOWS:
 *  - wrapCommand(name, fn): start log → fn(ctx) with ctx.step(phase) marks → ok log, or error log + Sentry + error card
 *  - ensureDeferred(): deferReply once (ephemeral unless asked otherwise)
 *  - replyOrEdit(): reply, editReply or followUp depending on what has already been sent
 * Discord allows 3 seconds before the first response; anything that calls Bungie defers first.
 * DOCS:
 *  - https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  DiscordAPIError,
  MessageFlags,
  RESTJSONErrorCodes,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
  type ModalSubmitInteraction,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { buildErrorCard, type ErrorCardDetails, type ErrorSummary } from "./errorCard.js";

export type InstrumentedInteraction = ChatInputCommandInteraction | ModalSubmitInteraction | ButtonInteraction;

export interface CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> {
  interaction: I;
  /** Marks where the handler is ("validate", "bungie_fetch", "db_write"). Error logs carry the last mark. */
  step: (phase: string) => void;
  currentPhase: () => string;
  readonly traceId: string;
}

type Handler<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function kindOf(interaction: InstrumentedInteraction): ErrorCardDetails["kind"] {
  if (interaction.isChatInputCommand()) return "slash";
  return interaction.isModalSubmit() ? "modal" : "button";
}

function codeOf(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

function summarize(error: unknown): ErrorSummary & { stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, code: codeOf(error), message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/** Method, route and a trimmed body for a failed Discord REST call. Attachments are counted, not dumped. */
function restDetails(err: unknown): Record<string, unknown> {
  if (!(err instanceof DiscordAPIError)) return {};
  const { json, files } = err.requestBody;
  const body = json !== undefined ? redact(JSON.stringify(json)).slice(0, 120) : files?.length ? `[files:${files.length}]` : undefined;
  return { status: err.status, method: err.method, url: err.url, body };
}

async function postErrorCard(interaction: InstrumentedInteraction, details: ErrorCardDetails): Promise<void> {
  try {
    await replyOrEdit(interaction, { embeds: [buildErrorCard(details)] });
  } catch (cardErr) {
    logger.error({ evt: "cmd_error_card_fail", err: cardErr }, "[cmd] could not post error card");
  }
}

/**
 * Returns a handler that never rejects. Failures are logged, reported when
 * shouldReportToSentry agrees, and answered with an ephemeral error card.
 */
export function wrapCommand<I extends InstrumentedInteraction>(
  name: string,
  fn: Handler<I>
): (interaction: I) => Promise<void> {
  return async (interaction: I) => {
    const trace = reqCtx();
    const traceId = trace.traceId ?? newTraceId();
    const cmd = trace.cmd ?? name;
    const kind = kindOf(interaction);
    const startedAt = Date.now();
    let phase = "enter";

    const context: CommandContext<I> = {
      interaction,
      traceId,
      currentPhase: () => phase,
      step: (next) => {
        phase = next;
        logger.debug({ evt: "cmd_step", phase }, `[cmd] ${cmd} → ${phase}`);
        addBreadcrumb({ category: "cmd", message: cmd, data: { phase, traceId }, level: "info" });
      },
    };

    setTag("cmd", cmd);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId,
    });
    logger.info({ evt: "cmd_start", kind, userId: interaction.user.id, guildId: interaction.guildId ?? "dm" }, `[cmd] ${cmd} start`);

    try {
      await fn(context);
      logger.info({ evt: "cmd_ok", ms: Date.now() - startedAt }, `[cmd] ${cmd} ok`);
    } catch (error) {
      const classified = classifyError(error);
      const err = summarize(error);
      logger.error(
        {
          evt: "cmd_error",
          phase,
          customId: "customId" in interaction ? interaction.customId : undefined,
          ...errorContext(classified),
          ...restDetails(error),
          err: error,
        },
        `[cmd] ${cmd} failed: ${classified.message}`
      );
      if (shouldReportToSentry(classified)) {
        captureException(error, { cmd, phase, traceId, ...errorContext(classified) });
      }
      await postErrorCard(interaction, { traceId, cmd, kind, phase, err });
    }
  };
}

/** ctx.step(phase) then fn, so a failure inside fn is attributed to `phase`. */
export async function withStep<T>(
  ctx: CommandContext<InstrumentedInteraction>,
  phase: string,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/** Defers once. An interaction that already expired is logged and left alone; other failures throw. */
export async function ensureDeferred(interaction: InstrumentedInteraction, ephemeral = true): Promise<void> {
  if (interaction.deferred || interaction.replied) return;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
  } catch (err) {
    const fields = { evt: "cmd_defer_fail", code: codeOf(err), ...restDetails(err), err };
    if (codeOf(err) === RESTJSONErrorCodes.UnknownInteraction) {
      logger.warn(fields, "[cmd] defer skipped, interaction expired");
      return;
    }
    logger.warn(fields, "[cmd] defer failed");
    throw err;
  }
}

/**
 * Sends `payload` through whichever call the interaction's state allows. Ephemeral unless
 * `publicReply` is set; an edit keeps whatever visibility the deferral chose.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions,
  options: { publicReply?: boolean } = {}
): Promise<void> {
  const flags = options.publicReply ? payload.flags : (payload.flags ?? MessageFlags.Ephemeral);
  try {
    if (interaction.deferred) {
      const { flags: _ignored, ...edit } = payload;
      await interaction.editReply(edit);
    } else if (interaction.replied) {
      await interaction.followUp({ ...payload, flags });
    } else {
      await interaction.reply({ ...payload, flags });
    }
  } catch (err) {
    const code = codeOf(err);
    const fields = { evt: "cmd_reply_fail", code, ...restDetails(err), err };
    if (code === RESTJSONErrorCodes.UnknownInteraction || code === RESTJSONErrorCodes.InteractionHasAlreadyBeenAcknowledged) {
      logger.warn(fields, "[cmd] reply skipped, interaction expired or already answered");
      return;
    }
    logger.error(fields, "[cmd] reply failed");
    throw err;
  }
}
