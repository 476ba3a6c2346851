/**
 * Ghostline — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, routes interactions and prefix messages.
 * WHY: Startup and the hot path routing live in one place.
 * FLOWS:
 *  - Ready: log identity → purge expired kv entries → start mute expiry scheduler
 *  - Interaction: detect kind → run wrapped handler → error card on failure
 *  - Router: customId regexes for buttons/modals (see lib/modalPatterns.ts)
 *  - Shutdown: stop scheduler → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction replies (flags, ephemeral): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, setTag, captureException, flushSentry } from "./lib/sentry.js";
initializeSentry();

import {
  Client,
  GatewayIntentBits,
  Partials,
  MessageFlags,
  Options,
  Events,
  type ButtonInteraction,
  type Interaction,
  type Message,
  type ModalSubmitInteraction,
} from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // discord.js recovers from most rejections; keep running
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry a moment to flush, then exit
  setTimeout(() => process.exit(1), 1000);
});

import { wrapEvent } from "./lib/eventWrap.js";
import { wrapCommand, type CommandContext } from "./lib/cmdWrap.js";
import { newTraceId, runWithCtx } from "./lib/reqctx.js";
import { identifyComponentRoute } from "./lib/modalPatterns.js";
import { closeDatabase } from "./db/db.js";
import { kvPurgeExpired } from "./store/kvStore.js";
import { buildExecutors } from "./commands/registry.js";
import { handleSyncButton, handleSyncModal } from "./commands/destiny/index.js";
import * as prefixCommands from "./listeners/prefixCommands.js";
import { startMuteExpiryScheduler, stopMuteExpiryScheduler } from "./scheduler/muteExpiryScheduler.js";

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.DirectMessages,
    GatewayIntentBits.MessageContent,
  ],
  partials: [Partials.Channel],
  // See: https://discordjs.guide/popular-topics/caching.html#limiting-cache-size
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 50,
    GuildMemberManager: 500, // role checks on /mute and the expiry sweep
    UserManager: 500,
    PresenceManager: 0,
    ReactionManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
  }),
});

const commands = buildExecutors();

async function routeComponent(interaction: ButtonInteraction | ModalSubmitInteraction): Promise<void> {
  const route = identifyComponentRoute(interaction.customId);
  if (!route) {
    logger.warn({ evt: "unhandled_component", customId: interaction.customId }, "No route for component");
    await interaction.reply({ content: "This button is no longer active.", flags: MessageFlags.Ephemeral });
    return;
  }

  switch (route.type) {
    case "destiny_sync_button":
      if (interaction.isButton()) {
        await wrapCommand("destiny-sync-button", (ctx: CommandContext<ButtonInteraction>) =>
          handleSyncButton(ctx, route.userId)
        )(interaction);
      }
      return;
    case "destiny_sync_modal":
      if (interaction.isModalSubmit()) {
        await wrapCommand("destiny-sync-modal", (ctx: CommandContext<ModalSubmitInteraction>) =>
          handleSyncModal(ctx, route.userId)
        )(interaction);
      }
      return;
  }
}

export async function routeInteraction(interaction: Interaction): Promise<void> {
  const kind = interaction.isChatInputCommand()
    ? "slash"
    : interaction.isButton()
      ? "button"
      : interaction.isModalSubmit()
        ? "modal"
        : "other";
  if (kind === "other") return;

  const cmdId = interaction.isChatInputCommand()
    ? interaction.commandName
    : interaction.isButton() || interaction.isModalSubmit()
      ? interaction.customId
      : "unknown";

  await runWithCtx(
    {
      traceId: newTraceId(),
      kind,
      cmd: cmdId,
      userId: interaction.user.id,
      guildId: interaction.guildId ?? null,
      channelId: interaction.channelId ?? null,
    },
    async () => {
      if (interaction.isChatInputCommand()) {
        const executor = commands.get(interaction.commandName);
        if (!executor) {
          addBreadcrumb({
            message: `Unknown command attempted: ${interaction.commandName}`,
            category: "command",
            level: "warning",
          });
          // respond within 3s or Discord returns 10062
          await interaction.reply({ content: "Unknown command.", flags: MessageFlags.Ephemeral });
          return;
        }
        await executor(interaction);
        return;
      }

      if (interaction.isButton() || interaction.isModalSubmit()) {
        await routeComponent(interaction);
      }
    }
  );
}

client.once(Events.ClientReady, (ready) => {
  logger.info({ tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size }, "Bot ready");
  setTag("bot_id", ready.user.id);
  addBreadcrumb({ message: "Bot connected to Discord", category: "bot", level: "info" });

  const purged = kvPurgeExpired();
  if (purged > 0) logger.info({ purged }, "[startup] expired kv entries purged");

  startMuteExpiryScheduler(ready);
});

client.on(Events.InteractionCreate, wrapEvent("interactionCreate", routeInteraction));

client.on(
  Events.MessageCreate,
  wrapEvent("messageCreate", (message: Message) =>
    runWithCtx({ traceId: newTraceId(), kind: "prefix" }, () => prefixCommands.execute(message))
  )
);

client.on(Events.Error, (err) => {
  logger.error({ err }, "[client] discord.js client error");
});

// ===== Coordinated Graceful Shutdown =====
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  stopMuteExpiryScheduler();
  client.removeAllListeners();
  await client.destroy();
  closeDatabase();
  await flushSentry();

  logger.info("[shutdown] Graceful shutdown complete");
  process.exit(0);
}

async function main(): Promise<void> {
  if (!env.GUILD_ID) {
    logger.info("[startup] GUILD_ID not set; deploy:cmds will register commands globally");
  }

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      gracefulShutdown(signal).catch((err) => {
        logger.error({ err }, "[shutdown] Error during graceful shutdown");
        process.exit(1);
      });
    });
  }

  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot outside the test runner
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
