import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import { createApiClient, createTrackerClient } from "./apiClient.js";
import { getEnv, getSettings } from "./config.js";
import { errorMessage } from "./errors.js";
import type { OnboardingDeps } from "./flows/onboarding.js";
import { reconcile, type ReconcileDeps } from "./flows/reconcile.js";
import { registerCommandHandlers, syncCommands } from "./handlers/commands.js";
import { registerMemberHandlers } from "./handlers/members.js";
import { registerMessageHandlers } from "./handlers/messages.js";
import { logger } from "./logger.js";
import { createDiscordPlatform } from "./platform.js";
import { createOnboardingStore } from "./state.js";
import { createReminderTicker, startSweeps } from "./sweeps.js";

export async function startBot() {
  const E = getEnv();
  const settings = getSettings();
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
    partials: [Partials.GuildMember]
  });

  const tracker = createTrackerClient(createApiClient(E.API_BASE_URL, { token: E.API_TOKEN }));
  const platform = createDiscordPlatform(client, {
    guildId: E.GUILD_ID,
    trackingCategoryName: settings.trackingCategoryName,
    adminCategoryName: settings.adminCategoryName,
    adminChannelName: settings.adminChannelName,
    adminRoleName: settings.adminRoleName
  });
  const sessions = createOnboardingStore({ ttlMs: settings.onboardingTtlMinutes * 60 * 1000 });

  const onboarding: OnboardingDeps = { platform, tracker, sessions, settings, logger };
  const reconcileDeps: ReconcileDeps = {
    platform,
    tracker,
    trackingRoleName: settings.trackingRoleName,
    adminRoleName: settings.adminRoleName,
    logger
  };

  registerMessageHandlers({ client, deps: onboarding, trackingCategoryName: settings.trackingCategoryName });
  registerMemberHandlers({ client, onboarding, reconcile: reconcileDeps, trackingRoleName: settings.trackingRoleName });
  registerCommandHandlers({ client, deps: { onboarding, reconcile: reconcileDeps }, adminRoleName: settings.adminRoleName });

  if (!E.API_TOKEN) logger.warn({ evt: "no_api_token" }, "API_TOKEN is not set; calls go out without x-api-token");

  const sweeps = startSweeps({
    sessions,
    platform,
    logger,
    reminders: createReminderTicker({ tracker, platform, timeZone: settings.timeZone, hour: settings.reminderHour, logger })
  });

  client.once(Events.ClientReady, async (ready) => {
    logger.info({ evt: "ready", user: ready.user.tag, guilds: ready.guilds.cache.size }, "bot connected");
    try {
      const n = await syncCommands(await platform.guild());
      logger.info({ evt: "commands_synced", count: n }, "slash commands registered");
    } catch (e) {
      logger.error({ evt: "commands_sync_failed", err: errorMessage(e) }, "slash command registration failed");
    }
    try {
      await reconcile(reconcileDeps);
    } catch (e) {
      logger.error({ evt: "startup_reconcile_failed", err: errorMessage(e) }, "startup reconcile failed");
    }
  });

  client.on(Events.Error, (e) => logger.error({ evt: "client_error", err: errorMessage(e) }, "discord client error"));

  const shutdown = (signal: string) => {
    logger.info({ evt: "shutdown", signal }, "shutting down");
    sweeps.stop();
    client
      .destroy()
      .catch((e: unknown) => logger.error({ evt: "shutdown_failed", err: errorMessage(e) }, "client destroy failed"))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await client.login(E.DISCORD_TOKEN);
}
