import { resolve } from "node:path";
import { createLogger } from "./logger";
import { deliveryWebhookUrl, loadConfig } from "./config";
import { createDatabase, ensureSchema } from "./db";
import { createStateStore } from "./pipeline/state-store";
import { createPlexFetcher } from "./pipeline/fetcher";
import { createDiscordSink } from "./pipeline/discord";
import { createDispatcher } from "./pipeline/dispatcher";
import { formatNotification } from "./pipeline/formatter";
import type { Item } from "./pipeline/types";
import { createHeartbeat } from "./heartbeat";
import { createAnnounceScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/media-herald.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("media-herald starting");

  let config;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      libraries: config.plex.libraries.map((library) => library.name),
      schedule: config.schedule.poll,
      testingMode: config.discord.testing.enabled,
    },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));
  ensureSchema(db);
  logger.info("database schema ensured");

  const store = createStateStore(db);

  const fetcher = createPlexFetcher(
    {
      url: config.plex.url,
      token: config.plex.token,
      libraries: config.plex.libraries,
      lookback: config.plex.lookback,
      requestTimeoutMs: config.plex.requestTimeoutMs,
      maxConcurrency: config.plex.maxConcurrency,
    },
    logger,
  );

  const sink = createDiscordSink(
    {
      webhookUrl: deliveryWebhookUrl(config.discord),
      username: config.discord.username,
      avatarUrl: config.discord.avatarUrl,
      requestTimeoutMs: config.dispatch.requestTimeoutMs,
    },
    logger,
  );

  const dispatcher = createDispatcher(sink, config.dispatch, logger);

  const embed = config.discord.embed;
  const format = (item: Item) =>
    formatNotification(item, {
      colours: embed.colours,
      emotes: embed.emotes,
      overflowFooter: embed.overflowFooter,
      thumbnail: embed.thumbnail,
      artworkBaseUrl: embed.artworkBaseUrl,
      serverId: config.plex.serverId,
    });

  const heartbeatUrl = config.monitoring.heartbeatUrl;

  const scheduler = createAnnounceScheduler({
    db,
    config,
    store,
    fetcher,
    dispatcher,
    format,
    logger,
    heartbeat: heartbeatUrl ? createHeartbeat(heartbeatUrl, logger) : undefined,
    onFatal: () => {
      closeDb();
      process.exit(1);
    },
  });
  logger.info({ schedule: config.schedule.poll }, "announce scheduler started");

  const app = createApiServer({ db, store, config, logger });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers: [scheduler],
    closeServer: () => server.close(),
    closeDb,
    logger,
  });

  if (config.schedule.runOnStart) {
    await scheduler.trigger();
  }
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
