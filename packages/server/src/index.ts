import {
  loadConfig,
  configureLogging,
  createLogger,
  ConversationEngine,
  ExportTokenIssuer,
} from "@calendar-bot/core";
import { createConsolePlugin } from "@calendar-bot/channel-console";
import { createServer } from "./server.js";
import { CalendarDatabase } from "./db/database.js";
import { EventStore } from "./events/event-store.js";
import { UserStore } from "./users/user-store.js";
import { StatisticsTracker } from "./stats/statistics.js";
import { SchedulingEngine } from "./scheduling/scheduling-engine.js";
import { ChannelManager, DeliveryGateway } from "./channels/index.js";
import { ChatBotHandler } from "./bot/index.js";

async function main() {
  const config = loadConfig();
  configureLogging(config.logging);
  const log = createLogger("main");
  log.info({ dataDir: config.dataDir }, "Starting calendar bot");

  // Storage
  const database = new CalendarDatabase(config.database.path);
  const statistics = new StatisticsTracker(database, () => new Date(), createLogger("statistics"));
  const events = new EventStore(database);
  const users = new UserStore(database);
  const scheduling = new SchedulingEngine({
    database,
    statistics,
    logger: createLogger("scheduling"),
  });

  // Conversation + export capability
  const engine = new ConversationEngine({
    idleTimeoutMs: config.conversation.idleTimeoutMs,
    logger: createLogger("conversation"),
  });
  const exportTokens = new ExportTokenIssuer({ secret: config.export.secret });

  // Channels
  const channelManager = new ChannelManager({ logger: createLogger("channels") });
  channelManager.registerPlugin("console", (cfg) => createConsolePlugin(cfg));
  const gateway = new DeliveryGateway(channelManager, createLogger("delivery"));

  const chatHandler = new ChatBotHandler({
    engine,
    events,
    users,
    scheduling,
    statistics,
    exportTokens,
    gateway,
    publicUrl: config.server.publicUrl,
    exportMaxAgeSeconds: config.export.maxAgeSeconds,
    logger: createLogger("bot"),
  });

  channelManager.onMessage((channelId, message) => {
    chatHandler.handleMessage(channelId, message).catch((err: unknown) => {
      log.error({ channel: channelId, from: message.from, err }, "Message handling failed");
    });
  });

  await channelManager.initAll(config.channels);
  if (Object.keys(config.channels).length === 0) {
    log.warn("No channels configured; only the HTTP API is available");
  }

  const server = await createServer({
    deps: {
      events,
      scheduling,
      statistics,
      exportTokens,
      exportMaxAgeSeconds: config.export.maxAgeSeconds,
      channelManager,
    },
    logging: config.logging,
  });

  await server.listen({ port: config.server.port, host: config.server.host });
  log.info(`Calendar bot listening on ${config.server.publicUrl}`);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    log.info({ signal }, "Shutting down...");
    channelManager
      .disconnectAll()
      .then(() => engine.idle())
      .then(() => gateway.flush())
      .then(() => server.close())
      .then(() => {
        database.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  createLogger("main").fatal({ err }, "Failed to start");
  process.exit(1);
});
