import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import type { CalendarErrorKind, ExportTokenIssuer, LoggingConfig } from "@calendar-bot/core";
import { isCalendarError, loggerOptions } from "@calendar-bot/core";
import { registerExportRoutes } from "./routes/export.js";
import { registerApiRoutes } from "./routes/api.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerChannelRoutes } from "./routes/channels.js";
import type { EventStore } from "./events/event-store.js";
import type { SchedulingEngine } from "./scheduling/scheduling-engine.js";
import type { StatisticsTracker } from "./stats/statistics.js";
import type { ChannelManager } from "./channels/manager.js";

export interface ServerDeps {
  events: EventStore;
  scheduling: SchedulingEngine;
  statistics: StatisticsTracker;
  exportTokens: ExportTokenIssuer;
  exportMaxAgeSeconds: number;
  channelManager: ChannelManager;
}

export interface ServerOptions {
  deps: ServerDeps;
  /** pino settings for the request logger; false disables it */
  logging?: Partial<LoggingConfig> | false;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    events: EventStore;
    scheduling: SchedulingEngine;
    statistics: StatisticsTracker;
    exportTokens: ExportTokenIssuer;
    exportMaxAgeSeconds: number;
    channelManager: ChannelManager;
  }
}

const STATUS_BY_KIND: Record<CalendarErrorKind, number> = {
  parse: 400,
  no_active_session: 409,
  busy: 409,
  not_participant: 403,
  not_owner: 404,
  not_found: 404,
  invalid_transition: 409,
  bad_signature: 403,
  expired: 403,
  storage_unavailable: 503,
  config: 500,
};

/** Token failures share one body so a probe cannot tell forged from stale */
const INVALID_LINK = { error: "invalid link" };

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { deps } = options;

  const fastify = Fastify({
    logger: options.logging === false ? false : loggerOptions(options.logging),
  });

  // Register CORS (read-only JSON API)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("events", deps.events);
  fastify.decorate("scheduling", deps.scheduling);
  fastify.decorate("statistics", deps.statistics);
  fastify.decorate("exportTokens", deps.exportTokens);
  fastify.decorate("exportMaxAgeSeconds", deps.exportMaxAgeSeconds);
  fastify.decorate("channelManager", deps.channelManager);

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (isCalendarError(error)) {
      if (error.kind === "bad_signature" || error.kind === "expired") {
        request.log.info({ kind: error.kind }, "Rejected export token");
        return reply.code(403).send(INVALID_LINK);
      }
      if (error.kind === "storage_unavailable") {
        request.log.error({ err: error }, "Storage unavailable");
        return reply.code(503).send({ error: "storage unavailable" });
      }
      return reply.code(STATUS_BY_KIND[error.kind]).send({ error: error.message });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    return reply.code(statusCode).send({ error: error.message });
  });

  await registerExportRoutes(fastify);
  await registerApiRoutes(fastify);
  await registerChannelRoutes(fastify);

  // Register admin API routes (localhost-only)
  await fastify.register(
    async (instance) => {
      await registerAdminRoutes(instance);
    },
    { prefix: "/api/admin" },
  );

  fastify.get("/health", async () => ({ status: "ok" }));

  return fastify;
}
