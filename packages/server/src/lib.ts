// Public API for embedding the calendar bot and for tests

export { createServer } from "./server.js";
export type { ServerDeps, ServerOptions } from "./server.js";
export { CalendarDatabase, MEMORY_DATABASE } from "./db/database.js";
export { EventStore } from "./events/event-store.js";
export { UserStore } from "./users/user-store.js";
export type { RegisterResult } from "./users/user-store.js";
export { StatisticsTracker } from "./stats/statistics.js";
export { SchedulingEngine } from "./scheduling/scheduling-engine.js";
export type { SchedulingEngineDeps } from "./scheduling/scheduling-engine.js";
export { ChannelManager, DeliveryGateway, MockChannelPlugin } from "./channels/index.js";
export type { ChannelManagerDeps } from "./channels/index.js";
export { ChatBotHandler, parseCommand } from "./bot/index.js";
export type { ChatBotDeps } from "./bot/index.js";
