export { ChatBotHandler, parseCommand } from "./chat-handler.js";
export type { ChatBotDeps } from "./chat-handler.js";
