import type { ChannelInstanceConfig, ChannelPlugin } from "@calendar-bot/core";
import { ConsolePlugin, type ConsoleStreams } from "./plugin.js";

export { ConsolePlugin, parseConsoleLine, formatOutgoing, USAGE_LINE } from "./plugin.js";
export type { ConsoleStreams, ParsedLine } from "./plugin.js";

/**
 * Plugin factory for ChannelManager.registerPlugin("console", ...).
 * Reads stdin and writes stdout unless other streams are given.
 */
export function createConsolePlugin(
  _config: ChannelInstanceConfig,
  streams: ConsoleStreams = { input: process.stdin, output: process.stdout },
): ChannelPlugin {
  return new ConsolePlugin(streams);
}
