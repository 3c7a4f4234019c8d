import { createInterface, type Interface } from "node:readline";
import { ulid } from "ulid";
import type {
  ChannelPlugin,
  ChannelEventName,
  ChannelEvents,
  ChannelInstanceConfig,
  ChannelStatus,
  IncomingMessage,
  OutgoingMessage,
} from "@calendar-bot/core";
import { emptyHandlers, initialStatus } from "@calendar-bot/core";

// ─────────────────────────────────────────────────────────────────
// Line format
// ─────────────────────────────────────────────────────────────────
//
//   in:   <identity> <text>          typed message
//         <identity> !<buttonId>     button press
//   out:  → <identity>: <text>
//           [<buttonId>] <label>

const INPUT_PATTERN = /^(\S+)\s+(.+)$/;

export const USAGE_LINE = "usage: <identity> <text> | <identity> !<buttonId>";

export interface ParsedLine {
  from: string;
  content: string;
  buttonId?: string;
}

/**
 * Parse one console input line; null when it does not fit the format.
 */
export function parseConsoleLine(line: string): ParsedLine | null {
  const match = INPUT_PATTERN.exec(line.trim());
  if (!match) return null;
  const [, from, rest] = match;
  if (rest.startsWith("!")) {
    const buttonId = rest.slice(1).trim();
    return buttonId ? { from, content: "", buttonId } : null;
  }
  return { from, content: rest };
}

export function formatOutgoing(to: string, message: OutgoingMessage): string {
  const lines = [`→ ${to}: ${message.content}`];
  for (const button of message.buttons ?? []) {
    lines.push(`  [${button.id}] ${button.label}`);
  }
  return lines.join("\n") + "\n";
}

export interface ConsoleStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

// ─────────────────────────────────────────────────────────────────
// Plugin class
// ─────────────────────────────────────────────────────────────────

export class ConsolePlugin implements ChannelPlugin {
  name = "console";

  private config: ChannelInstanceConfig | null = null;
  private rl: Interface | null = null;
  private _status: ChannelStatus = initialStatus();
  private handlers = emptyHandlers();

  constructor(private streams: ConsoleStreams) {}

  // ── Lifecycle ──────────────────────────────────────────────────

  async init(config: ChannelInstanceConfig): Promise<void> {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (!this.config) {
      throw new Error("[channel-console] connect() called before init()");
    }
    if (this.rl) return;

    const rl = createInterface({ input: this.streams.input, terminal: false });
    rl.on("line", (line) => this.handleLine(line));
    rl.on("close", () => {
      this.rl = null;
      this._status = { ...this._status, running: false, connected: false };
      this.emitStatus();
    });
    this.rl = rl;

    this._status = {
      ...this._status,
      running: true,
      connected: true,
      lastConnectedAt: new Date(),
      lastError: null,
    };
    this.emitStatus();

    const prompt = this.config.prompt;
    if (typeof prompt === "string" && prompt) {
      this.streams.output.write(`${prompt}\n`);
    }
  }

  async disconnect(): Promise<void> {
    // close() fires the "close" listener, which updates status
    this.rl?.close();
  }

  // ── Messaging ──────────────────────────────────────────────────

  async send(to: string, message: OutgoingMessage): Promise<void> {
    if (!this.rl) {
      throw new Error("[channel-console] send() called while disconnected");
    }
    this.streams.output.write(formatOutgoing(to, message));
  }

  // ── Event emitter ──────────────────────────────────────────────

  on<E extends ChannelEventName>(event: E, handler: ChannelEvents[E]): void {
    this.handlers[event].push(handler);
  }

  status(): ChannelStatus {
    return { ...this._status };
  }

  // ── Private helpers ────────────────────────────────────────────

  private handleLine(line: string): void {
    if (!line.trim()) return;

    const parsed = parseConsoleLine(line);
    if (!parsed) {
      this.streams.output.write(`${USAGE_LINE}\n`);
      return;
    }

    const now = new Date();
    const msg: IncomingMessage = {
      id: ulid(),
      from: parsed.from,
      content: parsed.content,
      timestamp: now,
      channelId: this.config?.id ?? "console",
      buttonId: parsed.buttonId,
    };
    this._status.lastMessageAt = now;
    this._status.lastEventAt = now;

    for (const handler of this.handlers.message) {
      handler(msg);
    }
  }

  private emitStatus(): void {
    this._status.lastEventAt = new Date();
    for (const handler of this.handlers.status) {
      handler({ ...this._status });
    }
  }
}
