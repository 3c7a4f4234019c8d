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

/**
 * In-process channel for tests and local runs. Captures what is sent
 * and lets a test push inbound messages and button presses.
 */
export class MockChannelPlugin implements ChannelPlugin {
  name = "mock";

  private config: ChannelInstanceConfig | null = null;
  private _status: ChannelStatus = initialStatus();
  private handlers = emptyHandlers();
  private sequence = 0;

  /** Sent messages are captured here for testing */
  sentMessages: Array<{ to: string; message: OutgoingMessage }> = [];

  /** Recipients whose sends should fail */
  unreachable = new Set<string>();

  async init(config: ChannelInstanceConfig): Promise<void> {
    this.config = config;
  }

  async connect(): Promise<void> {
    this._status = {
      ...this._status,
      running: true,
      connected: true,
      lastConnectedAt: new Date(),
      lastError: null,
    };
    this.emitStatus();
  }

  async disconnect(): Promise<void> {
    this._status = { ...this._status, running: false, connected: false };
    this.emitStatus();
  }

  async send(to: string, message: OutgoingMessage): Promise<void> {
    if (this.unreachable.has(to)) {
      throw new Error(`Recipient ${to} is unreachable`);
    }
    this.sentMessages.push({ to, message });
  }

  on<E extends ChannelEventName>(event: E, handler: ChannelEvents[E]): void {
    this.handlers[event].push(handler);
  }

  status(): ChannelStatus {
    return { ...this._status };
  }

  // ── Test Methods ───────────────────────────────────────────────

  /** Simulate an incoming text message */
  simulateIncoming(from: string, content: string, extra: Partial<IncomingMessage> = {}): IncomingMessage {
    const msg: IncomingMessage = {
      id: `mock-${++this.sequence}`,
      from,
      content,
      timestamp: new Date(),
      channelId: this.config?.id ?? "mock",
      ...extra,
    };
    this._status.lastMessageAt = msg.timestamp;
    this._status.lastEventAt = msg.timestamp;
    for (const handler of this.handlers.message) {
      handler(msg);
    }
    return msg;
  }

  /** Simulate a button press */
  simulateButton(from: string, buttonId: string): IncomingMessage {
    return this.simulateIncoming(from, "", { buttonId });
  }

  /** Simulate a channel-level error */
  simulateError(err: Error): void {
    for (const handler of this.handlers.error) {
      handler(err);
    }
  }

  /** Messages sent to one recipient, text only */
  textsTo(to: string): string[] {
    return this.sentMessages.filter((sent) => sent.to === to).map((sent) => sent.message.content);
  }

  private emitStatus(): void {
    this._status.lastEventAt = new Date();
    for (const handler of this.handlers.status) {
      handler({ ...this._status });
    }
  }
}
