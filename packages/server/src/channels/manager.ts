/**
 * Channel Manager
 *
 * Registry for channel plugins: creates instances from config, wires
 * their events, filters duplicate deliveries and routes sends.
 */

import type {
  ChannelPlugin,
  PluginFactory,
  ChannelInstanceConfig,
  ChannelStatus,
  ChannelInfo,
  IncomingMessage,
  OutgoingMessage,
  Logger,
} from "@calendar-bot/core";
import { toDisplayStatus, initialStatus, DedupCache, createLogger } from "@calendar-bot/core";

/** Internal channel entry */
interface ChannelEntry {
  config: ChannelInstanceConfig;
  plugin: ChannelPlugin;
  status: ChannelStatus;
}

/** Message handler signature */
type MessageHandler = (channelId: string, message: IncomingMessage) => void;

export interface ChannelManagerDeps {
  logger?: Logger;
  dedup?: DedupCache;
}

export class ChannelManager {
  private channels = new Map<string, ChannelEntry>();
  private pluginFactories = new Map<string, PluginFactory>();
  private dedup: DedupCache;
  private logger: Logger;
  private messageHandler: MessageHandler | null = null;

  constructor(deps: ChannelManagerDeps = {}) {
    this.logger = deps.logger ?? createLogger("channels");
    this.dedup = deps.dedup ?? new DedupCache();
  }

  /**
   * Register a plugin factory by name.
   */
  registerPlugin(name: string, factory: PluginFactory): void {
    this.pluginFactories.set(name, factory);
  }

  /**
   * Set the message handler (called after dedup).
   */
  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  /**
   * Add and initialize a single channel at runtime.
   */
  async addChannel(config: ChannelInstanceConfig): Promise<ChannelInfo> {
    const id = config.id;
    if (this.channels.has(id)) {
      throw new Error(`Channel already exists: ${id}`);
    }

    await this.initChannel(id, config);

    const info = this.getChannelInfo(id);
    if (!info) throw new Error(`Failed to get info for channel: ${id}`);
    return info;
  }

  /**
   * Initialize all channels from config. A channel that fails is logged
   * and skipped; the rest still come up.
   */
  async initAll(configs: Record<string, ChannelInstanceConfig>): Promise<void> {
    for (const [id, config] of Object.entries(configs)) {
      try {
        await this.initChannel(id, { ...config, id });
      } catch (err) {
        this.logger.error({ channel: id, plugin: config.plugin, err }, "Channel setup failed");
      }
    }
  }

  private async initChannel(id: string, config: ChannelInstanceConfig): Promise<void> {
    const factory = this.pluginFactories.get(config.plugin);
    if (!factory) {
      throw new Error(`Plugin factory not found: ${config.plugin}`);
    }

    const plugin = factory(config);
    const entry: ChannelEntry = { config, plugin, status: initialStatus() };

    plugin.on("message", (msg) => this.handlePluginMessage(id, msg));
    plugin.on("error", (err) => {
      this.logger.error({ channel: id, err }, "Channel error");
      entry.status.lastError = err.message;
    });
    plugin.on("status", (status) => this.handlePluginStatus(id, status));

    this.channels.set(id, entry);

    try {
      await plugin.init(config);
      this.logger.info({ channel: id }, "Initialized channel");
    } catch (err) {
      this.logger.error({ channel: id, err }, "Failed to initialize channel");
      entry.status.lastError = err instanceof Error ? err.message : String(err);
      return;
    }

    if (config.processing === "immediate") {
      await this.connect(id);
    }
  }

  /**
   * Connect one channel. Failures are recorded on its status, not thrown.
   */
  async connect(id: string): Promise<void> {
    const entry = this.channels.get(id);
    if (!entry) throw new Error(`Channel not found: ${id}`);
    try {
      await entry.plugin.connect();
      this.logger.info({ channel: id }, "Connected channel");
    } catch (err) {
      this.logger.error({ channel: id, err }, "Failed to connect channel");
      entry.status.lastError = err instanceof Error ? err.message : String(err);
    }
  }

  /**
   * Send a message through a channel.
   */
  async send(channelId: string, to: string, message: OutgoingMessage): Promise<void> {
    const entry = this.channels.get(channelId);
    if (!entry) {
      throw new Error(`Channel not found: ${channelId}`);
    }
    if (!entry.status.connected) {
      throw new Error(`Channel not connected: ${channelId}`);
    }
    await entry.plugin.send(to, message);
  }

  /**
   * Feed a message in as if the channel had received it.
   * Goes through dedup like any other inbound message.
   */
  inject(channelId: string, msg: IncomingMessage): boolean {
    if (!this.channels.has(channelId)) return false;
    this.handlePluginMessage(channelId, msg);
    return true;
  }

  /**
   * Channel that reaches users who have not written in yet:
   * the one marked `default`, else the first registered.
   */
  defaultChannelId(): string | null {
    let first: string | null = null;
    for (const [id, entry] of this.channels.entries()) {
      if (entry.config.default) return id;
      first ??= id;
    }
    return first;
  }

  getChannelInfos(): ChannelInfo[] {
    const infos: ChannelInfo[] = [];
    for (const id of this.channels.keys()) {
      const info = this.getChannelInfo(id);
      if (info) infos.push(info);
    }
    return infos;
  }

  getChannelInfo(id: string): ChannelInfo | null {
    const entry = this.channels.get(id);
    if (!entry) return null;

    return {
      id,
      plugin: entry.config.plugin,
      identity: entry.config.identity,
      status: toDisplayStatus(entry.status),
      statusDetail: { ...entry.status },
    };
  }

  /**
   * Disconnect all channels.
   */
  async disconnectAll(): Promise<void> {
    for (const [id, entry] of this.channels.entries()) {
      try {
        await entry.plugin.disconnect();
        this.logger.info({ channel: id }, "Disconnected channel");
      } catch (err) {
        this.logger.error({ channel: id, err }, "Error disconnecting channel");
      }
    }
  }

  private handlePluginMessage(channelId: string, msg: IncomingMessage): void {
    const entry = this.channels.get(channelId);
    if (!entry) {
      this.logger.warn({ channel: channelId }, "Message for unknown channel");
      return;
    }

    const dedupKey = `${channelId}:${msg.from}:${msg.id}`;
    if (this.dedup.isDuplicate(dedupKey)) {
      this.logger.debug({ channel: channelId, id: msg.id, from: msg.from }, "Duplicate message filtered");
      return;
    }

    entry.status.lastMessageAt = new Date();
    this.messageHandler?.(channelId, msg);
  }

  private handlePluginStatus(channelId: string, newStatus: ChannelStatus): void {
    const entry = this.channels.get(channelId);
    if (!entry) {
      this.logger.warn({ channel: channelId }, "Status update for unknown channel");
      return;
    }

    const before = toDisplayStatus(entry.status);
    entry.status = { ...newStatus, lastMessageAt: entry.status.lastMessageAt ?? newStatus.lastMessageAt };

    const after = toDisplayStatus(entry.status);
    if (after !== before) {
      this.logger.info({ channel: channelId, from: before, to: after }, "Channel status changed");
    }
  }
}
