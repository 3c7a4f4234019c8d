/**
 * Delivery Gateway
 *
 * Addresses users by identity instead of by channel. Remembers which
 * channel each identity last wrote from; users who never wrote in are
 * reached through the default channel.
 */

import type { Identity, Logger, OutgoingMessage } from "@calendar-bot/core";
import type { ChannelManager } from "./manager.js";

export class DeliveryGateway {
  private routes = new Map<Identity, string>();
  private pending = new Set<Promise<void>>();

  constructor(
    private channels: ChannelManager,
    private logger: Logger,
  ) {}

  /** Route future messages for `identity` through `channelId` */
  remember(identity: Identity, channelId: string): void {
    this.routes.set(identity, channelId);
  }

  channelFor(identity: Identity): string | null {
    return this.routes.get(identity) ?? this.channels.defaultChannelId();
  }

  /**
   * Send and wait. Rejects when there is no channel or the plugin fails.
   */
  async send(identity: Identity, message: OutgoingMessage): Promise<void> {
    const channelId = this.channelFor(identity);
    if (!channelId) {
      throw new Error(`No channel can reach ${identity}`);
    }
    await this.channels.send(channelId, String(identity), message);
  }

  /**
   * Fire-and-forget send. Failures are logged and handed to `onFailure`;
   * the caller never waits on delivery.
   */
  notify(identity: Identity, message: OutgoingMessage, onFailure?: (err: unknown) => void): void {
    const delivery = this.send(identity, message)
      .catch((err: unknown) => {
        this.logger.warn({ identity, err }, "Delivery failed");
        try {
          onFailure?.(err);
        } catch (hookErr) {
          this.logger.error({ identity, err: hookErr }, "Delivery failure handler threw");
        }
      })
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  /** Resolves once every outstanding notification has settled */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
