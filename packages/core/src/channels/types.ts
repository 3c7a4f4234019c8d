/**
 * Channel System: Type Definitions
 *
 * Delivery gateway contract: plugins carry user messages and button
 * presses in, and text with optional buttons out.
 */

// ─────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────

/** Simple display status for UI rendering */
export type ChannelDisplayStatus = 'disconnected' | 'connecting' | 'connected' | 'error'

/** Rich status object emitted by plugins and tracked by manager */
export interface ChannelStatus {
  running: boolean
  connected: boolean
  lastConnectedAt: Date | null
  lastMessageAt: Date | null
  lastEventAt: Date | null
  lastError: string | null
}

/** Convert rich status to display status */
export function toDisplayStatus(status: ChannelStatus): ChannelDisplayStatus {
  if (status.lastError && !status.connected) return 'error'
  if (status.connected) return 'connected'
  if (status.running) return 'connecting'
  return 'disconnected'
}

/** Create a fresh initial status */
export function initialStatus(): ChannelStatus {
  return {
    running: false,
    connected: false,
    lastConnectedAt: null,
    lastMessageAt: null,
    lastEventAt: null,
    lastError: null,
  }
}

// ─────────────────────────────────────────────────────────────────
// Messages
// ─────────────────────────────────────────────────────────────────

/** Inline button attached to an outgoing message */
export interface MessageButton {
  /** Opaque id echoed back in IncomingMessage.buttonId */
  id: string
  label: string
}

/** Incoming message or button press from an external channel */
export interface IncomingMessage {
  /** Unique message ID (from the platform) */
  id: string
  /** Sender identity as the platform reports it */
  from: string
  /** Message text; empty for a bare button press */
  content: string
  timestamp: Date
  /** Channel instance ID */
  channelId: string
  /** Set when the user pressed a button instead of typing */
  buttonId?: string
  /** Platform handle, e.g. "@alice" */
  username?: string
  /** Display name of the sender */
  senderName?: string
}

/** Outgoing message to an external channel */
export interface OutgoingMessage {
  content: string
  buttons?: MessageButton[]
}

// ─────────────────────────────────────────────────────────────────
// Plugin Interface
// ─────────────────────────────────────────────────────────────────

/** Configuration for a channel instance */
export interface ChannelInstanceConfig {
  /** Instance ID (e.g., "console_main") */
  id: string
  /** Plugin name (e.g., "console", "mock") */
  plugin: string
  /** Display identity of the bot on this channel */
  identity: string
  /** Connect at startup, or only when asked */
  processing: 'immediate' | 'on_demand'
  /** Channel used to reach users who have not written in yet */
  default?: boolean
  /** Plugin-specific config */
  [key: string]: unknown
}

/** Events a plugin emits, by name */
export interface ChannelEvents {
  message: (msg: IncomingMessage) => void
  error: (err: Error) => void
  status: (status: ChannelStatus) => void
}

export type ChannelEventName = keyof ChannelEvents

/** Listener lists keyed by event, for plugin implementations */
export type ChannelHandlers = { [E in ChannelEventName]: ChannelEvents[E][] }

export function emptyHandlers(): ChannelHandlers {
  return { message: [], error: [], status: [] }
}

/** Channel plugin interface: implemented by each channel type */
export interface ChannelPlugin {
  /** Plugin name (e.g., "mock", "console") */
  name: string
  init(config: ChannelInstanceConfig): Promise<void>
  connect(): Promise<void>
  disconnect(): Promise<void>
  send(to: string, message: OutgoingMessage): Promise<void>
  on<E extends ChannelEventName>(event: E, handler: ChannelEvents[E]): void
  status(): ChannelStatus
}

/** Factory function to create a plugin instance */
export type PluginFactory = (config: ChannelInstanceConfig) => ChannelPlugin

/** Channel info for the REST API */
export interface ChannelInfo {
  id: string
  plugin: string
  identity: string
  status: ChannelDisplayStatus
  statusDetail: ChannelStatus
}
