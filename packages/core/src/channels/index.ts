export { toDisplayStatus, initialStatus, emptyHandlers } from './types.js'

export type {
  ChannelDisplayStatus,
  ChannelStatus,
  MessageButton,
  IncomingMessage,
  OutgoingMessage,
  ChannelInstanceConfig,
  ChannelPlugin,
  ChannelEvents,
  ChannelEventName,
  ChannelHandlers,
  PluginFactory,
  ChannelInfo,
} from './types.js'
