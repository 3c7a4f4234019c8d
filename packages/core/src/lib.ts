// Public API for consumption by other packages (server, plugins)

// Domain types
export { parseIdentity, BLOCKING_STATUSES } from './types.js'
export type {
  Identity,
  IsoDate,
  ClockTime,
  CalendarEvent,
  CreateEventInput,
  Invitation,
  InvitationStatus,
  InvitationDecision,
  CreateInvitationInput,
  RegisteredUser,
  StatisticsCounter,
  DailyStatistics,
} from './types.js'

// Errors
export {
  CalendarError,
  ParseError,
  NoActiveSessionError,
  BusyError,
  NotParticipantError,
  NotOwnerError,
  NotFoundError,
  InvalidTransitionError,
  BadSignatureError,
  ExpiredTokenError,
  StorageUnavailableError,
  ConfigError,
  isCalendarError,
} from './errors.js'
export type { CalendarErrorKind } from './errors.js'

// Configuration & logging
export { loadConfig, findDataDir } from './config.js'
export type { CalendarConfig, LoadConfigOptions } from './config.js'
export { createLogger, configureLogging, loggerOptions, silentLogger } from './logger.js'
export type { Logger, LoggingConfig } from './logger.js'

// Conversation engine
export { ConversationEngine, InMemorySessionStore } from './conversation/index.js'
export type {
  ConversationEngineOptions,
  SessionStore,
  FlowFields,
  FlowName,
  FlowSession,
  ConversationSession,
  FlowCompletion,
  SubmitResult,
  StartResult,
  CommitHandler,
  StepCheck,
  StepValidator,
  SubmitHooks,
} from './conversation/index.js'

// Export capability
export {
  ExportTokenIssuer,
  toExportRows,
  toCsv,
  toJsonExport,
  isExportFormat,
} from './export/index.js'
export type {
  ExportTokenIssuerOptions,
  ExportTokenPayload,
  ExportFormat,
  ExportRow,
} from './export/index.js'

// Channel types
export { toDisplayStatus, initialStatus, emptyHandlers } from './channels/index.js'
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
} from './channels/index.js'

// Utilities
export {
  DedupCache,
  KeyedSerialQueue,
  parseDate,
  parseTime,
  withSeconds,
  todayIso,
  DATE_FORMAT,
  TIME_FORMAT,
} from './utils/index.js'
export type { DedupOptions } from './utils/index.js'
