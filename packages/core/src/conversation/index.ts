export { ConversationEngine } from './engine.js'
export type { ConversationEngineOptions } from './engine.js'
export { InMemorySessionStore } from './session-store.js'
export type { SessionStore } from './session-store.js'
export type {
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
} from './types.js'
