// @crawlwise/core: contract package
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Events
export { type CrawlwiseEvents, type EventBus, type EventName, type Listener, SimpleEventBus } from "./events";

// Config
export { type CrawlwiseConfig, loadConfig } from "./config";

// Providers
export { AbstractProvider } from "./base-provider";
export { type ModelDecision, decide } from "./model-decision";

// Capabilities
export {
  CapabilityArgs,
  defineCapability,
  toJsonSchema,
  argumentSchema,
  parseArguments,
} from "./capability";
export {
  type CapabilityHandler,
  type CapabilityContext,
  type RegisteredCapability,
  CapabilityRegistry,
} from "./capability-registry";
export { CapabilityInvoker } from "./capability-invoker";

// Transcript
export {
  type TranscriptWriter,
  ConversationTranscript,
  TranscriptTurn,
  pendingInvocationIds,
  systemMessage,
  userMessage,
  assistantMessage,
  toolMessage,
} from "./transcript";

// Dispatch
export { type DispatcherDeps, ToolCallDispatcher, serializeOutcome, DEFAULT_MAX_RESULT_CHARS } from "./dispatcher";

// Session
export {
  type SessionState,
  type TurnInput,
  type TurnAnswer,
  type SessionIO,
  type SessionDeps,
  SessionLoop,
  composeGoal,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_FOLLOW_UP_PROMPT,
} from "./session-loop";
