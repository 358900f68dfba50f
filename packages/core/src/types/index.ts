// Barrel export: the public type surface of @crawlwise/core

export type {
  Message,
  Role,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
} from "./message";

export type {
  ParameterType,
  ParameterSpec,
  CapabilityDescriptor,
  InvocationRequest,
  InvocationResult,
} from "./capability";

export type {
  Provider,
  ProviderOptions,
  ProviderErrorCode,
  ProviderChunk,
  ProviderUsage,
} from "./provider";

export type {
  Logger,
  LogLevel,
  LogSink,
} from "./logger";
export { ConsoleLogger, LOG_LEVELS, isLogLevel, consoleSink, stderrSink } from "./logger";

export {
  CrawlwiseError,
  ConfigError,
  ModelServiceError,
  InvalidDescriptorError,
  DuplicateCapabilityError,
  UnknownCapabilityError,
  ArgumentShapeError,
  InvocationFailure,
  ProtocolError,
  SessionBusyError,
  toCrawlwiseError,
  ok,
  err,
} from "./errors";
export type { Result } from "./errors";
