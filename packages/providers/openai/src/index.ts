export {
  OpenAIProvider,
  type OpenAIProviderConfig,
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_OPENAI_MODEL,
  normalizeBaseUrl,
  toWireMessages,
  toWireTools,
} from "./provider";
export { processSSEBuffer, type SSEEvent } from "./sse";
export { classifyError, buildErrorHint } from "./errors";
export type { WireMessage, WireRequest, WireToolDef, WireToolCall, WireChunk, WireChoice, WireDelta, WireUsage } from "./wire";
