// Model-service provider interface with cancellation, error normalization, and capability support

import type { Message } from "./message";
import type { CapabilityDescriptor, InvocationRequest } from "./capability";

export type ProviderErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "context_length_exceeded"
  | "transient_network"
  | "cancelled"
  | "unknown";

export interface ProviderOptions {
  readonly signal?: AbortSignal;
  /** Capability catalog offered to the model. Omitted when no invocation should occur. */
  readonly tools?: readonly CapabilityDescriptor[];
}

/** Exact token counts reported by the provider after a response completes. */
export interface ProviderUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
}

/**
 * Chunks yielded by the provider during streaming.
 * - "text": a piece of the response text
 * - "tool_call": the model wants a capability invoked
 * - "usage": exact token counts (yielded once, after content)
 */
export type ProviderChunk =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "tool_call"; readonly toolCall: InvocationRequest }
  | { readonly type: "usage"; readonly usage: ProviderUsage };

export interface Provider {
  readonly name: string;
  chat(messages: readonly Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk>;
}
