// OpenAIProvider: streaming Chat Completions client.
//
// Handles:
//   • Base URL normalization (with or without /v1, full endpoint URLs)
//   • Message conversion to the wire format
//   • SSE streaming with tolerant chunk parsing
//   • Tool call accumulation across streaming chunks
//   • Unified error classification

import type {
  CapabilityDescriptor,
  InvocationRequest,
  Logger,
  Message,
  ProviderOptions,
  ProviderChunk,
} from "@crawlwise/core";
import { AbstractProvider, CrawlwiseError, ModelServiceError, toJsonSchema } from "@crawlwise/core";
import type { WireMessage, WireRequest, WireToolCall, WireToolDef } from "./wire";
import { processSSEBuffer } from "./sse";
import { classifyError, buildErrorHint } from "./errors";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

// ── Config ───────────────────────────────────────────────────────────────────

export interface OpenAIProviderConfig {
  readonly apiKey: string;
  /** Model identifier. Default: gpt-4o-mini. */
  readonly model?: string;
  /**
   * Accepts any of:
   *   https://api.openai.com
   *   https://api.openai.com/v1
   *   https://api.openai.com/v1/chat/completions   (trailing endpoint stripped)
   */
  readonly baseUrl?: string;
  readonly logger?: Logger;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeBaseUrl(raw: string): string {
  let url = raw.replace(/\/+$/, "");
  url = url.replace(/\/chat\/completions$/, "");
  if (!url.endsWith("/v1")) url += "/v1";
  return url;
}

function encodeArguments(args: unknown): string {
  if (typeof args === "string") return args;
  return JSON.stringify(args ?? {});
}

function toWireToolCalls(calls: readonly InvocationRequest[]): WireToolCall[] {
  return calls.map((tc) => ({
    id: tc.id,
    type: "function" as const,
    function: { name: tc.name, arguments: encodeArguments(tc.args) },
  }));
}

export function toWireMessages(messages: readonly Message[]): WireMessage[] {
  const result: WireMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        result.push({ role: "system", content: msg.content });
        break;
      case "user":
        result.push({ role: "user", content: msg.content });
        break;
      case "tool":
        result.push({ role: "tool", tool_call_id: msg.toolCallId, content: msg.content });
        break;
      case "assistant":
        if (!msg.toolCalls?.length) {
          result.push({ role: "assistant", content: msg.content });
        } else {
          result.push({
            role: "assistant",
            content: msg.content || null,
            tool_calls: toWireToolCalls(msg.toolCalls),
          });
        }
        break;
    }
  }

  return result;
}

export function toWireTools(tools: readonly CapabilityDescriptor[]): WireToolDef[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: { name: t.name, description: t.description, parameters: toJsonSchema(t) },
  }));
}

interface PendingToolCall {
  id: string;
  name: string;
  arguments: string;
}

// ── Provider ─────────────────────────────────────────────────────────────────

export class OpenAIProvider extends AbstractProvider {
  readonly name = "openai";
  readonly model: string;
  readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(config: OpenAIProviderConfig) {
    super(config.logger?.child({ component: "OpenAIProvider" }));
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_OPENAI_MODEL;
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_OPENAI_BASE_URL);
  }

  protected async *_chat(messages: readonly Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk> {
    const tools = options?.tools ?? [];

    const body: WireRequest = {
      model: this.model,
      messages: toWireMessages(messages),
      stream: true,
      stream_options: { include_usage: true },
    };
    if (tools.length > 0) {
      body.tools = toWireTools(tools);
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Authorization: `Bearer ${this.apiKey}`,
    };

    const toolCallAccumulator = new Map<number, PendingToolCall>();
    let lastUsage: { promptTokens: number; completionTokens: number; totalTokens: number } | undefined;

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: options?.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`${this.name} API error: Status ${response.status}\nBody: ${errorBody}`);
      }

      if (!response.body) {
        throw new Error(`No response body received from ${this.name}`);
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";
      let finished = false;

      while (!finished) {
        options?.signal?.throwIfAborted();

        const { done, value } = await reader.read();
        if (done) break;

        const { events, remaining } = processSSEBuffer(buffer, decoder.decode(value, { stream: true }));
        buffer = remaining;

        for (const event of events) {
          switch (event.type) {
            case "done":
              finished = true;
              break;
            case "text":
              yield { type: "text", text: event.text };
              break;
            case "tool_delta":
              accumulate(toolCallAccumulator, event);
              break;
            case "usage":
              lastUsage = event;
              break;
            case "finish":
              if (event.reason === "tool_calls" || event.reason === "stop") {
                yield* flushToolCalls(toolCallAccumulator);
              }
              break;
          }
          if (finished) break;
        }
      }

      // Tool calls not yet flushed by a finish event
      yield* flushToolCalls(toolCallAccumulator);

      if (lastUsage) {
        yield {
          type: "usage",
          usage: {
            inputTokens: lastUsage.promptTokens,
            outputTokens: lastUsage.completionTokens,
            totalTokens: lastUsage.totalTokens,
          },
        };
      }
    } catch (err) {
      if (err instanceof CrawlwiseError) throw err;
      const code = classifyError(err);
      const hint = buildErrorHint(code, this.baseUrl);
      const message = err instanceof Error ? err.message : String(err);
      throw new ModelServiceError(`${this.name} error: ${message}${hint}`, code, err);
    }
  }
}

function accumulate(
  accumulator: Map<number, PendingToolCall>,
  delta: { index: number; id?: string; name?: string; arguments?: string },
): void {
  const existing = accumulator.get(delta.index);
  if (existing) {
    if (delta.arguments) existing.arguments += delta.arguments;
    return;
  }
  accumulator.set(delta.index, {
    id: delta.id ?? `tc_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`,
    name: delta.name ?? "",
    arguments: delta.arguments ?? "",
  });
}

function decodeArguments(raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    // Forwarded as-is; the invoker reports the shape mismatch to the model
    return raw;
  }
}

function* flushToolCalls(accumulator: Map<number, PendingToolCall>): Generator<ProviderChunk> {
  for (const [, tc] of accumulator) {
    yield { type: "tool_call", toolCall: { id: tc.id, name: tc.name, args: decodeArguments(tc.arguments) } };
  }
  accumulator.clear();
}
