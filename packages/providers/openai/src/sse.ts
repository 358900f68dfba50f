// Tolerant SSE line parser for Chat Completions streaming responses.
//
//   • Never crash on a chunk: malformed lines are skipped
//   • Accept text from delta.content OR message.content
//   • The usage chunk (stream_options.include_usage) arrives with empty choices
//   • Stop cleanly on [DONE]

import { wireChunkSchema, type WireChunk } from "./wire";

export type SSEEvent =
  | { type: "text"; text: string }
  | { type: "tool_delta"; index: number; id?: string; name?: string; arguments?: string }
  | { type: "finish"; reason: string }
  | { type: "usage"; promptTokens: number; completionTokens: number; totalTokens: number }
  | { type: "done" };

/**
 * Parse the payload of a single `data:` line, or return null to skip it.
 */
function parseChunk(data: string): WireChunk | null {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return null;
  }
  const parsed = wireChunkSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Process a buffer of raw SSE text into discrete events.
 * Returns the events and the leftover (incomplete) buffer tail.
 */
export function processSSEBuffer(
  buffer: string,
  incoming: string,
): { events: SSEEvent[]; remaining: string } {
  const combined = buffer + incoming;
  const lines = combined.split("\n");
  const remaining = lines.pop() ?? "";
  const events: SSEEvent[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("data:")) continue;

    const data = trimmed.slice(5).trim();
    if (data === "[DONE]") {
      events.push({ type: "done" });
      continue;
    }

    const chunk = parseChunk(data);
    if (!chunk) continue;

    if (chunk.usage) {
      events.push({
        type: "usage",
        promptTokens: chunk.usage.prompt_tokens,
        completionTokens: chunk.usage.completion_tokens,
        totalTokens: chunk.usage.total_tokens,
      });
    }

    const choice = chunk.choices?.[0];
    if (!choice) continue;

    const text = choice.delta?.content ?? choice.message?.content ?? null;
    if (text) {
      events.push({ type: "text", text });
    }

    for (const tc of choice.delta?.tool_calls ?? []) {
      events.push({
        type: "tool_delta",
        index: tc.index,
        id: tc.id,
        name: tc.function?.name,
        arguments: tc.function?.arguments,
      });
    }

    if (choice.finish_reason != null) {
      events.push({ type: "finish", reason: choice.finish_reason });
    }
  }

  return { events, remaining };
}
