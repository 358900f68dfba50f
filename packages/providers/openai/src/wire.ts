// Wire types for the OpenAI Chat Completions API (snake_case).

import { z } from "zod";

export interface WireToolDef {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export interface WireRequest {
  model: string;
  messages: WireMessage[];
  stream: true;
  stream_options: { include_usage: boolean };
  tools?: WireToolDef[];
}

const wireDeltaSchema = z.object({
  content: z.string().nullish(),
  tool_calls: z
    .array(
      z.object({
        index: z.number(),
        id: z.string().optional(),
        function: z.object({ name: z.string().optional(), arguments: z.string().optional() }).optional(),
      }),
    )
    .nullish(),
});

// Some proxies emit message instead of delta inside SSE chunks
const wireChoiceSchema = z.object({
  delta: wireDeltaSchema.optional(),
  message: z.object({ content: z.string().nullish() }).optional(),
  finish_reason: z.string().nullish(),
});

const wireUsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

/** One `data:` payload of the streaming response. Unknown fields are dropped. */
export const wireChunkSchema = z.object({
  choices: z.array(wireChoiceSchema).optional(),
  usage: wireUsageSchema.nullish(),
});

export type WireDelta = z.infer<typeof wireDeltaSchema>;
export type WireChoice = z.infer<typeof wireChoiceSchema>;
export type WireUsage = z.infer<typeof wireUsageSchema>;
export type WireChunk = z.infer<typeof wireChunkSchema>;
