// ModelDecision: collapses a provider's chunk stream into either a direct
// answer or a batch of invocation requests.

import type { InvocationRequest, Message, Provider, ProviderOptions, ProviderUsage } from "./types";
import { CrawlwiseError, ModelServiceError } from "./types";

export type ModelDecision =
  | { readonly type: "answer"; readonly text: string; readonly usage?: ProviderUsage }
  | {
      readonly type: "invocations";
      /** Any text the model produced alongside its requests. */
      readonly content: string;
      readonly requests: readonly InvocationRequest[];
      readonly usage?: ProviderUsage;
    };

/**
 * Submit the messages and wait for the complete response.
 * Errors surface as ModelServiceError; other CrawlwiseErrors pass through.
 */
export async function decide(
  provider: Provider,
  messages: readonly Message[],
  options?: ProviderOptions,
): Promise<ModelDecision> {
  let text = "";
  let usage: ProviderUsage | undefined;
  const requests: InvocationRequest[] = [];

  try {
    for await (const chunk of provider.chat(messages, options)) {
      if (chunk.type === "text") {
        text += chunk.text;
      } else if (chunk.type === "tool_call") {
        requests.push(chunk.toolCall);
      } else {
        usage = chunk.usage;
      }
    }
  } catch (error) {
    if (error instanceof CrawlwiseError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelServiceError(`${provider.name} error: ${message}`, "unknown", error);
  }

  if (requests.length > 0) {
    return { type: "invocations", content: text, requests, usage };
  }
  return { type: "answer", text, usage };
}
