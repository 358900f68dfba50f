// Test fixture: mock provider that replays one scripted response per call

import type { InvocationRequest, Message, Provider, ProviderOptions, ProviderChunk } from "../types";

export type ScriptedResponse =
  | { readonly text: string }
  | { readonly calls: readonly InvocationRequest[]; readonly text?: string }
  | { readonly error: Error };

export class MockProvider implements Provider {
  readonly name = "mock";
  public callHistory: { messages: Message[]; options?: ProviderOptions }[] = [];

  constructor(private responses: ScriptedResponse[] = [{ text: "Hello from mock provider." }]) {}

  async *chat(messages: readonly Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk> {
    this.callHistory.push({ messages: [...messages], options });

    const response = this.responses.shift();
    if (!response) {
      throw new Error("MockProvider ran out of scripted responses");
    }
    if ("error" in response) {
      throw response.error;
    }

    const text = response.text ?? "";
    for (const word of text.split(/(?<= )/)) {
      if (options?.signal?.aborted) return;
      if (word) yield { type: "text", text: word };
    }

    if ("calls" in response) {
      for (const toolCall of response.calls) {
        yield { type: "tool_call", toolCall };
      }
    }

    yield { type: "usage", usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } };
  }

  /** Queue responses for the next calls. */
  setResponses(responses: ScriptedResponse[]): void {
    this.responses = responses;
  }

  /** Get the request from the last call. */
  lastCall(): { messages: Message[]; options?: ProviderOptions } | undefined {
    return this.callHistory.at(-1);
  }
}
