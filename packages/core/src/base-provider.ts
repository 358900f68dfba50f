// Abstract base class for model-service providers.
//
// Wraps the subclass's _chat() implementation and logs the token usage the
// service reports, noting at debug level when none arrives.

import type { Logger, Message, Provider, ProviderOptions, ProviderChunk } from "./types";

export abstract class AbstractProvider implements Provider {
  abstract readonly name: string;

  constructor(protected readonly logger?: Logger) {}

  async *chat(messages: readonly Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk> {
    let sawUsage = false;
    for await (const chunk of this._chat(messages, options)) {
      if (chunk.type === "usage") {
        sawUsage = true;
        this.logger?.debug("Model usage", { provider: this.name, ...chunk.usage });
      }
      yield chunk;
    }
    if (!sawUsage) {
      this.logger?.debug("Provider did not report usage", { provider: this.name });
    }
  }

  protected abstract _chat(
    messages: readonly Message[],
    options?: ProviderOptions,
  ): AsyncIterable<ProviderChunk>;
}
