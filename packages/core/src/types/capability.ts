// Capability system types -- descriptors, invocation requests, results

import type { CrawlwiseError, Result } from "./errors";

export type ParameterType = "string" | "number" | "integer" | "boolean" | "object" | "array";

export interface ParameterSpec {
  readonly type: ParameterType;
  readonly description: string;
}

/**
 * Declarative schema advertising one capability to the model.
 * Every name in `required` must be a key of `parameters`.
 */
export interface CapabilityDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  readonly required: readonly string[];
}

/**
 * A capability invocation requested by the model.
 * `args` is the raw payload: normally a parsed JSON object, but it stays
 * whatever the model sent until the invoker validates it.
 */
export interface InvocationRequest {
  readonly id: string;
  readonly name: string;
  readonly args: unknown;
}

/** Outcome of one invocation. Failures are carried, never thrown. */
export interface InvocationResult {
  readonly invocationId: string;
  readonly name: string;
  readonly outcome: Result<unknown, CrawlwiseError>;
}
