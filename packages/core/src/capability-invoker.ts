// CapabilityInvoker: validates arguments and runs one capability, folding
// every handler failure into the InvocationResult.

import type { InvocationRequest, InvocationResult, Logger } from "./types";
import { ArgumentShapeError, InvocationFailure, ok, err } from "./types";
import type { CapabilityRegistry } from "./capability-registry";
import { parseArguments, type CapabilityArgs } from "./capability";

export class CapabilityInvoker {
  private readonly logger: Logger;

  constructor(
    private readonly registry: CapabilityRegistry,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "CapabilityInvoker" });
  }

  /**
   * Invoke a capability by name with the model's raw argument payload.
   * Throws UnknownCapabilityError for unregistered names; any other failure,
   * including a malformed payload, is returned inside the result.
   */
  async invoke(request: InvocationRequest, options?: { signal?: AbortSignal }): Promise<InvocationResult> {
    const { descriptor, handler } = this.registry.resolve(request.name);
    const base = { invocationId: request.id, name: request.name };

    let args: CapabilityArgs;
    try {
      args = parseArguments(descriptor, request.args);
    } catch (error) {
      if (!(error instanceof ArgumentShapeError)) throw error;
      this.logger.warn("Rejected capability arguments", {
        capability: request.name,
        invocationId: request.id,
        issues: error.issues,
      });
      return { ...base, outcome: err(error) };
    }

    const started = Date.now();
    this.logger.info("Invoking capability", {
      capability: request.name,
      invocationId: request.id,
      args: args.toJSON(),
    });

    try {
      const value = await handler(args, {
        logger: this.logger.child({ capability: request.name, invocationId: request.id }),
        signal: options?.signal,
      });
      this.logger.debug("Capability completed", {
        capability: request.name,
        invocationId: request.id,
        durationMs: Date.now() - started,
      });
      return { ...base, outcome: ok(value) };
    } catch (error) {
      const failure = error instanceof ArgumentShapeError ? error : new InvocationFailure(request.name, error);
      this.logger.warn("Capability failed", {
        capability: request.name,
        invocationId: request.id,
        durationMs: Date.now() - started,
        error: failure.message,
      });
      return { ...base, outcome: err(failure) };
    }
  }
}
