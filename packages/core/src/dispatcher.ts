// ToolCallDispatcher: runs a batch of model-requested invocations and records
// one tool message per request, in request order.

import type { InvocationRequest, InvocationResult, Logger } from "./types";
import { InvocationFailure, ProtocolError, err } from "./types";
import type { CapabilityRegistry } from "./capability-registry";
import type { CapabilityInvoker } from "./capability-invoker";
import type { EventBus } from "./events";
import { pendingInvocationIds, toolMessage, type TranscriptWriter } from "./transcript";

export const DEFAULT_MAX_RESULT_CHARS = 50_000;

export interface DispatcherDeps {
  readonly registry: CapabilityRegistry;
  readonly invoker: CapabilityInvoker;
  readonly logger: Logger;
  readonly eventBus?: EventBus;
  readonly maxResultChars?: number;
}

/**
 * Render an outcome as tool-message text. Strings pass through, other
 * success values become JSON, failures read "Error: <message>".
 */
export function serializeOutcome(result: InvocationResult, maxChars = DEFAULT_MAX_RESULT_CHARS): string {
  let content: string;
  if (result.outcome.ok) {
    const value = result.outcome.value;
    content = typeof value === "string" ? value : (JSON.stringify(value) ?? "null");
  } else {
    content = `Error: ${result.outcome.error.message}`;
  }

  if (content.length > maxChars) {
    content = content.slice(0, truncationPoint(content, maxChars)) + "\n[truncated]";
  }
  return content;
}

// Back off one unit rather than cut a surrogate pair in half
function truncationPoint(content: string, maxChars: number): number {
  const last = content.charCodeAt(maxChars - 1);
  return last >= 0xd800 && last <= 0xdbff ? maxChars - 1 : maxChars;
}

export class ToolCallDispatcher {
  private readonly logger: Logger;
  private readonly maxResultChars: number;

  constructor(private readonly deps: DispatcherDeps) {
    this.logger = deps.logger.child({ component: "ToolCallDispatcher" });
    this.maxResultChars = deps.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
  }

  /**
   * Invoke every request and append its tool message to the transcript.
   *
   * The whole batch is checked first: each id must be awaiting an answer in
   * the transcript and each name must be registered. A violation throws
   * before any implementation runs. After that, a failing invocation only
   * affects its own tool message.
   */
  async dispatch(
    requests: readonly InvocationRequest[],
    transcript: TranscriptWriter,
    options?: { signal?: AbortSignal },
  ): Promise<InvocationResult[]> {
    this.checkBatch(requests, transcript);

    const results: InvocationResult[] = [];
    for (const request of requests) {
      this.deps.eventBus?.emit("capability:calling", { request });

      const started = Date.now();
      const { result, content } = this.render(await this.deps.invoker.invoke(request, options));

      transcript.append(toolMessage(request.id, request.name, content, !result.outcome.ok));
      results.push(result);

      this.deps.eventBus?.emit("capability:result", { result, durationMs: Date.now() - started });
      this.logger.debug("Tool result appended", {
        invocationId: request.id,
        capability: request.name,
        isError: !result.outcome.ok,
        contentLength: content.length,
        contentPreview: content.slice(0, 200),
      });
    }

    return results;
  }

  /** A success value that cannot be encoded becomes that invocation's failure. */
  private render(result: InvocationResult): { result: InvocationResult; content: string } {
    try {
      return { result, content: serializeOutcome(result, this.maxResultChars) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn("Capability result could not be serialized", {
        invocationId: result.invocationId,
        capability: result.name,
        error: reason,
      });
      const cause = new Error(`result could not be serialized: ${reason}`, { cause: error });
      const failed: InvocationResult = { ...result, outcome: err(new InvocationFailure(result.name, cause)) };
      return { result: failed, content: serializeOutcome(failed, this.maxResultChars) };
    }
  }

  private checkBatch(requests: readonly InvocationRequest[], transcript: TranscriptWriter): void {
    const pending = new Set(pendingInvocationIds(transcript.asList()));
    for (const request of requests) {
      if (!pending.delete(request.id)) {
        throw new ProtocolError(
          `Invocation "${request.id}" was not requested by a preceding assistant message or is repeated`,
        );
      }
      this.deps.registry.resolve(request.name);
    }
  }
}
