// SessionLoop: drives one conversation across many user goals.
//
// Flow per turn: user goal → model decision → if invocations, dispatch them,
//   ask for an answer from the results, resubmit without the catalog →
//   answer. One dispatch round per turn.

import type { Logger, Provider } from "./types";
import { ProtocolError, SessionBusyError, ok, err, toCrawlwiseError, type CrawlwiseError, type Result } from "./types";
import type { CapabilityRegistry } from "./capability-registry";
import { CapabilityInvoker } from "./capability-invoker";
import { ToolCallDispatcher } from "./dispatcher";
import type { EventBus } from "./events";
import { decide } from "./model-decision";
import {
  ConversationTranscript,
  assistantMessage,
  systemMessage,
  userMessage,
  type TranscriptTurn,
} from "./transcript";

export const DEFAULT_SYSTEM_PROMPT =
  "You are an agent that has access to an advanced web scraping tool, the tool provides you markdown text of a given site. " +
  "Please provide the user with the information they are looking for by using the search tool provided.";

export const DEFAULT_FOLLOW_UP_PROMPT = "Answer my previous query based on the search results.";

export type SessionState =
  | "awaiting_input"
  | "awaiting_model_decision"
  | "dispatching"
  | "awaiting_final_answer"
  | "answered";

export interface TurnInput {
  /** Natural-language question. */
  readonly goal: string;
  /** Candidate resource (usually a URL) the model may choose to crawl. */
  readonly resource: string;
}

export interface TurnAnswer {
  readonly text: string;
  readonly invocations: number;
  readonly durationMs: number;
}

/** The interactive surface the long-running loop reads from and writes to. */
export interface SessionIO {
  /** Next goal, or null when the user is done. */
  readTurn(): Promise<TurnInput | null>;
  answer(text: string): void | Promise<void>;
  report(error: CrawlwiseError): void | Promise<void>;
}

export interface SessionDeps {
  readonly provider: Provider;
  readonly registry: CapabilityRegistry;
  readonly logger: Logger;
  readonly eventBus?: EventBus;
  readonly systemPrompt?: string;
  readonly followUpPrompt?: string;
  readonly maxResultChars?: number;
}

export function composeGoal(input: TurnInput): string {
  return `${input.goal} this site might be a helpful resource: ${input.resource}`;
}

export class SessionLoop {
  readonly transcript: ConversationTranscript;
  private readonly dispatcher: ToolCallDispatcher;
  private readonly logger: Logger;
  private readonly followUpPrompt: string;
  private _state: SessionState = "awaiting_input";
  private turns = 0;

  constructor(private readonly deps: SessionDeps) {
    this.logger = deps.logger.child({ component: "SessionLoop" });
    this.followUpPrompt = deps.followUpPrompt ?? DEFAULT_FOLLOW_UP_PROMPT;
    this.transcript = new ConversationTranscript([systemMessage(deps.systemPrompt ?? DEFAULT_SYSTEM_PROMPT)]);
    this.dispatcher = new ToolCallDispatcher({
      registry: deps.registry,
      invoker: new CapabilityInvoker(deps.registry, deps.logger),
      logger: deps.logger,
      eventBus: deps.eventBus,
      maxResultChars: deps.maxResultChars,
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Run one turn to completion. Never throws: failures come back as err()
   * and leave the transcript as it was before the turn started.
   */
  async runTurn(input: TurnInput, options?: { signal?: AbortSignal }): Promise<Result<TurnAnswer, CrawlwiseError>> {
    if (this._state !== "awaiting_input") {
      return err(new SessionBusyError());
    }

    const turnNumber = ++this.turns;
    const started = Date.now();
    const turn = this.transcript.begin();
    this.deps.eventBus?.emit("turn:started", { turn: turnNumber, input });

    try {
      const answer = await this.drive(turn, input, options?.signal);
      turn.commit();
      this.transition("answered");

      const durationMs = Date.now() - started;
      this.deps.eventBus?.emit("turn:answered", {
        turn: turnNumber,
        text: answer.text,
        invocations: answer.invocations,
        durationMs,
      });
      return ok({ ...answer, durationMs });
    } catch (error) {
      const failure = toCrawlwiseError(error);
      this.logger.error("Turn failed", {
        turn: turnNumber,
        state: this._state,
        code: failure.code,
        error: failure.message,
        discardedMessages: turn.stagedCount,
      });
      this.deps.eventBus?.emit("turn:failed", { turn: turnNumber, error: failure });
      return err(failure);
    } finally {
      this.transition("awaiting_input");
    }
  }

  /**
   * Read goals until the surface runs dry. A failed turn is reported and
   * the loop moves on to the next goal, as it does when the surface cannot
   * print an outcome.
   */
  async run(io: SessionIO, options?: { signal?: AbortSignal }): Promise<void> {
    for (;;) {
      if (options?.signal?.aborted) return;
      const input = await io.readTurn();
      if (input === null) return;

      const result = await this.runTurn(input, options);
      try {
        if (result.ok) {
          await io.answer(result.value.text);
        } else {
          await io.report(result.error);
        }
      } catch (error) {
        const failure = toCrawlwiseError(error);
        this.logger.error("Could not deliver turn outcome", { code: failure.code, error: failure.message });
      }
    }
  }

  private async drive(
    turn: TranscriptTurn,
    input: TurnInput,
    signal: AbortSignal | undefined,
  ): Promise<{ text: string; invocations: number }> {
    turn.append(userMessage(composeGoal(input)));

    this.transition("awaiting_model_decision");
    const decision = await decide(this.deps.provider, turn.asList(), {
      signal,
      tools: this.deps.registry.size > 0 ? this.deps.registry.catalog() : undefined,
    });

    if (decision.type === "answer") {
      turn.append(assistantMessage(decision.text));
      return { text: decision.text, invocations: 0 };
    }

    turn.append(assistantMessage(decision.content, decision.requests));

    this.transition("dispatching");
    const results = await this.dispatcher.dispatch(decision.requests, turn, { signal });
    turn.append(userMessage(this.followUpPrompt));

    // No catalog on the resubmission: the model should only answer now.
    this.transition("awaiting_final_answer");
    const final = await decide(this.deps.provider, turn.asList(), { signal });
    if (final.type === "invocations") {
      throw new ProtocolError(
        `Model requested ${final.requests.length} capability invocation(s) while producing its final answer`,
      );
    }

    turn.append(assistantMessage(final.text));
    return { text: final.text, invocations: results.length };
  }

  private transition(to: SessionState): void {
    if (to === this._state) return;
    const from = this._state;
    this._state = to;
    this.logger.debug("State transition", { from, to });
    this.deps.eventBus?.emit("session:state", { from, to });
  }
}
