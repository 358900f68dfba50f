// TerminalIO: the line-oriented surface the session loop reads goals from.

import type { Interface } from "node:readline";
import type { CrawlwiseError, EventBus, InvocationRequest, SessionIO, TurnInput } from "@crawlwise/core";

export interface Output {
  write(chunk: string): unknown;
}

/** The value of a `site` argument, when the payload carries one. */
export function describeTarget(args: unknown): string {
  if (typeof args === "object" && args !== null && "site" in args && typeof args.site === "string") {
    return args.site;
  }
  return "";
}

export class TerminalIO implements SessionIO {
  private readonly lines: AsyncIterator<string>;
  private readonly calling = new Map<string, InvocationRequest>();
  private closed = false;

  constructor(
    private readonly rl: Interface,
    private readonly output: Output,
  ) {
    this.lines = rl[Symbol.asyncIterator]();
  }

  /** Null once input ends (Ctrl-D or a closed pipe). */
  async readTurn(): Promise<TurnInput | null> {
    const resource = await this.ask("Enter a site to crawl: ");
    if (resource === null) return null;
    const goal = await this.ask("Enter a question: ");
    if (goal === null) return null;
    return { goal: goal.trim(), resource: resource.trim() };
  }

  answer(text: string): void {
    this.output.write(`\n${text}\n\n`);
  }

  report(error: CrawlwiseError): void {
    this.output.write(`An error occurred: ${error.message}\n`);
  }

  /** Print a line each time a capability hands results back to the model. */
  watch(events: EventBus): void {
    events.on("capability:calling", ({ request }) => {
      this.calling.set(request.id, request);
    });
    events.on("capability:result", ({ result }) => {
      const request = this.calling.get(result.invocationId);
      this.calling.delete(result.invocationId);
      if (!result.outcome.ok) return;
      const target = request ? describeTarget(request.args) : "";
      this.output.write(`Context updated with: ${result.name}: ${target}\n`);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rl.close();
  }

  private async ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines.next();
    if (next.done) {
      this.output.write("\n");
      return null;
    }
    return next.value;
  }
}
