import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { SessionLoop, composeGoal, DEFAULT_FOLLOW_UP_PROMPT, type SessionIO, type SessionState } from "../session-loop";
import { CapabilityRegistry, type CapabilityHandler } from "../capability-registry";
import { SimpleEventBus } from "../events";
import { MockProvider } from "../__fixtures__/mock-provider";
import {
  ConsoleLogger,
  ModelServiceError,
  ProtocolError,
  SessionBusyError,
  UnknownCapabilityError,
  type CrawlwiseError,
  type Message,
  type ToolMessage,
} from "../types";

const input = { goal: "How many pages are there?", resource: "example.com" };

function roles(messages: readonly Message[]): string[] {
  return messages.map((m) => m.role);
}

describe("SessionLoop", () => {
  const logger = new ConsoleLogger("error");
  let provider: MockProvider;
  let registry: CapabilityRegistry;
  let handler: Mock<CapabilityHandler>;
  let eventBus: SimpleEventBus;
  let session: SessionLoop;

  beforeEach(() => {
    provider = new MockProvider();
    registry = new CapabilityRegistry();
    handler = vi.fn<CapabilityHandler>(async () => ({ pages: 3 }));
    registry.register(
      {
        name: "fetch",
        description: "Fetch a site",
        parameters: { site: { type: "string", description: "The url to crawl" } },
        required: ["site"],
      },
      handler,
    );
    eventBus = new SimpleEventBus(logger);
    session = new SessionLoop({ provider, registry, logger, eventBus, systemPrompt: "primer" });
  });

  it("starts with the system prompt and no pending turn", () => {
    expect(session.state).toBe("awaiting_input");
    expect(session.transcript.asList().map((m) => [m.role, m.content])).toEqual([["system", "primer"]]);
  });

  it("combines goal and resource into one user message", () => {
    expect(composeGoal(input)).toBe("How many pages are there? this site might be a helpful resource: example.com");
  });

  describe("direct answer", () => {
    it("answers without dispatching", async () => {
      provider.setResponses([{ text: "No tool needed." }]);

      const result = await session.runTurn(input);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.text).toBe("No tool needed.");
        expect(result.value.invocations).toBe(0);
      }
      expect(handler).not.toHaveBeenCalled();
      expect(provider.callHistory).toHaveLength(1);
      expect(roles(session.transcript.asList())).toEqual(["system", "user", "assistant"]);
    });

    it("offers the catalog on the decision call", async () => {
      provider.setResponses([{ text: "ok" }]);
      await session.runTurn(input);

      expect(provider.lastCall()?.options?.tools?.map((t) => t.name)).toEqual(["fetch"]);
      expect(provider.lastCall()?.messages.at(-1)?.content).toBe(composeGoal(input));
    });
  });

  describe("with invocations", () => {
    beforeEach(() => {
      provider.setResponses([
        { calls: [{ id: "call-1", name: "fetch", args: { site: "example.com" } }] },
        { text: "There are three pages." },
      ]);
    });

    it("dispatches, asks for an answer, and resubmits without the catalog", async () => {
      const result = await session.runTurn(input);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.text).toBe("There are three pages.");
        expect(result.value.invocations).toBe(1);
      }
      expect(provider.callHistory).toHaveLength(2);
      expect(provider.callHistory[1].options?.tools).toBeUndefined();
      expect(roles(provider.callHistory[1].messages)).toEqual(["system", "user", "assistant", "tool", "user"]);
      expect(provider.callHistory[1].messages.at(-1)?.content).toBe(DEFAULT_FOLLOW_UP_PROMPT);
    });

    it("records the request, the result, and the answer in the transcript", async () => {
      await session.runTurn(input);

      const messages = session.transcript.asList();
      expect(roles(messages)).toEqual(["system", "user", "assistant", "tool", "user", "assistant"]);

      const decision = messages[2];
      expect(decision.role === "assistant" && decision.toolCalls?.map((c) => c.id)).toEqual(["call-1"]);

      const tool = messages.filter((m): m is ToolMessage => m.role === "tool");
      expect(tool).toHaveLength(1);
      expect(tool[0].toolCallId).toBe("call-1");
      expect(tool[0].content).toBe('{"pages":3}');
      expect(messages[5].content).toBe("There are three pages.");
    });

    it("still answers when the external call fails", async () => {
      handler.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND api.example"));

      const result = await session.runTurn(input);

      expect(result.ok).toBe(true);
      const tool = session.transcript.asList().filter((m): m is ToolMessage => m.role === "tool");
      expect(tool).toHaveLength(1);
      expect(tool[0].content).toBe('Error: Capability "fetch" failed: getaddrinfo ENOTFOUND api.example');
      expect(tool[0].isError).toBe(true);
    });

    it("walks the full state sequence", async () => {
      const states: SessionState[] = [];
      eventBus.on("session:state", ({ to }) => { states.push(to); });

      await session.runTurn(input);

      expect(states).toEqual([
        "awaiting_model_decision",
        "dispatching",
        "awaiting_final_answer",
        "answered",
        "awaiting_input",
      ]);
      expect(session.state).toBe("awaiting_input");
    });
  });

  describe("failures", () => {
    it("reports a model failure and rolls back the turn", async () => {
      provider.setResponses([{ error: new ModelServiceError("mock error: 503", "unknown") }]);

      const result = await session.runTurn(input);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ModelServiceError);
        expect(result.error.message).toBe("mock error: 503");
      }
      expect(roles(session.transcript.asList())).toEqual(["system"]);
      expect(session.state).toBe("awaiting_input");
    });

    it("fails the turn on an unknown capability without invoking anything", async () => {
      provider.setResponses([{ calls: [{ id: "c1", name: "teleport", args: {} }] }]);

      const result = await session.runTurn(input);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(UnknownCapabilityError);
      expect(handler).not.toHaveBeenCalled();
      expect(roles(session.transcript.asList())).toEqual(["system"]);
    });

    it("treats invocations during the final answer as a protocol error", async () => {
      provider.setResponses([
        { calls: [{ id: "c1", name: "fetch", args: { site: "example.com" } }] },
        { calls: [{ id: "c2", name: "fetch", args: { site: "example.com" } }] },
      ]);

      const result = await session.runTurn(input);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ProtocolError);
        expect(result.error.message).toBe(
          "Model requested 1 capability invocation(s) while producing its final answer",
        );
      }
      expect(handler).toHaveBeenCalledTimes(1);
      expect(session.transcript.length).toBe(1);
    });

    it("emits turn:failed with the error", async () => {
      const failed: CrawlwiseError[] = [];
      eventBus.on("turn:failed", ({ error }) => { failed.push(error); });
      provider.setResponses([{ error: new Error("boom") }]);

      await session.runTurn(input);

      expect(failed).toHaveLength(1);
      expect(failed[0].message).toBe("mock error: boom");
    });

    it("refuses a second turn while one is running", async () => {
      provider.setResponses([{ text: "first" }]);

      const first = session.runTurn(input);
      const second = await session.runTurn(input);

      expect(second.ok).toBe(false);
      if (!second.ok) expect(second.error).toBeInstanceOf(SessionBusyError);
      const done = await first;
      expect(done.ok).toBe(true);
    });
  });

  describe("across turns", () => {
    it("replays earlier turns to the model", async () => {
      provider.setResponses([{ text: "first answer" }, { text: "second answer" }]);

      await session.runTurn(input);
      await session.runTurn({ goal: "And the title?", resource: "example.com" });

      expect(roles(provider.callHistory[1].messages)).toEqual(["system", "user", "assistant", "user"]);
      expect(provider.callHistory[1].messages[2].content).toBe("first answer");
    });

    it("keeps earlier turns after a failed one", async () => {
      provider.setResponses([{ text: "first answer" }, { error: new Error("down") }, { text: "third answer" }]);

      await session.runTurn(input);
      await session.runTurn(input);
      await session.runTurn(input);

      expect(session.transcript.asList().map((m) => m.content)).toEqual([
        "primer",
        composeGoal(input),
        "first answer",
        composeGoal(input),
        "third answer",
      ]);
    });
  });

  describe("run", () => {
    it("answers and reports until input runs out", async () => {
      provider.setResponses([{ error: new Error("down") }, { text: "recovered" }]);
      const inputs = [input, { goal: "Again?", resource: "example.org" }];
      const answers: string[] = [];
      const reports: string[] = [];
      const io: SessionIO = {
        readTurn: async () => inputs.shift() ?? null,
        answer: (text) => { answers.push(text); },
        report: (error) => { reports.push(error.message); },
      };

      await session.run(io);

      expect(reports).toEqual(["mock error: down"]);
      expect(answers).toEqual(["recovered"]);
    });

    it("keeps reading goals when printing an outcome throws", async () => {
      provider.setResponses([{ text: "first" }, { text: "second" }]);
      const inputs = [input, { goal: "Again?", resource: "example.org" }];
      const readTurn = vi.fn(async () => inputs.shift() ?? null);
      const answer = vi.fn<(text: string) => void>();
      answer.mockImplementationOnce(() => {
        throw new Error("EPIPE");
      });

      await session.run({ readTurn, answer, report: () => {} });

      expect(readTurn).toHaveBeenCalledTimes(3);
      expect(answer.mock.calls).toEqual([["first"], ["second"]]);
    });

    it("stops before reading when the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const readTurn = vi.fn(async () => input);

      await session.run({ readTurn, answer: () => {}, report: () => {} }, { signal: controller.signal });

      expect(readTurn).not.toHaveBeenCalled();
    });
  });
});
