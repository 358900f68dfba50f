import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { ToolCallDispatcher, serializeOutcome } from "../dispatcher";
import { CapabilityRegistry, type CapabilityHandler } from "../capability-registry";
import { CapabilityInvoker } from "../capability-invoker";
import { SimpleEventBus } from "../events";
import { ConversationTranscript, assistantMessage, systemMessage, userMessage } from "../transcript";
import {
  ConsoleLogger,
  ProtocolError,
  UnknownCapabilityError,
  type CapabilityDescriptor,
  type InvocationRequest,
  type ToolMessage,
} from "../types";
import type { CrawlwiseEvents } from "../events";

const fetchDef: CapabilityDescriptor = {
  name: "fetch",
  description: "Fetch a site",
  parameters: { site: { type: "string", description: "The url to crawl" } },
  required: ["site"],
};

function toolMessages(transcript: ConversationTranscript): ToolMessage[] {
  return transcript.asList().filter((m): m is ToolMessage => m.role === "tool");
}

describe("ToolCallDispatcher", () => {
  const logger = new ConsoleLogger("error");
  let registry: CapabilityRegistry;
  let handler: Mock<CapabilityHandler>;
  let transcript: ConversationTranscript;
  let dispatcher: ToolCallDispatcher;

  function request(requests: InvocationRequest[]): InvocationRequest[] {
    transcript.append(assistantMessage("", requests));
    return requests;
  }

  beforeEach(() => {
    registry = new CapabilityRegistry();
    handler = vi.fn<CapabilityHandler>(async () => ({ pages: 3 }));
    registry.register(fetchDef, handler);
    transcript = new ConversationTranscript([systemMessage("primer"), userMessage("question")]);
    dispatcher = new ToolCallDispatcher({ registry, invoker: new CapabilityInvoker(registry, logger), logger });
  });

  it("appends one tool message encoding the success payload", async () => {
    const requests = request([{ id: "call-1", name: "fetch", args: { site: "example.com" } }]);
    const before = transcript.length;

    await dispatcher.dispatch(requests, transcript);

    expect(transcript.length).toBe(before + 1);
    const [tool] = toolMessages(transcript);
    expect(tool.toolCallId).toBe("call-1");
    expect(tool.toolName).toBe("fetch");
    expect(tool.content).toBe('{"pages":3}');
    expect(tool.isError).toBeUndefined();
  });

  it("appends a failure description when the external call raises", async () => {
    handler.mockRejectedValueOnce(new TypeError("fetch failed"));
    const requests = request([{ id: "call-1", name: "fetch", args: { site: "example.com" } }]);

    const results = await dispatcher.dispatch(requests, transcript);

    const [tool] = toolMessages(transcript);
    expect(tool.content).toBe('Error: Capability "fetch" failed: fetch failed');
    expect(tool.isError).toBe(true);
    expect(results[0].outcome.ok).toBe(false);
  });

  it("produces N tool messages in request order despite failures", async () => {
    handler.mockImplementation(async (args) => {
      const site = args.string("site");
      if (site === "b.test") throw new Error("remote rejected");
      return `crawled ${site}`;
    });
    const requests = request([
      { id: "c1", name: "fetch", args: { site: "a.test" } },
      { id: "c2", name: "fetch", args: { site: "b.test" } },
      { id: "c3", name: "fetch", args: {} },
      { id: "c4", name: "fetch", args: { site: "d.test" } },
    ]);

    await dispatcher.dispatch(requests, transcript);

    expect(toolMessages(transcript).map((m) => [m.toolCallId, m.content])).toEqual([
      ["c1", "crawled a.test"],
      ["c2", 'Error: Capability "fetch" failed: remote rejected'],
      ["c3", 'Error: Invalid arguments for "fetch": missing required parameter "site"'],
      ["c4", "crawled d.test"],
    ]);
    expect(handler).toHaveBeenCalledTimes(3);
  });

  it("runs invocations one after another", async () => {
    const order: string[] = [];
    handler.mockImplementation(async (args) => {
      const site = args.string("site");
      order.push(`start ${site}`);
      await new Promise((resolve) => setTimeout(resolve, site === "slow.test" ? 20 : 1));
      order.push(`end ${site}`);
      return site;
    });
    const requests = request([
      { id: "c1", name: "fetch", args: { site: "slow.test" } },
      { id: "c2", name: "fetch", args: { site: "fast.test" } },
    ]);

    await dispatcher.dispatch(requests, transcript);

    expect(order).toEqual(["start slow.test", "end slow.test", "start fast.test", "end fast.test"]);
  });

  it("refuses an invocation no assistant message requested", async () => {
    await expect(
      dispatcher.dispatch([{ id: "orphan", name: "fetch", args: { site: "example.com" } }], transcript),
    ).rejects.toBeInstanceOf(ProtocolError);

    expect(toolMessages(transcript)).toEqual([]);
    expect(handler).not.toHaveBeenCalled();
  });

  it("refuses a repeated invocation id within a batch", async () => {
    const call = { id: "same", name: "fetch", args: { site: "example.com" } };
    transcript.append(assistantMessage("", [call]));

    await expect(dispatcher.dispatch([call, call], transcript)).rejects.toThrow(
      'Invocation "same" was not requested by a preceding assistant message or is repeated',
    );
    expect(handler).not.toHaveBeenCalled();
  });

  it("refuses to answer an invocation twice", async () => {
    const requests = request([{ id: "c1", name: "fetch", args: { site: "example.com" } }]);
    await dispatcher.dispatch(requests, transcript);

    await expect(dispatcher.dispatch(requests, transcript)).rejects.toBeInstanceOf(ProtocolError);
    expect(toolMessages(transcript)).toHaveLength(1);
  });

  it("rejects the whole batch when a name is unknown, before invoking anything", async () => {
    const requests = request([
      { id: "c1", name: "fetch", args: { site: "example.com" } },
      { id: "c2", name: "teleport", args: {} },
    ]);

    await expect(dispatcher.dispatch(requests, transcript)).rejects.toBeInstanceOf(UnknownCapabilityError);
    expect(handler).not.toHaveBeenCalled();
    expect(toolMessages(transcript)).toEqual([]);
  });

  it("truncates oversized results", async () => {
    const small = new ToolCallDispatcher({
      registry,
      invoker: new CapabilityInvoker(registry, logger),
      logger,
      maxResultChars: 10,
    });
    handler.mockResolvedValueOnce("x".repeat(25));
    const requests = request([{ id: "c1", name: "fetch", args: { site: "example.com" } }]);

    await small.dispatch(requests, transcript);

    expect(toolMessages(transcript)[0].content).toBe("xxxxxxxxxx\n[truncated]");
  });

  it("records a result that cannot be encoded as that invocation's failure", async () => {
    handler.mockResolvedValueOnce({ n: 1n });
    handler.mockResolvedValueOnce("ok");
    const requests = request([
      { id: "c1", name: "fetch", args: { site: "a.test" } },
      { id: "c2", name: "fetch", args: { site: "b.test" } },
    ]);

    const results = await dispatcher.dispatch(requests, transcript);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(toolMessages(transcript).map((m) => [m.toolCallId, m.content, m.isError])).toEqual([
      ["c1", 'Error: Capability "fetch" failed: result could not be serialized: Do not know how to serialize a BigInt', true],
      ["c2", "ok", undefined],
    ]);
    expect(results.map((r) => r.outcome.ok)).toEqual([false, true]);
  });

  it("does not split a surrogate pair when truncating", async () => {
    const small = new ToolCallDispatcher({
      registry,
      invoker: new CapabilityInvoker(registry, logger),
      logger,
      maxResultChars: 10,
    });
    handler.mockResolvedValueOnce("x".repeat(9) + "\u{1F600}tail");
    const requests = request([{ id: "c1", name: "fetch", args: { site: "example.com" } }]);

    await small.dispatch(requests, transcript);

    expect(toolMessages(transcript)[0].content).toBe("xxxxxxxxx\n[truncated]");
  });

  it("emits calling and result events per invocation", async () => {
    const bus = new SimpleEventBus(logger);
    const calling: CrawlwiseEvents["capability:calling"][] = [];
    const results: CrawlwiseEvents["capability:result"][] = [];
    bus.on("capability:calling", (e) => { calling.push(e); });
    bus.on("capability:result", (e) => { results.push(e); });
    const withEvents = new ToolCallDispatcher({
      registry,
      invoker: new CapabilityInvoker(registry, logger),
      logger,
      eventBus: bus,
    });
    const requests = request([{ id: "c1", name: "fetch", args: { site: "example.com" } }]);

    await withEvents.dispatch(requests, transcript);

    expect(calling.map((e) => e.request.id)).toEqual(["c1"]);
    expect(results).toHaveLength(1);
    expect(results[0].result.outcome).toEqual({ ok: true, value: { pages: 3 } });
    expect(results[0].durationMs).toBeGreaterThanOrEqual(0);
  });
});

describe("serializeOutcome", () => {
  it("passes strings through unchanged", () => {
    expect(serializeOutcome({ invocationId: "a", name: "f", outcome: { ok: true, value: "plain" } })).toBe("plain");
  });

  it("encodes structured payloads as JSON", () => {
    expect(
      serializeOutcome({ invocationId: "a", name: "f", outcome: { ok: true, value: { status: "completed", pages: [] } } }),
    ).toBe('{"status":"completed","pages":[]}');
  });
});
