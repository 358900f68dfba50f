import { describe, it, expect } from "vitest";
import { classifyError, buildErrorHint } from "../errors";

function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

describe("classifyError", () => {
  it("returns 'cancelled' for AbortError", () => {
    expect(classifyError(abortError())).toBe("cancelled");
  });

  it("returns 'cancelled' for cancelled message", () => {
    expect(classifyError(new Error("Request cancelled"))).toBe("cancelled");
  });

  it.each([
    "connect ECONNREFUSED 127.0.0.1:8080",
    "read ECONNRESET",
    "getaddrinfo ENOTFOUND api.example.com",
    "connect ETIMEDOUT",
    "Network request failed",
    "fetch failed",
  ])("returns 'transient_network' for %s", (message) => {
    expect(classifyError(new Error(message))).toBe("transient_network");
  });

  it("returns 'auth_failed' for a 401 response", () => {
    expect(classifyError(new Error("openai API error: Status 401\nBody: {}"))).toBe("auth_failed");
  });

  it("returns 'auth_failed' for an invalid API key message", () => {
    expect(classifyError(new Error("Incorrect API key provided"))).toBe("auth_failed");
  });

  it("returns 'throttled' for a 429 response", () => {
    expect(classifyError(new Error("openai API error: Status 429\nBody: slow down"))).toBe("throttled");
  });

  it("returns 'context_length_exceeded' for context errors", () => {
    expect(classifyError(new Error("This model's maximum context length is 128000 tokens"))).toBe(
      "context_length_exceeded",
    );
  });

  it("returns 'invalid_request' for a 400 response", () => {
    expect(classifyError(new Error("openai API error: Status 400\nBody: {}"))).toBe("invalid_request");
  });

  it("returns 'unknown' for a 500 response", () => {
    expect(classifyError(new Error("openai API error: Status 500\nBody: Server Error"))).toBe("unknown");
  });

  it("returns 'unknown' for non-Error values", () => {
    expect(classifyError("boom")).toBe("unknown");
  });
});

describe("buildErrorHint", () => {
  it("points at the base URL for transport errors", () => {
    expect(buildErrorHint("transient_network", "http://localhost:8080/v1")).toBe(
      " (is http://localhost:8080/v1 reachable?)",
    );
  });

  it("points at the API key for auth errors", () => {
    expect(buildErrorHint("auth_failed", "https://api.openai.com/v1")).toBe(" (check OPENAI_API_KEY)");
  });

  it("is empty otherwise", () => {
    expect(buildErrorHint("throttled", "https://api.openai.com/v1")).toBe("");
  });
});
