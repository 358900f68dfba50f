// Error classification for the Chat Completions provider.
//
// Split into two categories:
//   Transport errors: connectivity problems (DNS, refused connection, timeout)
//   Service errors: the server responded but rejected the request (auth, rate limit, etc.)

import type { ProviderErrorCode } from "@crawlwise/core";

/**
 * Map a caught error to a normalized ProviderErrorCode.
 * Handles both HTTP response errors (message contains status code) and
 * network-level errors (ECONNREFUSED, etc.).
 */
export function classifyError(err: unknown): ProviderErrorCode {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    const name = err.name.toLowerCase();

    // Cancellation first: AbortError is not a transport failure
    if (name === "aborterror" || msg.includes("aborted") || msg.includes("cancelled")) {
      return "cancelled";
    }

    if (
      msg.includes("econnrefused") ||
      msg.includes("econnreset") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("network") ||
      msg.includes("fetch failed")
    ) {
      return "transient_network";
    }

    if (
      msg.includes("api key") ||
      msg.includes("unauthorized") ||
      msg.includes("forbidden") ||
      msg.includes("status 401") ||
      msg.includes("status 403")
    ) {
      return "auth_failed";
    }

    if (msg.includes("rate limit") || msg.includes("status 429") || msg.includes("quota")) {
      return "throttled";
    }

    if (msg.includes("context length") || msg.includes("context_length") || msg.includes("too long")) {
      return "context_length_exceeded";
    }

    if (msg.includes("invalid") || msg.includes("status 400") || msg.includes("bad request")) {
      return "invalid_request";
    }
  }
  return "unknown";
}

/** Short hint appended to the error message for the failures a user can fix. */
export function buildErrorHint(code: ProviderErrorCode, baseUrl: string): string {
  if (code === "transient_network") {
    return ` (is ${baseUrl} reachable?)`;
  }
  if (code === "auth_failed") {
    return " (check OPENAI_API_KEY)";
  }
  return "";
}
