// Configuration from environment variables + validation

import { type Result, ok, err, ConfigError, isLogLevel, LOG_LEVELS } from "./types";
import type { LogLevel } from "./types";

export interface CrawlwiseConfig {
  readonly logLevel: LogLevel;
  readonly model: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly name: string;
  };
  readonly crawl: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly limit: number;
    readonly pollIntervalMs: number;
  };
  readonly maxResultChars: number;
  readonly systemPrompt?: string;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): Result<string, ConfigError> {
  const value = env[key];
  if (value === undefined || value.trim() === "") {
    return err(new ConfigError(`Missing required env var: ${key}`));
  }
  return ok(value);
}

function optionalEnv(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function positiveNumber(env: Env, key: string, defaultValue: number, integer: boolean): Result<number, ConfigError> {
  const raw = env[key];
  if (raw === undefined || raw === "") return ok(defaultValue);
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    const kind = integer ? "a positive integer" : "a positive number";
    return err(new ConfigError(`Invalid ${key}: ${raw} (must be ${kind})`));
  }
  return ok(value);
}

/**
 * Load and validate configuration from environment variables.
 * Returns Result; never throws.
 */
export function loadConfig(env: Env = process.env, defaults: { logLevel?: LogLevel } = {}): Result<CrawlwiseConfig, ConfigError> {
  const openaiKey = requireEnv(env, "OPENAI_API_KEY");
  if (!openaiKey.ok) return openaiKey;

  const firecrawlKey = requireEnv(env, "FIRECRAWL_API_KEY");
  if (!firecrawlKey.ok) return firecrawlKey;

  const logLevel = optionalEnv(env, "LOG_LEVEL", defaults.logLevel ?? "info");
  if (!isLogLevel(logLevel)) {
    return err(new ConfigError(`Invalid LOG_LEVEL: ${logLevel} (must be one of: ${LOG_LEVELS.join(", ")})`));
  }

  const limit = positiveNumber(env, "CRAWL_LIMIT", 100, true);
  if (!limit.ok) return limit;

  const pollSeconds = positiveNumber(env, "CRAWL_POLL_INTERVAL_SECONDS", 30, false);
  if (!pollSeconds.ok) return pollSeconds;

  const maxResultChars = positiveNumber(env, "MAX_RESULT_CHARS", 50_000, true);
  if (!maxResultChars.ok) return maxResultChars;

  return ok({
    logLevel,
    model: {
      apiKey: openaiKey.value,
      baseUrl: optionalEnv(env, "OPENAI_BASE_URL", "https://api.openai.com/v1"),
      name: optionalEnv(env, "OPENAI_MODEL", "gpt-4o-mini"),
    },
    crawl: {
      apiKey: firecrawlKey.value,
      baseUrl: optionalEnv(env, "FIRECRAWL_BASE_URL", "https://api.firecrawl.dev"),
      limit: limit.value,
      pollIntervalMs: pollSeconds.value * 1000,
    },
    maxResultChars: maxResultChars.value,
    systemPrompt: env.SYSTEM_PROMPT || undefined,
  });
}
