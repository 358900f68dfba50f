import { LOG_LEVELS, isLogLevel, type LogLevel } from "@crawlwise/core";

export const USAGE = `
crawlwise: ask questions about a website; the model crawls it when it needs to

Usage:
  crawlwise [options]

Each turn asks for a site to crawl and a question about it.
End the session with Ctrl-D.

Options:
  --model <id>          Chat model (default: OPENAI_MODEL or gpt-4o-mini)
  --log-level <level>   ${LOG_LEVELS.join("|")} (default: LOG_LEVEL or warn)
  --help, -h            Show this help

Environment:
  OPENAI_API_KEY        Required
  FIRECRAWL_API_KEY     Required
  A .env file in the working directory is loaded first.
`.trim();

export interface CliOpts {
  model?: string;
  logLevel?: LogLevel;
  help: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export function parseArgs(args: string[]): CliOpts {
  const opts: CliOpts = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      opts.help = true;
    } else if (arg === "--model" && i + 1 < args.length) {
      opts.model = args[++i];
    } else if (arg === "--log-level" && i + 1 < args.length) {
      const level = args[++i];
      if (!isLogLevel(level)) {
        throw new CliError(`Invalid --log-level: ${level}. Use: ${LOG_LEVELS.join(", ")}`);
      }
      opts.logLevel = level;
    } else {
      throw new CliError(`Unknown argument: ${arg}`);
    }
  }

  return opts;
}

/** Flags win over the environment. */
export function applyOverrides(
  env: Record<string, string | undefined>,
  opts: CliOpts,
): Record<string, string | undefined> {
  return {
    ...env,
    ...(opts.model && { OPENAI_MODEL: opts.model }),
    ...(opts.logLevel && { LOG_LEVEL: opts.logLevel }),
  };
}
