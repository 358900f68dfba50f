#!/usr/bin/env tsx

import { createInterface } from "node:readline";
import { config as loadDotenv } from "dotenv";
import { ConsoleLogger, SimpleEventBus, loadConfig, stderrSink } from "@crawlwise/core";
import { CliError, USAGE, applyOverrides, parseArgs, type CliOpts } from "./args";
import { createSession } from "./session";
import { TerminalIO } from "./terminal";

async function main(): Promise<number> {
  let opts: CliOpts;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliError) {
      console.error(`Error: ${err.message}`);
      console.error("Run: crawlwise --help");
      return 1;
    }
    throw err;
  }

  if (opts.help) {
    console.log(USAGE);
    return 0;
  }

  loadDotenv();
  const config = loadConfig(applyOverrides(process.env, opts), { logLevel: "warn" });
  if (!config.ok) {
    console.error(`Error: ${config.error.message}`);
    return 1;
  }

  const logger = new ConsoleLogger(config.value.logLevel, { app: "crawlwise" }, stderrSink);
  const eventBus = new SimpleEventBus(logger);
  const session = createSession(config.value, logger, eventBus);

  const terminal = new TerminalIO(createInterface({ input: process.stdin, terminal: false }), process.stdout);
  terminal.watch(eventBus);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    controller.abort();
    terminal.close();
  });

  try {
    await session.run(terminal, { signal: controller.signal });
  } finally {
    terminal.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
