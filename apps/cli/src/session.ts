// Process wiring: config → provider, crawl client, registry → SessionLoop.

import { SessionLoop, type CrawlwiseConfig, type EventBus, type Logger, type Provider } from "@crawlwise/core";
import { OpenAIProvider } from "@crawlwise/provider-openai";
import { FirecrawlClient } from "@crawlwise/tool-firecrawl";
import { buildCapabilityRegistry, type Crawler } from "./capabilities";

export interface SessionOverrides {
  provider?: Provider;
  crawler?: Crawler;
}

export function createSession(
  config: CrawlwiseConfig,
  logger: Logger,
  eventBus?: EventBus,
  overrides: SessionOverrides = {},
): SessionLoop {
  const provider =
    overrides.provider ??
    new OpenAIProvider({
      apiKey: config.model.apiKey,
      baseUrl: config.model.baseUrl,
      model: config.model.name,
      logger,
    });

  const crawler =
    overrides.crawler ??
    new FirecrawlClient({
      apiKey: config.crawl.apiKey,
      baseUrl: config.crawl.baseUrl,
      limit: config.crawl.limit,
      pollIntervalMs: config.crawl.pollIntervalMs,
      logger,
    });

  return new SessionLoop({
    provider,
    registry: buildCapabilityRegistry(crawler, logger),
    logger,
    eventBus,
    systemPrompt: config.systemPrompt,
    maxResultChars: config.maxResultChars,
  });
}
