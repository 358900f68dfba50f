// Capability registrations: binds the crawl client to the registry the
// session offers to the model.

import { CapabilityRegistry, type Logger } from "@crawlwise/core";
import { formatCrawlResult, type FirecrawlClient } from "@crawlwise/tool-firecrawl";

export const FIRECRAWL_CRAWL = "firecrawl_crawl";

export type Crawler = Pick<FirecrawlClient, "crawl">;

export function buildCapabilityRegistry(crawler: Crawler, logger: Logger): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  const log = logger.child({ component: "Capabilities" });

  // ── firecrawl_crawl ────────────────────────────────────────────────
  registry.register(
    {
      name: FIRECRAWL_CRAWL,
      description:
        "Recursively search through a urls subdomains, and gather the content. Begins with a specified URL, identifying links by looking at the sitemap and then crawling the website. Then converts collected data into clean markdown or structured output, perfect for LLM processing or any other task.",
      parameters: {
        site: { type: "string", description: "The url to crawl" },
      },
      required: ["site"],
    },
    async (args, context) => {
      const site = args.string("site");
      const result = await crawler.crawl(site, { signal: context.signal });
      context.logger.debug("Crawl finished", { site, pages: result.pages.length });
      return formatCrawlResult(site, result);
    },
  );

  log.debug("Capabilities registered", { count: registry.size });
  return registry;
}
