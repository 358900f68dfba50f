export {
  FirecrawlClient,
  FirecrawlError,
  formatCrawlResult,
  DEFAULT_FIRECRAWL_BASE_URL,
  type FirecrawlOptions,
  type CrawlPage,
  type CrawlResult,
} from "./firecrawl-client";
