// FirecrawlClient: submits a crawl job to the Firecrawl v1 API and polls it
// until the job reaches a terminal state. Completed results are gathered
// across `next` pagination links.

import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { CrawlwiseError, type Logger } from "@crawlwise/core";

export const DEFAULT_FIRECRAWL_BASE_URL = "https://api.firecrawl.dev";
const DEFAULT_LIMIT = 100;
const DEFAULT_FORMATS = ["markdown"] as const;
const DEFAULT_POLL_INTERVAL_MS = 30_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export class FirecrawlError extends CrawlwiseError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "FIRECRAWL_ERROR", cause);
    this.name = "FirecrawlError";
  }
}

export interface FirecrawlOptions {
  apiKey: string;
  baseUrl?: string;
  /** Maximum number of pages per crawl. */
  limit?: number;
  formats?: readonly string[];
  pollIntervalMs?: number;
  /** Applies to each HTTP request on its own, not to the whole crawl. */
  requestTimeoutMs?: number;
  logger?: Logger;
  /** Wait between status checks. Replaced in tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface CrawlPage {
  url?: string;
  title?: string;
  markdown?: string;
}

export interface CrawlResult {
  status: "completed";
  total: number;
  completed: number;
  creditsUsed?: number;
  expiresAt?: string;
  pages: CrawlPage[];
}

// ── Response schemas ────────────────────────────────────────────────────

const startSchema = z.object({
  success: z.boolean().optional(),
  id: z.string().min(1),
  url: z.string().optional(),
});

const pageSchema = z.object({
  markdown: z.string().nullish(),
  metadata: z
    .object({
      sourceURL: z.string().optional(),
      url: z.string().optional(),
      title: z.string().optional(),
    })
    .optional(),
});

const statusSchema = z.object({
  status: z.string(),
  total: z.number().default(0),
  completed: z.number().default(0),
  creditsUsed: z.number().optional(),
  expiresAt: z.string().optional(),
  next: z.string().nullish(),
  data: z.array(pageSchema).nullish(),
});

const errorBodySchema = z.object({ error: z.string() });

type CrawlStatus = z.infer<typeof statusSchema>;

function toPage(raw: z.infer<typeof pageSchema>): CrawlPage {
  const page: CrawlPage = {};
  const url = raw.metadata?.sourceURL ?? raw.metadata?.url;
  if (url) page.url = url;
  if (raw.metadata?.title) page.title = raw.metadata.title;
  if (raw.markdown) page.markdown = raw.markdown;
  return page;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export class FirecrawlClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly limit: number;
  private readonly formats: readonly string[];
  private readonly pollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly logger?: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: FirecrawlOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_FIRECRAWL_BASE_URL).replace(/\/+$/, "");
    this.limit = options.limit ?? DEFAULT_LIMIT;
    this.formats = options.formats ?? DEFAULT_FORMATS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger?.child({ component: "FirecrawlClient" });
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Crawl a site and wait for the job to finish.
   * Throws FirecrawlError when the job fails, is cancelled, or the API
   * answers with an error or an unexpected body.
   */
  async crawl(site: string, options: { signal?: AbortSignal } = {}): Promise<CrawlResult> {
    const { signal } = options;
    const started = await this.request(`${this.baseUrl}/v1/crawl`, startSchema, signal, {
      url: site,
      limit: this.limit,
      scrapeOptions: { formats: [...this.formats] },
    });
    this.logger?.info("Crawl started", { site, id: started.id });

    const statusUrl = `${this.baseUrl}/v1/crawl/${encodeURIComponent(started.id)}`;
    for (;;) {
      const status = await this.request(statusUrl, statusSchema, signal);

      if (status.status === "completed") {
        const pages = await this.collectPages(status, signal);
        this.logger?.info("Crawl completed", { site, id: started.id, pages: pages.length });
        return {
          status: "completed",
          total: status.total,
          completed: status.completed,
          ...(status.creditsUsed !== undefined && { creditsUsed: status.creditsUsed }),
          ...(status.expiresAt !== undefined && { expiresAt: status.expiresAt }),
          pages,
        };
      }

      if (status.status === "failed" || status.status === "cancelled") {
        throw new FirecrawlError(`Crawl ${started.id} ${status.status} for ${site}`);
      }

      this.logger?.debug("Crawl in progress", {
        id: started.id,
        status: status.status,
        completed: status.completed,
        total: status.total,
      });
      await this.sleep(this.pollIntervalMs, signal);
    }
  }

  private async collectPages(first: CrawlStatus, signal?: AbortSignal): Promise<CrawlPage[]> {
    const pages = (first.data ?? []).map(toPage);
    let next = first.next;
    while (next) {
      const page = await this.request(next, statusSchema, signal);
      pages.push(...(page.data ?? []).map(toPage));
      next = page.next;
    }
    return pages;
  }

  /** GET when no body is given, POST otherwise. */
  private async request<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
    body?: Record<string, unknown>,
  ): Promise<T> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await globalThis.fetch(url, {
        method: body ? "POST" : "GET",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: combined,
      });
    } catch (err: unknown) {
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new FirecrawlError(`Firecrawl request timed out after ${this.requestTimeoutMs}ms`, undefined, err);
      }
      if (signal?.aborted) {
        throw new FirecrawlError("Crawl cancelled", undefined, err);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new FirecrawlError(`Network error calling Firecrawl: ${message}`, undefined, err);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new FirecrawlError(
        `Firecrawl returned HTTP ${response.status}${remoteError(text)}`,
        response.status,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err: unknown) {
      throw new FirecrawlError("Firecrawl returned a body that is not JSON", response.status, err);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new FirecrawlError(
        `Unexpected Firecrawl response: ${describeIssues(parsed.error)}`,
        response.status,
        parsed.error,
      );
    }
    return parsed.data;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** The API's `error` field when the body carries one, the raw text otherwise. */
function remoteError(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) return "";
  const parsed = errorBodySchema.safeParse(parseJson(trimmed));
  return `: ${parsed.success ? parsed.data.error : trimmed.slice(0, 200)}`;
}

/** Render a crawl as markdown for the model to read. */
export function formatCrawlResult(site: string, result: CrawlResult): string {
  const header = `Crawled ${result.pages.length} page(s) from ${site}`;
  if (result.pages.length === 0) return `${header}\n\nNo content found.`;

  const sections = result.pages.map((page, i) => {
    const title = page.title ?? page.url ?? `Page ${i + 1}`;
    const lines = [`## ${title}`];
    if (page.url) lines.push(`URL: ${page.url}`);
    lines.push("", page.markdown ?? "(no markdown)");
    return lines.join("\n");
  });
  return `${header}\n\n${sections.join("\n\n")}`;
}
