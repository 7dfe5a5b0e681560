import * as cheerio from "cheerio";
import { createSnapshot, type ServiceStatus, type Snapshot } from "../types/snapshot.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER, errorMessage } from "../observability/logger.ts";

// ── Fetcher Contract ────────────────────────────────────────────────────────

export interface StatusFetcher {
  fetch(serviceId: string, signal: AbortSignal): Promise<Snapshot>;
}

export type FetchErrorCode =
  | "HTTP_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "PARSE_ERROR";

export class FetchError extends Error {
  override readonly name = "FetchError";

  constructor(
    message: string,
    readonly serviceId: string,
    readonly code: FetchErrorCode,
    readonly httpStatus?: number,
  ) {
    super(message);
  }

  get retryable(): boolean {
    if (this.code === "NETWORK_ERROR" || this.code === "TIMEOUT") return true;
    if (this.code === "HTTP_ERROR" && this.httpStatus !== undefined) {
      return this.httpStatus === 429 || this.httpStatus >= 500;
    }
    return false;
  }
}

// ── Config ──────────────────────────────────────────────────────────────────

export interface ScraperConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Total attempts per fetch, including the first. */
  readonly retryAttempts: number;
  readonly retryDelayMs: number;
  readonly userAgent: string;
}

export const DEFAULT_SCRAPER_CONFIG: ScraperConfig = {
  baseUrl: "https://downdetector.com/status",
  timeoutMs: 30_000,
  retryAttempts: 3,
  retryDelayMs: 5_000,
  userAgent: "Mozilla/5.0 (compatible; OutageRelay/1.0)",
};

// ── Page Parsing ────────────────────────────────────────────────────────────

const STATUS_SELECTORS = [".entry-title", ".status-title", "h1", ".company-status"];
const DOWN_KEYWORDS = ["problem", "issue", "outage"];
const ISSUES_KEYWORDS = ["possible", "warning"];
const COUNT_SELECTORS = [".reports-count", ".report-count", "[data-reports]"];
const REGION_SELECTORS = [".affected-region", ".region", ".location-item"];
const MAX_REGIONS = 10;
const MAX_DESCRIPTION = 500;

export interface ParsedStatusPage {
  readonly status: ServiceStatus;
  readonly reportCount: number;
  readonly affectedRegions: readonly string[];
  readonly description?: string;
}

function extractStatus($: cheerio.CheerioAPI): ServiceStatus {
  for (const selector of STATUS_SELECTORS) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    const text = element.text().toLowerCase();
    if (DOWN_KEYWORDS.some((k) => text.includes(k))) return "DOWN";
    if (ISSUES_KEYWORDS.some((k) => text.includes(k))) return "ISSUES";
  }
  return "UP";
}

function digitsOf(text: string): number | null {
  const digits = text.replace(/\D/g, "");
  return digits.length > 0 ? Number.parseInt(digits, 10) : null;
}

function extractReportCount($: cheerio.CheerioAPI): number {
  for (const selector of COUNT_SELECTORS) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    const count = digitsOf(element.attr("data-reports") ?? element.text());
    if (count !== null) return count;
  }

  const match = /(\d+(?:,\d+)*)\s*(?:reports?|users?)\b/i.exec($("body").text());
  if (match?.[1]) {
    return Number.parseInt(match[1].replace(/,/g, ""), 10);
  }
  return 0;
}

function extractRegions($: cheerio.CheerioAPI): string[] {
  const regions: string[] = [];
  for (const selector of REGION_SELECTORS) {
    $(selector).each((_, el) => {
      const region = $(el).text().trim();
      if (region && !regions.includes(region)) regions.push(region);
    });
  }
  return regions.slice(0, MAX_REGIONS);
}

function extractDescription($: cheerio.CheerioAPI): string | undefined {
  for (const selector of [".description", ".summary"]) {
    const text = $(selector).first().text().trim();
    if (text.length > 20) return text.slice(0, MAX_DESCRIPTION);
  }
  const meta = $("meta[name='description']").attr("content")?.trim();
  return meta ? meta.slice(0, MAX_DESCRIPTION) : undefined;
}

export function parseStatusPage(html: string): ParsedStatusPage {
  const $ = cheerio.load(html);
  const description = extractDescription($);
  return {
    status: extractStatus($),
    reportCount: extractReportCount($),
    affectedRegions: extractRegions($),
    ...(description !== undefined ? { description } : {}),
  };
}

// ── HttpStatusScraper ───────────────────────────────────────────────────────

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpStatusScraperDeps {
  readonly config?: Partial<ScraperConfig>;
  readonly logger?: Logger;
  readonly fetchImpl?: FetchImpl;
  readonly clock?: () => Date;
  /** Per-service page URLs overriding `${baseUrl}/${serviceId}`. */
  readonly urls?: ReadonlyMap<string, string>;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export class HttpStatusScraper implements StatusFetcher {
  private readonly config: ScraperConfig;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchImpl;
  private readonly clock: () => Date;
  private readonly urls: ReadonlyMap<string, string>;

  constructor(deps: HttpStatusScraperDeps = {}) {
    this.config = { ...DEFAULT_SCRAPER_CONFIG, ...deps.config };
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "scraper" });
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = deps.clock ?? (() => new Date());
    this.urls = deps.urls ?? new Map();
  }

  urlFor(serviceId: string): string {
    return this.urls.get(serviceId) ?? `${this.config.baseUrl.replace(/\/+$/, "")}/${serviceId}`;
  }

  async fetch(serviceId: string, signal: AbortSignal): Promise<Snapshot> {
    const attempts = Math.max(1, this.config.retryAttempts);
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (signal.aborted) {
        throw new FetchError(`Fetch for ${serviceId} aborted`, serviceId, "ABORTED");
      }
      try {
        return await this.fetchOnce(serviceId, signal);
      } catch (err: unknown) {
        const fetchError =
          err instanceof FetchError
            ? err
            : new FetchError(errorMessage(err), serviceId, "NETWORK_ERROR");
        lastError = fetchError;

        if (!fetchError.retryable || attempt === attempts) break;

        this.logger.warn("scrape_retry", {
          serviceId,
          attempt,
          code: fetchError.code,
          error: fetchError.message,
          delayMs: this.config.retryDelayMs,
        });
        try {
          await sleep(this.config.retryDelayMs, signal);
        } catch {
          throw new FetchError(`Fetch for ${serviceId} aborted`, serviceId, "ABORTED");
        }
      }
    }

    const failure =
      lastError ?? new FetchError(`Fetch for ${serviceId} failed`, serviceId, "NETWORK_ERROR");
    this.logger.error("scrape_failed", {
      serviceId,
      attempts,
      code: failure.code,
      error: failure.message,
    });
    throw failure;
  }

  private async fetchOnce(serviceId: string, signal: AbortSignal): Promise<Snapshot> {
    const url = this.urlFor(serviceId);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal.addEventListener("abort", forwardAbort, { once: true });

    let html: string;
    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        redirect: "follow",
        headers: {
          "User-Agent": this.config.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.5",
        },
      });
      if (!response.ok) {
        throw new FetchError(
          `GET ${url} returned ${response.status}`,
          serviceId,
          "HTTP_ERROR",
          response.status,
        );
      }
      html = await response.text();
    } catch (err: unknown) {
      if (err instanceof FetchError) throw err;
      if (timedOut) {
        throw new FetchError(
          `GET ${url} timed out after ${this.config.timeoutMs}ms`,
          serviceId,
          "TIMEOUT",
        );
      }
      if (signal.aborted) {
        throw new FetchError(`Fetch for ${serviceId} aborted`, serviceId, "ABORTED");
      }
      throw new FetchError(`GET ${url} failed: ${errorMessage(err)}`, serviceId, "NETWORK_ERROR");
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", forwardAbort);
    }

    let page: ParsedStatusPage;
    try {
      page = parseStatusPage(html);
    } catch (err: unknown) {
      throw new FetchError(
        `Could not parse ${url}: ${errorMessage(err)}`,
        serviceId,
        "PARSE_ERROR",
      );
    }

    this.logger.debug("scrape_succeeded", {
      serviceId,
      status: page.status,
      reportCount: page.reportCount,
    });

    return createSnapshot({
      serviceId,
      observedAt: this.clock().toISOString(),
      status: page.status,
      reportCount: page.reportCount,
      serviceUrl: url,
      affectedRegions: page.affectedRegions,
      ...(page.description !== undefined ? { description: page.description } : {}),
    });
  }
}
