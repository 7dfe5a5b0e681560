import type { ChangeEvent } from "../types/events.ts";
import type { Summarizer } from "../ai/summarizer.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER, errorMessage } from "../observability/logger.ts";
import type { HubMessage } from "./websocket-hub.ts";
import { ChannelDeliveryError, type NotificationChannel } from "./types.ts";

export interface SummaryPublisher {
  broadcast(message: HubMessage): number;
}

export interface AiEnrichmentConfig {
  /** Cached summaries kept; the least recently used is evicted first. */
  readonly cacheSize: number;
}

export const DEFAULT_AI_ENRICHMENT_CONFIG: AiEnrichmentConfig = {
  cacheSize: 200,
};

export interface AiEnrichmentChannelDeps {
  readonly summarizer: Summarizer;
  readonly publisher: SummaryPublisher;
  readonly logger?: Logger;
  readonly config?: Partial<AiEnrichmentConfig>;
}

/** Covers every event field the prompt reads. */
export function summaryCacheKey(event: ChangeEvent): string {
  const status = `${event.previousStatus ?? "none"}->${event.newStatus}`;
  const reports = `${event.previousReportCount ?? "none"}->${event.newReportCount}`;
  return `${event.id}:${status}:${reports}`;
}

/**
 * Summarises each event and publishes the prose to WebSocket clients.
 * A redelivered event reuses its earlier summary.
 */
export class AiEnrichmentChannel implements NotificationChannel {
  readonly id = "ai-summary";
  private readonly cache = new Map<string, string>();
  private readonly summarizer: Summarizer;
  private readonly publisher: SummaryPublisher;
  private readonly logger: Logger;
  private readonly config: AiEnrichmentConfig;

  constructor(deps: AiEnrichmentChannelDeps) {
    this.summarizer = deps.summarizer;
    this.publisher = deps.publisher;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "ai-enrichment" });
    this.config = { ...DEFAULT_AI_ENRICHMENT_CONFIG, ...deps.config };
  }

  async deliver(event: ChangeEvent): Promise<void> {
    const summary = await this.summaryFor(event);
    const recipients = this.publisher.broadcast({
      type: "outage_summary",
      eventId: event.id,
      serviceId: event.serviceId,
      kind: event.kind,
      summary,
    });
    this.logger.info("ai_summary_published", {
      eventId: event.id,
      serviceId: event.serviceId,
      recipients,
      summary,
    });
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  private async summaryFor(event: ChangeEvent): Promise<string> {
    const key = summaryCacheKey(event);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      // refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      this.logger.debug("ai_summary_cache_hit", { key });
      return cached;
    }

    let summary: string;
    try {
      summary = await this.summarizer.summarize(event);
    } catch (err: unknown) {
      throw new ChannelDeliveryError(
        `Summary generation failed: ${errorMessage(err)}`,
        this.id,
        "ENRICHMENT_FAILED",
        event.id,
      );
    }

    this.cache.set(key, summary);
    while (this.cache.size > this.config.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    return summary;
  }
}
