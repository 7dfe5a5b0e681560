import type { ChangeEvent, ChangeKind } from "../types/events.ts";
import type { NotificationChannel } from "./types.ts";

export interface EventLogConfig {
  readonly retentionMs: number;
  /** Hard cap on stored events, applied after time-based pruning. */
  readonly maxEntries: number;
}

export const DEFAULT_EVENT_LOG_CONFIG: EventLogConfig = {
  retentionMs: 24 * 60 * 60 * 1000,
  maxEntries: 10_000,
};

export interface EventFilter {
  readonly serviceId?: string;
  readonly kind?: ChangeKind;
}

export interface EventLogChannelDeps {
  readonly config?: Partial<EventLogConfig>;
  readonly clock?: () => Date;
}

/** In-memory history of dispatched events, queried by the REST surface. */
export class EventLogChannel implements NotificationChannel {
  readonly id = "event-log";
  private entries: ChangeEvent[] = [];
  private readonly config: EventLogConfig;
  private readonly clock: () => Date;

  constructor(deps: EventLogChannelDeps = {}) {
    this.config = { ...DEFAULT_EVENT_LOG_CONFIG, ...deps.config };
    this.clock = deps.clock ?? (() => new Date());
  }

  async deliver(event: ChangeEvent): Promise<void> {
    this.entries.push(event);
    this.prune();
  }

  /** Events detected within `windowMs` of now, newest first. */
  recent(windowMs: number, filter?: EventFilter): ChangeEvent[] {
    this.prune();
    const cutoff = this.clock().getTime() - windowMs;
    const serviceId = filter?.serviceId?.toLowerCase();
    return this.entries
      .filter(
        (e) =>
          Date.parse(e.detectedAt) >= cutoff &&
          (serviceId === undefined || e.serviceId.toLowerCase() === serviceId) &&
          (filter?.kind === undefined || e.kind === filter.kind),
      )
      .reverse();
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }

  private prune(): void {
    const cutoff = this.clock().getTime() - this.config.retentionMs;
    if (this.entries.some((e) => Date.parse(e.detectedAt) < cutoff)) {
      this.entries = this.entries.filter((e) => Date.parse(e.detectedAt) >= cutoff);
    }
    if (this.entries.length > this.config.maxEntries) {
      this.entries = this.entries.slice(this.entries.length - this.config.maxEntries);
    }
  }
}
