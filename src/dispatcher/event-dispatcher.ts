import type { ChangeEvent } from "../types/events.ts";
import {
  ChannelDeliveryError,
  type NotificationChannel,
} from "../channels/types.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER, errorMessage } from "../observability/logger.ts";
import type { MonitorMetrics } from "../observability/metrics.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface DispatcherConfig {
  /** Upper bound on a single channel's `deliver`; 0 disables the bound. */
  readonly deliveryTimeoutMs: number;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  deliveryTimeoutMs: 10_000,
};

export interface EventDispatcherDeps {
  readonly logger?: Logger;
  readonly metrics?: MonitorMetrics;
  readonly config?: Partial<DispatcherConfig>;
}

// ── Dispatch Result ─────────────────────────────────────────────────────────

export interface ChannelOutcome {
  readonly channelId: string;
  readonly delivered: boolean;
  readonly error?: string;
  readonly durationMs: number;
}

export interface DispatchResult {
  readonly eventId: string;
  readonly outcomes: readonly ChannelOutcome[];
  readonly delivered: number;
  readonly failed: number;
}

// ── Timeout Helper ──────────────────────────────────────────────────────────

function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

// ── EventDispatcher ─────────────────────────────────────────────────────────

export class EventDispatcher {
  private readonly channels = new Map<string, NotificationChannel>();
  private readonly logger: Logger;
  private readonly metrics?: MonitorMetrics;
  private readonly config: DispatcherConfig;

  constructor(deps: EventDispatcherDeps = {}) {
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "dispatcher" });
    this.metrics = deps.metrics;
    this.config = { ...DEFAULT_DISPATCHER_CONFIG, ...deps.config };
  }

  // ── Registry ────────────────────────────────────────────────────────────

  /** Adds a channel, replacing any channel already registered under its id. */
  register(channel: NotificationChannel): void {
    if (this.channels.has(channel.id)) {
      this.logger.warn("channel_replaced", { channelId: channel.id });
    }
    this.channels.set(channel.id, channel);
    this.logger.debug("channel_registered", { channelId: channel.id });
  }

  unregister(channelId: string): boolean {
    const removed = this.channels.delete(channelId);
    if (removed) {
      this.logger.debug("channel_unregistered", { channelId });
    }
    return removed;
  }

  has(channelId: string): boolean {
    return this.channels.has(channelId);
  }

  channelIds(): readonly string[] {
    return [...this.channels.keys()];
  }

  // ── Dispatch ────────────────────────────────────────────────────────────

  /**
   * Offers the event to every channel registered when the call starts.
   * Never rejects: each channel's failure is captured in its outcome.
   */
  async dispatch(event: ChangeEvent): Promise<DispatchResult> {
    const targets = [...this.channels.values()];
    this.metrics?.recordEvent(event.kind);

    if (targets.length === 0) {
      this.logger.info("event_dropped_no_channels", {
        eventId: event.id,
        kind: event.kind,
      });
      return { eventId: event.id, outcomes: [], delivered: 0, failed: 0 };
    }

    const settled = await Promise.allSettled(
      targets.map((channel) => this.deliverOne(channel, event)),
    );

    const outcomes: ChannelOutcome[] = [];
    for (let i = 0; i < settled.length; i++) {
      const result = settled[i];
      const channel = targets[i];
      if (!result || !channel) continue;
      outcomes.push(
        result.status === "fulfilled"
          ? result.value
          : {
              channelId: channel.id,
              delivered: false,
              error: errorMessage(result.reason),
              durationMs: 0,
            },
      );
    }

    let delivered = 0;
    let failed = 0;
    for (const outcome of outcomes) {
      this.metrics?.recordDelivery(outcome.channelId, outcome.delivered, outcome.error);
      if (outcome.delivered) {
        delivered++;
      } else {
        failed++;
      }
    }

    this.logger.info("event_dispatched", {
      eventId: event.id,
      serviceId: event.serviceId,
      kind: event.kind,
      delivered,
      failed,
    });

    return { eventId: event.id, outcomes, delivered, failed };
  }

  /** Dispatches events one after another, preserving their order. */
  async dispatchAll(events: readonly ChangeEvent[]): Promise<DispatchResult[]> {
    const results: DispatchResult[] = [];
    for (const event of events) {
      results.push(await this.dispatch(event));
    }
    return results;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private async deliverOne(
    channel: NotificationChannel,
    event: ChangeEvent,
  ): Promise<ChannelOutcome> {
    const startedAt = Date.now();
    try {
      // deliver() may throw synchronously; wrap so the timeout sees a promise
      const pending = Promise.resolve().then(() => channel.deliver(event));
      await withTimeout(
        pending,
        this.config.deliveryTimeoutMs,
        () =>
          new ChannelDeliveryError(
            `Delivery to ${channel.id} timed out after ${this.config.deliveryTimeoutMs}ms`,
            channel.id,
            "TIMEOUT",
            event.id,
          ),
      );
      return { channelId: channel.id, delivered: true, durationMs: Date.now() - startedAt };
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.error("channel_delivery_failed", {
        channelId: channel.id,
        eventId: event.id,
        kind: event.kind,
        error: message,
        code: err instanceof ChannelDeliveryError ? err.code : undefined,
      });
      return {
        channelId: channel.id,
        delivered: false,
        error: message,
        durationMs: Date.now() - startedAt,
      };
    }
  }
}
