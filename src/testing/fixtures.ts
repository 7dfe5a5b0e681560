import type { ChangeEvent } from "../types/events.ts";
import { createSnapshot, type Snapshot } from "../types/snapshot.ts";
import type { NotificationChannel } from "../channels/types.ts";
import { FetchError, type StatusFetcher } from "../scraper/status-scraper.ts";

// ── Factories ───────────────────────────────────────────────────────────────

export function createTestSnapshot(overrides?: Partial<Snapshot>): Snapshot {
  return createSnapshot({
    serviceId: "github",
    observedAt: "2026-03-02T10:00:00.000Z",
    status: "UP",
    reportCount: 10,
    ...overrides,
  });
}

export function createTestEvent(overrides?: Partial<ChangeEvent>): ChangeEvent {
  const base = {
    serviceId: "github",
    detectedAt: "2026-03-02T10:00:00.000Z",
    kind: "NEW_OUTAGE" as const,
    previousStatus: null,
    newStatus: "DOWN" as const,
    previousReportCount: null,
    newReportCount: 250,
    ...overrides,
  };
  return {
    id: `${base.serviceId}:${base.kind}:${base.detectedAt}`,
    ...base,
  };
}

// ── Channels ────────────────────────────────────────────────────────────────

export class RecordingChannel implements NotificationChannel {
  readonly received: ChangeEvent[] = [];

  constructor(readonly id: string) {}

  async deliver(event: ChangeEvent): Promise<void> {
    this.received.push(event);
  }
}

export class FailingChannel implements NotificationChannel {
  attempts = 0;

  constructor(
    readonly id: string,
    private readonly message = "channel exploded",
  ) {}

  async deliver(): Promise<void> {
    this.attempts++;
    throw new Error(this.message);
  }
}

/** A channel whose deliveries stay pending until released. */
export class HangingChannel implements NotificationChannel {
  private readonly pending: Array<() => void> = [];

  constructor(readonly id: string) {}

  deliver(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.pending.push(resolve);
    });
  }

  releaseAll(): void {
    for (const resolve of this.pending.splice(0)) resolve();
  }
}

// ── Fetchers ────────────────────────────────────────────────────────────────

/** Serves whatever snapshot was last set per service; unknown ids fail. */
export class StaticFetcher implements StatusFetcher {
  private readonly snapshots = new Map<string, Snapshot>();
  readonly calls: string[] = [];

  constructor(snapshots: readonly Snapshot[] = []) {
    for (const snapshot of snapshots) this.set(snapshot);
  }

  set(snapshot: Snapshot): void {
    this.snapshots.set(snapshot.serviceId, snapshot);
  }

  async fetch(serviceId: string): Promise<Snapshot> {
    this.calls.push(serviceId);
    const snapshot = this.snapshots.get(serviceId);
    if (!snapshot) {
      throw new FetchError(`HTTP 503 for ${serviceId}`, serviceId, "HTTP_ERROR", 503);
    }
    return snapshot;
  }
}
