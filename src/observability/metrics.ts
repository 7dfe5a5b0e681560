import { CHANGE_KINDS, type ChangeKind } from "../types/events.ts";

// ── Record Types ────────────────────────────────────────────────────────────

export interface CycleRecord {
  readonly cycleId: string;
  readonly servicesAttempted: number;
  readonly servicesFailed: number;
  readonly eventsDetected: number;
  readonly durationMs: number;
  readonly finishedAt: string;
}

export interface ChannelStats {
  readonly channelId: string;
  readonly delivered: number;
  readonly failed: number;
  readonly lastError: string | null;
}

// ── Aggregate Snapshot ──────────────────────────────────────────────────────

export interface MetricsSnapshot {
  readonly totalCycles: number;
  readonly totalFetches: number;
  readonly successfulFetches: number;
  readonly failedFetches: number;
  /** Percentage 0–100; 100 before any fetch. */
  readonly fetchSuccessRate: number;
  readonly detectionErrors: number;
  readonly eventsByKind: Readonly<Record<ChangeKind, number>>;
  readonly totalEvents: number;
  readonly totalDeliveries: number;
  readonly failedDeliveries: number;
  readonly channels: readonly ChannelStats[];
  readonly servicesMonitored: number;
  readonly currentOutages: number;
  readonly lastCycle: CycleRecord | null;
  readonly uptimeSeconds: number;
  readonly collectedSince: string;
}

interface MutableChannelStats {
  delivered: number;
  failed: number;
  lastError: string | null;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function clampNonNegative(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}

function emptyKindCounts(): Record<ChangeKind, number> {
  return {
    NEW_OUTAGE: 0,
    STATUS_CHANGED: 0,
    SEVERITY_INCREASED: 0,
    SEVERITY_DECREASED: 0,
    REPORT_COUNT_SPIKE: 0,
    OUTAGE_RESOLVED: 0,
  };
}

/** Per-connection channels (`ws:<clientId>`) roll up under their prefix. */
export function channelGroup(channelId: string): string {
  const sep = channelId.indexOf(":");
  return sep > 0 ? channelId.slice(0, sep) : channelId;
}

// ── MonitorMetrics ──────────────────────────────────────────────────────────

export class MonitorMetrics {
  private totalCycles = 0;
  private successfulFetches = 0;
  private failedFetches = 0;
  private detectionErrors = 0;
  private eventsByKind = emptyKindCounts();
  private readonly channelMap = new Map<string, MutableChannelStats>();
  private servicesMonitored = 0;
  private currentOutages = 0;
  private lastCycle: CycleRecord | null = null;
  private startedAtMs: number;

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.startedAtMs = this.clock().getTime();
  }

  // ── Recording ───────────────────────────────────────────────────────────

  recordFetch(success: boolean): void {
    if (success) {
      this.successfulFetches += 1;
    } else {
      this.failedFetches += 1;
    }
  }

  recordDetectionError(): void {
    this.detectionErrors += 1;
  }

  recordEvent(kind: ChangeKind): void {
    this.eventsByKind[kind] += 1;
  }

  recordDelivery(channelId: string, success: boolean, error?: string): void {
    const group = channelGroup(channelId);
    let stats = this.channelMap.get(group);
    if (!stats) {
      stats = { delivered: 0, failed: 0, lastError: null };
      this.channelMap.set(group, stats);
    }
    if (success) {
      stats.delivered += 1;
    } else {
      stats.failed += 1;
      stats.lastError = error ?? "unknown";
    }
  }

  recordCycle(record: CycleRecord): void {
    this.totalCycles += 1;
    this.lastCycle = {
      ...record,
      servicesAttempted: Math.round(clampNonNegative(record.servicesAttempted)),
      servicesFailed: Math.round(clampNonNegative(record.servicesFailed)),
      eventsDetected: Math.round(clampNonNegative(record.eventsDetected)),
      durationMs: clampNonNegative(record.durationMs),
    };
  }

  setServiceCounts(monitored: number, outages: number): void {
    this.servicesMonitored = Math.round(clampNonNegative(monitored));
    this.currentOutages = Math.round(clampNonNegative(outages));
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  getStats(): MetricsSnapshot {
    const totalFetches = this.successfulFetches + this.failedFetches;
    const channels: ChannelStats[] = [...this.channelMap.entries()]
      .map(([channelId, s]) => ({
        channelId,
        delivered: s.delivered,
        failed: s.failed,
        lastError: s.lastError,
      }))
      .sort((a, b) => a.channelId.localeCompare(b.channelId));

    let totalDeliveries = 0;
    let failedDeliveries = 0;
    for (const c of channels) {
      totalDeliveries += c.delivered + c.failed;
      failedDeliveries += c.failed;
    }

    let totalEvents = 0;
    for (const kind of CHANGE_KINDS) totalEvents += this.eventsByKind[kind];

    return {
      totalCycles: this.totalCycles,
      totalFetches,
      successfulFetches: this.successfulFetches,
      failedFetches: this.failedFetches,
      fetchSuccessRate:
        totalFetches > 0
          ? Math.round((this.successfulFetches / totalFetches) * 10_000) / 100
          : 100,
      detectionErrors: this.detectionErrors,
      eventsByKind: { ...this.eventsByKind },
      totalEvents,
      totalDeliveries,
      failedDeliveries,
      channels,
      servicesMonitored: this.servicesMonitored,
      currentOutages: this.currentOutages,
      lastCycle: this.lastCycle,
      uptimeSeconds: this.uptimeSeconds(),
      collectedSince: new Date(this.startedAtMs).toISOString(),
    };
  }

  uptimeSeconds(): number {
    return Math.max(0, Math.floor((this.clock().getTime() - this.startedAtMs) / 1000));
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  reset(): void {
    this.totalCycles = 0;
    this.successfulFetches = 0;
    this.failedFetches = 0;
    this.detectionErrors = 0;
    this.eventsByKind = emptyKindCounts();
    this.channelMap.clear();
    this.servicesMonitored = 0;
    this.currentOutages = 0;
    this.lastCycle = null;
    this.startedAtMs = this.clock().getTime();
  }
}
