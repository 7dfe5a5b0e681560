import type { Logger } from "../observability/logger.ts";
import { errorMessage } from "../observability/logger.ts";
import type { MonitorMetrics } from "../observability/metrics.ts";
import type { ChangeEvent } from "../types/events.ts";
import type { ServiceStatus, Snapshot } from "../types/snapshot.ts";
import type { StateStore, StoreUpdate } from "../store/state-store.ts";
import type { StatusFetcher } from "../scraper/status-scraper.ts";
import {
  DEFAULT_DETECTOR_THRESHOLDS,
  DetectionError,
  detect,
  type DetectorThresholds,
} from "../detector/change-detector.ts";
import { runPool } from "./worker-pool.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface CycleSchedulerConfig {
  readonly intervalMs: number;
  readonly concurrency: number;
  readonly shutdownGraceMs: number;
  readonly runOnStart: boolean;
  readonly thresholds: DetectorThresholds;
}

export const DEFAULT_CYCLE_SCHEDULER_CONFIG: CycleSchedulerConfig = {
  intervalMs: 600_000,
  concurrency: 4,
  shutdownGraceMs: 10_000,
  runOnStart: true,
  thresholds: DEFAULT_DETECTOR_THRESHOLDS,
};

// ── Dependencies ────────────────────────────────────────────────────────────

export interface EventSink {
  dispatchAll(events: readonly ChangeEvent[]): Promise<unknown>;
}

export interface CycleSchedulerDeps {
  readonly services: readonly string[];
  readonly fetcher: StatusFetcher;
  readonly store: StateStore;
  readonly dispatcher: EventSink;
  readonly logger: Logger;
  readonly metrics?: MonitorMetrics;
  readonly config?: Partial<CycleSchedulerConfig>;
  readonly clock?: () => Date;
}

// ── Cycle Report ────────────────────────────────────────────────────────────

export type ServicePhase = "IDLE" | "FETCHING" | "DETECTING" | "COMMITTING" | "DISPATCHING";

export type ServiceOutcomeStatus =
  | "baseline"
  | "unchanged"
  | "changed"
  | "stale"
  | "fetch_failed"
  | "detection_failed"
  | "failed"
  | "aborted";

export interface ServiceOutcome {
  readonly serviceId: string;
  readonly outcome: ServiceOutcomeStatus;
  /** Furthest phase the unit of work reached. */
  readonly phase: ServicePhase;
  readonly events: readonly ChangeEvent[];
  readonly status?: ServiceStatus;
  readonly error?: string;
}

export interface CycleReport {
  readonly cycleId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly services: readonly ServiceOutcome[];
  readonly eventCount: number;
  readonly fetchFailures: number;
  readonly aborted: boolean;
}

interface CommitResult {
  readonly stale: boolean;
  readonly baseline: boolean;
  readonly events: readonly ChangeEvent[];
}

/** Resolves true if `promise` settles within `ms`, false otherwise. */
function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(done, done);
  });
}

// ── CycleScheduler ──────────────────────────────────────────────────────────

export class CycleScheduler {
  private readonly config: CycleSchedulerConfig;
  private readonly clock: () => Date;
  private readonly services: readonly string[];
  private readonly fetcher: StatusFetcher;
  private readonly store: StateStore;
  private readonly dispatcher: EventSink;
  private readonly logger: Logger;
  private readonly metrics?: MonitorMetrics;

  private running = false;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private currentCycle: Promise<CycleReport> | null = null;
  private currentAbort: AbortController | null = null;
  private tickDeferred = false;
  private cycleCounter = 0;
  private lastReport: CycleReport | null = null;

  constructor(deps: CycleSchedulerDeps) {
    this.config = { ...DEFAULT_CYCLE_SCHEDULER_CONFIG, ...deps.config };
    this.clock = deps.clock ?? (() => new Date());
    this.services = [...deps.services];
    this.fetcher = deps.fetcher;
    this.store = deps.store;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger.child({ module: "scheduler" });
    this.metrics = deps.metrics;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;

    this.tickTimer = setInterval(() => this.requestCycle(), this.config.intervalMs);
    if (this.config.runOnStart) {
      this.requestCycle();
    }

    this.logger.info("scheduler_started", {
      services: this.services.length,
      intervalMs: this.config.intervalMs,
      concurrency: this.config.concurrency,
    });
  }

  /**
   * Stop scheduling. An in-flight cycle gets `graceMs` to finish; after that
   * its fetches are aborted and unfinished services are abandoned.
   */
  async stop(graceMs: number = this.config.shutdownGraceMs): Promise<void> {
    if (!this.running && !this.currentCycle) return;
    this.running = false;
    this.tickDeferred = false;

    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    const inFlight = this.currentCycle;
    if (inFlight) {
      if (!(await settlesWithin(inFlight, graceMs))) {
        this.logger.warn("cycle_aborted", { graceMs });
        this.currentAbort?.abort();
        if (!(await settlesWithin(inFlight, graceMs))) {
          this.logger.warn("cycle_abandoned", { graceMs });
        }
      }
    }

    this.logger.info("scheduler_stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  isCycleInProgress(): boolean {
    return this.currentCycle !== null;
  }

  getLastReport(): CycleReport | null {
    return this.lastReport;
  }

  /** Resolves once no cycle is running or deferred. */
  async whenIdle(): Promise<void> {
    while (this.currentCycle) {
      await this.currentCycle;
    }
  }

  // ── Triggering ──────────────────────────────────────────────────────────

  /**
   * Timer entry point. While a cycle runs, further requests collapse into a
   * single deferred cycle started when the current one ends.
   */
  requestCycle(): void {
    if (!this.running) return;
    if (this.currentCycle) {
      if (!this.tickDeferred) {
        this.logger.info("cycle_deferred", { reason: "previous cycle still running" });
      }
      this.tickDeferred = true;
      return;
    }

    this.launch().catch((err: unknown) => {
      this.logger.error("cycle_error", { error: errorMessage(err) });
    });
  }

  /** Run one cycle now, after any cycle already in progress. */
  async runCycle(): Promise<CycleReport> {
    while (this.currentCycle) {
      await this.currentCycle;
    }
    return this.launch();
  }

  private launch(): Promise<CycleReport> {
    const cycle = this.executeCycle().finally(() => {
      this.currentCycle = null;
      this.currentAbort = null;
      if (this.tickDeferred && this.running) {
        this.tickDeferred = false;
        this.requestCycle();
      }
    });
    this.currentCycle = cycle;
    return cycle;
  }

  // ── Cycle ───────────────────────────────────────────────────────────────

  private async executeCycle(): Promise<CycleReport> {
    const cycleId = `cycle-${++this.cycleCounter}`;
    const controller = new AbortController();
    this.currentAbort = controller;
    const started = this.clock();
    const startedMs = Date.now();

    this.logger.info("cycle_started", { cycleId, services: this.services.length });

    const pool = await runPool({
      tasks: this.services.map(
        (serviceId) => (signal: AbortSignal) => this.processService(serviceId, signal),
      ),
      maxConcurrency: this.config.concurrency,
      signal: controller.signal,
    });

    const services: ServiceOutcome[] = pool.slots.map((slot, i) => {
      const serviceId = this.services[i] ?? "";
      if (slot.status === "fulfilled") return slot.value;
      if (slot.status === "rejected") {
        return {
          serviceId,
          outcome: "failed",
          phase: "FETCHING",
          events: [],
          error: errorMessage(slot.reason),
        };
      }
      return { serviceId, outcome: "aborted", phase: "IDLE", events: [] };
    });

    const eventCount = services.reduce((n, s) => n + s.events.length, 0);
    const fetchFailures = services.filter((s) => s.outcome === "fetch_failed").length;
    const report: CycleReport = {
      cycleId,
      startedAt: started.toISOString(),
      finishedAt: this.clock().toISOString(),
      durationMs: Date.now() - startedMs,
      services,
      eventCount,
      fetchFailures,
      aborted: pool.aborted,
    };

    this.lastReport = report;
    this.metrics?.recordCycle({
      cycleId,
      servicesAttempted: services.length,
      servicesFailed: services.filter(
        (s) => s.outcome !== "baseline" && s.outcome !== "unchanged" && s.outcome !== "changed",
      ).length,
      eventsDetected: eventCount,
      durationMs: report.durationMs,
      finishedAt: report.finishedAt,
    });
    this.metrics?.setServiceCounts(
      this.services.length,
      this.store.list().filter((s) => s.status !== "UP").length,
    );

    this.logger.info("cycle_completed", {
      cycleId,
      durationMs: report.durationMs,
      events: eventCount,
      fetchFailures,
      aborted: report.aborted,
    });
    return report;
  }

  // ── Per-service Unit of Work ────────────────────────────────────────────

  private async processService(serviceId: string, signal: AbortSignal): Promise<ServiceOutcome> {
    let snapshot: Snapshot;
    try {
      snapshot = await this.fetcher.fetch(serviceId, signal);
    } catch (err: unknown) {
      this.metrics?.recordFetch(false);
      const aborted = signal.aborted;
      this.logger.warn(aborted ? "fetch_aborted" : "fetch_failed", {
        serviceId,
        error: errorMessage(err),
      });
      return {
        serviceId,
        outcome: aborted ? "aborted" : "fetch_failed",
        phase: "FETCHING",
        events: [],
        error: errorMessage(err),
      };
    }
    this.metrics?.recordFetch(true);

    if (signal.aborted) {
      return { serviceId, outcome: "aborted", phase: "FETCHING", events: [] };
    }

    let phase: ServicePhase = "DETECTING";
    let commit: CommitResult;
    try {
      if (snapshot.serviceId !== serviceId) {
        throw new DetectionError(
          `Fetched snapshot belongs to ${snapshot.serviceId}, expected ${serviceId}`,
          "SERVICE_MISMATCH",
          serviceId,
        );
      }
      commit = await this.store.update(serviceId, (previous): StoreUpdate<CommitResult> => {
        if (previous && Date.parse(snapshot.observedAt) < Date.parse(previous.observedAt)) {
          return { next: null, result: { stale: true, baseline: false, events: [] } };
        }
        const events = detect(previous, snapshot, this.config.thresholds);
        phase = "COMMITTING";
        return {
          next: snapshot,
          result: { stale: false, baseline: previous === undefined, events },
        };
      });
    } catch (err: unknown) {
      if (err instanceof DetectionError) {
        this.metrics?.recordDetectionError();
        this.logger.error("detection_failed", {
          serviceId,
          code: err.code,
          error: err.message,
        });
        return { serviceId, outcome: "detection_failed", phase, events: [], error: err.message };
      }
      this.logger.error("service_cycle_failed", { serviceId, phase, error: errorMessage(err) });
      return { serviceId, outcome: "failed", phase, events: [], error: errorMessage(err) };
    }

    if (commit.stale) {
      this.logger.warn("snapshot_stale", { serviceId, observedAt: snapshot.observedAt });
      return { serviceId, outcome: "stale", phase, events: [], status: snapshot.status };
    }

    if (commit.events.length === 0) {
      return {
        serviceId,
        outcome: commit.baseline ? "baseline" : "unchanged",
        phase,
        events: [],
        status: snapshot.status,
      };
    }

    if (signal.aborted) {
      this.logger.warn("dispatch_skipped_aborted", {
        serviceId,
        kinds: commit.events.map((e) => e.kind),
      });
      return {
        serviceId,
        outcome: "aborted",
        phase,
        events: commit.events,
        status: snapshot.status,
      };
    }

    this.logger.info("changes_detected", {
      serviceId,
      kinds: commit.events.map((e) => e.kind),
    });
    try {
      await this.dispatcher.dispatchAll(commit.events);
    } catch (err: unknown) {
      this.logger.error("service_cycle_failed", {
        serviceId,
        phase: "DISPATCHING",
        error: errorMessage(err),
      });
      return {
        serviceId,
        outcome: "failed",
        phase: "DISPATCHING",
        events: commit.events,
        status: snapshot.status,
        error: errorMessage(err),
      };
    }

    return {
      serviceId,
      outcome: "changed",
      phase: "DISPATCHING",
      events: commit.events,
      status: snapshot.status,
    };
  }
}
