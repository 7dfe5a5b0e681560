import type { ChangeEvent, ChangeKind } from "../types/events.ts";
import {
  STATUS_ORDINAL,
  isServiceStatus,
  type Snapshot,
} from "../types/snapshot.ts";

// ── Thresholds ──────────────────────────────────────────────────────────────

export interface DetectorThresholds {
  /** Current count must be at least `previous * spikeFactor`. */
  readonly spikeFactor: number;
  /** ...and at least this many reports above the previous count. */
  readonly spikeMinAbsolute: number;
}

export const DEFAULT_DETECTOR_THRESHOLDS: DetectorThresholds = {
  spikeFactor: 2,
  spikeMinAbsolute: 100,
};

export interface ThresholdProblem {
  readonly field: "spikeFactor" | "spikeMinAbsolute";
  readonly message: string;
}

export function validateThresholds(
  thresholds: DetectorThresholds,
): ThresholdProblem | null {
  if (!Number.isFinite(thresholds.spikeFactor) || thresholds.spikeFactor < 1) {
    return {
      field: "spikeFactor",
      message: `spikeFactor must be a finite number >= 1, got ${thresholds.spikeFactor}`,
    };
  }
  if (
    !Number.isInteger(thresholds.spikeMinAbsolute) ||
    thresholds.spikeMinAbsolute < 0
  ) {
    return {
      field: "spikeMinAbsolute",
      message: `spikeMinAbsolute must be a non-negative integer, got ${thresholds.spikeMinAbsolute}`,
    };
  }
  return null;
}

// ── Detection Error ─────────────────────────────────────────────────────────

export type DetectionErrorCode =
  | "INVALID_SERVICE_ID"
  | "INVALID_STATUS"
  | "INVALID_REPORT_COUNT"
  | "INVALID_TIMESTAMP"
  | "SERVICE_MISMATCH";

export class DetectionError extends Error {
  override readonly name = "DetectionError";

  constructor(
    message: string,
    readonly code: DetectionErrorCode,
    readonly serviceId: string,
  ) {
    super(message);
  }
}

// ── detect ──────────────────────────────────────────────────────────────────

/**
 * Classify the difference between two consecutive snapshots of one service.
 *
 * Pure: the result depends only on the two snapshots and the thresholds.
 * Events come out in a fixed order: STATUS_CHANGED, SEVERITY_INCREASED or
 * SEVERITY_DECREASED, REPORT_COUNT_SPIKE, OUTAGE_RESOLVED.
 *
 * @throws DetectionError when either snapshot is malformed.
 */
export function detect(
  previous: Snapshot | undefined,
  current: Snapshot,
  thresholds: DetectorThresholds = DEFAULT_DETECTOR_THRESHOLDS,
): ChangeEvent[] {
  assertWellFormed(current);

  if (previous === undefined) {
    return current.status === "UP"
      ? []
      : [buildEvent("NEW_OUTAGE", undefined, current)];
  }

  assertWellFormed(previous);
  if (previous.serviceId !== current.serviceId) {
    throw new DetectionError(
      `Cannot compare snapshots of different services: ${previous.serviceId} vs ${current.serviceId}`,
      "SERVICE_MISMATCH",
      current.serviceId,
    );
  }

  const kinds: ChangeKind[] = [];

  if (previous.status !== current.status) {
    kinds.push("STATUS_CHANGED");

    const delta =
      STATUS_ORDINAL[current.status] - STATUS_ORDINAL[previous.status];
    kinds.push(delta > 0 ? "SEVERITY_INCREASED" : "SEVERITY_DECREASED");
  }

  if (isSpike(previous.reportCount, current.reportCount, thresholds)) {
    kinds.push("REPORT_COUNT_SPIKE");
  }

  if (previous.status !== "UP" && current.status === "UP") {
    kinds.push("OUTAGE_RESOLVED");
  }

  return kinds.map((kind) => buildEvent(kind, previous, current));
}

export function isSpike(
  previousCount: number,
  currentCount: number,
  thresholds: DetectorThresholds,
): boolean {
  return (
    currentCount >= previousCount * thresholds.spikeFactor &&
    currentCount - previousCount >= thresholds.spikeMinAbsolute
  );
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function buildEvent(
  kind: ChangeKind,
  previous: Snapshot | undefined,
  current: Snapshot,
): ChangeEvent {
  return Object.freeze({
    id: `${current.serviceId}:${kind}:${current.observedAt}`,
    serviceId: current.serviceId,
    detectedAt: current.observedAt,
    kind,
    previousStatus: previous?.status ?? null,
    newStatus: current.status,
    previousReportCount: previous?.reportCount ?? null,
    newReportCount: current.reportCount,
    ...(current.serviceUrl !== undefined ? { serviceUrl: current.serviceUrl } : {}),
  });
}

function assertWellFormed(snapshot: Snapshot): void {
  const id = typeof snapshot.serviceId === "string" ? snapshot.serviceId : "";

  if (id.trim().length === 0) {
    throw new DetectionError(
      "Snapshot has an empty serviceId",
      "INVALID_SERVICE_ID",
      id,
    );
  }
  if (!isServiceStatus(snapshot.status)) {
    throw new DetectionError(
      `Snapshot for ${id} has unknown status "${String(snapshot.status)}"`,
      "INVALID_STATUS",
      id,
    );
  }
  if (!Number.isInteger(snapshot.reportCount) || snapshot.reportCount < 0) {
    throw new DetectionError(
      `Snapshot for ${id} has invalid reportCount ${snapshot.reportCount}`,
      "INVALID_REPORT_COUNT",
      id,
    );
  }
  if (Number.isNaN(Date.parse(snapshot.observedAt))) {
    throw new DetectionError(
      `Snapshot for ${id} has unparseable observedAt "${snapshot.observedAt}"`,
      "INVALID_TIMESTAMP",
      id,
    );
  }
}
