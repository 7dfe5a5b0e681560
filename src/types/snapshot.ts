// ── Service Status ───────────────────────────────────────────────────────────

export const SERVICE_STATUSES = ["UP", "ISSUES", "DOWN"] as const;

export type ServiceStatus = (typeof SERVICE_STATUSES)[number];

/** Ordinal severity: UP < ISSUES < DOWN. */
export const STATUS_ORDINAL: Record<ServiceStatus, number> = {
  UP: 0,
  ISSUES: 1,
  DOWN: 2,
};

export function isServiceStatus(value: unknown): value is ServiceStatus {
  return (
    typeof value === "string" &&
    (SERVICE_STATUSES as readonly string[]).includes(value)
  );
}

// ── Snapshot ─────────────────────────────────────────────────────────────────

/**
 * One point-in-time observation of a monitored service.
 * Snapshots are frozen on creation and replaced, never mutated.
 */
export interface Snapshot {
  readonly serviceId: string;
  readonly observedAt: string;
  readonly status: ServiceStatus;
  readonly reportCount: number;
  readonly serviceUrl?: string;
  readonly affectedRegions?: readonly string[];
  readonly description?: string;
}

export function createSnapshot(fields: Snapshot): Snapshot {
  return Object.freeze({
    ...fields,
    ...(fields.affectedRegions
      ? { affectedRegions: Object.freeze([...fields.affectedRegions]) }
      : {}),
  });
}
