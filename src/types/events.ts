import type { ServiceStatus } from "./snapshot.ts";

// ── Change Kinds ─────────────────────────────────────────────────────────────

export const CHANGE_KINDS = [
  "NEW_OUTAGE",
  "STATUS_CHANGED",
  "SEVERITY_INCREASED",
  "SEVERITY_DECREASED",
  "REPORT_COUNT_SPIKE",
  "OUTAGE_RESOLVED",
] as const;

export type ChangeKind = (typeof CHANGE_KINDS)[number];

export function isChangeKind(value: unknown): value is ChangeKind {
  return (
    typeof value === "string" &&
    (CHANGE_KINDS as readonly string[]).includes(value)
  );
}

// ── Change Event ─────────────────────────────────────────────────────────────

export interface ChangeEvent {
  readonly id: string;
  readonly serviceId: string;
  readonly detectedAt: string;
  readonly kind: ChangeKind;
  readonly previousStatus: ServiceStatus | null;
  readonly newStatus: ServiceStatus;
  readonly previousReportCount: number | null;
  readonly newReportCount: number;
  readonly serviceUrl?: string;
}
