import { describe, expect, it } from "vitest";
import {
  detect,
  isSpike,
  validateThresholds,
  DetectionError,
  DEFAULT_DETECTOR_THRESHOLDS,
} from "../change-detector.ts";
import { createSnapshot, type Snapshot } from "../../types/snapshot.ts";

// ── Helpers ─────────────────────────────────────────────────────────────────

function snap(overrides?: Partial<Snapshot>): Snapshot {
  return createSnapshot({
    serviceId: "github",
    observedAt: "2026-03-02T10:00:00.000Z",
    status: "UP",
    reportCount: 10,
    ...overrides,
  });
}

const kindsOf = (events: ReturnType<typeof detect>) => events.map((e) => e.kind);

// ── No Baseline ─────────────────────────────────────────────────────────────

describe("detect: first observation", () => {
  it("emits nothing for a service that is UP", () => {
    expect(detect(undefined, snap({ status: "UP" }))).toEqual([]);
  });

  it("emits NEW_OUTAGE for a service that is DOWN", () => {
    const events = detect(undefined, snap({ status: "DOWN", reportCount: 5 }));
    expect(kindsOf(events)).toEqual(["NEW_OUTAGE"]);
    expect(events[0]?.previousStatus).toBeNull();
    expect(events[0]?.previousReportCount).toBeNull();
    expect(events[0]?.newStatus).toBe("DOWN");
    expect(events[0]?.newReportCount).toBe(5);
  });

  it("emits NEW_OUTAGE for a service with ISSUES", () => {
    expect(kindsOf(detect(undefined, snap({ status: "ISSUES" })))).toEqual([
      "NEW_OUTAGE",
    ]);
  });
});

// ── Status Transitions ──────────────────────────────────────────────────────

describe("detect: status transitions", () => {
  it("reports resolution with status change and severity decrease", () => {
    const events = detect(
      snap({ status: "DOWN", reportCount: 40 }),
      snap({ status: "UP", reportCount: 3, observedAt: "2026-03-02T10:10:00.000Z" }),
    );
    expect(kindsOf(events)).toEqual([
      "STATUS_CHANGED",
      "SEVERITY_DECREASED",
      "OUTAGE_RESOLVED",
    ]);
  });

  it("reports escalation from ISSUES to DOWN without resolution", () => {
    const kinds = kindsOf(
      detect(snap({ status: "ISSUES" }), snap({ status: "DOWN" })),
    );
    expect(kinds).toEqual(["STATUS_CHANGED", "SEVERITY_INCREASED"]);
    expect(kinds).not.toContain("OUTAGE_RESOLVED");
  });

  it("reports de-escalation from DOWN to ISSUES without resolution", () => {
    expect(
      kindsOf(detect(snap({ status: "DOWN" }), snap({ status: "ISSUES" }))),
    ).toEqual(["STATUS_CHANGED", "SEVERITY_DECREASED"]);
  });

  it("reports ISSUES to UP as resolved", () => {
    expect(
      kindsOf(detect(snap({ status: "ISSUES" }), snap({ status: "UP" }))),
    ).toEqual(["STATUS_CHANGED", "SEVERITY_DECREASED", "OUTAGE_RESOLVED"]);
  });

  it("carries full before/after context on every event", () => {
    const events = detect(
      snap({ status: "UP", reportCount: 12 }),
      snap({
        status: "DOWN",
        reportCount: 30,
        observedAt: "2026-03-02T10:10:00.000Z",
        serviceUrl: "https://status.example.test/github",
      }),
    );
    for (const event of events) {
      expect(event.serviceId).toBe("github");
      expect(event.previousStatus).toBe("UP");
      expect(event.newStatus).toBe("DOWN");
      expect(event.previousReportCount).toBe(12);
      expect(event.newReportCount).toBe(30);
      expect(event.detectedAt).toBe("2026-03-02T10:10:00.000Z");
      expect(event.serviceUrl).toBe("https://status.example.test/github");
    }
    expect(events[0]?.id).toBe("github:STATUS_CHANGED:2026-03-02T10:10:00.000Z");
  });
});

// ── Report Count Spike ──────────────────────────────────────────────────────

describe("detect: report count spike", () => {
  it("fires on a large jump while status stays UP", () => {
    expect(
      kindsOf(
        detect(
          snap({ status: "UP", reportCount: 10 }),
          snap({ status: "UP", reportCount: 200 }),
        ),
      ),
    ).toEqual(["REPORT_COUNT_SPIKE"]);
  });

  it("does not fire on small absolute jumps", () => {
    expect(
      detect(snap({ reportCount: 1 }), snap({ reportCount: 3 })),
    ).toEqual([]);
  });

  it("does not fire when the relative jump is below the factor", () => {
    // +500 is over the floor but 1500 < 1000 * 2
    expect(
      detect(snap({ reportCount: 1000 }), snap({ reportCount: 1500 })),
    ).toEqual([]);
  });

  it("co-occurs with a status change and sits between severity and resolution", () => {
    expect(
      kindsOf(
        detect(
          snap({ status: "UP", reportCount: 50 }),
          snap({ status: "DOWN", reportCount: 900 }),
        ),
      ),
    ).toEqual(["STATUS_CHANGED", "SEVERITY_INCREASED", "REPORT_COUNT_SPIKE"]);
  });

  it("honours custom thresholds", () => {
    const thresholds = { spikeFactor: 1.5, spikeMinAbsolute: 2 };
    expect(
      kindsOf(detect(snap({ reportCount: 4 }), snap({ reportCount: 6 }), thresholds)),
    ).toEqual(["REPORT_COUNT_SPIKE"]);
  });

  it("isSpike applies both conditions", () => {
    expect(isSpike(0, 100, DEFAULT_DETECTOR_THRESHOLDS)).toBe(true);
    expect(isSpike(0, 99, DEFAULT_DETECTOR_THRESHOLDS)).toBe(false);
    expect(isSpike(200, 399, DEFAULT_DETECTOR_THRESHOLDS)).toBe(false);
    expect(isSpike(200, 400, DEFAULT_DETECTOR_THRESHOLDS)).toBe(true);
  });
});

// ── Determinism & Idempotence ───────────────────────────────────────────────

describe("detect: determinism", () => {
  it("returns nothing for identical observations", () => {
    const s = snap({ status: "DOWN", reportCount: 77 });
    expect(detect(s, s)).toEqual([]);
  });

  it("returns identical sequences for identical inputs", () => {
    const prev = snap({ status: "ISSUES", reportCount: 20 });
    const curr = snap({ status: "UP", reportCount: 500, observedAt: "2026-03-02T11:00:00.000Z" });
    const first = detect(prev, curr);
    const second = detect(prev, curr);
    expect(second).toEqual(first);
    expect(kindsOf(first)).toEqual([
      "STATUS_CHANGED",
      "SEVERITY_DECREASED",
      "REPORT_COUNT_SPIKE",
      "OUTAGE_RESOLVED",
    ]);
  });

  it("does not mutate its inputs and returns frozen events", () => {
    const prev = snap({ status: "UP" });
    const curr = snap({ status: "DOWN" });
    const events = detect(prev, curr);
    expect(prev.status).toBe("UP");
    expect(Object.isFrozen(events[0])).toBe(true);
  });
});

// ── Malformed Input ─────────────────────────────────────────────────────────

describe("detect: malformed snapshots", () => {
  it("rejects a negative report count", () => {
    expect(() => detect(undefined, snap({ reportCount: -1 }))).toThrow(DetectionError);
  });

  it("rejects an unknown status", () => {
    // Shaped like wire input that skipped validation
    const bad: Snapshot = JSON.parse(JSON.stringify({ ...snap(), status: "MAYBE" }));
    expect(() => detect(undefined, bad)).toThrow(
      expect.objectContaining({ name: "DetectionError", code: "INVALID_STATUS" }),
    );
  });

  it("rejects snapshots of different services", () => {
    expect(() =>
      detect(snap({ serviceId: "a" }), snap({ serviceId: "b" })),
    ).toThrow(/different services/);
  });

  it("rejects an unparseable timestamp", () => {
    expect(() => detect(undefined, snap({ observedAt: "yesterday" }))).toThrow(
      DetectionError,
    );
  });
});

// ── Threshold Validation ────────────────────────────────────────────────────

describe("validateThresholds", () => {
  it("accepts the defaults", () => {
    expect(validateThresholds(DEFAULT_DETECTOR_THRESHOLDS)).toBeNull();
  });

  it("rejects a factor below 1", () => {
    expect(validateThresholds({ spikeFactor: 0.5, spikeMinAbsolute: 10 })?.field).toBe(
      "spikeFactor",
    );
  });

  it("rejects a fractional absolute floor", () => {
    expect(validateThresholds({ spikeFactor: 2, spikeMinAbsolute: 2.5 })?.field).toBe(
      "spikeMinAbsolute",
    );
  });
});
