import { describe, it, expect, beforeEach } from "vitest";
import { MonitorMetrics, type CycleRecord } from "../metrics.ts";

function createTestCycleRecord(overrides?: Partial<CycleRecord>): CycleRecord {
  return {
    cycleId: "cycle-1",
    servicesAttempted: 3,
    servicesFailed: 1,
    eventsDetected: 2,
    durationMs: 1200,
    finishedAt: "2026-03-02T10:00:01.200Z",
    ...overrides,
  };
}

describe("MonitorMetrics", () => {
  let clock: { now: Date };
  let metrics: MonitorMetrics;

  beforeEach(() => {
    clock = { now: new Date("2026-03-02T10:00:00.000Z") };
    metrics = new MonitorMetrics(() => clock.now);
  });

  it("starts empty with a 100% fetch success rate", () => {
    const stats = metrics.getStats();
    expect(stats.totalFetches).toBe(0);
    expect(stats.fetchSuccessRate).toBe(100);
    expect(stats.totalEvents).toBe(0);
    expect(stats.lastCycle).toBeNull();
    expect(stats.collectedSince).toBe("2026-03-02T10:00:00.000Z");
  });

  it("computes the fetch success rate as a percentage", () => {
    metrics.recordFetch(true);
    metrics.recordFetch(true);
    metrics.recordFetch(false);
    const stats = metrics.getStats();
    expect(stats.successfulFetches).toBe(2);
    expect(stats.failedFetches).toBe(1);
    expect(stats.fetchSuccessRate).toBe(66.67);
  });

  it("counts events by kind", () => {
    metrics.recordEvent("STATUS_CHANGED");
    metrics.recordEvent("STATUS_CHANGED");
    metrics.recordEvent("OUTAGE_RESOLVED");
    const stats = metrics.getStats();
    expect(stats.eventsByKind.STATUS_CHANGED).toBe(2);
    expect(stats.eventsByKind.OUTAGE_RESOLVED).toBe(1);
    expect(stats.eventsByKind.NEW_OUTAGE).toBe(0);
    expect(stats.totalEvents).toBe(3);
  });

  it("tracks deliveries per channel with the last error", () => {
    metrics.recordDelivery("email", true);
    metrics.recordDelivery("email", false, "ECONNREFUSED");
    metrics.recordDelivery("ai-summary", true);
    const stats = metrics.getStats();
    expect(stats.channels).toEqual([
      { channelId: "ai-summary", delivered: 1, failed: 0, lastError: null },
      { channelId: "email", delivered: 1, failed: 1, lastError: "ECONNREFUSED" },
    ]);
    expect(stats.totalDeliveries).toBe(3);
    expect(stats.failedDeliveries).toBe(1);
  });

  it("rolls per-connection channels up under their prefix", () => {
    metrics.recordDelivery("ws:client-1", true);
    metrics.recordDelivery("ws:client-2", true);
    metrics.recordDelivery("ws:client-3", false, "Client client-3 is disconnected");
    expect(metrics.getStats().channels).toEqual([
      { channelId: "ws", delivered: 2, failed: 1, lastError: "Client client-3 is disconnected" },
    ]);
  });

  it("keeps the last cycle and clamps negative values", () => {
    metrics.recordCycle(createTestCycleRecord({ durationMs: -5 }));
    metrics.recordCycle(createTestCycleRecord({ cycleId: "cycle-2" }));
    const stats = metrics.getStats();
    expect(stats.totalCycles).toBe(2);
    expect(stats.lastCycle?.cycleId).toBe("cycle-2");

    metrics.recordCycle(createTestCycleRecord({ cycleId: "cycle-3", durationMs: Number.NaN }));
    expect(metrics.getStats().lastCycle?.durationMs).toBe(0);
  });

  it("reports uptime from the injected clock", () => {
    clock.now = new Date("2026-03-02T10:01:30.900Z");
    expect(metrics.uptimeSeconds()).toBe(90);
  });

  it("stores service counts and resets everything", () => {
    metrics.setServiceCounts(5, 2);
    metrics.recordFetch(false);
    expect(metrics.getStats().currentOutages).toBe(2);

    metrics.reset();
    const stats = metrics.getStats();
    expect(stats.servicesMonitored).toBe(0);
    expect(stats.failedFetches).toBe(0);
  });
});
