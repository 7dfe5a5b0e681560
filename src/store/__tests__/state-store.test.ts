import { describe, expect, it } from "vitest";
import { InMemoryStateStore } from "../state-store.ts";
import { createSnapshot, type Snapshot } from "../../types/snapshot.ts";

function snap(overrides?: Partial<Snapshot>): Snapshot {
  return createSnapshot({
    serviceId: "slack",
    observedAt: "2026-03-02T10:00:00.000Z",
    status: "UP",
    reportCount: 4,
    ...overrides,
  });
}

describe("InMemoryStateStore", () => {
  it("returns undefined before the first commit", () => {
    const store = new InMemoryStateStore();
    expect(store.get("slack")).toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it("commits and replaces snapshots", async () => {
    const store = new InMemoryStateStore();
    const first = snap();
    const second = snap({ status: "DOWN", reportCount: 900, observedAt: "2026-03-02T10:10:00.000Z" });

    await store.update("slack", () => ({ next: first, result: undefined }));
    expect(store.get("slack")).toBe(first);

    const seen = await store.update("slack", (current) => ({
      next: second,
      result: current,
    }));
    expect(seen).toBe(first);
    expect(store.get("slack")).toBe(second);
    expect(store.size()).toBe(1);
  });

  it("keeps the current entry when next is null", async () => {
    const store = new InMemoryStateStore();
    const first = snap();
    await store.update("slack", () => ({ next: first, result: null }));
    await store.update("slack", () => ({ next: null, result: null }));
    expect(store.get("slack")).toBe(first);
  });

  it("refuses to commit a snapshot under another service id", async () => {
    const store = new InMemoryStateStore();
    await expect(
      store.update("slack", () => ({ next: snap({ serviceId: "zoom" }), result: null })),
    ).rejects.toThrow(/Refusing to commit/);
    expect(store.get("slack")).toBeUndefined();
  });

  it("freezes snapshots that arrive unfrozen", async () => {
    const store = new InMemoryStateStore();
    const plain: Snapshot = {
      serviceId: "slack",
      observedAt: "2026-03-02T10:00:00.000Z",
      status: "ISSUES",
      reportCount: 20,
    };
    await store.update("slack", () => ({ next: plain, result: null }));
    expect(Object.isFrozen(store.get("slack"))).toBe(true);
  });

  it("lists snapshots ordered by service id", async () => {
    const store = new InMemoryStateStore();
    await store.update("zoom", () => ({ next: snap({ serviceId: "zoom" }), result: null }));
    await store.update("aws", () => ({ next: snap({ serviceId: "aws" }), result: null }));
    expect(store.list().map((s) => s.serviceId)).toEqual(["aws", "zoom"]);
  });

  it("never exposes a mix of fields from two snapshots during a commit", async () => {
    const store = new InMemoryStateStore();
    const a = snap({ status: "UP", reportCount: 1, observedAt: "2026-03-02T10:00:00.000Z" });
    const b = snap({ status: "DOWN", reportCount: 5000, observedAt: "2026-03-02T10:10:00.000Z" });
    await store.update("slack", () => ({ next: a, result: null }));

    const observed: Snapshot[] = [];
    const commits: Promise<null>[] = [];
    for (let i = 0; i < 20; i++) {
      const next = i % 2 === 0 ? b : a;
      commits.push(
        store.update("slack", async () => {
          observed.push(store.get("slack") ?? a);
          await Promise.resolve();
          observed.push(store.get("slack") ?? a);
          return { next, result: null };
        }),
      );
      observed.push(store.get("slack") ?? a);
    }
    await Promise.all(commits);

    for (const s of observed) {
      const matchesA = s.status === a.status && s.reportCount === a.reportCount && s.observedAt === a.observedAt;
      const matchesB = s.status === b.status && s.reportCount === b.reportCount && s.observedAt === b.observedAt;
      expect(matchesA || matchesB).toBe(true);
    }
  });

  it("runs updates for one service strictly one at a time", async () => {
    const store = new InMemoryStateStore();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        store.update("slack", async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((r) => setTimeout(r, 5));
          active--;
          return { next: snap({ reportCount: i }), result: null };
        }),
      ),
    );

    expect(maxActive).toBe(1);
    expect(store.get("slack")?.reportCount).toBe(4);
  });
});
