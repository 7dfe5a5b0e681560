import { describe, it, expect, beforeEach } from "vitest";
import { StatusQueryService } from "../query-service.ts";
import { InMemoryStateStore } from "../../store/state-store.ts";
import { EventLogChannel } from "../../channels/event-log-channel.ts";
import { createTestEvent, createTestSnapshot } from "../../testing/fixtures.ts";

describe("StatusQueryService", () => {
  let store: InMemoryStateStore;
  let history: EventLogChannel;
  let queries: StatusQueryService;

  beforeEach(async () => {
    store = new InMemoryStateStore();
    history = new EventLogChannel({ clock: () => new Date("2026-03-02T12:00:00.000Z") });
    queries = new StatusQueryService({
      store,
      history,
      services: [{ id: "GitHub", name: "GitHub" }],
    });
    for (const snapshot of [
      createTestSnapshot({ serviceId: "GitHub", status: "DOWN" }),
      createTestSnapshot({ serviceId: "slack", status: "UP" }),
    ]) {
      await store.update(snapshot.serviceId, () => ({ next: snapshot, result: undefined }));
    }
  });

  it("finds a service regardless of case", () => {
    expect(queries.getCurrentStatus("github")?.serviceId).toBe("GitHub");
    expect(queries.getCurrentStatus("GITHUB")?.status).toBe("DOWN");
    expect(queries.getCurrentStatus("unknown")).toBeUndefined();
  });

  it("filters statuses", () => {
    expect(queries.listAllStatuses().map((s) => s.serviceId)).toEqual(["GitHub", "slack"]);
    expect(queries.listAllStatuses({ status: "UP" }).map((s) => s.serviceId)).toEqual(["slack"]);
  });

  it("reads recent events from the history", async () => {
    await history.deliver(createTestEvent({ detectedAt: "2026-03-02T11:30:00.000Z" }));
    expect(queries.listRecentEvents(60 * 60 * 1000)).toHaveLength(1);
    expect(queries.listRecentEvents(10 * 60 * 1000)).toHaveLength(0);
  });

  it("lists configured services", () => {
    expect(queries.listServices()).toEqual([{ id: "GitHub", name: "GitHub" }]);
  });
});
