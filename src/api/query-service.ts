import type { ChangeEvent } from "../types/events.ts";
import type { ServiceStatus, Snapshot } from "../types/snapshot.ts";
import type { StateStore } from "../store/state-store.ts";
import type { EventFilter } from "../channels/event-log-channel.ts";

export interface EventHistory {
  recent(windowMs: number, filter?: EventFilter): ChangeEvent[];
}

export interface ServiceInfo {
  readonly id: string;
  readonly name: string;
  readonly url?: string;
}

export interface StatusFilter {
  readonly status?: ServiceStatus;
}

export interface StatusQueryServiceDeps {
  readonly store: StateStore;
  readonly history: EventHistory;
  readonly services: readonly ServiceInfo[];
}

/** Read-only view over the state store and event history. */
export class StatusQueryService {
  private readonly store: StateStore;
  private readonly history: EventHistory;
  private readonly services: readonly ServiceInfo[];

  constructor(deps: StatusQueryServiceDeps) {
    this.store = deps.store;
    this.history = deps.history;
    this.services = [...deps.services];
  }

  /** Case-insensitive lookup of the latest snapshot. */
  getCurrentStatus(serviceId: string): Snapshot | undefined {
    const exact = this.store.get(serviceId);
    if (exact) return exact;
    const wanted = serviceId.toLowerCase();
    return this.store.list().find((s) => s.serviceId.toLowerCase() === wanted);
  }

  listAllStatuses(filter?: StatusFilter): readonly Snapshot[] {
    const all = this.store.list();
    return filter?.status ? all.filter((s) => s.status === filter.status) : all;
  }

  listRecentEvents(windowMs: number, filter?: EventFilter): readonly ChangeEvent[] {
    return this.history.recent(windowMs, filter);
  }

  listServices(): readonly ServiceInfo[] {
    return this.services;
  }
}
