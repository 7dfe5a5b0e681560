import type { Snapshot } from "../types/snapshot.ts";
import { KeyedMutex } from "./keyed-mutex.ts";

// ── Store Interface ─────────────────────────────────────────────────────────

export interface StateStore {
  /** Latest committed snapshot, or undefined before the first commit. */
  get(serviceId: string): Snapshot | undefined;
  /** All current snapshots, ordered by service id. */
  list(): readonly Snapshot[];
  /**
   * Run `fn` with exclusive access to one service's entry. `fn` receives the
   * current snapshot and returns the snapshot to commit (or null to keep the
   * current one) along with any value to hand back to the caller.
   */
  update<T>(
    serviceId: string,
    fn: (current: Snapshot | undefined) => StoreUpdate<T> | Promise<StoreUpdate<T>>,
  ): Promise<T>;
  size(): number;
}

export interface StoreUpdate<T> {
  readonly next: Snapshot | null;
  readonly result: T;
}

// ── In-Memory Store ─────────────────────────────────────────────────────────

/**
 * Holds the latest snapshot per service.
 *
 * Writes to one service id are serialised through a per-key mutex; ids do not
 * contend with each other. Entries are frozen objects swapped by reference, so
 * a reader always sees either the old or the new snapshot in full.
 */
export class InMemoryStateStore implements StateStore {
  private readonly entries = new Map<string, Snapshot>();
  private readonly mutex = new KeyedMutex();

  get(serviceId: string): Snapshot | undefined {
    return this.entries.get(serviceId);
  }

  list(): readonly Snapshot[] {
    return [...this.entries.values()].sort((a, b) =>
      a.serviceId.localeCompare(b.serviceId),
    );
  }

  async update<T>(
    serviceId: string,
    fn: (current: Snapshot | undefined) => StoreUpdate<T> | Promise<StoreUpdate<T>>,
  ): Promise<T> {
    return this.mutex.runExclusive(serviceId, async () => {
      const { next, result } = await fn(this.entries.get(serviceId));
      if (next !== null) {
        if (next.serviceId !== serviceId) {
          throw new Error(
            `Refusing to commit snapshot for ${next.serviceId} under ${serviceId}`,
          );
        }
        this.entries.set(
          serviceId,
          Object.isFrozen(next) ? next : Object.freeze({ ...next }),
        );
      }
      return result;
    });
  }

  size(): number {
    return this.entries.size;
  }
}
