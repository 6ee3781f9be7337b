import {
  emptyStats,
  type ItemRecord,
  type ItemState,
  type ItemStats,
  type ItemSubmission,
  type WorkerRecord
} from "../../core/items/Item";
import {
  isLeaseLive,
  isLeaseSweepable,
  issueLease,
  type ReleaseDecision,
  type ReleaseOutcome,
  resolveDecision
} from "../../core/leases/lease";
import type {
  ClaimResult,
  InsertResult,
  ItemStore,
  ReleaseResult,
  RenewResult
} from "../../ports/ItemStore";
import { createMutex } from "../../shared/concurrency/limiter";

const cloneRecord = (item: ItemRecord): ItemRecord => ({
  ...item,
  payload: { ...item.payload },
  lease: item.lease ? { ...item.lease } : undefined
});

/**
 * Single-process store. Every operation runs inside one mutex, so claim/renew/release
 * and the sweep never interleave. All state is lost when the process exits.
 */
export class InMemoryItemStore implements ItemStore {
  private readonly items = new Map<string, ItemRecord>();
  // Insertion-ordered; a requeue deletes and re-adds, moving the item to the back.
  private readonly pending = new Set<string>();
  private readonly identityByToken = new Map<string, string>();
  private readonly workers = new Map<number, WorkerRecord>();
  private lastWorkerId = 0;
  private readonly exclusive = createMutex();

  async init(): Promise<void> {
    // nothing to prepare
  }

  registerWorker(now: number): Promise<WorkerRecord> {
    return this.exclusive(() => {
      this.lastWorkerId += 1;
      const worker: WorkerRecord = { workerId: this.lastWorkerId, registeredAt: new Date(now) };
      this.workers.set(worker.workerId, worker);
      return { ...worker };
    });
  }

  isWorkerRegistered(workerId: number): Promise<boolean> {
    return this.exclusive(() => this.workers.has(workerId));
  }

  insertIfAbsent(
    submissions: readonly Required<ItemSubmission>[],
    now: number,
    initialState: Extract<ItemState, "pending" | "done"> = "pending"
  ): Promise<InsertResult> {
    return this.exclusive(() => {
      let created = 0;
      let duplicates = 0;

      for (const { identity, payload } of submissions) {
        if (this.items.has(identity)) {
          duplicates += 1;
          continue;
        }

        const at = new Date(now);
        this.items.set(identity, {
          identity,
          state: initialState,
          payload: { ...payload },
          attemptCount: 0,
          createdAt: at,
          queuedAt: at,
          updatedAt: at
        });
        if (initialState === "pending") this.pending.add(identity);
        created += 1;
      }

      return { created, duplicates };
    });
  }

  get(identity: string): Promise<ItemRecord | undefined> {
    return this.exclusive(() => {
      const item = this.items.get(identity);
      return item ? cloneRecord(item) : undefined;
    });
  }

  selectPending(limit: number, exclude: ReadonlySet<string> = new Set()): Promise<ItemRecord[]> {
    return this.exclusive(() => {
      const selected: ItemRecord[] = [];
      for (const identity of this.pending) {
        if (selected.length >= limit) break;
        if (exclude.has(identity)) continue;
        const item = this.items.get(identity);
        if (item) selected.push(cloneRecord(item));
      }
      return selected;
    });
  }

  claim(identity: string, workerId: number, durationMs: number, now: number): Promise<ClaimResult> {
    return this.exclusive((): ClaimResult => {
      const item = this.items.get(identity);
      if (!item || item.state !== "pending") return { status: "conflict" };

      const lease = issueLease(workerId, durationMs, now);
      item.state = "leased";
      item.lease = lease;
      item.updatedAt = new Date(now);
      this.pending.delete(identity);
      this.identityByToken.set(lease.token, identity);

      return { status: "claimed", item: cloneRecord(item), lease: { ...lease } };
    });
  }

  renew(token: string, durationMs: number, now: number): Promise<RenewResult> {
    return this.exclusive((): RenewResult => {
      const item = this.findLeased(token);
      if (!item?.lease) return "invalid";
      if (!isLeaseLive(item.lease, now)) return "expired";

      item.lease.expiresAt = new Date(now + durationMs);
      item.updatedAt = new Date(now);
      return "ok";
    });
  }

  release(token: string, decision: ReleaseDecision, now: number): Promise<ReleaseResult> {
    return this.exclusive((): ReleaseResult => {
      const item = this.findLeased(token);
      if (!item?.lease || !isLeaseLive(item.lease, now)) return { status: "invalid" };

      const outcome = resolveDecision(decision, cloneRecord(item));
      this.applyRelease(item, outcome, now);
      return { status: "released", outcome, item: cloneRecord(item) };
    });
  }

  discardPending(identity: string, now: number): Promise<boolean> {
    return this.exclusive(() => {
      const item = this.items.get(identity);
      if (!item || item.state !== "pending") return false;

      item.state = "discarded";
      item.updatedAt = new Date(now);
      this.pending.delete(identity);
      return true;
    });
  }

  completePending(identities: readonly string[], now: number): Promise<number> {
    return this.exclusive(() => {
      let completed = 0;
      for (const identity of identities) {
        const item = this.items.get(identity);
        if (!item || item.state !== "pending") continue;

        item.state = "done";
        item.updatedAt = new Date(now);
        this.pending.delete(identity);
        completed += 1;
      }
      return completed;
    });
  }

  sweepExpired(now: number, limit: number): Promise<ItemRecord[]> {
    return this.exclusive(() => {
      const recovered: ItemRecord[] = [];
      for (const token of [...this.identityByToken.keys()]) {
        if (recovered.length >= limit) break;
        const item = this.findLeased(token);
        if (!item?.lease || !isLeaseSweepable(item.lease, now)) continue;

        this.applyRelease(item, "requeue", now);
        recovered.push(cloneRecord(item));
      }
      return recovered;
    });
  }

  listByState(state: ItemState, limit: number): Promise<ItemRecord[]> {
    return this.exclusive(() => {
      const listed: ItemRecord[] = [];
      for (const item of this.items.values()) {
        if (listed.length >= limit) break;
        if (item.state === state) listed.push(cloneRecord(item));
      }
      return listed;
    });
  }

  counts(): Promise<ItemStats> {
    return this.exclusive(() => {
      const stats = emptyStats();
      for (const item of this.items.values()) stats[item.state] += 1;
      return stats;
    });
  }

  clear(): Promise<void> {
    return this.exclusive(() => {
      this.items.clear();
      this.pending.clear();
      this.identityByToken.clear();
      this.workers.clear();
      this.lastWorkerId = 0;
    });
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private findLeased(token: string): ItemRecord | undefined {
    const identity = this.identityByToken.get(token);
    if (identity == null) return undefined;
    const item = this.items.get(identity);
    if (!item || item.state !== "leased" || item.lease?.token !== token) return undefined;
    return item;
  }

  private applyRelease(item: ItemRecord, outcome: ReleaseOutcome, now: number): void {
    if (item.lease) this.identityByToken.delete(item.lease.token);
    item.lease = undefined;
    item.updatedAt = new Date(now);

    if (outcome === "done") {
      item.state = "done";
    } else if (outcome === "discard") {
      item.state = "discarded";
    } else {
      item.state = "pending";
      item.attemptCount += 1;
      item.queuedAt = new Date(now);
      this.pending.add(item.identity);
    }
  }
}
