import type { ItemRecord, ItemState, ItemStats, ItemSubmission, Lease, WorkerRecord } from "../core/items/Item";
import type { ReleaseDecision, ReleaseOutcome } from "../core/leases/lease";

export type InsertResult = {
  created: number;
  duplicates: number;
};

export type ClaimResult =
  | { status: "claimed"; item: ItemRecord; lease: Lease }
  | { status: "conflict" };

export type RenewResult = "ok" | "expired" | "invalid";

export type ReleaseResult =
  | { status: "released"; outcome: ReleaseOutcome; item: ItemRecord }
  | { status: "invalid" };

/**
 * Authoritative item and worker state for one crawl.
 * Implementations must make `claim`, `renew`, `release`, `discardPending` and the
 * per-item transitions inside `completePending` and `sweepExpired` indivisible with
 * respect to each other.
 * Time is always passed in as epoch milliseconds.
 */
export interface ItemStore {
  init(): Promise<void>;
  registerWorker(now: number): Promise<WorkerRecord>;
  isWorkerRegistered(workerId: number): Promise<boolean>;
  insertIfAbsent(
    submissions: readonly Required<ItemSubmission>[],
    now: number,
    initialState?: Extract<ItemState, "pending" | "done">
  ): Promise<InsertResult>;
  get(identity: string): Promise<ItemRecord | undefined>;
  selectPending(limit: number, exclude?: ReadonlySet<string>): Promise<ItemRecord[]>;
  claim(identity: string, workerId: number, durationMs: number, now: number): Promise<ClaimResult>;
  renew(token: string, durationMs: number, now: number): Promise<RenewResult>;
  release(token: string, decision: ReleaseDecision, now: number): Promise<ReleaseResult>;
  discardPending(identity: string, now: number): Promise<boolean>;
  /** Marks the given identities `done` where they are still pending. Returns how many moved. */
  completePending(identities: readonly string[], now: number): Promise<number>;
  sweepExpired(now: number, limit: number): Promise<ItemRecord[]>;
  listByState(state: ItemState, limit: number): Promise<ItemRecord[]>;
  counts(): Promise<ItemStats>;
  clear(): Promise<void>;
  close(): Promise<void>;
}
