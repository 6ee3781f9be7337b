import type { ItemPayload, ItemRecord, ItemStats, ItemSubmission } from "../core/items/Item";
import type { RenewResult } from "./ItemStore";

export type SubmitResult = {
  accepted: number;
  duplicates: number;
  rejected: number;
};

export type WorkGrant = {
  identity: string;
  payload: ItemPayload;
  leaseToken: string;
  expiresAt: Date;
  attemptCount: number;
};

export type SuccessReport =
  | { status: "done"; identity: string; discovered: SubmitResult }
  | { status: "invalid_lease"; discoveriesDropped: number };

export type FailureReport =
  | { status: "requeued" | "discarded"; identity: string; attemptCount: number }
  | { status: "invalid_lease" };

export type SeedInput = {
  pending: readonly (string | ItemSubmission)[];
  completed?: readonly string[];
};

/**
 * Coordination contract consumed by the crawl manager.
 * Lease conflicts and stale tokens come back as result values; only backend
 * connectivity failures are thrown (as BackendUnavailableError).
 */
export interface Tracker {
  start(): Promise<void>;
  close(): Promise<void>;
  reset(): Promise<void>;
  registerWorker(): Promise<number>;
  submit(entries: readonly (string | ItemSubmission)[]): Promise<SubmitResult>;
  seed(input: SeedInput): Promise<SubmitResult>;
  requestWork(workerId: number, maxItems?: number, leaseDurationMs?: number): Promise<WorkGrant[]>;
  renewLease(leaseToken: string, leaseDurationMs?: number): Promise<RenewResult>;
  reportSuccess(leaseToken: string, discovered?: readonly (string | ItemSubmission)[]): Promise<SuccessReport>;
  reportFailure(leaseToken: string, opts?: { permanent?: boolean }): Promise<FailureReport>;
  sweepExpiredLeases(): Promise<number>;
  stats(): Promise<ItemStats>;
  listDiscarded(limit?: number): Promise<ItemRecord[]>;
  isCrawlDone(): Promise<boolean>;
}
