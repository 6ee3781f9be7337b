import { randomUUID } from "crypto";
import type { ItemRecord, Lease } from "../items/Item";

export type ReleaseOutcome = "done" | "requeue" | "discard";

/**
 * Either a fixed outcome or one computed from the item as it is at release time.
 * Stores evaluate the function form inside the same atomic step as the write.
 */
export type ReleaseDecision = ReleaseOutcome | ((item: ItemRecord) => ReleaseOutcome);

export const issueLease = (workerId: number, durationMs: number, now: number): Lease => ({
  workerId,
  token: randomUUID(),
  expiresAt: new Date(now + durationMs)
});

/**
 * A lease is live strictly before its expiry and sweepable from its expiry on,
 * so there is no instant where it is both (or neither).
 */
export const isLeaseLive = (lease: Lease, now: number): boolean => now < lease.expiresAt.getTime();

export const isLeaseSweepable = (lease: Lease, now: number): boolean => !isLeaseLive(lease, now);

export const resolveDecision = (decision: ReleaseDecision, item: ItemRecord): ReleaseOutcome =>
  typeof decision === "function" ? decision(item) : decision;

export const assertLeaseDuration = (durationMs: number): number => {
  if (!Number.isInteger(durationMs) || durationMs < 1) {
    throw new Error(`leaseDurationMs=${String(durationMs)} must be an integer >= 1`);
  }
  return durationMs;
};
