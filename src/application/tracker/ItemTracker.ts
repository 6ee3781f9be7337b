import type { ItemRecord, ItemStats, ItemSubmission } from "../../core/items/Item";
import { normalizeSubmissions } from "../../core/items/identity";
import { assertLeaseDuration, type ReleaseOutcome } from "../../core/leases/lease";
import type { ItemStore, RenewResult } from "../../ports/ItemStore";
import type {
  FailureReport,
  SeedInput,
  SubmitResult,
  SuccessReport,
  Tracker,
  WorkGrant
} from "../../ports/Tracker";
import { logEvent } from "../../shared/logging/logEvent";
import { LeaseSweeper } from "./leaseSweeper";
import {
  assertIntegerInRange,
  resolveTrackerConfig,
  type TrackerConfig,
  type TrackerConfigInput,
  trackerCaps
} from "./tracker.config";
import { UnknownWorkerError } from "./tracker.errors";

export type ItemTrackerDeps = {
  store: ItemStore;
  config?: TrackerConfigInput;
  clock?: () => number;
};

type DiscardReason = "permanent" | "retry_ceiling";

const emptySubmitResult = (): SubmitResult => ({ accepted: 0, duplicates: 0, rejected: 0 });

/**
 * Coordinates workers over an ItemStore. The store owns atomicity; this class owns
 * policy: batch claiming, the retry ceiling, discovery ingestion and sweeping.
 */
export class ItemTracker implements Tracker {
  readonly config: TrackerConfig;
  private readonly store: ItemStore;
  private readonly clock: () => number;
  private readonly sweeper: LeaseSweeper;

  constructor(deps: ItemTrackerDeps) {
    this.store = deps.store;
    this.config = resolveTrackerConfig(deps.config);
    this.clock = deps.clock ?? Date.now;
    this.sweeper = new LeaseSweeper(() => this.sweepExpiredLeases(), this.config.sweepIntervalMs);
  }

  async start(): Promise<void> {
    await this.store.init();
    this.sweeper.start();
  }

  async close(): Promise<void> {
    this.sweeper.stop();
    await this.store.close();
  }

  /**
   * Wipes the crawl namespace: items, workers and the worker id counter.
   */
  async reset(): Promise<void> {
    await this.store.clear();
    logEvent("info", "tracker.reset");
  }

  async registerWorker(): Promise<number> {
    const worker = await this.store.registerWorker(this.clock());
    logEvent("info", "tracker.worker_registered", { workerId: worker.workerId });
    return worker.workerId;
  }

  async submit(entries: readonly (string | ItemSubmission)[]): Promise<SubmitResult> {
    const { submissions, rejected } = normalizeSubmissions(entries);
    if (submissions.length === 0) return { ...emptySubmitResult(), rejected };

    const { created, duplicates } = await this.store.insertIfAbsent(submissions, this.clock());
    const result: SubmitResult = { accepted: created, duplicates, rejected };
    logEvent("debug", "tracker.submitted", result);
    return result;
  }

  /**
   * Loads a crawl's starting point. Completed identities go in first as `done`, so an
   * identity listed both as a seed and as completed is never handed out again. On a resumed
   * crawl, completed identities that are still pending are marked `done` as well; leased ones
   * are left to their worker.
   */
  async seed(input: SeedInput): Promise<SubmitResult> {
    const completed = normalizeSubmissions(input.completed ?? []).submissions;
    let completedCount = 0;
    if (completed.length > 0) {
      const now = this.clock();
      const inserted = await this.store.insertIfAbsent(completed, now, "done");
      const promoted = inserted.duplicates > 0
        ? await this.store.completePending(completed.map(({ identity }) => identity), now)
        : 0;
      completedCount = inserted.created + promoted;
    }

    const result = await this.submit(input.pending);
    logEvent("info", "tracker.seeded", { ...result, completed: completedCount });
    return result;
  }

  async requestWork(
    workerId: number,
    maxItems: number = this.config.batchSize,
    leaseDurationMs: number = this.config.leaseDurationMs
  ): Promise<WorkGrant[]> {
    assertIntegerInRange("maxItems", maxItems, 1, trackerCaps.batchSize.max);
    assertLeaseDuration(leaseDurationMs);
    if (!(await this.store.isWorkerRegistered(workerId))) {
      throw new UnknownWorkerError(workerId);
    }
    if (this.config.sweepOnRequest) {
      await this.sweepExpiredLeases();
    }

    const grants: WorkGrant[] = [];
    const tried = new Set<string>();
    let conflicts = 0;
    let discarded = 0;

    // Every round only sees untried candidates, so the loop ends once the pool is exhausted.
    while (grants.length < maxItems) {
      const candidates = await this.store.selectPending(maxItems - grants.length, tried);
      if (candidates.length === 0) break;

      for (const candidate of candidates) {
        tried.add(candidate.identity);

        if (candidate.attemptCount > this.config.retryCeiling) {
          if (await this.store.discardPending(candidate.identity, this.clock())) {
            discarded += 1;
            this.logDiscard(candidate.identity, candidate.attemptCount, "retry_ceiling");
          }
          continue;
        }

        const claim = await this.store.claim(candidate.identity, workerId, leaseDurationMs, this.clock());
        if (claim.status === "conflict") {
          conflicts += 1;
          continue;
        }

        grants.push({
          identity: claim.item.identity,
          payload: claim.item.payload,
          leaseToken: claim.lease.token,
          expiresAt: claim.lease.expiresAt,
          attemptCount: claim.item.attemptCount
        });
      }
    }

    logEvent(grants.length > 0 ? "info" : "debug", "tracker.work_granted", {
      workerId,
      requested: maxItems,
      granted: grants.length,
      conflicts,
      discarded
    });
    return grants;
  }

  renewLease(leaseToken: string, leaseDurationMs: number = this.config.leaseDurationMs): Promise<RenewResult> {
    assertLeaseDuration(leaseDurationMs);
    return this.store.renew(leaseToken, leaseDurationMs, this.clock());
  }

  /**
   * Discoveries are ingested only after the release succeeds. A report carrying a stale
   * lease has its discoveries dropped; whoever holds the item now will find them again.
   */
  async reportSuccess(
    leaseToken: string,
    discovered: readonly (string | ItemSubmission)[] = []
  ): Promise<SuccessReport> {
    const release = await this.store.release(leaseToken, "done", this.clock());
    if (release.status === "invalid") {
      logEvent("warn", "tracker.stale_report", { kind: "success", discoveriesDropped: discovered.length });
      return { status: "invalid_lease", discoveriesDropped: discovered.length };
    }

    const result = discovered.length > 0 ? await this.submit(discovered) : emptySubmitResult();
    return { status: "done", identity: release.item.identity, discovered: result };
  }

  async reportFailure(leaseToken: string, opts: { permanent?: boolean } = {}): Promise<FailureReport> {
    const permanent = opts.permanent ?? false;
    const ceiling = this.config.retryCeiling;
    const release = await this.store.release(
      leaseToken,
      (item): ReleaseOutcome => (permanent || item.attemptCount >= ceiling ? "discard" : "requeue"),
      this.clock()
    );
    if (release.status === "invalid") {
      logEvent("warn", "tracker.stale_report", { kind: "failure", permanent });
      return { status: "invalid_lease" };
    }

    const { identity, attemptCount } = release.item;
    if (release.outcome === "discard") {
      this.logDiscard(identity, attemptCount, permanent ? "permanent" : "retry_ceiling");
      return { status: "discarded", identity, attemptCount };
    }
    return { status: "requeued", identity, attemptCount };
  }

  async sweepExpiredLeases(): Promise<number> {
    const recovered = await this.store.sweepExpired(this.clock(), this.config.sweepBatchSize);
    if (recovered.length > 0) {
      logEvent("info", "tracker.leases_recovered", {
        count: recovered.length,
        identities: recovered.slice(0, 10).map((item) => item.identity)
      });
    }
    return recovered.length;
  }

  stats(): Promise<ItemStats> {
    return this.store.counts();
  }

  listDiscarded(limit = 100): Promise<ItemRecord[]> {
    return this.store.listByState("discarded", limit);
  }

  async isCrawlDone(): Promise<boolean> {
    const { pending, leased } = await this.store.counts();
    return pending === 0 && leased === 0;
  }

  isSweeperRunning(): boolean {
    return this.sweeper.isStarted();
  }

  private logDiscard(identity: string, attemptCount: number, reason: DiscardReason): void {
    logEvent("warn", "tracker.item_discarded", { identity, attemptCount, reason });
  }
}
