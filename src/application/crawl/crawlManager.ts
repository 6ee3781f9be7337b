import type { ItemStats } from "../../core/items/Item";
import type { ItemSaver } from "../../ports/ItemSaver";
import { ScrapeError, type ScrapeResult, type Scraper } from "../../ports/Scraper";
import type { Tracker, WorkGrant } from "../../ports/Tracker";
import { describeError, logEvent } from "../../shared/logging/logEvent";
import { retry, sleep } from "../../shared/retry/retry";
import { isBackendUnavailable } from "../tracker/tracker.errors";
import { type CrawlConfig, type CrawlConfigInput, resolveCrawlConfig } from "./crawl.config";

export type CrawlManagerDeps = {
  name: string;
  tracker: Tracker;
  scraper: Scraper;
  saver: ItemSaver;
  config?: CrawlConfigInput;
  sleepFn?: (ms: number) => Promise<void>;
};

export type CrawlSummary = {
  name: string;
  workers: number;
  succeeded: number;
  failed: number;
  skipped: number;
  staleReports: number;
  stats: ItemStats;
};

type Counters = Pick<CrawlSummary, "succeeded" | "failed" | "skipped" | "staleReports">;

/**
 * Owns the poll loop. Workers run concurrently; each one handles its batch one item at a
 * time: renew, scrape, save, report. Tracker calls are retried with backoff while the
 * backend is unavailable. Any other error stops every worker and is rethrown once they
 * have all returned.
 */
export class CrawlManager {
  readonly config: CrawlConfig;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly counters: Counters = { succeeded: 0, failed: 0, skipped: 0, staleReports: 0 };
  // Set once any worker fails; the others finish their current item and return.
  private stopping = false;

  constructor(private readonly deps: CrawlManagerDeps) {
    this.config = resolveCrawlConfig(deps.config);
    this.sleepFn = deps.sleepFn ?? sleep;
  }

  async run(): Promise<CrawlSummary> {
    const { tracker, saver, name } = this.deps;
    const workerIds: number[] = [];
    this.stopping = false;

    try {
      for (let i = 0; i < this.config.workerCount; i += 1) {
        workerIds.push(await this.call("registerWorker", () => tracker.registerWorker()));
      }
      logEvent("info", "crawl.started", { name, workers: workerIds });

      const failures: unknown[] = [];
      await Promise.allSettled(
        workerIds.map((workerId) =>
          this.runWorker(workerId).catch((error: unknown) => {
            failures.push(error);
            this.stopping = true;
            throw error;
          })
        )
      );
      if (failures.length > 0) {
        const [first] = failures;
        logEvent("error", "crawl.stopped", { name, failedWorkers: failures.length, ...describeError(first) });
        throw first;
      }
    } finally {
      await saver.close();
    }

    const stats = await this.call("stats", () => tracker.stats());
    const summary: CrawlSummary = { name, workers: workerIds.length, ...this.counters, stats };
    logEvent("info", "crawl.completed", summary);
    return summary;
  }

  private async runWorker(workerId: number): Promise<void> {
    const { tracker } = this.deps;

    while (!this.stopping) {
      const batch = await this.call("requestWork", () => tracker.requestWork(workerId));

      if (batch.length === 0) {
        if (await this.call("isCrawlDone", () => tracker.isCrawlDone())) return;
        // Nothing pending, but other workers still hold leases that may discover more.
        await this.sleepFn(this.config.idleBackoffMs);
        continue;
      }

      for (const item of batch) {
        // Unprocessed grants are left to expire and be swept.
        if (this.stopping) return;
        await this.processItem(workerId, item);
      }
    }
  }

  private async processItem(workerId: number, item: WorkGrant): Promise<void> {
    const { tracker, scraper, saver } = this.deps;

    // Items late in a batch may have waited close to their expiry.
    const renewal = await this.call("renewLease", () => tracker.renewLease(item.leaseToken));
    if (renewal !== "ok") {
      this.counters.skipped += 1;
      logEvent("debug", "crawl.item_skipped", { workerId, identity: item.identity, renewal });
      return;
    }

    let result: ScrapeResult;
    try {
      result = await scraper.scrape(item);
      await saver.save(result.identity, result.content);
    } catch (err) {
      const permanent = err instanceof ScrapeError && err.permanent;
      logEvent("warn", "crawl.item_failed", { workerId, identity: item.identity, permanent, ...describeError(err) });

      const report = await this.call("reportFailure", () => tracker.reportFailure(item.leaseToken, { permanent }));
      this.counters.failed += 1;
      if (report.status === "invalid_lease") this.counters.staleReports += 1;
      return;
    }

    const report = await this.call("reportSuccess", () => tracker.reportSuccess(item.leaseToken, result.discovered));
    if (report.status === "invalid_lease") {
      this.counters.staleReports += 1;
    } else {
      this.counters.succeeded += 1;
    }
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      retries: this.config.backendRetries,
      minDelayMs: this.config.backendMinDelayMs,
      maxDelayMs: this.config.backendMaxDelayMs,
      sleepFn: this.sleepFn,
      shouldRetry: isBackendUnavailable,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        logEvent("warn", "crawl.backend_retry", {
          operation,
          attempt,
          maxAttempts,
          delayMs,
          ...describeError(error)
        });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        if (!isBackendUnavailable(error)) return;
        logEvent("error", "crawl.backend_give_up", { operation, attempt, maxAttempts, ...describeError(error) });
      }
    });
  }
}
