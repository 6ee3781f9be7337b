import { assertIntegerInRange } from "../tracker/tracker.config";

export type CrawlConfig = {
  workerCount: number;
  idleBackoffMs: number;
  backendRetries: number;
  backendMinDelayMs: number;
  backendMaxDelayMs: number;
};

export type CrawlConfigInput = Partial<CrawlConfig>;

export const defaultCrawlConfig: CrawlConfig = {
  workerCount: 4,
  idleBackoffMs: 30 * 1000,
  backendRetries: 8,
  backendMinDelayMs: 250,
  backendMaxDelayMs: 30 * 1000
};

export const crawlCaps = {
  workerCount: { min: 1, max: 256 },
  idleBackoffMs: { min: 1, max: 10 * 60 * 1000 },
  backendRetries: { min: 0, max: 100 },
  backendMinDelayMs: { min: 1, max: 60 * 1000 },
  backendMaxDelayMs: { min: 1, max: 10 * 60 * 1000 }
} as const;

export const validateCrawlConfig = (config: CrawlConfig): CrawlConfig => {
  assertIntegerInRange("workerCount", config.workerCount, crawlCaps.workerCount.min, crawlCaps.workerCount.max);
  assertIntegerInRange("idleBackoffMs", config.idleBackoffMs, crawlCaps.idleBackoffMs.min, crawlCaps.idleBackoffMs.max);
  assertIntegerInRange("backendRetries", config.backendRetries, crawlCaps.backendRetries.min, crawlCaps.backendRetries.max);
  assertIntegerInRange("backendMinDelayMs", config.backendMinDelayMs, crawlCaps.backendMinDelayMs.min, crawlCaps.backendMinDelayMs.max);
  assertIntegerInRange("backendMaxDelayMs", config.backendMaxDelayMs, crawlCaps.backendMaxDelayMs.min, crawlCaps.backendMaxDelayMs.max);
  if (config.backendMaxDelayMs < config.backendMinDelayMs) {
    throw new Error(
      `backendMaxDelayMs=${config.backendMaxDelayMs} must be >= backendMinDelayMs=${config.backendMinDelayMs}`
    );
  }
  return config;
};

export const resolveCrawlConfig = (input: CrawlConfigInput = {}): CrawlConfig =>
  validateCrawlConfig({ ...defaultCrawlConfig, ...input });
