import { type CrawlConfig, crawlCaps, defaultCrawlConfig, validateCrawlConfig } from "../../application/crawl/crawl.config";
import {
  defaultTrackerConfig,
  type TrackerConfig,
  trackerCaps,
  validateTrackerConfig
} from "../../application/tracker/tracker.config";

export const runtimeCaps = {
  fetchTimeoutMs: { min: 1000, max: 60000 }
} as const;

export type RuntimeConfig = {
  trackerConfig: TrackerConfig;
  crawlConfig: CrawlConfig;
  fetchTimeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name}=${env[name] ?? ""} must be one of 1, 0, true, false`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const trackerConfig = validateTrackerConfig({
    leaseDurationMs: parseOptionalIntInRange(env, "LEASE_DURATION_MS", trackerCaps.leaseDurationMs) ?? defaultTrackerConfig.leaseDurationMs,
    retryCeiling: parseOptionalIntInRange(env, "RETRY_CEILING", trackerCaps.retryCeiling) ?? defaultTrackerConfig.retryCeiling,
    batchSize: parseOptionalIntInRange(env, "BATCH_SIZE", trackerCaps.batchSize) ?? defaultTrackerConfig.batchSize,
    sweepIntervalMs: parseOptionalIntInRange(env, "SWEEP_INTERVAL_MS", trackerCaps.sweepIntervalMs) ?? defaultTrackerConfig.sweepIntervalMs,
    sweepBatchSize: parseOptionalIntInRange(env, "SWEEP_BATCH_SIZE", trackerCaps.sweepBatchSize) ?? defaultTrackerConfig.sweepBatchSize,
    sweepOnRequest: parseOptionalBoolean(env, "SWEEP_ON_REQUEST") ?? defaultTrackerConfig.sweepOnRequest
  });

  const crawlConfig = validateCrawlConfig({
    ...defaultCrawlConfig,
    workerCount: parseOptionalIntInRange(env, "WORKER_COUNT", crawlCaps.workerCount) ?? defaultCrawlConfig.workerCount,
    idleBackoffMs: parseOptionalIntInRange(env, "IDLE_BACKOFF_MS", crawlCaps.idleBackoffMs) ?? defaultCrawlConfig.idleBackoffMs
  });

  const fetchTimeoutMs =
    parseOptionalIntInRange(env, "FETCH_TIMEOUT_MS", runtimeCaps.fetchTimeoutMs) ?? 8000;

  return { trackerConfig, crawlConfig, fetchTimeoutMs };
};
