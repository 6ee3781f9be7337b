export type TrackerConfig = {
  leaseDurationMs: number;
  retryCeiling: number;
  batchSize: number;
  sweepIntervalMs: number;   // 0 disables the background sweeper
  sweepBatchSize: number;
  sweepOnRequest: boolean;
};

export type TrackerConfigInput = Partial<TrackerConfig>;

export const defaultTrackerConfig: TrackerConfig = {
  leaseDurationMs: 5 * 60 * 1000,
  retryCeiling: 3,
  batchSize: 100,
  sweepIntervalMs: 30 * 1000,
  sweepBatchSize: 500,
  sweepOnRequest: true
};

export const trackerCaps = {
  leaseDurationMs: { min: 1, max: 24 * 60 * 60 * 1000 },
  retryCeiling: { min: 0, max: 100 },
  batchSize: { min: 1, max: 1000 },
  sweepIntervalMs: { min: 0, max: 60 * 60 * 1000 },
  sweepBatchSize: { min: 1, max: 10000 }
} as const;

export const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateTrackerConfig = (config: TrackerConfig): TrackerConfig => {
  assertIntegerInRange("leaseDurationMs", config.leaseDurationMs, trackerCaps.leaseDurationMs.min, trackerCaps.leaseDurationMs.max);
  assertIntegerInRange("retryCeiling", config.retryCeiling, trackerCaps.retryCeiling.min, trackerCaps.retryCeiling.max);
  assertIntegerInRange("batchSize", config.batchSize, trackerCaps.batchSize.min, trackerCaps.batchSize.max);
  assertIntegerInRange("sweepIntervalMs", config.sweepIntervalMs, trackerCaps.sweepIntervalMs.min, trackerCaps.sweepIntervalMs.max);
  assertIntegerInRange("sweepBatchSize", config.sweepBatchSize, trackerCaps.sweepBatchSize.min, trackerCaps.sweepBatchSize.max);
  return config;
};

export const resolveTrackerConfig = (input: TrackerConfigInput = {}): TrackerConfig =>
  validateTrackerConfig({ ...defaultTrackerConfig, ...input });
