export type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const resolveLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error" ? raw : "info";
};

/**
 * Writes one JSON line per event: `{"event":"tracker.work_granted",...}`.
 * warn/error go to stderr via console.warn/console.error.
 */
export const logEvent = (level: LogLevel, event: string, fields: Record<string, unknown> = {}): void => {
  if (levelRank[level] < levelRank[resolveLevel()]) return;

  const line = JSON.stringify({ event, ...fields });
  /* eslint-disable no-console */
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
  /* eslint-enable no-console */
};

export const describeError = (err: unknown): { name: string; message: string } =>
  err instanceof Error ? { name: err.name, message: err.message } : { name: "Error", message: String(err) };
