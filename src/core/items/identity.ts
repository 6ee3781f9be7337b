import type { ItemPayload, ItemSubmission } from "./Item";

export class InvalidItemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidItemError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const normalizeIdentity = (value: unknown): string => {
  if (typeof value !== "string") {
    throw new InvalidItemError("Invalid item: identity must be a string");
  }

  const normalized = value.trim();
  if (normalized.length === 0) {
    throw new InvalidItemError("Invalid item: identity is empty");
  }
  return normalized;
};

const normalizePayload = (value: unknown): ItemPayload => {
  if (value == null) return {};
  if (!isRecord(value)) {
    throw new InvalidItemError("Invalid item: payload must be an object");
  }
  return { ...value };
};

export type NormalizedSubmissions = {
  submissions: Required<ItemSubmission>[];
  rejected: number;
};

/**
 * Normalizes a batch of submissions. Invalid entries are counted, not thrown,
 * so one bad identity never fails a whole discovery batch.
 * Duplicates inside the batch are kept; the store absorbs them.
 */
export const normalizeSubmissions = (entries: readonly unknown[]): NormalizedSubmissions => {
  const submissions: Required<ItemSubmission>[] = [];
  let rejected = 0;

  for (const entry of entries) {
    try {
      if (typeof entry === "string") {
        submissions.push({ identity: normalizeIdentity(entry), payload: {} });
        continue;
      }
      if (!isRecord(entry)) {
        throw new InvalidItemError("Invalid item: expected a string or { identity, payload }");
      }
      submissions.push({
        identity: normalizeIdentity(entry.identity),
        payload: normalizePayload(entry.payload)
      });
    } catch (err) {
      if (!(err instanceof InvalidItemError)) throw err;
      rejected += 1;
    }
  }

  return { submissions, rejected };
};
