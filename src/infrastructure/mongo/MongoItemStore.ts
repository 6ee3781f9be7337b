import {
  type AnyBulkWriteOperation,
  type Collection,
  type Db,
  type Filter,
  MongoBulkWriteError,
  type MongoClient,
  MongoNetworkError,
  MongoServerSelectionError,
  type UpdateFilter,
  type WithId
} from "mongodb";
import type {
  ItemPayload,
  ItemRecord,
  ItemState,
  ItemStats,
  ItemSubmission,
  Lease,
  WorkerRecord
} from "../../core/items/Item";
import {
  isLeaseLive,
  issueLease,
  type ReleaseDecision,
  type ReleaseOutcome,
  resolveDecision
} from "../../core/leases/lease";
import type {
  ClaimResult,
  InsertResult,
  ItemStore,
  ReleaseResult,
  RenewResult
} from "../../ports/ItemStore";
import { TrackerError, wrapBackendFailure } from "../../application/tracker/tracker.errors";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type ItemDoc = {
  _id: string;            // identity
  state: ItemState;
  payload: ItemPayload;
  attemptCount: number;
  lease?: Lease;
  createdAt: Date;
  queuedAt: Date;
  updatedAt: Date;
};

export type WorkerDoc = {
  _id: number;
  registeredAt: Date;
};

export type CounterDoc = {
  _id: string;
  value: number;
};

export type MongoTrackerCollections = {
  items: Collection<ItemDoc>;
  workers: Collection<WorkerDoc>;
  counters: Collection<CounterDoc>;
};

export type MongoItemStoreOptions =
  | { mongoUri: string; dbName: string; crawlName: string }
  | { collections: MongoTrackerCollections };

const WORKER_ID_COUNTER = "worker_id";
const DUPLICATE_KEY = 11000;

/**
 * Collections for one crawl, prefixed by its name so several crawls can share a database.
 */
export const collectionsFor = (db: Db, crawlName: string): MongoTrackerCollections => ({
  items: db.collection<ItemDoc>(`${crawlName}_items`),
  workers: db.collection<WorkerDoc>(`${crawlName}_workers`),
  counters: db.collection<CounterDoc>(`${crawlName}_counters`)
});

export const isConnectivityError = (err: unknown): boolean =>
  err instanceof MongoNetworkError || err instanceof MongoServerSelectionError;

/**
 * Keeps the first occurrence per identity; later ones in the same batch are duplicates.
 */
export const dedupeSubmissions = (
  submissions: readonly Required<ItemSubmission>[]
): Required<ItemSubmission>[] => {
  const byIdentity = new Map<string, Required<ItemSubmission>>();
  for (const submission of submissions) {
    if (!byIdentity.has(submission.identity)) byIdentity.set(submission.identity, submission);
  }
  return Array.from(byIdentity.values());
};

const isDuplicateKeyOnly = (err: MongoBulkWriteError): boolean => {
  const writeErrors = Array.isArray(err.writeErrors) ? err.writeErrors : [err.writeErrors];
  return writeErrors.length > 0 && writeErrors.every((writeError) => writeError.code === DUPLICATE_KEY);
};

const toRecord = (doc: WithId<ItemDoc>): ItemRecord => ({
  identity: doc._id,
  state: doc.state,
  payload: { ...doc.payload },
  attemptCount: doc.attemptCount,
  lease: doc.lease
    ? { workerId: doc.lease.workerId, token: doc.lease.token, expiresAt: doc.lease.expiresAt }
    : undefined,
  createdAt: doc.createdAt,
  queuedAt: doc.queuedAt,
  updatedAt: doc.updatedAt
});

const releaseUpdate = (outcome: ReleaseOutcome, now: number): UpdateFilter<ItemDoc> => {
  const at = new Date(now);
  if (outcome === "requeue") {
    return {
      $set: { state: "pending", queuedAt: at, updatedAt: at },
      $inc: { attemptCount: 1 },
      $unset: { lease: "" }
    };
  }
  return {
    $set: { state: outcome === "done" ? "done" : "discarded", updatedAt: at },
    $unset: { lease: "" }
  };
};

/**
 * Networked store. Every transition is a single-document conditional write whose filter
 * names the expected prior state (and lease token), so racing writers on any machine
 * resolve to exactly one winner; the losers match nothing.
 */
export class MongoItemStore implements ItemStore {
  private client?: MongoClient;
  private collections?: MongoTrackerCollections;
  private closed = false;

  constructor(private readonly options: MongoItemStoreOptions) {
    if ("collections" in options) this.collections = options.collections;
  }

  async init(): Promise<void> {
    await this.run("init", async ({ items }) => {
      // Index creation is idempotent.
      for (const idx of mongoIndexes.items) {
        await items.createIndex(idx.keys, idx.options);
      }
    });
  }

  registerWorker(now: number): Promise<WorkerRecord> {
    return this.run("registerWorker", async ({ workers, counters }) => {
      const counter = await counters.findOneAndUpdate(
        { _id: WORKER_ID_COUNTER },
        { $inc: { value: 1 } },
        { upsert: true, returnDocument: "after" }
      );
      if (!counter) {
        throw new Error("worker id counter returned no document");
      }

      const worker: WorkerDoc = { _id: counter.value, registeredAt: new Date(now) };
      await workers.insertOne(worker);
      return { workerId: worker._id, registeredAt: worker.registeredAt };
    });
  }

  isWorkerRegistered(workerId: number): Promise<boolean> {
    return this.run("isWorkerRegistered", async ({ workers }) =>
      (await workers.countDocuments({ _id: workerId }, { limit: 1 })) > 0
    );
  }

  insertIfAbsent(
    submissions: readonly Required<ItemSubmission>[],
    now: number,
    initialState: Extract<ItemState, "pending" | "done"> = "pending"
  ): Promise<InsertResult> {
    const unique = dedupeSubmissions(submissions);
    if (unique.length === 0) {
      return Promise.resolve({ created: 0, duplicates: submissions.length });
    }

    return this.run("insertIfAbsent", async ({ items }) => {
      const at = new Date(now);
      const ops: AnyBulkWriteOperation<ItemDoc>[] = unique.map(({ identity, payload }) => ({
        updateOne: {
          filter: { _id: identity },
          update: {
            $setOnInsert: {
              state: initialState,
              payload,
              attemptCount: 0,
              createdAt: at,
              queuedAt: at,
              updatedAt: at
            }
          },
          upsert: true
        }
      }));

      let created: number;
      try {
        const res = await items.bulkWrite(ops, { ordered: false });
        created = res.upsertedCount;
      } catch (err) {
        // Two machines upserting the same identity: the loser's E11000 is just a duplicate.
        if (!(err instanceof MongoBulkWriteError) || !isDuplicateKeyOnly(err)) throw err;
        created = err.result.upsertedCount;
      }

      return { created, duplicates: submissions.length - created };
    });
  }

  get(identity: string): Promise<ItemRecord | undefined> {
    return this.run("get", async ({ items }) => {
      const doc = await items.findOne({ _id: identity });
      return doc ? toRecord(doc) : undefined;
    });
  }

  selectPending(limit: number, exclude: ReadonlySet<string> = new Set()): Promise<ItemRecord[]> {
    // limit(0) means "no limit" to the server
    if (limit < 1) return Promise.resolve([]);

    return this.run("selectPending", async ({ items }) => {
      const filter: Filter<ItemDoc> = { state: "pending" };
      if (exclude.size > 0) filter._id = { $nin: [...exclude] };

      const docs = await items.find(filter).sort({ queuedAt: 1, _id: 1 }).limit(limit).toArray();
      return docs.map(toRecord);
    });
  }

  claim(identity: string, workerId: number, durationMs: number, now: number): Promise<ClaimResult> {
    return this.run("claim", async ({ items }): Promise<ClaimResult> => {
      const lease = issueLease(workerId, durationMs, now);
      const doc = await items.findOneAndUpdate(
        { _id: identity, state: "pending" },
        { $set: { state: "leased", lease, updatedAt: new Date(now) } },
        { returnDocument: "after" }
      );
      return doc ? { status: "claimed", item: toRecord(doc), lease } : { status: "conflict" };
    });
  }

  renew(token: string, durationMs: number, now: number): Promise<RenewResult> {
    return this.run("renew", async ({ items }): Promise<RenewResult> => {
      const res = await items.updateOne(
        { "lease.token": token, state: "leased", "lease.expiresAt": { $gt: new Date(now) } },
        { $set: { "lease.expiresAt": new Date(now + durationMs), updatedAt: new Date(now) } }
      );
      if (res.matchedCount === 1) return "ok";

      const stillHeld = await items.countDocuments({ "lease.token": token, state: "leased" }, { limit: 1 });
      return stillHeld > 0 ? "expired" : "invalid";
    });
  }

  release(token: string, decision: ReleaseDecision, now: number): Promise<ReleaseResult> {
    return this.run("release", async ({ items }): Promise<ReleaseResult> => {
      const current = await items.findOne({ "lease.token": token, state: "leased" });
      if (!current?.lease || !isLeaseLive(current.lease, now)) return { status: "invalid" };

      const outcome = resolveDecision(decision, toRecord(current));
      // attemptCount pins the record the decision was computed from
      const updated = await items.findOneAndUpdate(
        {
          _id: current._id,
          state: "leased",
          "lease.token": token,
          "lease.expiresAt": { $gt: new Date(now) },
          attemptCount: current.attemptCount
        },
        releaseUpdate(outcome, now),
        { returnDocument: "after" }
      );
      return updated ? { status: "released", outcome, item: toRecord(updated) } : { status: "invalid" };
    });
  }

  discardPending(identity: string, now: number): Promise<boolean> {
    return this.run("discardPending", async ({ items }) => {
      const res = await items.updateOne(
        { _id: identity, state: "pending" },
        { $set: { state: "discarded", updatedAt: new Date(now) } }
      );
      return res.matchedCount === 1;
    });
  }

  completePending(identities: readonly string[], now: number): Promise<number> {
    const unique = [...new Set(identities)];
    if (unique.length === 0) return Promise.resolve(0);

    return this.run("completePending", async ({ items }) => {
      const at = new Date(now);
      const ops: AnyBulkWriteOperation<ItemDoc>[] = unique.map((identity) => ({
        updateOne: {
          filter: { _id: identity, state: "pending" },
          update: { $set: { state: "done", updatedAt: at } }
        }
      }));
      const res = await items.bulkWrite(ops, { ordered: false });
      return res.matchedCount;
    });
  }

  sweepExpired(now: number, limit: number): Promise<ItemRecord[]> {
    if (limit < 1) return Promise.resolve([]);

    return this.run("sweepExpired", async ({ items }) => {
      const cutoff = new Date(now);
      const expired = await items
        .find({ state: "leased", "lease.expiresAt": { $lte: cutoff } })
        .sort({ "lease.expiresAt": 1 })
        .limit(limit)
        .toArray();

      const recovered: ItemRecord[] = [];
      for (const doc of expired) {
        if (!doc.lease) continue;
        // Keyed on the token: a concurrent sweeper or release that already moved this lease matches nothing.
        const updated = await items.findOneAndUpdate(
          { _id: doc._id, state: "leased", "lease.token": doc.lease.token, "lease.expiresAt": { $lte: cutoff } },
          releaseUpdate("requeue", now),
          { returnDocument: "after" }
        );
        if (updated) recovered.push(toRecord(updated));
      }
      return recovered;
    });
  }

  listByState(state: ItemState, limit: number): Promise<ItemRecord[]> {
    if (limit < 1) return Promise.resolve([]);

    return this.run("listByState", async ({ items }) => {
      const docs = await items.find({ state }).sort({ updatedAt: 1, _id: 1 }).limit(limit).toArray();
      return docs.map(toRecord);
    });
  }

  counts(): Promise<ItemStats> {
    return this.run("counts", async ({ items }) => {
      const [pending, leased, done, discarded] = await Promise.all([
        items.countDocuments({ state: "pending" }),
        items.countDocuments({ state: "leased" }),
        items.countDocuments({ state: "done" }),
        items.countDocuments({ state: "discarded" })
      ]);
      return { pending, leased, done, discarded };
    });
  }

  clear(): Promise<void> {
    return this.run("clear", async ({ items, workers, counters }) => {
      await items.deleteMany({});
      await workers.deleteMany({});
      await counters.deleteMany({});
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.client?.close();
    this.client = undefined;
    if (!("collections" in this.options)) this.collections = undefined;
  }

  private async getCollections(operation: string): Promise<MongoTrackerCollections> {
    // No reconnect after close: a late caller would leak a fresh client.
    if (this.closed) {
      throw new TrackerError({
        code: "store_closed",
        message: `Tracker store is closed (${operation})`,
        context: { operation }
      });
    }
    if (this.collections) return this.collections;
    if ("collections" in this.options) return this.options.collections;

    this.client = await createMongoClient(this.options.mongoUri);
    this.collections = collectionsFor(this.client.db(this.options.dbName), this.options.crawlName);
    return this.collections;
  }

  private async run<T>(operation: string, fn: (collections: MongoTrackerCollections) => Promise<T>): Promise<T> {
    try {
      return await fn(await this.getCollections(operation));
    } catch (err) {
      if (isConnectivityError(err)) throw wrapBackendFailure(err, operation);
      throw err;
    }
  }
}
