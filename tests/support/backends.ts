import type { Collection } from "mongodb";
import { InMemoryItemStore } from "../../src/infrastructure/memory/InMemoryItemStore";
import {
  type CounterDoc,
  type ItemDoc,
  MongoItemStore,
  type MongoTrackerCollections,
  type WorkerDoc
} from "../../src/infrastructure/mongo/MongoItemStore";
import type { ItemStore } from "../../src/ports/ItemStore";
import { FakeMongoCollection } from "./fakeMongoCollection";

export type FakeMongoCollections = {
  items: FakeMongoCollection;
  workers: FakeMongoCollection;
  counters: FakeMongoCollection;
};

export const createFakeCollections = (): FakeMongoCollections => ({
  items: new FakeMongoCollection(),
  workers: new FakeMongoCollection(),
  counters: new FakeMongoCollection()
});

export const asMongoCollections = (fakes: FakeMongoCollections): MongoTrackerCollections => ({
  items: fakes.items as unknown as Collection<ItemDoc>,
  workers: fakes.workers as unknown as Collection<WorkerDoc>,
  counters: fakes.counters as unknown as Collection<CounterDoc>
});

export const createFakeMongoStore = (fakes: FakeMongoCollections = createFakeCollections()): MongoItemStore =>
  new MongoItemStore({ collections: asMongoCollections(fakes) });

export type BackendCase = {
  name: string;
  createStore: () => ItemStore;
};

export const backends: BackendCase[] = [
  { name: "in-memory store", createStore: () => new InMemoryItemStore() },
  { name: "mongo store", createStore: () => createFakeMongoStore() }
];

export class FakeClock {
  private current: number;

  constructor(start = Date.UTC(2026, 0, 1)) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export const silenceLogs = (): jest.SpyInstance[] => [
  jest.spyOn(console, "log").mockImplementation(() => undefined),
  jest.spyOn(console, "warn").mockImplementation(() => undefined),
  jest.spyOn(console, "error").mockImplementation(() => undefined)
];
