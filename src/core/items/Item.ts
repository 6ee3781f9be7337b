export type ItemState = "pending" | "leased" | "done" | "discarded";

export type ItemPayload = Record<string, unknown>;

export type Lease = {
  workerId: number;
  token: string;
  expiresAt: Date;
};

export type ItemRecord = {
  identity: string;
  state: ItemState;
  payload: ItemPayload;
  attemptCount: number;
  lease?: Lease;        // present only while state === "leased"
  createdAt: Date;
  queuedAt: Date;       // insertion time, refreshed on every requeue
  updatedAt: Date;
};

export type ItemSubmission = {
  identity: string;
  payload?: ItemPayload;
};

export type ItemStats = Record<ItemState, number>;

export type WorkerRecord = {
  workerId: number;
  registeredAt: Date;
};

export const terminalStates: ReadonlySet<ItemState> = new Set<ItemState>(["done", "discarded"]);

export const isTerminal = (state: ItemState): boolean => terminalStates.has(state);

export const emptyStats = (): ItemStats => ({ pending: 0, leased: 0, done: 0, discarded: 0 });
