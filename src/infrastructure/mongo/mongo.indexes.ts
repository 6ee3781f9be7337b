import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan, applied by MongoItemStore.init():
 * - { state, queuedAt }: pending selection in arrival order
 * - { lease.token }: renew/release look items up by token only; sparse because only leased items carry one
 * - { state, lease.expiresAt }: expiry sweep
 */
export const mongoIndexes: {
  items: Array<{ keys: IndexSpecification; options: CreateIndexesOptions }>;
} = {
  items: [
    { keys: { state: 1, queuedAt: 1 }, options: { name: "state_queuedAt" } },
    { keys: { "lease.token": 1 }, options: { name: "lease_token", unique: true, sparse: true } },
    { keys: { state: 1, "lease.expiresAt": 1 }, options: { name: "state_lease_expiresAt" } }
  ]
};
