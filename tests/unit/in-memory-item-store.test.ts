import { InMemoryItemStore } from "../../src/infrastructure/memory/InMemoryItemStore";

const NOW = Date.UTC(2026, 0, 1);

describe("InMemoryItemStore", () => {
  it("hands out copies that cannot change stored records", async () => {
    const store = new InMemoryItemStore();
    await store.insertIfAbsent([{ identity: "x", payload: { depth: 0 } }], NOW);

    const copy = await store.get("x");
    if (!copy) throw new Error("expected x");
    copy.state = "done";
    copy.payload.depth = 5;

    await expect(store.get("x")).resolves.toMatchObject({ state: "pending", payload: { depth: 0 } });
  });

  it("keeps completed identities out of the pending selection", async () => {
    const store = new InMemoryItemStore();
    await store.insertIfAbsent([{ identity: "done-1", payload: {} }], NOW, "done");
    await store.insertIfAbsent([{ identity: "todo-1", payload: {} }], NOW);

    const pending = await store.selectPending(10);
    expect(pending.map((item) => item.identity)).toEqual(["todo-1"]);
    await expect(store.counts()).resolves.toEqual({ pending: 1, leased: 0, done: 1, discarded: 0 });
  });

  it("skips excluded identities and honours the limit when selecting", async () => {
    const store = new InMemoryItemStore();
    await store.insertIfAbsent(
      ["a", "b", "c", "d"].map((identity) => ({ identity, payload: {} })),
      NOW
    );

    const selected = await store.selectPending(2, new Set(["a"]));
    expect(selected.map((item) => item.identity)).toEqual(["b", "c"]);
  });

  it("only discards items that are still pending", async () => {
    const store = new InMemoryItemStore();
    await store.insertIfAbsent([{ identity: "x", payload: {} }, { identity: "y", payload: {} }], NOW);
    await store.claim("y", 1, 1000, NOW);

    await expect(store.discardPending("x", NOW)).resolves.toBe(true);
    await expect(store.discardPending("x", NOW)).resolves.toBe(false);
    await expect(store.discardPending("y", NOW)).resolves.toBe(false);
    await expect(store.discardPending("missing", NOW)).resolves.toBe(false);
  });

  it("completes only identities that are still pending", async () => {
    const store = new InMemoryItemStore();
    await store.insertIfAbsent(
      ["a", "b", "c"].map((identity) => ({ identity, payload: {} })),
      NOW
    );
    await store.claim("b", 1, 1000, NOW);

    await expect(store.completePending(["a", "b", "a", "missing"], NOW)).resolves.toBe(1);
    await expect(store.get("a")).resolves.toMatchObject({ state: "done" });
    await expect(store.get("b")).resolves.toMatchObject({ state: "leased" });
    const pending = await store.selectPending(10);
    expect(pending.map((item) => item.identity)).toEqual(["c"]);
  });

  it("recovers at most the given number of expired leases per sweep", async () => {
    const store = new InMemoryItemStore();
    await store.insertIfAbsent(
      ["a", "b", "c"].map((identity) => ({ identity, payload: {} })),
      NOW
    );
    for (const identity of ["a", "b", "c"]) await store.claim(identity, 1, 100, NOW);

    await expect(store.sweepExpired(NOW + 100, 2)).resolves.toHaveLength(2);
    await expect(store.sweepExpired(NOW + 100, 2)).resolves.toHaveLength(1);
    await expect(store.counts()).resolves.toEqual({ pending: 3, leased: 0, done: 0, discarded: 0 });
  });
});
