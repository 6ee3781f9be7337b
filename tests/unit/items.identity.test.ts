import { InvalidItemError, normalizeIdentity, normalizeSubmissions } from "../../src/core/items/identity";
import { isTerminal, type ItemState } from "../../src/core/items/Item";
import { assertLeaseDuration, isLeaseLive, isLeaseSweepable, issueLease } from "../../src/core/leases/lease";

describe("identity normalization", () => {
  it("trims identities", () => {
    expect(normalizeIdentity("  https://example.test/a ")).toBe("https://example.test/a");
  });

  it.each([
    { value: "   ", message: "Invalid item: identity is empty" },
    { value: 42, message: "Invalid item: identity must be a string" }
  ])("rejects $value", ({ value, message }) => {
    expect(() => normalizeIdentity(value)).toThrow(InvalidItemError);
    expect(() => normalizeIdentity(value)).toThrow(message);
  });

  it("normalizes mixed submissions and counts the invalid ones", () => {
    const result = normalizeSubmissions([
      "a",
      { identity: " b ", payload: { depth: 2 } },
      { identity: "c", payload: "not an object" },
      null,
      ["d"]
    ]);

    expect(result).toEqual({
      submissions: [
        { identity: "a", payload: {} },
        { identity: "b", payload: { depth: 2 } }
      ],
      rejected: 3
    });
  });
});

describe("lease primitives", () => {
  const now = Date.UTC(2026, 0, 1);

  it("issues a distinct token per lease", () => {
    const first = issueLease(1, 1000, now);
    const second = issueLease(1, 1000, now);

    expect(first.expiresAt).toEqual(new Date(now + 1000));
    expect(first.token).not.toBe(second.token);
  });

  it("is live strictly before expiry and sweepable from expiry on", () => {
    const lease = issueLease(1, 1000, now);

    expect([isLeaseLive(lease, now + 999), isLeaseSweepable(lease, now + 999)]).toEqual([true, false]);
    expect([isLeaseLive(lease, now + 1000), isLeaseSweepable(lease, now + 1000)]).toEqual([false, true]);
  });

  it("rejects non-positive durations", () => {
    expect(() => assertLeaseDuration(0)).toThrow("leaseDurationMs=0 must be an integer >= 1");
    expect(assertLeaseDuration(5)).toBe(5);
  });

  it("treats done and discarded as terminal", () => {
    const states: ItemState[] = ["pending", "leased", "done", "discarded"];

    expect(states.filter(isTerminal)).toEqual(["done", "discarded"]);
  });
});
