import { createLimiter, createMutex } from "../../src/shared/concurrency/limiter";

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 20));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 10 }, () => limit(work)));
    expect(maxActive).toBeLessThanOrEqual(2);
  });

  it("rejects invalid concurrency", () => {
    expect(() => createLimiter(0)).toThrow("concurrency must be an integer >= 1");
  });

  it("propagates task failures and keeps draining the queue", async () => {
    const limit = createLimiter(1);

    const failing = limit(async () => {
      throw new Error("task failed");
    });
    const following = limit(() => "next");

    await expect(failing).rejects.toThrow("task failed");
    await expect(following).resolves.toBe("next");
  });
});

describe("createMutex", () => {
  it("runs critical sections one at a time in call order", async () => {
    const mutex = createMutex();
    const events: string[] = [];

    const section = (name: string, delayMs: number) =>
      mutex(async () => {
        events.push(`${name}:start`);
        await new Promise((r) => setTimeout(r, delayMs));
        events.push(`${name}:end`);
      });

    await Promise.all([section("a", 20), section("b", 0), section("c", 5)]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });
});
