import { retry } from "../../src/shared/retry/retry";

describe("retry custom delay", () => {
  it("waits the delay provided by the retry decision", async () => {
    let attempts = 0;
    const sleeps: number[] = [];
    const result = await retry(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw new Error("retry-me");
      }
      return "ok";
    }, {
      retries: 3,
      minDelayMs: 1,
      maxDelayMs: 10,
      shouldRetry: () => ({ retry: true, delayMs: 7 }),
      randomFn: () => 0,
      sleepFn: async (ms) => {
        sleeps.push(ms);
      }
    });

    expect(result).toBe("ok");
    expect(attempts).toBe(2);
    expect(sleeps).toEqual([7]);
  });

  it("falls back to exponential backoff for an invalid custom delay", async () => {
    const delays: number[] = [];
    let attempts = 0;

    await retry(async () => {
      attempts += 1;
      if (attempts === 1) throw new Error("retry-me");
      return "ok";
    }, {
      retries: 1,
      minDelayMs: 4,
      maxDelayMs: 10,
      jitterRatio: 0,
      shouldRetry: () => ({ retry: true, delayMs: -5 }),
      sleepFn: async () => undefined,
      onRetry: ({ delayMs }) => {
        delays.push(delayMs);
      }
    });

    expect(delays).toEqual([4]);
  });

  it("supports object decision with retry=false", async () => {
    let attempts = 0;
    await expect(retry(async () => {
      attempts += 1;
      throw new Error("fatal");
    }, {
      retries: 3,
      minDelayMs: 1,
      maxDelayMs: 10,
      shouldRetry: () => ({ retry: false })
    })).rejects.toThrow("fatal");

    expect(attempts).toBe(1);
  });
});
