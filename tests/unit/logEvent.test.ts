import { describeError, logEvent } from "../../src/shared/logging/logEvent";

describe("logEvent", () => {
  const envSnapshot = { ...process.env };
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.restoreAllMocks();
  });

  it("writes one JSON line per event to the stream for its level", () => {
    delete process.env.LOG_LEVEL;

    logEvent("info", "tracker.leases_recovered", { count: 2 });
    logEvent("warn", "tracker.item_discarded", { identity: "x" });
    logEvent("error", "crawl.backend_give_up");

    expect(logSpy).toHaveBeenCalledWith("{\"event\":\"tracker.leases_recovered\",\"count\":2}");
    expect(warnSpy).toHaveBeenCalledWith("{\"event\":\"tracker.item_discarded\",\"identity\":\"x\"}");
    expect(errorSpy).toHaveBeenCalledWith("{\"event\":\"crawl.backend_give_up\"}");
  });

  it("drops events below LOG_LEVEL", () => {
    process.env.LOG_LEVEL = "warn";

    logEvent("debug", "tracker.submitted");
    logEvent("info", "tracker.seeded");
    logEvent("warn", "tracker.stale_report");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("hides debug events by default", () => {
    delete process.env.LOG_LEVEL;

    logEvent("debug", "tracker.submitted");

    expect(logSpy).not.toHaveBeenCalled();
  });

  it("describes errors and other thrown values", () => {
    expect(describeError(new TypeError("bad"))).toEqual({ name: "TypeError", message: "bad" });
    expect(describeError(42)).toEqual({ name: "Error", message: "42" });
  });
});
