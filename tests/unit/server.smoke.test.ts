import { closeServer } from "../../src/composition/root";
import { createServer, handleRequest } from "../../src/server";

const statsSource = () => ({
  stats: jest.fn().mockResolvedValue({ pending: 2, leased: 1, done: 5, discarded: 0 }),
  isCrawlDone: jest.fn().mockResolvedValue(false)
});

const response = () => ({
  writeHead: jest.fn(),
  end: jest.fn()
});

describe("server smoke", () => {
  it("responds with health payload", () => {
    const server = createServer(statsSource());
    const handler = server.listeners("request")[0] as ((req: unknown, res: unknown) => void) | undefined;

    expect(typeof handler).toBe("function");

    const res = response();
    handler?.({ url: "/healthz" }, res);

    expect(res.writeHead).toHaveBeenCalledWith(200, { "content-type": "application/json" });
    expect(res.end).toHaveBeenCalledWith(JSON.stringify({ ok: true }));

    server.close();
  });

  it("serves tracker stats with the completion flag", async () => {
    const res = response();

    await handleRequest(statsSource(), "/stats?verbose=1", res);

    expect(res.writeHead).toHaveBeenCalledWith(200, { "content-type": "application/json" });
    expect(res.end).toHaveBeenCalledWith(
      JSON.stringify({ pending: 2, leased: 1, done: 5, discarded: 0, crawlDone: false })
    );
  });

  it("answers 503 when the tracker backend cannot be read", async () => {
    const tracker = statsSource();
    tracker.stats.mockRejectedValue(new Error("Tracker backend unavailable during counts: timeout"));
    const res = response();

    await handleRequest(tracker, "/stats", res);

    expect(res.writeHead).toHaveBeenCalledWith(503, { "content-type": "application/json" });
    expect(res.end).toHaveBeenCalledWith(
      JSON.stringify({ ok: false, error: "Tracker backend unavailable during counts: timeout" })
    );
  });

  it("answers 404 for unknown paths", async () => {
    const res = response();

    await handleRequest(statsSource(), "/items", res);

    expect(res.writeHead).toHaveBeenCalledWith(404, { "content-type": "application/json" });
    expect(res.end).toHaveBeenCalledWith(JSON.stringify({ ok: false, error: "not_found" }));
  });

  it("resolves once a listening server has closed", async () => {
    const server = createServer(statsSource());
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

    await closeServer(server);

    expect(server.listening).toBe(false);
  });

  it("rejects when closing a server that is not running", async () => {
    await expect(closeServer(createServer(statsSource()))).rejects.toMatchObject({ code: "ERR_SERVER_NOT_RUNNING" });
  });
});
