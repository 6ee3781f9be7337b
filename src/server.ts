import http from "http";
import type { Tracker } from "./ports/Tracker";

type StatsSource = Pick<Tracker, "stats" | "isCrawlDone">;

export type JsonResponse = {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body?: string): unknown;
};

const sendJson = (res: JsonResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

/**
 * GET /stats  -> { pending, leased, done, discarded, crawlDone }
 * GET /healthz -> { ok: true }
 */
export const handleRequest = async (tracker: StatsSource, path: string, res: JsonResponse): Promise<void> => {
  const pathname = new URL(path, "http://localhost").pathname;

  if (pathname === "/healthz") {
    sendJson(res, 200, { ok: true });
    return;
  }

  if (pathname === "/stats") {
    try {
      const [stats, crawlDone] = await Promise.all([tracker.stats(), tracker.isCrawlDone()]);
      sendJson(res, 200, { ...stats, crawlDone });
    } catch (err) {
      sendJson(res, 503, { ok: false, error: err instanceof Error ? err.message : String(err) });
    }
    return;
  }

  sendJson(res, 404, { ok: false, error: "not_found" });
};

export const createServer = (tracker: StatsSource) => {
  return http.createServer((req, res) => {
    void handleRequest(tracker, req.url ?? "/", res);
  });
};
