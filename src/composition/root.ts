import { readFile } from "fs/promises";
import type { Server } from "http";
import { CrawlManager, type CrawlSummary } from "../application/crawl/crawlManager";
import { ItemTracker } from "../application/tracker/ItemTracker";
import { HttpScraper } from "../infrastructure/http/HttpScraper";
import { InMemoryItemStore } from "../infrastructure/memory/InMemoryItemStore";
import { MongoItemStore } from "../infrastructure/mongo/MongoItemStore";
import { FileItemSaver } from "../infrastructure/savers/FileItemSaver";
import { NullItemSaver } from "../infrastructure/savers/NullItemSaver";
import type { ItemSaver } from "../ports/ItemSaver";
import type { ItemStore } from "../ports/ItemStore";
import { createServer } from "../server";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { logEvent } from "../shared/logging/logEvent";

export type CrawlInputs = {
  seedFile?: string;
  completedFile?: string;
  urlTemplate?: string;
  discoveryPattern?: string;
  outputPathTemplate?: string;
  resetCrawl: boolean;
  statsPort?: number;
};

const readOptional = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

export const loadCrawlInputs = (env: NodeJS.ProcessEnv = process.env): CrawlInputs => {
  const rawPort = readOptional(env, "STATS_PORT");
  let statsPort: number | undefined;
  if (rawPort != null) {
    statsPort = Number(rawPort);
    if (!Number.isInteger(statsPort) || statsPort < 1 || statsPort > 65535) {
      throw new Error(`STATS_PORT=${rawPort} is out of allowed range [1..65535]`);
    }
  }

  const reset = readOptional(env, "RESET_CRAWL")?.toLowerCase();

  return {
    seedFile: readOptional(env, "SEED_FILE"),
    completedFile: readOptional(env, "COMPLETED_FILE"),
    urlTemplate: readOptional(env, "FETCH_URL_TEMPLATE"),
    discoveryPattern: readOptional(env, "DISCOVERY_PATTERN"),
    outputPathTemplate: readOptional(env, "OUTPUT_PATH_TEMPLATE"),
    resetCrawl: reset === "1" || reset === "true",
    statsPort
  };
};

/**
 * Newline-separated identities; blank lines are skipped.
 */
export const readIdentityFile = async (path: string | undefined): Promise<string[]> => {
  if (path == null) return [];
  const content = await readFile(path, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
};

export const createItemStore = (env: Env): ItemStore =>
  env.TRACKER_BACKEND === "mongo"
    ? new MongoItemStore({ mongoUri: env.MONGO_URI, dbName: env.MONGO_DB, crawlName: env.CRAWL_NAME })
    : new InMemoryItemStore();

const createSaver = (outputPathTemplate: string | undefined): ItemSaver =>
  outputPathTemplate ? new FileItemSaver(outputPathTemplate) : new NullItemSaver();

const listen = (server: Server, port: number): Promise<void> =>
  new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

export const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });

export const runCrawl = async (): Promise<CrawlSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const inputs = loadCrawlInputs();

  const tracker = new ItemTracker({ store: createItemStore(env), config: runtime.trackerConfig });
  const scraper = new HttpScraper({
    urlTemplate: inputs.urlTemplate,
    discoveryPattern: inputs.discoveryPattern,
    timeoutMs: runtime.fetchTimeoutMs
  });
  const saver = createSaver(inputs.outputPathTemplate);
  let server: Server | undefined;

  try {
    await tracker.start();
    if (inputs.resetCrawl) await tracker.reset();

    await tracker.seed({
      pending: await readIdentityFile(inputs.seedFile),
      completed: await readIdentityFile(inputs.completedFile)
    });

    if (inputs.statsPort != null) {
      const statsServer = createServer(tracker);
      await listen(statsServer, inputs.statsPort);
      server = statsServer;
      logEvent("info", "stats.listening", { port: inputs.statsPort });
    }

    const manager = new CrawlManager({
      name: env.CRAWL_NAME,
      tracker,
      scraper,
      saver,
      config: runtime.crawlConfig
    });
    return await manager.run();
  } finally {
    try {
      if (server) await closeServer(server);
    } finally {
      await tracker.close();
    }
  }
};
