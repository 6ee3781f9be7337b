export type TrackerBackend = "memory" | "mongo";

export type Env = {
  TRACKER_BACKEND: TrackerBackend;
  MONGO_URI: string;
  MONGO_DB: string;
  CRAWL_NAME: string;
};

const validateMongoUri = (value: string): string => {
  if (!/^mongodb(\+srv)?:\/\//.test(value)) {
    throw new Error(`MONGO_URI must use the mongodb:// or mongodb+srv:// scheme. Received: ${value}`);
  }
  return value;
};

const validateBackend = (value: string): TrackerBackend => {
  if (value === "memory" || value === "mongo") return value;
  throw new Error(`TRACKER_BACKEND must be one of memory, mongo. Received: ${value}`);
};

const validateName = (name: string, value: string): string => {
  if (!/^[A-Za-z0-9_-]+$/.test(value)) {
    throw new Error(`${name} must match [A-Za-z0-9_-]+. Received: ${value}`);
  }
  return value;
};

const readTrimmed = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const TRACKER_BACKEND = validateBackend(readTrimmed(env, "TRACKER_BACKEND") ?? "memory");
  const MONGO_URI = validateMongoUri(readTrimmed(env, "MONGO_URI") ?? "mongodb://localhost:27017/crawl");
  const MONGO_DB = validateName("MONGO_DB", readTrimmed(env, "MONGO_DB") ?? "crawl");
  const CRAWL_NAME = validateName("CRAWL_NAME", readTrimmed(env, "CRAWL_NAME") ?? "crawl");

  return { TRACKER_BACKEND, MONGO_URI, MONGO_DB, CRAWL_NAME };
};
