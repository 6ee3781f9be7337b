import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults for an empty environment", () => {
    const env = loadEnv({});

    expect(env).toEqual({
      TRACKER_BACKEND: "memory",
      MONGO_URI: "mongodb://localhost:27017/crawl",
      MONGO_DB: "crawl",
      CRAWL_NAME: "crawl"
    });
  });

  it.each([
    "mongodb://127.0.0.1:27017/crawl",
    "mongodb+srv://cluster0.example.net/crawl"
  ])("accepts mongodb URIs: %s", (uri) => {
    const env = loadEnv({ MONGO_URI: uri });
    expect(env.MONGO_URI).toBe(uri);
  });

  it("trims values and treats blanks as unset", () => {
    const env = loadEnv({ TRACKER_BACKEND: " mongo ", CRAWL_NAME: "  ", MONGO_DB: " news_2026 " });

    expect(env.TRACKER_BACKEND).toBe("mongo");
    expect(env.CRAWL_NAME).toBe("crawl");
    expect(env.MONGO_DB).toBe("news_2026");
  });

  it("rejects URIs with another scheme", () => {
    expect(() => loadEnv({ MONGO_URI: "postgres://localhost/crawl" })).toThrow(
      "MONGO_URI must use the mongodb:// or mongodb+srv:// scheme. Received: postgres://localhost/crawl"
    );
  });

  it("rejects unknown backends", () => {
    expect(() => loadEnv({ TRACKER_BACKEND: "redis" })).toThrow(
      "TRACKER_BACKEND must be one of memory, mongo. Received: redis"
    );
  });

  it("rejects crawl names that cannot prefix a collection", () => {
    expect(() => loadEnv({ CRAWL_NAME: "news.daily" })).toThrow(
      "CRAWL_NAME must match [A-Za-z0-9_-]+. Received: news.daily"
    );
  });
});
