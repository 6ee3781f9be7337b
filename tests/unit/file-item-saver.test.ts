import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { encodeIdentitySegment, FileItemSaver, resolveItemPath } from "../../src/infrastructure/savers/FileItemSaver";
import { NullItemSaver } from "../../src/infrastructure/savers/NullItemSaver";

describe("resolveItemPath", () => {
  it("fills in the shard and the encoded identity", () => {
    expect(resolveItemPath("out/{shard}/{id}.html", "abc")).toBe(join("out", "ab", "abc.html"));
  });

  it("keeps identities inside the template directory", () => {
    expect(resolveItemPath("out/{id}", "../../etc/passwd")).toBe(join("out", "..%2F..%2Fetc%2Fpasswd"));
    expect(encodeIdentitySegment("..")).toBe("%2E%2E");
  });
});

describe("FileItemSaver", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "crawl-saver-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes content to the templated path and creates missing directories", async () => {
    const saver = new FileItemSaver(join(dir, "{shard}", "{id}.html"));

    await saver.save("https://example.test/a", Buffer.from("<html></html>"));
    await saver.close();

    const written = await readFile(join(dir, "ht", "https%3A%2F%2Fexample.test%2Fa.html"), "utf8");
    expect(written).toBe("<html></html>");
  });

  it("requires {id} in the template", () => {
    expect(() => new FileItemSaver(join(dir, "page.html"))).toThrow(
      `pathTemplate must contain {id}. Received: ${join(dir, "page.html")}`
    );
  });
});

describe("NullItemSaver", () => {
  it("accepts content without keeping it", async () => {
    const saver = new NullItemSaver();

    await expect(saver.save()).resolves.toBeUndefined();
    await expect(saver.close()).resolves.toBeUndefined();
  });
});
