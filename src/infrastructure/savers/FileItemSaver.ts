import { mkdir, writeFile } from "fs/promises";
import { dirname, normalize } from "path";
import type { ItemSaver } from "../../ports/ItemSaver";

/**
 * Encodes an identity into a single path segment. `.` and `..` are escaped too,
 * so no identity can step outside the template's directory.
 */
export const encodeIdentitySegment = (identity: string): string =>
  encodeURIComponent(identity).replace(/^\.+$/, (dots) => "%2E".repeat(dots.length));

/**
 * `{id}` is the encoded identity, `{shard}` its first two characters:
 *   resolveItemPath("out/{shard}/{id}.html", "abc") === "out/ab/abc.html"
 */
export const resolveItemPath = (pathTemplate: string, identity: string): string => {
  const id = encodeIdentitySegment(identity);
  return normalize(pathTemplate.split("{shard}").join(id.slice(0, 2)).split("{id}").join(id));
};

export class FileItemSaver implements ItemSaver {
  constructor(private readonly pathTemplate: string) {
    if (!pathTemplate.includes("{id}")) {
      throw new Error(`pathTemplate must contain {id}. Received: ${pathTemplate}`);
    }
  }

  async save(identity: string, content: Buffer): Promise<void> {
    const filePath = resolveItemPath(this.pathTemplate, identity);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }

  async close(): Promise<void> {
    // files are written and closed per item
  }
}
