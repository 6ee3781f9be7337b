import type { ItemSaver } from "../../ports/ItemSaver";

/**
 * Keeps nothing. For crawls that only discover identities.
 */
export class NullItemSaver implements ItemSaver {
  async save(): Promise<void> {}

  async close(): Promise<void> {}
}
