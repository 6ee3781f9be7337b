import type { ItemSubmission } from "../core/items/Item";
import type { WorkGrant } from "./Tracker";

export type ScrapeResult = {
  identity: string;
  content: Buffer;
  discovered: ItemSubmission[];
};

export interface Scraper {
  scrape(item: WorkGrant): Promise<ScrapeResult>;
}

/**
 * A failed scrape. `permanent` failures are discarded by the tracker; the rest are retried
 * up to the retry ceiling.
 */
export class ScrapeError extends Error {
  readonly permanent: boolean;
  readonly status?: number;
  readonly cause?: unknown;

  constructor(args: { message: string; permanent: boolean; status?: number; cause?: unknown }) {
    super(args.message);
    this.name = "ScrapeError";
    this.permanent = args.permanent;
    this.status = args.status;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
