import type { ItemSubmission } from "../../core/items/Item";
import { ScrapeError, type ScrapeResult, type Scraper } from "../../ports/Scraper";
import type { WorkGrant } from "../../ports/Tracker";
import { describeError, logEvent } from "../../shared/logging/logEvent";
import { retry, type RetryOptions } from "../../shared/retry/retry";

type FetchRequestError = Error & {
  status?: number;
  isTimeout?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;
};

export type HttpScraperOptions = {
  /** `{id}` is replaced by the URL-encoded identity; without a template the identity is the URL. */
  urlTemplate?: string;
  /** First capture group (or the whole match) of every match becomes a discovered identity. */
  discoveryPattern?: string | RegExp;
  timeoutMs?: number;
  headers?: Record<string, string>;
  retryOptions?: Partial<Pick<RetryOptions, "retries" | "minDelayMs" | "maxDelayMs" | "sleepFn" | "randomFn">>;
};

export const buildItemUrl = (identity: string, urlTemplate?: string): string =>
  urlTemplate ? urlTemplate.split("{id}").join(encodeURIComponent(identity)) : identity;

const toGlobalPattern = (pattern: string | RegExp): RegExp => {
  const regex = typeof pattern === "string" ? new RegExp(pattern) : pattern;
  return regex.flags.includes("g") ? new RegExp(regex.source, regex.flags) : new RegExp(regex.source, `${regex.flags}g`);
};

const resolveAgainst = (value: string, baseUrl: string): string | undefined => {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return undefined;
  }
};

/**
 * Extracts discovered identities from page text, de-duplicated in order of first match.
 * With `baseUrl`, matches are resolved as (possibly relative) links.
 */
export const extractDiscoveries = (
  text: string,
  pattern: string | RegExp,
  discoveredFrom: string,
  baseUrl?: string
): ItemSubmission[] => {
  const seen = new Set<string>();
  const discovered: ItemSubmission[] = [];

  for (const match of text.matchAll(toGlobalPattern(pattern))) {
    const raw = (match[1] ?? match[0]).trim();
    if (raw === "") continue;
    const identity = baseUrl ? resolveAgainst(raw, baseUrl) : raw;
    if (identity == null || seen.has(identity)) continue;
    seen.add(identity);
    discovered.push({ identity, payload: { discoveredFrom } });
  }

  return discovered;
};

const isPermanentStatus = (status: number | undefined): boolean =>
  typeof status === "number" && status >= 400 && status < 500 && status !== 429;

/**
 * Fetches each leased item over HTTP using native fetch (Node 20).
 */
export class HttpScraper implements Scraper {
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpScraperOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 8000;
  }

  async scrape(item: WorkGrant): Promise<ScrapeResult> {
    const target = buildItemUrl(item.identity, this.options.urlTemplate);
    let url: URL;
    try {
      url = new URL(target);
    } catch (err) {
      throw new ScrapeError({ message: `Not an absolute URL: ${target}`, permanent: true, cause: err });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ScrapeError({ message: `Unsupported URL scheme: ${url.protocol}`, permanent: true });
    }

    let content: Buffer;
    try {
      content = await this.fetchWithRetry(url);
    } catch (err) {
      const status = (err as FetchRequestError).status;
      throw new ScrapeError({
        message: `Scrape of ${item.identity} failed: ${describeError(err).message}`,
        permanent: isPermanentStatus(status),
        status,
        cause: err
      });
    }

    const pattern = this.options.discoveryPattern;
    const discovered = pattern
      ? extractDiscoveries(
        content.toString("utf8"),
        pattern,
        item.identity,
        this.options.urlTemplate ? undefined : url.toString()
      )
      : [];

    return { identity: item.identity, content, discovered };
  }

  private fetchWithRetry(url: URL): Promise<Buffer> {
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const doFetch = async (): Promise<Buffer> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          headers: this.options.headers,
          signal: controller.signal
        });
      } catch (err) {
        if (controller.signal.aborted) {
          const timeoutError = new Error(`request timeout after ${this.timeoutMs}ms`) as FetchRequestError;
          timeoutError.isTimeout = true;
          timeoutError.requestUrl = safeRequestUrl;
          throw timeoutError;
        }
        throw err;
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        const err = new Error(`request failed: ${res.status}`) as FetchRequestError;
        err.status = res.status;
        err.requestUrl = safeRequestUrl;
        if (res.status === 429) {
          const retryAfter = res.headers.get("retry-after");
          if (retryAfter && /^\d+$/.test(retryAfter)) {
            err.retryDelayMs = Number(retryAfter) * 1000;
          }
        }
        throw err;
      }

      return Buffer.from(await res.arrayBuffer());
    };

    const retryOptions = this.options.retryOptions ?? {};
    return retry(doFetch, {
      retries: retryOptions.retries ?? 3,
      minDelayMs: retryOptions.minDelayMs ?? 250,
      maxDelayMs: retryOptions.maxDelayMs ?? 5000,
      sleepFn: retryOptions.sleepFn,
      randomFn: retryOptions.randomFn,
      onRetry: ({ attempt, maxAttempts, error }) => {
        const fetchError = error as FetchRequestError;
        logEvent("warn", "http.retry", {
          status: fetchError.status ?? null,
          url: fetchError.requestUrl ?? safeRequestUrl,
          attempt,
          maxAttempts
        });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        const fetchError = error as FetchRequestError;
        logEvent("warn", "http.give_up", {
          status: fetchError.status ?? null,
          url: fetchError.requestUrl ?? safeRequestUrl,
          attempt,
          maxAttempts
        });
      },
      shouldRetry: (err) => {
        const fetchError = err as FetchRequestError;
        if (fetchError.isTimeout) return true;

        const status = fetchError.status;
        if (status === 429) {
          return { retry: true, delayMs: fetchError.retryDelayMs };
        }
        if (typeof status === "number") return status >= 500;
        return true;
      }
    });
  }
}
