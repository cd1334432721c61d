import { setTimeout as delay } from "node:timers/promises";
import type { ILogObj, Logger } from "tslog";
import type { ZodType, ZodTypeDef } from "zod";
import type { ProviderConfig } from "../config/schema.js";
import {
  errorMessage,
  ProviderAuthenticationError,
  ProviderCollectionError,
  ProviderError,
  ProviderInitializationError,
} from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { ProviderName, UsageProvider, UsageRecord } from "./types.js";

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

export interface ProviderDeps {
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_BACKOFF_MS = 30_000;

/** A page of a cursor-paginated usage report. */
export interface UsagePage<B> {
  data: B[];
  has_more: boolean;
  next_page?: string | null;
}

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

export function backoffMs(attempt: number, retryAfter: string | null): number {
  const seconds = retryAfter === null ? NaN : Number(retryAfter);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.min(seconds * 1000, MAX_BACKOFF_MS);
  return Math.min(1000 * Math.pow(2, attempt), MAX_BACKOFF_MS);
}

/** Midnight UTC `daysBack` days ago. */
export function windowStart(now: Date, daysBack: number): Date {
  const midnight = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return new Date(midnight - daysBack * DAY_MS);
}

export function utcDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/**
 * Shared HTTP plumbing for the organization usage APIs: auth headers,
 * timeouts, retries on 429/5xx and cursor pagination.
 */
export abstract class HttpUsageProvider<B> implements UsageProvider {
  abstract readonly name: ProviderName;
  protected readonly log: Logger<ILogObj>;
  protected readonly fetch: FetchLike;
  protected readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private initialized = false;

  constructor(
    protected readonly config: ProviderConfig,
    deps: ProviderDeps = {},
  ) {
    this.log = createLogger(`provider:${new.target.name}`);
    this.fetch = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.now = deps.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  async initialize(): Promise<void> {
    if (!this.config.apiKey) {
      throw new ProviderAuthenticationError(this.name, "API key not provided");
    }
    try {
      // Throws on a malformed base URL before any request goes out.
      this.endpoint();
    } catch (err) {
      throw new ProviderInitializationError(this.name, `invalid base URL: ${errorMessage(err)}`, { cause: err });
    }
    this.initialized = true;
    this.log.info(`${this.name} usage provider initialized`);
  }

  async fetchUsage(daysBack: number): Promise<UsageRecord[]> {
    if (!this.initialized) await this.initialize();
    const now = this.now();
    const start = windowStart(now, daysBack);
    this.log.info(`Collecting ${this.name} usage since ${utcDate(start)}`);
    try {
      const buckets = await this.fetchAllPages(start, now, daysBack + 1);
      const records = this.toRecords(buckets);
      this.log.info(`Collected ${records.length} ${this.name} usage records`);
      return records;
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderCollectionError(this.name, `failed to collect usage: ${errorMessage(err)}`, { cause: err });
    }
  }

  protected abstract endpoint(): URL;
  protected abstract headers(apiKey: string): Record<string, string>;
  protected abstract query(start: Date, end: Date, limit: number): URLSearchParams;
  protected abstract pageSchema(): ZodType<UsagePage<B>, ZodTypeDef, unknown>;
  protected abstract toRecords(buckets: B[]): UsageRecord[];

  private async fetchAllPages(start: Date, end: Date, limit: number): Promise<B[]> {
    const buckets: B[] = [];
    let page: string | undefined;
    do {
      const url = this.endpoint();
      const params = this.query(start, end, Math.min(limit, 31));
      if (page) params.set("page", page);
      url.search = params.toString();
      const result = await this.getJson(url, this.pageSchema());
      buckets.push(...result.data);
      page = result.has_more && result.next_page ? result.next_page : undefined;
    } while (page);
    return buckets;
  }

  protected async getJson<T>(url: URL, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const apiKey = this.config.apiKey ?? "";
    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetch(url, {
          method: "GET",
          headers: this.headers(apiKey),
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });
      } catch (err) {
        if (attempt >= this.config.maxRetries) throw err;
        const wait = backoffMs(attempt, null);
        this.log.warn(`${this.name} request failed (${errorMessage(err)}), retrying in ${wait}ms`);
        await this.sleep(wait);
        continue;
      }

      if (response.ok) {
        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new ProviderCollectionError(
            this.name,
            `unexpected response shape${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`,
          );
        }
        return parsed.data;
      }

      const detail = (await response.text()).slice(0, 200);
      if (response.status === 401 || response.status === 403) {
        throw new ProviderAuthenticationError(this.name, `authentication failed (${response.status}): ${detail}`);
      }
      if (!isRetryable(response.status) || attempt >= this.config.maxRetries) {
        throw new ProviderCollectionError(this.name, `HTTP ${response.status}: ${detail}`);
      }
      const wait = backoffMs(attempt, response.headers.get("retry-after"));
      this.log.warn(`${this.name} returned ${response.status}, retrying in ${wait}ms`);
      await this.sleep(wait);
    }
  }
}
