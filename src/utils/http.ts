import axios, { type AxiosInstance } from "axios";
import pLimit, { type LimitFunction } from "p-limit";
import { NET } from "../config.js";
import { debug, warn } from "../logger.js";
import type { FetchOutcome } from "../types.js";
import { jittered, sleep as defaultSleep, type Sleep } from "./delay.js";

/**
 * Tuning for {@link RateLimitedFetcher}. Every field has a default from `NET`.
 */
export interface FetcherOptions {
  readonly concurrency?: number;
  readonly maxAttempts?: number;
  readonly timeoutMs?: number;
  readonly retryableStatuses?: readonly number[];
  readonly backoffBaseMs?: number;
  readonly backoffFactor?: number;
  readonly backoffJitterMs?: number;
  readonly politeBaseMs?: number;
  readonly politeJitterMs?: number;
  readonly client?: AxiosInstance;
  readonly sleep?: Sleep;
  readonly random?: () => number;
}

/**
 * Anything that can turn a URL into a {@link FetchOutcome}.
 */
export interface PageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<FetchOutcome>;
}

type AttemptResult =
  | { readonly kind: "response"; readonly status: number; readonly body: string }
  | { readonly kind: "transport"; readonly reason: string };

function createHttpClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    maxRedirects: 5,
    responseType: "text",
    headers: {
      "User-Agent": NET.USER_AGENT,
      Accept: "text/html,application/xhtml+xml"
    }
  });
}

function describeTransportError(rawError: unknown): string {
  if (axios.isAxiosError(rawError)) {
    return rawError.code ? `${rawError.code}: ${rawError.message}` : rawError.message;
  }
  return rawError instanceof Error ? rawError.message : String(rawError);
}

function bodyAsText(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  return data === undefined || data === null ? "" : JSON.stringify(data);
}

/**
 * Wait before attempt `attempt + 1`, where `attempt` counts failed attempts so far (1-based).
 *
 * `base × factor^(attempt-1) + random × jitter`; strictly increasing in `attempt` for factor > 1.
 */
export function computeBackoff(
  attempt: number,
  baseMs: number,
  factor: number,
  jitterMs: number,
  random: () => number = Math.random
): number {
  return jittered(baseMs * factor ** (attempt - 1), jitterMs, random);
}

/**
 * HTTP GET with a shared permit pool, per-attempt timeout, exponential backoff and a
 * politeness delay after every success.
 *
 * Never throws for network or HTTP problems: exhaustion yields `failed`, 404 yields `not_found`.
 */
export class RateLimitedFetcher implements PageFetcher {
  private readonly limit: LimitFunction;
  private readonly client: AxiosInstance;
  private readonly maxAttempts: number;
  private readonly retryable: ReadonlySet<number>;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(private readonly options: FetcherOptions = {}) {
    this.limit = pLimit(Math.max(1, options.concurrency ?? NET.CONCURRENCY));
    this.client = options.client ?? createHttpClient(options.timeoutMs ?? NET.TIMEOUT);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? NET.MAX_ATTEMPTS);
    this.retryable = new Set<number>(options.retryableStatuses ?? NET.RETRYABLE_STATUSES);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Number of attempts currently holding a permit.
   */
  get inFlight(): number {
    return this.limit.activeCount;
  }

  /**
   * Fetch `url` as text.
   *
   * @param url - Target URL.
   * @param signal - Cancels in-flight requests and pending waits.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    let lastReason = "no attempt made";
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        return { kind: "failed", reason: "aborted" };
      }
      const result = await this.limit(() => this.attempt(url, signal));

      if (result.kind === "response") {
        if (result.status >= 200 && result.status < 300) {
          debug(`GET ${url} -> ${result.status} (attempt ${attempt}/${this.maxAttempts})`);
          await this.sleep(this.politenessDelay(), signal);
          return { kind: "ok", status: result.status, body: result.body };
        }
        if (result.status === 404) {
          debug(`GET ${url} -> 404, treating as absent`);
          return { kind: "not_found" };
        }
        lastReason = `HTTP ${result.status}`;
        if (this.retryable.has(result.status)) {
          warn(`Retryable status ${result.status} for ${url} (attempt ${attempt}/${this.maxAttempts})`);
        } else {
          warn(`Unexpected status ${result.status} for ${url} (attempt ${attempt}/${this.maxAttempts})`);
        }
      } else {
        if (signal?.aborted) {
          return { kind: "failed", reason: "aborted" };
        }
        lastReason = result.reason;
        warn(`Request failed for ${url}: ${result.reason} (attempt ${attempt}/${this.maxAttempts})`);
      }

      if (attempt < this.maxAttempts) {
        const backoff = this.backoffFor(attempt);
        debug(`Backing off ${backoff}ms before attempt ${attempt + 1}/${this.maxAttempts} for ${url}`);
        await this.sleep(backoff, signal);
      }
    }
    warn(`Giving up on ${url} after ${this.maxAttempts} attempts: ${lastReason}`);
    return { kind: "failed", reason: lastReason };
  }

  /**
   * Backoff before the attempt that follows failed attempt number `attempt`.
   */
  backoffFor(attempt: number): number {
    return computeBackoff(
      attempt,
      this.options.backoffBaseMs ?? NET.BACKOFF_BASE_MS,
      this.options.backoffFactor ?? NET.BACKOFF_FACTOR,
      this.options.backoffJitterMs ?? NET.BACKOFF_JITTER_MS,
      this.random
    );
  }

  /**
   * Randomised pause applied between successful requests.
   */
  politenessDelay(): number {
    return jittered(
      this.options.politeBaseMs ?? NET.POLITE_BASE_MS,
      this.options.politeJitterMs ?? NET.POLITE_JITTER_MS,
      this.random
    );
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<AttemptResult> {
    try {
      const response = await this.client.get<unknown>(url, {
        signal,
        timeout: this.options.timeoutMs ?? NET.TIMEOUT,
        responseType: "text",
        validateStatus: () => true
      });
      return { kind: "response", status: response.status, body: bodyAsText(response.data) };
    } catch (rawError) {
      return { kind: "transport", reason: describeTransportError(rawError) };
    }
  }
}
