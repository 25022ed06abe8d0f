import { debug, info, warn } from "./logger.js";
import type { PageParser } from "./parser.js";
import type { EndReason, PageCount, PageUnit } from "./types.js";
import type { Channel } from "./utils/channel.js";
import { sleep as defaultSleep, type Sleep } from "./utils/delay.js";
import type { PageFetcher } from "./utils/http.js";

/**
 * Walk state. `running` carries the next page to fetch.
 */
export type ProducerState =
  | { readonly kind: "running"; readonly page: number }
  | { readonly kind: "finished"; readonly reason: Exclude<EndReason, "aborted"> }
  | { readonly kind: "aborted" };

export interface ProducerOptions {
  readonly fetcher: PageFetcher;
  readonly parser: PageParser;
  readonly pageUrl: (page: number) => string;
  readonly startPage: number;
  readonly pageCount: PageCount;
  /** Pause after each emitted page, in milliseconds. */
  readonly politeness: () => number;
  readonly sleep?: Sleep;
}

function diagnosticOf(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}

/**
 * Sequential page walker. Fetches and parses one page at a time and emits one unit per page
 * onto the channel, followed by a single `end` sentinel.
 */
export class CatalogProducer {
  private state: ProducerState;
  private readonly sleep: Sleep;

  constructor(private readonly options: ProducerOptions) {
    this.state = { kind: "running", page: options.startPage };
    this.sleep = options.sleep ?? defaultSleep;
  }

  get current(): ProducerState {
    return this.state;
  }

  private withinBudget(page: number): boolean {
    const { pageCount, startPage } = this.options;
    return pageCount.kind === "until_end" || page < startPage + pageCount.pages;
  }

  /**
   * Walk pages until the budget is spent, the catalog ends, or `signal` aborts.
   *
   * @returns Why the walk stopped; the same reason is sent in the sentinel unit.
   */
  async run(channel: Channel<PageUnit>, signal?: AbortSignal): Promise<EndReason> {
    try {
      while (this.state.kind === "running") {
        this.state = await this.step(this.state.page, channel, signal);
      }
    } catch (cause) {
      this.state = { kind: "aborted" };
      throw cause;
    } finally {
      const reason: EndReason = this.state.kind === "finished" ? this.state.reason : "aborted";
      await channel.send({ kind: "end", reason });
    }
    return this.state.kind === "finished" ? this.state.reason : "aborted";
  }

  private async step(page: number, channel: Channel<PageUnit>, signal?: AbortSignal): Promise<ProducerState> {
    if (signal?.aborted) {
      info(`Crawl interrupted before page ${page}.`);
      return { kind: "aborted" };
    }
    if (!this.withinBudget(page)) {
      debug(`Page budget spent, stopping before page ${page}.`);
      return { kind: "finished", reason: "page_limit" };
    }

    const url = this.options.pageUrl(page);
    const outcome = await this.options.fetcher.fetch(url, signal);

    if (outcome.kind !== "ok") {
      if (signal?.aborted) {
        info(`Crawl interrupted while fetching page ${page}.`);
        return { kind: "aborted" };
      }
      await channel.send({ kind: "skip", page, reason: outcome.kind });
      await this.sleep(this.options.politeness(), signal);
      return { kind: "running", page: page + 1 };
    }

    let unit: PageUnit;
    try {
      const parsed = this.options.parser.parse(outcome.body);
      if (parsed.records.length === 0) {
        info(`End of catalog reached at page ${page}.`);
        return { kind: "finished", reason: "end_of_catalog" };
      }
      for (const issue of parsed.issues) {
        warn(`Page ${page} entry ${issue.entry + 1}: field "${issue.field}" unreadable (${issue.message})`);
      }
      unit = { kind: "data", page, records: parsed.records };
    } catch (cause) {
      unit = { kind: "error", page, diagnostic: diagnosticOf(cause) };
    }

    await channel.send(unit);
    if (unit.kind === "data") {
      await this.sleep(this.options.politeness(), signal);
    }
    return { kind: "running", page: page + 1 };
  }
}
