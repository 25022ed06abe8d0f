import { CATALOG, type CrawlOptions } from "./config.js";
import { CatalogConsumer } from "./consumer.js";
import { debug, info } from "./logger.js";
import { ListingParser, type PageParser } from "./parser.js";
import { CatalogProducer } from "./producer.js";
import { CsvSink } from "./sink.js";
import type { CrawlStats, EndReason, PageUnit } from "./types.js";
import { Channel } from "./utils/channel.js";
import type { Sleep } from "./utils/delay.js";
import { RateLimitedFetcher, type FetcherOptions } from "./utils/http.js";
import { buildPageUrl } from "./utils/url.js";

/**
 * Collaborators that can be swapped out, mainly for tests.
 */
export interface PipelineDeps {
  readonly fetcher?: RateLimitedFetcher;
  readonly fetcherOptions?: Omit<FetcherOptions, "concurrency">;
  readonly parser?: PageParser;
  readonly baseUrl?: string;
  readonly sleep?: Sleep;
  readonly signal?: AbortSignal;
}

export interface CrawlResult {
  readonly stats: CrawlStats;
  readonly endReason: EndReason;
}

/**
 * Hand-off capacity per permit.
 */
const CHANNEL_SLOTS_PER_PERMIT = 8;

/**
 * Run one crawl: load existing keys, walk pages, persist new records.
 *
 * The sink is opened and its keys loaded before any request is made. If the consumer fails
 * the producer is stopped and the failure is rethrown; rows appended until then stay on disk.
 */
export async function runCrawl(options: CrawlOptions, deps: PipelineDeps = {}): Promise<CrawlResult> {
  const sink = await CsvSink.open(options.outputPath);
  const keys = await sink.loadKeys();

  const fetcher =
    deps.fetcher ??
    new RateLimitedFetcher({
      ...deps.fetcherOptions,
      sleep: deps.sleep ?? deps.fetcherOptions?.sleep,
      concurrency: options.concurrency
    });
  const parser = deps.parser ?? new ListingParser();
  const baseUrl = deps.baseUrl ?? CATALOG.BASE_URL;

  const internal = new AbortController();
  const forwardAbort = () => internal.abort();
  deps.signal?.addEventListener("abort", forwardAbort, { once: true });
  if (deps.signal?.aborted) {
    internal.abort();
  }

  const channel = new Channel<PageUnit>(CHANNEL_SLOTS_PER_PERMIT * options.concurrency);
  const producer = new CatalogProducer({
    fetcher,
    parser,
    pageUrl: page => buildPageUrl(baseUrl, page, options.pageSize),
    startPage: options.startPage,
    pageCount: options.pageCount,
    politeness: () => fetcher.politenessDelay(),
    sleep: deps.sleep
  });
  const consumer = new CatalogConsumer(sink, keys);

  info(
    `Crawling from page ${options.startPage} (${
      options.pageCount.kind === "finite" ? `${options.pageCount.pages} pages` : "until end of catalog"
    }), page size ${options.pageSize}, concurrency ${options.concurrency}, output ${options.outputPath}.`
  );

  try {
    const consumerTask = consumer.drain(channel).catch((cause: unknown) => {
      internal.abort();
      channel.close();
      throw cause;
    });
    const [produced, consumed] = await Promise.allSettled([producer.run(channel, internal.signal), consumerTask]);
    if (consumed.status === "rejected") {
      throw consumed.reason;
    }
    if (produced.status === "rejected") {
      throw produced.reason;
    }
    debug(`Producer stopped: ${produced.value}; consumer saw: ${consumed.value}.`);
    return { stats: consumer.stats, endReason: consumed.value };
  } finally {
    deps.signal?.removeEventListener("abort", forwardAbort);
    await sink.close();
  }
}
