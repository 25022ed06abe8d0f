import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ListingParser } from "../src/parser.js";
import { CatalogProducer } from "../src/producer.js";
import type { FetchOutcome, PageCount, PageUnit } from "../src/types.js";
import { Channel } from "../src/utils/channel.js";
import type { PageFetcher } from "../src/utils/http.js";
import { renderListing, silenceConsole } from "./helpers/catalog.js";

function fakeFetcher(pages: Record<number, FetchOutcome>, onFetch?: (page: number) => void) {
  const fetched: number[] = [];
  const fetcher: PageFetcher = {
    fetch: async (url: string) => {
      const page = Number.parseInt(url.replace("page-", ""), 10);
      fetched.push(page);
      onFetch?.(page);
      return pages[page] ?? { kind: "ok", status: 200, body: renderListing([]) };
    }
  };
  return { fetcher, fetched };
}

function listing(...slugs: string[]): FetchOutcome {
  return { kind: "ok", status: 200, body: renderListing(slugs.map(slug => ({ slug }))) };
}

function producerFor(fetcher: PageFetcher, startPage: number, pageCount: PageCount, sleep = vi.fn(async () => undefined)) {
  const producer = new CatalogProducer({
    fetcher,
    parser: new ListingParser({ now: () => new Date("2024-01-01T00:00:00Z") }),
    pageUrl: page => `page-${page}`,
    startPage,
    pageCount,
    politeness: () => 25,
    sleep
  });
  return { producer, sleep };
}

async function drainAll(channel: Channel<PageUnit>): Promise<PageUnit[]> {
  const units: PageUnit[] = [];
  for (;;) {
    const unit = await channel.receive();
    units.push(unit);
    if (unit.kind === "end") {
      return units;
    }
  }
}

function summarise(units: readonly PageUnit[]): string[] {
  return units.map(unit => {
    switch (unit.kind) {
      case "data":
        return `data:${unit.page}:${unit.records.map(record => record.slug).join(",")}`;
      case "skip":
        return `skip:${unit.page}:${unit.reason}`;
      case "error":
        return `error:${unit.page}`;
      case "end":
        return `end:${unit.reason}`;
    }
  });
}

describe("CatalogProducer", () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("skips absent pages and stops at the first empty listing", async () => {
    const { fetcher, fetched } = fakeFetcher({
      1: listing("a", "b"),
      2: { kind: "not_found" },
      3: { kind: "failed", reason: "HTTP 503" },
      4: listing("c"),
      5: listing(),
      6: listing("never")
    });
    const { producer, sleep } = producerFor(fetcher, 1, { kind: "until_end" });
    const channel = new Channel<PageUnit>(16);

    const [reason, units] = await Promise.all([producer.run(channel), drainAll(channel)]);

    expect(reason).toBe("end_of_catalog");
    expect(producer.current).toStrictEqual({ kind: "finished", reason: "end_of_catalog" });
    expect(fetched).toStrictEqual([1, 2, 3, 4, 5]);
    expect(summarise(units)).toStrictEqual([
      "data:1:a,b",
      "skip:2:not_found",
      "skip:3:failed",
      "data:4:c",
      "end:end_of_catalog"
    ]);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it("emits an error unit for a malformed page and keeps walking until the page budget is spent", async () => {
    const { fetcher, fetched } = fakeFetcher({
      3: { kind: "ok", status: 200, body: "<html><body>Service unavailable</body></html>" },
      4: listing("d"),
      5: listing("e")
    });
    const { producer, sleep } = producerFor(fetcher, 3, { kind: "finite", pages: 2 });
    const channel = new Channel<PageUnit>(16);

    const [reason, units] = await Promise.all([producer.run(channel), drainAll(channel)]);

    expect(reason).toBe("page_limit");
    expect(fetched).toStrictEqual([3, 4]);
    expect(summarise(units)).toStrictEqual(["error:3", "data:4:d", "end:page_limit"]);
    const errorUnit = units[0];
    expect(errorUnit?.kind === "error" ? errorUnit.diagnostic : "").toContain("Listing container");
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("stops issuing fetches once aborted and still sends the sentinel", async () => {
    const controller = new AbortController();
    const { fetcher, fetched } = fakeFetcher({ 1: listing("a"), 2: listing("b") }, page => {
      if (page === 1) {
        controller.abort();
      }
    });
    const { producer } = producerFor(fetcher, 1, { kind: "until_end" });
    const channel = new Channel<PageUnit>(16);

    const [reason, units] = await Promise.all([producer.run(channel, controller.signal), drainAll(channel)]);

    expect(reason).toBe("aborted");
    expect(fetched).toStrictEqual([1]);
    expect(summarise(units)).toStrictEqual(["data:1:a", "end:aborted"]);
  });

  it("applies backpressure when the consumer lags", async () => {
    const { fetcher, fetched } = fakeFetcher({ 1: listing("a"), 2: listing("b"), 3: listing("c") });
    const { producer } = producerFor(fetcher, 1, { kind: "finite", pages: 3 });
    const channel = new Channel<PageUnit>(1);

    const running = producer.run(channel);
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(fetched).toStrictEqual([1, 2]);

    const units = await drainAll(channel);
    expect(await running).toBe("page_limit");
    expect(summarise(units)).toStrictEqual(["data:1:a", "data:2:b", "data:3:c", "end:page_limit"]);
  });
});
