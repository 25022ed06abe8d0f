#!/usr/bin/env node
import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { runCrawl } from "./pipeline.js";
export { RateLimitedFetcher } from "./utils/http.js";
export { ListingParser, parseDownloads, parseListingDate } from "./parser.js";
export { CsvSink, CSV_HEADERS } from "./sink.js";
export type { ModRecord, PageUnit, PageCount, CrawlStats } from "./types.js";
