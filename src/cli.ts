import { Command } from "commander";
import fs from "fs-extra";
import { CATALOG, ConfigError, OUTPUT, resolveCrawlOptions, type RawCrawlOptions } from "./config.js";
import { attachLogFile, debug, detachLogFile, error as logError, info, setLogLevel, warn } from "./logger.js";
import { ListingParser } from "./parser.js";
import { runCrawl, type CrawlResult, type PipelineDeps } from "./pipeline.js";
import { CsvSink } from "./sink.js";
import { RateLimitedFetcher } from "./utils/http.js";
import { buildPageUrl } from "./utils/url.js";

interface CrawlCommandOptions extends RawCrawlOptions {
  readonly logLevel?: string;
}

const reported = new WeakSet<object>();

/**
 * Log a command failure once; later calls for the same error are ignored.
 */
function reportFailure(cause: unknown): void {
  if (typeof cause === "object" && cause !== null) {
    if (reported.has(cause)) {
      return;
    }
    reported.add(cause);
  }
  if (cause instanceof ConfigError) {
    logError(`Invalid configuration: ${cause.message}`);
    return;
  }
  const failure = cause instanceof Error ? cause : new Error(String(cause));
  logError(`CLI failed: ${failure.message}`);
  debug(failure.stack ?? "");
}

/**
 * Crawl mode entry point: validate options, then run the pipeline until the page budget is
 * spent, the catalog ends, or SIGINT arrives.
 *
 * @param raw - Options as parsed by commander.
 * @param deps - Pipeline collaborators; tests pass in-process stand-ins.
 */
export async function crawlAction(raw: CrawlCommandOptions, deps: PipelineDeps = {}): Promise<CrawlResult> {
  setLogLevel(raw.logLevel ?? OUTPUT.LOG_LEVEL);
  const options = resolveCrawlOptions(raw);
  await attachLogFile(options.logPath);

  const controller = new AbortController();
  const onInterrupt = () => {
    warn("Interrupt received, finishing in-flight work and closing the output file.");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  try {
    return await runCrawl(options, { ...deps, signal: deps.signal ?? controller.signal });
  } catch (cause) {
    reportFailure(cause);
    throw cause;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await detachLogFile();
  }
}

/**
 * Preview mode entry point: fetch and parse one page, print its records, write nothing.
 */
export async function previewAction(raw: { readonly page?: string; readonly pageSize?: string }): Promise<void> {
  const options = resolveCrawlOptions({ startPage: raw.page, pageSize: raw.pageSize });
  const url = buildPageUrl(CATALOG.BASE_URL, options.startPage, options.pageSize);
  const outcome = await new RateLimitedFetcher({ concurrency: 1, politeBaseMs: 0, politeJitterMs: 0 }).fetch(url);
  if (outcome.kind !== "ok") {
    warn(`Preview: page ${options.startPage} unavailable (${outcome.kind === "failed" ? outcome.reason : "not found"}).`);
    return;
  }
  const parsed = new ListingParser().parse(outcome.body);
  console.table(
    parsed.records.map((record, idx) => ({
      index: idx + 1,
      slug: record.slug,
      name: record.name,
      downloads: record.downloads ?? "",
      updated: record.updatedAt ?? "",
      authors: record.authors.join(", ")
    }))
  );
  info(`Preview: ${parsed.records.length} records on page ${options.startPage}, ${parsed.issues.length} field issues.`);
}

/**
 * Stats mode entry point: print row and key counts of the output file.
 */
export async function statsAction(raw: { readonly output?: string }): Promise<void> {
  const path = raw.output ?? OUTPUT.CSV_PATH;
  if (!(await fs.pathExists(path))) {
    info(`No output file at ${path} yet.`);
    return;
  }
  const sink = await CsvSink.open(path);
  try {
    console.log(await sink.stats());
  } finally {
    await sink.close();
  }
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("catalog-harvester").description("Incremental mod catalog harvester").version("1.0.0");

  program
    .command("crawl")
    .description("Harvest listing pages into the CSV output, skipping rows already stored")
    .option("--start-page <n>", "first page to fetch", "1")
    .option("--pages <n|all>", "number of pages to walk; 0 or 'all' walks until the catalog ends", "all")
    .option("--page-size <n>", `entries per page (max ${CATALOG.MAX_PAGE_SIZE})`)
    .option("--concurrency <n>", "maximum requests in flight")
    .option("--output <path>", "CSV output path", OUTPUT.CSV_PATH)
    .option("--log <path>", "log file path", OUTPUT.LOG_PATH)
    .option("--log-level <level>", "debug, info, warn or error", OUTPUT.LOG_LEVEL)
    .action(async (options: CrawlCommandOptions) => {
      await crawlAction(options);
    });

  program
    .command("preview")
    .description("Fetch and parse one page without writing anything")
    .option("--page <n>", "page to preview", "1")
    .option("--page-size <n>", "entries per page")
    .action(async (options: { readonly page?: string; readonly pageSize?: string }) => previewAction(options));

  program
    .command("stats")
    .description("Display output file statistics")
    .option("--output <path>", "CSV output path", OUTPUT.CSV_PATH)
    .action(async (options: { readonly output?: string }) => statsAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (cause) {
    reportFailure(cause);
    process.exitCode = 1;
  }
}
