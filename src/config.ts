import * as dotenv from "dotenv";
import type { PageCount } from "./types.js";

dotenv.config();

/**
 * Read an integer from an environment variable, falling back when it is absent or not numeric.
 *
 * @param value - Raw environment value.
 * @param fallback - Value used when `value` does not hold a finite number.
 */
export const envInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === "") return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : fallback;
};

/**
 * Listing endpoint and site-specific constants.
 *
 * Invariant: `MAX_PAGE_SIZE` is the largest page size the site serves.
 */
export const CATALOG = {
  BASE_URL: process.env.CATALOG_BASE_URL ?? "https://www.curseforge.com/minecraft/search",
  ORIGIN: "https://www.curseforge.com",
  PROJECT_CLASS: "mc-mods",
  SORT_BY: "total downloads",
  DEFAULT_PAGE_SIZE: 20,
  MAX_PAGE_SIZE: 50,
  STOP_CATEGORIES: ["all mods", "mods", "minecraft"]
} as const;

/**
 * Network-level configuration for the fetcher.
 *
 * Invariant: `CONCURRENCY` and `MAX_ATTEMPTS` must be positive.
 */
export const NET = {
  TIMEOUT: envInt(process.env.HTTP_TIMEOUT, 30000),
  CONCURRENCY: envInt(process.env.CATALOG_CONCURRENCY, 4),
  MAX_ATTEMPTS: 4,
  RETRYABLE_STATUSES: [429, 500, 502, 503, 504],
  BACKOFF_BASE_MS: 1000,
  BACKOFF_FACTOR: 2,
  BACKOFF_JITTER_MS: 500,
  POLITE_BASE_MS: 500,
  POLITE_JITTER_MS: 1000,
  USER_AGENT:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36"
} as const;

/**
 * Default output locations.
 */
export const OUTPUT = {
  CSV_PATH: process.env.CATALOG_CSV_PATH ?? "curseforge_dataset.csv",
  LOG_PATH: process.env.CATALOG_LOG_PATH ?? "curseforge.log",
  LOG_LEVEL: process.env.CATALOG_LOG_LEVEL ?? "info"
} as const;

/**
 * Raised for invalid operator parameters, before any network activity happens.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Operator parameters as they arrive from the command line (all optional text).
 */
export interface RawCrawlOptions {
  readonly startPage?: string;
  readonly pages?: string;
  readonly pageSize?: string;
  readonly concurrency?: string;
  readonly output?: string;
  readonly log?: string;
}

/**
 * Validated crawl parameters.
 *
 * @property startPage - First page index, at least 1.
 * @property pageCount - Finite budget or walk until the catalog ends.
 * @property pageSize - Entries per page, clamped to the site maximum.
 * @property concurrency - Permit pool size, at least 1.
 * @property outputPath - CSV sink path.
 * @property logPath - Log file path.
 */
export interface CrawlOptions {
  readonly startPage: number;
  readonly pageCount: PageCount;
  readonly pageSize: number;
  readonly concurrency: number;
  readonly outputPath: string;
  readonly logPath: string;
}

function parseWholeNumber(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse the page budget. `all` or `0` walks until the catalog runs out.
 *
 * @throws ConfigError on negative or non-numeric input.
 */
export function parsePageCount(raw: string | undefined): PageCount {
  if (raw === undefined || raw.trim().toLowerCase() === "all") {
    return { kind: "until_end" };
  }
  const pages = parseWholeNumber("--pages", raw);
  return pages === 0 ? { kind: "until_end" } : { kind: "finite", pages };
}

/**
 * Validate and clamp operator parameters.
 *
 * @param raw - Options as received from the CLI.
 * @returns Crawl options ready for the pipeline.
 * @throws ConfigError when a value cannot be interpreted.
 */
export function resolveCrawlOptions(raw: RawCrawlOptions): CrawlOptions {
  const startPage = raw.startPage === undefined ? 1 : parseWholeNumber("--start-page", raw.startPage);
  if (startPage < 1) {
    throw new ConfigError("--start-page must be at least 1");
  }
  const pageSize =
    raw.pageSize === undefined ? CATALOG.DEFAULT_PAGE_SIZE : parseWholeNumber("--page-size", raw.pageSize);
  const concurrency =
    raw.concurrency === undefined ? NET.CONCURRENCY : parseWholeNumber("--concurrency", raw.concurrency);
  return {
    startPage,
    pageCount: parsePageCount(raw.pages),
    pageSize: Math.min(Math.max(1, pageSize), CATALOG.MAX_PAGE_SIZE),
    concurrency: Math.max(1, concurrency),
    outputPath: raw.output ?? OUTPUT.CSV_PATH,
    logPath: raw.log ?? OUTPUT.LOG_PATH
  };
}
