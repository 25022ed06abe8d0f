import { CATALOG } from "./config.js";
import { CatalogListingExtractor, type EntryFragment, type ListingExtractor } from "./extractor.js";
import type { FieldIssue, ModRecord } from "./types.js";
import { slugFromUrl } from "./utils/record-key.js";
import { absoluteUrl } from "./utils/url.js";

/**
 * Records parsed from one page plus any field-level extraction failures.
 *
 * Invariant: an empty `records` list means the listing had no entries (end of catalog).
 */
export interface ParsedPage {
  readonly records: readonly ModRecord[];
  readonly issues: readonly FieldIssue[];
}

/**
 * Turns one page of raw markup into records.
 */
export interface PageParser {
  /**
   * @throws Error when the page structure is not a listing at all.
   */
  parse(body: string): ParsedPage;
}

export interface ListingParserOptions {
  readonly extractor?: ListingExtractor;
  readonly stopCategories?: readonly string[];
  readonly now?: () => Date;
}

const MONTHS = new Map<string, number>([
  ["jan", 1],
  ["feb", 2],
  ["mar", 3],
  ["apr", 4],
  ["may", 5],
  ["jun", 6],
  ["jul", 7],
  ["aug", 8],
  ["sep", 9],
  ["oct", 10],
  ["nov", 11],
  ["dec", 12]
]);

const MAGNITUDES = new Map<string, number>([
  ["k", 1e3],
  ["m", 1e6],
  ["b", 1e9]
]);

const LISTING_DATE = /^([A-Za-z]{3,9})\.?\s+(\d{1,2}),\s*(\d{4})$/;
const COUNT = /^(\d+(?:\.\d+)?)([kmb])?$/i;
const LABELLED_COUNT = /(\d[\d,]*(?:\.\d+)?)(?![\d.,])\s*([kmb])?(?![a-z])/i;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Parse a displayed download count.
 *
 * Accepts thousands separators and K/M/B suffixes (case-insensitive), rounding to the nearest
 * integer. A count followed by a label ("3.2M Downloads") is found anywhere in the text;
 * otherwise falls back to the first run of digits.
 *
 * @returns The count, or undefined when the text is absent or holds no digits.
 */
export function parseDownloads(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  const compact = text.replace(/[,\s]/g, "");
  if (!compact) {
    return undefined;
  }
  const match = COUNT.exec(compact) ?? LABELLED_COUNT.exec(text);
  if (match) {
    const multiplier = match[2] ? MAGNITUDES.get(match[2].toLowerCase()) ?? 1 : 1;
    return Math.round(Number.parseFloat(match[1].replace(/,/g, "")) * multiplier);
  }
  const digits = /\d+/.exec(text);
  return digits ? Number.parseInt(digits[0], 10) : undefined;
}

/**
 * Normalise a "Month D, YYYY" date to `YYYY-MM-DD`.
 *
 * @returns ISO calendar date, or undefined for any other format or an impossible date.
 */
export function parseListingDate(text: string | undefined): string | undefined {
  const match = text ? LISTING_DATE.exec(text.trim()) : null;
  if (!match) {
    return undefined;
  }
  const month = MONTHS.get(match[1].slice(0, 3).toLowerCase());
  if (month === undefined) {
    return undefined;
  }
  const day = Number.parseInt(match[2], 10);
  const year = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Drop stop-word labels, then duplicates (both case-insensitive), keeping first-seen order.
 */
export function normalizeCategories(
  labels: readonly string[],
  stopWords: readonly string[] = CATALOG.STOP_CATEGORIES
): string[] {
  const stop = new Set(stopWords.map(word => word.toLowerCase()));
  const seen = new Set<string>();
  const result: string[] = [];
  for (const label of labels) {
    const value = label.trim();
    const key = value.toLowerCase();
    if (!value || stop.has(key) || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(value);
  }
  return result;
}

/**
 * Unique, non-empty author names in a stable sorted order.
 */
export function normalizeAuthors(names: readonly string[]): string[] {
  const unique = new Set(names.map(name => name.trim()).filter(name => name.length > 0));
  return [...unique].sort();
}

/**
 * UTC timestamp at second precision, e.g. `2024-03-01T12:00:05Z`.
 */
export function captureTimestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Parser for the catalog listing. Field extractors run independently: a failing one leaves its
 * field empty and is reported in `issues`.
 */
export class ListingParser implements PageParser {
  private readonly extractor: ListingExtractor;
  private readonly stopCategories: readonly string[];
  private readonly now: () => Date;

  constructor(options: ListingParserOptions = {}) {
    this.extractor = options.extractor ?? new CatalogListingExtractor();
    this.stopCategories = options.stopCategories ?? CATALOG.STOP_CATEGORIES;
    this.now = options.now ?? (() => new Date());
  }

  parse(body: string): ParsedPage {
    const fragments = this.extractor.entries(body);
    const crawledAt = captureTimestamp(this.now());
    const issues: FieldIssue[] = [];
    const records = fragments.map((fragment, entry) => this.toRecord(fragment, entry, crawledAt, issues));
    return { records, issues };
  }

  private toRecord(fragment: EntryFragment, entry: number, crawledAt: string, issues: FieldIssue[]): ModRecord {
    const field = <T>(name: string, read: () => T, fallback: T): T => {
      try {
        return read();
      } catch (cause) {
        issues.push({ entry, field: name, message: cause instanceof Error ? cause.message : String(cause) });
        return fallback;
      }
    };

    const projectUrl = field("link", () => absoluteUrl(fragment.link()), "");
    return {
      slug: slugFromUrl(projectUrl),
      name: field("name", () => fragment.name() ?? "", ""),
      description: field("description", () => fragment.description() ?? "", ""),
      createdAt: field("created_at", () => parseListingDate(fragment.createdText()), undefined),
      updatedAt: field("updated_at", () => parseListingDate(fragment.updatedText()), undefined),
      downloads: field("downloads", () => parseDownloads(fragment.downloadsText()), undefined),
      size: field("size", () => fragment.sizeText() ?? "", ""),
      gameVersion: field("game_version", () => fragment.gameVersionText() ?? "", ""),
      authors: field("authors", () => normalizeAuthors(fragment.authors()), []),
      categories: field("categories", () => normalizeCategories(fragment.categories(), this.stopCategories), []),
      projectUrl,
      crawledAt
    };
  }
}
