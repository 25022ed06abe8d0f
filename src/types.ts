/**
 * One catalog entry as harvested from the listing view.
 *
 * @property id - Numeric project id, absent in listing view.
 * @property slug - URL identifier; deduplication key.
 * @property createdAt - ISO calendar date (YYYY-MM-DD).
 * @property updatedAt - ISO calendar date (YYYY-MM-DD).
 * @property downloads - Total download count.
 * @property size - Size of the latest file as displayed, e.g. "1.38 MB".
 * @property gameVersion - Primary supported game version.
 * @property isForge - Loader flag, unset in listing-only mode.
 * @property authors - Unique author names in sorted order.
 * @property categories - Category labels in first-seen order, stop-words removed.
 * @property projectUrl - Absolute project page URL.
 * @property crawledAt - UTC capture time at second precision.
 *
 * Invariant: `slug` must be non-empty for the record to be persisted.
 */
export interface ModRecord {
  readonly id?: number;
  readonly slug: string;
  readonly name: string;
  readonly description: string;
  readonly createdAt?: string;
  readonly updatedAt?: string;
  readonly downloads?: number;
  readonly size: string;
  readonly gameVersion: string;
  readonly isForge?: boolean;
  readonly isFabric?: boolean;
  readonly isNeoforge?: boolean;
  readonly isQuilt?: boolean;
  readonly authors: readonly string[];
  readonly categories: readonly string[];
  readonly license?: string;
  readonly projectUrl: string;
  readonly crawledAt: string;
}

/**
 * Page budget for one run.
 */
export type PageCount = { readonly kind: "finite"; readonly pages: number } | { readonly kind: "until_end" };

/**
 * Result of fetching a single URL. Failures are values, never exceptions.
 */
export type FetchOutcome =
  | { readonly kind: "ok"; readonly status: number; readonly body: string }
  | { readonly kind: "not_found" }
  | { readonly kind: "failed"; readonly reason: string };

export type SkipReason = "not_found" | "failed";

/**
 * Why the producer stopped walking pages.
 */
export type EndReason = "end_of_catalog" | "page_limit" | "aborted";

/**
 * Unit of work handed from the producer to the consumer.
 *
 * Invariant: exactly one `end` unit is emitted per run, and it is the last one.
 */
export type PageUnit =
  | { readonly kind: "data"; readonly page: number; readonly records: readonly ModRecord[] }
  | { readonly kind: "skip"; readonly page: number; readonly reason: SkipReason }
  | { readonly kind: "error"; readonly page: number; readonly diagnostic: string }
  | { readonly kind: "end"; readonly reason: EndReason };

/**
 * Counters accumulated by the consumer over one run.
 */
export interface CrawlStats {
  pagesOk: number;
  pagesSkipped: number;
  pagesFailed: number;
  rowsWritten: number;
  duplicates: number;
  rejected: number;
}

/**
 * Field-level extraction failure captured while parsing a page.
 */
export interface FieldIssue {
  readonly entry: number;
  readonly field: string;
  readonly message: string;
}
