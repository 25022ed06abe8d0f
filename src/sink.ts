import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import fs from "fs-extra";
import { debug, info, warn } from "./logger.js";
import type { ModRecord } from "./types.js";
import { recordKey } from "./utils/record-key.js";

/**
 * Column set of the CSV sink, in file order.
 */
export const CSV_HEADERS = [
  "id",
  "slug",
  "name",
  "description",
  "created_at",
  "updated_at",
  "downloads",
  "size",
  "game_version",
  "is_forge",
  "is_fabric",
  "is_neoforge",
  "is_quilt",
  "authors",
  "categories",
  "license",
  "project_url",
  "crawled_at"
] as const;

export type CsvColumn = (typeof CSV_HEADERS)[number];

const LIST_SEPARATOR = "; ";
const NEWLINE = 0x0a;

/**
 * Append-only record store.
 */
export interface RecordSink {
  append(record: ModRecord): Promise<void>;
  close(): Promise<void>;
}

function text(value: string | number | boolean | undefined): string {
  if (value === undefined) {
    return "";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  return String(value);
}

/**
 * Serialise a record to its CSV cells. Absent values become empty strings.
 */
export function toRow(record: ModRecord): Record<CsvColumn, string> {
  return {
    id: text(record.id),
    slug: record.slug,
    name: record.name,
    description: record.description,
    created_at: text(record.createdAt),
    updated_at: text(record.updatedAt),
    downloads: text(record.downloads),
    size: record.size,
    game_version: record.gameVersion,
    is_forge: text(record.isForge),
    is_fabric: text(record.isFabric),
    is_neoforge: text(record.isNeoforge),
    is_quilt: text(record.isQuilt),
    authors: record.authors.join(LIST_SEPARATOR),
    categories: record.categories.join(LIST_SEPARATOR),
    license: text(record.license),
    project_url: record.projectUrl,
    crawled_at: record.crawledAt
  };
}

function isRow(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every(cell => typeof cell === "string")
  );
}

function encodeLine(cells: readonly string[]): string {
  return stringify([cells], { record_delimiter: "\n" });
}

/**
 * CSV file sink. Rows are appended one at a time, so content written before an interruption
 * is never rewritten.
 */
export class CsvSink implements RecordSink {
  private closed = false;
  private appended = 0;

  private constructor(readonly path: string) {}

  /**
   * Open the sink, creating the file with its header row when it is missing or empty.
   *
   * A trailing partial row left by an interrupted write is cut off, so the next append
   * starts on a fresh line.
   *
   * @param path - CSV file location.
   */
  static async open(path: string): Promise<CsvSink> {
    const exists = await fs.pathExists(path);
    const empty = exists ? (await fs.stat(path)).size === 0 : true;
    if (empty) {
      const tempPath = `${path}.tmp`;
      await fs.outputFile(tempPath, encodeLine(CSV_HEADERS), "utf8");
      await fs.move(tempPath, path, { overwrite: true });
      debug(`Created ${path} with header row.`);
    } else {
      await CsvSink.dropPartialRow(path);
    }
    return new CsvSink(path);
  }

  private static async dropPartialRow(path: string): Promise<void> {
    const content = await fs.readFile(path);
    if (content[content.length - 1] === NEWLINE) {
      return;
    }
    const keep = content.lastIndexOf(NEWLINE) + 1;
    if (keep === 0) {
      // Header without a line ending.
      await fs.appendFile(path, "\n", "utf8");
      return;
    }
    await fs.truncate(path, keep);
    warn(`Dropped ${content.length - keep} bytes of an incomplete last row from ${path}.`);
  }

  /**
   * Read every stored row back as column → cell maps.
   */
  async rows(): Promise<Array<Record<string, string>>> {
    const content = await fs.readFile(this.path, "utf8");
    let skipped = 0;
    const parsed: unknown = parse(content, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_records_with_error: true,
      on_skip: () => {
        skipped += 1;
        return undefined;
      }
    });
    if (skipped > 0) {
      warn(`Skipped ${skipped} unreadable rows in ${this.path}.`);
    }
    return Array.isArray(parsed) ? parsed.filter(isRow) : [];
  }

  /**
   * Keys of all rows already stored; rows with an empty slug are ignored.
   */
  async loadKeys(): Promise<Set<string>> {
    const keys = new Set<string>();
    for (const row of await this.rows()) {
      const key = recordKey(row.slug);
      if (key) {
        keys.add(key);
      }
    }
    info(`Loaded ${keys.size} existing keys from ${this.path}.`);
    return keys;
  }

  /**
   * Append one record as a single CSV row.
   *
   * @throws Error if the sink has been closed.
   */
  async append(record: ModRecord): Promise<void> {
    if (this.closed) {
      throw new Error(`Sink ${this.path} is closed`);
    }
    const row = toRow(record);
    await fs.appendFile(this.path, encodeLine(CSV_HEADERS.map(column => row[column])), "utf8");
    this.appended += 1;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    debug(`Sink ${this.path} closed after ${this.appended} appended rows.`);
  }

  /**
   * Row and distinct-key counts for CLI reporting.
   */
  async stats(): Promise<{ readonly rows: number; readonly keys: number }> {
    const rows = await this.rows();
    const keys = new Set(rows.map(row => recordKey(row.slug)).filter(key => key.length > 0));
    return { rows: rows.length, keys: keys.size };
  }
}
