import { debug, error as logError, info, warn } from "./logger.js";
import type { RecordSink } from "./sink.js";
import type { CrawlStats, EndReason, PageUnit } from "./types.js";
import type { Channel } from "./utils/channel.js";
import { recordKey } from "./utils/record-key.js";

export function emptyStats(): CrawlStats {
  return { pagesOk: 0, pagesSkipped: 0, pagesFailed: 0, rowsWritten: 0, duplicates: 0, rejected: 0 };
}

/**
 * Single drain loop: deduplicates records against the key set and appends new ones to the sink.
 *
 * The key set is only ever mutated here, so no coordination is needed around it.
 */
export class CatalogConsumer {
  readonly stats: CrawlStats = emptyStats();

  constructor(
    private readonly sink: Pick<RecordSink, "append">,
    private readonly keys: Set<string>
  ) {}

  /**
   * Receive units in emission order until the `end` sentinel arrives.
   *
   * @returns The producer's stop reason carried by the sentinel.
   */
  async drain(channel: Channel<PageUnit>): Promise<EndReason> {
    for (;;) {
      const unit = await channel.receive();
      if (unit.kind === "end") {
        info(
          `Crawl finished (${unit.reason}): pages ok ${this.stats.pagesOk}, skipped ${this.stats.pagesSkipped}, ` +
            `failed ${this.stats.pagesFailed}; rows written ${this.stats.rowsWritten}, ` +
            `duplicates ${this.stats.duplicates}, rejected ${this.stats.rejected}.`
        );
        return unit.reason;
      }
      await this.handle(unit);
    }
  }

  private async handle(unit: Exclude<PageUnit, { kind: "end" }>): Promise<void> {
    switch (unit.kind) {
      case "error":
        this.stats.pagesFailed += 1;
        logError(`Page ${unit.page} could not be parsed: ${unit.diagnostic}`);
        return;
      case "skip":
        this.stats.pagesSkipped += 1;
        warn(`Page ${unit.page} skipped (${unit.reason === "not_found" ? "not found" : "fetch failed"}).`);
        return;
      case "data": {
        let added = 0;
        for (const record of unit.records) {
          const key = recordKey(record.slug);
          if (!key) {
            this.stats.rejected += 1;
            warn(`Page ${unit.page}: rejecting entry "${record.name}" without a slug.`);
            continue;
          }
          if (this.keys.has(key)) {
            this.stats.duplicates += 1;
            debug(`Duplicate ${key} dropped.`);
            continue;
          }
          this.keys.add(key);
          await this.sink.append(record);
          added += 1;
          this.stats.rowsWritten += 1;
        }
        this.stats.pagesOk += 1;
        info(`Page ${unit.page} ok: +${added} rows (total ${this.stats.rowsWritten}).`);
        return;
      }
    }
  }
}
