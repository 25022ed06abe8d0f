import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { SELECTORS } from "./selectors.js";

/**
 * Raw field text for one catalog entry. Every accessor may return nothing; none is
 * expected to interpret the text.
 */
export interface EntryFragment {
  name(): string | undefined;
  authors(): readonly string[];
  description(): string | undefined;
  createdText(): string | undefined;
  updatedText(): string | undefined;
  downloadsText(): string | undefined;
  sizeText(): string | undefined;
  gameVersionText(): string | undefined;
  categories(): readonly string[];
  link(): string | undefined;
}

/**
 * Splits a listing page into entry fragments.
 */
export interface ListingExtractor {
  /**
   * @param body - Raw page markup.
   * @returns One fragment per entry, in page order; empty for a listing with no entries.
   * @throws Error when the markup is not a listing page.
   */
  entries(body: string): readonly EntryFragment[];
}

function collapse(text: string): string | undefined {
  const value = text.replace(/\s+/g, " ").trim();
  return value || undefined;
}

/**
 * Cheerio-backed fragment bound to one `.project-card` element.
 */
class CheerioEntryFragment implements EntryFragment {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly card: cheerio.Cheerio<Element>
  ) {}

  private firstText(selector: string): string | undefined {
    return collapse(this.card.find(selector).first().text());
  }

  private allTexts(selector: string): string[] {
    return this.card
      .find(selector)
      .toArray()
      .map(node => collapse(this.$(node).text()))
      .filter((value): value is string => value !== undefined);
  }

  name(): string | undefined {
    return this.firstText(SELECTORS.name);
  }

  authors(): readonly string[] {
    return this.allTexts(SELECTORS.authors);
  }

  description(): string | undefined {
    return this.firstText(SELECTORS.description);
  }

  createdText(): string | undefined {
    return this.firstText(SELECTORS.createdDate);
  }

  updatedText(): string | undefined {
    return this.firstText(SELECTORS.updatedDate);
  }

  downloadsText(): string | undefined {
    return this.firstText(SELECTORS.downloads);
  }

  sizeText(): string | undefined {
    return this.firstText(SELECTORS.size);
  }

  gameVersionText(): string | undefined {
    return this.firstText(SELECTORS.gameVersion);
  }

  categories(): readonly string[] {
    return this.allTexts(SELECTORS.categories);
  }

  link(): string | undefined {
    const href = this.card.find(SELECTORS.link).first().attr("href")?.trim();
    return href || undefined;
  }
}

/**
 * Extraction rules for the catalog's search listing markup.
 */
export class CatalogListingExtractor implements ListingExtractor {
  entries(body: string): readonly EntryFragment[] {
    const $ = cheerio.load(body);
    const container = $(SELECTORS.container).first();
    if (container.length === 0) {
      throw new Error(`Listing container "${SELECTORS.container}" not found in page markup`);
    }
    return container
      .find(SELECTORS.card)
      .toArray()
      .map(card => new CheerioEntryFragment($, $(card)));
  }
}
