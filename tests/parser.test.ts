import { describe, expect, it } from "vitest";
import type { EntryFragment, ListingExtractor } from "../src/extractor.js";
import {
  captureTimestamp,
  ListingParser,
  normalizeAuthors,
  normalizeCategories,
  parseDownloads,
  parseListingDate
} from "../src/parser.js";
import { renderListing } from "./helpers/catalog.js";

describe("parseDownloads", () => {
  it("accepts thousands separators", () => {
    expect(parseDownloads("12,345")).toBe(12345);
  });

  it("expands magnitude suffixes case-insensitively", () => {
    expect(parseDownloads("3.2M")).toBe(3200000);
    expect(parseDownloads("1K")).toBe(1000);
    expect(parseDownloads("2.5k")).toBe(2500);
    expect(parseDownloads("1.25b")).toBe(1250000000);
  });

  it("rounds fractional magnitudes to the nearest integer", () => {
    expect(parseDownloads("1.2346K")).toBe(1235);
  });

  it("returns undefined for empty or absent text", () => {
    expect(parseDownloads("")).toBeUndefined();
    expect(parseDownloads("   ")).toBeUndefined();
    expect(parseDownloads(undefined)).toBeUndefined();
  });

  it("reads a count that carries a label", () => {
    expect(parseDownloads("3.2M Downloads")).toBe(3200000);
    expect(parseDownloads("12,345 downloads")).toBe(12345);
    expect(parseDownloads("Downloads: 4.5 k")).toBe(4500);
  });

  it("falls back to the first run of digits", () => {
    expect(parseDownloads("abc42def")).toBe(42);
    expect(parseDownloads("no digits")).toBeUndefined();
  });
});

describe("parseListingDate", () => {
  it("normalises Month D, YYYY to an ISO date", () => {
    expect(parseListingDate("Jan 5, 2023")).toBe("2023-01-05");
    expect(parseListingDate("December 31, 2021")).toBe("2021-12-31");
    expect(parseListingDate("  Sep 9,2020 ")).toBe("2020-09-09");
  });

  it("returns undefined for other formats", () => {
    expect(parseListingDate("13/5/2023")).toBeUndefined();
    expect(parseListingDate("2023-01-05")).toBeUndefined();
    expect(parseListingDate(undefined)).toBeUndefined();
  });

  it("rejects impossible dates and unknown months", () => {
    expect(parseListingDate("Feb 30, 2023")).toBeUndefined();
    expect(parseListingDate("Foo 3, 2023")).toBeUndefined();
  });
});

describe("normalizeCategories", () => {
  it("drops stop-words and duplicates while keeping first-seen order", () => {
    expect(normalizeCategories(["All Mods", "Utility", "Performance", "utility", " ", "Storage"])).toStrictEqual([
      "Utility",
      "Performance",
      "Storage"
    ]);
  });

  it("honours a custom stop-word list", () => {
    expect(normalizeCategories(["Magic", "Tech"], ["TECH"])).toStrictEqual(["Magic"]);
  });
});

describe("normalizeAuthors", () => {
  it("deduplicates into a reproducible order", () => {
    expect(normalizeAuthors(["zed", "amy", "zed", " amy ", ""])).toStrictEqual(["amy", "zed"]);
    expect(normalizeAuthors(["amy", "zed"])).toStrictEqual(normalizeAuthors(["zed", "amy"]));
  });
});

describe("captureTimestamp", () => {
  it("truncates to whole seconds in UTC", () => {
    expect(captureTimestamp(new Date("2024-05-06T07:08:09.987Z"))).toBe("2024-05-06T07:08:09Z");
  });
});

describe("ListingParser", () => {
  const now = () => new Date("2024-05-06T07:08:09.123Z");

  it("maps every card to one normalised record", () => {
    const body = renderListing([
      {
        slug: "alpha-mod",
        name: "Alpha Mod",
        authors: ["zed", "amy", "zed"],
        description: "Adds alpha things.",
        created: "Jan 5, 2023",
        updated: "Mar 14, 2024",
        downloads: "12,345",
        size: "1.38 MB",
        gameVersion: "1.20.1",
        categories: ["All Mods", "Utility", "Performance", "utility"]
      },
      { slug: "bare" }
    ]);

    const { records, issues } = new ListingParser({ now }).parse(body);

    expect(issues).toStrictEqual([]);
    expect(records).toHaveLength(2);
    expect(records[0]).toStrictEqual({
      slug: "alpha-mod",
      name: "Alpha Mod",
      description: "Adds alpha things.",
      createdAt: "2023-01-05",
      updatedAt: "2024-03-14",
      downloads: 12345,
      size: "1.38 MB",
      gameVersion: "1.20.1",
      authors: ["amy", "zed"],
      categories: ["Utility", "Performance"],
      projectUrl: "https://www.curseforge.com/minecraft/mc-mods/alpha-mod",
      crawledAt: "2024-05-06T07:08:09Z"
    });
    expect(records[1]).toMatchObject({
      slug: "bare",
      name: "bare",
      description: "",
      createdAt: undefined,
      downloads: undefined,
      size: "",
      authors: [],
      categories: []
    });
  });

  it("returns no records for a listing without entries", () => {
    expect(new ListingParser({ now }).parse(renderListing([])).records).toStrictEqual([]);
  });

  it("throws when the page is not a listing", () => {
    expect(() => new ListingParser({ now }).parse("<html><body><h1>Maintenance</h1></body></html>")).toThrow(
      /Listing container/
    );
  });

  it("isolates a failing field extractor", () => {
    const fragment: EntryFragment = {
      name: () => "Broken Downloads",
      authors: () => ["amy"],
      description: () => undefined,
      createdText: () => "Jan 5, 2023",
      updatedText: () => undefined,
      downloadsText: () => {
        throw new Error("boom");
      },
      sizeText: () => "2 MB",
      gameVersionText: () => "1.19.2",
      categories: () => ["Tech"],
      link: () => "/minecraft/mc-mods/broken"
    };
    const extractor: ListingExtractor = { entries: () => [fragment] };

    const { records, issues } = new ListingParser({ extractor, now }).parse("ignored");

    expect(issues).toStrictEqual([{ entry: 0, field: "downloads", message: "boom" }]);
    expect(records[0]).toMatchObject({
      slug: "broken",
      name: "Broken Downloads",
      createdAt: "2023-01-05",
      downloads: undefined,
      size: "2 MB",
      categories: ["Tech"]
    });
  });
});
