import { describe, expect, it } from "vitest";
import { recordKey, slugFromUrl } from "../src/utils/record-key.js";
import { absoluteUrl, buildPageUrl } from "../src/utils/url.js";

describe("buildPageUrl", () => {
  it("sets paging and sort parameters", () => {
    expect(buildPageUrl("https://catalog.test/search", 3, 50)).toBe(
      "https://catalog.test/search?page=3&pageSize=50&sortBy=total+downloads&class=mc-mods"
    );
  });
});

describe("absoluteUrl", () => {
  it("resolves site-relative links against the origin", () => {
    expect(absoluteUrl("/minecraft/mc-mods/jei")).toBe("https://www.curseforge.com/minecraft/mc-mods/jei");
    expect(absoluteUrl(undefined)).toBe("");
  });
});

describe("slugFromUrl", () => {
  it("takes the last path segment, lowercased", () => {
    expect(slugFromUrl("https://www.curseforge.com/minecraft/mc-mods/JEI/")).toBe("jei");
    expect(slugFromUrl("/minecraft/mc-mods/create?tab=files#top")).toBe("create");
  });

  it("returns an empty key when there is no path", () => {
    expect(slugFromUrl("")).toBe("");
    expect(slugFromUrl("https://www.curseforge.com/")).toBe("");
  });
});

describe("recordKey", () => {
  it("trims and lowercases", () => {
    expect(recordKey("  Sodium ")).toBe("sodium");
    expect(recordKey(undefined)).toBe("");
  });
});
