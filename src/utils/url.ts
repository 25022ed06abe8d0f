import { CATALOG } from "../config.js";

/**
 * Build the listing URL for one page of the catalog.
 *
 * @param baseUrl - Search endpoint without query.
 * @param page - 1-based page index.
 * @param pageSize - Entries per page.
 */
export function buildPageUrl(baseUrl: string, page: number, pageSize: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set("page", String(page));
  url.searchParams.set("pageSize", String(pageSize));
  url.searchParams.set("sortBy", CATALOG.SORT_BY);
  url.searchParams.set("class", CATALOG.PROJECT_CLASS);
  return url.toString();
}

/**
 * Resolve an entry link against the site origin. Returns an empty string for unusable links.
 */
export function absoluteUrl(href: string | undefined, origin: string = CATALOG.ORIGIN): string {
  if (!href) {
    return "";
  }
  try {
    return new URL(href, origin).toString();
  } catch {
    return "";
  }
}
