import { CATALOG } from "../config.js";

/**
 * Derive the deduplication key (slug) from a project link: the last segment of its path.
 *
 * @param projectUrl - Absolute or site-relative project URL.
 * @returns Lowercased slug, or an empty string when the link has no usable path.
 */
export function slugFromUrl(projectUrl: string): string {
  if (!projectUrl) {
    return "";
  }
  let pathname: string;
  try {
    pathname = new URL(projectUrl, CATALOG.ORIGIN).pathname;
  } catch {
    return "";
  }
  const last = pathname.split("/").filter(segment => segment.length > 0).at(-1);
  if (!last) {
    return "";
  }
  try {
    return recordKey(decodeURIComponent(last));
  } catch {
    return recordKey(last);
  }
}

/**
 * Normalise a stored or parsed slug for KeySet membership checks.
 */
export function recordKey(slug: string | undefined): string {
  return (slug ?? "").trim().toLowerCase();
}
