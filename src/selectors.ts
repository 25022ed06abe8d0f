/**
 * CSS selectors for the catalog's search listing.
 *
 * The listing renders one `.project-card` per entry inside `.results-container`.
 * A page without the container is not a listing page at all.
 */
export const SELECTORS = {
  container: ".results-container",
  card: ".project-card",

  name: "a.name",
  authors: ".author-name",
  description: "p.description",

  createdDate: ".detail-created span",
  updatedDate: ".detail-updated span",
  downloads: ".detail-downloads",
  size: ".detail-size",
  gameVersion: ".detail-game-version",

  categories: "ul.categories li",
  link: "a.overlay-link"
} as const;
