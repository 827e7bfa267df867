/**
 * String utilities for stepflow
 */

/** Slug used when a title has no ASCII letters or digits */
export const FALLBACK_SLUG = "idea";

/**
 * Convert a title to a kebab-case ASCII slug.
 *
 * Diacritics are decomposed and dropped, every run of characters outside
 * `[A-Za-z0-9]` becomes a single hyphen. Never returns an empty string.
 */
export function slugify(title: string): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "") // Drop non-ASCII (incl. combining marks)
    .replace(/[^a-zA-Z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .toLowerCase();

  return slug || FALLBACK_SLUG;
}
