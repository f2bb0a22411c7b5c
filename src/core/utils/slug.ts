import { ValidationError } from "../errors";

export const SLUG_WARN_LENGTH = 64;
export const SLUG_MAX_LENGTH = 255;

export type SlugResult = {
  slug: string;
  warnings: string[];
};

/**
 * Turns a post title into the file name stem shared by the draft folder, the
 * markdown file and the published asset folder.
 *
 * Runs of whitespace, hyphens or underscores become one hyphen, anything that
 * is not a letter, mark, digit or hyphen is dropped, and the result is
 * lowercased. Non-Latin letters are kept.
 */
export function deriveSlug(title: string): SlugResult {
  const slug = title
    .trim()
    .replace(/[\s\-_]+/gu, "-")
    .replace(/[^\p{L}\p{M}\p{N}-]/gu, "")
    .replace(/-{2,}/g, "-")
    .toLowerCase()
    .replace(/^-+|-+$/g, "");

  // Limits count code points, so a letter outside the BMP counts once.
  const length = [...slug].length;

  if (length === 0) {
    throw new ValidationError(`Title "${title}" does not contain any usable characters.`);
  }

  if (length > SLUG_MAX_LENGTH) {
    throw new ValidationError(
      `Slug for "${title}" is ${length} characters; the limit is ${SLUG_MAX_LENGTH}.`
    );
  }

  const warnings =
    length > SLUG_WARN_LENGTH
      ? [`Slug "${slug}" is longer than ${SLUG_WARN_LENGTH} characters.`]
      : [];

  return { slug, warnings };
}

export function toSlug(title: string): string {
  return deriveSlug(title).slug;
}
