/**
 * Text Normalizer
 * Folds text for keyword matching: compatibility decomposition, lowercase,
 * combining marks removed, whitespace runs collapsed to a single space.
 *
 * "Réception  COMMANDÉE" → "reception commandee"
 */

// Combining marks left behind by NFKD decomposition
const COMBINING_MARKS = /\p{M}+/gu;
const WHITESPACE_RUN = /\s+/g;

export class TextNormalizer {
  /**
   * Normalize text for matching. Total: never throws, empty or missing
   * input yields ''.
   */
  normalize(text: string | null | undefined): string {
    if (!text) {
      return '';
    }

    // Decompose before and after lowercasing: some compatibility characters
    // decompose to uppercase letters, and some lowercase mappings emit marks.
    return text
      .normalize('NFKD')
      .toLowerCase()
      .normalize('NFKD')
      .replace(COMBINING_MARKS, '')
      .replace(WHITESPACE_RUN, ' ')
      .trim();
  }
}

const sharedNormalizer = new TextNormalizer();

export function normalizeText(text: string | null | undefined): string {
  return sharedNormalizer.normalize(text);
}
