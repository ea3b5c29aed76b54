/**
 * Serial / Part Number Extractor
 * Pulls structured equipment identifiers out of raw (non-normalized) text.
 * Only the equipment-designation axis carries extraction patterns; no other
 * axis uses regular expressions as a signal.
 */

import logger from '../utils/logger';

export const DEFAULT_SERIAL_PATTERNS: readonly string[] = [
  '\\b[A-Z]{2,4}-\\d{3,6}\\b', // CAM-001234, FM-0023
  '\\bSN[:\\s]?\\d{4,10}\\b', // SN:12345, SN 12345
  '\\bPN[:\\s]?[A-Z0-9\\-]{4,15}\\b', // PN:ABC-1234
  '\\b\\d{4}-[A-Z]{2,4}-\\d{3,6}\\b', // 2024-CAM-001
  '\\b[A-Z]{2,3}\\d{1,4}\\b', // FM1, FM12, CAM001
];

export class SerialNumberExtractor {
  private readonly regexes: RegExp[] = [];

  /**
   * @param extraPatterns - axis-specific patterns, applied after the defaults.
   *   A pattern that fails to compile is skipped with a warning.
   */
  constructor(extraPatterns: readonly string[] = []) {
    const sources = [...new Set([...DEFAULT_SERIAL_PATTERNS, ...extraPatterns])];

    for (const source of sources) {
      try {
        this.regexes.push(new RegExp(source, 'g'));
      } catch (error) {
        logger.warn('Skipping invalid extraction pattern', {
          pattern: source,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  get patternCount(): number {
    return this.regexes.length;
  }

  /**
   * Sorted, deduplicated identifiers found in the raw text.
   */
  extract(rawText: string): string[] {
    if (!rawText) {
      return [];
    }

    const found = new Set<string>();
    for (const regex of this.regexes) {
      for (const match of rawText.matchAll(regex)) {
        found.add(match[0]);
      }
    }

    return [...found].sort();
  }
}
