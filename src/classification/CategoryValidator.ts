/**
 * Category Validator
 * Deterministic check of category labels proposed by downstream
 * collaborators (summarizers, manual edits) against the axis registry.
 * Unknown labels are corrected when a known label is clearly meant and
 * rejected otherwise.
 */

import { compareTwoStrings } from 'string-similarity';
import logger from '../utils/logger';
import { AxisRegistry } from './AxisRegistry';

/** Dice coefficient required for a fuzzy correction */
export const FUZZY_MATCH_THRESHOLD = 0.85;
const MIN_BASE_NAME_LENGTH = 3;

const LABEL_FORMAT = /^[A-Z]+_[\p{L}\p{N}_² -]+$/u;
const INSTRUCTION_LEAKAGE = /find|if_|invent|example|exemple|suggest|cherch|trouv/i;

export interface FormatCheckResult {
  valid: boolean;
  validLabels: string[];
  issues: string[];
}

export interface LabelCorrection {
  original: string;
  corrected: string;
}

export interface LabelRejection {
  label: string;
  reason: string;
}

export interface CategoryValidationReport {
  valid: string[];
  corrected: LabelCorrection[];
  rejected: LabelRejection[];
  /** Valid and corrected labels, deduplicated, in input order */
  clean: string[];
}

export class CategoryValidator {
  private readonly labels: Set<string>;
  private readonly labelsByLowercase: Map<string, string>;
  /** Longest first so EQT_ wins over EQ_ */
  private readonly prefixes: string[];

  constructor(private readonly registry: AxisRegistry) {
    this.labels = new Set(registry.allLabels());
    this.labelsByLowercase = new Map(
      [...this.labels].map((label) => [label.toLowerCase(), label])
    );
    this.prefixes = registry.prefixes().sort((a, b) => b.length - a.length);
  }

  /**
   * Shape check only: PREFIX_Name with an uppercase prefix.
   */
  checkFormat(labels: readonly string[]): FormatCheckResult {
    const issues: string[] = [];
    const validLabels: string[] = [];

    for (const label of labels) {
      const separator = label.indexOf('_');
      if (separator < 0) {
        issues.push(`Label '${label}' missing underscore separator`);
        continue;
      }

      const prefix = label.slice(0, separator);
      if (prefix !== prefix.toUpperCase() || !/[A-Z]/.test(prefix)) {
        issues.push(`Label '${label}' prefix should be uppercase`);
        continue;
      }

      if (!LABEL_FORMAT.test(label)) {
        issues.push(`Label '${label}' contains invalid characters`);
        continue;
      }

      validLabels.push(label);
    }

    return { valid: issues.length === 0, validLabels, issues };
  }

  validate(labels: readonly string[]): CategoryValidationReport {
    const valid: string[] = [];
    const corrected: LabelCorrection[] = [];
    const rejected: LabelRejection[] = [];
    const clean: string[] = [];

    for (const raw of labels) {
      const label = raw.trim();
      if (!label) continue;

      if (this.labels.has(label)) {
        valid.push(label);
        if (!clean.includes(label)) clean.push(label);
        continue;
      }

      const correction = this.correct(label);
      if (correction) {
        corrected.push({ original: label, corrected: correction });
        if (!clean.includes(correction)) clean.push(correction);
        logger.info('Category label corrected', { original: label, corrected: correction });
        continue;
      }

      const reason = this.diagnose(label);
      rejected.push({ label, reason });
      logger.warn('Category label rejected', { label, reason });
    }

    return { valid, corrected, rejected, clean };
  }

  private splitPrefix(label: string): { prefix: string | null; name: string } {
    const prefix = this.prefixes.find((candidate) => label.startsWith(candidate));
    return prefix ? { prefix, name: label.slice(prefix.length) } : { prefix: null, name: label };
  }

  private correct(label: string): string | null {
    if (INSTRUCTION_LEAKAGE.test(label)) return null;

    const { prefix, name } = this.splitPrefix(label);

    // C_A_Foo → A_Foo
    if (prefix && this.labels.has(name)) return name;

    // Same name under another prefix
    if (name) {
      for (const other of this.prefixes) {
        if (this.labels.has(`${other}${name}`)) return `${other}${name}`;
      }
    }

    const caseInsensitive = this.labelsByLowercase.get(label.toLowerCase());
    if (caseInsensitive) return caseInsensitive;

    if (name.length >= MIN_BASE_NAME_LENGTH) {
      const wanted = name.toLowerCase();
      for (const known of this.labels) {
        if (this.splitPrefix(known).name.toLowerCase() === wanted) return known;
      }
    }

    return prefix ? this.fuzzyMatch(label, prefix) : null;
  }

  private fuzzyMatch(label: string, prefix: string): string | null {
    const axis = this.registry.list().find((candidate) => candidate.prefix === prefix);
    if (!axis) return null;

    let best: string | null = null;
    let bestRating = FUZZY_MATCH_THRESHOLD;
    for (const known of Object.keys(axis.keywords)) {
      const rating = compareTwoStrings(label.toLowerCase(), known.toLowerCase());
      if (rating >= bestRating && (best === null || rating > bestRating)) {
        best = known;
        bestRating = rating;
      }
    }
    return best;
  }

  private diagnose(label: string): string {
    if (INSTRUCTION_LEAKAGE.test(label)) {
      return 'instruction leakage';
    }

    const { prefix, name } = this.splitPrefix(label);
    if (!prefix) {
      return 'unknown prefix';
    }

    const axis = this.registry.list().find((candidate) => candidate.prefix === prefix);
    const axisId = axis ? axis.id : 'unknown';
    const hasLabels = axis !== undefined && Object.keys(axis.keywords).length > 0;
    return hasLabels
      ? `'${name}' not found in ${prefix} labels (axis: ${axisId})`
      : `no ${prefix} labels configured (axis: ${axisId})`;
  }
}
