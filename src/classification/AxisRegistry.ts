/**
 * Axis Registry
 * Immutable, validated set of axis configurations. Built once at startup
 * from JSON definitions and injected into the orchestrator; an inconsistent
 * definition is fatal.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import bundledAxisKeywords from '../config/axes/axisKeywords.json';
import { ConfigurationError, ConfigurationIssue } from '../errors';
import logger from '../utils/logger';
import { AxisConfiguration } from './types';

// ============================================================================
// Definition Schema
// ============================================================================

const labelPatternsSchema = z.object({
  keywords: z.array(z.string()).default([]),
  synonyms: z.array(z.string()).default([]),
});

const axisDefinitionSchema = z.object({
  id: z.string().min(1),
  prefix: z.string().regex(/^[A-Z]+_$/, 'prefix must be uppercase letters followed by "_"'),
  description: z.string().optional(),
  ambiguityThreshold: z.number().min(0).max(1).default(0.15),
  minScore: z.number().min(0).default(0),
  maxCandidates: z.number().int().min(1).default(5),
  /** When false the axis may ship without any keyword (e.g. a list populated per site) */
  requireKeywords: z.boolean().default(true),
  extractionPatterns: z.array(z.string()).default([]),
  labels: z.record(labelPatternsSchema),
});

const axisFileSchema = z.object({
  version: z.number().int().optional(),
  axes: z.array(axisDefinitionSchema),
});

export type AxisDefinition = z.input<typeof axisDefinitionSchema>;
export type AxisKeywordFile = z.input<typeof axisFileSchema>;

// ============================================================================
// Registry
// ============================================================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export class AxisRegistry {
  private readonly axes: ReadonlyMap<string, AxisConfiguration>;
  private readonly labelIndex: ReadonlyMap<string, string>;

  private constructor(axes: AxisConfiguration[]) {
    this.axes = new Map(axes.map((axis) => [axis.id, axis]));

    const labelIndex = new Map<string, string>();
    for (const axis of axes) {
      for (const label of [...Object.keys(axis.keywords), ...Object.keys(axis.synonyms)]) {
        labelIndex.set(label, axis.id);
      }
    }
    this.labelIndex = labelIndex;
  }

  /**
   * Validate raw definitions and build the registry.
   * @throws ConfigurationError listing every issue found
   */
  static fromDefinitions(definitions: unknown): AxisRegistry {
    const parsed = axisFileSchema.safeParse(
      Array.isArray(definitions) ? { axes: definitions } : definitions
    );

    if (!parsed.success) {
      throw ConfigurationError.invalidAxes(
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }

    const issues: ConfigurationIssue[] = [];
    const seenIds = new Set<string>();
    const seenPrefixes = new Map<string, string>();
    const axes: AxisConfiguration[] = [];

    parsed.data.axes.forEach((definition, index) => {
      const at = `axes.${index}`;

      if (seenIds.has(definition.id)) {
        issues.push({ path: `${at}.id`, message: `duplicate axis id "${definition.id}"` });
      }
      seenIds.add(definition.id);

      const owner = seenPrefixes.get(definition.prefix);
      if (owner !== undefined) {
        issues.push({
          path: `${at}.prefix`,
          message: `prefix "${definition.prefix}" already used by axis "${owner}"`,
        });
      } else {
        seenPrefixes.set(definition.prefix, definition.id);
      }

      let patternCount = 0;
      for (const [label, patterns] of Object.entries(definition.labels)) {
        if (!label.startsWith(definition.prefix) || label.length === definition.prefix.length) {
          issues.push({
            path: `${at}.labels.${label}`,
            message: `label "${label}" does not start with axis prefix "${definition.prefix}"`,
          });
        }
        patternCount += patterns.keywords.length + patterns.synonyms.length;
      }

      if (definition.requireKeywords && patternCount === 0) {
        issues.push({
          path: `${at}.labels`,
          message: `axis "${definition.id}" has no keyword or synonym`,
        });
      }

      const labels = Object.entries(definition.labels);
      axes.push({
        id: definition.id,
        prefix: definition.prefix,
        description: definition.description,
        keywords: Object.fromEntries(labels.map(([label, patterns]) => [label, patterns.keywords])),
        synonyms: Object.fromEntries(labels.map(([label, patterns]) => [label, patterns.synonyms])),
        extractionPatterns: definition.extractionPatterns,
        ambiguityThreshold: definition.ambiguityThreshold,
        minScore: definition.minScore,
        maxCandidates: definition.maxCandidates,
      });
    });

    if (issues.length > 0) {
      throw ConfigurationError.invalidAxes(issues);
    }

    return new AxisRegistry(axes.map((axis) => deepFreeze(axis)));
  }

  get size(): number {
    return this.axes.size;
  }

  has(axisId: string): boolean {
    return this.axes.has(axisId);
  }

  get(axisId: string): AxisConfiguration | undefined {
    return this.axes.get(axisId);
  }

  /**
   * @throws ConfigurationError when the axis is unknown
   */
  require(axisId: string): AxisConfiguration {
    const axis = this.axes.get(axisId);
    if (!axis) {
      throw ConfigurationError.invalidSettings([
        { path: axisId, message: `unknown axis "${axisId}"` },
      ]);
    }
    return axis;
  }

  /** Axis ids in definition order */
  ids(): string[] {
    return [...this.axes.keys()];
  }

  list(): AxisConfiguration[] {
    return [...this.axes.values()];
  }

  axisForLabel(label: string): AxisConfiguration | undefined {
    const axisId = this.labelIndex.get(label);
    return axisId === undefined ? undefined : this.axes.get(axisId);
  }

  allLabels(): string[] {
    return [...this.labelIndex.keys()];
  }

  prefixes(): string[] {
    return this.list().map((axis) => axis.prefix);
  }
}

// ============================================================================
// Loaders
// ============================================================================

/**
 * Build a registry from a JSON keyword file.
 * @throws ConfigurationError when the file is unreadable or invalid
 */
export function loadAxisRegistry(filePath: string): AxisRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw ConfigurationError.unreadableFile(
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  const registry = AxisRegistry.fromDefinitions(raw);
  logger.info('Axis registry loaded', { filePath, axes: registry.size });
  return registry;
}

/**
 * Registry built from the keyword data shipped with the package.
 */
export function defaultAxisRegistry(): AxisRegistry {
  return AxisRegistry.fromDefinitions(bundledAxisKeywords);
}
