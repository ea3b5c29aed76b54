/**
 * Classification Context
 * Serializable view of a classification run for summarization prompts,
 * category validation and audit logging. JSON is the canonical form.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { ClassificationContext, HybridClassificationOutput } from './types';

const CONFIDENCE_DECIMALS = 3;

const contextSchema = z.object({
  axes: z.record(
    z.object({
      value: z.string().nullable(),
      confidence: z.number().min(0).max(1),
      method: z.enum(['heuristic', 'llm', 'none']),
    })
  ),
  serialNumbers: z.array(z.string()),
  debug: z.object({
    rawHits: z.record(z.record(z.array(z.string()))),
    scores: z.record(z.record(z.number())),
  }),
});

function roundConfidence(confidence: number): number {
  const factor = 10 ** CONFIDENCE_DECIMALS;
  return Math.round(confidence * factor) / factor;
}

export function toClassificationContext(output: HybridClassificationOutput): ClassificationContext {
  const context: ClassificationContext = {
    axes: {},
    serialNumbers: [...output.serialNumbers],
    debug: { rawHits: {}, scores: {} },
  };

  for (const [axisId, result] of Object.entries(output.axes)) {
    context.axes[axisId] = {
      value: result.value,
      confidence: roundConfidence(result.confidence),
      method: result.method,
    };
    context.debug.rawHits[axisId] = result.debug.rawHits;
    context.debug.scores[axisId] = result.debug.scores;
  }

  return context;
}

export function serializeClassificationContext(output: HybridClassificationOutput): string {
  return JSON.stringify(toClassificationContext(output), null, 2);
}

/**
 * @throws ValidationError when the text is not a well-formed context
 */
export function parseClassificationContext(text: string): ClassificationContext {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw ValidationError.malformedContext([
      {
        field: '(root)',
        message: error instanceof Error ? error.message : 'invalid JSON',
      },
    ]);
  }

  const parsed = contextSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.malformedContext(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }

  return parsed.data;
}
