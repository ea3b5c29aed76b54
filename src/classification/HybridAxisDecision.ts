/**
 * Hybrid Axis Decision
 *
 * Turns one axis's heuristic result into a final label:
 * 1. No candidate        → arbitrate with an empty candidate list when a
 *                          provider and context are available, else none
 * 2. Clear winner        → accept the heuristic best, no external call
 * 3. Ambiguous or weak   → arbitrate among the heuristic candidates
 * 4. No provider         → heuristic best at half confidence
 *
 * The reasoning service can only pick among the candidates; a failed call
 * degrades to the heuristic best and never throws.
 */

import { ArbitrationProvider } from '../arbitration/ArbitrationProvider';
import { buildArbitrationPrompt } from '../arbitration/arbitrationPrompt';
import { requestArbitration } from '../arbitration/requestArbitration';
import { getBestCandidate, getBestConfidence } from './AxisScoringEngine';
import {
  ArbitrationReason,
  AxisClassificationResult,
  AxisDecisionDebug,
  AxisHeuristicResult,
  DecisionMethod,
  HeuristicDebug,
} from './types';

/** Minimum best-candidate confidence for a clear winner */
export const CONFIDENCE_CUTOFF = 0.55;
export const ARBITRATED_LABEL_CONFIDENCE = 0.9;
export const ARBITRATED_NONE_CONFIDENCE = 0.85;
/** Applied to the heuristic confidence whenever arbitration could not settle the axis */
export const FALLBACK_CONFIDENCE_FACTOR = 0.5;

type DecisionNotes = Omit<AxisDecisionDebug, keyof HeuristicDebug>;

export class HybridAxisDecision {
  constructor(private readonly provider: ArbitrationProvider) {}

  /**
   * @param context        Summary or excerpt shown to the reasoning service
   * @param resolvedAxes   Labels chosen by axes processed earlier
   */
  async classify(
    heuristic: AxisHeuristicResult,
    context: string,
    resolvedAxes: Readonly<Record<string, string | null>> = {}
  ): Promise<AxisClassificationResult> {
    const best = getBestCandidate(heuristic);

    if (!best) {
      if (this.provider.available && context.trim()) {
        return this.arbitrate(heuristic, context, resolvedAxes, 'no_match');
      }
      return buildResult(heuristic, null, 0, 'none');
    }

    const confidence = getBestConfidence(heuristic);
    if (!heuristic.isAmbiguous && confidence >= CONFIDENCE_CUTOFF) {
      return buildResult(heuristic, best.label, confidence, 'heuristic');
    }

    const reason: ArbitrationReason = heuristic.isAmbiguous ? 'ambiguous' : 'low_confidence';
    if (this.provider.available) {
      return this.arbitrate(heuristic, context, resolvedAxes, reason);
    }

    return buildResult(
      heuristic,
      best.label,
      confidence * FALLBACK_CONFIDENCE_FACTOR,
      'heuristic',
      { note: 'ambiguous_no_llm', arbitrationReason: reason }
    );
  }

  private async arbitrate(
    heuristic: AxisHeuristicResult,
    context: string,
    resolvedAxes: Readonly<Record<string, string | null>>,
    reason: ArbitrationReason
  ): Promise<AxisClassificationResult> {
    const prompt = buildArbitrationPrompt({
      axisId: heuristic.axisId,
      prefix: heuristic.prefix,
      candidates: heuristic.candidates,
      context,
      resolvedAxes,
    });

    const outcome = await requestArbitration(
      this.provider,
      prompt,
      heuristic.candidates,
      heuristic.axisId
    );

    switch (outcome.kind) {
      case 'label':
        return buildResult(heuristic, outcome.label, ARBITRATED_LABEL_CONFIDENCE, 'llm', {
          arbitrationReason: reason,
          arbitrationResponse: outcome.response,
          arbitrationAnomaly: outcome.anomaly,
        });
      case 'none':
        return buildResult(heuristic, null, ARBITRATED_NONE_CONFIDENCE, 'llm', {
          arbitrationReason: reason,
          arbitrationResponse: outcome.response,
          arbitrationAnomaly: outcome.anomaly,
        });
      case 'unavailable': {
        const best = getBestCandidate(heuristic);
        const extra: DecisionNotes = {
          note: 'arbitration_failed',
          arbitrationReason: reason,
          arbitrationError: outcome.error.message,
        };
        return best
          ? buildResult(
              heuristic,
              best.label,
              getBestConfidence(heuristic) * FALLBACK_CONFIDENCE_FACTOR,
              'heuristic',
              extra
            )
          : buildResult(heuristic, null, 0, 'none', extra);
      }
    }
  }
}

function buildResult(
  heuristic: AxisHeuristicResult,
  value: string | null,
  confidence: number,
  method: DecisionMethod,
  extra: DecisionNotes = {}
): AxisClassificationResult {
  const debug: AxisDecisionDebug = { ...heuristic.debug, ...extra };

  return Object.freeze({
    axisId: heuristic.axisId,
    prefix: heuristic.prefix,
    value,
    confidence,
    method,
    candidates: heuristic.candidates,
    serialNumbers: heuristic.serialNumbers,
    debug,
  });
}
