/**
 * Arbitration Outcome
 * Runs one arbitration round trip and reports it as a value, so a failed
 * call is an ordinary branch for the decision layer.
 */

import { CandidateMatch } from '../classification/types';
import { DomainError, wrapError } from '../errors';
import logger from '../utils/logger';
import { ArbitrationProvider } from './ArbitrationProvider';
import { ResponseMatch, parseArbitrationResponse } from './arbitrationPrompt';

export type ArbitrationOutcome =
  | {
      kind: 'label';
      label: string;
      response: string;
      matchedBy: ResponseMatch | 'fallback';
      /** Present when the answer matched nothing and the heuristic best was used */
      anomaly?: string;
    }
  | { kind: 'none'; response: string; anomaly?: string }
  | { kind: 'unavailable'; error: DomainError };

export async function requestArbitration(
  provider: ArbitrationProvider,
  prompt: string,
  candidates: readonly CandidateMatch[],
  axisId: string
): Promise<ArbitrationOutcome> {
  let response: string;
  try {
    response = (await provider.arbitrate(prompt)).trim();
  } catch (error) {
    const failure = wrapError(error, 'Arbitration call failed');
    logger.error('Arbitration call failed', {
      axisId,
      provider: provider.name,
      error: failure.message,
      code: failure.code,
    });
    return { kind: 'unavailable', error: failure };
  }

  const parsed = parseArbitrationResponse(response, candidates);
  switch (parsed.kind) {
    case 'label':
      return { kind: 'label', label: parsed.label, response, matchedBy: parsed.matchedBy };
    case 'none':
      return { kind: 'none', response };
    case 'unmatched': {
      const anomaly = `unexpected arbitration response "${response}"`;
      logger.warn('Arbitration response matched no candidate; using heuristic best', {
        axisId,
        provider: provider.name,
        response,
      });
      const best = candidates[0];
      return best
        ? { kind: 'label', label: best.label, response, matchedBy: 'fallback', anomaly }
        : { kind: 'none', response, anomaly };
    }
  }
}
