/**
 * Axis Scoring Engine
 * Heuristic pipeline for a single axis:
 *   normalize subject and body independently
 *   → multi-pattern matching (keywords + synonyms)
 *   → cumulative weighted scores per label
 *   → serial-number extraction (extraction axis only)
 *   → min-score filter, ranking, truncation, ambiguity flag
 */

import { PatternMatcher } from './PatternMatcher';
import { SerialNumberExtractor } from './SerialNumberExtractor';
import { normalizeText } from './TextNormalizer';
import { AxisConfiguration, AxisHeuristicResult, CandidateMatch } from './types';

export const SUBJECT_WEIGHT = 3;
export const BODY_WEIGHT = 1;
/** Added on top of the subject/body weight when the hit is a synonym */
export const SYNONYM_BONUS = 2;

type ScoredLabel = [label: string, score: number];

export class AxisScoringEngine {
  private readonly matcher: PatternMatcher;
  private readonly extractor: SerialNumberExtractor | null;

  constructor(readonly axis: AxisConfiguration) {
    this.matcher = new PatternMatcher(axis.keywords, axis.synonyms);
    this.extractor = axis.extractionPatterns.length > 0
      ? new SerialNumberExtractor(axis.extractionPatterns)
      : null;
  }

  run(subject: string, body: string): AxisHeuristicResult {
    const scores = new Map<string, number>();
    const hits = new Map<string, string[]>();

    const accumulate = (text: string, weight: number, tag: 'subj' | 'body') => {
      for (const hit of this.matcher.findMatches(normalizeText(text))) {
        const increment = weight + (hit.isSynonym ? SYNONYM_BONUS : 0);
        scores.set(hit.label, (scores.get(hit.label) ?? 0) + increment);

        const provenance = hits.get(hit.label) ?? [];
        provenance.push(`${tag}:${hit.pattern}`);
        hits.set(hit.label, provenance);
      }
    };

    accumulate(subject, SUBJECT_WEIGHT, 'subj');
    accumulate(body, BODY_WEIGHT, 'body');

    const serialNumbers = this.extractor ? this.extractor.extract(`${subject}\n${body}`) : [];

    // Stable sort keeps first-hit order among equal scores
    const qualified: ScoredLabel[] = [...scores.entries()]
      .filter(([, score]) => score > this.axis.minScore)
      .sort((a, b) => b[1] - a[1]);
    const top = qualified.slice(0, this.axis.maxCandidates);

    const candidates: CandidateMatch[] = top.map(([label, score]) => ({
      label,
      score,
      hits: hits.get(label) ?? [],
    }));

    return {
      axisId: this.axis.id,
      prefix: this.axis.prefix,
      candidates,
      isAmbiguous: this.isAmbiguous(top),
      serialNumbers,
      debug: {
        rawHits: Object.fromEntries(qualified.map(([label]) => [label, hits.get(label) ?? []])),
        scores: Object.fromEntries(qualified),
      },
    };
  }

  /**
   * No candidate is ambiguous, a lone candidate is not; otherwise the gap
   * between rank 1 and rank 2, relative to rank 1, must reach the threshold.
   */
  private isAmbiguous(ranked: ScoredLabel[]): boolean {
    if (ranked.length === 0) return true;
    if (ranked.length === 1) return false;

    const [, topScore] = ranked[0];
    const [, secondScore] = ranked[1];
    if (topScore === 0) return true;

    const gapRatio = (topScore - secondScore) / topScore;
    return gapRatio < this.axis.ambiguityThreshold;
  }
}

export function getBestCandidate(result: AxisHeuristicResult): CandidateMatch | null {
  return result.candidates[0] ?? null;
}

/**
 * Best score over the sum of all candidate scores; 0 without candidates.
 */
export function getBestConfidence(result: AxisHeuristicResult): number {
  const best = getBestCandidate(result);
  if (!best) return 0;

  const total = result.candidates.reduce((sum, candidate) => sum + candidate.score, 0);
  if (total === 0) return 0;

  return best.score / total;
}
