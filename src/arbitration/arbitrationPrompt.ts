/**
 * Arbitration Prompt
 * Builds the constrained prompt sent to the reasoning service and maps its
 * free-text answer back onto the heuristic candidate set.
 */

import { CandidateMatch } from '../classification/types';

/** Literal answer meaning "no candidate applies" */
export const NO_LABEL_SENTINEL = 'AUCUN';

/** Characters of email context included in a prompt */
export const ARBITRATION_CONTEXT_LIMIT = 2000;

export interface ArbitrationPromptInput {
  axisId: string;
  prefix: string;
  candidates: readonly CandidateMatch[];
  context: string;
  /** Labels already resolved by earlier axes; null values are left out */
  resolvedAxes: Readonly<Record<string, string | null>>;
}

export function buildArbitrationPrompt(input: ArbitrationPromptInput): string {
  const candidateLines = input.candidates.length > 0
    ? input.candidates.map((c) => `  - ${c.label}  (score=${c.score.toFixed(1)})`).join('\n')
    : '  (aucun candidat heuristique)';

  const resolvedLines = Object.entries(input.resolvedAxes)
    .filter(([, label]) => Boolean(label))
    .map(([axisId, label]) => `  ${axisId}: ${label}`)
    .join('\n') || '  (aucun)';

  return [
    "Tu es un classifieur d'emails industriels.",
    '',
    `Axe : ${input.axisId}  (préfixe ${input.prefix})`,
    '',
    'Candidats heuristiques, du meilleur score au plus faible :',
    candidateLines,
    '',
    "Contexte de l'email :",
    input.context.slice(0, ARBITRATION_CONTEXT_LIMIT),
    '',
    'Axes déjà classifiés :',
    resolvedLines,
    '',
    'Consignes :',
    '  • Choisis UNE SEULE valeur parmi les candidats listés.',
    `  • Si aucun candidat ne convient, réponds exactement : ${NO_LABEL_SENTINEL}`,
    "  • N'invente jamais de tag absent de la liste.",
    '',
    `Réponds uniquement avec le tag choisi ou ${NO_LABEL_SENTINEL}.`,
  ].join('\n');
}

// ============================================================================
// Response Parsing
// ============================================================================

export type ResponseMatch = 'exact' | 'contains' | 'contained';

export type ParsedArbitrationResponse =
  | { kind: 'label'; label: string; matchedBy: ResponseMatch }
  | { kind: 'none' }
  | { kind: 'unmatched' };

function cleanResponse(response: string): string {
  return response.replace(/^[\s"'`]+|[\s"'`.,;:!?]+$/g, '');
}

/**
 * Map a raw answer onto the candidate labels. Exact matches win; then the
 * longest candidate found inside the answer; then the shortest candidate
 * that contains the answer. Equal lengths keep heuristic rank order.
 */
export function parseArbitrationResponse(
  response: string,
  candidates: readonly CandidateMatch[]
): ParsedArbitrationResponse {
  const cleaned = cleanResponse(response);
  if (!cleaned || cleaned.toUpperCase() === NO_LABEL_SENTINEL) {
    return { kind: 'none' };
  }

  const labels = candidates.map((candidate) => candidate.label);
  const answer = cleaned.toLowerCase();

  const exact = labels.find((label) => label === cleaned)
    ?? labels.find((label) => label.toLowerCase() === answer);
  if (exact !== undefined) {
    return { kind: 'label', label: exact, matchedBy: 'exact' };
  }

  const inside = labels.filter((label) => answer.includes(label.toLowerCase()));
  if (inside.length > 0) {
    const longest = inside.reduce((best, label) => (label.length > best.length ? label : best));
    return { kind: 'label', label: longest, matchedBy: 'contains' };
  }

  const around = labels.filter((label) => label.toLowerCase().includes(answer));
  if (around.length > 0) {
    const shortest = around.reduce((best, label) => (label.length < best.length ? label : best));
    return { kind: 'label', label: shortest, matchedBy: 'contained' };
  }

  return { kind: 'unmatched' };
}
