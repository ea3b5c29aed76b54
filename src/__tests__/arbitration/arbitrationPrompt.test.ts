/**
 * Unit Tests for Arbitration Prompt building and response parsing
 */

import {
  ARBITRATION_CONTEXT_LIMIT,
  buildArbitrationPrompt,
  parseArbitrationResponse,
} from '../../arbitration/arbitrationPrompt';
import { buildHeuristicResult } from '../fixtures/axes';

describe('buildArbitrationPrompt', () => {
  const { candidates } = buildHeuristicResult([['F_Radiall', 4], ['F_Tesat', 3.5]], true);

  it('lists the axis, ranked candidates and resolved axes', () => {
    const prompt = buildArbitrationPrompt({
      axisId: 'supplier',
      prefix: 'F_',
      candidates,
      context: 'Subject: Connecteurs',
      resolvedAxes: { message_type: 'T_Commande', status: null, project: 'P_GALILEO' },
    });

    expect(prompt).toContain('Axe : supplier  (préfixe F_)');
    expect(prompt).toContain('  - F_Radiall  (score=4.0)\n  - F_Tesat  (score=3.5)');
    expect(prompt).toContain('Subject: Connecteurs');
    expect(prompt).toContain('  message_type: T_Commande\n  project: P_GALILEO');
    expect(prompt).not.toContain('status:');
    expect(prompt).toContain('réponds exactement : AUCUN');
  });

  it('marks empty candidate and resolved lists', () => {
    const prompt = buildArbitrationPrompt({
      axisId: 'supplier',
      prefix: 'F_',
      candidates: [],
      context: 'x',
      resolvedAxes: {},
    });

    expect(prompt).toContain('  (aucun candidat heuristique)');
    expect(prompt).toContain('Axes déjà classifiés :\n  (aucun)');
  });

  it('clips the email context', () => {
    const prompt = buildArbitrationPrompt({
      axisId: 'supplier',
      prefix: 'F_',
      candidates,
      context: 'y'.repeat(ARBITRATION_CONTEXT_LIMIT + 500),
      resolvedAxes: {},
    });

    expect(prompt).toContain('y'.repeat(ARBITRATION_CONTEXT_LIMIT));
    expect(prompt).not.toContain('y'.repeat(ARBITRATION_CONTEXT_LIMIT + 1));
  });
});

describe('parseArbitrationResponse', () => {
  const { candidates } = buildHeuristicResult([['F_Radiall', 4], ['F_Tesat', 3]], true);

  it('treats an empty answer and the sentinel as no label', () => {
    expect(parseArbitrationResponse('', candidates)).toEqual({ kind: 'none' });
    expect(parseArbitrationResponse('  AUCUN ', candidates)).toEqual({ kind: 'none' });
    expect(parseArbitrationResponse('aucun.', candidates)).toEqual({ kind: 'none' });
  });

  it('matches exactly, ignoring case, quotes and trailing punctuation', () => {
    expect(parseArbitrationResponse('F_Tesat', candidates)).toEqual({
      kind: 'label',
      label: 'F_Tesat',
      matchedBy: 'exact',
    });
    expect(parseArbitrationResponse('"f_tesat".', candidates)).toEqual({
      kind: 'label',
      label: 'F_Tesat',
      matchedBy: 'exact',
    });
    expect(parseArbitrationResponse('`F_Radiall`', candidates)).toEqual({
      kind: 'label',
      label: 'F_Radiall',
      matchedBy: 'exact',
    });
  });

  it('finds a candidate inside a verbose answer', () => {
    expect(parseArbitrationResponse('Le tag est F_Tesat', candidates)).toEqual({
      kind: 'label',
      label: 'F_Tesat',
      matchedBy: 'contains',
    });
  });

  it('accepts a truncated answer contained in a candidate', () => {
    expect(parseArbitrationResponse('F_Rad', candidates)).toEqual({
      kind: 'label',
      label: 'F_Radiall',
      matchedBy: 'contained',
    });
  });

  it('reports an answer outside the candidate set', () => {
    expect(parseArbitrationResponse('F_Amphenol', candidates)).toEqual({ kind: 'unmatched' });
  });

  describe('when one candidate label is a substring of another', () => {
    const { candidates: milestones } = buildHeuristicResult(
      [['J_CDR_Final', 5], ['J_CDR', 4]],
      true,
      'milestone',
      'J_'
    );

    it('prefers an exact match', () => {
      expect(parseArbitrationResponse('J_CDR', milestones)).toEqual({
        kind: 'label',
        label: 'J_CDR',
        matchedBy: 'exact',
      });
      expect(parseArbitrationResponse('J_CDR_Final', milestones)).toEqual({
        kind: 'label',
        label: 'J_CDR_Final',
        matchedBy: 'exact',
      });
    });

    it('picks the longest candidate found in the answer', () => {
      expect(parseArbitrationResponse('Tag : J_CDR_Final.', milestones)).toEqual({
        kind: 'label',
        label: 'J_CDR_Final',
        matchedBy: 'contains',
      });
    });

    it('picks the shortest candidate containing the answer', () => {
      expect(parseArbitrationResponse('CDR', milestones)).toEqual({
        kind: 'label',
        label: 'J_CDR',
        matchedBy: 'contained',
      });
    });
  });
});
