/**
 * Unit Tests for Text Normalizer
 */

import { TextNormalizer, normalizeText } from '../../classification/TextNormalizer';

describe('TextNormalizer', () => {
  const normalizer = new TextNormalizer();

  it('lowercases and strips diacritics', () => {
    expect(normalizer.normalize('Réception  COMMANDÉE')).toBe('reception commandee');
    expect(normalizer.normalize('Traçabilité')).toBe('tracabilite');
  });

  it('collapses whitespace runs and trims', () => {
    expect(normalizer.normalize('  bon\tde\n\ncommande  ')).toBe('bon de commande');
  });

  it('folds compatibility characters', () => {
    expect(normalizer.normalize('ﬁche')).toBe('fiche');
    expect(normalizer.normalize('Ｃｏｍｍａｎｄｅ')).toBe('commande');
  });

  it('returns an empty string for missing input', () => {
    expect(normalizer.normalize('')).toBe('');
    expect(normalizer.normalize(null)).toBe('');
    expect(normalizer.normalize(undefined)).toBe('');
    expect(normalizer.normalize(' \n\t ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'Bon de commande reçu',
      'Revue Critique de Design — CDR',
      'ÉQUIPEMENT  FM1 / SN:12345',
      'Ｆｕｌｌｗｉｄｔｈ ﬁ ligature',
      'Ångström Œuvre ß',
    ];

    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});
