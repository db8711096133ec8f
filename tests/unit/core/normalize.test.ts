import { describe, it, expect } from '@jest/globals';
import { isEquivalent, normalize } from '../../../src/core/normalize.js';

describe('normalize', () => {
  it.each([
    ['Montréal', 'montreal'],
    ["Macy's", 'macys'],
    ['Macy’s', 'macys'],
    ['Coca-Cola', 'coca cola'],
    ['  New   York!! ', 'new york'],
    ['SAN JOSÉ', 'san jose'],
    ['St. Louis', 'st louis'],
    ['U.S.A.', 'usa'],
    ['Café\tMüller', 'cafe muller'],
  ])('%j → %j', (input, expected) => {
    expect(normalize(input)).toBe(expected);
  });

  it('returns an empty string for empty or punctuation-only input', () => {
    expect(normalize('')).toBe('');
    expect(normalize('   ')).toBe('');
    expect(normalize('?!...')).toBe('');
  });

  it('folds full-width characters', () => {
    expect(normalize('ＡＣＭＥ')).toBe('acme');
  });

  it('is idempotent', () => {
    const once = normalize("  Où est  Macy's, Montréal? ");
    expect(once).toBe('ou est macys montreal');
    expect(normalize(once)).toBe(once);
  });
});

describe('isEquivalent', () => {
  it('compares by normalized form', () => {
    expect(isEquivalent('Montreal', 'MONTRÉAL')).toBe(true);
    expect(isEquivalent('Springfield', 'Shelbyville')).toBe(false);
  });
});
