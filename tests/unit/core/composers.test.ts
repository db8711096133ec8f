import { describe, it, expect } from '@jest/globals';
import { CatalogStore } from '../../../src/core/catalog.js';
import {
  composeHistorySearchReply,
  composeLookupReply,
  composeNoMatchReply,
  composeStoreLine,
  composeTooLongReply,
} from '../../../src/core/composers.js';
import type { MatchResult } from '../../../src/core/resolver.js';

const records = CatalogStore.fromData([
  { store: 'Acme', city: 'Springfield', address: '12 Elm Street' },
  { store: 'Acme', city: 'Shelbyville' },
  { store: 'Sunrise Pharmacy', city: 'Springfield' },
]).allRecords();

const matches: MatchResult[] = records.map((record) => ({ record, score: 1, matchKind: 'exact' }));

describe('composeStoreLine', () => {
  it('lists city and address when known', () => {
    expect(composeStoreLine(matches[0])).toBe('• Acme — Springfield, 12 Elm Street');
    expect(composeStoreLine(matches[1])).toBe('• Acme — Shelbyville');
  });
});

describe('composeLookupReply', () => {
  it('uses the singular for one store', () => {
    expect(composeLookupReply(matches.slice(0, 1), 5)).toBe('Found 1 store:\n• Acme — Springfield, 12 Elm Street');
  });

  it('caps the list and says how many were left out', () => {
    expect(composeLookupReply(matches, 2)).toBe(
      [
        'Found 3 stores:',
        '• Acme — Springfield, 12 Elm Street',
        '• Acme — Shelbyville',
        '…and 1 more. Add a city to narrow it down.',
      ].join('\n'),
    );
  });
});

describe('composeNoMatchReply', () => {
  it('quotes the query', () => {
    expect(composeNoMatchReply('  Gotham ')).toBe('No stores found for "Gotham".');
    expect(composeNoMatchReply('')).toBe('No stores found.');
  });
});

describe('composeTooLongReply', () => {
  it('names the length limit', () => {
    expect(composeTooLongReply(2000)).toBe('That message is too long. Please keep it under 2000 characters.');
  });
});

describe('composeHistorySearchReply', () => {
  it('joins hits with blank lines', () => {
    const hits = [
      { role: 'assistant' as const, text: 'second', seq: 2 },
      { role: 'user' as const, text: 'first', seq: 1 },
    ];
    expect(composeHistorySearchReply('x', hits)).toBe('second\n\nfirst');
  });

  it('says when nothing was found', () => {
    expect(composeHistorySearchReply(' pizza ', [])).toBe('Nothing found for "pizza".');
  });
});
