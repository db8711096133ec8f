import type { CatalogStore, StoreRecord } from './catalog.js';
import { normalize, type NormalizedToken } from './normalize.js';
import { similarity } from './similarity.js';

export type MatchKind = 'exact' | 'alias' | 'fuzzy';

export interface MatchResult {
  record: StoreRecord;
  score: number;
  matchKind: MatchKind;
}

export interface ResolveOptions {
  fuzzyThreshold?: number;
  minMatchesBeforeFuzzy?: number;
  maxNgram?: number;
}

export const DEFAULT_RESOLVE_OPTIONS: Required<ResolveOptions> = {
  fuzzyThreshold: 0.75,
  minMatchesBeforeFuzzy: 1,
  maxNgram: 4,
};

const EXACT_SCORE = 1.0;
const ALIAS_SCORE = 0.9;
const MIN_FUZZY_TOKEN_LENGTH = 3;
const SEGMENT_SEPARATORS = /[,;/|\n]+/;

interface NormalizedFields {
  storeName: NormalizedToken;
  city: NormalizedToken;
  aliases: NormalizedToken[];
}

// Records are frozen, so their normalized fields can be memoized per object.
const fieldCache = new WeakMap<StoreRecord, NormalizedFields>();

function fieldsOf(record: StoreRecord): NormalizedFields {
  let fields = fieldCache.get(record);
  if (!fields) {
    fields = {
      storeName: normalize(record.storeName),
      city: normalize(record.city),
      aliases: record.aliases.map(normalize).filter(Boolean),
    };
    fieldCache.set(record, fields);
  }
  return fields;
}

/**
 * Candidate tokens of a query: the whole normalized string, every segment
 * between common separators, and every contiguous word n-gram up to
 * `maxNgram` words (so "new york" inside a sentence is still a token).
 */
export function candidateTokens(rawQuery: string, maxNgram: number): Set<NormalizedToken> {
  const tokens = new Set<NormalizedToken>();
  const whole = normalize(rawQuery);
  if (!whole) return tokens;
  tokens.add(whole);

  for (const segment of rawQuery.split(SEGMENT_SEPARATORS)) {
    const normalized = normalize(segment);
    if (normalized) tokens.add(normalized);
  }

  const words = whole.split(' ');
  const span = Math.max(1, maxNgram);
  for (let start = 0; start < words.length; start++) {
    for (let size = 1; size <= span && start + size <= words.length; size++) {
      tokens.add(words.slice(start, start + size).join(' '));
    }
  }
  return tokens;
}

// Ranking detail kept out of MatchResult: how many of the record's fields
// (city, and store name or alias) the query named.
interface Ranked extends MatchResult {
  fieldHits: number;
}

function identityOf(fields: NormalizedFields): string {
  return `${fields.storeName}|${fields.city}`;
}

function compareResults(a: Ranked, b: Ranked): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.fieldHits !== a.fieldHits) return b.fieldHits - a.fieldHits;
  const fa = fieldsOf(a.record);
  const fb = fieldsOf(b.record);
  if (fa.storeName !== fb.storeName) return fa.storeName < fb.storeName ? -1 : 1;
  if (fa.city !== fb.city) return fa.city < fb.city ? -1 : 1;
  return 0;
}

/**
 * Resolves free text against the catalog. Never throws: an empty array is the
 * "no match" outcome.
 *
 * Stages run in order (exact, alias, fuzzy); a record keeps the first stage
 * that matched it, and the fuzzy stage only runs while fewer than
 * `minMatchesBeforeFuzzy` records have matched. Equal scores rank records
 * matching both city and store (or alias) first.
 */
export function resolve(
  rawQuery: string,
  catalog: CatalogStore,
  options: ResolveOptions = {},
): MatchResult[] {
  const opts = { ...DEFAULT_RESOLVE_OPTIONS, ...options };
  const tokens = candidateTokens(rawQuery ?? '', opts.maxNgram);
  if (tokens.size === 0) return [];

  const matched = new Map<StoreRecord, Ranked>();
  const records = catalog.allRecords();

  const cityHits = new Set<StoreRecord>();
  for (const token of tokens) {
    for (const record of catalog.lookupByNormalizedCity(token)) {
      cityHits.add(record);
    }
  }

  for (const record of records) {
    const fields = fieldsOf(record);
    const byCity = cityHits.has(record);
    const byName = tokens.has(fields.storeName);
    const byAlias = fields.aliases.some((alias) => tokens.has(alias));
    const fieldHits = (byCity ? 1 : 0) + (byName || byAlias ? 1 : 0);
    if (byCity || byName) {
      matched.set(record, { record, score: EXACT_SCORE, matchKind: 'exact', fieldHits });
    } else if (byAlias) {
      matched.set(record, { record, score: ALIAS_SCORE, matchKind: 'alias', fieldHits });
    }
  }

  if (matched.size < opts.minMatchesBeforeFuzzy) {
    const fuzzyTokens = Array.from(tokens).filter((t) => t.length >= MIN_FUZZY_TOKEN_LENGTH);
    for (const record of records) {
      if (matched.has(record)) continue;
      const fields = fieldsOf(record);
      const targets = [fields.storeName, fields.city, ...fields.aliases];
      let best = 0;
      for (const token of fuzzyTokens) {
        for (const target of targets) {
          best = Math.max(best, similarity(token, target));
        }
      }
      if (best >= opts.fuzzyThreshold) {
        matched.set(record, { record, score: best, matchKind: 'fuzzy', fieldHits: 1 });
      }
    }
  }

  const byIdentity = new Map<string, Ranked>();
  for (const result of matched.values()) {
    const key = identityOf(fieldsOf(result.record));
    const current = byIdentity.get(key);
    if (!current || compareResults(result, current) < 0) {
      byIdentity.set(key, result);
    }
  }

  return Array.from(byIdentity.values())
    .sort(compareResults)
    .map(({ record, score, matchKind }) => ({ record, score, matchKind }));
}
