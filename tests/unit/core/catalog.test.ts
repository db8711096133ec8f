import path from 'node:path';
import { describe, it, expect } from '@jest/globals';
import { CatalogStore } from '../../../src/core/catalog.js';
import { CatalogLoadError } from '../../../src/core/errors.js';

const fixture = (name: string) => path.join(__dirname, '../../fixtures', name);

describe('CatalogStore.load', () => {
  it('loads a { stores: [...] } document', async () => {
    const catalog = await CatalogStore.load(fixture('stores.valid.json'));
    expect(catalog.size).toBe(4);
    expect(catalog.allRecords().map((r) => r.storeName)).toEqual(['Acme', 'Acme', 'Blue Kettle Café', "Macy's"]);
  });

  it('keeps optional fields and defaults aliases to an empty list', async () => {
    const catalog = await CatalogStore.load(fixture('stores.valid.json'));
    const [springfield, shelbyville] = catalog.allRecords();
    expect(springfield).toEqual({
      storeName: 'Acme',
      city: 'Springfield',
      aliases: ['ACM'],
      address: '12 Elm Street',
    });
    expect(shelbyville.aliases).toEqual([]);
    expect(shelbyville.address).toBeUndefined();
  });

  it('fails on a missing file', async () => {
    await expect(CatalogStore.load(fixture('missing.json'))).rejects.toBeInstanceOf(CatalogLoadError);
  });

  it('fails on invalid JSON', async () => {
    await expect(CatalogStore.load(fixture('stores.broken.json'))).rejects.toThrow(/not valid JSON/);
  });

  it('fails when an entry has an empty store name', async () => {
    await expect(CatalogStore.load(fixture('stores.invalid.json'))).rejects.toThrow('Catalog entries are malformed');
  });
});

describe('CatalogStore.fromData', () => {
  it('accepts a bare array', () => {
    const catalog = CatalogStore.fromData([{ store: 'Acme', city: 'Springfield' }]);
    expect(catalog.size).toBe(1);
  });

  it('trims fields', () => {
    const catalog = CatalogStore.fromData([{ store: '  Acme ', city: ' Springfield', aliases: [' acm '] }]);
    expect(catalog.allRecords()[0]).toEqual({ storeName: 'Acme', city: 'Springfield', aliases: ['acm'] });
  });

  it('rejects entries missing a city', () => {
    expect(() => CatalogStore.fromData([{ store: 'Acme' }])).toThrow(CatalogLoadError);
  });

  it('rejects a non-catalog document', () => {
    expect(() => CatalogStore.fromData({ shops: [] })).toThrow(CatalogLoadError);
    expect(() => CatalogStore.fromData(null)).toThrow(CatalogLoadError);
  });

  it('rejects two entries for the same store and city without aliases', () => {
    expect(() =>
      CatalogStore.fromData([
        { store: 'Acme', city: 'Springfield' },
        { store: 'ACME', city: 'springfield' },
      ]),
    ).toThrow('Ambiguous catalog entry #1: "ACME" in springfield duplicates entry #0');
  });

  it('rejects two entries for the same store and city sharing an alias', () => {
    expect(() =>
      CatalogStore.fromData([
        { store: 'Acme', city: 'Springfield', aliases: ['downtown'] },
        { store: 'Acme', city: 'Springfield', aliases: ['Downtown', 'north'] },
      ]),
    ).toThrow(CatalogLoadError);
  });

  it('allows the same store and city when aliases tell the entries apart', () => {
    const catalog = CatalogStore.fromData([
      { store: 'Acme', city: 'Springfield', aliases: ['downtown'] },
      { store: 'Acme', city: 'Springfield', aliases: ['north side'] },
    ]);
    expect(catalog.size).toBe(2);
  });

  it('allows the same store in different cities', () => {
    const catalog = CatalogStore.fromData([
      { store: 'Acme', city: 'Springfield' },
      { store: 'Acme', city: 'Shelbyville' },
    ]);
    expect(catalog.size).toBe(2);
  });
});

describe('lookupByNormalizedCity', () => {
  const catalog = CatalogStore.fromData([
    { store: 'Blue Kettle Café', city: 'Montréal' },
    { store: 'Acme', city: 'Montreal' },
    { store: 'Acme', city: 'Springfield' },
  ]);

  it('groups records by normalized city', () => {
    const hits = catalog.lookupByNormalizedCity('montreal');
    expect(Array.from(hits).map((r) => r.storeName).sort()).toEqual(['Acme', 'Blue Kettle Café']);
  });

  it('returns an empty set for unknown cities', () => {
    expect(catalog.lookupByNormalizedCity('boston').size).toBe(0);
  });

  it('expects an already normalized token', () => {
    expect(catalog.lookupByNormalizedCity('Montréal').size).toBe(0);
  });
});

describe('records', () => {
  it('are frozen', () => {
    const catalog = CatalogStore.fromData([{ store: 'Acme', city: 'Springfield', aliases: ['acm'] }]);
    const record = catalog.allRecords()[0];
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.aliases)).toBe(true);
    expect(Object.isFrozen(catalog.allRecords())).toBe(true);
  });
});
