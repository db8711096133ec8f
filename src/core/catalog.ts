import { readFile } from 'node:fs/promises';
import { CatalogSource, type CatalogEntryT } from '../schemas/catalog.js';
import { CatalogLoadError } from './errors.js';
import { normalize, type NormalizedToken } from './normalize.js';

export interface StoreRecord {
  readonly storeName: string;
  readonly city: string;
  readonly aliases: readonly string[];
  readonly address?: string;
  readonly region?: string;
}

const EMPTY_SET: ReadonlySet<StoreRecord> = new Set<StoreRecord>();

function toRecord(entry: CatalogEntryT): StoreRecord {
  return Object.freeze({
    storeName: entry.store,
    city: entry.city,
    aliases: Object.freeze([...entry.aliases]),
    ...(entry.address ? { address: entry.address } : {}),
    ...(entry.region ? { region: entry.region } : {}),
  });
}

/**
 * Identity keys for ambiguity detection. A record without aliases claims the
 * bare (store, city) key; otherwise it claims one key per alias, so two
 * records for the same store and city may coexist only when no alias is shared.
 */
function identityKeys(record: StoreRecord): string[] {
  const base = `${normalize(record.storeName)}|${normalize(record.city)}`;
  if (record.aliases.length === 0) return [`${base}|`];
  return Array.from(new Set(record.aliases.map((alias) => `${base}|${normalize(alias)}`)));
}

/**
 * Read-only store catalog. Built once at startup; safe to share between
 * sessions because nothing mutates it after construction.
 */
export class CatalogStore {
  private readonly records: readonly StoreRecord[];
  private readonly byCity: Map<NormalizedToken, Set<StoreRecord>>;

  private constructor(records: StoreRecord[]) {
    this.records = Object.freeze(records);
    this.byCity = new Map();
    for (const record of records) {
      const key = normalize(record.city);
      const bucket = this.byCity.get(key) ?? new Set<StoreRecord>();
      bucket.add(record);
      this.byCity.set(key, bucket);
    }
  }

  static async load(source: string): Promise<CatalogStore> {
    let raw: string;
    try {
      raw = await readFile(source, 'utf-8');
    } catch (error) {
      throw new CatalogLoadError(`Cannot read catalog at ${source}: ${String(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new CatalogLoadError(`Catalog at ${source} is not valid JSON: ${String(error)}`);
    }

    return CatalogStore.fromData(data);
  }

  static fromData(data: unknown): CatalogStore {
    const parsed = CatalogSource.safeParse(data);
    if (!parsed.success) {
      throw new CatalogLoadError('Catalog entries are malformed', parsed.error.flatten());
    }

    const records = parsed.data.map(toRecord);
    const seen = new Map<string, number>();
    records.forEach((record, index) => {
      for (const key of identityKeys(record)) {
        const previous = seen.get(key);
        if (previous !== undefined) {
          throw new CatalogLoadError(
            `Ambiguous catalog entry #${index}: "${record.storeName}" in ${record.city} duplicates entry #${previous}`,
            { index, previous },
          );
        }
        seen.set(key, index);
      }
    });

    return new CatalogStore(records);
  }

  get size(): number {
    return this.records.length;
  }

  lookupByNormalizedCity(token: NormalizedToken): ReadonlySet<StoreRecord> {
    return this.byCity.get(token) ?? EMPTY_SET;
  }

  allRecords(): readonly StoreRecord[] {
    return this.records;
  }
}
