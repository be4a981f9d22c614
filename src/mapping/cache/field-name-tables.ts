import { isRecord } from '../utils/prune';
import { MetadataCache } from './metadata-cache.interface';

export type StringTable = Record<string, string>;

function toStringTable(value: unknown): StringTable {
  const table: StringTable = {};
  if (!isRecord(value)) {
    return table;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      table[key] = entry;
    }
  }
  return table;
}

/** Reads a `className -> table` cache item, dropping anything malformed. */
export function fetchClassTables(cache: MetadataCache, key: string): Record<string, StringTable> {
  const item = cache.fetch(key);
  const tables: Record<string, StringTable> = {};
  if (!isRecord(item)) {
    return tables;
  }
  for (const [className, table] of Object.entries(item)) {
    tables[className] = toStringTable(table);
  }
  return tables;
}

export function saveClassTable(
  cache: MetadataCache,
  key: string,
  className: string,
  table: StringTable,
): boolean {
  const item = fetchClassTables(cache, key);
  item[className] = table;
  return cache.save(key, item);
}

export function fetchStringTable(cache: MetadataCache, key: string): StringTable {
  return cache.contains(key) ? toStringTable(cache.fetch(key)) : {};
}
