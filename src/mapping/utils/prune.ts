import { isPlainObject } from 'lodash';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isRecord(value) && Object.keys(value).length === 0;
}

/**
 * Drops `undefined`, `null`, empty strings, empty arrays and empty objects at
 * every depth. `false` and `0` are meaningful mapping values and are kept.
 */
export function pruneEmpty(record: Record<string, unknown>): Record<string, unknown> {
  const pruned: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(record)) {
    const next = isRecord(value) ? pruneEmpty(value) : value;
    if (!isEmptyValue(next)) {
      pruned[key] = next;
    }
  }

  return pruned;
}
