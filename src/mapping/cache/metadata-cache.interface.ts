/**
 * Key/value store the compiler writes its field name tables into.
 * Writes are last-writer-wins per key. Tables are scoped by class name, so
 * two classes sharing a name share their entries.
 */
export interface MetadataCache {
  contains(key: string): boolean;
  fetch(key: string): unknown;
  save(key: string, value: unknown): boolean;
}
