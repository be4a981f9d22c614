import { MetadataCache } from './metadata-cache.interface';

export class InMemoryMetadataCache implements MetadataCache {
  private readonly entries = new Map<string, unknown>();

  contains(key: string): boolean {
    return this.entries.has(key);
  }

  fetch(key: string): unknown {
    return this.entries.get(key) ?? null;
  }

  save(key: string, value: unknown): boolean {
    this.entries.set(key, value);
    return true;
  }

  clear(): void {
    this.entries.clear();
  }
}
