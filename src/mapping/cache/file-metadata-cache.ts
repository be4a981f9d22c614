import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { isRecord } from '../utils/prune';
import { MetadataCache } from './metadata-cache.interface';

/**
 * Metadata cache persisted as a single JSON document. The whole file is
 * rewritten on every save so other processes can read the latest tables.
 */
export class FileMetadataCache implements MetadataCache {
  private readonly logger = new Logger(FileMetadataCache.name);
  private entries: Record<string, unknown> = {};

  constructor(private readonly filePath: string) {
    this.load();
  }

  contains(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.entries, key);
  }

  fetch(key: string): unknown {
    return this.contains(key) ? this.entries[key] : null;
  }

  save(key: string, value: unknown): boolean {
    this.entries = { ...this.entries, [key]: value };

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.entries, null, 2));
      return true;
    } catch (error) {
      this.logger.error(`Failed to write metadata cache ${this.filePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      if (isRecord(parsed)) {
        this.entries = parsed;
        this.logger.log(`Loaded metadata cache from ${this.filePath}`);
      } else {
        this.logger.warn(`Ignoring metadata cache ${this.filePath}: not a JSON object`);
      }
    } catch (error) {
      this.logger.warn(`Ignoring unreadable metadata cache ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
