import { Inject, Injectable } from '@nestjs/common';
import { fetchClassTables } from './cache/field-name-tables';
import { MetadataCache } from './cache/metadata-cache.interface';
import {
  ARRAY_CACHED_FIELDS,
  EMBEDDED_CACHED_FIELDS,
  METADATA_CACHE,
  OBJ_CACHED_FIELDS,
} from './constants';

/**
 * Read side of the field name tables, for code that converts documents to and
 * from their search-engine representation.
 */
@Injectable()
export class FieldNameLookupService {
  constructor(@Inject(METADATA_CACHE) private readonly cache: MetadataCache) {}

  getSchemaFieldName(className: string, objectField: string): string | null {
    return this.lookup(OBJ_CACHED_FIELDS, className, objectField);
  }

  getObjectFieldName(className: string, schemaField: string): string | null {
    return this.lookup(ARRAY_CACHED_FIELDS, className, schemaField);
  }

  getEmbeddedClassName(className: string, objectField: string): string | null {
    return this.lookup(EMBEDDED_CACHED_FIELDS, className, objectField);
  }

  private lookup(key: string, className: string, field: string): string | null {
    return fetchClassTables(this.cache, key)[className]?.[field] ?? null;
  }
}
