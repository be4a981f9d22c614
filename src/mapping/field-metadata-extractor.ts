import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  MappingAnnotation,
  NestedTypeAnnotation,
  ObjectTypeAnnotation,
  isMappingAnnotation,
} from './annotations/annotations';
import { fetchClassTables, saveClassTable } from './cache/field-name-tables';
import { MetadataCache } from './cache/metadata-cache.interface';
import {
  ANNOTATION_READER,
  ARRAY_CACHED_FIELDS,
  EMBEDDED_CACHED_FIELDS,
  METADATA_CACHE,
  OBJ_CACHED_FIELDS,
} from './constants';
import { CircularEmbeddingError } from './errors/circular-embedding.error';
import { MappingConfigurationError } from './errors/mapping-configuration.error';
import {
  DocumentClass,
  FieldMapping,
  FieldNameTables,
  MappingFragment,
} from './interfaces/mapping.interface';
import { PropertyCatalog } from './property-catalog';
import { AnnotationReader } from './readers/annotation-reader';
import { snake } from './utils/caser';
import { pruneEmpty } from './utils/prune';

/**
 * Turns the field annotations of a class into a mapping fragment and records
 * the object <-> schema field name tables in the metadata cache.
 */
@Injectable()
export class FieldMetadataExtractor {
  private readonly logger = new Logger(FieldMetadataExtractor.name);

  constructor(
    @Inject(ANNOTATION_READER) private readonly reader: AnnotationReader,
    @Inject(METADATA_CACHE) private readonly cache: MetadataCache,
    private readonly properties: PropertyCatalog,
  ) {}

  extract(target: DocumentClass): MappingFragment {
    return this.extractClass(target, []);
  }

  /**
   * Field name tables written by the last extraction of the class, read back
   * from the cache.
   */
  getFieldNameTables(target: DocumentClass): FieldNameTables {
    return {
      objectFields: fetchClassTables(this.cache, OBJ_CACHED_FIELDS)[target.name] ?? {},
      arrayFields: fetchClassTables(this.cache, ARRAY_CACHED_FIELDS)[target.name] ?? {},
      embeddedFields: fetchClassTables(this.cache, EMBEDDED_CACHED_FIELDS)[target.name] ?? {},
    };
  }

  /**
   * Mapping kind of an embeddable class: `object` or `nested`.
   */
  getObjectMappingType(target: DocumentClass): string {
    const isObject = this.reader.getClassAnnotation(target, ObjectTypeAnnotation) !== undefined;
    const isNested = this.reader.getClassAnnotation(target, NestedTypeAnnotation) !== undefined;

    if (isObject && isNested) {
      throw new MappingConfigurationError(
        `${target.name} must use only one of @ObjectType or @NestedType, both are declared.`,
      );
    }
    if (isObject) {
      return ObjectTypeAnnotation.TYPE;
    }
    if (isNested) {
      return NestedTypeAnnotation.TYPE;
    }

    throw new MappingConfigurationError(
      `${target.name} must be used @ObjectType or @NestedType as embeddable object.`,
    );
  }

  private extractClass(target: DocumentClass, path: DocumentClass[]): MappingFragment {
    if (path.includes(target)) {
      throw new CircularEmbeddingError([...path, target].map(type => type.name));
    }
    const embeddingPath = [...path, target];

    const mapping: MappingFragment = {};
    const tables: FieldNameTables = { objectFields: {}, arrayFields: {}, embeddedFields: {} };

    for (const [name, property] of this.properties.resolve(target)) {
      const annotations = this.reader.getPropertyAnnotations(property).filter(isMappingAnnotation);

      for (const annotation of annotations) {
        const fieldMapping = this.buildFieldMapping(annotation, embeddingPath);
        const schemaName = annotation.name ?? snake(name);

        if (annotation.kind === 'embedded') {
          tables.embeddedFields[name] = annotation.getEmbeddedClass().name;
        }

        mapping[schemaName] = pruneEmpty(fieldMapping);
        tables.objectFields[name] = schemaName;
        tables.arrayFields[schemaName] = name;
      }
    }

    this.saveTables(target, tables);
    this.logger.debug(`Extracted ${Object.keys(mapping).length} field(s) from ${target.name}`);

    return mapping;
  }

  private buildFieldMapping(annotation: MappingAnnotation, path: DocumentClass[]): FieldMapping {
    const fieldMapping = annotation.toSettings();

    switch (annotation.kind) {
      case 'property':
        fieldMapping.type = annotation.type;
        fieldMapping.analyzer = annotation.analyzer;
        fieldMapping.search_analyzer = annotation.searchAnalyzer;
        fieldMapping.search_quote_analyzer = annotation.searchQuoteAnalyzer;
        break;
      case 'embedded': {
        const embeddedClass = annotation.getEmbeddedClass();
        fieldMapping.type = this.getObjectMappingType(embeddedClass);
        fieldMapping.properties = this.extractClass(embeddedClass, path);
        break;
      }
    }

    return fieldMapping;
  }

  private saveTables(target: DocumentClass, tables: FieldNameTables): void {
    // Embedded fields are optional compared to the array and object tables.
    if (Object.keys(tables.embeddedFields).length > 0) {
      saveClassTable(this.cache, EMBEDDED_CACHED_FIELDS, target.name, tables.embeddedFields);
    }
    saveClassTable(this.cache, ARRAY_CACHED_FIELDS, target.name, tables.arrayFields);
    saveClassTable(this.cache, OBJ_CACHED_FIELDS, target.name, tables.objectFields);
  }
}
