export * from './mapping/annotations/annotations';
export * from './mapping/annotations/decorators';
export * from './mapping/cache/metadata-cache.interface';
export * from './mapping/cache/in-memory-metadata-cache';
export * from './mapping/cache/file-metadata-cache';
export * from './mapping/constants';
export * from './mapping/errors/mapping-configuration.error';
export * from './mapping/errors/circular-embedding.error';
export * from './mapping/interfaces/mapping.interface';
export * from './mapping/readers/annotation-reader';
export * from './mapping/property-catalog';
export * from './mapping/field-metadata-extractor';
export * from './mapping/analysis-config-resolver';
export * from './mapping/schema-compiler.service';
export * from './mapping/document-registry.service';
export * from './mapping/field-name-lookup.service';
export * from './mapping/mapping.module';
