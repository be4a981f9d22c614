export const METADATA_CACHE = 'METADATA_CACHE';
export const ANNOTATION_READER = 'ANNOTATION_READER';
export const ANALYSIS_CONFIG = 'ANALYSIS_CONFIG';

// Cache keys
export const OBJ_CACHED_FIELDS = 'search_mapping.obj_fields';
export const EMBEDDED_CACHED_FIELDS = 'search_mapping.embedded_fields';
export const ARRAY_CACHED_FIELDS = 'search_mapping.array_fields';
export const INDEXES_CACHED = 'search_mapping.indexes';

// Reflect metadata keys
export const CLASS_ANNOTATIONS = 'search_mapping:class_annotations';
export const PROPERTY_ANNOTATIONS = 'search_mapping:property_annotations';

/**
 * @deprecated mapping types are gone from current search engines, kept for the
 * mapping document shape only.
 */
export const DEFAULT_TYPE_NAME = '_doc';

export const ANALYZER_KEYS = ['analyzer', 'search_analyzer', 'search_quote_analyzer'] as const;
export const AUXILIARY_ANALYSIS_KEYS = ['tokenizer', 'filter', 'normalizer', 'char_filter'] as const;
