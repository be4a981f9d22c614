/**
 * Any class constructor, abstract ones included. Document, embedded and base
 * classes are all referenced through this type.
 */
export type DocumentClass = abstract new (...args: never[]) => object;

/**
 * Mapping of a single schema field. Conventional keys are `type`, `properties`
 * (embedded fields only), `analyzer`, `search_analyzer`,
 * `search_quote_analyzer`, plus whatever free-form settings the annotation
 * declares.
 */
export type FieldMapping = Record<string, unknown>;

export type MappingFragment = Record<string, FieldMapping>;

export type AnalysisSection = 'analyzer' | 'tokenizer' | 'filter' | 'normalizer' | 'char_filter';

export type AnalysisComponent = Record<string, unknown>;

export type AnalysisConfig = Partial<Record<AnalysisSection, Record<string, AnalysisComponent>>>;

export interface IndexDefinition {
  settings?: Record<string, unknown>;
  mappings?: Record<string, { properties: MappingFragment }>;
}

export interface FieldNameTables {
  /** object field name -> schema field name */
  objectFields: Record<string, string>;
  /** schema field name -> object field name */
  arrayFields: Record<string, string>;
  /** object field name -> embedded class name */
  embeddedFields: Record<string, string>;
}

export interface PropertyHandle {
  name: string;
  declaringClass: DocumentClass;
}
