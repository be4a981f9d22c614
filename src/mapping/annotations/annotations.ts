import { DocumentClass } from '../interfaces/mapping.interface';

export interface IndexOptions {
  alias?: string;
  default?: boolean;
  /** @deprecated types are removed from the search engine */
  typeName?: string;
  numberOfShards?: number;
  numberOfReplicas?: number;
  settings?: Record<string, unknown>;
}

export interface PropertyOptions {
  type: string;
  name?: string;
  analyzer?: string;
  searchAnalyzer?: string;
  searchQuoteAnalyzer?: string;
  /** Multi-fields, emitted as-is under `fields` */
  fields?: Record<string, Record<string, unknown>>;
  settings?: Record<string, unknown>;
}

export interface EmbeddedOptions {
  name?: string;
  settings?: Record<string, unknown>;
}

export class IndexAnnotation {
  readonly kind = 'index' as const;
  readonly alias?: string;
  readonly default: boolean;
  readonly typeName?: string;
  readonly numberOfShards?: number;
  readonly numberOfReplicas?: number;
  readonly settings: Record<string, unknown>;

  constructor(options: IndexOptions = {}) {
    this.alias = options.alias;
    this.default = options.default ?? false;
    this.typeName = options.typeName;
    this.numberOfShards = options.numberOfShards;
    this.numberOfReplicas = options.numberOfReplicas;
    this.settings = options.settings ?? {};
  }

  toSettings(): Record<string, unknown> {
    return {
      number_of_shards: this.numberOfShards,
      number_of_replicas: this.numberOfReplicas,
      ...this.settings,
    };
  }
}

export class ObjectTypeAnnotation {
  static readonly TYPE = 'object';
  readonly kind = 'object' as const;
}

export class NestedTypeAnnotation {
  static readonly TYPE = 'nested';
  readonly kind = 'nested' as const;
}

export type ClassAnnotation = IndexAnnotation | ObjectTypeAnnotation | NestedTypeAnnotation;

/**
 * Shared base of the annotations that contribute a field to the mapping.
 */
export abstract class FieldAnnotation {
  readonly name?: string;
  protected readonly settings: Record<string, unknown>;

  protected constructor(name: string | undefined, settings: Record<string, unknown> | undefined) {
    this.name = name;
    this.settings = settings ?? {};
  }

  toSettings(): Record<string, unknown> {
    return { ...this.settings };
  }
}

export class PropertyAnnotation extends FieldAnnotation {
  readonly kind = 'property' as const;
  readonly type: string;
  readonly analyzer?: string;
  readonly searchAnalyzer?: string;
  readonly searchQuoteAnalyzer?: string;
  readonly fields?: Record<string, Record<string, unknown>>;

  constructor(options: PropertyOptions) {
    super(options.name, options.settings);
    this.type = options.type;
    this.analyzer = options.analyzer;
    this.searchAnalyzer = options.searchAnalyzer;
    this.searchQuoteAnalyzer = options.searchQuoteAnalyzer;
    this.fields = options.fields;
  }

  toSettings(): Record<string, unknown> {
    return { ...super.toSettings(), fields: this.fields };
  }
}

export class EmbeddedAnnotation extends FieldAnnotation {
  readonly kind = 'embedded' as const;
  private readonly typeFn: () => DocumentClass;

  constructor(typeFn: () => DocumentClass, options: EmbeddedOptions = {}) {
    super(options.name, options.settings);
    this.typeFn = typeFn;
  }

  getEmbeddedClass(): DocumentClass {
    return this.typeFn();
  }
}

export class IdAnnotation {
  readonly kind = 'id' as const;
}

export type MappingAnnotation = PropertyAnnotation | EmbeddedAnnotation;

export type PropertyAnnotationType = MappingAnnotation | IdAnnotation;

export function isClassAnnotation(value: unknown): value is ClassAnnotation {
  return (
    value instanceof IndexAnnotation ||
    value instanceof ObjectTypeAnnotation ||
    value instanceof NestedTypeAnnotation
  );
}

export function isPropertyAnnotation(value: unknown): value is PropertyAnnotationType {
  return (
    value instanceof PropertyAnnotation ||
    value instanceof EmbeddedAnnotation ||
    value instanceof IdAnnotation
  );
}

export function isMappingAnnotation(
  annotation: PropertyAnnotationType,
): annotation is MappingAnnotation {
  return annotation.kind === 'property' || annotation.kind === 'embedded';
}
