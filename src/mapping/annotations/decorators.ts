import 'reflect-metadata';
import { CLASS_ANNOTATIONS, PROPERTY_ANNOTATIONS } from '../constants';
import { DocumentClass } from '../interfaces/mapping.interface';
import { MappingConfigurationError } from '../errors/mapping-configuration.error';
import {
  ClassAnnotation,
  EmbeddedAnnotation,
  EmbeddedOptions,
  IdAnnotation,
  IndexAnnotation,
  IndexOptions,
  isClassAnnotation,
  isPropertyAnnotation,
  NestedTypeAnnotation,
  ObjectTypeAnnotation,
  PropertyAnnotation,
  PropertyAnnotationType,
  PropertyOptions,
} from './annotations';

function addClassAnnotation(target: object, annotation: ClassAnnotation): void {
  const existing: unknown = Reflect.getOwnMetadata(CLASS_ANNOTATIONS, target);
  const annotations = Array.isArray(existing) ? existing.filter(isClassAnnotation) : [];
  Reflect.defineMetadata(CLASS_ANNOTATIONS, [...annotations, annotation], target);
}

function addPropertyAnnotation(
  prototype: Object,
  propertyKey: string | symbol,
  annotation: PropertyAnnotationType,
): void {
  const target = prototype.constructor;
  if (typeof propertyKey !== 'string') {
    throw new MappingConfigurationError(
      `${target.name}: symbol properties cannot be mapped (${String(propertyKey)})`,
    );
  }

  const existing: unknown = Reflect.getOwnMetadata(PROPERTY_ANNOTATIONS, target);
  const annotations: Map<string, PropertyAnnotationType[]> =
    existing instanceof Map ? existing : new Map();
  const declared = annotations.get(propertyKey) ?? [];
  annotations.set(propertyKey, [...declared, annotation]);
  Reflect.defineMetadata(PROPERTY_ANNOTATIONS, annotations, target);
}

/**
 * Marks a class as a document with its own index.
 *
 * @example
 * @Index({ alias: 'products', settings: { refresh_interval: '1s' } })
 * export class Product { ... }
 */
export function Index(options: IndexOptions = {}): ClassDecorator {
  return target => addClassAnnotation(target, new IndexAnnotation(options));
}

/** Embeddable class mapped as a plain `object`. */
export function ObjectType(): ClassDecorator {
  return target => addClassAnnotation(target, new ObjectTypeAnnotation());
}

/** Embeddable class mapped as `nested`. */
export function NestedType(): ClassDecorator {
  return target => addClassAnnotation(target, new NestedTypeAnnotation());
}

export function Property(options: PropertyOptions): PropertyDecorator {
  return (prototype, propertyKey) =>
    addPropertyAnnotation(prototype, propertyKey, new PropertyAnnotation(options));
}

/**
 * Field holding one or more instances of an embeddable class. The class is
 * passed as a thunk so that classes declared later, or the declaring class
 * itself, can be referenced.
 */
export function Embedded(type: () => DocumentClass, options: EmbeddedOptions = {}): PropertyDecorator {
  return (prototype, propertyKey) =>
    addPropertyAnnotation(prototype, propertyKey, new EmbeddedAnnotation(type, options));
}

export function Id(): PropertyDecorator {
  return (prototype, propertyKey) => addPropertyAnnotation(prototype, propertyKey, new IdAnnotation());
}

/** Re-validates metadata read back from reflection. */
export function readOwnPropertyAnnotations(target: DocumentClass): Map<string, PropertyAnnotationType[]> {
  const existing: unknown = Reflect.getOwnMetadata(PROPERTY_ANNOTATIONS, target);
  const annotations = new Map<string, PropertyAnnotationType[]>();
  if (!(existing instanceof Map)) {
    return annotations;
  }

  for (const [name, declared] of existing) {
    if (typeof name === 'string' && Array.isArray(declared)) {
      annotations.set(name, declared.filter(isPropertyAnnotation));
    }
  }
  return annotations;
}

export function readOwnClassAnnotations(target: DocumentClass): ClassAnnotation[] {
  const existing: unknown = Reflect.getOwnMetadata(CLASS_ANNOTATIONS, target);
  return Array.isArray(existing) ? existing.filter(isClassAnnotation) : [];
}
