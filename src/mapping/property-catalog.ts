import { Inject, Injectable } from '@nestjs/common';
import { ANNOTATION_READER } from './constants';
import { DocumentClass, PropertyHandle } from './interfaces/mapping.interface';
import { AnnotationReader } from './readers/annotation-reader';

/**
 * Resolves the properties a class declares across its inheritance chain.
 * Properties declared on a subclass shadow parent properties with the same
 * name. Results are memoized per class so every later step sees the same order.
 */
@Injectable()
export class PropertyCatalog {
  private readonly resolved = new Map<DocumentClass, Map<string, PropertyHandle>>();

  constructor(@Inject(ANNOTATION_READER) private readonly reader: AnnotationReader) {}

  resolve(target: DocumentClass): Map<string, PropertyHandle> {
    const cached = this.resolved.get(target);
    if (cached) {
      return cached;
    }

    const properties = new Map<string, PropertyHandle>();
    for (const name of this.reader.getDeclaredProperties(target)) {
      properties.set(name, { name, declaringClass: target });
    }

    const parent = getParentClass(target);
    if (parent) {
      for (const [name, handle] of this.resolve(parent)) {
        if (!properties.has(name)) {
          properties.set(name, handle);
        }
      }
    }

    this.resolved.set(target, properties);
    return properties;
  }

  reset(): void {
    this.resolved.clear();
  }
}

function isDocumentClass(value: unknown): value is DocumentClass {
  return typeof value === 'function' && value !== Function.prototype;
}

export function getParentClass(target: DocumentClass): DocumentClass | undefined {
  const parent: unknown = Object.getPrototypeOf(target);
  return isDocumentClass(parent) ? parent : undefined;
}
