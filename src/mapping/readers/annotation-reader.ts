import { Injectable } from '@nestjs/common';
import { ClassAnnotation, PropertyAnnotationType } from '../annotations/annotations';
import { readOwnClassAnnotations, readOwnPropertyAnnotations } from '../annotations/decorators';
import { DocumentClass, PropertyHandle } from '../interfaces/mapping.interface';

export type AnnotationType<T> = abstract new (...args: never[]) => T;

/**
 * Source of the declarations attached to classes and their properties.
 * Only declarations made on the class itself are returned, never inherited ones.
 */
export interface AnnotationReader {
  getClassAnnotation<T extends ClassAnnotation>(
    target: DocumentClass,
    type: AnnotationType<T>,
  ): T | undefined;

  /** Names of the properties the class itself declares, in declaration order. */
  getDeclaredProperties(target: DocumentClass): string[];

  getPropertyAnnotations(property: PropertyHandle): PropertyAnnotationType[];
}

@Injectable()
export class ReflectAnnotationReader implements AnnotationReader {
  getClassAnnotation<T extends ClassAnnotation>(
    target: DocumentClass,
    type: AnnotationType<T>,
  ): T | undefined {
    return readOwnClassAnnotations(target).find((annotation): annotation is T => annotation instanceof type);
  }

  getDeclaredProperties(target: DocumentClass): string[] {
    return Array.from(readOwnPropertyAnnotations(target).keys());
  }

  getPropertyAnnotations(property: PropertyHandle): PropertyAnnotationType[] {
    return readOwnPropertyAnnotations(property.declaringClass).get(property.name) ?? [];
  }
}
