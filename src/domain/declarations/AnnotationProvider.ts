/**
 * @fileoverview Annotation Providers
 *
 * @packageDocumentation
 * @module synthwire/domain/declarations
 *
 * Two ranked, read-only views over the declaration store:
 *
 * 1. **Resolved**: binds every declaration of a prototype to a precise type.
 *    Thunks are evaluated, forward names are looked up in the type registry.
 *    If a single declaration cannot be bound, the provider reports the whole
 *    prototype as unavailable.
 * 2. **Raw**: never fails. Names stay forward references, thunks that were
 *    not evaluated are reported as complex types.
 *
 * The hierarchy walker asks them in rank order, per prototype.
 */

import {
  DeclaredType,
  NONE,
  classType,
  complexType,
  forwardRef,
  isClass,
  isDeclaredType,
  noneType,
} from '../types/DeclaredType';
import { RawDeclaration, TypeThunk, readOwnDeclarations } from './Declare';
import { TypeRegistry } from './TypeRegistry';

export interface AnnotationProvider {
  readonly name: string;

  /**
   * Declared types owned by `prototype`.
   *
   * @returns `undefined` when this provider cannot describe the prototype
   */
  read(prototype: object): ReadonlyMap<string, DeclaredType> | undefined;
}

type Evaluation = { readonly ok: true; readonly value: unknown } | { readonly ok: false };

function evaluate(thunk: TypeThunk): Evaluation {
  try {
    return { ok: true, value: thunk() };
  } catch {
    // A thunk that touches a class before its definition throws a ReferenceError.
    return { ok: false };
  }
}

function fromDesignType(declaration: RawDeclaration): DeclaredType {
  if (!declaration.hasDesignType) {
    return complexType('unknown');
  }
  const { designType } = declaration;
  if (designType === undefined) {
    return noneType();
  }
  if (designType === Object) {
    return complexType('Object');
  }
  if (isClass(designType)) {
    return classType(designType);
  }
  return complexType(String(designType));
}

export class ResolvedAnnotationProvider implements AnnotationProvider {
  readonly name = 'resolved';

  constructor(private readonly registry: TypeRegistry) {}

  read(prototype: object): ReadonlyMap<string, DeclaredType> | undefined {
    const resolved = new Map<string, DeclaredType>();
    const declarations = readOwnDeclarations(prototype);
    if (declarations === undefined) {
      return resolved;
    }
    for (const declaration of declarations.values()) {
      const type = this.resolve(declaration);
      if (type === undefined) {
        return undefined;
      }
      resolved.set(declaration.name, type);
    }
    return resolved;
  }

  private resolve(declaration: RawDeclaration): DeclaredType | undefined {
    const { source } = declaration;
    if (source === undefined) {
      return fromDesignType(declaration);
    }
    if (isClass(source)) {
      return classType(source);
    }
    if (typeof source === 'function') {
      const evaluation = evaluate(source);
      return evaluation.ok ? this.bind(evaluation.value) : undefined;
    }
    return this.bind(source);
  }

  private bind(value: unknown): DeclaredType | undefined {
    if (isClass(value)) {
      return classType(value);
    }
    if (typeof value === 'string') {
      const target = this.registry.lookup(value);
      return target === undefined ? undefined : classType(target);
    }
    if (value === NONE) {
      return noneType();
    }
    if (isDeclaredType(value)) {
      return value;
    }
    return undefined;
  }
}

export class RawAnnotationProvider implements AnnotationProvider {
  readonly name = 'raw';

  read(prototype: object): ReadonlyMap<string, DeclaredType> {
    const raw = new Map<string, DeclaredType>();
    const declarations = readOwnDeclarations(prototype);
    if (declarations === undefined) {
      return raw;
    }
    for (const declaration of declarations.values()) {
      raw.set(declaration.name, this.describe(declaration));
    }
    return raw;
  }

  private describe(declaration: RawDeclaration): DeclaredType {
    const { source } = declaration;
    if (source === undefined) {
      return fromDesignType(declaration);
    }
    if (isClass(source)) {
      return classType(source);
    }
    if (typeof source === 'function') {
      return complexType('unresolved type thunk');
    }
    if (typeof source === 'string') {
      return forwardRef(source);
    }
    if (source === NONE) {
      return noneType();
    }
    return source;
  }
}
