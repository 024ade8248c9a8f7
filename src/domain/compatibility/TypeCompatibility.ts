/**
 * @fileoverview Type Compatibility Oracle
 *
 * @packageDocumentation
 * @module synthwire/domain/compatibility
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Decides whether a value of the `provided` type may satisfy an attribute of
 * the `required` type. Rules are tried in order; the first that applies wins:
 *
 * | # | Provided / required | Result |
 * |---|---------------------|--------|
 * | 1 | identical reference | `true` |
 * | 2 | both forward references | names equal |
 * | 3 | both none | `true` |
 * | 4 | both classes | provided equals or extends required |
 * | 5 | anything else | `true` |
 *
 * Rule 5 is permissive: a wrong wiring that slips through fails at type-check
 * time or on first use, while a rejected valid wiring cannot be worked around.
 */

import { AnyClass, DeclaredType, classType, complexType, isClass, noneType } from '../types/DeclaredType';

function descendsFrom(candidate: AnyClass, ancestor: AnyClass): boolean {
  // prototype chain only; `instanceof` would run a static Symbol.hasInstance
  return candidate === ancestor || Object.prototype.isPrototypeOf.call(ancestor.prototype, candidate.prototype);
}

export function isCompatible(provided: DeclaredType, required: DeclaredType): boolean {
  if (provided === required) {
    return true;
  }
  if (provided.kind === 'class' && required.kind === 'class' && provided.target === required.target) {
    return true;
  }
  if (provided.kind === 'forward' && required.kind === 'forward') {
    return provided.name === required.name;
  }
  if (provided.kind === 'none' && required.kind === 'none') {
    return true;
  }
  if (provided.kind === 'class' && required.kind === 'class') {
    return descendsFrom(provided.target, required.target);
  }
  return true;
}

/**
 * Declared type of a value observed at runtime.
 *
 * @example
 * ```typescript
 * runtimeTypeOf(5432);          // class Number
 * runtimeTypeOf(new Config());  // class Config
 * runtimeTypeOf({ port: 1 });   // complex 'object'
 * runtimeTypeOf(null);          // none
 * ```
 */
export function runtimeTypeOf(value: unknown): DeclaredType {
  if (value === undefined || value === null) {
    return noneType();
  }
  if (typeof value === 'string') {
    return classType(String);
  }
  if (typeof value === 'number') {
    return classType(Number);
  }
  if (typeof value === 'boolean') {
    return classType(Boolean);
  }
  if (typeof value === 'object') {
    const prototype: object | null = Object.getPrototypeOf(value);
    if (prototype === null || prototype === Object.prototype) {
      // plain objects are structural; any class type may describe them
      return complexType('object');
    }
    const constructor: unknown = Reflect.get(prototype, 'constructor');
    return isClass(constructor) ? classType(constructor) : complexType('object');
  }
  // bigint, symbol and functions have no constructible class
  return complexType(typeof value);
}
