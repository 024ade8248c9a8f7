/**
 * @fileoverview Declared Type Model
 *
 * @packageDocumentation
 * @module synthwire/domain/types
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The runtime description of what a class declares for one of its attributes.
 * TypeScript erases types at compile time, so every declared attribute is
 * reduced to one of four shapes the engine can reason about:
 *
 * | Kind | Produced from | Example |
 * |------|---------------|---------|
 * | `class` | a constructor (incl. `String`, `Number`, ...) | `@Declare() config!: Config` |
 * | `forward` | a name that is not yet bound to a class | `@Declare('Config')` |
 * | `none` | the `NONE` marker, `void` / `undefined` design types | `@Declare(NONE)` |
 * | `complex` | interfaces, unions, generics, missing metadata | `@Declare() tags!: string[]` |
 */

/**
 * Any class, abstract or not.
 *
 * @remarks
 * Parameters are typed `never` so that classes with arbitrary constructor
 * signatures are assignable; the engine only ever constructs with no arguments.
 */
export type AnyClass = abstract new (...args: never[]) => unknown;

/**
 * Explicit "none" marker for attributes declared as holding nothing.
 */
export const NONE: unique symbol = Symbol('synthwire.none');

export type NoneMarker = typeof NONE;

/**
 * A concrete class reference.
 */
export interface ClassType {
  readonly kind: 'class';
  readonly target: AnyClass;
}

/**
 * A name-only reference to a class that could not be bound.
 */
export interface ForwardType {
  readonly kind: 'forward';
  readonly name: string;
}

export interface NoneType {
  readonly kind: 'none';
}

/**
 * Anything the runtime cannot describe precisely: interfaces, unions,
 * generics, or a declaration without metadata.
 */
export interface ComplexType {
  readonly kind: 'complex';
  readonly description: string;
}

export type DeclaredType = ClassType | ForwardType | NoneType | ComplexType;

/**
 * Ordered mapping from attribute name to declared type.
 */
export type MergedHierarchyView = ReadonlyMap<string, DeclaredType>;

const NONE_TYPE: NoneType = Object.freeze({ kind: 'none' });

export function classType(target: AnyClass): ClassType {
  return { kind: 'class', target };
}

export function forwardRef(name: string): ForwardType {
  return { kind: 'forward', name };
}

export function noneType(): NoneType {
  return NONE_TYPE;
}

export function complexType(description: string): ComplexType {
  return { kind: 'complex', description };
}

/**
 * Narrow an arbitrary value to a class (a function carrying a prototype).
 *
 * Arrow functions and bound functions have no `prototype` and are rejected.
 */
export function isClass(value: unknown): value is AnyClass {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null;
}

export function isDeclaredType(value: unknown): value is DeclaredType {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  switch (value.kind) {
    case 'class':
      return 'target' in value && isClass(value.target);
    case 'forward':
      return 'name' in value && typeof value.name === 'string';
    case 'none':
      return true;
    case 'complex':
      return 'description' in value && typeof value.description === 'string';
    default:
      return false;
  }
}

/**
 * Human-readable rendering used in log lines and error messages.
 */
export function describeType(type: DeclaredType): string {
  switch (type.kind) {
    case 'class':
      return type.target.name || '<anonymous class>';
    case 'forward':
      return `'${type.name}'`;
    case 'none':
      return 'none';
    case 'complex':
      return type.description;
  }
}
