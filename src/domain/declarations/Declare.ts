/**
 * @fileoverview Attribute Declarations
 *
 * @packageDocumentation
 * @module synthwire/domain/declarations
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * `@Declare()` is the annotation store of the engine. It records, per class
 * prototype, which attributes the class declares and where their type comes
 * from. Nothing is evaluated here: thunks and names are kept as written and
 * bound later by the annotation providers.
 *
 * ## Type Sources
 *
 * ```typescript
 * class Service {
 *   @Declare() config!: Config;              // design:type metadata
 *   @Declare(() => Repository) repo!: Repo;  // thunk, evaluated lazily
 *   @Declare('Clock') clock!: Clock;         // forward reference by name
 *   @Declare(NONE) nothing!: undefined;      // explicit none marker
 *   @Declare(complexType('Map<string, number>')) counts!: Map<string, number>;
 * }
 * ```
 *
 * **⚠️ Field semantics:** declared fields must not create own instance
 * properties, or they shadow the accessors the synthesizers install on the
 * prototype. Compile with `useDefineForClassFields: false` (the default for
 * `experimentalDecorators` below ES2022) and use definite assignment (`!`)
 * without initializers.
 */

import 'reflect-metadata';

import { DeclarationError } from '../exceptions/exceptions';
import { AnyClass, DeclaredType, NoneMarker, isClass } from '../types/DeclaredType';
import { typeRegistry } from './TypeRegistry';

/**
 * Lazily evaluated type reference. Must be an arrow function: regular
 * functions carry a prototype and are taken for classes.
 */
export type TypeThunk = () => unknown;

export type TypeSource = AnyClass | TypeThunk | string | NoneMarker | DeclaredType;

/**
 * One `@Declare()` as recorded on a prototype, before any evaluation.
 */
export interface RawDeclaration {
  readonly name: string;
  readonly source: TypeSource | undefined;
  /** Whether the compiler emitted `design:type` for the member */
  readonly hasDesignType: boolean;
  readonly designType: unknown;
}

const declarationStore = new WeakMap<object, Map<string, RawDeclaration>>();

/**
 * Property decorator declaring a synthesizable attribute.
 *
 * @param source - Where the declared type comes from; defaults to the
 * `design:type` metadata emitted under `emitDecoratorMetadata`
 */
export function Declare(source?: TypeSource): PropertyDecorator {
  return (target, propertyKey) => {
    if (typeof propertyKey !== 'string') {
      throw new DeclarationError('@Declare() requires a string-keyed member', {
        member: String(propertyKey),
      });
    }
    if (typeof target === 'function') {
      throw new DeclarationError(`@Declare() cannot be applied to static member '${propertyKey}'`, {
        owner: target.name,
        member: propertyKey,
      });
    }

    let declarations = declarationStore.get(target);
    if (declarations === undefined) {
      declarations = new Map();
      declarationStore.set(target, declarations);
    }

    const hasDesignType = Reflect.hasOwnMetadata('design:type', target, propertyKey);
    const designType: unknown = hasDesignType
      ? Reflect.getOwnMetadata('design:type', target, propertyKey)
      : undefined;

    declarations.set(propertyKey, { name: propertyKey, source, hasDesignType, designType });

    const owner = target.constructor;
    if (isClass(owner)) {
      typeRegistry.register(owner);
    }
  };
}

/**
 * Declarations recorded directly on `prototype`, in declaration order.
 */
export function readOwnDeclarations(prototype: object): ReadonlyMap<string, RawDeclaration> | undefined {
  return declarationStore.get(prototype);
}
