/**
 * @fileoverview Hierarchy Walker
 *
 * @packageDocumentation
 * @module synthwire/domain/hierarchy
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Merges the declared attribute types of a class and all of its ancestors.
 *
 * ## Linearization
 *
 * JavaScript classes have single inheritance, so the ancestor linearization
 * is the prototype chain, most-derived first, stopping before
 * `Object.prototype`:
 *
 * ```
 * class Base {}            linearize(Leaf) → [Leaf.prototype,
 * class Middle extends Base {}                 Middle.prototype,
 * class Leaf extends Middle {}                 Base.prototype]
 * ```
 *
 * ## Overlay Rule
 *
 * Prototypes are overlaid least-derived first. A re-declaration in a subclass
 * replaces the type but keeps the position the name first appeared at, so the
 * view's order is stable for an unchanged class:
 *
 * ```typescript
 * class Base   { @Declare() a!: A;  @Declare() b!: B; }
 * class Leaf extends Base { @Declare() c!: C;  @Declare() a!: SpecialA; }
 *
 * collect(Leaf);   // Map { a → SpecialA, b → B, c → C }
 * ```
 *
 * ## Provider Fallback
 *
 * Each prototype is read through the ranked annotation providers. When the
 * resolved provider cannot bind a prototype (a thunk throws, a forward name is
 * unknown), the raw provider's view of that prototype is used instead. The
 * fallback is silent. A view containing a fallback is not memoized, so a later
 * call may bind it once the missing class exists.
 */

import { AnnotationProvider, RawAnnotationProvider, ResolvedAnnotationProvider } from '../declarations/AnnotationProvider';
import { typeRegistry } from '../declarations/TypeRegistry';
import { AnyClass, DeclaredType, MergedHierarchyView } from '../types/DeclaredType';

/**
 * Prototype chain of `target`, most-derived first, excluding `Object.prototype`.
 */
export function linearize(target: AnyClass): object[] {
  const chain: object[] = [];
  let current: unknown = target.prototype;
  while (typeof current === 'object' && current !== null && current !== Object.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

/**
 * First property descriptor for `name` along the linearization, without
 * reading the property.
 */
export function findBinding(target: AnyClass, name: string): PropertyDescriptor | undefined {
  for (const prototype of linearize(target)) {
    const descriptor = Object.getOwnPropertyDescriptor(prototype, name);
    if (descriptor !== undefined) {
      return descriptor;
    }
  }
  return undefined;
}

interface OwnDeclarations {
  readonly types: ReadonlyMap<string, DeclaredType>;
  readonly resolved: boolean;
}

export class HierarchyWalker {
  private readonly cache = new WeakMap<AnyClass, MergedHierarchyView>();

  constructor(private readonly providers: readonly AnnotationProvider[]) {}

  collect(target: AnyClass): MergedHierarchyView {
    const cached = this.cache.get(target);
    if (cached !== undefined) {
      return cached;
    }

    const merged = new Map<string, DeclaredType>();
    let complete = true;
    for (const prototype of linearize(target).reverse()) {
      const own = this.readOwn(prototype);
      complete = complete && own.resolved;
      for (const [name, type] of own.types) {
        merged.set(name, type);
      }
    }

    if (complete) {
      this.cache.set(target, merged);
    }
    return merged;
  }

  private readOwn(prototype: object): OwnDeclarations {
    for (const [rank, provider] of this.providers.entries()) {
      const types = provider.read(prototype);
      if (types !== undefined) {
        return { types, resolved: rank === 0 };
      }
    }
    return { types: new Map(), resolved: false };
  }
}

export const hierarchyWalker = new HierarchyWalker([
  new ResolvedAnnotationProvider(typeRegistry),
  new RawAnnotationProvider(),
]);

/**
 * Merged hierarchy view of `target` using the process-wide walker.
 */
export function collect(target: AnyClass): MergedHierarchyView {
  return hierarchyWalker.collect(target);
}
