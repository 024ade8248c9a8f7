import { DeclarationError } from '../../domain/exceptions/exceptions';
import { CachingStrategy } from '../../domain/policies/CachingStrategy';
import { defineValue } from './accessors';

export type InstanceFactory = (instance: object) => unknown;

/**
 * Accessor running `factory` according to `strategy`.
 *
 * `NotThreadSafe` replaces itself on the instance with the built value, the
 * way a lazily initialized field would. Assigning before the first read
 * stores the assigned value instead.
 */
export function cachedAccessor(strategy: CachingStrategy, name: string, factory: InstanceFactory): PropertyDescriptor {
  switch (strategy) {
    case CachingStrategy.Disabled:
      return {
        configurable: true,
        enumerable: false,
        get(this: object): unknown {
          return factory(this);
        },
      };
    case CachingStrategy.NotThreadSafe:
      return {
        configurable: true,
        enumerable: false,
        get(this: object): unknown {
          const value = factory(this);
          defineValue(this, name, value);
          return value;
        },
        set(this: object, value: unknown): void {
          defineValue(this, name, value);
        },
      };
    default:
      throw new DeclarationError(`Unsupported caching strategy: ${String(strategy)}`, { strategy });
  }
}
