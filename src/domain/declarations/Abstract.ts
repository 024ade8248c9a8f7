import { AnyClass } from '../types/DeclaredType';

const abstractMembers = new WeakSet<object>();
const abstractClasses = new WeakSet<object>();

function placeholder(owner: string, name: string): PropertyDescriptor {
  const get = function (this: object): never {
    throw new TypeError(`Abstract member ${owner}.${name} is not implemented`);
  };
  const set = function (this: object, value: unknown): void {
    Object.defineProperty(this, name, { value, writable: true, configurable: true, enumerable: true });
  };
  abstractMembers.add(get);
  abstractMembers.add(set);
  return { get, set, configurable: true, enumerable: false };
}

/**
 * Marks an abstract placeholder.
 *
 * @remarks
 * TypeScript's `abstract` keyword leaves nothing behind at runtime, so
 * placeholders are explicit. On a member, the member counts as
 * abstract-declared: a synthesizer may still implement the attribute. On a
 * class, the class is never constructed by a factory property.
 *
 * A field has no runtime binding of its own; `@Abstract()` installs a
 * placeholder accessor for it on the prototype. Reading it throws until a
 * subclass or a synthesizer implements the attribute, and assigning to it
 * stores a plain value on the instance.
 *
 * @example
 * ```typescript
 * @Abstract()
 * abstract class Repository {
 *   @Abstract() @Declare() connection!: Connection;
 *
 *   @Abstract()
 *   tableName(): string {
 *     throw new Error('not implemented');
 *   }
 * }
 * ```
 */
export function Abstract(): ClassDecorator & MethodDecorator & PropertyDecorator {
  return function (target: object, propertyKey?: string | symbol, descriptor?: PropertyDescriptor): void {
    if (propertyKey === undefined) {
      abstractClasses.add(target);
      return;
    }
    if (descriptor === undefined) {
      const owner = typeof target === 'function' ? target.name : target.constructor.name;
      Object.defineProperty(target, propertyKey, placeholder(owner, String(propertyKey)));
      return;
    }
    for (const member of [descriptor.value, descriptor.get, descriptor.set]) {
      if (typeof member === 'function') {
        abstractMembers.add(member);
      }
    }
  };
}

/**
 * True when any function of the descriptor was marked with `@Abstract()`.
 */
export function isAbstractDescriptor(descriptor: PropertyDescriptor): boolean {
  return [descriptor.value, descriptor.get, descriptor.set].some(
    (member) => typeof member === 'function' && abstractMembers.has(member),
  );
}

/**
 * True when the class itself (not an ancestor) carries `@Abstract()`.
 */
export function isAbstractClass(target: AnyClass): boolean {
  return abstractClasses.has(target);
}
