import { DeclarationError, ForwardingError } from '../../domain/exceptions/exceptions';
import { AnyClass, isClass } from '../../domain/types/DeclaredType';

export function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Read the base reference of a forwarding property from `instance`.
 *
 * @throws ForwardingError when the base reference holds no object
 */
export function readBase(instance: object, owner: string, attributeName: string, baseRef: string): object {
  const base: unknown = Reflect.get(instance, baseRef);
  if (!isObjectLike(base)) {
    throw new ForwardingError(owner, attributeName, baseRef);
  }
  return base;
}

/**
 * Replace an accessor on `instance` with a plain writable value.
 */
export function defineValue(instance: object, name: string, value: unknown): void {
  Object.defineProperty(instance, name, {
    value,
    writable: true,
    configurable: true,
    enumerable: true,
  });
}

/**
 * Install a synthesized property on the prototype of `target`.
 */
export function install(target: AnyClass, name: string, descriptor: PropertyDescriptor): void {
  Object.defineProperty(target.prototype, name, descriptor);
}

/**
 * Read-through accessor: `instance[name]` → `instance[baseRef][targetName]`.
 */
export function forwardingAccessor(
  owner: string,
  name: string,
  baseRef: string,
  targetName: string,
): PropertyDescriptor {
  return {
    configurable: true,
    enumerable: false,
    get(this: object): unknown {
      return Reflect.get(readBase(this, owner, name, baseRef), targetName);
    },
  };
}

export function requireClass(target: unknown, decorator: string): AnyClass {
  if (!isClass(target)) {
    throw new DeclarationError(`${decorator} can only decorate classes`);
  }
  return target;
}
