import { AnyClass } from '../types/DeclaredType';

/**
 * Name → class table used to bind forward references.
 *
 * @remarks
 * A name registered for two different classes becomes ambiguous and is never
 * bound again: there is no qualifier mechanism to pick one of them.
 *
 * @example
 * ```typescript
 * class Config {}
 * registerType(Config);
 *
 * class Service {
 *   @Declare('Config') config!: Config;   // bound to Config when collected
 * }
 * ```
 */
export class TypeRegistry {
  private readonly byName = new Map<string, AnyClass>();
  private readonly ambiguous = new Set<string>();

  register(target: AnyClass, name: string = target.name): void {
    if (!name) {
      return;
    }
    const existing = this.byName.get(name);
    if (existing !== undefined && existing !== target) {
      this.ambiguous.add(name);
      return;
    }
    this.byName.set(name, target);
  }

  lookup(name: string): AnyClass | undefined {
    if (this.ambiguous.has(name)) {
      return undefined;
    }
    return this.byName.get(name);
  }

  isAmbiguous(name: string): boolean {
    return this.ambiguous.has(name);
  }
}

/**
 * Process-wide registry. Classes carrying `@Declare()` members register
 * themselves here under their class name.
 */
export const typeRegistry = new TypeRegistry();

export function registerType(target: AnyClass, name?: string): void {
  typeRegistry.register(target, name);
}
