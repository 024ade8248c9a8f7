/**
 * @fileoverview Forwarding Synthesizer
 *
 * @packageDocumentation
 * @module synthwire/infrastructure/synthesis
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The reluctant policy. Shortens `this.config.timeout` to `this._timeout` by
 * installing read-through properties for declared attributes that a base
 * reference can satisfy, and silently skipping everything else.
 *
 * ```typescript
 * @Forward('_config')
 * class Controller {
 *   @Declare() _config!: Config;
 *   @Declare() _timeout!: number;      // → this._config.timeout
 *   @Declare() _dryRun!: boolean;      // → this._config.dryRun
 *
 *   constructor(config: Config) {
 *     this._config = config;
 *   }
 * }
 * ```
 *
 * ## Attribute Selection
 *
 * | Prefix | Handled names | Example |
 * |--------|---------------|---------|
 * | `'_'` (default) | names starting with `_` | `_timeout` reads `base.timeout` |
 * | `'cfg_'` | names starting with `cfg_` | `cfg_timeout` reads `base.timeout` |
 * | `''` | names not starting with `_` | `timeout` reads `base.timeout` |
 *
 * The base reference itself is never forwarded.
 *
 * ## Stacking
 *
 * Passes can be stacked with different base references. Class decorators run
 * bottom-up, so the pass written last runs first:
 *
 * ```typescript
 * @Forward('_module')     // second: _settings, _namespace from _module
 * @Forward('_settings')   // first: _timeout from _settings
 * class Controller { ... }
 * ```
 *
 * Each pass classifies attributes afresh. A property installed by an earlier
 * pass is a concrete binding, so later passes never overwrite it, and running
 * the same pass twice changes nothing.
 *
 * A pass whose base declares nothing defers every prefixed attribute it sees,
 * including the base reference of a later pass. Deferred properties accept
 * assignment, so `controller._module = module` still works; the deferred
 * attributes keep reading from the earlier pass's base.
 */

import { HierarchyWalker, hierarchyWalker } from '../../domain/hierarchy/HierarchyWalker';
import { AnyClass } from '../../domain/types/DeclaredType';
import { getSynthesisSettings } from '../../application/config/SynthesisSettings';
import { ILogger } from '../../application/logging/logger';
import { AttributeResolver, attributeResolver } from '../../application/resolution/AttributeResolver';
import { forwardingAccessor, install, requireClass } from './accessors';
import { DeferredBinding } from './DeferredBinding';

export interface ForwardingOptions {
  /** Stripped from attribute names to find the target on the base; default `'_'` */
  prefix?: string;

  /** Install deferred bindings when existence cannot be proven; default `true` */
  allowDeferred?: boolean;

  logger?: ILogger;
}

/**
 * Whether a pass using `prefix` is responsible for `name`
 */
export function handlesAttribute(name: string, prefix: string): boolean {
  return prefix === '' ? !name.startsWith('_') : name.startsWith(prefix);
}

export class ForwardingSynthesizer {
  constructor(
    private readonly walker: HierarchyWalker,
    private readonly resolver: AttributeResolver,
  ) {}

  apply<T extends AnyClass>(target: T, baseRef: string, options: ForwardingOptions = {}): T {
    const settings = getSynthesisSettings();
    const prefix = options.prefix ?? settings.defaultPrefix;
    const allowDeferred = options.allowDeferred ?? settings.allowDeferred;
    const logger = options.logger ?? settings.logger;
    const owner = target.name;

    for (const [name, requiredType] of this.walker.collect(target)) {
      if (name === baseRef || !handlesAttribute(name, prefix)) {
        continue;
      }
      const targetName = name.slice(prefix.length);
      if (targetName === '') {
        continue;
      }

      const outcome = this.resolver.resolve(target, name, requiredType, { baseRef, targetName, allowDeferred });
      switch (outcome.kind) {
        case 'forwarded':
          install(target, name, forwardingAccessor(owner, name, baseRef, targetName));
          logger.debug(`${owner}.${name} forwarded from ${baseRef}.${targetName}`);
          break;
        case 'deferred':
          install(
            target,
            name,
            new DeferredBinding(owner, name, outcome.baseRef, outcome.targetName, outcome.expectedType).descriptor(),
          );
          logger.debug(`${owner}.${name} deferred to first access of ${baseRef}.${targetName}`);
          break;
        case 'unresolved':
          logger.debug(`${owner}.${name} not forwarded from ${baseRef}: ${outcome.reason}`);
          break;
        case 'implemented':
        case 'constructed':
          break;
      }
    }

    return target;
  }
}

export const forwardingSynthesizer = new ForwardingSynthesizer(hierarchyWalker, attributeResolver);

/**
 * Install forwarding properties on `target` for attributes reachable through
 * `baseRef`. Mutates and returns `target`; never throws for attributes it
 * cannot resolve.
 */
export function applyForwarding<T extends AnyClass>(target: T, baseRef: string, options?: ForwardingOptions): T {
  return forwardingSynthesizer.apply(target, baseRef, options);
}

/**
 * Class decorator form of {@link applyForwarding}
 */
export function Forward(baseRef: string, options?: ForwardingOptions): ClassDecorator {
  return (target) => {
    applyForwarding(requireClass(target, '@Forward()'), baseRef, options);
  };
}
