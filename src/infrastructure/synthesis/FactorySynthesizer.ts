/**
 * @fileoverview Factory Synthesizer
 *
 * @packageDocumentation
 * @module synthwire/infrastructure/synthesis
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The greedy policy. Turns a class into a composition root: every declared
 * attribute that is not implemented gets a property building its dependency
 * with `new Dependency()`. An attribute that cannot be built aborts the
 * decoration with a {@link ConfigurationError}, before any property is
 * installed, so a class is either fully synthesized or left untouched.
 *
 * ```typescript
 * @Composition(CachingStrategy.NotThreadSafe)
 * class AppModule {
 *   @Declare() config!: Config;
 *   @Declare() repository!: UserRepository;
 *   @Declare() service!: UserService;
 * }
 *
 * const app = new AppModule();
 * app.service;   // built on first access, then memoized on `app`
 * ```
 *
 * ## Transitive Composition
 *
 * A freshly built dependency is wired back to the root: each attribute its
 * class still needs (declared, unimplemented, not set by its constructor) is
 * looked up on the root by the same name, then by the name without its
 * leading underscore:
 *
 * ```
 * UserService._config   ──▶ AppModule._config?  no
 *                       ──▶ AppModule.config?   yes → reads app.config
 * UserService.repository ──▶ AppModule.repository? yes → reads app.repository
 * ```
 *
 * Wired attributes are lazy: they read the root on access, so the root's
 * caching strategy decides whether dependencies are shared. Assigning to a
 * wired attribute replaces it with the assigned value.
 *
 * ## Cooperation with Forwarding
 *
 * Attributes already implemented (including properties installed by an
 * earlier `@Forward()` pass) are left alone. Apply `@Forward()` below
 * `@Composition()` so it runs first:
 *
 * ```typescript
 * @Composition()
 * @Forward('manager', { prefix: '' })
 * class ConnectionApp {
 *   @Declare() manager!: ConnectionManager;
 *   @Declare() connections!: number;   // forwarded, not constructed
 * }
 * ```
 */

import {
  ImplementationClassifier,
  implementationClassifier,
} from '../../domain/classification/ImplementationClassifier';
import { isCompatible } from '../../domain/compatibility/TypeCompatibility';
import { ConfigurationError, DeclarationError, FactoryConstructionError } from '../../domain/exceptions/exceptions';
import { HierarchyWalker, hierarchyWalker } from '../../domain/hierarchy/HierarchyWalker';
import { CachingStrategy, isCachingStrategy } from '../../domain/policies/CachingStrategy';
import { AnyClass, MergedHierarchyView, describeType } from '../../domain/types/DeclaredType';
import { getSynthesisSettings } from '../../application/config/SynthesisSettings';
import { ILogger } from '../../application/logging/logger';
import { AttributeResolver, attributeResolver } from '../../application/resolution/AttributeResolver';
import { defineValue, install, isObjectLike, requireClass } from './accessors';
import { cachedAccessor } from './caching';

export interface CompositionOptions {
  /** Default `CachingStrategy.Disabled` */
  cachingStrategy?: CachingStrategy;

  logger?: ILogger;
}

interface FactoryPlan {
  readonly name: string;
  readonly dependency: AnyClass;
}

/**
 * Root attribute names that may satisfy a dependency's `name`, in order
 */
export function candidateNames(name: string): string[] {
  return name.startsWith('_') && name.length > 1 ? [name, name.slice(1)] : [name];
}

export class FactorySynthesizer {
  constructor(
    private readonly walker: HierarchyWalker,
    private readonly classifier: ImplementationClassifier,
    private readonly resolver: AttributeResolver,
  ) {}

  apply<T extends AnyClass>(target: T, cachingStrategy?: CachingStrategy, options: CompositionOptions = {}): T {
    const settings = getSynthesisSettings();
    const strategy = cachingStrategy ?? options.cachingStrategy ?? settings.defaultCachingStrategy;
    const logger = options.logger ?? settings.logger;
    const owner = target.name;

    const requested: unknown = strategy;
    if (!isCachingStrategy(requested)) {
      throw new DeclarationError(`Unsupported caching strategy: ${String(requested)}`, { strategy: requested });
    }

    const view = this.walker.collect(target);
    const plan: FactoryPlan[] = [];
    for (const [name, requiredType] of view) {
      const outcome = this.resolver.resolve(target, name, requiredType);
      if (outcome.kind === 'unresolved') {
        logger.error(`${owner}.${name} cannot be satisfied: ${outcome.reason}`);
        throw new ConfigurationError(owner, name, describeType(requiredType), outcome.reason);
      }
      if (outcome.kind === 'constructed') {
        plan.push({ name, dependency: outcome.target });
      } else {
        logger.debug(`${owner}.${name} skipped (${outcome.kind})`);
      }
    }

    for (const { name, dependency } of plan) {
      const factory = (root: object): unknown => this.build(target, view, root, name, dependency);
      install(target, name, cachedAccessor(strategy, name, factory));
      logger.debug(`${owner}.${name} constructs ${dependency.name} (${strategy})`);
    }

    return target;
  }

  private build(
    rootClass: AnyClass,
    rootView: MergedHierarchyView,
    root: object,
    name: string,
    dependency: AnyClass,
  ): unknown {
    let instance: unknown;
    try {
      instance = Reflect.construct(dependency, []);
    } catch (error) {
      throw new FactoryConstructionError(rootClass.name, name, dependency.name, error);
    }
    if (isObjectLike(instance)) {
      this.wire(instance, dependency, root, rootView);
    }
    return instance;
  }

  private wire(instance: object, dependency: AnyClass, root: object, rootView: MergedHierarchyView): void {
    for (const [name, requiredType] of this.walker.collect(dependency)) {
      if (Object.prototype.hasOwnProperty.call(instance, name) || !this.classifier.needsImplementation(dependency, name)) {
        continue;
      }
      const source = candidateNames(name).find((candidate) => rootView.has(candidate));
      if (source === undefined) {
        continue;
      }
      const provided = rootView.get(source);
      if (provided === undefined || !isCompatible(provided, requiredType)) {
        continue;
      }
      Object.defineProperty(instance, name, {
        configurable: true,
        enumerable: true,
        get: (): unknown => Reflect.get(root, source),
        set: (value: unknown): void => defineValue(instance, name, value),
      });
    }
  }
}

export const factorySynthesizer = new FactorySynthesizer(hierarchyWalker, implementationClassifier, attributeResolver);

/**
 * Turn `target` into a composition root. Mutates and returns `target`.
 *
 * @throws ConfigurationError when a declared attribute can neither be built
 * nor is already implemented
 */
export function applyComposition<T extends AnyClass>(
  target: T,
  cachingStrategy?: CachingStrategy,
  options?: CompositionOptions,
): T {
  return factorySynthesizer.apply(target, cachingStrategy, options);
}

/**
 * Class decorator form of {@link applyComposition}
 *
 * @example
 * ```typescript
 * @Composition()                                   // settings default
 * @Composition(CachingStrategy.NotThreadSafe)
 * @Composition({ cachingStrategy: CachingStrategy.Disabled, logger })
 * ```
 */
export function Composition(strategyOrOptions?: CachingStrategy | CompositionOptions): ClassDecorator {
  const options: CompositionOptions =
    typeof strategyOrOptions === 'object' ? strategyOrOptions : { cachingStrategy: strategyOrOptions };
  return (target) => {
    applyComposition(requireClass(target, '@Composition()'), options.cachingStrategy, options);
  };
}
