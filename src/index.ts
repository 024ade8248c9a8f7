/**
 * @fileoverview synthwire - Declarative object graph synthesis
 * @description
 * Classes declare the attributes they need; decorators synthesize the
 * properties that provide them.
 *
 * ## Architecture Layers
 *
 * | Layer | Contents |
 * |-------|----------|
 * | Domain | type model, `@Declare()`, hierarchy walker, classifier, compatibility |
 * | Application | attribute resolver, settings, logger |
 * | Infrastructure | `@Forward()`, `@Composition()`, deferred bindings, caching |
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { Composition, Declare, Forward } from 'synthwire';
 *
 * class Config {
 *   host = 'localhost';
 *   port = 5432;
 * }
 *
 * @Forward('_config')
 * class Service {
 *   @Declare() _config!: Config;
 *   @Declare() _host!: string;
 *   @Declare() _port!: number;
 * }
 *
 * @Composition()
 * class App {
 *   @Declare() config!: Config;
 *   @Declare() service!: Service;
 * }
 *
 * new App().service._port; // 5432
 * ```
 *
 * @packageDocumentation
 * @module synthwire
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export {
  NONE,
  classType,
  forwardRef,
  noneType,
  complexType,
  isClass,
  isDeclaredType,
  describeType,
} from './domain/types';

export type {
  AnyClass,
  NoneMarker,
  ClassType,
  ForwardType,
  NoneType,
  ComplexType,
  DeclaredType,
  MergedHierarchyView,
} from './domain/types';

export {
  Declare,
  Abstract,
  TypeRegistry,
  typeRegistry,
  registerType,
  ResolvedAnnotationProvider,
  RawAnnotationProvider,
} from './domain/declarations';

export type { TypeSource, TypeThunk, AnnotationProvider } from './domain/declarations';

export { HierarchyWalker, hierarchyWalker, collect, linearize } from './domain/hierarchy';

export {
  ImplementationStatus,
  ImplementationClassifier,
  implementationClassifier,
  needsImplementation,
  classify,
} from './domain/classification';

export { isCompatible, runtimeTypeOf } from './domain/compatibility';

export { CachingStrategy, isCachingStrategy } from './domain/policies';

export {
  SynthesisException,
  ConfigurationError,
  DeferredResolutionError,
  ForwardingError,
  FactoryConstructionError,
  DeclarationError,
} from './domain/exceptions';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export { AttributeResolver, attributeResolver, resolve } from './application/resolution';

export type { ResolutionOutcome, ForwardingRequest } from './application/resolution';

export {
  configureSynthesis,
  getSynthesisSettings,
  resetSynthesisSettings,
  LOG_LEVEL_ENV,
} from './application/config';

export type { SynthesisSettings } from './application/config';

export { consoleLogger, silentLogger, createConsoleLogger, parseLogLevel } from './application/logging';

export type { ILogger, LogLevel } from './application/logging';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export {
  ForwardingSynthesizer,
  forwardingSynthesizer,
  applyForwarding,
  Forward,
  FactorySynthesizer,
  factorySynthesizer,
  applyComposition,
  Composition,
  DeferredBinding,
} from './infrastructure/synthesis';

export type {
  ForwardingOptions,
  CompositionOptions,
  DeferredBindingStatus,
} from './infrastructure/synthesis';
