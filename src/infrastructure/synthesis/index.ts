/**
 * @module synthwire/infrastructure/synthesis
 * @description Forwarding and factory synthesizers
 */

export { ForwardingSynthesizer, forwardingSynthesizer, applyForwarding, Forward, handlesAttribute } from './ForwardingSynthesizer';
export type { ForwardingOptions } from './ForwardingSynthesizer';

export { FactorySynthesizer, factorySynthesizer, applyComposition, Composition, candidateNames } from './FactorySynthesizer';
export type { CompositionOptions } from './FactorySynthesizer';

export { DeferredBinding } from './DeferredBinding';
export type { DeferredBindingStatus } from './DeferredBinding';

export { cachedAccessor } from './caching';
export type { InstanceFactory } from './caching';
