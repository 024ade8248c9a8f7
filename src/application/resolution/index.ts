/**
 * @module synthwire/application/resolution
 * @description Attribute resolution
 */

export { AttributeResolver, attributeResolver, resolve } from './AttributeResolver';

export type {
  ResolutionOutcome,
  ImplementedOutcome,
  ForwardedOutcome,
  ConstructedOutcome,
  DeferredOutcome,
  UnresolvedOutcome,
  ForwardingRequest,
} from './ResolutionOutcome';
