/**
 * @module synthwire/domain/policies
 */

export { CachingStrategy, isCachingStrategy } from './CachingStrategy';
