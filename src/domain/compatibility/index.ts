/**
 * @module synthwire/domain/compatibility
 * @description Type compatibility oracle
 */

export { isCompatible, runtimeTypeOf } from './TypeCompatibility';
