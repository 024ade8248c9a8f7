/**
 * @module synthwire/domain
 * @description Domain layer exports
 */

// ============================================================================
// Type Model
// ============================================================================

export * from './types';

// ============================================================================
// Declarations
// ============================================================================

export * from './declarations';

// ============================================================================
// Hierarchy, Classification & Compatibility
// ============================================================================

export * from './hierarchy';
export * from './classification';
export * from './compatibility';

// ============================================================================
// Policies & Errors
// ============================================================================

export * from './policies';
export * from './exceptions';
