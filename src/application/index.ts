/**
 * @module synthwire/application
 * @description Application layer exports
 */

// ============================================================================
// Attribute Resolution
// ============================================================================

export * from './resolution';

// ============================================================================
// Settings & Logging
// ============================================================================

export * from './config';
export * from './logging';
