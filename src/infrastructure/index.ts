/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * The property synthesizers: they install accessors on the prototypes of
 * decorated classes, using the domain model to decide what to install and
 * the application layer to resolve each attribute.
 *
 * - **Forwarding**: `@Forward()` read-through properties and deferred bindings
 * - **Composition**: `@Composition()` factory properties and caching
 *
 * @packageDocumentation
 * @module synthwire/infrastructure
 */

// ============================================================================
// Synthesis
// ============================================================================

export * from './synthesis';
