/**
 * @module synthwire/domain/hierarchy
 * @description Hierarchy walker and prototype linearization
 */

export { HierarchyWalker, hierarchyWalker, collect, linearize, findBinding } from './HierarchyWalker';
