/**
 * @fileoverview Attribute Resolver
 *
 * @packageDocumentation
 * @module synthwire/application/resolution
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Combines the hierarchy walker, the implementation classifier and the type
 * compatibility oracle into one {@link ResolutionOutcome} per attribute.
 *
 * ## Forwarding Mode
 *
 * ```
 * needsImplementation? ── no ──▶ implemented
 *        │ yes
 *        ▼
 * declared type of the base reference
 *   ├─ class ─┬─ base declares target ── compatible? ─▶ forwarded | unresolved
 *   │         ├─ base prototype binds target ─────────▶ forwarded
 *   │         ├─ base declares nothing at all ────────▶ deferred*
 *   │         └─ otherwise ───────────────────────────▶ unresolved
 *   ├─ none ─────────────────────────────────────────▶ unresolved
 *   └─ missing / forward / complex ──────────────────▶ deferred*
 *
 *   * unresolved when deferred resolution is not allowed
 * ```
 *
 * A base class with no declarations builds its shape in its constructor, so
 * its attributes can only be proven on a live instance. A base class that
 * declares attributes is taken at its word: what it does not declare or bind
 * is not there.
 *
 * ## Construction Mode
 *
 * ```
 * needsImplementation? ── no ──▶ implemented
 *        │ yes
 *        ▼
 * required type is a constructible class? ── yes ──▶ constructed
 *                                          └─ no ──▶ unresolved
 * ```
 */

import {
  ImplementationClassifier,
  implementationClassifier,
} from '../../domain/classification/ImplementationClassifier';
import { isCompatible } from '../../domain/compatibility/TypeCompatibility';
import { HierarchyWalker, findBinding, hierarchyWalker } from '../../domain/hierarchy/HierarchyWalker';
import { AnyClass, DeclaredType, describeType } from '../../domain/types/DeclaredType';
import { ForwardingRequest, ResolutionOutcome } from './ResolutionOutcome';

/**
 * Built-in constructors that are values, not dependencies
 */
const BUILT_IN_TYPES = new Set<unknown>([
  String,
  Number,
  Boolean,
  BigInt,
  Symbol,
  Object,
  Array,
  Function,
  Map,
  Set,
  WeakMap,
  WeakSet,
  Promise,
  Date,
  RegExp,
]);

const IMPLEMENTED: ResolutionOutcome = Object.freeze({ kind: 'implemented' });

function unresolved(reason: string): ResolutionOutcome {
  return { kind: 'unresolved', reason };
}

export class AttributeResolver {
  constructor(
    private readonly walker: HierarchyWalker,
    private readonly classifier: ImplementationClassifier,
  ) {}

  /**
   * @param forwarding - Forwarding-mode request; construction mode when omitted
   */
  resolve(
    target: AnyClass,
    name: string,
    requiredType: DeclaredType,
    forwarding?: ForwardingRequest,
  ): ResolutionOutcome {
    if (!this.classifier.needsImplementation(target, name)) {
      return IMPLEMENTED;
    }
    return forwarding === undefined
      ? this.resolveConstruction(requiredType)
      : this.resolveForwarding(target, requiredType, forwarding);
  }

  private resolveConstruction(requiredType: DeclaredType): ResolutionOutcome {
    if (requiredType.kind !== 'class') {
      return unresolved(`${describeType(requiredType)} is not a class`);
    }
    if (BUILT_IN_TYPES.has(requiredType.target)) {
      return unresolved(`${describeType(requiredType)} is a built-in type`);
    }
    if (this.classifier.isAbstract(requiredType.target)) {
      return unresolved(`${describeType(requiredType)} is abstract`);
    }
    return { kind: 'constructed', target: requiredType.target };
  }

  private resolveForwarding(
    target: AnyClass,
    requiredType: DeclaredType,
    request: ForwardingRequest,
  ): ResolutionOutcome {
    const { baseRef, targetName } = request;
    if (targetName.startsWith('_')) {
      return unresolved(`'${targetName}' is not a public member of '${baseRef}'`);
    }

    const deferOr = (reason: string): ResolutionOutcome =>
      request.allowDeferred
        ? { kind: 'deferred', baseRef, targetName, expectedType: requiredType }
        : unresolved(reason);

    const baseType = this.walker.collect(target).get(baseRef);
    if (baseType === undefined) {
      return deferOr(`base reference '${baseRef}' is not declared`);
    }

    switch (baseType.kind) {
      case 'none':
        return unresolved(`base reference '${baseRef}' is declared as none`);
      case 'forward':
      case 'complex':
        return deferOr(`base reference '${baseRef}' has no static type (${describeType(baseType)})`);
      case 'class':
        return this.resolveAgainstClass(baseType.target, requiredType, request, deferOr);
    }
  }

  private resolveAgainstClass(
    base: AnyClass,
    requiredType: DeclaredType,
    request: ForwardingRequest,
    deferOr: (reason: string) => ResolutionOutcome,
  ): ResolutionOutcome {
    const { baseRef, targetName } = request;
    const baseView = this.walker.collect(base);

    const provided = baseView.get(targetName);
    if (provided !== undefined) {
      return isCompatible(provided, requiredType)
        ? { kind: 'forwarded', baseRef, targetName }
        : unresolved(
            `${base.name}.${targetName}: ${describeType(provided)} does not satisfy ${describeType(requiredType)}`,
          );
    }

    if (findBinding(base, targetName) !== undefined) {
      return { kind: 'forwarded', baseRef, targetName };
    }

    if (baseView.size === 0) {
      return deferOr(`${base.name} declares no attributes`);
    }

    return unresolved(`${base.name} does not expose '${targetName}'`);
  }
}

export const attributeResolver = new AttributeResolver(hierarchyWalker, implementationClassifier);

export function resolve(
  target: AnyClass,
  name: string,
  requiredType: DeclaredType,
  forwarding?: ForwardingRequest,
): ResolutionOutcome {
  return attributeResolver.resolve(target, name, requiredType, forwarding);
}
