/**
 * @fileoverview Implementation Classifier
 *
 * @packageDocumentation
 * @module synthwire/domain/classification
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Decides whether a declared attribute is already implemented somewhere in
 * the class hierarchy. This is the contract both synthesizers cooperate
 * through: a property installed by one pass is a concrete binding, so every
 * later pass sees the attribute as `Implemented` and leaves it alone.
 *
 * | Status | Bindings found in the prototype chain | Synthesizable |
 * |--------|---------------------------------------|---------------|
 * | `Implemented` | at least one concrete descriptor | no |
 * | `AbstractDeclared` | only `@Abstract()` placeholders | yes |
 * | `BareDeclared` | none | yes |
 *
 * Descriptors are only inspected, never read: no getter, method or
 * constructor runs during classification.
 */

import { isAbstractClass, isAbstractDescriptor } from '../declarations/Abstract';
import { HierarchyWalker, hierarchyWalker, linearize } from '../hierarchy/HierarchyWalker';
import { AnyClass } from '../types/DeclaredType';

export enum ImplementationStatus {
  Implemented = 'implemented',
  AbstractDeclared = 'abstract-declared',
  BareDeclared = 'bare-declared',
}

function bindingStatus(target: AnyClass, name: string): ImplementationStatus {
  let sawPlaceholder = false;
  for (const prototype of linearize(target)) {
    const descriptor = Object.getOwnPropertyDescriptor(prototype, name);
    if (descriptor === undefined) {
      continue;
    }
    if (!isAbstractDescriptor(descriptor)) {
      return ImplementationStatus.Implemented;
    }
    sawPlaceholder = true;
  }
  return sawPlaceholder ? ImplementationStatus.AbstractDeclared : ImplementationStatus.BareDeclared;
}

export class ImplementationClassifier {
  constructor(private readonly walker: HierarchyWalker) {}

  /**
   * @returns `undefined` for names the hierarchy does not declare
   */
  classify(target: AnyClass, name: string): ImplementationStatus | undefined {
    if (!this.walker.collect(target).has(name)) {
      return undefined;
    }
    return bindingStatus(target, name);
  }

  needsImplementation(target: AnyClass, name: string): boolean {
    const status = this.classify(target, name);
    return status === ImplementationStatus.AbstractDeclared || status === ImplementationStatus.BareDeclared;
  }

  /**
   * True when some `@Abstract()` placeholder in the chain has no concrete
   * binding anywhere, declared or not.
   */
  hasUnimplementedAbstractMembers(target: AnyClass): boolean {
    const placeholders = new Set<string>();
    for (const prototype of linearize(target)) {
      for (const name of Object.getOwnPropertyNames(prototype)) {
        const descriptor = Object.getOwnPropertyDescriptor(prototype, name);
        if (descriptor !== undefined && isAbstractDescriptor(descriptor)) {
          placeholders.add(name);
        }
      }
    }
    for (const name of placeholders) {
      if (bindingStatus(target, name) !== ImplementationStatus.Implemented) {
        return true;
      }
    }
    return false;
  }

  /**
   * Abstract classes are marked explicitly or left with unimplemented
   * placeholders.
   */
  isAbstract(target: AnyClass): boolean {
    return isAbstractClass(target) || this.hasUnimplementedAbstractMembers(target);
  }
}

export const implementationClassifier = new ImplementationClassifier(hierarchyWalker);

export function needsImplementation(target: AnyClass, name: string): boolean {
  return implementationClassifier.needsImplementation(target, name);
}

export function classify(target: AnyClass, name: string): ImplementationStatus | undefined {
  return implementationClassifier.classify(target, name);
}
