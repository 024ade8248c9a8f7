/**
 * @fileoverview Deferred Binding
 *
 * @packageDocumentation
 * @module synthwire/infrastructure/synthesis
 *
 * A forwarding property whose target could not be proven to exist when the
 * class was decorated. The proof is taken on the first access instead:
 *
 * ```
 *            first access                later accesses
 * pending ── target exists and fits ──▶ resolved ──▶ plain forwarding
 *    │
 *    └────── target missing / misfit ─▶ failed ───▶ same error, every time
 * ```
 *
 * The state lives on the binding, which is shared by every instance of the
 * class: whether the base exposes the target is a fact about the shape of the
 * base class, not about one instance. `failed` is terminal; the probe is never
 * retried.
 *
 * A base reference that is still unset when the property is read is not a
 * probe result: it raises `ForwardingError` and leaves the binding pending.
 *
 * Assigning to the property stores a plain value on the instance and bypasses
 * the binding for that instance.
 *
 * **⚠️ Concurrency:** the transition out of `pending` is not synchronized.
 */

import { isCompatible, runtimeTypeOf } from '../../domain/compatibility/TypeCompatibility';
import { DeferredResolutionError } from '../../domain/exceptions/exceptions';
import { DeclaredType, describeType } from '../../domain/types/DeclaredType';
import { defineValue, readBase } from './accessors';

export type DeferredBindingStatus = 'pending' | 'resolved' | 'failed';

type BindingState =
  | { readonly status: 'pending' }
  | { readonly status: 'resolved' }
  | { readonly status: 'failed'; readonly error: DeferredResolutionError };

export class DeferredBinding {
  private state: BindingState = { status: 'pending' };

  constructor(
    readonly owner: string,
    readonly attributeName: string,
    readonly baseRef: string,
    readonly targetName: string,
    readonly expectedType: DeclaredType,
  ) {}

  get status(): DeferredBindingStatus {
    return this.state.status;
  }

  read(instance: object): unknown {
    if (this.state.status === 'failed') {
      throw this.state.error;
    }

    const base = readBase(instance, this.owner, this.attributeName, this.baseRef);
    if (this.state.status === 'resolved') {
      return Reflect.get(base, this.targetName);
    }

    if (!(this.targetName in base)) {
      this.fail(`'${this.targetName}' does not exist on the base object`);
    }
    const value: unknown = Reflect.get(base, this.targetName);
    const found = runtimeTypeOf(value);
    if (!isCompatible(found, this.expectedType)) {
      this.fail(`${describeType(found)} does not satisfy ${describeType(this.expectedType)}`);
    }

    this.state = { status: 'resolved' };
    return value;
  }

  /**
   * Accessor to install on the decorated class' prototype
   */
  descriptor(): PropertyDescriptor {
    const read = (instance: object): unknown => this.read(instance);
    const name = this.attributeName;
    return {
      configurable: true,
      enumerable: false,
      get(this: object): unknown {
        return read(this);
      },
      set(this: object, value: unknown): void {
        defineValue(this, name, value);
      },
    };
  }

  private fail(reason: string): never {
    const error = new DeferredResolutionError(this.owner, this.attributeName, this.baseRef, this.targetName, reason);
    this.state = { status: 'failed', error };
    throw error;
  }
}
