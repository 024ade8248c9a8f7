import { AnyClass, DeclaredType } from '../../domain/types/DeclaredType';

/**
 * Decision for one declared attribute. Produced once by the resolver and
 * consumed once by a synthesizer.
 */
export type ResolutionOutcome =
  | ImplementedOutcome
  | ForwardedOutcome
  | ConstructedOutcome
  | DeferredOutcome
  | UnresolvedOutcome;

/** Something concrete already binds the attribute */
export interface ImplementedOutcome {
  readonly kind: 'implemented';
}

/** `instance[baseRef][targetName]` is statically known to exist */
export interface ForwardedOutcome {
  readonly kind: 'forwarded';
  readonly baseRef: string;
  readonly targetName: string;
}

/** A fresh `target` instance satisfies the attribute */
export interface ConstructedOutcome {
  readonly kind: 'constructed';
  readonly target: AnyClass;
}

/** Existence of `instance[baseRef][targetName]` is checked on first access */
export interface DeferredOutcome {
  readonly kind: 'deferred';
  readonly baseRef: string;
  readonly targetName: string;
  readonly expectedType: DeclaredType;
}

export interface UnresolvedOutcome {
  readonly kind: 'unresolved';
  readonly reason: string;
}

/**
 * Forwarding-mode input of the resolver
 */
export interface ForwardingRequest {
  readonly baseRef: string;
  readonly targetName: string;
  readonly allowDeferred: boolean;
}
