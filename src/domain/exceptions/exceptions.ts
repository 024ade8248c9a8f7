/**
 * synthwire - Exceptions
 *
 * Errors raised while synthesizing classes (decoration time) and while
 * reading synthesized properties (access time).
 */

/**
 * Base class for every error the engine raises
 */
export class SynthesisException extends Error {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'SynthesisException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A composition root declares an attribute that cannot be satisfied.
 *
 * Raised at decoration time, before any property of the class is installed.
 */
export class ConfigurationError extends SynthesisException {
  constructor(
    public readonly owner: string,
    public readonly attributeName: string,
    public readonly requiredType: string,
    reason: string,
  ) {
    super(`Unsatisfied dependency ${owner}.${attributeName}: ${requiredType} (${reason})`, {
      owner,
      attributeName,
      requiredType,
      reason,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * A deferred binding probed its base object and did not find a usable target.
 *
 * The same instance is thrown on every later access.
 */
export class DeferredResolutionError extends SynthesisException {
  constructor(
    public readonly owner: string,
    public readonly attributeName: string,
    public readonly baseRef: string,
    public readonly targetName: string,
    reason: string,
  ) {
    super(`Cannot forward ${owner}.${attributeName} from ${baseRef}.${targetName}: ${reason}`, {
      owner,
      attributeName,
      baseRef,
      targetName,
      reason,
    });
    this.name = 'DeferredResolutionError';
  }
}

/**
 * The base reference of a forwarding property holds no object.
 */
export class ForwardingError extends SynthesisException {
  constructor(
    public readonly owner: string,
    public readonly attributeName: string,
    public readonly baseRef: string,
  ) {
    super(`Cannot read ${owner}.${attributeName}: base reference '${baseRef}' is not set`, {
      owner,
      attributeName,
      baseRef,
    });
    this.name = 'ForwardingError';
  }
}

/**
 * The constructor of a dependency threw while a factory property built it.
 */
export class FactoryConstructionError extends SynthesisException {
  constructor(
    public readonly owner: string,
    public readonly attributeName: string,
    public readonly dependencyType: string,
    public readonly innerError: unknown,
  ) {
    super(
      `Failed to create ${owner}.${attributeName}: ${dependencyType}: ${
        innerError instanceof Error ? innerError.message : String(innerError)
      }`,
      { owner, attributeName, dependencyType },
    );
    this.name = 'FactoryConstructionError';
  }
}

/**
 * A declaration decorator was applied where it cannot take effect.
 */
export class DeclarationError extends SynthesisException {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = 'DeclarationError';
  }
}
