/**
 * Memoization policy of the factory properties of a composition root.
 *
 * @remarks
 * The strategy is fixed when the class is decorated and applies to every
 * instance of it.
 *
 * | Strategy | Access 1 | Access 2 |
 * |----------|----------|----------|
 * | `Disabled` | new instance | another new instance |
 * | `NotThreadSafe` | new instance, stored on the root instance | the stored instance |
 *
 * **⚠️ `NotThreadSafe`:** the first access is not synchronized. Two callers
 * racing through the first access of the same root instance (e.g. a
 * constructor that awaits between reading the property and storing it
 * elsewhere, or worker threads sharing the object) may each build a value;
 * the last one stored wins. Use `Disabled`, or synchronize externally, when
 * construction is not idempotent.
 */
export enum CachingStrategy {
  /** Build a fresh dependency on every access */
  Disabled = 'disabled',

  /** Build once per root instance and memoize, without synchronization */
  NotThreadSafe = 'not-thread-safe',
}

export function isCachingStrategy(value: unknown): value is CachingStrategy {
  return value === CachingStrategy.Disabled || value === CachingStrategy.NotThreadSafe;
}
