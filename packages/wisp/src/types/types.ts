/**
 * Generic constructor signature used by the subject mixin.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = abstract new (...args: any[]) => T;

/**
 * Anything with a `prototype` of type T that `instanceof` can test against.
 *
 * Unlike {@link Constructor}, this also accepts classes whose constructor is
 * private or protected, which is how subjects restrict construction to their
 * designated `create()` function.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export type ClassLike<T extends object = object> = Function & { readonly prototype: T };

/**
 * Supported sequence-affinity modes.
 *
 *   - **Checked**: handles remember the sequence that first resolved them and
 *     report a violation when resolved from any other one
 *   - **Permissive**: every check passes; used once a program is known to
 *     respect affinity and the check cost is unwanted
 *
 * @example
 * ```typescript
 * const factory = new HandleFactory(this, SessionTag, { affinity: Affinity.Permissive });
 * ```
 */
export const Affinity = {
  /** Bind on first check, reject other sequences until detached */
  Checked: 'checked',
  /** Never reject */
  Permissive: 'permissive',
} as const;

export type AffinityMode = (typeof Affinity)[keyof typeof Affinity];

/**
 * What happens when a contract is broken (wrong sequence, empty strict
 * dereference, unrelated cast).
 *
 *   - **Abort**: print the diagnostic and terminate the process
 *   - **Throw**: raise the typed error at the violation site
 *   - **Warn**: print a warning; resolution yields `undefined`. Violations
 *     that cannot produce a value still throw.
 */
export const Violation = {
  Abort: 'abort',
  Throw: 'throw',
  Warn: 'warn',
} as const;

export type ViolationPolicy = (typeof Violation)[keyof typeof Violation];

/**
 * Configuration accepted by {@link HandleFactory} and subject classes.
 */
export interface HandleConfig {
  /**
   * Sequence-affinity mode for every handle the factory issues.
   *
   * @default 'checked', or 'permissive' when NODE_ENV is 'production'
   */
  readonly affinity: AffinityMode;

  /**
   * Response to contract violations.
   *
   * @default 'abort'
   */
  readonly onViolation: ViolationPolicy;
}
