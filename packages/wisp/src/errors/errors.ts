import type { ViolationPolicy } from '../types/types.js';

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Handle resolved from a sequence other than the one it is bound to.
 */
export class AffinityViolationError extends Error {
  constructor(
    public subject: string,
    public expected: string,
    public actual: string
  ) {
    const dev = [
      'Sequence affinity violation',
      '',
      `A handle to '${subject}' is bound to sequence '${expected}' but was resolved on '${actual}'.`,
      '',
      'To fix this:',
      `  1. Resolve the handle only from '${expected}'`,
      `  2. Or call detachAffinity() / detachFromSequence() when ownership moves to '${actual}'`,
      `  3. Or create the factory with { affinity: 'permissive' } if cross-sequence use is intended`,
    ];
    super(format(`Handle to '${subject}' bound to '${expected}', resolved on '${actual}'.`, dev));
    this.name = 'AffinityViolationError';
  }
}

export class EmptyHandleError extends Error {
  constructor(public subject: string) {
    const dev = [
      'Empty handle dereferenced',
      '',
      `get() was called on a handle to '${subject}' that resolves to nothing.`,
      'The subject was destroyed, its handles were invalidated, or the handle was reset.',
      '',
      'Use resolve() and check the result when the subject may be gone.',
    ];
    super(format(`Handle to '${subject}' is empty.`, dev));
    this.name = 'EmptyHandleError';
  }
}

export class UnrelatedTypesError extends Error {
  constructor(
    public from: string,
    public to: string
  ) {
    const dev = [
      'Conversion between unrelated types',
      '',
      `'${from}' and '${to}' are not declared as ancestor and descendant.`,
      '',
      'To fix this:',
      `  1. Declare the relation: typeTag(${to}, { extends: ${from}Tag }) or the reverse`,
      `  2. Or use castWithinHierarchy() with their shared base for sibling types`,
    ];
    super(format(`Cannot convert '${from}' to unrelated '${to}'.`, dev));
    this.name = 'UnrelatedTypesError';
  }
}

/**
 * Reason a sibling cast was rejected.
 *
 * - `not-descendants`: the handle's type or the target does not descend from the given base
 * - `direct-relation`: the types are ancestor and descendant; use `as()` instead
 */
export type HierarchyCastReason = 'not-descendants' | 'direct-relation';

export class InvalidHierarchyCastError extends Error {
  constructor(
    public from: string,
    public target: string,
    public base: string,
    public reason: HierarchyCastReason
  ) {
    const explanation =
      reason === 'direct-relation'
        ? `'${from}' and '${target}' are ancestor and descendant. Use as() for direct conversions.`
        : `'${from}' and '${target}' must both descend from '${base}'.`;
    const dev = ['Invalid hierarchy cast', '', explanation];
    super(format(`Cannot cast '${from}' to '${target}' within '${base}'.`, dev));
    this.name = 'InvalidHierarchyCastError';
  }
}

export class NotOwnedError extends Error {
  constructor(public subject: string) {
    const dev = [
      'Subject has no owner',
      '',
      `'${subject}' was never adopted by Shared.adopt(), so it cannot share or issue handles to itself.`,
      '',
      'To fix this:',
      `  1. Construct '${subject}' through its static create() function`,
      `  2. Or wrap the new instance: Shared.adopt(new ${subject}(...))`,
    ];
    super(format(`'${subject}' has no owner.`, dev));
    this.name = 'NotOwnedError';
  }
}

export class AlreadyOwnedError extends Error {
  constructor(public subject: string) {
    const dev = [
      'Subject already owned',
      '',
      `'${subject}' was already adopted. Use share() on the existing owner or sharedFromThis().`,
    ];
    super(format(`'${subject}' is already owned.`, dev));
    this.name = 'AlreadyOwnedError';
  }
}

export class OwnerReleasedError extends Error {
  constructor(public subject: string) {
    const dev = [
      'Owner released',
      '',
      `The owning reference to '${subject}' was released, or '${subject}' has been destroyed.`,
      'Keep another owner with share() before releasing, or hold a WeakHandle instead.',
    ];
    super(format(`Owner of '${subject}' was released.`, dev));
    this.name = 'OwnerReleasedError';
  }
}

export class FactoryDisposedError extends Error {
  constructor(public subject: string) {
    const dev = [
      `Handle factory for '${subject}' has been disposed.`,
      '',
      'Dispose is irreversible. The subject was destroyed or its factory was disposed explicitly.',
    ];
    super(format(`Handle factory for '${subject}' has been disposed.`, dev));
    this.name = 'FactoryDisposedError';
  }
}

export class InvalidHandleConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid handle configuration', '', `Invalid handle configuration: ${reason}`];
    super(format(`Invalid handle configuration: ${reason}`, dev));
    this.name = 'InvalidHandleConfigError';
  }
}

export class TypeTagCollisionError extends Error {
  constructor(
    public label: string,
    public existingParent: string,
    public attemptedParent: string
  ) {
    const dev = [
      'Type tag collision',
      '',
      `'${label}' is already declared with parent '${existingParent}', cannot redeclare it with parent '${attemptedParent}'.`,
    ];
    super(format(`'${label}' already declared with parent '${existingParent}'.`, dev));
    this.name = 'TypeTagCollisionError';
  }
}

/**
 * Error thrown when several destruction hooks fail while a subject is torn down.
 *
 * Every hook still runs; each failure is kept in `errors`.
 */
export class AggregateDestroyError extends Error {
  constructor(
    public subject: string,
    public errors: Error[]
  ) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple destruction errors occurred',
      '',
      `${errors.length} error(s) occurred while destroying '${subject}':`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];
    super(format(`${errors.length} destruction error(s) occurred for '${subject}'.`, dev));
    this.name = 'AggregateDestroyError';
  }
}

/**
 * Apply a violation policy to a broken contract that has no value to fall
 * back on. `warn` is treated as `throw` here.
 */
export function violate(error: Error, policy: ViolationPolicy): never {
  if (policy === 'abort') {
    console.error(`[wisp] ${error.message}`);
    process.abort();
  }
  throw error;
}

/**
 * Apply a violation policy where the caller can degrade to an empty result.
 *
 * @returns false under `warn`; the other policies do not return
 */
export function reportViolation(error: Error, policy: ViolationPolicy): false {
  if (policy === 'warn') {
    console.warn(`[wisp] ${error.message}`);
    return false;
  }
  return violate(error, policy);
}
