/*
 * WeakHandle
 * ----------
 * Non-owning reference to a subject that reports "gone" instead of dangling.
 *
 * A handle carries:
 *  - a WeakRef to the affinity token of the generation it was issued under
 *  - a WeakRef to the subject's lifeline
 *  - a lease on the generation's validity flag
 *  - the subject's identity, for hash() and ordering
 *  - its view: a TypeTag for WeakHandle, the neutral view for ErasedHandle
 *
 * resolve() order: token (gone or retired → undefined), affinity check,
 * lifeline (destroyed → undefined), view check.
 *
 * Handles only read the token and lifeline; the factory is the only writer.
 */

import {
  EmptyHandleError,
  InvalidHierarchyCastError,
  UnrelatedTypesError,
  violate,
} from '../errors/errors.js';
import type { ViolationPolicy } from '../types/types.js';
import type { AffinityToken } from './affinity.js';
import { defaultConfig } from './config.js';
import { NULL_ADDRESS, type Address } from './identity.js';
import type { Lifeline } from './ownership.js';
import { NEUTRAL, describeView, reinterpret, widerView, type View } from './reinterpret.js';
import { areRelated, descendsFrom, isAncestorOf, type TypeTag } from './type-tag.js';
import type { FlagLease, ValidityFlag } from './validity-flag.js';

/**
 * Everything a handle shares with its siblings of the same generation.
 *
 * @internal Built by HandleFactory.
 */
export interface Binding {
  readonly token: WeakRef<AffinityToken>;
  readonly lifeline: WeakRef<Lifeline>;
  readonly flag: ValidityFlag;
  readonly address: Address;
  readonly policy: ViolationPolicy;
}

/**
 * Behaviour common to typed and erased handles.
 */
export abstract class Handle {
  private binding: Binding | undefined;
  private lease: FlagLease | undefined;

  protected constructor(binding: Binding | undefined) {
    this.binding = binding;
    this.lease = binding?.flag.lease(this);
  }

  /** The view `resolve()` checks the subject against */
  abstract get view(): View;

  /** Copy of this handle with the neutral view */
  abstract erase(): ErasedHandle;

  /**
   * The subject, or undefined when it is gone, the handle's generation was
   * invalidated, or the subject does not satisfy the handle's view.
   */
  abstract resolve(): object | undefined;

  /**
   * Identity of the subject this handle was issued for; 0 once reset or
   * for handles that were never bound. Stable after the subject is gone.
   */
  hash(): Address {
    return this.binding?.address ?? NULL_ADDRESS;
  }

  isEmpty(): boolean {
    return this.resolve() === undefined;
  }

  isPresent(): boolean {
    return this.resolve() !== undefined;
  }

  /**
   * Detach from the subject and return the validity lease. The handle
   * resolves to nothing afterwards.
   */
  reset(): void {
    this.lease?.release();
    this.lease = undefined;
    this.binding = undefined;
  }

  /**
   * Compare resolved subjects.
   *
   * - Same view: equal when both resolve to the same subject, or both to nothing
   * - Ancestor/descendant views: compared through the wider view
   * - Erased on either side: compared through the neutral view
   * - Unrelated views: never equal
   * - `null` / `undefined`: equal when this handle is empty
   */
  equals(other: Handle | null | undefined): boolean {
    if (other === null || other === undefined) return this.isEmpty();
    const view = widerView(this.view, other.view);
    if (view === null) return false;
    return reinterpret(this.locate(), NEUTRAL, view) === reinterpret(other.locate(), NEUTRAL, view);
  }

  /** @internal */
  protected get bound(): Binding | undefined {
    return this.binding;
  }

  /** Policy for contract violations on this handle */
  protected get policy(): ViolationPolicy {
    return this.binding?.policy ?? defaultConfig().onViolation;
  }

  /**
   * Subject behind the token and lifeline, ignoring the view.
   */
  protected locate(): object | undefined {
    const binding = this.binding;
    if (!binding) return undefined;
    const token = binding.token.deref();
    if (!token || token.isRetired) return undefined;
    if (!token.check()) return undefined;
    return binding.lifeline.deref()?.target;
  }

  /**
   * Subject behind the lifeline without any affinity check; for conversions,
   * which inspect the subject's type but hand nothing to the caller.
   */
  protected peek(): object | undefined {
    const binding = this.binding;
    if (!binding) return undefined;
    const token = binding.token.deref();
    if (!token || token.isRetired) return undefined;
    return binding.lifeline.deref()?.target;
  }

  /** `#<identity>` or `empty`, without an affinity check */
  protected describeTarget(): string {
    return this.peek() === undefined ? 'empty' : `#${this.hash()}`;
  }
}

/**
 * Order handles by subject identity, e.g. for `Array#sort`.
 */
export function compareHandles(a: Handle, b: Handle): number {
  return a.hash() - b.hash();
}

/**
 * `unknown` when T and U are ancestor and descendant (in either direction),
 * `never` otherwise, which rejects the argument at compile time.
 */
type RelatedTo<T, U> = [T] extends [U] ? unknown : [U] extends [T] ? unknown : never;

/**
 * `unknown` when T is B or a subtype of it.
 */
type Within<T, B> = [T] extends [B] ? unknown : never;

/**
 * A handle whose view is the type tag `T`.
 *
 * @example
 * ```typescript
 * const handle = session.asWeakHandle();
 *
 * setTimeout(() => {
 *   const s = handle.resolve();
 *   if (s) s.touch(); // skipped silently if the session has been closed
 * }, 1000);
 * ```
 */
export class WeakHandle<T extends object> extends Handle {
  private constructor(
    readonly tag: TypeTag<T>,
    binding: Binding | undefined
  ) {
    super(binding);
  }

  /**
   * A handle to nothing.
   */
  static empty<T extends object>(tag: TypeTag<T>): WeakHandle<T> {
    return new WeakHandle(tag, undefined);
  }

  /** @internal Used by HandleFactory and ErasedHandle. */
  static bind<T extends object>(tag: TypeTag<T>, binding: Binding | undefined): WeakHandle<T> {
    return new WeakHandle(tag, binding);
  }

  get view(): View {
    return this.tag;
  }

  resolve(): T | undefined {
    return reinterpret(this.locate(), NEUTRAL, this.tag);
  }

  /**
   * Strict dereference for callers that already know the subject is there.
   *
   * An empty handle is a contract violation, handled by the factory's
   * violation policy (`warn` throws here, there being no value to return).
   */
  get(): T {
    const value = this.resolve();
    if (value === undefined) return violate(new EmptyHandleError(this.tag.label), this.policy);
    return value;
  }

  /**
   * Another handle to the same subject, with its own validity lease.
   */
  clone(): WeakHandle<T> {
    return new WeakHandle(this.tag, this.bound);
  }

  /**
   * Convert to an ancestor or descendant view.
   *
   * Upcasts always keep the subject. Downcasts are checked now: if the
   * subject does not satisfy `tag`, the result is empty.
   */
  as<U extends object>(tag: TypeTag<U> & RelatedTo<T, U>): WeakHandle<U> {
    if (!areRelated(this.tag, tag)) {
      return violate(new UnrelatedTypesError(this.tag.label, tag.label), this.policy);
    }
    if (isAncestorOf(this.tag, tag)) {
      const current = this.peek();
      if (current !== undefined && !tag.is(current)) return WeakHandle.empty(tag);
    }
    return new WeakHandle(tag, this.bound);
  }

  /**
   * Relabel this handle as a sibling type: both this handle's type and
   * `target` must descend from `base` without being ancestor and descendant
   * of each other (use {@link as} for those).
   *
   * The caller vouches for the subject's actual type. The result is still
   * checked on every resolve and is empty while the subject is not a
   * `target`.
   */
  castWithinHierarchy<B extends object, U extends B>(
    base: TypeTag<B> & Within<T, B>,
    target: TypeTag<U>
  ): WeakHandle<U> {
    if (!descendsFrom(this.tag, base) || !descendsFrom(target, base)) {
      return violate(
        new InvalidHierarchyCastError(this.tag.label, target.label, base.label, 'not-descendants'),
        this.policy
      );
    }
    if (areRelated(this.tag, target)) {
      return violate(
        new InvalidHierarchyCastError(this.tag.label, target.label, base.label, 'direct-relation'),
        this.policy
      );
    }
    return new WeakHandle(target, this.bound);
  }

  erase(): ErasedHandle {
    return ErasedHandle.bind(this.tag, this.bound);
  }

  toString(): string {
    return `WeakHandle<${this.tag.label}>(${this.describeTarget()})`;
  }
}

/**
 * A handle with the neutral view, for storing handles of different types
 * side by side. It remembers the tag it was erased from so that
 * {@link recover} can refuse unrelated types.
 */
export class ErasedHandle extends Handle {
  private constructor(
    readonly origin: TypeTag | undefined,
    binding: Binding | undefined
  ) {
    super(binding);
  }

  static empty(): ErasedHandle {
    return new ErasedHandle(undefined, undefined);
  }

  /** @internal */
  static bind(origin: TypeTag, binding: Binding | undefined): ErasedHandle {
    return new ErasedHandle(origin, binding);
  }

  get view(): View {
    return NEUTRAL;
  }

  resolve(): object | undefined {
    return this.locate();
  }

  clone(): ErasedHandle {
    return new ErasedHandle(this.origin, this.bound);
  }

  erase(): ErasedHandle {
    return this.clone();
  }

  /**
   * Back to a typed handle.
   *
   * Yields an empty handle when `tag` is unrelated to the type this handle
   * was erased from, or when the subject does not satisfy `tag`.
   */
  recover<T extends object>(tag: TypeTag<T>): WeakHandle<T> {
    if (this.origin === undefined || !areRelated(this.origin, tag)) return WeakHandle.empty(tag);
    const current = this.peek();
    if (current !== undefined && reinterpret(current, NEUTRAL, tag) === undefined) {
      return WeakHandle.empty(tag);
    }
    return WeakHandle.bind(tag, this.bound);
  }

  toString(): string {
    const origin = this.origin === undefined ? NEUTRAL : this.origin;
    return `ErasedHandle<${describeView(origin)}>(${this.describeTarget()})`;
  }
}
