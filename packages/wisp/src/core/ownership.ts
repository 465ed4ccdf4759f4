/*
 * Ownership
 * ---------
 * The strong-ownership graph handles observe. wisp never decides when a
 * subject dies; owners do, by releasing their Shared references.
 *
 *  - Lifeline: control block of an owned subject. Holds the subject while at
 *    least one owner is alive, counts owners, and runs destruction hooks once.
 *  - Shared<T>: one owning reference. share() adds an owner, release() drops
 *    one. An owner that is garbage-collected without release() is dropped by
 *    a FinalizationRegistry.
 *  - SelfOwned: base class supplying sharedFromThis(), the capability
 *    SubjectMixin and HandleFactory require.
 *
 * Handles hold only a WeakRef to the lifeline, so they never keep a subject
 * alive.
 */

import {
  AggregateDestroyError,
  AlreadyOwnedError,
  NotOwnedError,
  OwnerReleasedError,
} from '../errors/errors.js';
import { addressOf, type Address } from './identity.js';

/** subject → its lifeline, set once by Shared.adopt() */
const lifelines = new WeakMap<object, Lifeline>();

const ownerFinalizer = new FinalizationRegistry<Lifeline>((lifeline) => {
  try {
    lifeline.drop();
  } catch (error) {
    console.error(`[wisp] Destroying '${lifeline.label}' after its last owner was collected failed:`, error);
  }
});

export function describeSubject(subject: object): string {
  return subject.constructor?.name || 'Object';
}

/**
 * Control block of an owned subject.
 */
export class Lifeline {
  /** Identity of the subject; kept after destruction */
  readonly address: Address;

  /** Subject class name, for diagnostics */
  readonly label: string;

  private subject: object | undefined;
  private owners = 0;
  private hooks: Array<() => void> | undefined;

  constructor(subject: object) {
    this.subject = subject;
    this.address = addressOf(subject);
    this.label = describeSubject(subject);
  }

  /**
   * The subject while it has owners, undefined once destroyed.
   */
  get target(): object | undefined {
    return this.subject;
  }

  get useCount(): number {
    return this.owners;
  }

  get isDestroyed(): boolean {
    return this.subject === undefined;
  }

  /**
   * Register a hook run once when the subject is destroyed, in registration
   * order. Hooks registered after destruction run immediately.
   */
  onDestroy(hook: () => void): void {
    if (this.isDestroyed) {
      hook();
      return;
    }
    (this.hooks ??= []).push(hook);
  }

  /** @internal Called by Shared when an owner is created. */
  retain(): void {
    this.owners++;
  }

  /** @internal Called by Shared when an owner goes away. */
  drop(): void {
    if (this.owners === 0) return;
    if (--this.owners === 0) this.destroy();
  }

  private destroy(): void {
    if (this.subject === undefined) return;
    this.subject = undefined;

    const hooks = this.hooks;
    this.hooks = undefined;
    if (!hooks) return;

    const errors: Error[] = [];
    for (const hook of hooks) {
      try {
        hook();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateDestroyError(this.label, errors);
  }
}

/**
 * An owning reference to a subject.
 *
 * @example
 * ```typescript
 * const owner = Shared.adopt(new Connection(url));
 * const second = owner.share();
 *
 * owner.release();  // subject still alive: `second` owns it
 * second.release(); // last owner gone: subject destroyed, handles go empty
 * ```
 */
export class Shared<T extends object> {
  private held: T | undefined;

  private constructor(
    value: T,
    private readonly lifeline: Lifeline
  ) {
    this.held = value;
    lifeline.retain();
    ownerFinalizer.register(this, lifeline, this);
  }

  /**
   * Take ownership of a freshly constructed subject.
   *
   * This is the designated way to bring a subject to life: it creates the
   * lifeline that handles and sharedFromThis() rely on.
   *
   * @throws {AlreadyOwnedError} if the subject already has a lifeline
   */
  static adopt<T extends object>(subject: T): Shared<T> {
    if (lifelines.has(subject)) throw new AlreadyOwnedError(describeSubject(subject));
    const lifeline = new Lifeline(subject);
    lifelines.set(subject, lifeline);
    if (subject instanceof SelfOwned) {
      lifeline.onDestroy(() => subject[DESTROY]());
    }
    return new Shared(subject, lifeline);
  }

  /**
   * A new owning reference to an already adopted subject.
   *
   * @throws {NotOwnedError} if the subject was never adopted
   * @throws {OwnerReleasedError} if the subject has been destroyed
   */
  static of<T extends object>(subject: T): Shared<T> {
    return new Shared(subject, lifelineOf(subject));
  }

  /**
   * The owned subject.
   *
   * @throws {OwnerReleasedError} after this reference was released
   */
  get value(): T {
    if (this.held === undefined) throw new OwnerReleasedError(this.lifeline.label);
    return this.held;
  }

  /** Number of live owning references to the subject */
  get useCount(): number {
    return this.lifeline.useCount;
  }

  get isReleased(): boolean {
    return this.held === undefined;
  }

  /**
   * Add an owner.
   *
   * @throws {OwnerReleasedError} after this reference was released
   */
  share(): Shared<T> {
    return new Shared(this.value, this.lifeline);
  }

  /**
   * Drop this owner; the last release destroys the subject. Idempotent per
   * reference.
   *
   * @throws {AggregateDestroyError} or the hook's own error if destruction
   *   hooks fail; the subject is destroyed regardless
   */
  release(): void {
    if (this.held === undefined) return;
    this.held = undefined;
    ownerFinalizer.unregister(this);
    this.lifeline.drop();
  }
}

/**
 * Lifeline of an adopted, live subject.
 *
 * @throws {NotOwnedError} if the subject was never adopted
 * @throws {OwnerReleasedError} if the subject has been destroyed
 */
export function lifelineOf(subject: object): Lifeline {
  const lifeline = lifelines.get(subject);
  if (!lifeline) throw new NotOwnedError(describeSubject(subject));
  if (lifeline.isDestroyed) throw new OwnerReleasedError(lifeline.label);
  return lifeline;
}

/** @internal Key of the destruction callback on SelfOwned. */
export const DESTROY: unique symbol = Symbol('wisp.destroy');

/**
 * Capability of retrieving a strong owning reference to oneself.
 */
export interface SelfOwning {
  sharedFromThis(): Shared<this>;
}

/**
 * Base class for subjects that can share ownership of themselves.
 *
 * Subclasses should keep their constructor private and expose a static
 * `create()` that returns `Shared.adopt(new Subclass(...))`, so no instance
 * exists without an owner.
 *
 * @example
 * ```typescript
 * class Session extends SelfOwned {
 *   private constructor(readonly user: string) {
 *     super();
 *   }
 *
 *   static create(user: string): Shared<Session> {
 *     return Shared.adopt(new Session(user));
 *   }
 * }
 * ```
 */
export abstract class SelfOwned implements SelfOwning {
  /**
   * A new owning reference to this subject.
   *
   * @throws {NotOwnedError} if called before adoption, e.g. from the constructor
   * @throws {OwnerReleasedError} once the subject has been destroyed
   */
  sharedFromThis(): Shared<this> {
    return Shared.of(this);
  }

  /**
   * Whether the subject has been adopted and not yet destroyed.
   */
  get isOwned(): boolean {
    const lifeline = lifelines.get(this);
    return lifeline !== undefined && !lifeline.isDestroyed;
  }

  /**
   * Runs once, when the last owner releases the subject.
   */
  protected onDestroy(): void {}

  /** @internal */
  [DESTROY](): void {
    this.onDestroy();
  }
}
