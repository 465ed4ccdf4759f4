import { FactoryDisposedError, UnrelatedTypesError, violate } from '../errors/errors.js';
import type { HandleConfig } from '../types/types.js';
import { createAffinityToken, type AffinityToken } from './affinity.js';
import { resolveConfig } from './config.js';
import { lifelineOf, type SelfOwning } from './ownership.js';
import { descendsFrom, type TypeTag } from './type-tag.js';
import { ValidityFlag } from './validity-flag.js';
import { WeakHandle } from './weak-handle.js';

/**
 * Issues handles to one subject and revokes them a generation at a time.
 *
 * The factory owns the current (token, flag) generation. Handles keep only a
 * WeakRef to the token, so retiring it in {@link invalidate} or
 * {@link dispose} empties every handle of that generation at once.
 *
 * Callers must not race issue() against invalidate() from different
 * sequences; the factory's owner is expected to drive its lifecycle.
 *
 * @example
 * ```typescript
 * class Session extends SelfOwned {
 *   readonly handles: HandleFactory<Session> = new HandleFactory<Session>(this, SessionTag);
 *   ...
 * }
 * const SessionTag = typeTag(Session);
 *
 * const owner = Session.create();
 * const handle = owner.value.handles.issue();
 * owner.value.handles.invalidate(); // handle.resolve() === undefined from now on
 * ```
 */
export class HandleFactory<T extends SelfOwning> {
  readonly config: HandleConfig;

  private token: AffinityToken;
  private flag: ValidityFlag;
  private disposed = false;

  /**
   * @param subject - The subject handles will resolve to; must be adopted
   *   (see Shared.adopt) before the first issue()
   * @param tag - View of issued handles
   * @param config - Affinity mode and violation policy (defaults from {@link resolveConfig})
   */
  constructor(
    private readonly subject: T,
    private readonly tag: TypeTag<T>,
    config?: Partial<HandleConfig>
  ) {
    this.config = resolveConfig(config);
    this.token = createAffinityToken(this.config, tag.label);
    this.flag = new ValidityFlag();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * A new handle bound to the current generation.
   *
   * @throws {FactoryDisposedError} after dispose()
   * @throws {NotOwnedError} if the subject has not been adopted yet
   */
  issue(): WeakHandle<T> {
    return this.issueAs(this.tag);
  }

  /**
   * A new handle viewing the subject as `tag`, a descendant of the factory's
   * own tag. The handle shares this generation's token and flag.
   *
   * The subject is expected to satisfy `tag`; if it does not, the handle
   * resolves to nothing.
   */
  issueAs<D extends T>(tag: TypeTag<D>): WeakHandle<D> {
    this.assertLive();
    if (!descendsFrom(tag, this.tag)) {
      return violate(new UnrelatedTypesError(this.tag.label, tag.label), this.config.onViolation);
    }
    const lifeline = lifelineOf(this.subject);
    return WeakHandle.bind(tag, {
      token: new WeakRef(this.token),
      lifeline: new WeakRef(lifeline),
      flag: this.flag,
      address: lifeline.address,
      policy: this.config.onViolation,
    });
  }

  /**
   * Revoke every handle issued so far.
   *
   * Installs a fresh token and flag and retires the old token before
   * returning, so earlier handles resolve to nothing from then on. Handles
   * issued afterwards are unaffected.
   *
   * @throws {FactoryDisposedError} after dispose()
   */
  invalidate(): void {
    this.assertLive();
    this.token.retire();
    this.token = createAffinityToken(this.config, this.tag.label);
    this.flag = new ValidityFlag();
  }

  /**
   * Whether handles of the current generation are still held.
   */
  hasOutstanding(): boolean {
    return this.flag.hasOutstanding();
  }

  /**
   * Unbind the current generation from its sequence; the next resolve
   * rebinds it to whichever sequence makes it.
   */
  detachFromSequence(): void {
    this.token.detach();
  }

  /**
   * Retire the current generation for good. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.token.retire();
  }

  private assertLive(): void {
    if (this.disposed) throw new FactoryDisposedError(this.tag.label);
  }
}
