/**
 * Leases of handles dropped without reset() are returned when the handle is
 * collected. The held value is the lease, never the handle.
 */
const leaseFinalizer = new FinalizationRegistry<FlagLease>((lease) => lease.release());

/**
 * One handle's share of a {@link ValidityFlag}.
 */
export class FlagLease {
  private onRelease: (() => void) | undefined;

  /** @internal Created by ValidityFlag.lease() */
  constructor(onRelease: () => void) {
    this.onRelease = onRelease;
  }

  get isReleased(): boolean {
    return this.onRelease === undefined;
  }

  /**
   * Return the share. Idempotent.
   */
  release(): void {
    const onRelease = this.onRelease;
    if (!onRelease) return;
    this.onRelease = undefined;
    leaseFinalizer.unregister(this);
    onRelease();
  }
}

/**
 * Counter answering "are there outstanding handles of this generation?".
 *
 * Purely observational: resolution never reads it. The factory creates a
 * fresh flag per generation, so a new generation starts with no leases even
 * while handles of the previous one are still held.
 */
export class ValidityFlag {
  private leases = 0;

  /**
   * Number of leases not yet released.
   */
  get outstanding(): number {
    return this.leases;
  }

  hasOutstanding(): boolean {
    return this.leases > 0;
  }

  /**
   * Take a lease on behalf of `holder`. The lease is released by the holder,
   * or automatically once the holder is garbage-collected.
   */
  lease(holder: object): FlagLease {
    this.leases++;
    const lease = new FlagLease(() => {
      this.leases--;
    });
    leaseFinalizer.register(holder, lease, lease);
    return lease;
  }
}
