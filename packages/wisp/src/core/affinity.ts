import { AffinityViolationError, reportViolation } from '../errors/errors.js';
import type { HandleConfig, ViolationPolicy } from '../types/types.js';
import { Sequence } from './sequence.js';

/**
 * Record of which sequence a generation of handles belongs to.
 *
 * The factory owns the token; handles only keep a WeakRef to it. Replacing
 * the token retires the old one, which handles treat exactly like a token
 * that no longer exists.
 *
 * States: unbound → bound(sequence) on the first check → unbound after detach().
 */
export interface AffinityToken {
  /** True once the factory has replaced or dropped this token */
  readonly isRetired: boolean;

  /** True while a sequence is recorded */
  readonly isBound: boolean;

  /**
   * Check the current sequence against the recorded one, recording it when
   * unbound.
   *
   * @returns true to proceed, false to resolve to nothing (`warn` policy)
   */
  check(): boolean;

  /** Forget the recorded sequence so the next check rebinds. */
  detach(): void;

  /** Mark the token as replaced. Irreversible. */
  retire(): void;
}

/**
 * Checking token: enforces single-sequence access.
 */
export class SequenceAffinity implements AffinityToken {
  private bound: Sequence | undefined;
  private retired = false;

  /**
   * @param subject - Label of the subject, for diagnostics
   * @param policy - Response to a wrong-sequence check
   */
  constructor(
    private readonly subject: string,
    private readonly policy: ViolationPolicy
  ) {}

  get isRetired(): boolean {
    return this.retired;
  }

  get isBound(): boolean {
    return this.bound !== undefined;
  }

  /**
   * Sequence the token is bound to, if any.
   */
  get boundTo(): Sequence | undefined {
    return this.bound;
  }

  check(): boolean {
    const current = Sequence.current();
    if (this.bound === undefined) {
      this.bound = current;
      return true;
    }
    if (this.bound === current) return true;
    return reportViolation(
      new AffinityViolationError(this.subject, this.bound.label, current.label),
      this.policy
    );
  }

  detach(): void {
    this.bound = undefined;
  }

  retire(): void {
    this.retired = true;
  }
}

/**
 * Permissive token: every check passes and detach does nothing.
 */
export class PermissiveAffinity implements AffinityToken {
  private retired = false;

  get isRetired(): boolean {
    return this.retired;
  }

  get isBound(): boolean {
    return false;
  }

  check(): boolean {
    return true;
  }

  detach(): void {}

  retire(): void {
    this.retired = true;
  }
}

/**
 * Create the token variant selected by `config.affinity`.
 */
export function createAffinityToken(config: HandleConfig, subject: string): AffinityToken {
  return config.affinity === 'permissive'
    ? new PermissiveAffinity()
    : new SequenceAffinity(subject, config.onViolation);
}
