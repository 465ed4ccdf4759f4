import { InvalidHandleConfigError } from '../errors/errors.js';
import {
  Affinity,
  Violation,
  type AffinityMode,
  type HandleConfig,
  type ViolationPolicy,
} from '../types/types.js';

const AFFINITY_MODES: readonly string[] = Object.values(Affinity);
const VIOLATION_POLICIES: readonly string[] = Object.values(Violation);

let _overrides: Partial<HandleConfig> | undefined;

function isAffinityMode(value: unknown): value is AffinityMode {
  return typeof value === 'string' && AFFINITY_MODES.includes(value);
}

function isViolationPolicy(value: unknown): value is ViolationPolicy {
  return typeof value === 'string' && VIOLATION_POLICIES.includes(value);
}

/**
 * Defaults for a factory created without explicit configuration.
 *
 * Affinity checking is on unless NODE_ENV is 'production'. NODE_ENV is read
 * on every call, so tests can flip it without reloading modules. Values set
 * through {@link setDefaultConfig} take precedence.
 */
export function defaultConfig(): HandleConfig {
  const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';
  return Object.freeze({
    affinity: _overrides?.affinity ?? (isProd ? Affinity.Permissive : Affinity.Checked),
    onViolation: _overrides?.onViolation ?? Violation.Abort,
  });
}

/**
 * Merge `partial` over the defaults, validate, and freeze.
 *
 * @throws {InvalidHandleConfigError} on unknown modes or policies
 */
export function resolveConfig(partial?: Partial<HandleConfig>): HandleConfig {
  const base = defaultConfig();
  if (partial === undefined) return base;

  const affinity: unknown = partial.affinity ?? base.affinity;
  const onViolation: unknown = partial.onViolation ?? base.onViolation;

  if (!isAffinityMode(affinity)) {
    throw new InvalidHandleConfigError(
      `'affinity' must be one of ${AFFINITY_MODES.join(', ')}, received '${String(affinity)}'.`
    );
  }
  if (!isViolationPolicy(onViolation)) {
    throw new InvalidHandleConfigError(
      `'onViolation' must be one of ${VIOLATION_POLICIES.join(', ')}, received '${String(onViolation)}'.`
    );
  }
  return Object.freeze({ affinity, onViolation });
}

/**
 * Override the process-wide defaults, or restore them with `undefined`.
 *
 * Only the given fields are pinned; the others keep following NODE_ENV.
 * Only factories created afterwards are affected.
 *
 * @example
 * ```typescript
 * // keep affinity checks in a production canary
 * setDefaultConfig({ affinity: 'checked', onViolation: 'warn' });
 * ```
 */
export function setDefaultConfig(overrides?: Partial<HandleConfig>): void {
  if (overrides === undefined) {
    _overrides = undefined;
    return;
  }
  const resolved = resolveConfig(overrides);
  const next: { affinity?: AffinityMode; onViolation?: ViolationPolicy } = {};
  if (overrides.affinity !== undefined) next.affinity = resolved.affinity;
  if (overrides.onViolation !== undefined) next.onViolation = resolved.onViolation;
  _overrides = next;
}
