/*
 * reinterpret
 * -----------
 * Stateless conversion of a resolved value between type views.
 *
 *   from \ to       | neutral      | concrete
 *   ----------------+--------------+------------------------------------------
 *   neutral         | passthrough  | checked against the target tag
 *   concrete        | passthrough  | same tag: passthrough
 *                   |              | related tags: checked, undefined on mismatch
 *                   |              | unrelated tags: UnrelatedTypesError
 *
 * Erasure keeps the value as is. Recovery from the neutral view is checked
 * against the target tag rather than trusted, so a wrongly recovered handle
 * resolves to nothing instead of to a mistyped value.
 */

import { UnrelatedTypesError } from '../errors/errors.js';
import { areRelated, type TypeTag } from './type-tag.js';

/** The type-neutral view. */
export const NEUTRAL: unique symbol = Symbol('wisp.neutral');
export type Neutral = typeof NEUTRAL;

/** A concrete tag or the neutral view. */
export type View = TypeTag | Neutral;

export function reinterpret(value: object | undefined, from: View, to: Neutral): object | undefined;
export function reinterpret<T extends object>(
  value: object | undefined,
  from: View,
  to: TypeTag<T>
): T | undefined;
export function reinterpret(value: object | undefined, from: View, to: View): object | undefined;
export function reinterpret(value: object | undefined, from: View, to: View): object | undefined {
  if (to === NEUTRAL) return value;
  if (from !== NEUTRAL) {
    if (from.id === to.id) return value;
    if (!areRelated(from, to)) throw new UnrelatedTypesError(from.label, to.label);
  }
  if (value === undefined) return undefined;
  return to.is(value) ? value : undefined;
}

/**
 * The wider of two views, or `null` when they are unrelated.
 *
 * The neutral view is wider than every tag.
 */
export function widerView(a: View, b: View): View | null {
  if (a === NEUTRAL || b === NEUTRAL) return NEUTRAL;
  if (a.id === b.id) return a;
  if (b.lineage.includes(a.id)) return a;
  if (a.lineage.includes(b.id)) return b;
  return null;
}

export function describeView(view: View): string {
  return view === NEUTRAL ? '(erased)' : view.label;
}
