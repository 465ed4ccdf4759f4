import { TypeRegistry, type TagRecord } from '../registry/type-registry.js';
import type { ClassLike } from '../types/types.js';

/**
 * Branded type for canonical tag identifiers.
 * Prevents accidental use of raw strings as tag IDs.
 */
export type TagId = string & { __brand: 'TagId' };

/**
 * Declared runtime view of a type.
 *
 * Tags are the only source of truth for which types are related: a tag knows
 * its ancestors (its `lineage`) and how to test whether a value satisfies it.
 * Conversions between handles consult tags instead of reflecting on objects.
 *
 * @template T - The type a value has once `is()` accepts it
 */
export interface TypeTag<T extends object = object> {
  /** Discriminant for runtime type checking */
  readonly kind: 'type-tag';

  /** Unique canonical identifier (tag_1, tag_2, etc.) */
  readonly id: TagId;

  /** Human-readable label for diagnostics */
  readonly label: string;

  /** This tag's id followed by the ids of its ancestors, nearest first */
  readonly lineage: readonly TagId[];

  /** Runtime check backing every conversion into this view */
  is(value: object): value is T;
}

export interface ClassTagOptions {
  /** Label used in diagnostics (defaults to the class name) */
  label?: string;
}

function freezeTag<T extends object>(
  record: TagRecord,
  is: (value: object) => value is T
): TypeTag<T> {
  const tag: TypeTag<T> = {
    kind: 'type-tag',
    id: record.id,
    label: record.label,
    lineage: record.lineage,
    is,
  };
  return Object.freeze(tag);
}

/**
 * Declare a class as a type view.
 *
 * Declaring the same class twice yields tags with the same id; declaring it
 * with a different parent throws {@link TypeTagCollisionError}. The parent
 * must be a supertype of the class, which the compiler checks.
 *
 * @example
 * ```typescript
 * const ShapeTag = typeTag(Shape);
 * const CircleTag = typeTag(Circle, { extends: ShapeTag });
 * ```
 */
export function typeTag<T extends object>(
  target: ClassLike<T>,
  options?: ClassTagOptions
): TypeTag<T>;
export function typeTag<T extends P, P extends object>(
  target: ClassLike<T>,
  options: ClassTagOptions & { extends: TypeTag<P> }
): TypeTag<T>;
export function typeTag<T extends object>(
  target: ClassLike<T>,
  options: ClassTagOptions & { extends?: TypeTag } = {}
): TypeTag<T> {
  const label = options.label ?? (target.name || 'Anonymous');
  const record = TypeRegistry.declareClass(target, label, options.extends);
  return freezeTag(record, (value): value is T => value instanceof target);
}

/**
 * Declare a root view for a type with no class behind it, such as an
 * interface, checked by `guard`.
 */
export function rootTag<T extends object>(
  label: string,
  guard: (value: object) => value is T
): TypeTag<T> {
  return freezeTag(TypeRegistry.declareGuard(label), guard);
}

/**
 * Declare a view descending from `parent`. A value satisfies it when it
 * satisfies `parent` and `guard`.
 *
 * @example
 * ```typescript
 * const NamedTag = rootTag('Named', (v): v is Named => 'name' in v);
 * const LabelledTag = deriveTag(NamedTag, 'Labelled', (v): v is Labelled => 'label' in v);
 * ```
 */
export function deriveTag<T extends P, P extends object>(
  parent: TypeTag<P>,
  label: string,
  guard: (value: P) => value is T
): TypeTag<T> {
  const record = TypeRegistry.declareGuard(label, parent);
  return freezeTag(record, (value): value is T => parent.is(value) && guard(value));
}

/**
 * True when `ancestor` is a strict ancestor of `descendant`.
 */
export function isAncestorOf(ancestor: TypeTag, descendant: TypeTag): boolean {
  return ancestor.id !== descendant.id && descendant.lineage.includes(ancestor.id);
}

/**
 * True when `tag` is `base` or descends from it.
 */
export function descendsFrom(tag: TypeTag, base: TypeTag): boolean {
  return tag.lineage.includes(base.id);
}

/**
 * True for the same tag or a direct ancestor/descendant pair. Siblings are
 * not related.
 */
export function areRelated(a: TypeTag, b: TypeTag): boolean {
  return a.id === b.id || isAncestorOf(a, b) || isAncestorOf(b, a);
}

/**
 * Runtime type guard to check if a value is a valid TypeTag.
 */
export function isTypeTag(x: unknown): x is TypeTag {
  return (
    typeof x === 'object' &&
    x !== null &&
    'kind' in x &&
    x.kind === 'type-tag' &&
    'id' in x &&
    typeof x.id === 'string' &&
    'is' in x &&
    typeof x.is === 'function'
  );
}
