import type { TagId } from '../core/type-tag.js';
import { TypeTagCollisionError } from '../errors/errors.js';
import type { ClassLike } from '../types/types.js';

/**
 * Immutable record behind every tag.
 */
export interface TagRecord {
  readonly id: TagId;
  readonly label: string;
  /** Own id first, then ancestors nearest first */
  readonly lineage: readonly TagId[];
  /** Label of the direct parent, for diagnostics */
  readonly parentLabel: string | undefined;
}

/** What a child needs from its parent: a tag or a record */
export type ParentRecord = Pick<TagRecord, 'id' | 'label' | 'lineage'>;

/**
 * Process-wide registry state.
 *
 * Fields:
 * - classes: WeakMap so declared classes can still be collected
 * - counter: last issued tag number
 */
export type TypeRegistryStore = {
  classes: WeakMap<ClassLike, TagRecord>;
  counter: number;
};

function createStore(): TypeRegistryStore {
  return { classes: new WeakMap(), counter: 0 };
}

function ensureStore(): TypeRegistryStore {
  return (globalThis.__WISP_TYPE_REGISTRY__ ??= createStore());
}

/**
 * Global registry of declared type views.
 *
 * This is the explicit replacement for runtime reflection: two views are
 * related only if one was declared with the other in its lineage.
 *
 * Architecture:
 * - typeTag() declares classes; the class is the registry key, so repeated
 *   declarations share one id
 * - rootTag() / deriveTag() declare guard-checked views; every call is a new view
 * - Parents are fixed at first declaration
 * - The store keeps classes weakly and nothing else; a guard view lives
 *   exactly as long as its tag
 */
export class TypeRegistry {
  /**
   * Declare a class, or return its existing record.
   *
   * @throws {TypeTagCollisionError} if the class was declared with another parent
   */
  static declareClass(target: ClassLike, label: string, parent?: ParentRecord): TagRecord {
    const store = ensureStore();
    const existing = store.classes.get(target);
    if (existing) {
      const existingParent: TagId | undefined = existing.lineage[1];
      if (existingParent !== parent?.id) {
        throw new TypeTagCollisionError(
          existing.label,
          existing.parentLabel ?? '(none)',
          parent?.label ?? '(none)'
        );
      }
      return existing;
    }
    const record = this.createRecord(store, label, parent);
    store.classes.set(target, record);
    return record;
  }

  /**
   * Declare a guard-checked view. Always creates a new record.
   */
  static declareGuard(label: string, parent?: ParentRecord): TagRecord {
    return this.createRecord(ensureStore(), label, parent);
  }

  /**
   * Record for a declared class, if any.
   */
  static lookup(target: ClassLike): TagRecord | undefined {
    return ensureStore().classes.get(target);
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ Ids restart at tag_1. Tags created before the reset must not be
   * compared with tags created after it.
   */
  static resetForTests(): void {
    globalThis.__WISP_TYPE_REGISTRY__ = createStore();
  }

  // ---- internals ----

  private static createRecord(
    store: TypeRegistryStore,
    label: string,
    parent: ParentRecord | undefined
  ): TagRecord {
    const id = `tag_${++store.counter}` as TagId;
    const record: TagRecord = Object.freeze({
      id,
      label,
      lineage: Object.freeze([id, ...(parent?.lineage ?? [])]),
      parentLabel: parent?.label,
    });
    return record;
  }
}
