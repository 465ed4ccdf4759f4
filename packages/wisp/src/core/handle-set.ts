import type { Address } from './identity.js';
import type { ErasedHandle, Handle } from './weak-handle.js';

/**
 * Set of handles of any type, keyed by subject identity.
 *
 * Handles are stored erased. Two handles are the same member when they hash
 * to the same identity and compare equal, so a subject is held once however
 * many handles to it are added.
 *
 * Members whose subjects are gone stay until {@link prune} or
 * {@link delete} removes them. A member reset by the caller leaves the set.
 *
 * @example
 * ```typescript
 * const listeners = new HandleSet();
 * listeners.add(panel.asWeakHandle());
 * listeners.add(toolbar.issueAs(ToolbarTag));
 *
 * for (const handle of listeners) handle.resolve();
 * listeners.prune(); // forget destroyed listeners
 * ```
 */
export class HandleSet implements Iterable<ErasedHandle> {
  /** identity → erased handles with that identity */
  private readonly index = new Map<Address, ErasedHandle[]>();

  get size(): number {
    let size = 0;
    for (const key of this.index.keys()) size += this.bucket(key)?.length ?? 0;
    return size;
  }

  /**
   * Add an erased copy of `handle`.
   *
   * @returns false if an equal handle was already a member
   */
  add(handle: Handle): boolean {
    const key = handle.hash();
    const bucket = this.bucket(key);
    if (bucket?.some((member) => member.equals(handle))) return false;
    const erased = handle.erase();
    if (bucket) bucket.push(erased);
    else this.index.set(key, [erased]);
    return true;
  }

  has(handle: Handle): boolean {
    return this.bucket(handle.hash())?.some((member) => member.equals(handle)) ?? false;
  }

  /**
   * Remove the member equal to `handle` and reset it.
   *
   * @returns true if a member was removed
   */
  delete(handle: Handle): boolean {
    const key = handle.hash();
    const bucket = this.bucket(key);
    if (!bucket) return false;
    const at = bucket.findIndex((member) => member.equals(handle));
    if (at === -1) return false;
    const [removed] = bucket.splice(at, 1);
    removed?.reset();
    if (bucket.length === 0) this.index.delete(key);
    return true;
  }

  /**
   * Remove and reset every member that resolves to nothing.
   *
   * @returns number of members removed, including members reset by a caller
   */
  prune(): number {
    let removed = 0;
    for (const [key, bucket] of this.index) {
      const live = bucket.filter((member) => {
        if (member.hash() === key && member.isPresent()) return true;
        member.reset();
        removed++;
        return false;
      });
      if (live.length === 0) this.index.delete(key);
      else this.index.set(key, live);
    }
    return removed;
  }

  /**
   * Remove and reset every member.
   */
  clear(): void {
    for (const bucket of this.index.values()) {
      for (const member of bucket) member.reset();
    }
    this.index.clear();
  }

  /**
   * Members are the stored handles; a member reset during iteration leaves
   * the set on the next access.
   */
  *[Symbol.iterator](): IterableIterator<ErasedHandle> {
    for (const [key, bucket] of this.index) {
      for (const member of [...bucket]) {
        if (member.hash() === key) yield member;
      }
    }
  }

  /**
   * Members filed under `key`, dropping those reset since they were added.
   */
  private bucket(key: Address): ErasedHandle[] | undefined {
    const bucket = this.index.get(key);
    if (!bucket) return undefined;
    const kept = bucket.filter((member) => member.hash() === key);
    if (kept.length === bucket.length) return bucket;
    if (kept.length === 0) {
      this.index.delete(key);
      return undefined;
    }
    this.index.set(key, kept);
    return kept;
  }
}
