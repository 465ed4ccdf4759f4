/* Sequence
 *
 * A logical execution sequence: the unit that sequence affinity binds to.
 *
 * Purpose:
 *  - Give "the same thread" a meaning on a single-threaded event loop
 *  - Let request handlers, jobs or actors each own the handles they resolve
 *  - Survive `await`: a sequence entered with run() stays current in every
 *    continuation of the callback
 *
 * Design:
 *  - Outside any run(), the current sequence is the worker thread's main sequence
 *  - run() enters a sequence through AsyncLocalStorage; nested run() calls
 *    switch to the inner sequence and restore the outer one on exit
 *  - Sequences compare by identity; ids and labels are for diagnostics
 *
 * Usage example:
 * ```typescript
 * const jobs = new Sequence('jobs');
 *
 * await jobs.run(async () => {
 *   const session = handle.resolve(); // binds the handle's token to 'jobs'
 *   await session?.flush();
 * });
 *
 * handle.resolve(); // main sequence: affinity violation
 * ```
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { threadId } from 'node:worker_threads';

const storage = new AsyncLocalStorage<Sequence>();

let _sequenceCounter = 0;
let _main: Sequence | undefined;

export class Sequence {
  /** Unique id within the thread (1, 2, ...) */
  readonly id: number;

  /** Human-readable label used in affinity diagnostics */
  readonly label: string;

  /**
   * Create a new sequence. It becomes current only inside {@link run}.
   *
   * @param label - Optional label (defaults to `sequence-<id>`)
   */
  constructor(label?: string) {
    this.id = ++_sequenceCounter;
    this.label = label ?? `sequence-${this.id}`;
  }

  /**
   * The sequence the caller is running on.
   */
  static current(): Sequence {
    return storage.getStore() ?? Sequence.main();
  }

  /**
   * The thread's default sequence, current outside any run().
   */
  static main(): Sequence {
    return (_main ??= new Sequence(`thread-${threadId}`));
  }

  /**
   * Whether this sequence is the caller's current one.
   */
  get isCurrent(): boolean {
    return Sequence.current() === this;
  }

  /**
   * Run `fn` on this sequence and return its result.
   *
   * Promises returned by `fn` keep running on this sequence until they settle.
   */
  run<R>(fn: () => R): R {
    return storage.run(this, fn);
  }

  toString(): string {
    return this.label;
  }
}
