import type { Constructor, HandleConfig } from '../types/types.js';
import { HandleFactory } from './factory.js';
import type { SelfOwned } from './ownership.js';
import { typeTag, type TypeTag } from './type-tag.js';
import type { WeakHandle } from './weak-handle.js';

export interface SubjectOptions {
  /** Label of the subject view (defaults to the base class name) */
  label?: string;

  /** Affinity mode and violation policy of every instance's factory */
  config?: Partial<HandleConfig>;
}

/**
 * Make `Base` a handle-issuing subject.
 *
 * The returned class composes the base's self-ownership with exactly one
 * {@link HandleFactory}. `Base` must construct {@link SelfOwned} instances;
 * anything else is rejected by the compiler.
 *
 * Handles from asWeakHandle() view the subject through the mixin's own tag,
 * `subjectTag`. Declare subclasses with `extends: X.subjectTag` and use
 * issueAs() to hand out handles typed at the subclass.
 *
 * The factory is disposed when the subject is destroyed.
 *
 * @example
 * ```typescript
 * class Document extends SubjectMixin(SelfOwned) {
 *   private constructor(readonly title: string) {
 *     super();
 *   }
 *
 *   static create(title: string): Shared<Document> {
 *     return Shared.adopt(new Document(title));
 *   }
 * }
 * const DocumentTag = typeTag(Document, { extends: Document.subjectTag });
 *
 * const owner = Document.create('notes');
 * const handle = owner.value.issueAs(DocumentTag); // WeakHandle<Document>
 * owner.release();                                 // handle.resolve() === undefined
 * ```
 */
export function SubjectMixin<TBase extends Constructor<SelfOwned>>(
  Base: TBase,
  options: SubjectOptions = {}
) {
  abstract class Subject extends Base {
    /** View shared by every handle this subject class issues */
    static readonly subjectTag: TypeTag<Subject> = typeTag(Subject, {
      label: options.label ?? Base.name,
    });

    /**
     * A handle typed at `tag` for `subject`; shorthand for
     * `subject.issueAs(tag)`.
     */
    static weakHandleOf<D extends Subject>(subject: D, tag: TypeTag<D>): WeakHandle<D> {
      return subject.issueAs(tag);
    }

    readonly weakHandles: HandleFactory<Subject>;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.weakHandles = new HandleFactory<Subject>(this, Subject.subjectTag, options.config);
    }

    asWeakHandle(): WeakHandle<Subject> {
      return this.weakHandles.issue();
    }

    /**
     * A handle typed at a subclass of this subject, sharing the generation
     * of asWeakHandle().
     */
    issueAs<D extends Subject>(tag: TypeTag<D>): WeakHandle<D> {
      return this.weakHandles.issueAs(tag);
    }

    invalidateWeakHandles(): void {
      this.weakHandles.invalidate();
    }

    hasWeakHandles(): boolean {
      return this.weakHandles.hasOutstanding();
    }

    /**
     * Unbind handles from their sequence so the next resolving sequence
     * takes over, e.g. after handing the subject to another job.
     */
    detachAffinity(): void {
      this.weakHandles.detachFromSequence();
    }

    protected override onDestroy(): void {
      this.weakHandles.dispose();
      super.onDestroy();
    }
  }
  return Subject;
}
