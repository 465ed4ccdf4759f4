import { SelfOwned, Shared } from '../src/core/ownership.js';
import { SubjectMixin } from '../src/core/subject.js';
import { rootTag, typeTag } from '../src/core/type-tag.js';

/**
 * Subject hierarchy shared by the handle tests:
 *
 *   ShapeSubject (mixin view)
 *     └─ Shape
 *          ├─ Circle
 *          └─ Square
 *
 *   Note (unrelated subject)
 */

export class Shape extends SubjectMixin(SelfOwned, {
  label: 'ShapeSubject',
  config: { onViolation: 'throw' },
}) {
  destroyCount = 0;

  protected constructor(readonly kind: string) {
    super();
  }

  protected override onDestroy(): void {
    this.destroyCount++;
    super.onDestroy();
  }
}

export class Circle extends Shape {
  private constructor(readonly radius: number) {
    super('circle');
  }

  static create(radius: number): Shared<Circle> {
    return Shared.adopt(new Circle(radius));
  }
}

export class Square extends Shape {
  private constructor(readonly side: number) {
    super('square');
  }

  static create(side: number): Shared<Square> {
    return Shared.adopt(new Square(side));
  }
}

export class Note extends SubjectMixin(SelfOwned, {
  label: 'NoteSubject',
  config: { onViolation: 'throw' },
}) {
  private constructor(readonly text: string) {
    super();
  }

  static create(text: string): Shared<Note> {
    return Shared.adopt(new Note(text));
  }
}

export const ShapeTag = typeTag(Shape, { extends: Shape.subjectTag });
export const CircleTag = typeTag(Circle, { extends: ShapeTag });
export const SquareTag = typeTag(Square, { extends: ShapeTag });
export const NoteTag = typeTag(Note, { extends: Note.subjectTag });

/** Root view covering every Shape, declared apart from the Shape lineage */
export const DrawableTag = rootTag('Drawable', (value): value is Shape => value instanceof Shape);
