import { describe, expect, it } from 'vitest';

import { HandleSet } from '../src/core/handle-set.js';
import { ErasedHandle } from '../src/core/weak-handle.js';
import { Circle, CircleTag, Note, NoteTag, ShapeTag } from './fixtures.js';

describe('HandleSet', () => {
  it('holds each subject once, whatever the view', () => {
    const circle = Circle.create(1);
    const set = new HandleSet();

    expect(set.add(circle.value.issueAs(CircleTag))).toBe(true);
    expect(set.add(circle.value.issueAs(ShapeTag))).toBe(false);
    expect(set.add(circle.value.asWeakHandle().erase())).toBe(false);
    expect(set.size).toBe(1);
  });

  it('stores handles of unrelated types side by side', () => {
    const circle = Circle.create(1);
    const note = Note.create('hi');
    const set = new HandleSet();
    set.add(circle.value.issueAs(CircleTag));
    set.add(note.value.issueAs(NoteTag));

    const members = [...set];
    expect(members).toHaveLength(2);
    expect(members.every((member) => member instanceof ErasedHandle)).toBe(true);
    expect(members.map((member) => member.resolve())).toEqual(
      expect.arrayContaining([circle.value, note.value])
    );
  });

  it('looks members up by equality', () => {
    const circle = Circle.create(1);
    const other = Circle.create(2);
    const set = new HandleSet();
    set.add(circle.value.issueAs(CircleTag));

    expect(set.has(circle.value.issueAs(ShapeTag))).toBe(true);
    expect(set.has(other.value.issueAs(CircleTag))).toBe(false);
  });

  it('deletes and resets members', () => {
    const circle = Circle.create(1);
    const set = new HandleSet();
    set.add(circle.value.issueAs(CircleTag));

    expect(set.delete(circle.value.issueAs(CircleTag))).toBe(true);
    expect(set.delete(circle.value.issueAs(CircleTag))).toBe(false);
    expect(set.size).toBe(0);
    expect(set.has(circle.value.issueAs(CircleTag))).toBe(false);
  });

  it('prunes members whose subjects are gone', () => {
    const kept = Circle.create(1);
    const dropped = Circle.create(2);
    const set = new HandleSet();
    set.add(kept.value.issueAs(CircleTag));
    set.add(dropped.value.issueAs(CircleTag));
    dropped.release();

    expect(set.prune()).toBe(1);
    expect(set.size).toBe(1);
    expect([...set][0]?.resolve()).toBe(kept.value);
    expect(set.prune()).toBe(2);
    expect(set.size).toBe(0);
  });

  it('returns validity leases when cleared', () => {
    const circle = Circle.create(1);
    const set = new HandleSet();
    const handle = circle.value.issueAs(CircleTag);
    set.add(handle);
    handle.reset();
    expect(circle.value.hasWeakHandles()).toBe(true);

    set.clear();

    expect(set.size).toBe(0);
    expect(circle.value.hasWeakHandles()).toBe(false);
  });

  it('forgets members reset during iteration', () => {
    const circle = Circle.create(1);
    const set = new HandleSet();
    const handle = circle.value.issueAs(CircleTag);
    set.add(handle);

    for (const member of set) member.reset();

    expect(set.size).toBe(0);
    expect(set.has(handle)).toBe(false);
    expect(set.add(handle)).toBe(true);
    expect(set.add(circle.value.issueAs(ShapeTag))).toBe(false);
    expect(set.size).toBe(1);
    expect(set.has(handle)).toBe(true);
  });

  it('yields every member once while the loop resets them', () => {
    const first = Circle.create(1);
    const second = Circle.create(2);
    const set = new HandleSet();
    set.add(first.value.issueAs(CircleTag));
    set.add(second.value.issueAs(CircleTag));

    const seen: unknown[] = [];
    for (const member of set) {
      seen.push(member.resolve());
      member.reset();
    }

    expect(seen).toEqual([first.value, second.value]);
    expect([...set]).toEqual([]);
    expect(set.prune()).toBe(2);
    expect(set.size).toBe(0);
  });
});
