import { describe, expect, it } from 'vitest';

import { HandleFactory } from '../src/core/factory.js';
import { SelfOwned, Shared } from '../src/core/ownership.js';
import { Sequence } from '../src/core/sequence.js';
import { typeTag } from '../src/core/type-tag.js';
import {
  AffinityViolationError,
  FactoryDisposedError,
  NotOwnedError,
  UnrelatedTypesError,
} from '../src/errors/errors.js';

class Session extends SelfOwned {
  readonly handles = new HandleFactory<Session>(this, SessionTag, { onViolation: 'throw' });

  protected constructor(readonly user: string) {
    super();
  }

  static create(user: string): Shared<Session> {
    return Shared.adopt(new Session(user));
  }

  static detached(user: string): Session {
    return new Session(user);
  }
}

class AdminSession extends Session {
  private constructor(user: string) {
    super(user);
  }

  static override create(user: string): Shared<AdminSession> {
    return Shared.adopt(new AdminSession(user));
  }
}

class Widget extends SelfOwned {}

const SessionTag = typeTag(Session);
const AdminSessionTag = typeTag(AdminSession, { extends: SessionTag });
const WidgetTag = typeTag(Widget);

describe('HandleFactory', () => {
  it('issues handles resolving to the subject', () => {
    const owner = Session.create('ada');
    const handle = owner.value.handles.issue();

    expect(handle.resolve()).toBe(owner.value);
    expect(handle.tag).toBe(SessionTag);
  });

  it('issues handles typed at a descendant view', () => {
    const owner = AdminSession.create('root');
    const handle = owner.value.handles.issueAs(AdminSessionTag);

    expect(handle.resolve()).toBe(owner.value);
    expect(handle.tag).toBe(AdminSessionTag);
  });

  it('resolves a descendant view to nothing when the subject does not satisfy it', () => {
    const owner = Session.create('ada');
    const handle = owner.value.handles.issueAs(AdminSessionTag);

    expect(handle.resolve()).toBeUndefined();
  });

  it('rejects views outside its own lineage', () => {
    const owner = Session.create('ada');
    const factory: HandleFactory<SelfOwned> = owner.value.handles;

    expect(() => factory.issueAs(WidgetTag)).toThrow(UnrelatedTypesError);
  });

  it('requires an adopted subject', () => {
    const orphan = Session.detached('nobody');

    expect(() => orphan.handles.issue()).toThrow(NotOwnedError);
  });

  it('revokes every issued handle on invalidate()', () => {
    const owner = Session.create('ada');
    const factory = owner.value.handles;
    const first = factory.issue();
    const second = factory.issue();

    factory.invalidate();

    expect(first.resolve()).toBeUndefined();
    expect(second.resolve()).toBeUndefined();
    expect(factory.issue().resolve()).toBe(owner.value);
  });

  it('starts each generation with no outstanding handles', () => {
    const owner = Session.create('ada');
    const factory = owner.value.handles;
    expect(factory.hasOutstanding()).toBe(false);

    const handle = factory.issue();
    expect(factory.hasOutstanding()).toBe(true);

    factory.invalidate();
    expect(factory.hasOutstanding()).toBe(false);

    const next = factory.issue();
    expect(factory.hasOutstanding()).toBe(true);
    next.reset();
    expect(factory.hasOutstanding()).toBe(false);
    expect(handle.hash()).not.toBe(0);
  });

  it('lets the next sequence take over after detachFromSequence()', () => {
    const owner = Session.create('ada');
    const factory = owner.value.handles;
    const handle = factory.issue();
    const jobs = new Sequence('jobs');
    const web = new Sequence('web');

    expect(jobs.run(() => handle.resolve())).toBe(owner.value);
    expect(() => web.run(() => handle.resolve())).toThrow(AffinityViolationError);

    factory.detachFromSequence();
    expect(web.run(() => handle.resolve())).toBe(owner.value);
    expect(() => jobs.run(() => handle.resolve())).toThrow(AffinityViolationError);
  });

  it('gives each generation its own affinity', () => {
    const owner = Session.create('ada');
    const factory = owner.value.handles;
    const jobs = new Sequence('jobs');
    const web = new Sequence('web');
    jobs.run(() => factory.issue().resolve());

    factory.invalidate();
    const fresh = factory.issue();

    expect(web.run(() => fresh.resolve())).toBe(owner.value);
  });

  it('refuses to issue or invalidate after dispose()', () => {
    const owner = Session.create('ada');
    const factory = owner.value.handles;
    const handle = factory.issue();

    factory.dispose();
    factory.dispose();

    expect(factory.isDisposed).toBe(true);
    expect(handle.resolve()).toBeUndefined();
    expect(() => factory.issue()).toThrow(FactoryDisposedError);
    expect(() => factory.invalidate()).toThrow(FactoryDisposedError);
  });

  it('validates its configuration', () => {
    const owner = Session.create('ada');

    expect(
      () => new HandleFactory<Session>(owner.value, SessionTag, { affinity: 'loose' } as never)
    ).toThrow('received');
    expect(owner.value.handles.config).toEqual({ affinity: 'checked', onViolation: 'throw' });
  });
});
