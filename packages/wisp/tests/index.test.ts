import { describe, expect, it } from 'vitest';

import {
  ErasedHandle,
  HandleFactory,
  HandleSet,
  NEUTRAL,
  SelfOwned,
  Sequence,
  Shared,
  SubjectMixin,
  TypeRegistry,
  Violation,
  WeakHandle,
  typeTag,
} from '../src/index.js';
import { HandleFactory as FactoryImpl } from '../src/core/factory.js';
import { HandleSet as HandleSetImpl } from '../src/core/handle-set.js';
import { NEUTRAL as NeutralImpl } from '../src/core/reinterpret.js';
import { Sequence as SequenceImpl } from '../src/core/sequence.js';
import { SubjectMixin as SubjectMixinImpl } from '../src/core/subject.js';
import { TypeRegistry as RegistryImpl } from '../src/registry/type-registry.js';
import { Violation as ViolationImpl } from '../src/types/types.js';
import { ErasedHandle as ErasedImpl, WeakHandle as WeakImpl } from '../src/core/weak-handle.js';

describe('package public index', () => {
  it('re-exports core api surface', () => {
    expect(HandleFactory).toBe(FactoryImpl);
    expect(HandleSet).toBe(HandleSetImpl);
    expect(NEUTRAL).toBe(NeutralImpl);
    expect(Sequence).toBe(SequenceImpl);
    expect(SubjectMixin).toBe(SubjectMixinImpl);
    expect(TypeRegistry).toBe(RegistryImpl);
    expect(Violation).toBe(ViolationImpl);
    expect(WeakHandle).toBe(WeakImpl);
    expect(ErasedHandle).toBe(ErasedImpl);
    expect(typeof SelfOwned).toBe('function');
    expect(typeof Shared.adopt).toBe('function');
    expect(typeof typeTag).toBe('function');
  });
});
