export { SubjectMixin } from './core/subject.js';
export type { SubjectOptions } from './core/subject.js';
export { HandleFactory } from './core/factory.js';
export { ErasedHandle, Handle, WeakHandle, compareHandles } from './core/weak-handle.js';
export type { Binding } from './core/weak-handle.js';
export { HandleSet } from './core/handle-set.js';

export { Lifeline, SelfOwned, Shared, lifelineOf } from './core/ownership.js';
export type { SelfOwning } from './core/ownership.js';

export * from './core/type-tag.js';
export { NEUTRAL, describeView, reinterpret, widerView } from './core/reinterpret.js';
export type { Neutral, View } from './core/reinterpret.js';
export { TypeRegistry } from './registry/type-registry.js';

export { Sequence } from './core/sequence.js';
export { PermissiveAffinity, SequenceAffinity, createAffinityToken } from './core/affinity.js';
export type { AffinityToken } from './core/affinity.js';
export { FlagLease, ValidityFlag } from './core/validity-flag.js';
export { NULL_ADDRESS, addressOf } from './core/identity.js';
export type { Address } from './core/identity.js';

export { defaultConfig, resolveConfig, setDefaultConfig } from './core/config.js';
export { Affinity, Violation } from './types/types.js';
export type {
  AffinityMode,
  ClassLike,
  Constructor,
  HandleConfig,
  ViolationPolicy,
} from './types/types.js';

// Errors
export {
  AffinityViolationError,
  AggregateDestroyError,
  AlreadyOwnedError,
  EmptyHandleError,
  FactoryDisposedError,
  InvalidHandleConfigError,
  InvalidHierarchyCastError,
  NotOwnedError,
  OwnerReleasedError,
  TypeTagCollisionError,
  UnrelatedTypesError,
} from './errors/errors.js';
export type { HierarchyCastReason } from './errors/errors.js';
