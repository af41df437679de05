export { Registry } from './core/registry.js';
export { ResourceScope } from './core/resource-scope.js';
export { TagObserver } from './core/tag-observer.js';
export type { TagObserverOptions, TagSubscription } from './core/tag-observer.js';
export { invokeHook, invokeMethod } from './core/safe-invoker.js';
export type { InvokeOptions, InvokeResult } from './core/safe-invoker.js';
export {
  DEFAULT_METHODS,
  defineClass,
  fromClass,
  isClassDescriptor,
  resolveMethodNames,
  toDescriptor,
} from './core/class-descriptor.js';
export { LOG_PREFIX, createConsoleLogger } from './core/diagnostics.js';

export { InMemoryTagSource } from './sources/in-memory-tag-source.js';
export type { InMemoryTagSourceOptions } from './sources/in-memory-tag-source.js';

export type {
  AttributeValue,
  ClassDescriptor,
  ClassLike,
  CleanupFn,
  Logger,
  ManagedClass,
  MetadataStore,
  MethodNames,
  RegistryConfig,
  RegistryOptions,
  Resource,
  TagListener,
  TagSource,
  Unsubscribe,
} from './types/types.js';

// Errors
export {
  ConstructionError,
  HookInvocationError,
  InvalidClassDescriptorError,
  InvalidRegistryConfigError,
  RegistryDestroyedError,
  ResourceReleaseError,
  ScopeDisposedError,
} from './errors/errors.js';
