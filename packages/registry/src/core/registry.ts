/*
 * Registry: tag-driven object lifecycle manager.
 *
 * A registry is bound to one tag. It observes the tag through a TagObserver
 * and keeps exactly one managed object per tagged entity:
 *
 *  - apply(entity)  filter → resolve class → mint GUID → construct → record
 *                   → init → make sure the entity carries the tag
 *  - revoke(entity) drop GUID → release the object's ResourceScope → destroy
 *                   hook → strip the object → forget the entity
 *  - destroy()      revoke everything, then release the registry's own scope
 *                   (which holds the observer subscription)
 *
 * Failure policy: user code (filter, resolver, GUID generator, construct and
 * every hook) is isolated. Entity-level failures are reported through the
 * logger when `debug` is on and never escape apply/revoke/call. Only misuse
 * of the registry itself (bad config, use after destroy) throws.
 *
 * State: Watching (from construction) → Destroyed (terminal). Entities cycle
 * Untracked → Tracked → Untracked independently.
 */
import { randomUUID } from 'node:crypto';

import {
  ConstructionError,
  InvalidRegistryConfigError,
  RegistryDestroyedError,
  toError,
} from '../errors/errors.js';
import type {
  ClassDescriptor,
  ClassLike,
  Logger,
  MetadataStore,
  MethodNames,
  RegistryConfig,
  TagSource,
} from '../types/types.js';
import { resolveMethodNames, toDescriptor } from './class-descriptor.js';
import { createConsoleLogger, describeEntity } from './diagnostics.js';
import { ResourceScope } from './resource-scope.js';
import { invokeHook, invokeMethod, type InvokeOptions, type InvokeResult } from './safe-invoker.js';
import { TagObserver } from './tag-observer.js';

// ---------- Defaults ----------
const DEFAULT_OPTIONS = Object.freeze({
  debug: false,
  logging: false,
  autoInit: true,
  replay: true,
  clearOnRevoke: true,
  guidAttribute: 'GUID',
  generateGuid: (prefix: string): string => `${prefix}-${randomUUID()}`,
});

/**
 * Options after defaults have been merged in.
 */
interface ResolvedOptions<E, T> {
  readonly methods: Readonly<MethodNames>;
  readonly context: unknown;
  readonly debug: boolean;
  readonly logging: boolean;
  readonly autoInit: boolean;
  readonly replay: boolean;
  readonly clearOnRevoke: boolean;
  readonly guid: string | undefined;
  readonly guidAttribute: string;
  readonly generateGuid: (prefix: string) => string;
  readonly filter: ((entity: E) => boolean) | undefined;
  readonly resolver: ((entity: E) => ClassLike<E, T> | undefined) | undefined;
  readonly ancestor: E | undefined;
  readonly logger: Logger;
}

/**
 * Everything the registry holds for one tracked entity.
 */
interface TrackedEntry<E, T> {
  readonly object: T;
  readonly scope: ResourceScope;
  readonly guid: string | undefined;
  readonly descriptor: ClassDescriptor<E, T>;
}

/**
 * Strip a revoked object so stale references cannot keep using it:
 * own properties are deleted, the prototype is detached and the object frozen.
 */
function retire(object: unknown): void {
  if (typeof object !== 'object' || object === null || Object.isFrozen(object)) return;
  for (const key of Reflect.ownKeys(object)) {
    Reflect.deleteProperty(object, key);
  }
  if (Object.isExtensible(object)) Object.setPrototypeOf(object, null);
  Object.freeze(object);
}

export class Registry<E, T> {
  readonly tag: string;

  private readonly source: TagSource<E>;
  private readonly metadata: MetadataStore<E> | undefined;
  private readonly defaultClass: ClassDescriptor<E, T> | undefined;
  private readonly options: ResolvedOptions<E, T>;
  private readonly hookOptions: InvokeOptions;
  private readonly observer: TagObserver<E>;

  // Owns the observer subscription; released last by destroy()
  private readonly scope = new ResourceScope();

  // Identity indices
  private readonly entries = new Map<E, TrackedEntry<E, T>>();
  private readonly guidIndex = new Map<string, E>();

  // Entities between filter and record; nested apply() calls for them are no-ops
  private readonly applying = new Set<E>();

  // Class-based descriptors are normalized once per class
  private readonly classCache = new WeakMap<object, ClassDescriptor<E, T>>();

  private watching = false;
  private destroying = false;
  private destroyed = false;

  /**
   * Create a registry and start observing its tag immediately.
   *
   * Already-tagged entities are applied on the next microtask unless
   * `replay` is false.
   *
   * @throws {InvalidRegistryConfigError} if the configuration is malformed
   * @throws {InvalidClassDescriptorError} if the default class is malformed
   *
   * @example
   * ```typescript
   * const enemies = new Registry({
   *   source: world,
   *   metadata: world,
   *   tag: 'Enemy',
   *   class: Enemy,
   *   guid: 'enemy',
   * });
   * ```
   */
  constructor(config: RegistryConfig<E, T>) {
    this._validateConfig(config);

    this.tag = config.tag;
    this.source = config.source;
    this.metadata = config.metadata;
    this.options = this._resolveOptions(config);
    this.hookOptions = Object.freeze({ debug: this.options.debug, logger: this.options.logger });
    this.defaultClass =
      config.class === undefined ? undefined : toDescriptor(config.class, this.options.methods);

    this.observer = new TagObserver(this.source, this.tag, {
      ancestor: this.options.ancestor,
      replay: this.options.replay,
      logger: this.options.logger,
    });

    // One-time startup hook, only for the default class
    const startupClass = this.defaultClass;
    if (startupClass?.startup) {
      invokeHook(
        this._className(startupClass),
        'startup',
        startupClass.startup,
        startupClass,
        [this, this.options.context],
        this.hookOptions
      );
    }

    // startup may have destroyed the registry already
    if (this.destroyed) return;
    this._watch();
  }

  /**
   * Check whether destroy() has run.
   */
  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Number of tracked entities.
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Name used in diagnostics.
   */
  getName(): string {
    return `Registry(${this.tag})`;
  }

  /**
   * Snapshot of every tracked entity and its object.
   *
   * Iteration order is not part of the contract.
   */
  getAll(): ReadonlyMap<E, T> {
    const snapshot = new Map<E, T>();
    for (const [entity, entry] of this.entries) {
      snapshot.set(entity, entry.object);
    }
    return snapshot;
  }

  getObject(entity: E): T | undefined {
    return this.entries.get(entity)?.object;
  }

  getObjectByGuid(guid: string): T | undefined {
    if (!this.guidIndex.has(guid)) return undefined;
    const entity = this.guidIndex.get(guid);
    return entity === undefined ? undefined : this.getObject(entity);
  }

  /**
   * GUID assigned to a tracked entity, if GUIDs are enabled.
   */
  getGuid(entity: E): string | undefined {
    return this.entries.get(entity)?.guid;
  }

  has(entity: E): boolean {
    return this.entries.has(entity);
  }

  /**
   * Create and start tracking the object for `entity`.
   *
   * @returns The new object, or undefined when the entity is already tracked,
   *   filtered out, has no class, failed to construct, or was revoked by init
   * @throws {RegistryDestroyedError} if the registry has been destroyed
   */
  apply(entity: E): T | undefined {
    this._assertNotDestroyed();
    if (this.destroying || this.entries.has(entity) || this.applying.has(entity)) {
      return undefined;
    }

    this.applying.add(entity);
    try {
      return this._apply(entity);
    } finally {
      this.applying.delete(entity);
    }
  }

  private _apply(entity: E): T | undefined {
    const { filter, debug, logger } = this.options;
    if (filter) {
      const verdict = invokeHook(
        this.getName(),
        'filter',
        filter,
        undefined,
        [entity],
        this.hookOptions
      );
      if (!verdict.ok || !verdict.value) return undefined;
    }

    const name = this._describe(entity);
    const scope = new ResourceScope();

    const descriptor = this._resolveClass(entity);
    if (!descriptor) {
      this._releaseScope(scope, name);
      if (debug) logger.warn(`No class could be resolved for ${name} (${this.tag})`);
      return undefined;
    }

    let guid: string | undefined;
    if (this.options.guid !== undefined) {
      guid = this._mintGuid(this.options.guid, name);
      if (guid === undefined) {
        this._releaseScope(scope, name);
        return undefined;
      }
    }

    let object: T;
    try {
      object = descriptor.construct(entity, scope, guid);
    } catch (cause) {
      this._releaseScope(scope, name);
      if (debug) {
        logger.warn(new ConstructionError(name, this._className(descriptor), cause).message);
      }
      return undefined;
    }

    this.entries.set(entity, { object, scope, guid, descriptor });
    if (guid !== undefined) {
      this.guidIndex.set(guid, entity);
      this.metadata?.setAttribute(entity, this.options.guidAttribute, guid);
    }

    if (this.options.autoInit) {
      invokeHook(
        this._className(descriptor),
        'init',
        descriptor.init,
        descriptor,
        [object],
        this.hookOptions
      );
    }

    // init may have revoked the entity
    if (this.entries.get(entity)?.object !== object) return undefined;

    if (this.options.logging) logger.info(`Added entity: ${name} (${this.tag})`);

    // Registration may come from outside the tag stream; tag the entity so
    // the source's view matches. The resulting add notification is a no-op.
    if (!this.source.hasTag(entity, this.tag)) {
      this.source.addTag(entity, this.tag);
    }

    return object;
  }

  /**
   * Stop tracking `entity` and tear its object down. No-op when untracked.
   *
   * The entity keeps its tag; removing the tag is the caller's business.
   *
   * @throws {RegistryDestroyedError} if the registry has been destroyed
   */
  revoke(entity: E): void {
    this._assertNotDestroyed();
    const entry = this.entries.get(entity);
    if (!entry) return;

    // Forget first so re-entrant revokes from hooks are no-ops
    this.entries.delete(entity);

    const name = this._describe(entity);
    if (entry.guid !== undefined) {
      this.guidIndex.delete(entry.guid);
      this.metadata?.setAttribute(entity, this.options.guidAttribute, undefined);
    }

    this._releaseScope(entry.scope, name);

    invokeHook(
      this._className(entry.descriptor),
      'destroy',
      entry.descriptor.destroy,
      entry.descriptor,
      [entry.object],
      this.hookOptions
    );

    if (this.options.clearOnRevoke) retire(entry.object);

    if (this.options.logging) this.options.logger.info(`Removed entity: ${name} (${this.tag})`);
  }

  /**
   * Call `methodName` on `object`, isolating failures.
   *
   * @throws {RegistryDestroyedError} if the registry has been destroyed
   */
  call(object: T, methodName: string, ...args: unknown[]): InvokeResult {
    this._assertNotDestroyed();
    return invokeMethod(object, methodName, args, this.hookOptions);
  }

  /**
   * Call `methodName` on every tracked object, over a snapshot taken before
   * the first call.
   *
   * @returns One result per object, in snapshot order
   * @throws {RegistryDestroyedError} if the registry has been destroyed
   */
  callAll(methodName: string, ...args: unknown[]): InvokeResult[] {
    this._assertNotDestroyed();
    const objects = Array.from(this.entries.values(), (entry) => entry.object);
    return objects.map((object) => invokeMethod(object, methodName, args, this.hookOptions));
  }

  /**
   * Revoke every tracked entity and detach from the tag source.
   *
   * Safe to call multiple times - subsequent calls are no-ops.
   */
  destroy(): void {
    if (this.destroyed || this.destroying) return;
    this.destroying = true;

    // Hooks may tag further entities; apply() refuses while destroying
    for (const entity of Array.from(this.entries.keys())) {
      this.revoke(entity);
    }

    this._releaseScope(this.scope, this.getName());
    this.destroyed = true;
  }

  private _watch(): void {
    if (this.watching) return;
    this.watching = true;

    const subscription = this.observer.subscribe(
      (entity) => {
        this.apply(entity);
      },
      (entity) => {
        this.revoke(entity);
      }
    );
    this.scope.add(subscription);
  }

  private _assertNotDestroyed(): void {
    if (this.destroyed) throw new RegistryDestroyedError(this.tag);
  }

  private _validateConfig(config: RegistryConfig<E, T>): void {
    if (typeof config !== 'object' || config === null) {
      throw new InvalidRegistryConfigError('config must be an object');
    }
    if (typeof config.tag !== 'string' || config.tag === '') {
      throw new InvalidRegistryConfigError('tag must be a non-empty string');
    }
    const source: unknown = config.source;
    if (
      typeof source !== 'object' ||
      source === null ||
      !('getTagged' in source && typeof source.getTagged === 'function') ||
      !('onTagAdded' in source && typeof source.onTagAdded === 'function') ||
      !('onTagRemoved' in source && typeof source.onTagRemoved === 'function')
    ) {
      throw new InvalidRegistryConfigError('source must implement TagSource');
    }
    if (config.guid !== undefined && (typeof config.guid !== 'string' || config.guid === '')) {
      throw new InvalidRegistryConfigError('guid prefix must be a non-empty string');
    }
    for (const key of ['filter', 'resolver', 'generateGuid'] as const) {
      if (config[key] !== undefined && typeof config[key] !== 'function') {
        throw new InvalidRegistryConfigError(`${key} must be a function`);
      }
    }
  }

  /**
   * Merge caller options over the defaults. A field the caller set always
   * wins; only absent (undefined) fields take the default.
   */
  private _resolveOptions(config: RegistryConfig<E, T>): ResolvedOptions<E, T> {
    return Object.freeze({
      methods: resolveMethodNames(config.methods),
      context: config.context,
      debug: config.debug ?? DEFAULT_OPTIONS.debug,
      logging: config.logging ?? DEFAULT_OPTIONS.logging,
      autoInit: config.autoInit ?? DEFAULT_OPTIONS.autoInit,
      replay: config.replay ?? DEFAULT_OPTIONS.replay,
      clearOnRevoke: config.clearOnRevoke ?? DEFAULT_OPTIONS.clearOnRevoke,
      guid: config.guid,
      guidAttribute: config.guidAttribute ?? DEFAULT_OPTIONS.guidAttribute,
      generateGuid: config.generateGuid ?? DEFAULT_OPTIONS.generateGuid,
      filter: config.filter,
      resolver: config.resolver,
      ancestor: config.ancestor,
      logger: config.logger ?? createConsoleLogger(),
    });
  }

  /**
   * Pick the class for an entity: resolver first, then the default class.
   */
  private _resolveClass(entity: E): ClassDescriptor<E, T> | undefined {
    const { resolver } = this.options;
    if (!resolver) return this.defaultClass;

    const result = invokeHook(
      this.getName(),
      'resolver',
      resolver,
      undefined,
      [entity],
      this.hookOptions
    );
    if (!result.ok || result.value === undefined) return this.defaultClass;

    const resolved = result.value;
    const cached = this.classCache.get(resolved);
    if (cached) return cached;

    try {
      const descriptor = toDescriptor(resolved, this.options.methods);
      this.classCache.set(resolved, descriptor);
      return descriptor;
    } catch (error) {
      if (this.options.debug) this.options.logger.warn(toError(error).message);
      return undefined;
    }
  }

  /**
   * Produce a GUID that is not currently in use.
   *
   * @returns undefined when the generator throws, returns a non-string, or
   *   collides with a live GUID
   */
  private _mintGuid(prefix: string, name: string): string | undefined {
    const { debug, logger } = this.options;
    const result = invokeHook(
      this.getName(),
      'generateGuid',
      this.options.generateGuid,
      undefined,
      [prefix],
      this.hookOptions
    );
    if (!result.ok) return undefined;

    const guid = result.value;
    if (typeof guid !== 'string' || guid === '') {
      if (debug) logger.warn(`GUID generator returned an invalid value for ${name}`);
      return undefined;
    }
    if (this.guidIndex.has(guid)) {
      if (debug) logger.warn(`GUID '${guid}' is already assigned; ${name} was not applied`);
      return undefined;
    }
    return guid;
  }

  private _releaseScope(scope: ResourceScope, name: string): void {
    try {
      scope.destroy();
    } catch (error) {
      if (this.options.debug) {
        const reason = toError(error).message;
        this.options.logger.warn(`Releasing resources of ${name} failed: ${reason}`);
      }
    }
  }

  private _describe(entity: E): string {
    return describeEntity(this.source, entity);
  }

  private _className(descriptor: ClassDescriptor<E, T>): string {
    return descriptor.name ?? this.getName();
  }
}
