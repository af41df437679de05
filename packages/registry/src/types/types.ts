import type { Registry } from '../core/registry.js';
import type { ResourceScope } from '../core/resource-scope.js';

/**
 * Function returned by subscriptions; calling it detaches the listener.
 */
export type Unsubscribe = () => void;

/**
 * Listener invoked with the entity whose tag membership changed.
 */
export type TagListener<E> = (entity: E) => void;

/**
 * Event source and tag storage consumed by observers and registries.
 *
 * Implementations are expected to dispatch synchronously on the caller's
 * thread; `onTagAdded` fires after the tag is attached and `onTagRemoved`
 * after it is detached.
 */
export interface TagSource<E> {
  /** Entities currently carrying `tag`. */
  getTagged(tag: string): Iterable<E>;
  hasTag(entity: E, tag: string): boolean;
  addTag(entity: E, tag: string): void;
  onTagAdded(tag: string, listener: TagListener<E>): Unsubscribe;
  onTagRemoved(tag: string, listener: TagListener<E>): Unsubscribe;
  /** True when `ancestor` is a strict ancestor of `entity`. */
  isDescendantOf(entity: E, ancestor: E): boolean;
  /** Human-readable name used in diagnostics. */
  describe?(entity: E): string;
}

export type AttributeValue = string | number | boolean;

/**
 * Durable per-entity attributes. The registry only writes the GUID attribute.
 */
export interface MetadataStore<E> {
  getAttribute(entity: E, name: string): AttributeValue | undefined;
  setAttribute(entity: E, name: string, value: AttributeValue | undefined): void;
}

/**
 * Cleanup function registered on a resource scope.
 */
export type CleanupFn = () => void;

/**
 * Anything a ResourceScope knows how to release.
 *
 * Objects are released through the first of `dispose`, `destroy`,
 * `unsubscribe` or `disconnect` they implement.
 */
export type Resource =
  | CleanupFn
  | { dispose(): void }
  | { destroy(): void }
  | { unsubscribe(): void }
  | { disconnect(): void };

/**
 * Capability record describing how to build and tear down managed objects.
 *
 * @template E - Entity type handed out by the tag source
 * @template T - Managed object type
 *
 * @example
 * ```typescript
 * const Enemy = defineClass<Model, EnemyState>({
 *   name: 'Enemy',
 *   construct: () => ({ hp: 100, started: false }),
 *   init: (enemy) => {
 *     enemy.started = true;
 *   },
 * });
 * ```
 */
export interface ClassDescriptor<E, T> {
  /** Label used in diagnostics. */
  readonly name?: string;
  /** Builds the object for `entity`. May throw; the apply is then aborted. */
  construct(entity: E, scope: ResourceScope, guid: string | undefined): T;
  init?(object: T): void;
  destroy?(object: T): void;
  /** Runs once when a registry is created with this class as its default. */
  startup?(registry: Registry<E, T>, context: unknown): void;
}

/**
 * Plain class accepted in place of a descriptor. Hooks are looked up by name,
 * see {@link MethodNames}.
 */
export type ManagedClass<E, T> = new (
  entity: E,
  scope: ResourceScope,
  guid: string | undefined
) => T;

export type ClassLike<E, T> = ClassDescriptor<E, T> | ManagedClass<E, T>;

/**
 * Method names used when a {@link ManagedClass} is turned into a descriptor.
 *
 *  - construct: static factory on the class, `'new'` means the class constructor
 *  - init / destroy: instance methods
 *  - startup: static method receiving (registry, context)
 */
export interface MethodNames {
  construct: string;
  init: string;
  destroy: string;
  startup: string;
}

/**
 * Diagnostic sink. Lines are human-readable, not a machine protocol.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface RegistryOptions<E, T> {
  /** Hook names for class-based descriptors. Missing fields fall back to defaults. */
  methods?: Partial<MethodNames>;

  /** Value handed to the startup hook. */
  context?: unknown;

  /**
   * Emit warnings for unresolved classes, construction failures and hook failures.
   * @default false
   */
  debug?: boolean;

  /**
   * Emit a notice for every apply and revoke.
   * @default false
   */
  logging?: boolean;

  /**
   * Run the init hook right after construction.
   * @default true
   */
  autoInit?: boolean;

  /** Gate deciding whether an entity may be applied at all. */
  filter?: (entity: E) => boolean;

  /** Picks the class for an entity, overriding the registry's default class. */
  resolver?: (entity: E) => ClassLike<E, T> | undefined;

  /** GUID prefix. When set, every applied entity receives a GUID. */
  guid?: string;

  /**
   * Attribute the GUID is persisted under.
   * @default 'GUID'
   */
  guidAttribute?: string;

  /** GUID generator. Defaults to `${prefix}-${randomUUID()}`. */
  generateGuid?: (prefix: string) => string;

  /** Only manage entities that descend from this entity. */
  ancestor?: E;

  /**
   * Apply entities that are already tagged when the registry starts.
   * @default true
   */
  replay?: boolean;

  /**
   * Strip and freeze objects once revoked so stale references cannot mutate them.
   * @default true
   */
  clearOnRevoke?: boolean;

  logger?: Logger;
}

/**
 * Registry configuration passed to the constructor.
 */
export interface RegistryConfig<E, T> extends RegistryOptions<E, T> {
  /** Tag event source driving the registry. */
  source: TagSource<E>;

  /** Tag this registry manages. */
  tag: string;

  /** Default class, used when no resolver is configured or it returns nothing. */
  class?: ClassLike<E, T>;

  /** Attribute store receiving GUIDs. GUIDs are kept in memory only without it. */
  metadata?: MetadataStore<E>;
}
