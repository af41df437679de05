/**
 * In-memory TagSource / MetadataStore.
 *
 * Holds tags, attributes and parent links for arbitrary entity values and
 * dispatches tag notifications synchronously, in subscription order, to the
 * listeners of the affected tag. Suitable for hosts without their own tag
 * storage and as the stand-in environment in tests.
 *
 * @example
 * ```typescript
 * const world = new InMemoryTagSource<Model>({ describe: (m) => m.name });
 * const registry = new Registry({ source: world, metadata: world, tag: 'Enemy', class: Enemy });
 *
 * world.addTag(goblin, 'Enemy'); // registry applies goblin
 * world.removeEntity(goblin);    // registry revokes goblin
 * ```
 */

import type {
  AttributeValue,
  MetadataStore,
  TagListener,
  TagSource,
  Unsubscribe,
} from '../types/types.js';

export interface InMemoryTagSourceOptions<E> {
  /** Names entities in diagnostics. */
  describe?: (entity: E) => string;
}

export class InMemoryTagSource<E> implements TagSource<E>, MetadataStore<E> {
  /** tag -> entities carrying it, in tagging order */
  private readonly tagged = new Map<string, Set<E>>();
  private readonly attributes = new Map<E, Map<string, AttributeValue>>();
  private readonly parents = new Map<E, E>();
  private readonly addedListeners = new Map<string, Set<TagListener<E>>>();
  private readonly removedListeners = new Map<string, Set<TagListener<E>>>();
  private readonly describeEntity?: (entity: E) => string;

  constructor(options: InMemoryTagSourceOptions<E> = {}) {
    this.describeEntity = options.describe;
  }

  getTagged(tag: string): E[] {
    return Array.from(this.tagged.get(tag) ?? []);
  }

  hasTag(entity: E, tag: string): boolean {
    return this.tagged.get(tag)?.has(entity) ?? false;
  }

  /**
   * Tags currently attached to `entity`.
   */
  getTags(entity: E): string[] {
    const tags: string[] = [];
    for (const [tag, entities] of this.tagged) {
      if (entities.has(entity)) tags.push(tag);
    }
    return tags;
  }

  /**
   * Attach `tag` to `entity`. Re-tagging is a no-op and emits nothing.
   */
  addTag(entity: E, tag: string): void {
    let entities = this.tagged.get(tag);
    if (!entities) {
      entities = new Set();
      this.tagged.set(tag, entities);
    }
    if (entities.has(entity)) return;
    entities.add(entity);
    this.emit(this.addedListeners, tag, entity);
  }

  /**
   * Detach `tag` from `entity`. Removing an absent tag is a no-op.
   */
  removeTag(entity: E, tag: string): void {
    const entities = this.tagged.get(tag);
    if (!entities || !entities.delete(entity)) return;
    if (entities.size === 0) this.tagged.delete(tag);
    this.emit(this.removedListeners, tag, entity);
  }

  /**
   * Drop every tag (emitting removals), attribute and parent link of `entity`,
   * and detach its children.
   */
  removeEntity(entity: E): void {
    for (const tag of this.getTags(entity)) {
      this.removeTag(entity, tag);
    }
    this.attributes.delete(entity);
    this.parents.delete(entity);
    for (const [child, parent] of this.parents) {
      if (parent === entity) this.parents.delete(child);
    }
  }

  onTagAdded(tag: string, listener: TagListener<E>): Unsubscribe {
    return this.listen(this.addedListeners, tag, listener);
  }

  onTagRemoved(tag: string, listener: TagListener<E>): Unsubscribe {
    return this.listen(this.removedListeners, tag, listener);
  }

  /**
   * Set or clear the parent of `entity`.
   */
  setParent(entity: E, parent: E | undefined): void {
    if (parent === undefined) {
      this.parents.delete(entity);
      return;
    }
    if (parent === entity || this.isDescendantOf(parent, entity)) {
      throw new Error('Parent link would create a cycle.');
    }
    this.parents.set(entity, parent);
  }

  getParent(entity: E): E | undefined {
    return this.parents.get(entity);
  }

  isDescendantOf(entity: E, ancestor: E): boolean {
    let current = this.parents.get(entity);
    while (current !== undefined) {
      if (current === ancestor) return true;
      current = this.parents.get(current);
    }
    return false;
  }

  getAttribute(entity: E, name: string): AttributeValue | undefined {
    return this.attributes.get(entity)?.get(name);
  }

  setAttribute(entity: E, name: string, value: AttributeValue | undefined): void {
    let bag = this.attributes.get(entity);
    if (value === undefined) {
      bag?.delete(name);
      if (bag && bag.size === 0) this.attributes.delete(entity);
      return;
    }
    if (!bag) {
      bag = new Map();
      this.attributes.set(entity, bag);
    }
    bag.set(name, value);
  }

  describe(entity: E): string {
    return this.describeEntity ? this.describeEntity(entity) : String(entity);
  }

  /**
   * Number of listeners attached to `tag` across both streams.
   * Useful for testing.
   */
  listenerCount(tag: string): number {
    return (this.addedListeners.get(tag)?.size ?? 0) + (this.removedListeners.get(tag)?.size ?? 0);
  }

  private listen(
    table: Map<string, Set<TagListener<E>>>,
    tag: string,
    listener: TagListener<E>
  ): Unsubscribe {
    let listeners = table.get(tag);
    if (!listeners) {
      listeners = new Set();
      table.set(tag, listeners);
    }
    // Wrap so the same function can be subscribed twice independently
    const entry: TagListener<E> = (entity) => listener(entity);
    listeners.add(entry);

    return () => {
      const current = table.get(tag);
      if (!current) return;
      current.delete(entry);
      if (current.size === 0) table.delete(tag);
    };
  }

  private emit(table: Map<string, Set<TagListener<E>>>, tag: string, entity: E): void {
    const listeners = table.get(tag);
    if (!listeners) return;
    // Snapshot: listeners may unsubscribe while being notified
    for (const listener of Array.from(listeners)) {
      listener(entity);
    }
  }
}
