/* TagObserver
 *
 * Turns a TagSource's add/remove notifications for one tag into two callback
 * streams: "entity now matches" and "entity no longer matches".
 *
 * Subscription steps:
 *  1. Replay: every entity already carrying the tag (and inside the ancestry
 *     scope, if any) gets its own deferred onAdd dispatch on a microtask.
 *     Setup therefore never re-enters the handler synchronously, and one
 *     failing handler cannot prevent the replay of the others.
 *  2. Live: onAdd / onRemove are bound to the source's tag-added and
 *     tag-removed streams, filtered by ancestry.
 *
 * Ordering:
 *  - A live add or remove for an entity cancels its pending replay, so an
 *    add is never delivered after that membership's remove.
 *  - A remove is delivered for every entity this subscription delivered as
 *    added, even if it has since left the ancestry scope.
 *  - Entities are delivered in the order the source emits them; nothing is
 *    batched or reordered across entities.
 *
 * unsubscribe() detaches both streams and drops replays that have not
 * started yet.
 */

import { toError } from '../errors/errors.js';
import type { Logger, TagListener, TagSource, Unsubscribe } from '../types/types.js';
import { createConsoleLogger, describeEntity } from './diagnostics.js';

export interface TagObserverOptions<E> {
  /** Restrict both streams to descendants of this entity. */
  ancestor?: E;

  /**
   * Replay entities that already carry the tag when onAdd is subscribed.
   * @default true
   */
  replay?: boolean;

  logger?: Logger;

  /**
   * Receives failures thrown by onAdd during replay. Defaults to an error
   * line on the logger.
   */
  onError?: (error: Error, entity: E) => void;
}

/**
 * Handle returned by {@link TagObserver.subscribe}.
 */
export interface TagSubscription {
  readonly active: boolean;
  unsubscribe(): void;
}

export class TagObserver<E> {
  private readonly ancestor: E | undefined;
  private readonly replay: boolean;
  private readonly logger: Logger;
  private readonly onError: ((error: Error, entity: E) => void) | undefined;

  constructor(
    private readonly source: TagSource<E>,
    readonly tag: string,
    options: TagObserverOptions<E> = {}
  ) {
    this.ancestor = options.ancestor;
    this.replay = options.replay ?? true;
    this.logger = options.logger ?? createConsoleLogger();
    this.onError = options.onError;
  }

  /**
   * Check whether an entity falls inside the ancestry scope, if one is set.
   */
  inScope(entity: E): boolean {
    return this.ancestor === undefined || this.source.isDescendantOf(entity, this.ancestor);
  }

  /**
   * Start observing.
   *
   * @param onAdd - Called for every entity that starts matching (and, on
   *   replay, for every entity that already matches)
   * @param onRemove - Called for every entity that stops matching
   */
  subscribe(onAdd?: TagListener<E>, onRemove?: TagListener<E>): TagSubscription {
    let active = true;
    const pending = new Set<E>();
    // Entities handed to onAdd and not yet removed
    const delivered = new Set<E>();
    const detach: Unsubscribe[] = [];

    if (onAdd) {
      if (this.replay) {
        for (const entity of this.source.getTagged(this.tag)) {
          if (!this.inScope(entity) || pending.has(entity)) continue;
          pending.add(entity);
          queueMicrotask(() => {
            if (!active || !pending.delete(entity)) return;
            delivered.add(entity);
            try {
              onAdd(entity);
            } catch (error) {
              this.reportReplayFailure(toError(error), entity);
            }
          });
        }
      }

      detach.push(
        this.source.onTagAdded(this.tag, (entity) => {
          if (!active || !this.inScope(entity)) return;
          pending.delete(entity);
          delivered.add(entity);
          onAdd(entity);
        })
      );
    }

    detach.push(
      this.source.onTagRemoved(this.tag, (entity) => {
        if (!active) return;
        // Remove supersedes a replay that has not run yet
        pending.delete(entity);
        const wasDelivered = delivered.delete(entity);
        if (onRemove && (wasDelivered || this.inScope(entity))) onRemove(entity);
      })
    );

    return {
      get active() {
        return active;
      },
      unsubscribe: () => {
        if (!active) return;
        active = false;
        pending.clear();
        delivered.clear();
        for (const fn of detach) fn();
      },
    };
  }

  /**
   * Observe with plain handler functions. Same as {@link subscribe}.
   */
  watchWithHandler(onAdd: TagListener<E>, onRemove?: TagListener<E>): TagSubscription {
    return this.subscribe(onAdd, onRemove);
  }

  /**
   * Keep `collection` in sync with the set of matching entities: adds append,
   * removes delete the first occurrence.
   *
   * @example
   * ```typescript
   * const enemies: Model[] = [];
   * const sub = new TagObserver(source, 'Enemy').watchIntoCollection(enemies);
   * ```
   */
  watchIntoCollection(collection: E[]): TagSubscription {
    return this.subscribe(
      (entity) => {
        collection.push(entity);
      },
      (entity) => {
        const index = collection.indexOf(entity);
        if (index !== -1) collection.splice(index, 1);
      }
    );
  }

  private reportReplayFailure(error: Error, entity: E): void {
    if (this.onError) {
      this.onError(error, entity);
      return;
    }
    const name = describeEntity(this.source, entity);
    this.logger.error(`Replay of '${this.tag}' failed for ${name}: ${error.message}`, error);
  }
}
