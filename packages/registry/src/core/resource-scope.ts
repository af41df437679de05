/* ResourceScope
 *
 * Append-only disposal group owned by exactly one managed object.
 *
 * Purpose:
 *  - Give every object a single place to park subscriptions, timers and
 *    nested scopes that must not outlive it
 *  - Release everything exactly once when the object is revoked
 *
 * Design:
 *  - Lazy initialization: the resource list is only allocated on first add()
 *  - destroy() releases members in reverse registration order (LIFO)
 *  - Each release is isolated; failures are collected and reported together
 *    through ResourceReleaseError after every member has been released
 *  - destroy() is idempotent; add() after destroy() is a misuse error
 *
 * Usage example:
 * ```typescript
 * construct(model, scope) {
 *   const door = new Door(model);
 *   scope.add(bus.subscribe('open', () => door.open()));
 *   scope.addInterval(() => door.tick(), 1000);
 *   scope.add(() => door.reset());
 *   return door;
 * }
 * ```
 */

import { ResourceReleaseError, ScopeDisposedError, toError } from '../errors/errors.js';
import type { Resource } from '../types/types.js';

/**
 * Release a single resource using whichever cleanup method it exposes.
 */
function release(resource: Resource): void {
  if (typeof resource === 'function') {
    resource();
  } else if ('dispose' in resource) {
    resource.dispose();
  } else if ('destroy' in resource) {
    resource.destroy();
  } else if ('unsubscribe' in resource) {
    resource.unsubscribe();
  } else {
    resource.disconnect();
  }
}

export class ResourceScope {
  /**
   * Tracks whether this scope has been destroyed.
   */
  private disposed = false;

  /**
   * Registered resources in registration order.
   * Lazily allocated - undefined until the first add().
   */
  private resources: Resource[] | undefined;

  /**
   * Check if this scope has been destroyed.
   */
  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Number of resources still awaiting release.
   */
  get size(): number {
    return this.resources?.length ?? 0;
  }

  /**
   * Register a resource for release when this scope is destroyed.
   *
   * @returns The same resource, so registration can wrap creation inline
   * @throws {ScopeDisposedError} if the scope has already been destroyed
   */
  add<R extends Resource>(resource: R): R {
    if (this.disposed) throw new ScopeDisposedError();
    if (!this.resources) this.resources = []; // lazily create
    this.resources.push(resource);
    return resource;
  }

  /**
   * Start a timeout that is cancelled if the scope is destroyed first.
   */
  addTimeout(callback: () => void, ms: number): NodeJS.Timeout {
    if (this.disposed) throw new ScopeDisposedError();
    const handle = setTimeout(callback, ms);
    this.add(() => clearTimeout(handle));
    return handle;
  }

  /**
   * Start an interval that is cleared when the scope is destroyed.
   */
  addInterval(callback: () => void, ms: number): NodeJS.Timeout {
    if (this.disposed) throw new ScopeDisposedError();
    const handle = setInterval(callback, ms);
    this.add(() => clearInterval(handle));
    return handle;
  }

  /**
   * Create a child scope released together with this one.
   *
   * The child can also be destroyed on its own earlier; destroying it twice
   * is a no-op, so the parent's release stays safe.
   */
  extend(): ResourceScope {
    return this.add(new ResourceScope());
  }

  /**
   * Release a single resource now and forget it.
   *
   * @returns false if the resource was not registered in this scope
   */
  remove(resource: Resource): boolean {
    if (!this.resources) return false;
    const index = this.resources.lastIndexOf(resource);
    if (index === -1) return false;
    this.resources.splice(index, 1);
    release(resource);
    return true;
  }

  /**
   * Release every registered resource in reverse registration order.
   *
   * Safe to call multiple times - subsequent calls are no-ops.
   * Once destroyed, the scope cannot be reused.
   *
   * @throws {ResourceReleaseError} after all resources ran, if any of them threw
   */
  destroy(): void {
    if (this.disposed) return; // Idempotent - safe to call multiple times
    this.disposed = true;

    const resources = this.resources;
    this.resources = undefined;
    if (!resources) return;

    const errors: Error[] = [];
    for (let i = resources.length - 1; i >= 0; i--) {
      try {
        release(resources[i]);
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (errors.length > 0) {
      throw new ResourceReleaseError(errors);
    }
  }
}
