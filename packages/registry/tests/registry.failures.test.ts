import { describe, expect, it, vi } from 'vitest';

import { defineClass } from '../src/core/class-descriptor.js';
import { Registry } from '../src/core/registry.js';
import {
  InvalidClassDescriptorError,
  InvalidRegistryConfigError,
  RegistryDestroyedError,
} from '../src/errors/errors.js';
import { InMemoryTagSource } from '../src/sources/in-memory-tag-source.js';
import { createLogger, createWorld, flush, model, type Model } from './fixtures.js';

interface Holder {
  entity: Model;
}

describe('Registry failure handling', () => {
  describe('construction', () => {
    it('releases the scope and records nothing when construct throws', () => {
      const world = createWorld();
      const bad = model('bad');
      const cleanup = vi.fn();
      const logger = createLogger();
      const Fragile = defineClass<Model, object>({
        name: 'Fragile',
        construct: (_entity, scope) => {
          scope.add(cleanup);
          throw new Error('broken');
        },
      });
      const registry = new Registry({
        source: world,
        metadata: world,
        tag: 'Enemy',
        class: Fragile,
        guid: 'enemy',
        debug: true,
        logger,
      });

      expect(registry.apply(bad)).toBeUndefined();

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(registry.has(bad)).toBe(false);
      expect(registry.size).toBe(0);
      expect(world.hasTag(bad, 'Enemy')).toBe(false);
      expect(world.getAttribute(bad, 'GUID')).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining('Failed to construct Fragile for bad: Error: broken')
      );
    });

    it('keeps applying other entities after a construction failure', () => {
      const world = createWorld();
      const good = model('good');
      const Picky = defineClass<Model, Holder>({
        construct: (entity) => {
          if (entity.name === 'bad') throw new Error('broken');
          return { entity };
        },
      });
      const registry = new Registry({ source: world, tag: 'Enemy', class: Picky });

      world.addTag(model('bad'), 'Enemy');
      world.addTag(good, 'Enemy');

      expect(registry.size).toBe(1);
      expect(registry.getObject(good)).toEqual({ entity: good });
    });

    it('ignores a nested apply for the entity being constructed', () => {
      const world = createWorld();
      const a = model('a');
      const nested: unknown[] = [];
      let registry: Registry<Model, Holder> | undefined;
      const Eager = defineClass<Model, Holder>({
        construct: (entity) => {
          nested.push(registry?.apply(entity));
          return { entity };
        },
      });
      registry = new Registry({ source: world, tag: 'Enemy', class: Eager });

      const object = registry.apply(a);

      expect(nested).toEqual([undefined]);
      expect(registry.getObject(a)).toBe(object);
    });
  });

  describe('hooks', () => {
    it('completes revoke when the destroy hook throws', () => {
      const world = createWorld();
      const a = model('a');
      const cleanup = vi.fn();
      const logger = createLogger();
      const Sticky = defineClass<Model, object>({
        name: 'Sticky',
        construct: (_entity, scope) => {
          scope.add(cleanup);
          return { value: 1 };
        },
        destroy: () => {
          throw new Error('stuck');
        },
      });
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: Sticky,
        debug: true,
        logger,
      });
      const object = registry.apply(a);

      expect(() => registry.revoke(a)).not.toThrow();

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(registry.has(a)).toBe(false);
      expect(Object.isFrozen(object)).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining("Method 'destroy' on Sticky threw: Error: stuck")
      );
    });

    it('keeps the object tracked when init throws', () => {
      const world = createWorld();
      const a = model('a');
      const logger = createLogger();
      const Faulty = defineClass<Model, object>({
        name: 'Faulty',
        construct: () => ({}),
        init: () => {
          throw new Error('bad init');
        },
      });
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: Faulty,
        debug: true,
        logger,
      });

      world.addTag(a, 'Enemy');

      expect(registry.has(a)).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining("Method 'init' on Faulty threw: Error: bad init")
      );
    });

    it('reports a rejected init promise', async () => {
      const world = createWorld();
      const logger = createLogger();
      const Lazy = defineClass<Model, object>({
        name: 'Lazy',
        construct: () => ({}),
        init: () => Promise.reject(new Error('late')),
      });
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: Lazy,
        debug: true,
        logger,
      });

      registry.apply(model('a'));
      await flush();

      expect(registry.size).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining("Method 'init' on Lazy threw: Error: late")
      );
    });

    it('still runs the destroy hook when releasing resources fails', () => {
      const world = createWorld();
      const a = model('a');
      const destroy = vi.fn();
      const logger = createLogger();
      const Leaky = defineClass<Model, object>({
        construct: (_entity, scope) => {
          scope.add(() => {
            throw new Error('leak');
          });
          return {};
        },
        destroy,
      });
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: Leaky,
        debug: true,
        logger,
      });
      registry.apply(a);

      registry.revoke(a);

      expect(destroy).toHaveBeenCalledTimes(1);
      expect(registry.has(a)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining('Releasing resources of a failed:')
      );
    });

    it('names entities with String() when describe throws', () => {
      const world = new InMemoryTagSource<Model>({
        describe: () => {
          throw new Error('no name');
        },
      });
      const a = model('a');
      const logger = createLogger();
      const init = vi.fn();
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: defineClass<Model, object>({ construct: () => ({}), init }),
        logging: true,
        logger,
      });

      const object = registry.apply(a);

      expect(object).toEqual({});
      expect(registry.getObject(a)).toBe(object);
      expect(init).toHaveBeenCalledTimes(1);
      expect(world.hasTag(a, 'Enemy')).toBe(true);
      expect(logger.info.mock.calls).toEqual([['Added entity: [object Object] (Enemy)']]);
    });

    it('treats a throwing filter as a rejection', () => {
      const world = createWorld();
      const a = model('a');
      const logger = createLogger();
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: { construct: () => ({}) },
        filter: () => {
          throw new Error('nope');
        },
        debug: true,
        logger,
      });

      expect(registry.apply(a)).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining("Method 'filter' on Registry(Enemy) threw: Error: nope")
      );
    });

    it('falls back to the default class when the resolver throws', () => {
      const world = createWorld();
      const a = model('a');
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: { construct: () => ({ kind: 'default' }) },
        resolver: () => {
          throw new Error('resolver broke');
        },
      });

      expect(registry.apply(a)).toEqual({ kind: 'default' });
    });

    it('rejects a non-conforming class from the resolver', () => {
      const world = createWorld();
      const a = model('a');
      const logger = createLogger();
      const registry = new Registry<Model, object>({
        source: world,
        tag: 'Enemy',
        resolver: () => JSON.parse('{"name":"bogus"}'),
        debug: true,
        logger,
      });

      expect(registry.apply(a)).toBeUndefined();
      expect(logger.warn.mock.calls[0][0]).toContain('Invalid class descriptor');
      expect(logger.warn.mock.calls[1][0]).toBe('No class could be resolved for a (Enemy)');
    });
  });

  describe('GUIDs', () => {
    it('refuses an entity whose GUID collides with a live one', () => {
      const world = createWorld();
      const a = model('a');
      const b = model('b');
      const logger = createLogger();
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: { construct: () => ({}) },
        guid: 'enemy',
        generateGuid: () => 'same',
        debug: true,
        logger,
      });

      world.addTag(a, 'Enemy');
      world.addTag(b, 'Enemy');

      expect(registry.has(b)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        "GUID 'same' is already assigned; b was not applied"
      );

      registry.revoke(a);
      registry.apply(b);
      expect(registry.getGuid(b)).toBe('same');
    });

    it('aborts the apply when the generator throws or returns an empty id', () => {
      const world = createWorld();
      const logger = createLogger();
      const ids = ['', 'ok-1'];
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: { construct: () => ({}) },
        guid: 'enemy',
        generateGuid: () => {
          const next = ids.shift();
          if (next === undefined) throw new Error('exhausted');
          return next;
        },
        debug: true,
        logger,
      });

      expect(registry.apply(model('a'))).toBeUndefined();
      expect(registry.apply(model('b'))).toEqual({});
      expect(registry.apply(model('c'))).toBeUndefined();

      expect(logger.warn.mock.calls[0][0]).toBe('GUID generator returned an invalid value for a');
      expect(logger.warn.mock.calls[1][0]).toContain(
        "Method 'generateGuid' on Registry(Enemy) threw: Error: exhausted"
      );
      expect(registry.size).toBe(1);
    });
  });

  describe('configuration', () => {
    it('rejects malformed configuration', () => {
      const world = createWorld();

      expect(() => new Registry({ source: world, tag: '' })).toThrow(
        'Invalid registry configuration: tag must be a non-empty string'
      );
      expect(() => new Registry<Model, object>({ source: JSON.parse('{}'), tag: 'Enemy' }))
        .toThrow('Invalid registry configuration: source must implement TagSource');
      expect(() => new Registry({ source: world, tag: 'Enemy', guid: '' })).toThrow(
        'Invalid registry configuration: guid prefix must be a non-empty string'
      );
      expect(() => new Registry({ source: world, tag: 'Enemy', filter: JSON.parse('"yes"') }))
        .toThrow('Invalid registry configuration: filter must be a function');
    });

    it('reports the reason on the error', () => {
      let caught: unknown;
      try {
        new Registry({ source: createWorld(), tag: '' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidRegistryConfigError);
      expect(caught instanceof InvalidRegistryConfigError && caught.reason).toBe(
        'tag must be a non-empty string'
      );
    });

    it('rejects a non-conforming default class', () => {
      expect(
        () =>
          new Registry<Model, object>({
            source: createWorld(),
            tag: 'Enemy',
            class: JSON.parse('{"name":"bogus"}'),
          })
      ).toThrow(InvalidClassDescriptorError);
    });
  });

  describe('after destroy', () => {
    it('throws on mutation and returns empty lookups', () => {
      const world = createWorld();
      const a = model('a');
      const registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: { construct: () => ({}) },
      });
      registry.apply(a);
      registry.destroy();

      expect(() => registry.apply(a)).toThrow(RegistryDestroyedError);
      expect(() => registry.revoke(a)).toThrow(RegistryDestroyedError);
      expect(() => registry.call({}, 'anything')).toThrow(RegistryDestroyedError);
      expect(() => registry.callAll('anything')).toThrow(
        "Registry for tag 'Enemy' has been destroyed."
      );
      expect(registry.getObject(a)).toBeUndefined();
      expect(registry.getObjectByGuid('g1')).toBeUndefined();
      expect(registry.getAll().size).toBe(0);
      expect(registry.has(a)).toBe(false);
    });

    it('drops replays that were still pending', async () => {
      const world = createWorld();
      world.addTag(model('a'), 'Enemy');
      const logger = createLogger();
      const construct = vi.fn(() => ({}));
      const registry = new Registry({ source: world, tag: 'Enemy', class: { construct }, logger });

      registry.destroy();
      await flush();

      expect(construct).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('re-entrancy', () => {
    it('ignores revokes issued from inside the destroy hook', () => {
      const world = createWorld();
      const a = model('a');
      let registry: Registry<Model, Holder> | undefined;
      const destroy = vi.fn((holder: Holder) => {
        registry?.revoke(holder.entity);
        world.removeTag(holder.entity, 'Enemy');
      });
      const Holding = defineClass<Model, Holder>({ construct: (entity) => ({ entity }), destroy });
      registry = new Registry({ source: world, tag: 'Enemy', class: Holding });
      world.addTag(a, 'Enemy');

      registry.revoke(a);

      expect(destroy).toHaveBeenCalledTimes(1);
      expect(world.hasTag(a, 'Enemy')).toBe(false);
      expect(registry.has(a)).toBe(false);
    });

    it('returns nothing when init revokes its own entity', () => {
      const world = createWorld();
      const a = model('a');
      const logger = createLogger();
      const destroy = vi.fn();
      let registry: Registry<Model, Holder> | undefined;
      const Fleeting = defineClass<Model, Holder>({
        construct: (entity) => ({ entity }),
        init: (holder) => {
          registry?.revoke(holder.entity);
        },
        destroy,
      });
      registry = new Registry({
        source: world,
        tag: 'Enemy',
        class: Fleeting,
        logging: true,
        logger,
      });

      expect(registry.apply(a)).toBeUndefined();

      expect(registry.has(a)).toBe(false);
      expect(destroy).toHaveBeenCalledTimes(1);
      expect(world.hasTag(a, 'Enemy')).toBe(false);
      expect(logger.info.mock.calls).toEqual([['Removed entity: a (Enemy)']]);
    });

    it('stays detached when the startup hook destroys the registry', () => {
      const world = createWorld();
      const construct = vi.fn(() => ({}));
      const SelfDestruct = defineClass<Model, object>({
        construct,
        startup: (registry) => {
          registry.destroy();
        },
      });

      const registry = new Registry({ source: world, tag: 'Enemy', class: SelfDestruct });

      expect(registry.isDestroyed).toBe(true);
      expect(world.listenerCount('Enemy')).toBe(0);
      expect(() => world.addTag(model('a'), 'Enemy')).not.toThrow();
      expect(construct).not.toHaveBeenCalled();
    });

    it('does not apply entities tagged while destroying', () => {
      const world = createWorld();
      const spawn = model('spawn');
      const construct = vi.fn((entity: Model): Holder => ({ entity }));
      const Spawner = defineClass<Model, Holder>({
        construct,
        destroy: () => {
          world.addTag(spawn, 'Enemy');
        },
      });
      const registry = new Registry({ source: world, tag: 'Enemy', class: Spawner });
      world.addTag(model('a'), 'Enemy');

      registry.destroy();

      expect(construct).toHaveBeenCalledTimes(1);
      expect(world.hasTag(spawn, 'Enemy')).toBe(true);
      expect(registry.size).toBe(0);
    });
  });
});
