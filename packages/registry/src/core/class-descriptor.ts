import { InvalidClassDescriptorError } from '../errors/errors.js';
import type { ClassDescriptor, ClassLike, ManagedClass, MethodNames } from '../types/types.js';

/**
 * Method names used for class-based descriptors when none are configured.
 */
export const DEFAULT_METHODS: Readonly<MethodNames> = Object.freeze({
  construct: 'new',
  init: 'init',
  destroy: 'destroy',
  startup: 'onStart',
});

/**
 * Fill the method names the caller left out with the defaults.
 */
export function resolveMethodNames(
  methods: Partial<MethodNames> = {}
): Readonly<MethodNames> {
  return Object.freeze({
    construct: methods.construct ?? DEFAULT_METHODS.construct,
    init: methods.init ?? DEFAULT_METHODS.init,
    destroy: methods.destroy ?? DEFAULT_METHODS.destroy,
    startup: methods.startup ?? DEFAULT_METHODS.startup,
  });
}

/**
 * Runtime check for the descriptor shape: an object carrying a `construct`
 * function.
 */
export function isClassDescriptor<E, T>(value: unknown): value is ClassDescriptor<E, T> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'construct' in value &&
    typeof value.construct === 'function'
  );
}

/**
 * Fix the type parameters of a literal descriptor.
 *
 * @example
 * ```typescript
 * const Lamp = defineClass<Model, { on: boolean }>({
 *   name: 'Lamp',
 *   construct: () => ({ on: false }),
 *   init: (lamp) => {
 *     lamp.on = true;
 *   },
 * });
 * ```
 */
export function defineClass<E, T>(descriptor: ClassDescriptor<E, T>): ClassDescriptor<E, T> {
  if (!isClassDescriptor(descriptor)) throw new InvalidClassDescriptorError(descriptor);
  return descriptor;
}

/**
 * Build a descriptor from a plain class.
 *
 * Construction uses the static factory named by `methods.construct`, or the
 * class constructor when that name is `'new'` or the static is absent.
 * init/destroy call the named instance methods; startup calls the named
 * static method. Missing methods are skipped.
 */
export function fromClass<E, T>(
  ctor: ManagedClass<E, T>,
  methods: Partial<MethodNames> = {}
): ClassDescriptor<E, T> {
  if (typeof ctor !== 'function') throw new InvalidClassDescriptorError(ctor);

  const names = resolveMethodNames(methods);
  const factory: unknown =
    names.construct === 'new' ? undefined : Reflect.get(ctor, names.construct);

  return {
    name: ctor.name,
    construct(entity, scope, guid) {
      if (typeof factory === 'function') {
        // Static factories are user code; the registry guards the call
        return Reflect.apply(factory, ctor, [entity, scope, guid]);
      }
      return new ctor(entity, scope, guid);
    },
    init(object) {
      return callNamed(object, names.init, []);
    },
    destroy(object) {
      return callNamed(object, names.destroy, []);
    },
    startup(registry, context) {
      return callNamed(ctor, names.startup, [registry, context]);
    },
  };
}

/**
 * Call `target[name](...args)` if it exists. Throws propagate to the
 * registry's invoker, which reports them under the descriptor's name.
 */
function callNamed(target: unknown, name: string, args: unknown[]): unknown {
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    return undefined;
  }
  const method: unknown = Reflect.get(target, name);
  return typeof method === 'function' ? Reflect.apply(method, target, args) : undefined;
}

/**
 * Normalize a class or descriptor into a descriptor.
 *
 * @throws {InvalidClassDescriptorError} if the value matches neither shape
 */
export function toDescriptor<E, T>(
  value: ClassLike<E, T>,
  methods?: Partial<MethodNames>
): ClassDescriptor<E, T> {
  if (isClassDescriptor<E, T>(value)) return value;
  if (typeof value === 'function') return fromClass(value, methods);
  throw new InvalidClassDescriptorError(value);
}
