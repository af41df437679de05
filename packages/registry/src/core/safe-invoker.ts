/*
 * SafeInvoker
 * -----------
 * Call-if-present helpers that isolate failures raised by user-supplied code.
 *
 * Every lifecycle hook except construction, and every call()/callAll(), goes
 * through here so a throwing hook can never abort registry bookkeeping.
 *
 *  - a missing method or hook is not an error: the result is ok with no value
 *  - a throw becomes { ok: false, error } and is never rethrown
 *  - a returned promise that later rejects is reported the same way, but the
 *    invoker does not wait for it
 */
import { HookInvocationError } from '../errors/errors.js';
import type { Logger } from '../types/types.js';
import { describeValue } from './diagnostics.js';

export type InvokeResult<R = unknown> =
  | { ok: true; value: R | undefined }
  | { ok: false; error: HookInvocationError };

export interface InvokeOptions {
  /** Log a warning naming the target and the error when the call fails. */
  debug?: boolean;
  logger?: Logger;
  /** Overrides the target label used in diagnostics. */
  label?: string;
}

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
  (typeof value === 'object' || typeof value === 'function') &&
  value !== null &&
  'then' in value &&
  typeof value.then === 'function';

function report(error: HookInvocationError, options: InvokeOptions): void {
  if (options.debug && options.logger) {
    options.logger.warn(error.message);
  }
}

/**
 * Invoke `hook` with `args`, isolating any failure.
 *
 * @param label - Target name used in diagnostics
 * @param method - Hook name used in diagnostics
 * @param hook - Function to call; undefined means "not implemented"
 * @param thisArg - Receiver bound while calling
 */
export function invokeHook<A extends unknown[], R>(
  label: string,
  method: string,
  hook: ((...args: A) => R) | undefined,
  thisArg: unknown,
  args: A,
  options: InvokeOptions = {}
): InvokeResult<R> {
  if (typeof hook !== 'function') return { ok: true, value: undefined };

  try {
    const value = hook.apply(thisArg, args);
    if (isThenable(value)) {
      void value.then(undefined, (reason: unknown) =>
        report(new HookInvocationError(label, method, reason), options)
      );
    }
    return { ok: true, value };
  } catch (cause) {
    const error = new HookInvocationError(label, method, cause);
    report(error, options);
    return { ok: false, error };
  }
}

/**
 * Look up `methodName` on `target` and invoke it with `args`, isolating
 * any failure. Targets that are not objects, or that do not implement the
 * method, yield an ok result with no value.
 *
 * @example
 * ```typescript
 * const result = invokeMethod(door, 'open', [true], { debug: true, logger });
 * if (!result.ok) metrics.count('door.open.failed');
 * ```
 */
export function invokeMethod(
  target: unknown,
  methodName: string,
  args: unknown[] = [],
  options: InvokeOptions = {}
): InvokeResult {
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    return { ok: true, value: undefined };
  }

  const method: unknown = Reflect.get(target, methodName);
  if (typeof method !== 'function') return { ok: true, value: undefined };

  const label = options.label ?? describeValue(target);
  return invokeHook(
    label,
    methodName,
    (...callArgs: unknown[]): unknown => Reflect.apply(method, target, callArgs),
    undefined,
    args,
    options
  );
}
