import type { Logger, TagSource } from '../types/types.js';

/** Prefix carried by every diagnostic line. */
export const LOG_PREFIX = '[Tagbound]';

/**
 * Console-backed logger used when a registry is not given one.
 *
 * @param prefix - Tag prepended to every line
 */
export function createConsoleLogger(prefix: string = LOG_PREFIX): Logger {
  return {
    info: (message) => console.info(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, error) =>
      error === undefined
        ? console.error(`${prefix} ${message}`)
        : console.error(`${prefix} ${message}`, error),
  };
}

/**
 * Label an arbitrary value for diagnostics without throwing.
 */
export function describeValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'function') return value.name ? `[class ${value.name}]` : '[function]';
  if (typeof value === 'object') {
    const ctorName = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof ctorName === 'string' && ctorName !== '' ? ctorName : 'Object';
  }
  return String(value);
}

/**
 * Name an entity through the source's `describe`, falling back to String()
 * when the source has none or it throws.
 */
export function describeEntity<E>(source: TagSource<E>, entity: E): string {
  if (!source.describe) return String(entity);
  try {
    return source.describe(entity);
  } catch {
    return String(entity);
  }
}
