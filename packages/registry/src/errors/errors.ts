const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);

/**
 * Normalize an arbitrary thrown value into an Error instance.
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export class ScopeDisposedError extends Error {
  constructor() {
    const dev = [
      'Resource scope disposed',
      '',
      'Resources cannot be added to a scope after destroy() has run.',
      'Objects that outlive their entity should not keep registering cleanup work.',
    ];
    super(format('Resource scope has been disposed.', dev));
    this.name = 'ScopeDisposedError';
  }
}

/**
 * Error thrown when one or more resources failed to release.
 *
 * Every resource in the scope is still released; the individual failures are
 * preserved in `errors` in the order they occurred.
 */
export class ResourceReleaseError extends Error {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Resource release failed',
      '',
      `${errors.length} resource(s) threw while the scope was being released:`,
      errorList,
      '',
      'Check the `errors` property for the individual failures.',
    ];
    super(format(`${errors.length} resource release error(s) occurred.`, dev));
    this.name = 'ResourceReleaseError';
  }
}

export class HookInvocationError extends Error {
  constructor(
    public target: string,
    public method: string,
    cause: unknown
  ) {
    const dev = [
      'Hook invocation failed',
      '',
      `Method '${method}' on ${target} threw: ${describeCause(cause)}`,
      '',
      'The failure was isolated; registry bookkeeping continued.',
    ];
    super(format(`Method '${method}' on ${target} failed.`, dev), { cause });
    this.name = 'HookInvocationError';
  }
}

export class ConstructionError extends Error {
  constructor(
    public entity: string,
    public className: string,
    cause: unknown
  ) {
    const dev = [
      'Construction failed',
      '',
      `Failed to construct ${className} for ${entity}: ${describeCause(cause)}`,
      '',
      'The entity was not tracked and its resource scope was released.',
    ];
    super(format(`Failed to construct ${className} for ${entity}.`, dev), { cause });
    this.name = 'ConstructionError';
  }
}

export class InvalidClassDescriptorError extends Error {
  constructor(public received: unknown) {
    let receivedString: string;
    try {
      receivedString =
        typeof received === 'function' ? `[class ${received.name}]` : JSON.stringify(received);
    } catch {
      receivedString = String(received);
    }

    const dev = [
      'Invalid class descriptor',
      '',
      'Valid shapes:',
      `  - A class whose constructor takes (entity, scope, guid)`,
      `  - An object with a 'construct(entity, scope, guid)' function`,
      '',
      'Received:',
      `  ${receivedString}`,
    ];
    super(format('Invalid class descriptor.', dev));
    this.name = 'InvalidClassDescriptorError';
  }
}

export class InvalidRegistryConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid registry configuration', '', `Invalid registry configuration: ${reason}`];
    super(format(`Invalid registry configuration: ${reason}`, dev));
    this.name = 'InvalidRegistryConfigError';
  }
}

export class RegistryDestroyedError extends Error {
  constructor(public tag: string) {
    const dev = [
      `Registry for tag '${tag}' has been destroyed.`,
      '',
      'Destroy is irreversible. Create a new registry to manage this tag again.',
    ];
    super(format(`Registry for tag '${tag}' has been destroyed.`, dev));
    this.name = 'RegistryDestroyedError';
  }
}
