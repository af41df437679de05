import { vi } from 'vitest';

import { InMemoryTagSource } from '../src/sources/in-memory-tag-source.js';
import type { Logger } from '../src/types/types.js';

export interface Model {
  readonly name: string;
}

export const model = (name: string): Model => ({ name });

export const createWorld = () => new InMemoryTagSource<Model>({ describe: (m) => m.name });

export const createLogger = () =>
  ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }) satisfies Logger;

/** Resolves after every queued microtask has run. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
