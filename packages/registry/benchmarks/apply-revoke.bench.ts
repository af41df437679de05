/*
 * Apply / Revoke Benchmark
 * ------------------------
 * Micro-benchmark for the registry hot paths, driven through the in-memory
 * tag source so every measurement includes notification dispatch:
 *   - Tag churn: add then remove the tag on 1,000 entities
 *   - GUID churn: same, with GUID minting and attribute persistence
 *   - Scoped objects: every object parks 3 cleanups in its ResourceScope
 *   - Replay: a fresh registry picks up 1,000 pre-tagged entities
 *   - callAll: one method call across 1,000 tracked objects
 *
 * Run:
 *   npm run bench --workspace @tagbound/registry
 *   npx tsx benchmarks/apply-revoke.bench.ts
 */

import { Bench } from 'tinybench';
import v8 from 'node:v8';

import { InMemoryTagSource, Registry, defineClass } from '../src/index.js';

const ENTITIES = 1_000;

interface Unit {
  readonly id: number;
  ticks: number;
}

const noop = () => {};

const Plain = defineClass<number, Unit>({
  name: 'Plain',
  construct: (id) => ({ id, ticks: 0 }),
  init: (unit) => {
    unit.ticks = 1;
  },
});

const Scoped = defineClass<number, Unit>({
  name: 'Scoped',
  construct: (id, scope) => {
    scope.add(noop);
    scope.add({ dispose: noop });
    scope.extend().add(noop);
    return { id, ticks: 0 };
  },
});

class Ticker {
  ticks = 0;

  tick() {
    this.ticks++;
  }
}

const ids = Array.from({ length: ENTITIES }, (_, i) => i);

function churn(world: InMemoryTagSource<number>, tag: string): void {
  for (const id of ids) world.addTag(id, tag);
  for (const id of ids) world.removeTag(id, tag);
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

async function main() {
  console.log('=== Apply / Revoke Benchmark ===');
  console.log(`Node ${process.version}  ${process.platform} ${process.arch}`);
  const heapMb = Math.round(v8.getHeapStatistics().heap_size_limit / 1024 / 1024);
  console.log(`Heap limit ~${heapMb} MB`);

  const bench = new Bench({ time: 1000 });

  const plainWorld = new InMemoryTagSource<number>();
  const plain = new Registry({ source: plainWorld, tag: 'Unit', class: Plain });
  bench.add('Tag churn (1k)', () => churn(plainWorld, 'Unit'));

  const guidWorld = new InMemoryTagSource<number>();
  let counter = 0;
  const guided = new Registry({
    source: guidWorld,
    metadata: guidWorld,
    tag: 'Unit',
    class: Plain,
    guid: 'unit',
    generateGuid: (prefix) => `${prefix}-${counter++}`,
  });
  bench.add('GUID churn (1k)', () => churn(guidWorld, 'Unit'));

  const scopedWorld = new InMemoryTagSource<number>();
  const scoped = new Registry({ source: scopedWorld, tag: 'Unit', class: Scoped });
  bench.add('Scoped objects (1k)', () => churn(scopedWorld, 'Unit'));

  const replayWorld = new InMemoryTagSource<number>();
  for (const id of ids) replayWorld.addTag(id, 'Unit');
  bench.add('Replay (1k)', async () => {
    const registry = new Registry({ source: replayWorld, tag: 'Unit', class: Plain });
    await flush();
    registry.destroy();
  });

  const tickWorld = new InMemoryTagSource<number>();
  const tickers = new Registry<number, Ticker>({
    source: tickWorld,
    tag: 'Unit',
    class: Ticker,
  });
  for (const id of ids) tickWorld.addTag(id, 'Unit');
  bench.add('callAll (1k)', () => {
    tickers.callAll('tick');
  });

  console.log(`[phase] running ${bench.tasks.length} tasks`);
  await bench.run();
  console.table(bench.table());

  for (const registry of [plain, guided, scoped, tickers]) registry.destroy();
  console.log('\nBenchmark complete');
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
