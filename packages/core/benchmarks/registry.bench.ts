import { Bench } from 'tinybench';
import { DescriptorRegistry, IntegralKinds, type RawMember } from '../src/index.js';

/**
 * Registry Benchmark
 *
 * Cold cost is a descriptor build (validation plus index construction);
 * warm cost is a cached lookup.
 */

const makeMembers = (count: number): RawMember[] =>
  Array.from({ length: count }, (_, i) => ({ name: `Member${i}`, value: i }));

const small = makeMembers(8);
const large = makeMembers(1000);

async function runRegistryBenchmark() {
  console.log('=== Descriptor Registry Benchmark ===\n');

  let buildNs = 0;
  const warm = new DescriptorRegistry({
    name: 'warm',
    onBuild: (_typeId, durationNs) => {
      buildNs += durationNs;
    },
  });
  warm.register('Small', small, IntegralKinds.Int32);
  warm.register('Large', large, IntegralKinds.Int32);
  console.log(`[phase] warmup complete: initial builds took ${buildNs} ns\n`);

  const bench = new Bench({ time: 1000 });

  bench
    .add('T1: Cold register (8 members)', () => {
      new DescriptorRegistry().register('Small', small, IntegralKinds.Int32);
    })

    .add('T2: Cold register (1000 members)', () => {
      new DescriptorRegistry().register('Large', large, IntegralKinds.Int32);
    })

    .add('T3: Warm get', () => {
      warm.get('Large');
    })

    .add('T4: Warm getOrBuild', () => {
      warm.getOrBuild('Small', () => ({ members: small, kind: IntegralKinds.Int32 }));
    })

    // Re-registration still builds a candidate to compare against the cache
    .add('T5: Identical re-register (8 members)', () => {
      warm.register('Small', small, IntegralKinds.Int32);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());
}

runRegistryBenchmark().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
