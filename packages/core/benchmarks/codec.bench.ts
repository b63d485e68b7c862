import { Bench } from 'tinybench';
import { DescriptorRegistry, IntegralKinds, defineEnum } from '../src/index.js';

/**
 * Text Codec Benchmark
 *
 * Measures format/parse round trips on a small flags enum and on a wide one
 * with 32 atomic members, plus plain-enum formatting for comparison.
 */

enum Access {
  None = 0,
  Read = 1,
  Write = 2,
  Execute = 4,
  Delete = 8,
  All = 15,
}

enum Status {
  Pending = 0,
  Active = 1,
  Suspended = 2,
  Closed = 3,
}

const wideMembers: Record<string, number> = {};
for (let i = 0; i < 32; i++) wideMembers[`Bit${i}`] = 2 ** i;

const registry = new DescriptorRegistry({ name: 'bench' });
const AccessEnum = defineEnum(Access, { name: 'Access', registry });
const StatusEnum = defineEnum(Status, { name: 'Status', registry, flags: false });
const WideEnum = defineEnum(wideMembers, { name: 'Wide', registry, kind: IntegralKinds.UInt32 });

const wideAll = WideEnum.combine(...WideEnum.names);
const wideText = WideEnum.format(wideAll);

async function runCodecBenchmark() {
  console.log('=== Symbolic Text Codec Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  bench
    // T1: single declared value, plain enum
    .add('T1: format plain member', () => {
      StatusEnum.format(2n);
    })

    // T2: two atomic flags
    .add('T2: format flags (2 of 4)', () => {
      AccessEnum.format(5n);
    })

    // T3: every bit of a 32-member flags enum
    .add('T3: format flags (32 of 32)', () => {
      WideEnum.format(wideAll);
    })

    // T4: undeclared bits fall back to decimal
    .add('T4: format unrecognized bits', () => {
      AccessEnum.format(48n);
    })

    .add('T5: parse two names (ignoreCase)', () => {
      AccessEnum.parse('read, execute');
    })

    .add('T6: parse 32 names', () => {
      WideEnum.parse(wideText);
    })

    .add('T7: parse integer literal', () => {
      AccessEnum.parse('7');
    })

    .add('T8: formatAs hex', () => {
      WideEnum.formatAs(wideAll, 'X');
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());
}

runCodecBenchmark().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
