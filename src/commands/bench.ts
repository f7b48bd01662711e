/**
 * `padkit bench`: time the engine against the built-in padding baseline.
 */

import { formatBenchTable, runBenchmarks } from '../lib/bench.js';
import { consoleIO } from './io.js';
import type { CommandIO } from './io.js';
import type { BenchOptions } from '../lib/bench.js';

export function benchCommand(
  options: { iterations?: number; json?: boolean },
  io: CommandIO = consoleIO,
  benchOptions: Omit<BenchOptions, 'iterations'> = {}
): void {
  const results = runBenchmarks({ ...benchOptions, iterations: options.iterations });
  if (options.json) {
    io.write(JSON.stringify(results, null, 2) + '\n');
    return;
  }
  io.write(formatBenchTable(results) + '\n');
}
