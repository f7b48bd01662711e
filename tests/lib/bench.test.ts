import { describe, it, expect } from 'vitest';
import { DEFAULT_BENCH_CASES, formatBenchTable, runBenchmarks } from '@/lib/bench.js';
import type { BenchCase } from '@/lib/bench.js';
import { Alignment, PadSymbol } from '@/types/pad.js';

function steppingClock(): () => number {
  let t = 0;
  return () => t++;
}

const CASE: BenchCase = {
  name: 'pad zero 8 right',
  mode: 'pad',
  source: '9184',
  width: 8,
  alignment: Alignment.Right,
  symbol: PadSymbol.Zero,
};

describe('runBenchmarks', () => {
  it('reports nanoseconds per op from the clock', () => {
    const results = runBenchmarks({ iterations: 10, cases: [CASE], now: steppingClock() });

    expect(results).toEqual([
      { name: 'pad zero 8 right', iterations: 10, engineNsPerOp: 100_000, baselineNsPerOp: 100_000 },
    ]);
  });

  it('runs the buffer mode', () => {
    const results = runBenchmarks({
      iterations: 4,
      cases: [{ ...CASE, name: 'buffer', mode: 'buffer' }],
      now: steppingClock(),
    });

    expect(results[0]?.engineNsPerOp).toBe(250_000);
  });

  it('covers left, right and buffered center cases by default', () => {
    expect(DEFAULT_BENCH_CASES).toHaveLength(12);
    expect(DEFAULT_BENCH_CASES.map((c) => c.name).slice(0, 4)).toEqual([
      'pad whitespace 10 left',
      'pad whitespace 100 left',
      'pad whitespace 1000 left',
      'pad whitespace 10000 left',
    ]);
    expect(DEFAULT_BENCH_CASES[11]?.name).toBe('buffer whitespace 10000 center');
  });

  it('runs every default case with the real clock', () => {
    const results = runBenchmarks({ iterations: 1 });

    expect(results).toHaveLength(DEFAULT_BENCH_CASES.length);
    for (const result of results) {
      expect(Number.isFinite(result.engineNsPerOp)).toBe(true);
      expect(result.engineNsPerOp).toBeGreaterThanOrEqual(0);
    }
  });

  it('rejects non-positive iteration counts', () => {
    expect(() => runBenchmarks({ iterations: 0 })).toThrow(RangeError);
  });
});

describe('formatBenchTable', () => {
  it('renders aligned columns', () => {
    const table = formatBenchTable([
      { name: 'pad x', iterations: 10, engineNsPerOp: 100_000, baselineNsPerOp: 50_000 },
    ]);

    expect(table.split('\n')).toEqual([
      `${'case'.padEnd(28)} ${'engine ns/op'.padStart(14)} ${'baseline ns/op'.padStart(14)} ${'ratio'.padStart(7)}`,
      `${'-'.repeat(28)} ${'-'.repeat(14)} ${'-'.repeat(14)} ${'-'.repeat(7)}`,
      `${'pad x'.padEnd(28)} ${'100000.0'.padStart(14)} ${'50000.0'.padStart(14)} ${'2.00'.padStart(7)}`,
    ]);
  });
});
