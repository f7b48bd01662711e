/**
 * Benchmark harness comparing the engine against the built-in
 * `padStart`/`padEnd` baseline.
 */

import { pad, padAndPushToBuffer } from './pad.js';
import { symbolToChar } from './symbol.js';
import { TextBuffer } from './text.js';
import { Alignment, PadSymbol } from '../types/pad.js';

export type BenchMode = 'pad' | 'buffer';

export interface BenchCase {
  name: string;
  mode: BenchMode;
  source: string;
  width: number;
  alignment: Alignment;
  symbol: PadSymbol;
}

export interface BenchResult {
  name: string;
  iterations: number;
  engineNsPerOp: number;
  baselineNsPerOp: number;
}

export interface BenchOptions {
  iterations?: number;
  cases?: readonly BenchCase[];
  /** Millisecond clock; defaults to performance.now */
  now?: () => number;
}

function benchCase(mode: BenchMode, alignment: Alignment, symbol: PadSymbol, source: string, width: number): BenchCase {
  return {
    name: `${mode} ${symbol.toLowerCase()} ${width} ${alignment.toLowerCase()}`,
    mode,
    source,
    width,
    alignment,
    symbol,
  };
}

const SAMPLES: ReadonlyArray<readonly [string, number]> = [
  ['abc', 10],
  ['padding engine', 100],
  ['a somewhat longer line of text', 1000],
  ['åäö mixed width sample, still one code point each', 10000],
];

export const DEFAULT_BENCH_CASES: readonly BenchCase[] = [
  ...SAMPLES.map(([source, width]) => benchCase('pad', Alignment.Left, PadSymbol.Whitespace, source, width)),
  ...SAMPLES.map(([source, width]) => benchCase('pad', Alignment.Right, PadSymbol.Hyphen, source, width)),
  ...SAMPLES.map(([source, width]) => benchCase('buffer', Alignment.Center, PadSymbol.Whitespace, source, width)),
];

/**
 * Built-in padding. Assumes the source fits, as every default case does.
 */
function baselinePad(source: string, width: number, alignment: Alignment, fill: string): string {
  switch (alignment) {
    case Alignment.Left:
      return source.padEnd(width, fill);
    case Alignment.Right:
      return source.padStart(width, fill);
    case Alignment.Center: {
      const leading = Math.floor((width - source.length) / 2);
      return source.padStart(source.length + leading, fill).padEnd(width, fill);
    }
  }
}

function timeNs(iterations: number, now: () => number, op: () => unknown): number {
  const start = now();
  for (let i = 0; i < iterations; i++) {
    op();
  }
  return ((now() - start) * 1e6) / iterations;
}

function runCase(benchmark: BenchCase, iterations: number, now: () => number): BenchResult {
  const { source, width, alignment, symbol } = benchmark;
  const fill = symbolToChar(symbol);

  let engine: () => unknown;
  let baseline: () => unknown;
  if (benchmark.mode === 'pad') {
    engine = () => pad(source, width, alignment, symbol);
    baseline = () => baselinePad(source, width, alignment, fill);
  } else {
    const buffer = new TextBuffer();
    let accumulated = '';
    engine = () => padAndPushToBuffer(source, width, alignment, symbol, buffer);
    baseline = () => {
      accumulated += baselinePad(source, width, alignment, fill);
    };
  }

  return {
    name: benchmark.name,
    iterations,
    engineNsPerOp: timeNs(iterations, now, engine),
    baselineNsPerOp: timeNs(iterations, now, baseline),
  };
}

/**
 * Runs every case once for the engine and once for the baseline.
 *
 * @throws {RangeError} If iterations is not a positive integer
 */
export function runBenchmarks(options: BenchOptions = {}): BenchResult[] {
  const { iterations = 1_000, cases = DEFAULT_BENCH_CASES, now = () => performance.now() } = options;
  if (!Number.isSafeInteger(iterations) || iterations <= 0) {
    throw new RangeError(`Iterations must be a positive integer, got ${iterations}`);
  }
  return cases.map((benchmark) => runCase(benchmark, iterations, now));
}

const COLUMNS = [
  { header: 'case', width: 28, alignment: Alignment.Left },
  { header: 'engine ns/op', width: 14, alignment: Alignment.Right },
  { header: 'baseline ns/op', width: 14, alignment: Alignment.Right },
  { header: 'ratio', width: 7, alignment: Alignment.Right },
] as const;

/**
 * Renders results as a fixed-width table, one line per case.
 */
export function formatBenchTable(results: readonly BenchResult[]): string {
  const row = (cells: readonly string[]): string =>
    COLUMNS.map((column, i) => pad(cells[i] ?? '', column.width, column.alignment, PadSymbol.Whitespace)).join(' ');

  const lines = [
    row(COLUMNS.map((column) => column.header)),
    COLUMNS.map((column) => pad('', column.width, Alignment.Left, PadSymbol.Hyphen)).join(' '),
  ];
  for (const result of results) {
    const ratio = result.baselineNsPerOp > 0 ? result.engineNsPerOp / result.baselineNsPerOp : 0;
    lines.push(
      row([
        result.name,
        result.engineNsPerOp.toFixed(1),
        result.baselineNsPerOp.toFixed(1),
        ratio.toFixed(2),
      ])
    );
  }
  return lines.join('\n');
}
