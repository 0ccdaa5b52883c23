/**
 * Timing helpers for the cell benchmarks
 */

export interface BenchmarkResult {
  name: string;
  /** Timed calls of the benchmark function */
  iterations: number;
  /** Operations performed by one call, for per-op figures */
  opsPerCall: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  stdDevMs: number;
  /** Operations per second, counting opsPerCall per call */
  opsPerSec: number;
}

export interface BenchmarkOptions {
  /** Timed calls (default: 50) */
  iterations?: number;
  /** Untimed calls before timing (default: 5) */
  warmup?: number;
  /** Operations performed by one call (default: 1) */
  opsPerCall?: number;
}

const DEFAULT_OPTIONS: Required<BenchmarkOptions> = {
  iterations: 50,
  warmup: 5,
  opsPerCall: 1,
};

/**
 * Time `fn` and collect statistics
 */
export function runBenchmark(name: string, fn: () => void, options?: BenchmarkOptions): BenchmarkResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let i = 0; i < opts.warmup; i++) {
    fn();
  }

  const times: number[] = [];
  for (let i = 0; i < opts.iterations; i++) {
    const start = performance.now();
    fn();
    times.push(performance.now() - start);
  }

  const totalMs = times.reduce((a, b) => a + b, 0);
  const avgMs = totalMs / opts.iterations;
  const variance = times.reduce((sum, t) => sum + (t - avgMs) ** 2, 0) / opts.iterations;

  return {
    name,
    iterations: opts.iterations,
    opsPerCall: opts.opsPerCall,
    totalMs,
    avgMs,
    minMs: Math.min(...times),
    maxMs: Math.max(...times),
    stdDevMs: Math.sqrt(variance),
    opsPerSec: (1000 * opts.opsPerCall) / avgMs,
  };
}

export function formatResult(result: BenchmarkResult): string {
  return [
    `Benchmark: ${result.name}`,
    `  Calls:      ${result.iterations} x ${result.opsPerCall} ops`,
    `  Average:    ${result.avgMs.toFixed(3)} ms`,
    `  Min:        ${result.minMs.toFixed(3)} ms`,
    `  Max:        ${result.maxMs.toFixed(3)} ms`,
    `  Std Dev:    ${result.stdDevMs.toFixed(3)} ms`,
    `  Ops/sec:    ${Math.round(result.opsPerSec).toLocaleString(`en-US`)}`,
  ].join(`\n`);
}

export function printResult(result: BenchmarkResult): void {
  console.log(formatResult(result));
  console.log(``);
}

/**
 * Markdown table of results
 */
export function summarizeResults(results: BenchmarkResult[]): string {
  const width = Math.max(9, ...results.map((r) => r.name.length));
  const header = `| ${`Benchmark`.padEnd(width)} | Avg (ms) | Ops/sec      |`;
  const separator = `|${`-`.repeat(width + 2)}|----------|--------------|`;
  const rows = results.map(
    (r) =>
      `| ${r.name.padEnd(width)} | ${r.avgMs.toFixed(3).padStart(8)} | ${Math.round(r.opsPerSec).toString().padStart(12)} |`
  );
  return [header, separator, ...rows].join(`\n`);
}
