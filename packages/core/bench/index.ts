/**
 * spherecell core benchmarks
 *
 * Usage:
 *   npm run bench
 *
 * Or run directly:
 *   npx tsx bench/index.ts
 */

import { runCellBenchmarks } from './cellid.bench.js';

export function runAllBenchmarks(): void {
  console.log('');
  console.log(`Date: ${new Date().toISOString()}`);
  console.log(`Node: ${process.version}`);
  console.log('');

  const results = runCellBenchmarks();

  const slowest = results.reduce((a, b) => (a.opsPerSec < b.opsPerSec ? a : b));
  const fastest = results.reduce((a, b) => (a.opsPerSec > b.opsPerSec ? a : b));

  console.log('');
  console.log('Performance Insights:');
  console.log('─'.repeat(40));
  console.log(`  Fastest: ${fastest.name} (${Math.round(fastest.opsPerSec)} ops/sec)`);
  console.log(`  Slowest: ${slowest.name} (${Math.round(slowest.opsPerSec)} ops/sec)`);

  const highVariance = results.filter((r) => r.stdDevMs / r.avgMs > 0.5);
  if (highVariance.length > 0) {
    console.log(`  High variance: ${highVariance.map((r) => r.name).join(', ')}`);
  }
  console.log('');
}

const isMain = typeof process !== 'undefined' && process.argv[1]?.includes('bench');
if (isMain) {
  runAllBenchmarks();
}

export { runCellBenchmarks } from './cellid.bench.js';
export * from './utils.js';
