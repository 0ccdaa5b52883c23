/**
 * Cell id benchmarks
 *
 * Each call runs one operation over a fixed batch of cells, so the figures
 * are per-operation throughput rather than per-call latency.
 */

import * as encoding from 'lib0/encoding';
import * as decoding from 'lib0/decoding';
import {
  CellId,
  CompactCellId,
  MAX_SIZE,
  decodeCellIds,
  encodeCellIds,
  type Vec3,
} from '../src/index.js';
import { runBenchmark, printResult, summarizeResults, type BenchmarkResult } from './utils.js';

const BATCH = 1000;

// Fixed-stride sample so runs are comparable
const leaves: CellId[] = Array.from({ length: BATCH }, (_, k) =>
  CellId.fromFaceIJ(k % 6, (k * 104729) % MAX_SIZE, (k * 7919 * 7919) % MAX_SIZE)
);
const cells = leaves.map((leaf, k) => leaf.parent(k % 31));
const compactCells = cells.map((cell) => CompactCellId.fromCellId(cell.level() > 28 ? cell.parent(28) : cell));
const points: Vec3[] = leaves.map((leaf) => leaf.toPoint());
const tokens = cells.map((cell) => cell.toToken());

function bench(name: string, fn: () => void): BenchmarkResult {
  return runBenchmark(name, fn, { opsPerCall: BATCH });
}

export function runCellBenchmarks(): BenchmarkResult[] {
  console.log('='.repeat(60));
  console.log('CELL ID BENCHMARKS');
  console.log('='.repeat(60));
  console.log('');

  const results = [
    bench('fromPoint', () => {
      for (const p of points) CellId.fromPoint(p);
    }),
    bench('toPoint', () => {
      for (const cell of cells) cell.toPoint();
    }),
    bench('fromFaceIJ', () => {
      for (let k = 0; k < BATCH; k++) CellId.fromFaceIJ(k % 6, k * 1024, k * 2048);
    }),
    bench('toFaceIJ', () => {
      for (const cell of cells) cell.toFaceIJOrientation();
    }),
    bench('parent/child', () => {
      for (const leaf of leaves) leaf.parent(10).child(2);
    }),
    bench('edgeNeighbors', () => {
      for (const cell of cells) cell.getEdgeNeighbors();
    }),
    bench('token', () => {
      for (const cell of cells) cell.toToken();
    }),
    bench('fromToken', () => {
      for (const token of tokens) CellId.fromToken(token);
    }),
    bench('toCompact', () => {
      for (const cell of cells) CompactCellId.fromCellId(cell);
    }),
    bench('compact.parent', () => {
      for (const cell of compactCells) cell.parent();
    }),
    bench('compact.next', () => {
      for (const cell of compactCells) cell.next();
    }),
    bench('encode/decode', () => {
      const encoder = encoding.createEncoder();
      encodeCellIds(encoder, cells);
      decodeCellIds(decoding.createDecoder(encoding.toUint8Array(encoder)));
    }),
  ];

  for (const result of results) {
    printResult(result);
  }
  console.log(summarizeResults(results));
  return results;
}
