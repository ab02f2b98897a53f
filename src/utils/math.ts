/**
 * Vector math for late-interaction retrieval.
 *
 * Loops are written out by hand: multi-vectors hold ~1000 patch vectors of
 * 128 dims per page, and Math.max(...arr) spreads every element as a
 * function argument (V8 caps that at ~65 536).
 */

import type { MultiVector } from '../models/document.js';

/**
 * Dot product of two equal-length vectors.
 *
 * @throws Error if the dimensions differ
 */
export function dot(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * MaxSim late-interaction score: for every query vector take its best dot
 * product against the page vectors, then sum those maxima.
 *
 * An empty page contributes nothing (score 0).
 */
export function maxSimScore(query: MultiVector, page: MultiVector): number {
  if (page.length === 0) return 0;
  let total = 0;
  for (const q of query) {
    let best = -Infinity;
    for (const p of page) {
      const s = dot(q, p);
      if (s > best) best = s;
    }
    total += best;
  }
  return total;
}

/**
 * Return the maximum value in a numeric array (iterative, no spread).
 * Returns `undefined` when the array is empty so callers can provide
 * their own fallback via `?? defaultValue`.
 */
export function safeMax(arr: number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let max = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] > max) max = arr[i];
  }
  return max;
}
