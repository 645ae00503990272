// ABOUTME: Shared row cursor that hands out row ranges to worker threads
// ABOUTME: One fetch-and-add per claim is the only cross-worker coordination

import type { RowRange } from "../types";

/**
 * Source of row claims. `claim` returns the first row of the claimed range
 * and advances the cursor by `count`.
 */
export interface RowCursor {
  claim(count: number): number;
}

/**
 * Row cursor backed by a SharedArrayBuffer, so every thread that attaches to
 * the same buffer draws from one counter. Created per render, never shared
 * between runs.
 */
export class AtomicRowCursor implements RowCursor {
  readonly buffer: SharedArrayBuffer;
  private view: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.buffer = buffer;
    this.view = new Int32Array(buffer, 0, 1);
  }

  claim(count: number): number {
    return Atomics.add(this.view, 0, count);
  }

  /**
   * Current cursor position. May exceed the grid height once workers have
   * made their final (empty) claims.
   */
  position(): number {
    return Atomics.load(this.view, 0);
  }
}

/**
 * Claims the next range of rows, or returns null once the cursor has passed
 * the last row. A chunk larger than the grid advances the cursor by the
 * height only, keeping it inside the int32 range of the shared counter.
 */
export function claimNextRows(cursor: RowCursor, height: number, chunkSize: number): RowRange | null {
  const startY = cursor.claim(Math.min(chunkSize, height));
  if (startY >= height) {
    return null;
  }
  return { startY, endY: Math.min(startY + chunkSize, height) };
}

/**
 * Keeps claiming ranges until the cursor runs past `height`, calling `visit`
 * for every row of every claimed range.
 *
 * @returns the ranges this caller claimed, in claim order
 */
export function drainRows(
  cursor: RowCursor,
  height: number,
  chunkSize: number,
  visit: (y: number) => void
): RowRange[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const claims: RowRange[] = [];
  for (let range = claimNextRows(cursor, height, chunkSize); range; range = claimNextRows(cursor, height, chunkSize)) {
    for (let y = range.startY; y < range.endY; y++) {
      visit(y);
    }
    claims.push(range);
  }
  return claims;
}
