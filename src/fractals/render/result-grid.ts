import { ResourceExhaustedError } from "../../lib/errors";
import type { ResultGrid } from "../types";

/**
 * Allocates a zeroed, row-major grid of width × height iteration counts in
 * shared memory.
 *
 * @throws ResourceExhaustedError if the buffer cannot be allocated
 */
export function allocateResultGrid(width: number, height: number): ResultGrid {
  const byteLength = width * height * Int32Array.BYTES_PER_ELEMENT;

  if (!Number.isSafeInteger(byteLength)) {
    throw new ResourceExhaustedError(
      `Failed to allocate result buffer: ${width}x${height} grid is too large`,
      byteLength
    );
  }

  let buffer: SharedArrayBuffer;
  try {
    buffer = new SharedArrayBuffer(byteLength);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ResourceExhaustedError(
        `Failed to allocate result buffer (${byteLength} bytes): ${error.message}`,
        byteLength
      );
    }
    throw error;
  }

  return { width, height, buffer, values: new Int32Array(buffer) };
}

/**
 * Wraps a shared buffer received from another thread as a grid view.
 */
export function attachResultGrid(buffer: SharedArrayBuffer, width: number, height: number): ResultGrid {
  const values = new Int32Array(buffer);
  if (values.length !== width * height) {
    throw new Error(`Result buffer holds ${values.length} cells, expected ${width}x${height}`);
  }
  return { width, height, buffer, values };
}

/**
 * Reads the iteration count stored for pixel (x, y).
 */
export function gridValue(grid: ResultGrid, x: number, y: number): number {
  return grid.values[y * grid.width + x];
}
