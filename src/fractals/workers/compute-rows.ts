// ABOUTME: Core row computation shared by the sequential path and the worker threads
// ABOUTME: Maps each pixel to c, runs the kernel and stores the result in the grid

import { performance } from "node:perf_hooks";

import { escapeTime } from "../algorithms/mandelbrot";
import { attachResultGrid } from "../render/result-grid";
import { AtomicRowCursor, drainRows } from "../render/row-cursor";
import { pixelToComplex } from "../../lib/coordinates";
import type { GridJob } from "../types";
import { RowJobReport, RowJobRequest, gridJobFromRequest } from "./types";

/**
 * Computes every pixel of row `y` and writes the escape-time values into
 * `values` (row-major, `job.width` cells per row).
 */
export function computeRow(job: GridJob, y: number, values: Int32Array): void {
  const { width, height, maxIterations, viewport } = job;
  const rowOffset = y * width;

  for (let x = 0; x < width; x++) {
    const { real, imag } = pixelToComplex({ x, y }, width, height, viewport);
    values[rowOffset + x] = escapeTime(real, imag, maxIterations);
  }
}

/**
 * Worker body: claims row ranges from the shared cursor until it passes the
 * last row, computing each claimed row straight into the shared grid.
 *
 * Claimed ranges never overlap, so the grid cells need no locking.
 *
 * @param request - Job description with the shared cursor and grid buffers
 * @returns Report of the ranges this worker claimed and how long it computed
 */
export function computeRows(request: RowJobRequest): RowJobReport {
  const job = gridJobFromRequest(request);
  const cursor = new AtomicRowCursor(request.cursorBuffer);
  const grid = attachResultGrid(request.gridBuffer, request.width, request.height);

  const startTime = performance.now();
  let rows = 0;
  const claims = drainRows(cursor, request.height, request.chunkSize, (y) => {
    computeRow(job, y, grid.values);
    rows++;
  });

  return {
    workerIndex: request.workerIndex,
    claims,
    rows,
    pixels: rows * request.width,
    computeTime: performance.now() - startTime,
  };
}
