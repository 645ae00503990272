import { computeRow } from "../workers/compute-rows";
import type { GridJob, ResultGrid } from "../types";
import { allocateResultGrid } from "./result-grid";

/**
 * Fills `grid` row by row on the calling thread.
 */
export function fillGridSequential(job: GridJob, grid: ResultGrid): void {
  if (grid.width !== job.width || grid.height !== job.height) {
    throw new Error(`Grid is ${grid.width}x${grid.height}, job expects ${job.width}x${job.height}`);
  }

  for (let y = 0; y < job.height; y++) {
    computeRow(job, y, grid.values);
  }
}

/**
 * Allocates a grid for `job` and computes it on the calling thread.
 */
export function computeGridSequential(job: GridJob): ResultGrid {
  const grid = allocateResultGrid(job.width, job.height);
  fillGridSequential(job, grid);
  return grid;
}
