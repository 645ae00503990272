import { Decimal } from "decimal.js";

export type Point = {
  x: Decimal;
  y: Decimal;
};

// --- Viewport Types ---
// The rectangle of the complex plane mapped onto the pixel grid.
// Parsed values are kept as Decimal so they can cross the worker boundary as strings.
export type Viewport = {
  lowerLeft: Point;
  upperRight: Point;
};

// Double-precision form of a Viewport, used by the mapper and the kernel
export type NumericViewport = {
  llX: number;
  llY: number;
  urX: number;
  urY: number;
};

export type OutputMode = "ascii" | "plot-data";

export type ExecutionMode = "parallel" | "sequential";

// --- Run Configuration ---
// Resolved once from the command line and never mutated afterwards
export type RunConfig = {
  width: number;
  height: number;
  outputMode: OutputMode;
  viewport: Viewport;
  maxIterations: number;
  executionMode: ExecutionMode;
  workerCount: number;
  chunkSize: number;
  verbose: boolean;
  strict: boolean;
};

// --- Grid Job ---
// Everything a strategy needs to fill a result grid
export type GridJob = {
  width: number;
  height: number;
  maxIterations: number;
  viewport: NumericViewport;
};

// --- Result Grid ---
// Row-major iteration counts (index = y * width + x) backed by shared memory,
// so worker threads write into the same cells the renderer later reads.
export type ResultGrid = {
  width: number;
  height: number;
  buffer: SharedArrayBuffer;
  values: Int32Array;
};

/**
 * Half-open range of rows [startY, endY) claimed by one worker in one step.
 */
export type RowRange = {
  startY: number;
  endY: number;
};

/**
 * Converts the Decimal viewport corners to doubles.
 */
export function toNumericViewport(viewport: Viewport): NumericViewport {
  return {
    llX: viewport.lowerLeft.x.toNumber(),
    llY: viewport.lowerLeft.y.toNumber(),
    urX: viewport.upperRight.x.toNumber(),
    urY: viewport.upperRight.y.toNumber(),
  };
}

/**
 * Builds the grid job for a run configuration.
 */
export function toGridJob(config: RunConfig): GridJob {
  return {
    width: config.width,
    height: config.height,
    maxIterations: config.maxIterations,
    viewport: toNumericViewport(config.viewport),
  };
}
