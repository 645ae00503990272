// ABOUTME: Type definitions for worker thread communication
// ABOUTME: Defines the row job sent to each worker and the report it sends back

import { Decimal } from "decimal.js";

import { toNumericViewport } from "../types";
import type { GridJob, RowRange, Viewport } from "../types";

/**
 * Serializable version of Viewport where Decimal objects are converted to strings
 * for safe transmission via postMessage (structured clone algorithm).
 */
export interface SerializableViewport {
  lowerLeft: { x: string; y: string };
  upperRight: { x: string; y: string };
}

/**
 * Request sent to a worker to take part in filling the result grid.
 * Both buffers are shared; the worker never copies the grid.
 */
export interface RowJobRequest {
  /** Index of the worker in the pool (for reporting only) */
  workerIndex: number;
  width: number;
  height: number;
  maxIterations: number;
  /** Rows claimed per fetch-and-add */
  chunkSize: number;
  viewport: SerializableViewport;
  /** One Int32 holding the next unclaimed row */
  cursorBuffer: SharedArrayBuffer;
  /** width × height Int32 cells, row-major */
  gridBuffer: SharedArrayBuffer;
}

/**
 * What a worker did once the cursor ran out.
 */
export interface RowJobReport {
  workerIndex: number;
  claims: RowRange[];
  rows: number;
  pixels: number;
  /** Milliseconds spent computing */
  computeTime: number;
}

/**
 * Serializes a Viewport by converting Decimal objects to strings.
 */
export function serializeViewport(viewport: Viewport): SerializableViewport {
  return {
    lowerLeft: { x: viewport.lowerLeft.x.toString(), y: viewport.lowerLeft.y.toString() },
    upperRight: { x: viewport.upperRight.x.toString(), y: viewport.upperRight.y.toString() },
  };
}

/**
 * Restores Decimal objects from a serialized viewport.
 */
export function deserializeViewport(serialized: SerializableViewport): Viewport {
  return {
    lowerLeft: { x: new Decimal(serialized.lowerLeft.x), y: new Decimal(serialized.lowerLeft.y) },
    upperRight: { x: new Decimal(serialized.upperRight.x), y: new Decimal(serialized.upperRight.y) },
  };
}

/**
 * Builds the grid job a worker computes from its request.
 */
export function gridJobFromRequest(request: RowJobRequest): GridJob {
  return {
    width: request.width,
    height: request.height,
    maxIterations: request.maxIterations,
    viewport: toNumericViewport(deserializeViewport(request.viewport)),
  };
}
