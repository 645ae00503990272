import { performance } from "node:perf_hooks";

import type { Logger } from "../../lib/logger";
import type { WorkerFactory } from "../workers/worker-factory";
import { toGridJob } from "../types";
import type { ResultGrid, RunConfig } from "../types";
import { ParallelRenderer } from "./parallel-renderer";
import { allocateResultGrid } from "./result-grid";
import { fillGridSequential } from "./sequential-renderer";

export interface ComputeOptions {
  /** Starts one pool worker; defaults to a node worker thread */
  createWorker?: WorkerFactory;
  logger?: Logger;
}

/**
 * Allocates the result grid for `config` and fills it with the configured
 * execution strategy. The returned grid is complete: in parallel mode every
 * worker has finished and the pool has been shut down.
 *
 * @throws ResourceExhaustedError if the grid cannot be allocated
 */
export async function computeResultGrid(config: RunConfig, options: ComputeOptions = {}): Promise<ResultGrid> {
  const logger = options.logger ?? console;
  const grid = allocateResultGrid(config.width, config.height);

  if (config.executionMode === "sequential") {
    const startTime = performance.now();
    fillGridSequential(toGridJob(config), grid);
    if (config.verbose) {
      const duration = performance.now() - startTime;
      logger.log(`Sequential render complete: ${config.width}x${config.height} in ${duration.toFixed(1)}ms`);
    }
    return grid;
  }

  const renderer = new ParallelRenderer({
    workerCount: config.workerCount,
    chunkSize: config.chunkSize,
    createWorker: options.createWorker,
    logger,
    verbose: config.verbose,
  });

  try {
    await renderer.init();
    await renderer.render(config, grid);
  } finally {
    await renderer.terminate();
  }

  return grid;
}

export { ParallelRenderer } from "./parallel-renderer";
export { computeGridSequential, fillGridSequential } from "./sequential-renderer";
export { allocateResultGrid, gridValue } from "./result-grid";
