import { resolveRunConfig } from "./config/parse-args";
import { formatResultGrid } from "./fractals/output/format";
import { computeResultGrid } from "./fractals/render";
import type { WorkerFactory } from "./fractals/workers/worker-factory";
import { ConfigurationError, DegenerateViewportError, ResourceExhaustedError } from "./lib/errors";
import { createDiagnosticLogger, Logger } from "./lib/logger";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface ProgramIO {
  /** Receives the rendered output and nothing else */
  stdout: { write(chunk: string): unknown };
  /** Receives warnings, errors and verbose timing */
  logger: Logger;
  /** Starts one pool worker; defaults to a node worker thread */
  createWorker?: WorkerFactory;
}

/**
 * Runs one render: resolve parameters, fill the result grid, write it out.
 *
 * @returns the process exit status
 */
export async function main(argv: readonly string[], io?: Partial<ProgramIO>): Promise<number> {
  const stdout = io?.stdout ?? process.stdout;
  const logger = io?.logger ?? createDiagnosticLogger();

  try {
    const config = resolveRunConfig(argv, logger);
    const grid = await computeResultGrid(config, { createWorker: io?.createWorker, logger });
    stdout.write(formatResultGrid(grid, config.maxIterations, config.outputMode));
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof DegenerateViewportError) {
      logger.error(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    if (error instanceof ResourceExhaustedError) {
      logger.error(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

export { resolveRunConfig, applyArgument, PARAMETER_KEYS } from "./config/parse-args";
export { createRunConfigStore, initialRunConfig } from "./config/store";
export { escapeTime, MandelbrotAlgorithm, mandelbrotAlgorithm } from "./fractals/algorithms/mandelbrot";
export { ASCII_PALETTE, asciiSymbol, paletteIndex } from "./fractals/algorithms/coloring";
export { formatAscii, formatPlotData, formatResultGrid } from "./fractals/output/format";
export { computeResultGrid, computeGridSequential, ParallelRenderer, allocateResultGrid } from "./fractals/render";
export { AtomicRowCursor, claimNextRows, drainRows } from "./fractals/render/row-cursor";
export { pixelToComplex } from "./lib/coordinates";
export { ConfigurationError, DegenerateViewportError, ResourceExhaustedError } from "./lib/errors";
export type { RunConfig, ResultGrid, Viewport, GridJob, OutputMode, ExecutionMode } from "./fractals/types";
