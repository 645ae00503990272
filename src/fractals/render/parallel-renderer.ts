// ABOUTME: Orchestrates parallel fractal computation using worker threads
// ABOUTME: Workers pull rows from one shared atomic cursor and write into a shared grid

import * as Comlink from "comlink";
import os from "node:os";

import type { Logger } from "../../lib/logger";
import { PerformanceMonitor, RenderSessionMetrics } from "../../lib/performance-monitor";
import type { ResultGrid, RunConfig } from "../types";
import { createThreadWorker, FractalWorkerHandle, WorkerFactory } from "../workers/worker-factory";
import type { FractalWorkerAPI } from "../workers/worker-api";
import { RowJobRequest, serializeViewport } from "../workers/types";
import { AtomicRowCursor } from "./row-cursor";

export const DEFAULT_WORKER_COUNT = 9;
export const DEFAULT_CHUNK_SIZE = 1;

export type ParallelRenderParams = Pick<RunConfig, "width" | "height" | "maxIterations" | "viewport">;

export interface ParallelRendererOptions {
  /** Number of worker threads in the pool (default: 9) */
  workerCount?: number;
  /** Rows handed out per claim (default: 1) */
  chunkSize?: number;
  /** Starts one worker; defaults to a node worker thread */
  createWorker?: WorkerFactory;
  logger?: Logger;
  /** Log pool lifecycle and per-render throughput */
  verbose?: boolean;
}

/**
 * ParallelRenderer fills a result grid across a fixed pool of worker threads.
 *
 * Every render gets a fresh row cursor in shared memory. Each worker repeatedly
 * claims the next `chunkSize` rows with one atomic fetch-and-add and computes
 * them into the shared grid, stopping when its claim starts past the last row.
 * Small chunks keep the pool balanced: rows deep inside the set cost the full
 * iteration cap while escaping rows are cheap.
 *
 * Usage:
 * ```typescript
 * const renderer = new ParallelRenderer({ workerCount: 4 });
 * await renderer.init();
 * try {
 *   await renderer.render(params, grid);
 * } finally {
 *   await renderer.terminate();
 * }
 * ```
 */
export class ParallelRenderer {
  private workers: Array<{ handle: FractalWorkerHandle; api: Comlink.Remote<FractalWorkerAPI> }> = [];
  private workerCount: number;
  private chunkSize: number;
  private isInitialized = false;
  private createWorker: WorkerFactory;
  private logger: Logger;
  private verbose: boolean;
  private performanceMonitor = new PerformanceMonitor();
  private workerFailures: Array<Error | null> = [];

  constructor(options: ParallelRendererOptions = {}) {
    this.workerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.createWorker = options.createWorker ?? createThreadWorker;
    this.logger = options.logger ?? console;
    this.verbose = options.verbose ?? false;

    if (!Number.isInteger(this.workerCount) || this.workerCount < 1) {
      throw new Error(`Worker count must be a positive integer, got ${this.workerCount}`);
    }
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new Error(`Chunk size must be a positive integer, got ${this.chunkSize}`);
    }
  }

  /**
   * Starts the worker pool and waits for every worker to answer a ping.
   * Must be called before render().
   *
   * @throws Error if a worker fails or exits before answering
   */
  async init(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    for (let i = 0; i < this.workerCount; i++) {
      const handle = this.createWorker(i);
      const api = Comlink.wrap<FractalWorkerAPI>(handle.endpoint);
      this.workerFailures.push(null);
      handle.onError((error) => {
        this.workerFailures[i] ??= error;
      });
      this.workers.push({ handle, api });
    }

    const responses = await Promise.all(
      this.workers.map(({ handle, api }, i) => this.untilWorkerFails(i, handle, () => api.ping()))
    );
    responses.forEach((response, i) => {
      if (response !== "pong") {
        throw new Error(`Worker ${i} failed to respond to ping`);
      }
    });

    this.isInitialized = true;
    if (this.verbose) {
      this.logger.log(
        `ParallelRenderer initialized with ${this.workerCount} workers (chunk size ${this.chunkSize}, ` +
          `${os.availableParallelism()} cores available)`
      );
    }
  }

  /**
   * Computes every pixel of `grid` using the whole pool.
   *
   * Resolves only after every worker has finished, so the grid is complete
   * and safe to read. If any worker fails the render rejects with the first
   * failure once all workers have settled.
   *
   * @throws Error if not initialized, if the grid does not match the params, or if a worker fails
   */
  async render(params: ParallelRenderParams, grid: ResultGrid): Promise<RenderSessionMetrics> {
    if (!this.isInitialized) {
      throw new Error("ParallelRenderer not initialized. Call init() first.");
    }

    if (grid.width !== params.width || grid.height !== params.height) {
      throw new Error(`Grid is ${grid.width}x${grid.height}, render expects ${params.width}x${params.height}`);
    }

    const cursor = new AtomicRowCursor();
    const viewport = serializeViewport(params.viewport);
    const sessionId = this.performanceMonitor.startRender(
      this.workers.length,
      params.height,
      params.width * params.height
    );

    const outcomes = await Promise.allSettled(
      this.workers.map(({ handle, api }, workerIndex) => {
        const request: RowJobRequest = {
          workerIndex,
          width: params.width,
          height: params.height,
          maxIterations: params.maxIterations,
          chunkSize: this.chunkSize,
          viewport,
          cursorBuffer: cursor.buffer,
          gridBuffer: grid.buffer,
        };
        return this.untilWorkerFails(workerIndex, handle, () => api.computeRows(request));
      })
    );

    const failures: unknown[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "fulfilled") {
        this.performanceMonitor.recordWorker(sessionId, outcome.value);
      } else {
        failures.push(outcome.reason);
      }
    }

    const metrics = this.performanceMonitor.endRender(sessionId);

    if (failures.length > 0) {
      this.logger.error(`Parallel render failed: ${failures.length} of ${this.workers.length} workers failed`);
      throw failures[0];
    }

    if (this.verbose) {
      this.logger.log(
        `Parallel render complete: ${params.width}x${params.height} in ${metrics.duration.toFixed(1)}ms ` +
          `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s, ${metrics.totalClaims} claims, ` +
          `load imbalance ${metrics.loadImbalance.toFixed(2)})`
      );
    }

    return metrics;
  }

  /**
   * Runs one call against a worker, rejecting as soon as the worker fails
   * outside the call (a crash or an unexpected exit) so nothing waits forever
   * on a dead thread.
   */
  private untilWorkerFails<T>(workerIndex: number, handle: FractalWorkerHandle, call: () => Promise<T>): Promise<T> {
    const earlierFailure = this.workerFailures[workerIndex];
    if (earlierFailure) {
      return Promise.reject(earlierFailure);
    }

    let removeListener: () => void = () => undefined;
    return new Promise<T>((resolve, reject) => {
      removeListener = handle.onError(reject);
      call().then(resolve, reject);
    }).finally(() => removeListener());
  }

  /**
   * Terminates all workers and cleans up resources.
   */
  async terminate(): Promise<void> {
    const workers = this.workers;
    this.workers = [];
    this.workerFailures = [];
    this.isInitialized = false;

    for (const { api } of workers) {
      api[Comlink.releaseProxy]();
    }
    await Promise.all(workers.map(({ handle }) => handle.terminate()));

    if (this.verbose && workers.length > 0) {
      this.logger.log("ParallelRenderer terminated");
    }
  }

  getWorkerCount(): number {
    return this.workerCount;
  }

  getChunkSize(): number {
    return this.chunkSize;
  }
}
