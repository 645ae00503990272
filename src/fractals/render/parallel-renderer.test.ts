import { Decimal } from "decimal.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Logger } from "../../lib/logger";
import { createInProcessWorkerFactory } from "../../test/in-process-worker";
import type { Viewport } from "../types";
import { toNumericViewport } from "../types";
import { ParallelRenderer, ParallelRenderParams } from "./parallel-renderer";
import { allocateResultGrid } from "./result-grid";
import { computeGridSequential } from "./sequential-renderer";

describe("ParallelRenderer", () => {
  let renderer: ParallelRenderer;
  let factory: ReturnType<typeof createInProcessWorkerFactory>;
  let logger: Logger;

  const viewport: Viewport = {
    lowerLeft: { x: new Decimal("-1.2"), y: new Decimal("0.20") },
    upperRight: { x: new Decimal("-1.0"), y: new Decimal("0.35") },
  };
  const testParams: ParallelRenderParams = { width: 40, height: 30, maxIterations: 255, viewport };

  beforeEach(() => {
    factory = createInProcessWorkerFactory();
    logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    renderer = new ParallelRenderer({ workerCount: 3, chunkSize: 1, createWorker: factory, logger });
  });

  afterEach(async () => {
    await renderer.terminate();
  });

  describe("constructor", () => {
    it("should default to 9 workers claiming one row at a time", () => {
      const r = new ParallelRenderer({ createWorker: factory });
      expect(r.getWorkerCount()).toBe(9);
      expect(r.getChunkSize()).toBe(1);
    });

    it("should reject a pool without workers", () => {
      expect(() => new ParallelRenderer({ workerCount: 0 })).toThrow("Worker count must be a positive integer, got 0");
    });

    it("should reject a chunk size below 1", () => {
      expect(() => new ParallelRenderer({ chunkSize: 0 })).toThrow("Chunk size must be a positive integer, got 0");
    });
  });

  describe("init", () => {
    it("should start every worker", async () => {
      await renderer.init();
      expect(factory.handles).toHaveLength(3);
    });

    it("should be idempotent (calling init twice is safe)", async () => {
      await renderer.init();
      await renderer.init();
      expect(factory.handles).toHaveLength(3);
    });

    it("should reject when a worker fails before answering the ping", async () => {
      const silent = createInProcessWorkerFactory({
        ping: () => new Promise<never>(() => undefined),
        computeRows: () => undefined,
      });
      const pool = new ParallelRenderer({ workerCount: 2, createWorker: silent, logger });

      try {
        const pending = pool.init();
        silent.handles[1].fail(new Error("worker exited at startup"));
        await expect(pending).rejects.toThrow("worker exited at startup");
      } finally {
        await pool.terminate();
      }

      expect(silent.handles.every((handle) => handle.terminated)).toBe(true);
    });

    it("should stay quiet unless verbose", async () => {
      await renderer.init();
      expect(logger.log).not.toHaveBeenCalled();
    });
  });

  describe("render", () => {
    it("should throw if not initialized", async () => {
      const grid = allocateResultGrid(testParams.width, testParams.height);
      await expect(renderer.render(testParams, grid)).rejects.toThrow(
        "ParallelRenderer not initialized. Call init() first."
      );
    });

    it("should reject a grid of the wrong size", async () => {
      await renderer.init();
      await expect(renderer.render(testParams, allocateResultGrid(10, 10))).rejects.toThrow(
        "Grid is 10x10, render expects 40x30"
      );
    });

    it("should produce the same grid as the sequential path", async () => {
      await renderer.init();
      const grid = allocateResultGrid(testParams.width, testParams.height);

      await renderer.render(testParams, grid);

      const expected = computeGridSequential({
        width: testParams.width,
        height: testParams.height,
        maxIterations: testParams.maxIterations,
        viewport: toNumericViewport(viewport),
      });
      expect(Array.from(grid.values)).toEqual(Array.from(expected.values));
    });

    it.each([
      [1, 1],
      [2, 4],
      [4, 7],
      [5, 64],
    ])("should match the sequential grid with %i workers and chunk size %i", async (workerCount, chunkSize) => {
      const pool = new ParallelRenderer({ workerCount, chunkSize, createWorker: factory, logger });
      const params: ParallelRenderParams = { ...testParams, width: 17, height: 13, maxIterations: 60 };
      const grid = allocateResultGrid(params.width, params.height);

      try {
        await pool.init();
        await pool.render(params, grid);
      } finally {
        await pool.terminate();
      }

      const expected = computeGridSequential({ ...params, viewport: toNumericViewport(viewport) });
      expect(Array.from(grid.values)).toEqual(Array.from(expected.values));
    });

    it("should report every row as claimed exactly once", async () => {
      await renderer.init();
      const grid = allocateResultGrid(testParams.width, testParams.height);

      const metrics = await renderer.render(testParams, grid);

      expect(metrics.workerCount).toBe(3);
      expect(metrics.totalRows).toBe(30);
      expect(metrics.completedRows).toBe(30);
      expect(metrics.totalClaims).toBe(30);
      expect(metrics.totalPixels).toBe(1200);
      expect(metrics.workers.map((w) => w.workerIndex)).toEqual([0, 1, 2]);
    });

    it("should use a fresh cursor for every render", async () => {
      await renderer.init();
      const first = allocateResultGrid(testParams.width, testParams.height);
      const second = allocateResultGrid(testParams.width, testParams.height);

      await renderer.render(testParams, first);
      const metrics = await renderer.render(testParams, second);

      expect(metrics.completedRows).toBe(30);
      expect(Array.from(second.values)).toEqual(Array.from(first.values));
    });

    it("should log throughput when verbose", async () => {
      const verbose = new ParallelRenderer({ workerCount: 2, createWorker: factory, logger, verbose: true });
      try {
        await verbose.init();
        await verbose.render(testParams, allocateResultGrid(testParams.width, testParams.height));
      } finally {
        await verbose.terminate();
      }

      expect(logger.log).toHaveBeenCalledWith(expect.stringContaining("Parallel render complete: 40x30 in "));
    });
  });

  describe("worker failures", () => {
    it("should reject the render when a worker throws", async () => {
      const failing = createInProcessWorkerFactory({
        ping: () => "pong",
        computeRows: () => {
          throw new Error("kernel blew up");
        },
      });
      const pool = new ParallelRenderer({ workerCount: 2, createWorker: failing, logger });

      try {
        await pool.init();
        await expect(pool.render(testParams, allocateResultGrid(40, 30))).rejects.toThrow("kernel blew up");
      } finally {
        await pool.terminate();
      }

      expect(logger.error).toHaveBeenCalledWith("Parallel render failed: 2 of 2 workers failed");
    });

    it("should reject the render when a worker thread crashes mid-render", async () => {
      const stalled = createInProcessWorkerFactory({
        ping: () => "pong",
        computeRows: () => new Promise<never>(() => undefined),
      });
      const pool = new ParallelRenderer({ workerCount: 1, createWorker: stalled, logger });

      try {
        await pool.init();
        const pending = pool.render(testParams, allocateResultGrid(40, 30));
        stalled.handles[0].fail(new Error("worker exited"));
        await expect(pending).rejects.toThrow("worker exited");
      } finally {
        await pool.terminate();
      }
    });

    it("should refuse to render on a worker that failed between renders", async () => {
      await renderer.init();
      factory.handles[2].fail(new Error("worker exited"));

      await expect(renderer.render(testParams, allocateResultGrid(40, 30))).rejects.toThrow("worker exited");
      expect(logger.error).toHaveBeenCalledWith("Parallel render failed: 1 of 3 workers failed");
    });

    it("should not keep failure listeners from finished calls", async () => {
      await renderer.init();
      for (let i = 0; i < 3; i++) {
        await renderer.render(testParams, allocateResultGrid(testParams.width, testParams.height));
      }

      // only the pool's own failure recorder remains
      expect(factory.handles.map((handle) => handle.listenerCount())).toEqual([1, 1, 1]);
    });
  });

  describe("terminate", () => {
    it("should stop every worker", async () => {
      await renderer.init();
      await renderer.terminate();
      expect(factory.handles.every((handle) => handle.terminated)).toBe(true);
    });

    it("should require init() again after terminating", async () => {
      await renderer.init();
      await renderer.terminate();
      await expect(renderer.render(testParams, allocateResultGrid(40, 30))).rejects.toThrow(
        "ParallelRenderer not initialized. Call init() first."
      );
    });
  });
});
