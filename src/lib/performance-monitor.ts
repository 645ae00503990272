import { performance } from "node:perf_hooks";

import type { RowJobReport } from "../fractals/workers/types";

/**
 * Metrics for one worker's share of a render.
 */
export interface WorkerMetrics {
  workerIndex: number;
  claims: number;
  rows: number;
  pixels: number;
  computeTime: number; // milliseconds
}

/**
 * Metrics for a complete render session.
 */
export interface RenderSessionMetrics {
  sessionId: string;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  workerCount: number;
  totalRows: number;
  completedRows: number;
  totalPixels: number;
  pixelsPerSecond: number;
  totalClaims: number;
  /** Slowest worker's compute time over the mean compute time (1 = perfectly balanced) */
  loadImbalance: number;
  workers: WorkerMetrics[];
}

/**
 * Active render session tracking.
 */
interface RenderSession {
  sessionId: string;
  startTime: number;
  workerCount: number;
  totalRows: number;
  totalPixels: number;
  workers: WorkerMetrics[];
}

/**
 * Performance monitor for parallel renders.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const sessionId = monitor.startRender(workerCount, height, width * height);
 *
 * // For each worker report:
 * monitor.recordWorker(sessionId, report);
 *
 * const metrics = monitor.endRender(sessionId);
 * console.log(`Render took ${metrics.duration}ms at ${metrics.pixelsPerSecond} px/s`);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<string, RenderSession>();
  private nextSessionNumber = 1;

  /**
   * Starts a new render session.
   *
   * @returns Session ID for tracking
   */
  startRender(workerCount: number, totalRows: number, totalPixels: number): string {
    const sessionId = `render-${this.nextSessionNumber++}`;

    this.activeSessions.set(sessionId, {
      sessionId,
      startTime: performance.now(),
      workerCount,
      totalRows,
      totalPixels,
      workers: [],
    });

    return sessionId;
  }

  /**
   * Records the report a worker returned once it ran out of rows.
   */
  recordWorker(sessionId: string, report: RowJobReport): void {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    session.workers.push({
      workerIndex: report.workerIndex,
      claims: report.claims.length,
      rows: report.rows,
      pixels: report.pixels,
      computeTime: report.computeTime,
    });
  }

  /**
   * Ends a render session and calculates final metrics.
   */
  endRender(sessionId: string): RenderSessionMetrics {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    const endTime = performance.now();
    const duration = endTime - session.startTime;
    const workers = [...session.workers].sort((a, b) => a.workerIndex - b.workerIndex);

    const completedRows = workers.reduce((sum, w) => sum + w.rows, 0);
    const totalClaims = workers.reduce((sum, w) => sum + w.claims, 0);
    const computeTimes = workers.map((w) => w.computeTime);
    const meanComputeTime = computeTimes.length > 0 ? computeTimes.reduce((a, b) => a + b, 0) / computeTimes.length : 0;
    const loadImbalance = meanComputeTime > 0 ? Math.max(...computeTimes) / meanComputeTime : 1;

    const pixelsPerSecond = duration > 0 ? (session.totalPixels / duration) * 1000 : 0;

    const metrics: RenderSessionMetrics = {
      sessionId,
      startTime: session.startTime,
      endTime,
      duration,
      workerCount: session.workerCount,
      totalRows: session.totalRows,
      completedRows,
      totalPixels: session.totalPixels,
      pixelsPerSecond,
      totalClaims,
      loadImbalance,
      workers,
    };

    this.activeSessions.delete(sessionId);

    return metrics;
  }
}
