import { computeRows } from "./compute-rows";
import { RowJobRequest } from "./types";

/**
 * Worker API exposed to the main thread via Comlink.
 * All methods can be called as if they were async functions on the main thread.
 */
export const workerAPI = {
  /**
   * Claims and computes rows until the shared cursor is exhausted.
   */
  computeRows: (request: RowJobRequest) => {
    return computeRows(request);
  },

  /**
   * Simple ping method for testing worker connectivity.
   */
  ping: () => "pong" as const,
};

export type FractalWorkerAPI = typeof workerAPI;
