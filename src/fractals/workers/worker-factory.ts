import nodeEndpoint from "comlink/dist/umd/node-adapter.js";
import type { Endpoint } from "comlink";
import path from "node:path";
import { Worker, WorkerOptions } from "node:worker_threads";

/**
 * A started worker as seen by the pool: a Comlink endpoint to talk to it,
 * a way to hear about crashes, and a way to stop it.
 */
export interface FractalWorkerHandle {
  endpoint: Endpoint;
  /**
   * Registers a listener for failures outside of an RPC call (e.g., the thread
   * crashing or exiting on its own). Returns a function that removes it.
   */
  onError(listener: (error: Error) => void): () => void;
  terminate(): Promise<void>;
}

export type WorkerFactory = (index: number) => FractalWorkerHandle;

/**
 * Path of the compiled worker entry point next to this module.
 */
export const WORKER_SCRIPT_PATH = path.join(__dirname, "fractal.worker.js");

/**
 * Creates a factory that starts one worker thread per call, running `script`
 * (a file path, or source code when `options.eval` is set).
 */
export function createThreadWorkerFactory(
  script: string = WORKER_SCRIPT_PATH,
  options: Omit<WorkerOptions, "name"> = {}
): WorkerFactory {
  return (index) => {
    const worker = new Worker(script, { ...options, name: `fractal-worker-${index}` });
    const listeners = new Set<(error: Error) => void>();
    let terminating = false;

    worker.on("error", (error) => {
      listeners.forEach((listener) => listener(error));
    });
    worker.on("exit", (code) => {
      if (terminating) return;
      const error = new Error(`Worker ${index} exited unexpectedly with code ${code}`);
      listeners.forEach((listener) => listener(error));
    });

    return {
      endpoint: nodeEndpoint(worker),
      onError: (listener) => {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
      terminate: async () => {
        terminating = true;
        await worker.terminate();
      },
    };
  };
}

/**
 * Starts a worker thread running the compiled fractal worker script.
 */
export const createThreadWorker: WorkerFactory = createThreadWorkerFactory();
