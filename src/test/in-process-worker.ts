// ABOUTME: Test stand-in for worker threads
// ABOUTME: Serves a worker API over an in-process MessageChannel so tests never spawn threads

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter.js";
import { MessageChannel } from "node:worker_threads";

import type { FractalWorkerHandle, WorkerFactory } from "../fractals/workers/worker-factory";
import { workerAPI } from "../fractals/workers/worker-api";

export type InProcessWorkerHandle = FractalWorkerHandle & {
  fail(error: Error): void;
  listenerCount(): number;
  terminated: boolean;
};

/**
 * Creates a factory whose "workers" expose `api` (the real worker API by
 * default) on one end of a MessageChannel. Every handle it creates is kept
 * in `handles` so tests can inspect or fail them.
 */
export function createInProcessWorkerFactory(api: object = workerAPI): WorkerFactory & {
  handles: InProcessWorkerHandle[];
} {
  const handles: InProcessWorkerHandle[] = [];

  const factory = () => {
    const { port1, port2 } = new MessageChannel();
    Comlink.expose(api, nodeEndpoint(port1));

    const errorListeners = new Set<(error: Error) => void>();
    const handle = {
      endpoint: nodeEndpoint(port2),
      terminated: false,
      onError: (listener: (error: Error) => void) => {
        errorListeners.add(listener);
        return () => {
          errorListeners.delete(listener);
        };
      },
      listenerCount: () => errorListeners.size,
      fail: (error: Error) => {
        errorListeners.forEach((listener) => listener(error));
      },
      terminate: async () => {
        handle.terminated = true;
        port1.close();
        port2.close();
      },
    };
    handles.push(handle);
    return handle;
  };

  return Object.assign(factory, { handles });
}
