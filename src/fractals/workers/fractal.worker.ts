// ABOUTME: Worker thread entry point for parallel fractal computation using Comlink RPC
// ABOUTME: Exposes the worker API to the parent thread over its message port

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter.js";
import { parentPort } from "node:worker_threads";

import { workerAPI } from "./worker-api";

if (!parentPort) {
  throw new Error("fractal.worker must be started as a worker thread");
}

Comlink.expose(workerAPI, nodeEndpoint(parentPort));
