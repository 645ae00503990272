import { Decimal } from "decimal.js";
import { createStore } from "zustand/vanilla";

import type { Point, RunConfig, Viewport } from "../fractals/types";

type Corner = keyof Viewport;

export type ConfigWarning = {
  /** The key, or the whole token when it has no key */
  parameter: string;
  message: string;
};

type State = {
  config: RunConfig;
  /** Problems met while applying arguments, in argument order */
  warnings: ConfigWarning[];
};

type Actions = {
  setRunConfig: (config: Partial<Omit<RunConfig, "viewport">>) => void;
  setViewportCoordinate: (corner: Corner, axis: keyof Point, value: Decimal) => void;
  addWarning: (warning: ConfigWarning) => void;
  reset: () => void;
};

export type RunConfigStore = ReturnType<typeof createRunConfigStore>;

export const initialRunConfig: RunConfig = {
  width: 100,
  height: 75,
  outputMode: "ascii",
  viewport: {
    lowerLeft: { x: new Decimal("-1.2"), y: new Decimal("0.20") },
    upperRight: { x: new Decimal("-1.0"), y: new Decimal("0.35") },
  },
  maxIterations: 255,
  executionMode: "parallel",
  workerCount: 9,
  chunkSize: 1,
  verbose: false,
  strict: false,
};

const initialState: State = {
  config: initialRunConfig,
  warnings: [],
};

/**
 * Creates the store that collects run parameters while the command line is
 * read. One store per run; nothing is shared between runs.
 */
export const createRunConfigStore = () =>
  createStore<State & Actions>()((set) => ({
    ...initialState,

    setRunConfig: (partial) =>
      set((state) => ({
        config: { ...state.config, ...partial },
      })),
    setViewportCoordinate: (corner, axis, value) =>
      set((state) => {
        const current = state.config.viewport;
        const point: Point = axis === "x" ? { ...current[corner], x: value } : { ...current[corner], y: value };
        const viewport: Viewport =
          corner === "lowerLeft" ? { ...current, lowerLeft: point } : { ...current, upperRight: point };
        return { config: { ...state.config, viewport } };
      }),
    addWarning: (warning) => set((state) => ({ warnings: [...state.warnings, warning] })),
    reset: () => set(initialState),
  }));
