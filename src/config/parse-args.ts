// ABOUTME: Resolves run parameters from key=value command-line tokens
// ABOUTME: Bad tokens are reported and skipped unless strict mode is on

import { Decimal } from "decimal.js";

import { assertViewport } from "../lib/coordinates";
import { ConfigurationError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { ExecutionMode, Point, RunConfig, Viewport } from "../fractals/types";
import { createRunConfigStore, RunConfigStore } from "./store";

type ParseResult<T> = { ok: true; value: T } | { ok: false; expected: string };

type Parameter = {
  key: string;
  apply: (store: RunConfigStore, raw: string) => ParseResult<unknown>;
};

// Row claims and grid sizes go through an Int32Array counter
const INT32_MAX = 2 ** 31 - 1;

function parseDecimal(raw: string): Decimal | null {
  try {
    const value = new Decimal(raw);
    return value.isFinite() && Number.isFinite(value.toNumber()) ? value : null;
  } catch {
    return null;
  }
}

function parsePositiveInteger(raw: string): ParseResult<number> {
  const value = parseDecimal(raw);
  if (!value || !value.isInteger() || !value.isPositive() || value.isZero()) {
    return { ok: false, expected: "a positive integer" };
  }
  if (value.greaterThan(INT32_MAX)) {
    return { ok: false, expected: `a positive integer no greater than ${INT32_MAX}` };
  }
  return { ok: true, value: value.toNumber() };
}

// Any non-zero integer turns a flag on
function parseFlag(raw: string): ParseResult<boolean> {
  const value = parseDecimal(raw);
  if (!value || !value.isInteger()) {
    return { ok: false, expected: "an integer flag (0 or 1)" };
  }
  return { ok: true, value: !value.isZero() };
}

function parseReal(raw: string): ParseResult<Decimal> {
  const value = parseDecimal(raw);
  return value ? { ok: true, value } : { ok: false, expected: "a finite number" };
}

function parseExecutionMode(raw: string): ParseResult<ExecutionMode> {
  if (raw === "parallel" || raw === "sequential") {
    return { ok: true, value: raw };
  }
  return { ok: false, expected: "'parallel' or 'sequential'" };
}

type ConfigPatch = Partial<Omit<RunConfig, "viewport">>;

function integerParameter(key: string, patch: (value: number) => ConfigPatch): Parameter {
  return {
    key,
    apply: (store, raw) => {
      const result = parsePositiveInteger(raw);
      if (result.ok) store.getState().setRunConfig(patch(result.value));
      return result;
    },
  };
}

function flagParameter(key: string, patch: (value: boolean) => ConfigPatch): Parameter {
  return {
    key,
    apply: (store, raw) => {
      const result = parseFlag(raw);
      if (result.ok) store.getState().setRunConfig(patch(result.value));
      return result;
    },
  };
}

function coordinateParameter(key: string, corner: keyof Viewport, axis: keyof Point): Parameter {
  return {
    key,
    apply: (store, raw) => {
      const result = parseReal(raw);
      if (result.ok) store.getState().setViewportCoordinate(corner, axis, result.value);
      return result;
    },
  };
}

const PARAMETERS: Parameter[] = [
  integerParameter("width", (width) => ({ width })),
  integerParameter("height", (height) => ({ height })),
  flagParameter("png", (png) => ({ outputMode: png ? "plot-data" : "ascii" })),
  coordinateParameter("ll_x", "lowerLeft", "x"),
  coordinateParameter("ll_y", "lowerLeft", "y"),
  coordinateParameter("ur_x", "upperRight", "x"),
  coordinateParameter("ur_y", "upperRight", "y"),
  integerParameter("max_iter", (maxIterations) => ({ maxIterations })),
  {
    key: "mode",
    apply: (store, raw) => {
      const result = parseExecutionMode(raw);
      if (result.ok) store.getState().setRunConfig({ executionMode: result.value });
      return result;
    },
  },
  integerParameter("threads", (workerCount) => ({ workerCount })),
  integerParameter("chunk", (chunkSize) => ({ chunkSize })),
  flagParameter("verbose", (verbose) => ({ verbose })),
  flagParameter("strict", (strict) => ({ strict })),
];

const PARAMETERS_BY_KEY = new Map(PARAMETERS.map((parameter) => [parameter.key, parameter]));

/**
 * Names of every accepted key, in the order they are documented.
 */
export const PARAMETER_KEYS = PARAMETERS.map((parameter) => parameter.key);

/**
 * Applies one `key=value` token to the store. Tokens that cannot be applied
 * leave the store's config untouched and add a warning instead.
 */
export function applyArgument(store: RunConfigStore, arg: string): void {
  const { addWarning } = store.getState();
  const separator = arg.indexOf("=");
  if (separator === -1) {
    addWarning({ parameter: arg, message: `Ignoring invalid argument '${arg}'` });
    return;
  }

  const key = arg.slice(0, separator);
  const raw = arg.slice(separator + 1);
  const parameter = PARAMETERS_BY_KEY.get(key);
  if (!parameter) {
    addWarning({ parameter: key, message: `Unknown parameter '${key}'` });
    return;
  }

  const result = parameter.apply(store, raw);
  if (!result.ok) {
    addWarning({ parameter: key, message: `Invalid value '${raw}' for '${key}': expected ${result.expected}` });
  }
}

/**
 * Resolves the run configuration from command-line tokens.
 *
 * Every token that cannot be applied is reported through `logger.warn` and
 * skipped, keeping the default (or an earlier valid value). With `strict=1`
 * the first such problem is fatal instead.
 *
 * @throws ConfigurationError in strict mode when any token could not be applied
 * @throws DegenerateViewportError when the resolved viewport has no area
 */
export function resolveRunConfig(argv: readonly string[], logger: Logger = console): RunConfig {
  const store = createRunConfigStore();
  for (const arg of argv) {
    applyArgument(store, arg);
  }

  const { config, warnings } = store.getState();
  if (config.strict && warnings.length > 0) {
    throw new ConfigurationError(warnings[0].message, warnings[0].parameter);
  }
  for (const warning of warnings) {
    logger.warn(`Warning: ${warning.message}`);
  }

  assertViewport(config.viewport);
  return config;
}
