// ABOUTME: Error types for the run: configuration, geometry and allocation failures
// ABOUTME: The CLI maps each one to an exit status

/**
 * A run parameter could not be applied while strict mode is on.
 */
export class ConfigurationError extends Error {
  parameter: string;

  constructor(message: string, parameter: string) {
    super(message);
    this.name = "ConfigurationError";
    this.parameter = parameter;
  }
}

/**
 * The viewport has zero or negative extent on at least one axis.
 */
export class DegenerateViewportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DegenerateViewportError";
  }
}

/**
 * The result grid (or an output buffer) could not be allocated.
 */
export class ResourceExhaustedError extends Error {
  requestedBytes: number;

  constructor(message: string, requestedBytes: number) {
    super(message);
    this.name = "ResourceExhaustedError";
    this.requestedBytes = requestedBytes;
  }
}
