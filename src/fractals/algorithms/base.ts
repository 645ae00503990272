/**
 * Result of computing iterations for a single point in the complex plane.
 * Used by fractal algorithms to return iteration count and final z values.
 */
export interface IterationResult {
  /** Index of the first z with |z|² > 4, or maxIterations if the orbit never escaped */
  iter: number;
  /** Real component of final z value */
  zr: number;
  /** Imaginary component of final z value */
  zi: number;
}

/**
 * Interface that escape-time algorithms implement.
 * Implementations must be pure so they can run on any worker thread.
 */
export interface FractalAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  /** Optional description explaining the algorithm */
  readonly description?: string;

  /**
   * Computes the escape iteration and final z value for a point in the complex plane.
   *
   * @param real - Real component of c
   * @param imag - Imaginary component of c
   * @param maxIterations - Iteration cap
   */
  computePoint(real: number, imag: number, maxIterations: number): IterationResult;
}
