// ABOUTME: Mandelbrot set escape-time kernel
// ABOUTME: Computes how many iterations of z² + c a point survives before |z| > 2

import { FractalAlgorithm, IterationResult } from "./base";

/**
 * Mandelbrot Set algorithm implementation.
 *
 * For each point c in the complex plane, we iterate:
 *   z₀ = 0
 *   z_{n+1} = z_n² + c
 *
 * `iter` is the first n with |z_n|² > 4. Points whose orbit stays bounded for
 * the whole cap report `iter === maxIterations`.
 */
export class MandelbrotAlgorithm implements FractalAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  computePoint(real: number, imag: number, maxIterations: number): IterationResult {
    let zr = 0;
    let zi = 0;
    let iter = 0;

    for (; iter < maxIterations; iter++) {
      const zr2 = zr * zr;
      const zi2 = zi * zi;
      // |z|² > 4 means the orbit has escaped the radius-2 disc
      if (zr2 + zi2 > 4) {
        break;
      }
      // (zr + zi*i)² + c = zr² - zi² + cr + 2*zr*zi*i + ci*i
      const newZr = zr2 - zi2 + real;
      zi = 2 * zr * zi + imag;
      zr = newZr;
    }

    return { iter, zr, zi };
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();

/**
 * Remaining iterations at escape: `maxIterations - iter`.
 *
 * Points inside the set (or that survive the whole cap) give 0, points that
 * escape right away give a value close to the cap. A cap of 0 returns 0
 * without iterating.
 */
export function escapeTime(cr: number, ci: number, maxIterations: number): number {
  return maxIterations - mandelbrotAlgorithm.computePoint(cr, ci, maxIterations).iter;
}
