import { DegenerateViewportError } from "./errors";
import { toNumericViewport } from "../fractals/types";
import type { NumericViewport, Viewport } from "../fractals/types";

/**
 * Maps a pixel of a width × height grid to a point of the complex plane.
 *
 * x = 0 lands on the left edge and x = width - 1 stops one pixel short of the
 * right edge. Row 0 is the top of the image, so the imaginary part decreases
 * as y grows.
 */
export const pixelToComplex = (
  point: { x: number; y: number },
  width: number,
  height: number,
  viewport: NumericViewport
): { real: number; imag: number } => {
  const fwidth = viewport.urX - viewport.llX;
  const fheight = viewport.urY - viewport.llY;

  const real = viewport.llX + (point.x * fwidth) / width;
  const imag = viewport.urY - (point.y * fheight) / height;
  return { real, imag };
};

/**
 * True when the viewport has zero or negative extent on either axis, either
 * as parsed or once its corners are rounded to doubles for the mapper.
 */
export const isDegenerateViewport = (viewport: Viewport): boolean => {
  const { llX, llY, urX, urY } = toNumericViewport(viewport);
  return (
    viewport.upperRight.x.lessThanOrEqualTo(viewport.lowerLeft.x) ||
    viewport.upperRight.y.lessThanOrEqualTo(viewport.lowerLeft.y) ||
    urX <= llX ||
    urY <= llY
  );
};

/**
 * Rejects viewports whose upper-right corner does not lie strictly above and to
 * the right of the lower-left corner.
 */
export function assertViewport(viewport: Viewport): void {
  if (isDegenerateViewport(viewport)) {
    const { lowerLeft, upperRight } = viewport;
    throw new DegenerateViewportError(
      `Degenerate viewport: lower-left (${lowerLeft.x}, ${lowerLeft.y}) must lie strictly below and left of ` +
        `upper-right (${upperRight.x}, ${upperRight.y})`
    );
  }
}
