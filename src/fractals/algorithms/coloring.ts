/**
 * Glyphs ordered from "deepest inside the set" to "escaped immediately".
 */
export const ASCII_PALETTE = "MW2a_. ";

/**
 * Maps an escape-time value in [0, maxIterations] to an index into a palette
 * of `paletteSize` entries.
 *
 * index = floor(value / maxIterations * (paletteSize - 1)), clamped to the palette.
 * A cap of 0 maps every value to index 0.
 */
export function paletteIndex(value: number, maxIterations: number, paletteSize = ASCII_PALETTE.length): number {
  if (maxIterations <= 0) return 0;

  const index = Math.floor((value / maxIterations) * (paletteSize - 1));
  return Math.max(0, Math.min(paletteSize - 1, index));
}

/**
 * ASCII glyph for an escape-time value.
 */
export function asciiSymbol(value: number, maxIterations: number): string {
  return ASCII_PALETTE[paletteIndex(value, maxIterations)];
}
