// ABOUTME: Text renderings of a completed result grid
// ABOUTME: ASCII art (top row first) and comma-separated plot data (bottom row first)

import { asciiSymbol } from "../algorithms/coloring";
import type { OutputMode, ResultGrid } from "../types";

/**
 * One palette glyph per pixel, row 0 first, a newline after every row.
 */
export function formatAscii(grid: ResultGrid, maxIterations: number): string {
  const lines: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let line = "";
    const rowOffset = y * grid.width;
    for (let x = 0; x < grid.width; x++) {
      line += asciiSymbol(grid.values[rowOffset + x], maxIterations);
    }
    lines.push(line + "\n");
  }
  return lines.join("");
}

/**
 * Plain decimal values joined by ", ", one line per row, last row first so the
 * plotting tool's y axis points up.
 */
export function formatPlotData(grid: ResultGrid): string {
  const lines: string[] = [];
  for (let y = grid.height - 1; y >= 0; y--) {
    const rowOffset = y * grid.width;
    const row = grid.values.subarray(rowOffset, rowOffset + grid.width);
    lines.push(Array.from(row, String).join(", ") + "\n");
  }
  return lines.join("");
}

export function formatResultGrid(grid: ResultGrid, maxIterations: number, mode: OutputMode): string {
  switch (mode) {
    case "ascii":
      return formatAscii(grid, maxIterations);
    case "plot-data":
      return formatPlotData(grid);
  }
}
