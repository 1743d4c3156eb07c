import { DEAD, LIVE } from "../constants";
import type { CellValue } from "../types/grid-types";

/**
 * Conway's rule: a dead cell with exactly 3 live neighbors is born,
 * a live cell with 2 or 3 live neighbors survives, everything else dies.
 */
export function nextCellState(cell: CellValue, liveNeighbors: number): CellValue {
  if (cell === DEAD) return liveNeighbors === 3 ? LIVE : DEAD;
  return liveNeighbors === 2 || liveNeighbors === 3 ? LIVE : DEAD;
}

/**
 * Counts live cells among the up-to-8 neighbors of (x, y) in a row-major
 * width×height array. Ranges are clamped at the edges; no wraparound.
 */
export function countLiveNeighbors(
  cells: Uint8Array, width: number, height: number, x: number, y: number,
): number {
  const yMin = Math.max(y - 1, 0);
  const yMax = Math.min(y + 1, height - 1);
  const xMin = Math.max(x - 1, 0);
  const xMax = Math.min(x + 1, width - 1);

  let count = 0;
  for (let ny = yMin; ny <= yMax; ny++) {
    for (let nx = xMin; nx <= xMax; nx++) {
      if (nx === x && ny === y) continue;
      if (cells[ny * width + nx] === LIVE) count++;
    }
  }
  return count;
}
