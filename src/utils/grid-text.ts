import type { IGrid } from "../types/grid-types";

/** Character drawn for a live cell in the text form. */
export const LIVE_CHAR = "+";

/** Character drawn for a dead cell in the text form. */
export const DEAD_CHAR = ".";

/** Renders a grid as text: one line per row, each terminated by a newline. */
export function formatGrid(grid: Pick<IGrid, "rows">): string {
  let text = "";
  for (const row of grid.rows()) {
    for (const alive of row) {
      text += alive ? LIVE_CHAR : DEAD_CHAR;
    }
    text += "\n";
  }
  return text;
}

/**
 * Parses seed rows written as strings, e.g. ["010", "111"].
 * "1" and LIVE_CHAR are live; any other character is dead.
 */
export function parseSeedRows(lines: readonly string[]): number[][] {
  return lines.map(line => Array.from(line, ch => (ch === "1" || ch === LIVE_CHAR ? 1 : 0)));
}
