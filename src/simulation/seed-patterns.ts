import PATTERN_ROWS from "./seed-patterns.json";
import { LifeGrid } from "./life-grid";
import { parseSeedRows } from "../utils/grid-text";
import type { SeedRows } from "../types/grid-types";

export type PatternName = "octagon" | "glider" | "twin-glider" | "galaxy" | "tree";

/** Patterns in the order the simulation cycles through them. */
export const PATTERN_NAMES: readonly PatternName[] = ["octagon", "glider", "twin-glider", "galaxy", "tree"];

export interface SeedPattern {
  name: string;
  /** Title shown above the grid. */
  label: string;
  rows: SeedRows;
}

const PATTERN_SOURCE: Record<PatternName, readonly string[]> = PATTERN_ROWS;

/** Returns the seed pattern with the given name. Rows are parsed on each call. */
export function getSeedPattern(name: PatternName): SeedPattern {
  return {
    name,
    label: name.toUpperCase(),
    rows: parseSeedRows(PATTERN_SOURCE[name]),
  };
}

/** The built-in pattern library, in cycle order. */
export const SEED_PATTERNS: readonly SeedPattern[] = PATTERN_NAMES.map(getSeedPattern);

/** Builds a fresh grid seeded with the given pattern, labelled for display. */
export function createPatternGrid(pattern: SeedPattern | PatternName): LifeGrid {
  const { rows, label } = typeof pattern === "string" ? getSeedPattern(pattern) : pattern;
  return LifeGrid.fromSeed(rows, label);
}
