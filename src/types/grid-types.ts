import type { DEAD, LIVE } from "../constants";

export type CellValue = typeof DEAD | typeof LIVE;

/** An [x, y] cell coordinate. x is the column, y the row. */
export type Point = readonly [x: number, y: number];

/** Seed matrix rows. Rows may differ in length; non-zero entries are live. */
export type SeedRows = ReadonlyArray<ReadonlyArray<number>>;

/**
 * Read-only view of a life grid.
 * Used by rendering and UI code that reads cell state without modifying it.
 */
export interface IGrid {
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly liveCount: number;
  isAlive(x: number, y: number): boolean;
  rows(): Iterable<Iterable<boolean>>;
}
