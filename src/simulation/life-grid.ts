import { DEAD, LIVE } from "../constants";
import type { IGrid, Point, SeedRows } from "../types/grid-types";
import { formatGrid } from "../utils/grid-text";
import { CellOutOfBoundsError, EmptySeedError } from "./errors";
import { countLiveNeighbors, nextCellState } from "./life-rules";

/**
 * Conway's Game of Life on a finite width×height plane.
 *
 * cells[y * width + x] holds DEAD or LIVE. Edges do not wrap: a cell on the
 * border simply has fewer neighbors. Only the current generation is kept;
 * advance() compares it against its successor to detect a fixed point.
 */
export class LifeGrid implements IGrid {
  private cells: Uint8Array;

  private constructor(
    readonly width: number,
    readonly height: number,
    readonly name: string,
    cells: Uint8Array,
  ) {
    this.cells = cells;
  }

  /** An all-dead grid. Zero width or height gives an empty grid. */
  static empty(width: number, height: number, name = ""): LifeGrid {
    if (!Number.isInteger(width) || width < 0 || !Number.isInteger(height) || height < 0) {
      throw new RangeError(`Invalid grid size ${width}x${height}`);
    }
    return new LifeGrid(width, height, name, new Uint8Array(width * height));
  }

  /**
   * Builds a grid from seed rows. Jagged input is cut to the shortest row:
   * cells past that length are dropped, not padded.
   */
  static fromSeed(rows: SeedRows, name = ""): LifeGrid {
    if (rows.length === 0) throw new EmptySeedError();

    const height = rows.length;
    const width = rows.reduce((w, row) => Math.min(w, row.length), Infinity);
    const cells = new Uint8Array(width * height);
    for (let y = 0; y < height; y++) {
      const row = rows[y];
      for (let x = 0; x < width; x++) {
        cells[y * width + x] = row[x] ? LIVE : DEAD;
      }
    }
    return new LifeGrid(width, height, name, cells);
  }

  /**
   * Marks each point live. All points are checked before any is written.
   * Writes go to a fresh copy, so views from rows() taken earlier keep
   * showing the generation they were taken from.
   */
  setAlive(points: Iterable<Point>): void {
    const indices: number[] = [];
    for (const [x, y] of points) {
      if (!this.inBounds(x, y)) {
        throw new CellOutOfBoundsError(x, y, this.width, this.height);
      }
      indices.push(y * this.width + x);
    }
    const cells = this.cells.slice();
    for (const i of indices) {
      cells[i] = LIVE;
    }
    this.cells = cells;
  }

  /**
   * Replaces the grid with its next generation.
   *
   * Every cell is computed from the same snapshot, so no update sees another
   * cell's new value. Returns false, leaving the grid untouched, when the next
   * generation equals the current one.
   */
  advance(): boolean {
    const { width, height, cells } = this;
    const next = new Uint8Array(cells.length);
    let changed = false;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = y * width + x;
        const cell = cells[i] === LIVE ? LIVE : DEAD;
        next[i] = nextCellState(cell, countLiveNeighbors(cells, width, height, x, y));
        if (next[i] !== cell) changed = true;
      }
    }

    if (changed) this.cells = next;
    return changed;
  }

  isAlive(x: number, y: number): boolean {
    return this.inBounds(x, y) && this.cells[y * this.width + x] === LIVE;
  }

  get liveCount(): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === LIVE) count++;
    }
    return count;
  }

  /** Coordinates of every live cell, row by row. */
  liveCells(): Point[] {
    const points: Point[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.cells[y * this.width + x] === LIVE) points.push([x, y]);
      }
    }
    return points;
  }

  /**
   * Lazy row-major view of the generation current at call time (true = live).
   * The returned iterable can be walked any number of times.
   */
  rows(): Iterable<Iterable<boolean>> {
    const { width, height, cells } = this;

    function* rowCells(y: number): Generator<boolean> {
      for (let x = 0; x < width; x++) {
        yield cells[y * width + x] === LIVE;
      }
    }

    return {
      *[Symbol.iterator]() {
        for (let y = 0; y < height; y++) {
          yield { [Symbol.iterator]: () => rowCells(y) };
        }
      },
    };
  }

  /** "+" for live and "." for dead, one line per row. */
  toString(): string {
    return formatGrid(this);
  }

  private inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.width && y >= 0 && y < this.height;
  }
}
