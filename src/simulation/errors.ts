/** Thrown when a grid is seeded from a pattern with no rows. */
export class EmptySeedError extends Error {
  constructor(message = "Seed pattern has no rows") {
    super(message);
    this.name = "EmptySeedError";
  }
}

/** Thrown when a coordinate falls outside the grid. */
export class CellOutOfBoundsError extends RangeError {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number,
  ) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`);
    this.name = "CellOutOfBoundsError";
  }
}
