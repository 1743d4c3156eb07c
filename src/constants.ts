// ── Grid ──

/** Cell value of a dead cell. */
export const DEAD = 0;

/** Cell value of a live cell. */
export const LIVE = 1;

// ── Simulation ──

/** Default simulation steps per second of wall-clock time (one generation a second). */
export const DEFAULT_STEPS_PER_SECOND = 1;

/** Step rates offered in the speed selector. */
export const SPEED_OPTIONS = [1, 2, 5, 10, 20, 60];

/** Upper bound on steps run in a single frame, so a stalled tab does not burst on resume. */
export const MAX_STEPS_PER_FRAME = 10;

// ── Display settings ──

/** Smallest and largest cell size multiplier. */
export const CELL_SIZE_MIN = 1;
export const CELL_SIZE_MAX = 10;

/** Number of entries in the indexed color palette. */
export const PALETTE_SIZE = 16;

/** Offset bounds, in cell units. */
export const OFFSET_MIN = 0;
export const OFFSET_MAX = 100;

// ── Rendering ──

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 30;

/** Pixels per cell unit. A cell is cellSize × CELL_UNIT_PX pixels square. */
export const CELL_UNIT_PX = 8;

/** Height of the title band above the grid, in pixels. */
export const TITLE_HEIGHT = 24;

/** Color of dead cells (white). */
export const DEAD_COLOR = 0xffffff;

/** Canvas background color. */
export const BACKGROUND_COLOR = 0x111111;
