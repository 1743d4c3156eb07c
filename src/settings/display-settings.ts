import {
  CELL_SIZE_MIN, CELL_SIZE_MAX, PALETTE_SIZE, OFFSET_MIN, OFFSET_MAX, DEFAULT_STEPS_PER_SECOND,
} from "../constants";

export interface DisplaySettings {
  /** Grid offset from the top-left corner, in cell units. */
  offsetX: number;
  offsetY: number;
  /** Cell size multiplier, CELL_SIZE_MIN..CELL_SIZE_MAX. */
  cellSize: number;
  /** Index into the color palette. */
  colorIndex: number;
  stepsPerSecond: number;
  paused: boolean;
}

export const DEFAULT_DISPLAY_SETTINGS: DisplaySettings = {
  offsetX: 0,
  offsetY: 0,
  cellSize: CELL_SIZE_MIN,
  colorIndex: 0,
  stepsPerSecond: DEFAULT_STEPS_PER_SECOND,
  paused: false,
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function resizeCells(settings: DisplaySettings, delta: number): DisplaySettings {
  return { ...settings, cellSize: clamp(settings.cellSize + delta, CELL_SIZE_MIN, CELL_SIZE_MAX) };
}

export function cycleColor(settings: DisplaySettings): DisplaySettings {
  return { ...settings, colorIndex: (settings.colorIndex + 1) % PALETTE_SIZE };
}

export function moveBy(settings: DisplaySettings, dx: number, dy: number): DisplaySettings {
  return {
    ...settings,
    offsetX: clamp(settings.offsetX + dx, OFFSET_MIN, OFFSET_MAX),
    offsetY: clamp(settings.offsetY + dy, OFFSET_MIN, OFFSET_MAX),
  };
}

export function togglePaused(settings: DisplaySettings): DisplaySettings {
  return { ...settings, paused: !settings.paused };
}
