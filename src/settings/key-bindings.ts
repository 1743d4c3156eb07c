import {
  DisplaySettings, resizeCells, cycleColor, moveBy, togglePaused,
} from "./display-settings";

/** Actions that act on the simulation rather than on display settings. */
export type SimulationAction = "next-pattern" | "step-now";

export type KeyAction =
  | { kind: "settings"; update: (settings: DisplaySettings) => DisplaySettings }
  | { kind: "simulation"; action: SimulationAction };

const settingsAction = (update: (s: DisplaySettings) => DisplaySettings): KeyAction =>
  ({ kind: "settings", update });

const KEY_ACTIONS: Record<string, KeyAction> = {
  "n": { kind: "simulation", action: "next-pattern" },
  " ": { kind: "simulation", action: "step-now" },
  "+": settingsAction(s => resizeCells(s, 1)),
  "-": settingsAction(s => resizeCells(s, -1)),
  "c": settingsAction(cycleColor),
  "p": settingsAction(togglePaused),
  // No window to close in a browser; quitting stops the clock instead.
  "q": settingsAction(s => ({ ...s, paused: true })),
  "ArrowRight": settingsAction(s => moveBy(s, 1, 0)),
  "l": settingsAction(s => moveBy(s, 1, 0)),
  "ArrowLeft": settingsAction(s => moveBy(s, -1, 0)),
  "h": settingsAction(s => moveBy(s, -1, 0)),
  "ArrowDown": settingsAction(s => moveBy(s, 0, 1)),
  "j": settingsAction(s => moveBy(s, 0, 1)),
  "ArrowUp": settingsAction(s => moveBy(s, 0, -1)),
  "k": settingsAction(s => moveBy(s, 0, -1)),
};

/** Maps a KeyboardEvent.key value to its action, or null for unbound keys. */
export function keyAction(key: string): KeyAction | null {
  return Object.prototype.hasOwnProperty.call(KEY_ACTIONS, key) ? KEY_ACTIONS[key] : null;
}
