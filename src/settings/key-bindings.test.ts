import { keyAction } from "./key-bindings";
import { DEFAULT_DISPLAY_SETTINGS, DisplaySettings } from "./display-settings";

function applyKey(key: string, settings: DisplaySettings = DEFAULT_DISPLAY_SETTINGS): DisplaySettings {
  const action = keyAction(key);
  if (action?.kind !== "settings") throw new Error(`"${key}" is not a settings key`);
  return action.update(settings);
}

describe("keyAction", () => {
  it("maps n and space to simulation actions", () => {
    expect(keyAction("n")).toEqual({ kind: "simulation", action: "next-pattern" });
    expect(keyAction(" ")).toEqual({ kind: "simulation", action: "step-now" });
  });

  it("returns null for unbound keys", () => {
    expect(keyAction("x")).toBeNull();
    expect(keyAction("toString")).toBeNull();
  });

  it("resizes cells with + and -", () => {
    expect(applyKey("+").cellSize).toBe(2);
    expect(applyKey("-", { ...DEFAULT_DISPLAY_SETTINGS, cellSize: 3 }).cellSize).toBe(2);
  });

  it("cycles color with c", () => {
    expect(applyKey("c").colorIndex).toBe(1);
  });

  it("moves with arrow keys and hjkl alike", () => {
    const start = { ...DEFAULT_DISPLAY_SETTINGS, offsetX: 5, offsetY: 5 };
    expect(applyKey("ArrowRight", start)).toEqual(applyKey("l", start));
    expect(applyKey("l", start).offsetX).toBe(6);
    expect(applyKey("h", start).offsetX).toBe(4);
    expect(applyKey("j", start).offsetY).toBe(6);
    expect(applyKey("k", start).offsetY).toBe(4);
    expect(applyKey("ArrowUp", start)).toEqual(applyKey("k", start));
  });

  it("pauses with q and toggles with p", () => {
    expect(applyKey("q").paused).toBe(true);
    expect(applyKey("q", { ...DEFAULT_DISPLAY_SETTINGS, paused: true }).paused).toBe(true);
    expect(applyKey("p").paused).toBe(true);
  });
});
