import React, { useState, useEffect, useRef, useCallback } from "react";
import { SimulationCanvas } from "./simulation-canvas";
import { Simulation } from "../simulation/simulation";
import type { SimulationStepper } from "../simulation/simulation-stepper";
import { PATTERN_NAMES } from "../simulation/seed-patterns";
import {
  DEFAULT_DISPLAY_SETTINGS, DisplaySettings, cycleColor, resizeCells, togglePaused,
} from "../settings/display-settings";
import { keyAction, SimulationAction } from "../settings/key-bindings";
import { SPEED_OPTIONS } from "../constants";
import { hexColor, paletteColor } from "../utils/color-utils";
import type { RendererMetrics } from "../rendering/renderer-interface";

import "./app.scss";

interface SimulationStatus {
  patternName: string;
  label: string;
  generation: number;
  liveCount: number;
}

function readStatus(sim: Simulation): SimulationStatus {
  return {
    patternName: sim.pattern.name,
    label: sim.pattern.label,
    generation: sim.generation,
    liveCount: sim.grid.liveCount,
  };
}

export const App = () => {
  const simRef = useRef(new Simulation());
  const stepperRef = useRef<SimulationStepper | null>(null);
  const [settings, setSettings] = useState<DisplaySettings>(DEFAULT_DISPLAY_SETTINGS);
  const [status, setStatus] = useState<SimulationStatus>(() => readStatus(simRef.current));
  const [metrics, setMetrics] = useState<RendererMetrics | null>(null);

  const controlsRef = useRef<HTMLDivElement>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: window.innerWidth,
      height: window.innerHeight - controlsHeight,
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  const runAction = useCallback((action: SimulationAction) => {
    const sim = simRef.current;
    if (action === "next-pattern") {
      sim.nextPattern();
      stepperRef.current?.restartTick();
    } else {
      stepperRef.current?.requestStep();
    }
    setStatus(readStatus(sim));
  }, []);

  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      // Leave keys alone while a form control has focus
      if (e.target instanceof HTMLInputElement || e.target instanceof HTMLSelectElement) return;
      const action = keyAction(e.key);
      if (!action) return;
      e.preventDefault();
      if (action.kind === "settings") {
        setSettings(action.update);
      } else {
        runAction(action.action);
      }
    };
    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [runAction]);

  const onFrame = useCallback((m: RendererMetrics) => {
    setMetrics(m);
    setStatus(readStatus(simRef.current));
  }, []);

  const perfParts: string[] = [];
  if (metrics) {
    perfParts.push(`${Math.round(metrics.fps)} fps`);
    perfParts.push(`${metrics.actualStepsPerSecond.toFixed(1)} steps/s`);
    perfParts.push(`draw ${metrics.sceneUpdateTimeMs.toFixed(1)}ms`);
  }

  return (
    <div className="app">
      <div className="controls" ref={controlsRef}>
        <label>
          Pattern:
          <select value={status.patternName} onChange={e => {
            simRef.current.selectPattern(e.target.value);
            stepperRef.current?.restartTick();
            setStatus(readStatus(simRef.current));
          }}>
            {PATTERN_NAMES.map(name => <option key={name} value={name}>{name.toUpperCase()}</option>)}
          </select>
        </label>
        <button onClick={() => runAction("next-pattern")}>Next pattern</button>
        <button onClick={() => setSettings(togglePaused)}>{settings.paused ? "Play" : "Pause"}</button>
        <button onClick={() => runAction("step-now")}>Step</button>
        <label>
          Speed: {settings.stepsPerSecond} steps/s
          <select value={settings.stepsPerSecond}
            onChange={e => setSettings(s => ({ ...s, stepsPerSecond: Number(e.target.value) }))}>
            {SPEED_OPTIONS.map(s => <option key={s} value={s}>{s} steps/s</option>)}
          </select>
        </label>
        <span className="size-control">
          Size: {settings.cellSize}
          <button onClick={() => setSettings(s => resizeCells(s, -1))}>-</button>
          <button onClick={() => setSettings(s => resizeCells(s, 1))}>+</button>
        </span>
        <button onClick={() => setSettings(cycleColor)}>
          <span className="swatch" style={{ background: hexColor(paletteColor(settings.colorIndex)) }} />
          Color
        </button>
      </div>
      <div className="canvas-container">
        <SimulationCanvas
          width={canvasSize.width}
          height={canvasSize.height}
          simulation={simRef.current}
          settings={settings}
          stepperRef={stepperRef}
          onFrame={onFrame}
        />
        <div className="status-overlay">
          <div>{status.label} | generation {status.generation} | {status.liveCount} live</div>
          {perfParts.length > 0 && <div>{perfParts.join(" | ")}</div>}
        </div>
      </div>
    </div>
  );
};
