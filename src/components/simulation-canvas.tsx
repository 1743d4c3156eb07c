import React, { useRef, useEffect } from "react";
import { createGridRenderer } from "../rendering/grid-renderer";
import type { Renderer, RendererMetrics } from "../rendering/renderer-interface";
import type { Simulation } from "../simulation/simulation";
import { SimulationStepper } from "../simulation/simulation-stepper";
import type { DisplaySettings } from "../settings/display-settings";
import { TARGET_FPS } from "../constants";

interface Props {
  width: number;
  height: number;
  simulation: Simulation;
  settings: DisplaySettings;
  stepperRef?: React.MutableRefObject<SimulationStepper | null>;
  onFrame?: (metrics: RendererMetrics) => void;
}

export const SimulationCanvas: React.FC<Props> = ({
  width, height, simulation, settings, stepperRef, onFrame,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const simRef = useRef(simulation);
  simRef.current = simulation;
  const settingsRef = useRef(settings);
  settingsRef.current = settings;
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const stepperRefProp = useRef(stepperRef);
  stepperRefProp.current = stepperRef;
  const onFrameRef = useRef(onFrame);
  onFrameRef.current = onFrame;

  // Increments on every React render (i.e., whenever any prop changes).
  // The rAF loop compares this against lastRenderedVersion to skip redundant
  // redraws while nothing has stepped.
  const renderVersionRef = useRef(0);
  renderVersionRef.current += 1;

  // Create the renderer once; destroy on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    const stepper = new SimulationStepper(() => simRef.current.step());
    if (stepperRefProp.current) {
      stepperRefProp.current.current = stepper;
    }

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/TARGET_FPS.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;
      let lastRenderedVersion = -1;
      let lastGrid = simRef.current.grid;

      function tick(timestamp: number): void {
        if (destroyed) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;

        const fps = elapsed > 0 ? 1000 / elapsed : 0;

        const { paused, stepsPerSecond } = settingsRef.current;
        stepper.paused = paused;
        stepper.targetStepsPerSecond = stepsPerSecond;
        stepper.advance(elapsed);

        // Redraw only after a step, a pattern switch, or a prop change
        const sim = simRef.current;
        const propsChanged = renderVersionRef.current !== lastRenderedVersion;
        if (stepper.lastStepsThisFrame === 0 && sim.grid === lastGrid && !propsChanged) {
          rafId = requestAnimationFrame(tick);
          return;
        }

        const { cellSize, colorIndex, offsetX, offsetY } = settingsRef.current;
        const metrics = renderer.update(sim.grid, {
          cellSize,
          colorIndex,
          offsetX,
          offsetY,
          stepTimeMs: stepper.stepTimeMs,
          actualStepsPerSecond: stepper.actualStepsPerSecond,
        });
        lastRenderedVersion = renderVersionRef.current;
        lastGrid = sim.grid;

        metrics.fps = fps;
        onFrameRef.current?.(metrics);

        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    const canvas = document.createElement("canvas");
    container.appendChild(canvas);
    createGridRenderer(canvas, sizeRef.current.width, sizeRef.current.height).then((renderer) => {
      if (destroyed) {
        renderer.destroy();
        return;
      }
      rendererRef.current = renderer;
      startRafLoop(renderer);
    }).catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);

      rendererRef.current?.destroy();
      rendererRef.current = null;

      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }

      if (stepperRefProp.current) {
        stepperRefProp.current.current = null;
      }
    };
  }, []);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  return <div ref={containerRef} />;
};
