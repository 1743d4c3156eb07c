import type { IGrid } from "../types/grid-types";

export interface RendererOptions {
  cellSize: number;
  colorIndex: number;
  offsetX: number;
  offsetY: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface RendererMetrics {
  fps: number;
  sceneUpdateTimeMs: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface Renderer {
  update(grid: IGrid, opts: RendererOptions): RendererMetrics;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
