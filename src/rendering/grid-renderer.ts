import { Application, Container, Graphics, GraphicsContext, Text } from "pixi.js";
import { BACKGROUND_COLOR, CELL_UNIT_PX, DEAD_COLOR, TITLE_HEIGHT } from "../constants";
import { contrastTextColor, paletteColor } from "../utils/color-utils";
import type { IGrid } from "../types/grid-types";
import type { Renderer, RendererOptions, RendererMetrics } from "./renderer-interface";

/** Gap between neighboring cells as a fraction of the cell edge. */
const CELL_GAP = 0.08;

export async function createGridRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: BACKGROUND_COLOR });
  app.ticker.stop();

  const titleBand = new Graphics();
  const title = new Text({
    text: "",
    style: { fontFamily: "monospace", fontSize: 16, fontWeight: "bold" },
  });
  title.anchor.set(0.5);
  const cellContainer = new Container();
  app.stage.addChild(titleBand, title, cellContainer);

  // Shared cell shape: a 1×1 white filled rect at the origin, scaled and tinted per cell.
  const cellContext = new GraphicsContext();
  cellContext.rect(0, 0, 1, 1).fill({ color: 0xffffff });

  // Cell graphics are pooled and only reallocated when the grid size changes.
  let cells: Graphics[] = [];

  function ensureCellCount(count: number): void {
    if (cells.length === count) return;
    cellContainer.removeChildren().forEach(g => g.destroy());
    cells = [];
    for (let i = 0; i < count; i++) {
      const g = new Graphics(cellContext);
      cellContainer.addChild(g);
      cells.push(g);
    }
  }

  // Scene-update timing tracked internally via EMA
  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function update(grid: IGrid, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const cellPx = opts.cellSize * CELL_UNIT_PX;
    const left = opts.offsetX * CELL_UNIT_PX;
    const top = opts.offsetY * CELL_UNIT_PX;
    const liveColor = paletteColor(opts.colorIndex);

    // Title band spans the grid width
    const gridPx = grid.width * cellPx;
    titleBand.clear();
    titleBand.rect(left, top, Math.max(gridPx, 1), TITLE_HEIGHT).fill({ color: liveColor });
    title.text = grid.name;
    title.style.fill = contrastTextColor(liveColor);
    title.position.set(left + gridPx / 2, top + TITLE_HEIGHT / 2);

    ensureCellCount(grid.width * grid.height);
    const inset = cellPx * CELL_GAP / 2;
    let i = 0;
    let y = 0;
    for (const row of grid.rows()) {
      let x = 0;
      for (const alive of row) {
        const g = cells[i++];
        g.position.set(left + x * cellPx + inset, top + TITLE_HEIGHT + y * cellPx + inset);
        g.scale.set(cellPx - 2 * inset);
        g.tint = alive ? liveColor : DEAD_COLOR;
        x++;
      }
      y++;
    }

    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return {
      fps: 0,
      sceneUpdateTimeMs,
      stepTimeMs: opts.stepTimeMs,
      actualStepsPerSecond: opts.actualStepsPerSecond,
    };
  }

  return {
    canvas,
    update,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
    },
    destroy() {
      cellContext.destroy();
      app.destroy();
    },
  };
}
