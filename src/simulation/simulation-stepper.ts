import { DEFAULT_STEPS_PER_SECOND, MAX_STEPS_PER_FRAME } from "../constants";

/**
 * Paces simulation steps at a target steps-per-second rate,
 * independent of frame rate. Tracks performance metrics.
 */
export class SimulationStepper {
  targetStepsPerSecond = DEFAULT_STEPS_PER_SECOND;
  paused = false;
  maxStepsPerFrame = MAX_STEPS_PER_FRAME;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in step() calls per frame, in ms. */
  stepTimeMs = 0;

  /** Steps run by the most recent advance() call. */
  lastStepsThisFrame = 0;

  private accumulator = 0;
  private stepRequested = false;
  private readonly stepFn: () => void;

  /** EMA smoothing factor. ~0.05 at 30fps gives a ~660ms time constant. */
  private readonly emaAlpha = 0.05;

  constructor(stepFn: () => void) {
    this.stepFn = stepFn;
  }

  /** Runs one step on the next advance() call, paused or not, and restarts the tick. */
  requestStep(): void {
    this.stepRequested = true;
  }

  /** Drops any partial step, so the next step is a full tick away. */
  restartTick(): void {
    this.accumulator = 0;
    this.stepRequested = false;
  }

  /**
   * Called once per frame. Determines how many steps to run based on
   * elapsed time and the target rate, then executes them.
   *
   * @param deltaMs milliseconds since the last frame
   */
  advance(deltaMs: number): void {
    let stepsThisFrame = 0;

    if (this.stepRequested) {
      this.stepRequested = false;
      this.accumulator = 0;
      stepsThisFrame = 1;
    } else if (this.paused || deltaMs <= 0) {
      this.lastStepsThisFrame = 0;
      this.stepTimeMs = 0;
      // Keep actualStepsPerSecond frozen while paused
      return;
    } else {
      this.accumulator += this.targetStepsPerSecond * (deltaMs / 1000);
      stepsThisFrame = Math.min(Math.floor(this.accumulator), this.maxStepsPerFrame);
      this.accumulator -= Math.floor(this.accumulator);
    }

    const t0 = performance.now();
    for (let i = 0; i < stepsThisFrame; i++) {
      this.stepFn();
    }
    const rawStepTimeMs = performance.now() - t0;
    this.lastStepsThisFrame = stepsThisFrame;
    this.stepTimeMs =
      this.emaAlpha * rawStepTimeMs +
      (1 - this.emaAlpha) * this.stepTimeMs;

    if (deltaMs > 0) {
      const instantStepsPerSecond = stepsThisFrame / (deltaMs / 1000);
      this.actualStepsPerSecond =
        this.emaAlpha * instantStepsPerSecond +
        (1 - this.emaAlpha) * this.actualStepsPerSecond;
    }
  }
}
