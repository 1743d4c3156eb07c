import { SimulationStepper } from "./simulation-stepper";
import { DEFAULT_STEPS_PER_SECOND } from "../constants";

describe("SimulationStepper", () => {
  // Minimal mock: just counts how many times step() was called
  let stepCount: number;
  const stepFn = () => { stepCount++; };

  beforeEach(() => {
    stepCount = 0;
  });

  it("defaults to one step per second", () => {
    const stepper = new SimulationStepper(stepFn);
    expect(stepper.targetStepsPerSecond).toBe(DEFAULT_STEPS_PER_SECOND);

    stepper.advance(500);
    expect(stepCount).toBe(0);
    stepper.advance(500);
    expect(stepCount).toBe(1);
  });

  it("runs the correct number of steps for a given delta and target rate", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 60;

    // Simulate a 16.67ms frame (60 fps) should produce 1 step
    stepper.advance(16.67);
    expect(stepCount).toBe(1);
  });

  it("accumulates fractional steps across frames", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 30; // 0.5 steps per 16.67ms frame

    stepper.advance(16.67);
    expect(stepCount).toBe(0);

    stepper.advance(16.67);
    expect(stepCount).toBe(1);
  });

  it("runs multiple steps when delta is large relative to target rate", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 60;
    stepper.advance(100); // 100ms at 60 steps/s = 6 steps
    expect(stepper.lastStepsThisFrame).toBe(6);
    expect(stepCount).toBe(6);
  });

  it("caps the steps run in one frame", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 60;
    stepper.maxStepsPerFrame = 10;

    stepper.advance(1000);
    expect(stepCount).toBe(10);

    // The backlog is dropped, not carried into the next frame
    stepper.advance(1);
    expect(stepCount).toBe(10);
  });

  it("runs zero steps when paused", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 60;
    stepper.advance(100);
    expect(stepper.lastStepsThisFrame).toBe(6);

    stepper.paused = true;
    stepper.advance(100);
    expect(stepper.lastStepsThisFrame).toBe(0);
    expect(stepCount).toBe(6);
  });

  it("runs a requested step immediately, even when paused", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.paused = true;
    stepper.requestStep();

    stepper.advance(16);
    expect(stepCount).toBe(1);
    expect(stepper.lastStepsThisFrame).toBe(1);

    stepper.advance(16);
    expect(stepCount).toBe(1);
  });

  it("restarts the tick after a requested step", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.advance(900); // 0.9 of a step pending
    stepper.requestStep();
    stepper.advance(16);
    expect(stepCount).toBe(1);

    // Without the reset, 0.9 + 0.2 would cross into another step
    stepper.advance(200);
    expect(stepCount).toBe(1);
  });

  it("drops the partial step when the tick is restarted", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.advance(900); // 0.9 of a step pending
    stepper.restartTick();

    stepper.advance(200);
    expect(stepCount).toBe(0);
    stepper.advance(800);
    expect(stepCount).toBe(1);
  });

  it("cancels a pending requested step when the tick is restarted", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.requestStep();
    stepper.restartTick();
    stepper.advance(16);
    expect(stepCount).toBe(0);
  });

  it("tracks step timing in milliseconds", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 60;

    stepper.advance(16.67);
    expect(stepper.stepTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("computes actual steps per second using EMA", () => {
    const stepper = new SimulationStepper(stepFn);
    stepper.targetStepsPerSecond = 60;

    // Run enough frames to let the EMA settle (alpha=0.05, ~60 frames to stabilize)
    for (let i = 0; i < 120; i++) {
      stepper.advance(16.67);
    }
    expect(stepper.actualStepsPerSecond).toBeGreaterThan(50);
    expect(stepper.actualStepsPerSecond).toBeLessThan(70);
  });
});
