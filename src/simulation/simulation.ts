import { LifeGrid } from "./life-grid";
import { EmptySeedError } from "./errors";
import { SEED_PATTERNS, SeedPattern, createPatternGrid } from "./seed-patterns";

export type StepOutcome = "advanced" | "switched";

/**
 * Runs a pattern library one generation at a time.
 *
 * The current grid advances on each step. When it settles on a fixed point
 * the next pattern is loaded, wrapping back to the first after the last.
 * Oscillators never settle and keep running until the caller moves on.
 */
export class Simulation {
  private readonly patterns: readonly SeedPattern[];
  private index = 0;
  private currentGrid: LifeGrid;

  /** Generations advanced since the current pattern was loaded. */
  generation = 0;

  constructor(patterns: readonly SeedPattern[] = SEED_PATTERNS) {
    if (patterns.length === 0) throw new EmptySeedError("Pattern library is empty");
    this.patterns = patterns;
    this.currentGrid = createPatternGrid(patterns[0]);
  }

  get grid(): LifeGrid {
    return this.currentGrid;
  }

  get pattern(): SeedPattern {
    return this.patterns[this.index];
  }

  get patternIndex(): number {
    return this.index;
  }

  step(): StepOutcome {
    if (this.currentGrid.advance()) {
      this.generation++;
      return "advanced";
    }
    this.nextPattern();
    return "switched";
  }

  nextPattern(): void {
    this.load((this.index + 1) % this.patterns.length);
  }

  selectPattern(name: string): void {
    const i = this.patterns.findIndex(p => p.name === name);
    if (i < 0) throw new Error(`Unknown pattern "${name}"`);
    this.load(i);
  }

  private load(index: number): void {
    this.index = index;
    this.currentGrid = createPatternGrid(this.patterns[index]);
    this.generation = 0;
  }
}
