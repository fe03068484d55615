import { GLOW_DURATION_MS } from "../config";

/** What armed a glow pulse on the snake. */
export type GlowTrigger = "speedLevelUp" | "superFoodEaten";

/**
 * A time-limited glow pulse. The simulation only arms and expires it;
 * renderers read `intensity` to draw it.
 */
export class GlowEffect {
  readonly trigger: GlowTrigger;

  readonly startedAtMs: number;

  readonly durationMs: number;

  constructor(trigger: GlowTrigger, startedAtMs: number, durationMs = GLOW_DURATION_MS) {
    this.trigger = trigger;
    this.startedAtMs = startedAtMs;
    this.durationMs = Math.max(0, durationMs);
  }

  elapsedMs(nowMs: number): number {
    return Math.max(0, nowMs - this.startedAtMs);
  }

  isActive(nowMs: number): boolean {
    return this.elapsedMs(nowMs) < this.durationMs;
  }

  /** 1 when fresh, falling linearly to 0 at expiry. */
  intensity(nowMs: number): number {
    if (this.durationMs === 0) return 0;
    return Math.max(0, 1 - this.elapsedMs(nowMs) / this.durationMs);
  }
}
