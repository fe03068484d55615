import {
  NORMAL_FOOD_GROWTH,
  NORMAL_FOOD_POINTS,
  SUPER_FOOD_GROWTH,
  SUPER_FOOD_POINTS,
} from "../config";
import type { Position } from "../utils/grid";

export type FoodKind =
  | { readonly type: "normal" }
  | { readonly type: "super"; readonly ticksRemaining: number };

const NORMAL_KIND: FoodKind = { type: "normal" };

/**
 * A single food item on the board.
 *
 * Super food counts down once per tick and degrades to normal food in place
 * when the countdown runs out; it is never removed by expiry.
 */
export class Food {
  readonly position: Position;

  private foodKind: FoodKind;

  constructor(position: Position, kind: FoodKind = NORMAL_KIND) {
    this.position = { ...position };
    this.foodKind = kind;
  }

  static normal(position: Position): Food {
    return new Food(position);
  }

  static super(position: Position, ticksRemaining: number): Food {
    const ticks = Number.isFinite(ticksRemaining)
      ? Math.max(0, Math.floor(ticksRemaining))
      : 0;
    return new Food(position, { type: "super", ticksRemaining: ticks });
  }

  get kind(): FoodKind {
    return this.foodKind;
  }

  isSuper(): boolean {
    return this.foodKind.type === "super";
  }

  /** Score value before the speed multiplier and coverage bonus. */
  points(): number {
    return this.foodKind.type === "super" ? SUPER_FOOD_POINTS : NORMAL_FOOD_POINTS;
  }

  /** Segments the snake gains when eating this food. */
  growth(): number {
    return this.foodKind.type === "super" ? SUPER_FOOD_GROWTH : NORMAL_FOOD_GROWTH;
  }

  /**
   * Advance the super-food countdown by one tick.
   * @returns `false` once the countdown has reached zero.
   */
  tick(): boolean {
    if (this.foodKind.type !== "super") return true;

    const ticksRemaining = Math.max(0, this.foodKind.ticksRemaining - 1);
    this.foodKind = { type: "super", ticksRemaining };
    return ticksRemaining > 0;
  }

  /** Convert super food to normal food. No-op for normal food. */
  degrade(): void {
    this.foodKind = NORMAL_KIND;
  }
}
