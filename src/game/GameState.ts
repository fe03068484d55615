import {
  DEFAULT_FOOD_DENSITY,
  DEFAULT_GRID_SIZE,
  MIN_START_SPEED_LEVEL,
  NORMAL_FOOD_GROWTH,
  NORMAL_FOOD_POINTS,
  STARTING_SNAKE_LENGTH,
  SUPER_FOOD_CHANCE_PERCENT,
  clampStartSpeedLevel,
  totalCells,
  type FoodDensity,
  type GridSize,
} from "./config";
import { Food } from "./entities/Food";
import { Snake } from "./entities/Snake";
import { SnakeInvariantError } from "./errors";
import type { GameInput } from "./input";
import {
  dedupeFoodPositions,
  desiredFoodCount,
  normalizeFoodDensity,
  spawnPosition,
  superFoodLifetime,
} from "./systems/foodSpawner";
import { GlowEffect, type GlowTrigger } from "./systems/glow";
import {
  coverageBonusMultiplier,
  coveragePercent,
  foodEatenForLength,
  scoreWithCoverageBonus,
  speedLevelForFoodEaten,
} from "./systems/scoring";
import {
  isWithinBounds,
  oppositeDirection,
  positionsEqual,
  stepInDirection,
  type Position,
} from "./utils/grid";
import { createRng, randomSeed, type Rng } from "./utils/rng";

// ── Status types ────────────────────────────────────────────────

export type GameStatus = "playing" | "paused" | "gameOver" | "victory";

export type DeathReason = "wallCollision" | "selfCollision";

export interface GameStateOptions {
  /** Speed level play starts at; clamped to the selectable range. */
  startingSpeedLevel?: number;
  foodDensity?: FoodDensity;
  /** Fixed RNG seed for reproducible sessions. Random when omitted. */
  seed?: number;
  /** Monotonic clock in ms used to age glow effects. */
  now?: () => number;
}

const defaultClock = (): number => performance.now();

const assertPlayableBounds = (bounds: GridSize): void => {
  if (
    !Number.isInteger(bounds.width) ||
    !Number.isInteger(bounds.height) ||
    bounds.width <= 0 ||
    bounds.height <= 0
  ) {
    throw new SnakeInvariantError(
      `Grid bounds must be positive integers, got ${bounds.width}x${bounds.height}.`,
    );
  }
};

/**
 * Complete mutable simulation state for one session.
 *
 * `tick()` is the only path that advances play. Between ticks the driving
 * loop feeds `applyInput()`; renderers read the public fields and the
 * accessor methods. Restarting builds a new instance.
 */
export class GameState {
  snake: Snake;
  foods: Food[] = [];
  score = 0;
  speedLevel: number;
  tickCount = 0;
  status: GameStatus = "playing";
  deathReason: DeathReason | null = null;

  /** Seed the session RNG was created from. */
  readonly seed: number;

  private glow: GlowEffect | null = null;
  private elapsedPlayMs = 0;
  private gridBounds: GridSize;
  private baseSpeedLevel: number;
  private foodDensity: FoodDensity;
  private readonly rng: Rng;
  private readonly now: () => number;

  constructor(bounds: GridSize, options: GameStateOptions = {}) {
    assertPlayableBounds(bounds);

    this.gridBounds = { width: bounds.width, height: bounds.height };
    this.seed = options.seed ?? randomSeed();
    this.rng = createRng(this.seed);
    this.now = options.now ?? defaultClock;
    this.baseSpeedLevel = clampStartSpeedLevel(
      options.startingSpeedLevel ?? MIN_START_SPEED_LEVEL,
    );
    this.speedLevel = this.baseSpeedLevel;
    this.foodDensity = normalizeFoodDensity(options.foodDensity ?? DEFAULT_FOOD_DENSITY);

    const start: Position = {
      x: Math.floor(bounds.width / 2),
      y: Math.floor(bounds.height / 2),
    };
    const tail = stepInDirection(start, oppositeDirection("right"));
    const length = isWithinBounds(tail, this.gridBounds) ? STARTING_SNAKE_LENGTH : 1;
    this.snake = new Snake(start, "right", length);

    this.syncFoodCountToDensity();
  }

  // ── Factories ───────────────────────────────────────────────

  static create(bounds: GridSize = DEFAULT_GRID_SIZE): GameState {
    return new GameState(bounds);
  }

  static withOptions(bounds: GridSize, startingSpeedLevel: number): GameState {
    return new GameState(bounds, { startingSpeedLevel });
  }

  static withOptionsAndFoodDensity(
    bounds: GridSize,
    startingSpeedLevel: number,
    foodDensity: FoodDensity,
  ): GameState {
    return new GameState(bounds, { startingSpeedLevel, foodDensity });
  }

  static withSeed(bounds: GridSize, seed: number): GameState {
    return new GameState(bounds, { seed });
  }

  // ── Simulation ──────────────────────────────────────────────

  /** Advance one step. Does nothing unless the status is `playing`. */
  tick(): void {
    if (this.status !== "playing") return;

    this.tickCount++;

    if (this.glow && !this.glow.isActive(this.now())) {
      this.glow = null;
    }

    for (const food of this.foods) {
      if (food.isSuper() && !food.tick()) {
        food.degrade();
      }
    }

    const nextHead = this.snake.nextHeadPosition();
    if (!isWithinBounds(nextHead, this.gridBounds)) {
      this.endGame("wallCollision");
      return;
    }

    const eatenIndex = this.foods.findIndex((food) =>
      positionsEqual(food.position, nextHead),
    );
    const eatenFood = eatenIndex >= 0 ? this.foods[eatenIndex] : null;
    if (eatenFood) {
      this.snake.growBy(eatenFood.growth());
    }

    this.snake.moveForward(this.gridBounds);

    // Checked after the tail has moved on, so following the tail is legal.
    if (this.snake.headOverlapsBody()) {
      this.endGame("selfCollision");
      return;
    }

    if (!eatenFood) return;

    this.foods.splice(eatenIndex, 1);

    const basePoints = eatenFood.points() * this.speedLevel;
    this.score += scoreWithCoverageBonus(basePoints, this.playAreaCoveragePercent());

    const previousLevel = this.speedLevel;
    this.updateSpeedLevel();

    if (eatenFood.isSuper()) {
      this.armGlow("superFoodEaten");
    } else if (this.speedLevel > previousLevel) {
      this.armGlow("speedLevelUp");
    }

    if (this.checkVictory()) return;

    this.syncFoodCountToDensity();
  }

  /** Feed one decoded input event. */
  applyInput(input: GameInput): void {
    switch (input.type) {
      case "direction":
        if (this.status === "playing") {
          this.snake.bufferDirection(input.direction);
        }
        return;
      case "pause":
        if (this.status === "playing") {
          this.status = "paused";
        } else if (this.status === "paused") {
          this.status = "playing";
        }
        return;
      case "quit":
      case "confirm":
      case "cycleTheme":
      case "resize":
        return;
    }
  }

  /**
   * Change the board size mid-session. The snake is wrapped into the new
   * bounds rather than killed; food that no longer fits is dropped.
   */
  resizeBounds(bounds: GridSize): void {
    assertPlayableBounds(bounds);

    this.gridBounds = { width: bounds.width, height: bounds.height };
    this.snake.wrapIntoBounds(this.gridBounds);

    this.foods = dedupeFoodPositions(
      this.foods.filter(
        (food) =>
          isWithinBounds(food.position, this.gridBounds) &&
          !this.snake.occupies(food.position),
      ),
    );

    if (this.checkVictory()) return;

    this.syncFoodCountToDensity();
  }

  /** Update food density and resync the live food count immediately. */
  setFoodDensity(foodDensity: FoodDensity): void {
    this.foodDensity = normalizeFoodDensity(foodDensity);
    this.syncFoodCountToDensity();
  }

  /**
   * Change the starting speed without touching RNG, food or snake, so a
   * settings screen can adjust it over a stable backdrop.
   */
  setBaseSpeedLevel(level: number): void {
    this.baseSpeedLevel = clampStartSpeedLevel(level);
    this.speedLevel = this.baseSpeedLevel;
  }

  /** Fresh session on the same board, speed and density with a new seed. */
  restart(): GameState {
    return new GameState(this.gridBounds, {
      startingSpeedLevel: this.baseSpeedLevel,
      foodDensity: this.foodDensity,
      now: this.now,
    });
  }

  /** Add wall-clock play time for one simulated step. */
  recordTickDuration(durationMs: number): void {
    if (!Number.isFinite(durationMs) || durationMs <= 0) return;
    this.elapsedPlayMs += durationMs;
  }

  // ── Read accessors ──────────────────────────────────────────

  get bounds(): GridSize {
    return this.gridBounds;
  }

  get startingSpeedLevel(): number {
    return this.baseSpeedLevel;
  }

  get density(): FoodDensity {
    return this.foodDensity;
  }

  elapsedMs(): number {
    return this.elapsedPlayMs;
  }

  /** The glow pulse, or `null` once it has expired. */
  activeGlow(): GlowEffect | null {
    if (this.glow && !this.glow.isActive(this.now())) {
      return null;
    }
    return this.glow;
  }

  /** Live food target for the current snake length and density. */
  calculatedFoodCount(): number {
    return desiredFoodCount(this.gridBounds, this.snake.length, this.foodDensity);
  }

  playAreaCoveragePercent(): number {
    return coveragePercent(this.snake.length, this.gridBounds);
  }

  /** Points for a normal food before the coverage bonus. */
  ordinaryFoodBasePoints(): number {
    return NORMAL_FOOD_POINTS * this.speedLevel;
  }

  /** Multiplier a normal food eaten next would receive. */
  ordinaryFoodProjectedMultiplier(): number {
    return coverageBonusMultiplier(this.projectedCoverageAfterNormalFood());
  }

  /** Points a normal food eaten next would award. */
  ordinaryFoodProjectedPoints(): number {
    return scoreWithCoverageBonus(
      this.ordinaryFoodBasePoints(),
      this.projectedCoverageAfterNormalFood(),
    );
  }

  /** Paused before the first tick with nothing scored. */
  isStartScreen(): boolean {
    return this.status === "paused" && this.tickCount === 0 && this.score === 0;
  }

  // ── Internals ───────────────────────────────────────────────

  private projectedCoverageAfterNormalFood(): number {
    return coveragePercent(this.snake.length + NORMAL_FOOD_GROWTH, this.gridBounds);
  }

  private endGame(reason: DeathReason): void {
    this.status = "gameOver";
    this.deathReason = reason;
  }

  private checkVictory(): boolean {
    if (this.snake.length < totalCells(this.gridBounds)) {
      return false;
    }
    this.status = "victory";
    this.deathReason = null;
    return true;
  }

  private armGlow(trigger: GlowTrigger): void {
    this.glow = new GlowEffect(trigger, this.now());
  }

  private updateSpeedLevel(): void {
    this.speedLevel = speedLevelForFoodEaten(
      this.baseSpeedLevel,
      foodEatenForLength(this.snake.length),
    );
  }

  private syncFoodCountToDensity(): void {
    const target = this.calculatedFoodCount();

    if (this.foods.length > target) {
      this.foods.length = target;
    }

    while (this.foods.length < target) {
      const position = spawnPosition(this.rng, this.gridBounds, this.snake, this.foods);
      if (position === null) break;

      // Food placed before the first tick is always normal.
      if (
        this.tickCount > 0 &&
        this.rng.nextInt(100) < SUPER_FOOD_CHANCE_PERCENT
      ) {
        this.foods.push(
          Food.super(position, superFoodLifetime(this.snake.head, position)),
        );
      } else {
        this.foods.push(Food.normal(position));
      }
    }
  }
}
