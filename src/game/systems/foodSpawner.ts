import {
  DEFAULT_FOOD_DENSITY,
  SUPER_FOOD_TTL_PADDING,
  totalCells,
  type FoodDensity,
  type GridSize,
} from "../config";
import { Food } from "../entities/Food";
import type { Snake } from "../entities/Snake";
import { type Position, manhattanDistance, positionKey } from "../utils/grid";
import type { Rng } from "../utils/rng";

// ── Free-cell enumeration ───────────────────────────────────────

/**
 * Collect every cell not covered by the snake or an existing food item,
 * in row-major order.
 */
export function collectFreeCells(
  bounds: GridSize,
  snake: Snake,
  foods: readonly Food[] = [],
): Position[] {
  const blockedKeys = new Set<string>();
  for (const segment of snake.getSegments()) {
    blockedKeys.add(positionKey(segment));
  }
  for (const food of foods) {
    blockedKeys.add(positionKey(food.position));
  }

  const freeCells: Position[] = [];
  for (let y = 0; y < bounds.height; y++) {
    for (let x = 0; x < bounds.width; x++) {
      const pos: Position = { x, y };
      if (!blockedKeys.has(positionKey(pos))) {
        freeCells.push(pos);
      }
    }
  }
  return freeCells;
}

/**
 * Pick a uniformly random free cell.
 *
 * Returns `null` when the board is saturated; callers stop spawning rather
 * than treating it as an error.
 */
export function spawnPosition(
  rng: Rng,
  bounds: GridSize,
  snake: Snake,
  foods: readonly Food[] = [],
): Position | null {
  const freeCells = collectFreeCells(bounds, snake, foods);
  if (freeCells.length === 0) {
    return null;
  }

  return freeCells[rng.nextInt(freeCells.length)];
}

/** Ticks a super food spawned at `position` survives before degrading. */
export function superFoodLifetime(head: Position, position: Position): number {
  return manhattanDistance(head, position) + SUPER_FOOD_TTL_PADDING;
}

// ── Density ─────────────────────────────────────────────────────

/** Force both density terms to be whole numbers ≥ 1. */
export function normalizeFoodDensity(density: FoodDensity): FoodDensity {
  const normalize = (value: number, fallback: number): number =>
    Number.isFinite(value) ? Math.max(1, Math.floor(value)) : fallback;

  return {
    foodsPer: normalize(density.foodsPer, DEFAULT_FOOD_DENSITY.foodsPer),
    cellsPer: normalize(density.cellsPer, DEFAULT_FOOD_DENSITY.cellsPer),
  };
}

/**
 * Number of food items that should be live for the given snake length.
 *
 * `clamp(free * foodsPer / cellsPer, 1, free)`, or 0 on a full board.
 */
export function desiredFoodCount(
  bounds: GridSize,
  snakeLength: number,
  density: FoodDensity,
): number {
  const freeCells = Math.max(0, totalCells(bounds) - snakeLength);
  if (freeCells === 0) {
    return 0;
  }

  const normalized = normalizeFoodDensity(density);
  const desired = Math.floor((freeCells * normalized.foodsPer) / normalized.cellsPer);
  return Math.min(freeCells, Math.max(1, desired));
}

/**
 * Keep only the first food at each position.
 * Shrinking the board can wrap two items onto one cell.
 */
export function dedupeFoodPositions(foods: readonly Food[]): Food[] {
  const seen = new Set<string>();
  const unique: Food[] = [];
  for (const food of foods) {
    const key = positionKey(food.position);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(food);
  }
  return unique;
}
