import {
  COVERAGE_BONUS_PER_PERCENT,
  FOOD_PER_SPEED_LEVEL,
  MAX_COVERAGE_BONUS,
  STARTING_SNAKE_LENGTH,
  totalCells,
  type GridSize,
} from "../config";

// ── Coverage bonus ──────────────────────────────────────────────

/** Percentage (0–100) of the board covered by a snake of `snakeLength`. */
export function coveragePercent(snakeLength: number, bounds: GridSize): number {
  const cells = totalCells(bounds);
  if (cells === 0) {
    return 0;
  }
  return (snakeLength / cells) * 100;
}

/** Total score multiplier for a coverage: `1 + min(coverage * 0.10, 9)`. */
export function coverageBonusMultiplier(coverage: number): number {
  const safeCoverage = Number.isFinite(coverage) ? Math.max(0, coverage) : 0;
  return 1 + Math.min(safeCoverage * COVERAGE_BONUS_PER_PERCENT, MAX_COVERAGE_BONUS);
}

/**
 * Apply the coverage bonus to base points, floored.
 * E.g. (3, 0.5) → 3, (10, 100) → 100.
 */
export function scoreWithCoverageBonus(basePoints: number, coverage: number): number {
  return Math.floor(basePoints * coverageBonusMultiplier(coverage));
}

// ── Speed tiers ─────────────────────────────────────────────────

/**
 * Food needed to advance past `level`.
 *
 * Levels 1–5 cost `5 + L`, 6–10 cost `5 + 2L`, and beyond that `5L`.
 */
export function foodThresholdForLevel(level: number): number {
  if (level <= 5) {
    return FOOD_PER_SPEED_LEVEL + level;
  }
  if (level <= 10) {
    return FOOD_PER_SPEED_LEVEL + 2 * level;
  }
  return level * FOOD_PER_SPEED_LEVEL;
}

/** Food eaten so far, measured as growth beyond the starting body. */
export function foodEatenForLength(snakeLength: number): number {
  return Math.max(0, snakeLength - STARTING_SNAKE_LENGTH);
}

/**
 * Walk the tier thresholds from `baseLevel`, spending eaten food on each
 * level-up until the remainder no longer covers the next threshold.
 */
export function speedLevelForFoodEaten(baseLevel: number, foodEaten: number): number {
  let level = Math.max(1, Math.floor(baseLevel));
  let remaining = Math.max(0, Math.floor(foodEaten));

  for (;;) {
    const threshold = foodThresholdForLevel(level);
    if (remaining < threshold) {
      return level;
    }
    remaining -= threshold;
    level++;
  }
}
