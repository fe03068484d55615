// ── Board ────────────────────────────────────────────────────────

/** Logical board dimensions in cells. */
export type GridSize = Readonly<{
  width: number;
  height: number;
}>;

/** Default board used when a caller does not supply one. */
export const DEFAULT_GRID_SIZE: GridSize = Object.freeze({
  width: 40,
  height: 20,
});

/** Total number of cells on the board. */
export function totalCells(size: GridSize): number {
  return Math.max(0, Math.floor(size.width)) * Math.max(0, Math.floor(size.height));
}

// ── Tick pacing ──────────────────────────────────────────────────

/** Tick interval at speed level 1, in ms. */
export const DEFAULT_TICK_INTERVAL_MS = 200;

/** Fastest allowed tick interval, in ms. */
export const MIN_TICK_INTERVAL_MS = 60;

/** Interval removed per speed level above 1, in ms. */
export const TICK_INTERVAL_STEP_MS = 10;

/**
 * Wall-clock interval between ticks for a speed level.
 * E.g. level 1 → 200ms, level 5 → 160ms, level 15+ → 60ms.
 */
export function tickIntervalForSpeed(speedLevel: number): number {
  const level = Number.isFinite(speedLevel) ? Math.max(1, Math.floor(speedLevel)) : 1;
  const penalty = (level - 1) * TICK_INTERVAL_STEP_MS;
  return Math.max(MIN_TICK_INTERVAL_MS, DEFAULT_TICK_INTERVAL_MS - penalty);
}

// ── Speed levels ─────────────────────────────────────────────────

/** Base food count used by the tiered level thresholds. */
export const FOOD_PER_SPEED_LEVEL = 5;

export const MIN_START_SPEED_LEVEL = 1;
export const MAX_START_SPEED_LEVEL = 10;

/** Clamp a player-selected starting level into the selectable range. */
export function clampStartSpeedLevel(level: number): number {
  if (!Number.isFinite(level)) {
    return MIN_START_SPEED_LEVEL;
  }
  return Math.min(
    MAX_START_SPEED_LEVEL,
    Math.max(MIN_START_SPEED_LEVEL, Math.floor(level)),
  );
}

// ── Snake ────────────────────────────────────────────────────────

/** Segments in a freshly spawned snake (head + one trailing segment). */
export const STARTING_SNAKE_LENGTH = 2;

// ── Food ─────────────────────────────────────────────────────────

export const NORMAL_FOOD_POINTS = 1;
export const SUPER_FOOD_POINTS = 5;

export const NORMAL_FOOD_GROWTH = 1;
export const SUPER_FOOD_GROWTH = 5;

/** Extra ticks added to the head→food distance when a super food spawns. */
export const SUPER_FOOD_TTL_PADDING = 10;

/** Percent chance that food spawned mid-game is promoted to super food. */
export const SUPER_FOOD_CHANCE_PERCENT = 30;

/** Live-food target expressed as `foodsPer` items per `cellsPer` free cells. */
export type FoodDensity = Readonly<{
  foodsPer: number;
  cellsPer: number;
}>;

export const DEFAULT_FOOD_DENSITY: FoodDensity = Object.freeze({
  foodsPer: 1,
  cellsPer: 200,
});

// ── Scoring ──────────────────────────────────────────────────────

/** Bonus multiplier gained per percent of the board the snake covers. */
export const COVERAGE_BONUS_PER_PERCENT = 0.1;

/** Cap on the coverage bonus (total multiplier tops out at 1 + this). */
export const MAX_COVERAGE_BONUS = 9;

// ── Glow ─────────────────────────────────────────────────────────

/** How long a glow pulse stays active, in ms. */
export const GLOW_DURATION_MS = 1200;
