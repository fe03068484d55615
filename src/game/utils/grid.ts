import { DEFAULT_TICK_INTERVAL_MS, type GridSize } from "../config";

export type Position = Readonly<{
  x: number;
  y: number;
}>;

export type Direction = "up" | "right" | "down" | "left";

export const CARDINAL_DIRECTIONS = [
  "up",
  "right",
  "down",
  "left",
] as const satisfies ReadonlyArray<Direction>;

const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = Object.freeze(
  {
    up: Object.freeze({ x: 0, y: -1 }),
    right: Object.freeze({ x: 1, y: 0 }),
    down: Object.freeze({ x: 0, y: 1 }),
    left: Object.freeze({ x: -1, y: 0 }),
  },
);

const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> =
  Object.freeze({
    up: "down",
    right: "left",
    down: "up",
    left: "right",
  });

const sanitizeFiniteNonNegative = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, value);
};

const sanitizePositive = (value: number, fallback: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return value;
};

export const directionToVector = (direction: Direction): Position =>
  DIRECTION_VECTORS[direction];

export const oppositeDirection = (direction: Direction): Direction =>
  OPPOSITE_DIRECTIONS[direction];

export const isOppositeDirection = (
  currentDirection: Direction,
  nextDirection: Direction,
): boolean => oppositeDirection(currentDirection) === nextDirection;

export const positionsEqual = (first: Position, second: Position): boolean =>
  first.x === second.x && first.y === second.y;

export const positionKey = (position: Position): string =>
  `${position.x},${position.y}`;

export const stepInDirection = (
  position: Position,
  direction: Direction,
): Position => {
  const vector = directionToVector(direction);

  return {
    x: position.x + vector.x,
    y: position.y + vector.y,
  };
};

export const isWithinBounds = (position: Position, bounds: GridSize): boolean =>
  position.x >= 0 &&
  position.y >= 0 &&
  position.x < bounds.width &&
  position.y < bounds.height;

const wrapAxis = (value: number, upperBound: number): number => {
  const wrapped = value % upperBound;
  return wrapped < 0 ? wrapped + upperBound : wrapped;
};

/**
 * Wrap a position into bounds on both axes.
 * E.g. (-1, 3) on a 10×8 board → (9, 3).
 */
export const wrapPosition = (position: Position, bounds: GridSize): Position => ({
  x: wrapAxis(position.x, bounds.width),
  y: wrapAxis(position.y, bounds.height),
});

export const manhattanDistance = (a: Position, b: Position): number =>
  Math.abs(a.x - b.x) + Math.abs(a.y - b.y);

/** True when `b` is one orthogonal step away from `a`. */
export const areOrthogonallyAdjacent = (a: Position, b: Position): boolean =>
  manhattanDistance(a, b) === 1;

/**
 * Converts wall-clock deltas into whole simulation steps.
 *
 * The interval can change between steps (speed levels shorten it), so the
 * clock hands out one step at a time and lets the caller re-read the
 * interval in between.
 */
export class TickClock {
  private intervalMs: number;

  private elapsedInCurrentStepMs = 0;

  constructor(intervalMs = DEFAULT_TICK_INTERVAL_MS) {
    this.intervalMs = sanitizePositive(intervalMs, DEFAULT_TICK_INTERVAL_MS);
  }

  get durationMs(): number {
    return this.intervalMs;
  }

  get elapsedMs(): number {
    return this.elapsedInCurrentStepMs;
  }

  /** Accumulate elapsed wall-clock time. Non-finite or negative deltas count as 0. */
  advance(deltaMs: number): void {
    this.elapsedInCurrentStepMs += sanitizeFiniteNonNegative(deltaMs);
  }

  /** Consume one full interval if enough time has accumulated. */
  consumeStep(): boolean {
    if (this.elapsedInCurrentStepMs < this.intervalMs) {
      return false;
    }

    this.elapsedInCurrentStepMs -= this.intervalMs;
    return true;
  }

  reset(): void {
    this.elapsedInCurrentStepMs = 0;
  }

  setInterval(intervalMs: number): void {
    this.intervalMs = sanitizePositive(intervalMs, this.intervalMs);
  }
}
