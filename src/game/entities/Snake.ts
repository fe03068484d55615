import { STARTING_SNAKE_LENGTH, type GridSize } from "../config";
import { SnakeInvariantError } from "../errors";
import {
  type Direction,
  type Position,
  areOrthogonallyAdjacent,
  isOppositeDirection,
  oppositeDirection,
  positionsEqual,
  stepInDirection,
  wrapPosition,
} from "../utils/grid";

// ── Snake entity ─────────────────────────────────────────────────

export class Snake {
  /** Ordered list of grid positions: index 0 = head, last = tail. */
  private segments: Position[];

  /** Direction applied by the most recent step. */
  private currentDirection: Direction;

  /** Direction the next step will apply. */
  private buffered: Direction;

  /** Second turn queued behind `buffered` (last write wins). */
  private queued: Direction | null = null;

  /** Segments still to be added; all are consumed by the next step. */
  private pendingGrowth = 0;

  constructor(
    headPos: Position,
    direction: Direction = "right",
    length: number = STARTING_SNAKE_LENGTH,
  ) {
    if (!Number.isInteger(length) || length < 1) {
      throw new SnakeInvariantError(
        `Snake length must be a positive integer, got ${length}.`,
      );
    }

    this.currentDirection = direction;
    this.buffered = direction;

    // Build initial segment positions: head at headPos, body trailing opposite to direction
    this.segments = [];
    const trailDir = oppositeDirection(direction);
    for (let i = 0; i < length; i++) {
      const pos =
        i === 0
          ? { ...headPos }
          : stepInDirection(this.segments[i - 1], trailDir);
      this.segments.push(pos);
    }
  }

  /**
   * Build a snake from explicit body segments (index 0 = head).
   *
   * Consecutive segments must be orthogonal neighbours, or equal where
   * growth has stacked them on the tail.
   */
  static fromSegments(segments: readonly Position[], direction: Direction): Snake {
    if (segments.length === 0) {
      throw new SnakeInvariantError("Snake body must contain at least one segment.");
    }

    for (let i = 1; i < segments.length; i++) {
      const prev = segments[i - 1];
      const next = segments[i];
      if (!positionsEqual(prev, next) && !areOrthogonallyAdjacent(prev, next)) {
        throw new SnakeInvariantError(
          `Snake segments ${i - 1} and ${i} are not adjacent: ` +
            `(${prev.x},${prev.y}) → (${next.x},${next.y}).`,
        );
      }
    }

    const snake = new Snake(segments[0], direction, 1);
    snake.segments = segments.map((segment) => ({ ...segment }));
    return snake;
  }

  // ── Input buffering ────────────────────────────────────────────

  /**
   * Queue a direction change.
   *
   * With no turn queued, `dir` is rejected only when it reverses the
   * current direction. With a turn already queued, `dir` fills the second
   * slot unless it reverses the queued turn; a later call overwrites that
   * slot. Two quick 90° turns therefore make a legal 180° over two steps.
   */
  bufferDirection(dir: Direction): void {
    if (this.buffered === this.currentDirection) {
      if (isOppositeDirection(this.currentDirection, dir)) return;
      this.buffered = dir;
      return;
    }

    if (isOppositeDirection(this.buffered, dir)) return;
    this.queued = dir;
  }

  // ── Movement ───────────────────────────────────────────────────

  /** Where the head will land on the next step. Does not mutate. */
  nextHeadPosition(): Position {
    return stepInDirection(this.head, this.buffered);
  }

  /**
   * Move the snake one grid step forward.
   *
   * Commits the buffered direction, promotes the second queued turn and
   * consumes all pending growth.
   */
  moveForward(bounds: GridSize): void {
    if (bounds.width <= 0 || bounds.height <= 0) {
      throw new SnakeInvariantError(
        `Cannot move within empty bounds ${bounds.width}x${bounds.height}.`,
      );
    }

    this.currentDirection = this.buffered;
    const newHead = this.nextHeadPosition();

    if (this.queued !== null) {
      this.buffered = this.queued;
      this.queued = null;
    }

    this.segments.unshift(newHead);

    if (this.pendingGrowth > 0) {
      // The kept tail is one unit; the rest stack on the tail cell and
      // unfold over the following steps.
      const tail = this.segments[this.segments.length - 1];
      for (let i = 1; i < this.pendingGrowth; i++) {
        this.segments.push({ ...tail });
      }
      this.pendingGrowth = 0;
    } else {
      this.segments.pop();
    }
  }

  // ── Growth ─────────────────────────────────────────────────────

  /** Queue a number of growth segments for the next step. */
  growBy(amount: number): void {
    if (!Number.isFinite(amount) || amount <= 0) return;
    this.pendingGrowth += Math.floor(amount);
  }

  // ── Collision queries ──────────────────────────────────────────

  /** Whether the head shares a cell with any other segment. */
  headOverlapsBody(): boolean {
    const head = this.head;
    for (let i = 1; i < this.segments.length; i++) {
      if (positionsEqual(this.segments[i], head)) {
        return true;
      }
    }
    return false;
  }

  occupies(position: Position): boolean {
    return this.segments.some((segment) => positionsEqual(segment, position));
  }

  /** Wrap every segment into `bounds` (used when the board shrinks). */
  wrapIntoBounds(bounds: GridSize): void {
    this.segments = this.segments.map((segment) => wrapPosition(segment, bounds));
  }

  // ── State queries ──────────────────────────────────────────────

  get head(): Position {
    return this.segments[0];
  }

  get length(): number {
    return this.segments.length;
  }

  get direction(): Direction {
    return this.currentDirection;
  }

  get bufferedDirection(): Direction {
    return this.buffered;
  }

  get queuedDirection(): Direction | null {
    return this.queued;
  }

  get pendingGrowthAmount(): number {
    return this.pendingGrowth;
  }

  /** Snapshot of body segments from head to tail. */
  getSegments(): Position[] {
    return this.segments.map((segment) => ({ ...segment }));
  }
}
