import { describe, it, expect } from "vitest";
import {
  CARDINAL_DIRECTIONS,
  TickClock,
  areOrthogonallyAdjacent,
  directionToVector,
  isOppositeDirection,
  isWithinBounds,
  manhattanDistance,
  oppositeDirection,
  positionKey,
  positionsEqual,
  stepInDirection,
  wrapPosition,
} from "@/game/utils/grid";
import { totalCells } from "@/game/config";

// ── Direction helpers ───────────────────────────────────────────

describe("directionToVector", () => {
  it("returns a unit vector for each direction", () => {
    expect(directionToVector("up")).toEqual({ x: 0, y: -1 });
    expect(directionToVector("down")).toEqual({ x: 0, y: 1 });
    expect(directionToVector("left")).toEqual({ x: -1, y: 0 });
    expect(directionToVector("right")).toEqual({ x: 1, y: 0 });
  });
});

describe("oppositeDirection", () => {
  it("returns the opposite for each cardinal direction", () => {
    expect(oppositeDirection("up")).toBe("down");
    expect(oppositeDirection("down")).toBe("up");
    expect(oppositeDirection("left")).toBe("right");
    expect(oppositeDirection("right")).toBe("left");
  });

  it("is its own inverse", () => {
    for (const d of CARDINAL_DIRECTIONS) {
      expect(oppositeDirection(oppositeDirection(d))).toBe(d);
    }
  });
});

describe("isOppositeDirection", () => {
  it("flags reversals only", () => {
    expect(isOppositeDirection("up", "down")).toBe(true);
    expect(isOppositeDirection("left", "right")).toBe(true);
    expect(isOppositeDirection("up", "left")).toBe(false);
    expect(isOppositeDirection("up", "up")).toBe(false);
  });
});

// ── Positions ───────────────────────────────────────────────────

describe("stepInDirection", () => {
  it("moves one cell and may leave the board", () => {
    expect(stepInDirection({ x: 0, y: 0 }, "left")).toEqual({ x: -1, y: 0 });
    expect(stepInDirection({ x: 3, y: 4 }, "down")).toEqual({ x: 3, y: 5 });
  });
});

describe("isWithinBounds", () => {
  const bounds = { width: 10, height: 8 };

  it("accepts the corners", () => {
    expect(isWithinBounds({ x: 0, y: 0 }, bounds)).toBe(true);
    expect(isWithinBounds({ x: 9, y: 7 }, bounds)).toBe(true);
  });

  it("rejects cells past each edge", () => {
    expect(isWithinBounds({ x: -1, y: 0 }, bounds)).toBe(false);
    expect(isWithinBounds({ x: 0, y: -1 }, bounds)).toBe(false);
    expect(isWithinBounds({ x: 10, y: 0 }, bounds)).toBe(false);
    expect(isWithinBounds({ x: 0, y: 8 }, bounds)).toBe(false);
  });
});

describe("wrapPosition", () => {
  const bounds = { width: 10, height: 8 };

  it("wraps negative coordinates to the far edge", () => {
    expect(wrapPosition({ x: -1, y: 3 }, bounds)).toEqual({ x: 9, y: 3 });
  });

  it("wraps overflowing coordinates to zero", () => {
    expect(wrapPosition({ x: 4, y: 8 }, bounds)).toEqual({ x: 4, y: 0 });
  });

  it("wraps several board widths", () => {
    expect(wrapPosition({ x: 25, y: -17 }, bounds)).toEqual({ x: 5, y: 7 });
  });
});

describe("position helpers", () => {
  it("compares by value", () => {
    expect(positionsEqual({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
    expect(positionsEqual({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
  });

  it("builds a stable key", () => {
    expect(positionKey({ x: -3, y: 7 })).toBe("-3,7");
  });

  it("measures Manhattan distance", () => {
    expect(manhattanDistance({ x: 0, y: 0 }, { x: 3, y: -4 })).toBe(7);
  });

  it("detects orthogonal neighbours", () => {
    expect(areOrthogonallyAdjacent({ x: 2, y: 2 }, { x: 2, y: 3 })).toBe(true);
    expect(areOrthogonallyAdjacent({ x: 2, y: 2 }, { x: 3, y: 3 })).toBe(false);
    expect(areOrthogonallyAdjacent({ x: 2, y: 2 }, { x: 2, y: 2 })).toBe(false);
  });

  it("counts total cells", () => {
    expect(totalCells({ width: 10, height: 8 })).toBe(80);
  });
});

// ── TickClock ───────────────────────────────────────────────────

describe("TickClock", () => {
  it("hands out one step per full interval", () => {
    const clock = new TickClock(100);
    clock.advance(250);

    expect(clock.consumeStep()).toBe(true);
    expect(clock.consumeStep()).toBe(true);
    expect(clock.consumeStep()).toBe(false);
    expect(clock.elapsedMs).toBe(50);
  });

  it("ignores non-finite and negative deltas", () => {
    const clock = new TickClock(100);
    clock.advance(Number.NaN);
    clock.advance(-40);
    clock.advance(Number.POSITIVE_INFINITY);
    expect(clock.elapsedMs).toBe(0);
  });

  it("keeps its interval when given an invalid one", () => {
    const clock = new TickClock(100);
    clock.setInterval(-5);
    expect(clock.durationMs).toBe(100);
    clock.setInterval(80);
    expect(clock.durationMs).toBe(80);
  });

  it("falls back to the default interval", () => {
    expect(new TickClock(0).durationMs).toBe(200);
  });

  it("reset drops accumulated time", () => {
    const clock = new TickClock(100);
    clock.advance(90);
    clock.reset();
    clock.advance(20);
    expect(clock.consumeStep()).toBe(false);
  });
});
