import { describe, it, expect } from "vitest";
import { Food } from "@/game/entities/Food";

describe("Food values", () => {
  it("normal food is worth 1 point and 1 segment", () => {
    const food = Food.normal({ x: 1, y: 1 });
    expect(food.points()).toBe(1);
    expect(food.growth()).toBe(1);
    expect(food.isSuper()).toBe(false);
  });

  it("super food is worth 5 points and 5 segments", () => {
    const food = Food.super({ x: 2, y: 2 }, 12);
    expect(food.points()).toBe(5);
    expect(food.growth()).toBe(5);
    expect(food.kind).toEqual({ type: "super", ticksRemaining: 12 });
  });

  it("copies its position", () => {
    const position = { x: 3, y: 4 };
    const food = Food.normal(position);
    expect(food.position).toEqual({ x: 3, y: 4 });
    expect(food.position).not.toBe(position);
  });
});

describe("Food countdown", () => {
  it("super food reports alive until its countdown reaches zero", () => {
    const food = Food.super({ x: 1, y: 1 }, 3);

    expect(food.tick()).toBe(true);
    expect(food.tick()).toBe(true);
    expect(food.tick()).toBe(false);
    expect(food.kind).toEqual({ type: "super", ticksRemaining: 0 });
  });

  it("normal food never expires", () => {
    const food = Food.normal({ x: 1, y: 1 });
    for (let i = 0; i < 200; i++) {
      expect(food.tick()).toBe(true);
    }
    expect(food.kind).toEqual({ type: "normal" });
  });

  it("degrade turns super food into normal food in place", () => {
    const food = Food.super({ x: 4, y: 4 }, 8);
    food.degrade();
    expect(food.isSuper()).toBe(false);
    expect(food.points()).toBe(1);
    expect(food.position).toEqual({ x: 4, y: 4 });
  });

  it("clamps an invalid countdown to zero", () => {
    expect(Food.super({ x: 0, y: 0 }, -4).kind).toEqual({
      type: "super",
      ticksRemaining: 0,
    });
  });
});
