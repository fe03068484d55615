import { describe, it, expect } from "vitest";
import {
  coverageBonusMultiplier,
  coveragePercent,
  foodEatenForLength,
  foodThresholdForLevel,
  scoreWithCoverageBonus,
  speedLevelForFoodEaten,
} from "@/game/systems/scoring";
import { clampStartSpeedLevel, tickIntervalForSpeed } from "@/game/config";

// ── Coverage bonus ──────────────────────────────────────────────

describe("coverage bonus", () => {
  it("measures coverage as a percentage of the board", () => {
    expect(coveragePercent(2, { width: 10, height: 10 })).toBe(2);
    expect(coveragePercent(5, { width: 0, height: 10 })).toBe(0);
  });

  it("adds a tenth per percent of coverage", () => {
    expect(coverageBonusMultiplier(0)).toBe(1);
    expect(coverageBonusMultiplier(20)).toBeCloseTo(3, 10);
  });

  it("caps the bonus at 9", () => {
    expect(coverageBonusMultiplier(90)).toBe(10);
    expect(coverageBonusMultiplier(250)).toBe(10);
  });

  it("floors the boosted score", () => {
    expect(scoreWithCoverageBonus(3, 0.5)).toBe(3);
    expect(scoreWithCoverageBonus(4, 25)).toBe(14);
  });

  it("gives 10x at full coverage", () => {
    expect(scoreWithCoverageBonus(10, 100)).toBe(100);
  });
});

// ── Speed tiers ─────────────────────────────────────────────────

describe("foodThresholdForLevel", () => {
  it("costs 5 + L in the first tier", () => {
    expect(foodThresholdForLevel(1)).toBe(6);
    expect(foodThresholdForLevel(5)).toBe(10);
  });

  it("costs 5 + 2L in the second tier", () => {
    expect(foodThresholdForLevel(6)).toBe(17);
    expect(foodThresholdForLevel(10)).toBe(25);
  });

  it("costs 5L past level 10", () => {
    expect(foodThresholdForLevel(11)).toBe(55);
    expect(foodThresholdForLevel(12)).toBe(60);
  });
});

describe("speedLevelForFoodEaten", () => {
  it("stays at level 1 after five food", () => {
    expect(speedLevelForFoodEaten(1, 5)).toBe(1);
  });

  it("reaches level 2 on the sixth food", () => {
    expect(speedLevelForFoodEaten(1, 6)).toBe(2);
  });

  it("reaches level 11 after 145 food and level 12 by 205", () => {
    expect(speedLevelForFoodEaten(1, 144)).toBe(10);
    expect(speedLevelForFoodEaten(1, 145)).toBe(11);
    expect(speedLevelForFoodEaten(1, 205)).toBe(12);
  });

  it("starts from the base level", () => {
    expect(speedLevelForFoodEaten(3, 0)).toBe(3);
    expect(speedLevelForFoodEaten(3, 8)).toBe(4);
  });

  it("counts food as growth beyond the starting body", () => {
    expect(foodEatenForLength(1)).toBe(0);
    expect(foodEatenForLength(2)).toBe(0);
    expect(foodEatenForLength(9)).toBe(7);
  });
});

// ── Pacing ──────────────────────────────────────────────────────

describe("tickIntervalForSpeed", () => {
  it("shortens by 10ms per level down to 60ms", () => {
    expect(tickIntervalForSpeed(1)).toBe(200);
    expect(tickIntervalForSpeed(5)).toBe(160);
    expect(tickIntervalForSpeed(15)).toBe(60);
    expect(tickIntervalForSpeed(40)).toBe(60);
  });

  it("treats levels below 1 as level 1", () => {
    expect(tickIntervalForSpeed(0)).toBe(200);
    expect(tickIntervalForSpeed(Number.NaN)).toBe(200);
  });
});

describe("clampStartSpeedLevel", () => {
  it("keeps the starting level selectable", () => {
    expect(clampStartSpeedLevel(0)).toBe(1);
    expect(clampStartSpeedLevel(4)).toBe(4);
    expect(clampStartSpeedLevel(99)).toBe(10);
  });
});
