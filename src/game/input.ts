import type { Direction } from "./utils/grid";

/**
 * Decoded input events fed to the simulation.
 *
 * The core acts on `direction` and `pause`; the rest belong to the UI layer
 * (quitting, confirming menus, theme cycling, viewport changes).
 */
export type GameInput =
  | { type: "direction"; direction: Direction }
  | { type: "pause" }
  | { type: "quit" }
  | { type: "confirm" }
  | { type: "cycleTheme" }
  | { type: "resize" };

export const directionInput = (direction: Direction): GameInput => ({
  type: "direction",
  direction,
});

export const PAUSE_INPUT: GameInput = { type: "pause" };
