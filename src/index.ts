export * from "./game/config";
export { SnakeInvariantError } from "./game/errors";
export * from "./game/utils/grid";
export { createRng, randomSeed, type Rng } from "./game/utils/rng";
export { Snake } from "./game/entities/Snake";
export { Food, type FoodKind } from "./game/entities/Food";
export * from "./game/systems/foodSpawner";
export * from "./game/systems/scoring";
export { GlowEffect, type GlowTrigger } from "./game/systems/glow";
export { TickDriver, type TickDriverOptions } from "./game/systems/TickDriver";
export {
  GameState,
  type DeathReason,
  type GameStateOptions,
  type GameStatus,
} from "./game/GameState";
export { directionInput, PAUSE_INPUT, type GameInput } from "./game/input";
export {
  GameBridge,
  createInitialSnapshot,
  gameBridge,
  snapshotOf,
  type GameBridgeEventName,
  type GameBridgeEvents,
  type GameSnapshot,
} from "./game/bridge";
export { default as HUD, formatTime, statusLabel, type HUDProps } from "./components/HUD";
