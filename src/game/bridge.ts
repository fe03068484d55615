/**
 * Simulation → UI state bridge.
 *
 * A lightweight typed event emitter that the tick driver writes to and UI
 * overlays subscribe to. Exported as a singleton so both sides import the
 * same instance.
 */
import type { GridSize } from "./config";
import type { DeathReason, GameState, GameStatus } from "./GameState";
import type { GlowTrigger } from "./systems/glow";

// ── Snapshot shape ──────────────────────────────────────────────
export interface GameSnapshot {
  status: GameStatus;
  isStartScreen: boolean;
  deathReason: DeathReason | null;
  score: number;
  /** Best score across the sessions driven so far, this one included. */
  highScore: number;
  /** Whether this session's score beats every earlier session. */
  isNewHighScore: boolean;
  speedLevel: number;
  tickCount: number;
  snakeLength: number;
  /** Percentage (0–100) of the board covered by the snake. */
  coveragePercent: number;
  /** Live food target for the current density. */
  foodTarget: number;
  foodCount: number;
  bounds: GridSize;
  /** Accumulated play time in milliseconds. */
  elapsedMs: number;
  glow: GlowTrigger | null;
}

// ── Event map: event name → payload ─────────────────────────────
export interface GameBridgeEvents {
  statusChange: GameStatus;
  scoreChange: number;
  highScoreChange: number;
  speedLevelChange: number;
  elapsedTimeChange: number;
  snapshot: GameSnapshot;
}

export type GameBridgeEventName = keyof GameBridgeEvents;

type Listener<T> = (value: T) => void;

type ListenerMap = {
  [K in GameBridgeEventName]: Set<Listener<GameBridgeEvents[K]>>;
};

export function createInitialSnapshot(): GameSnapshot {
  return {
    status: "paused",
    isStartScreen: true,
    deathReason: null,
    score: 0,
    highScore: 0,
    isNewHighScore: false,
    speedLevel: 1,
    tickCount: 0,
    snakeLength: 0,
    coveragePercent: 0,
    foodTarget: 0,
    foodCount: 0,
    bounds: { width: 0, height: 0 },
    elapsedMs: 0,
    glow: null,
  };
}

/**
 * Read everything a HUD needs out of a live session. `previousBest` is the
 * high score carried in from earlier sessions.
 */
export function snapshotOf(state: GameState, previousBest = 0): GameSnapshot {
  return {
    status: state.status,
    isStartScreen: state.isStartScreen(),
    deathReason: state.deathReason,
    score: state.score,
    highScore: Math.max(previousBest, state.score),
    isNewHighScore: state.score > previousBest,
    speedLevel: state.speedLevel,
    tickCount: state.tickCount,
    snakeLength: state.snake.length,
    coveragePercent: state.playAreaCoveragePercent(),
    foodTarget: state.calculatedFoodCount(),
    foodCount: state.foods.length,
    bounds: { ...state.bounds },
    elapsedMs: state.elapsedMs(),
    glow: state.activeGlow()?.trigger ?? null,
  };
}

/**
 * Typed event emitter that also holds the latest snapshot so
 * late-subscribing components can read the current value without waiting
 * for the next event.
 */
export class GameBridge {
  private state: GameSnapshot = createInitialSnapshot();

  private listeners: ListenerMap = {
    statusChange: new Set(),
    scoreChange: new Set(),
    highScoreChange: new Set(),
    speedLevelChange: new Set(),
    elapsedTimeChange: new Set(),
    snapshot: new Set(),
  };

  // ── Getters ─────────────────────────────────────────────────
  getState(): Readonly<GameSnapshot> {
    return this.state;
  }

  // ── Mutations (called by the tick driver) ───────────────────

  /**
   * Replace the held snapshot with the session's current state.
   * Field events fire only for fields that changed; `snapshot` always fires.
   */
  publish(session: GameState, previousBest = 0): void {
    const previous = this.state;
    const next = snapshotOf(session, previousBest);
    this.state = next;

    if (previous.status !== next.status) {
      this.emit("statusChange", next.status);
    }
    if (previous.score !== next.score) {
      this.emit("scoreChange", next.score);
    }
    if (previous.highScore !== next.highScore) {
      this.emit("highScoreChange", next.highScore);
    }
    if (previous.speedLevel !== next.speedLevel) {
      this.emit("speedLevelChange", next.speedLevel);
    }
    if (previous.elapsedMs !== next.elapsedMs) {
      this.emit("elapsedTimeChange", next.elapsedMs);
    }
    this.emit("snapshot", next);
  }

  /** Return to the pre-session snapshot (called when a session is torn down). */
  reset(): void {
    this.state = createInitialSnapshot();
    this.emit("statusChange", this.state.status);
    this.emit("scoreChange", 0);
    this.emit("highScoreChange", 0);
    this.emit("speedLevelChange", this.state.speedLevel);
    this.emit("elapsedTimeChange", 0);
    this.emit("snapshot", this.state);
  }

  // ── Pub / Sub ───────────────────────────────────────────────
  on<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event].add(listener);
  }

  off<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event].delete(listener);
  }

  private emit<K extends GameBridgeEventName>(
    event: K,
    value: GameBridgeEvents[K],
  ): void {
    this.listeners[event].forEach((fn) => fn(value));
  }
}

/** Singleton bridge instance shared by the driver and the HUD. */
export const gameBridge = new GameBridge();
