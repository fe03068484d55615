import { tickIntervalForSpeed, type GridSize } from "../config";
import type { GameState } from "../GameState";
import { gameBridge, type GameBridge } from "../bridge";
import type { GameInput } from "../input";
import { TickClock } from "../utils/grid";

/** Upper bound on ticks run for a single frame delta. */
const DEFAULT_MAX_TICKS_PER_UPDATE = 5;

export interface TickDriverOptions {
  /** Bridge to publish snapshots to. Defaults to the shared singleton. */
  bridge?: GameBridge;
  /** Start on the paused start screen instead of playing immediately. */
  startPaused?: boolean;
  maxTicksPerUpdate?: number;
  /** High score carried in from earlier play, e.g. a loaded save. */
  highScore?: number;
}

/**
 * Runs a session against wall-clock time.
 *
 * Frame deltas accumulate in a `TickClock`; each full interval runs one
 * `tick()`, and the interval is re-read after every tick because leveling
 * up shortens it. Also owns the UI-level session flow: Confirm starts from
 * the start screen and restarts after Game Over or Victory, and Quit stops
 * the driver.
 */
export class TickDriver {
  private session: GameState;

  private readonly clock: TickClock;

  private readonly bridge: GameBridge;

  private readonly maxTicksPerUpdate: number;

  private stopped = false;

  /** Best score of the sessions before the current one. */
  private previousBest: number;

  constructor(session: GameState, options: TickDriverOptions = {}) {
    this.session = session;
    this.bridge = options.bridge ?? gameBridge;
    this.maxTicksPerUpdate = Math.max(
      1,
      Math.floor(options.maxTicksPerUpdate ?? DEFAULT_MAX_TICKS_PER_UPDATE),
    );
    const seededBest = options.highScore ?? 0;
    this.previousBest = Number.isFinite(seededBest)
      ? Math.max(0, Math.floor(seededBest))
      : 0;
    this.clock = new TickClock(tickIntervalForSpeed(session.speedLevel));

    if (options.startPaused ?? true) {
      this.session.status = "paused";
    }
    this.publish();
  }

  get state(): GameState {
    return this.session;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Best score so far, the running session included. */
  get highScore(): number {
    return Math.max(this.previousBest, this.session.score);
  }

  /**
   * Advance by `deltaMs` of wall-clock time.
   * @returns the number of ticks that ran.
   */
  update(deltaMs: number): number {
    if (this.stopped || this.session.status !== "playing") {
      return 0;
    }

    this.clock.setInterval(tickIntervalForSpeed(this.session.speedLevel));
    this.clock.advance(deltaMs);

    let ticks = 0;
    while (this.session.status === "playing" && this.clock.consumeStep()) {
      this.session.tick();
      this.session.recordTickDuration(this.clock.durationMs);
      ticks++;
      this.clock.setInterval(tickIntervalForSpeed(this.session.speedLevel));

      if (ticks >= this.maxTicksPerUpdate) {
        // Drop the backlog after a long stall instead of fast-forwarding.
        this.clock.reset();
        break;
      }
    }

    if (this.session.status !== "playing") {
      this.clock.reset();
    }

    if (ticks > 0) {
      this.publish();
    }
    return ticks;
  }

  /** Route one decoded input to the session or the session flow. */
  handleInput(input: GameInput): void {
    if (this.stopped) return;

    switch (input.type) {
      case "confirm":
        if (this.session.isStartScreen()) {
          this.session.status = "playing";
        } else if (
          this.session.status === "gameOver" ||
          this.session.status === "victory"
        ) {
          this.restart();
          return;
        }
        break;
      case "quit":
        this.stopped = true;
        return;
      default:
        this.session.applyInput(input);
        break;
    }

    this.publish();
  }

  /** Replace the session with a fresh one and go straight into play. */
  restart(): void {
    this.previousBest = this.highScore;
    this.session = this.session.restart();
    this.clock.reset();
    this.publish();
  }

  /** Reconcile the session with a new viewport size. */
  resize(bounds: GridSize): void {
    this.session.resizeBounds(bounds);
    this.publish();
  }

  private publish(): void {
    this.bridge.publish(this.session, this.previousBest);
  }
}
