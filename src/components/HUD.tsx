import { useEffect, useState } from "react";
import {
  gameBridge,
  type GameBridge,
  type GameSnapshot,
} from "@/game/bridge";

/**
 * Format milliseconds into a human-readable "Xm Ys" or "Xs" string.
 */
export function formatTime(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

/** Centre label of the status row. Empty while playing. */
export function statusLabel(snapshot: GameSnapshot): string {
  if (snapshot.isStartScreen) {
    return "Press Enter to start";
  }

  switch (snapshot.status) {
    case "playing":
      return "";
    case "paused":
      return "Paused";
    case "victory":
      return "Victory!";
    case "gameOver":
      return snapshot.deathReason === "selfCollision"
        ? "Game Over: hit yourself"
        : "Game Over: hit the wall";
  }
}

export interface HUDProps {
  /** Bridge to read from. Defaults to the shared singleton. */
  bridge?: GameBridge;
}

/**
 * Two-row HUD overlay.
 *
 * Top row: score, high score, speed level and board coverage. Bottom row:
 * board size, food target, session status and play time, plus a badge when
 * a finished session set a new high score. Subscribes to the bridge snapshot
 * stream for updates.
 */
export default function HUD({ bridge = gameBridge }: HUDProps) {
  const [snapshot, setSnapshot] = useState<GameSnapshot>(
    () => bridge.getState(),
  );

  useEffect(() => {
    const onSnapshot = (next: GameSnapshot) => setSnapshot(next);

    bridge.on("snapshot", onSnapshot);
    setSnapshot(bridge.getState());

    return () => {
      bridge.off("snapshot", onSnapshot);
    };
  }, [bridge]);

  const label = statusLabel(snapshot);
  const showNewHigh =
    snapshot.isNewHighScore &&
    (snapshot.status === "gameOver" || snapshot.status === "victory");

  return (
    <div id="hud" role="status" aria-label="Game HUD">
      <div data-testid="hud-score-row">
        <span data-testid="hud-score">Score: {snapshot.score}</span>
        <span data-testid="hud-high-score">Hi: {snapshot.highScore}</span>
        <span data-testid="hud-speed">Speed: {snapshot.speedLevel}</span>
        <span data-testid="hud-coverage">
          Coverage: {snapshot.coveragePercent.toFixed(2)}%
        </span>
      </div>
      <div data-testid="hud-status-row">
        <span data-testid="hud-dimensions">
          {snapshot.bounds.width}x{snapshot.bounds.height}
        </span>
        <span data-testid="hud-food-target">Food: {snapshot.foodTarget}</span>
        <span data-testid="hud-status" data-status={snapshot.status}>
          {label}
        </span>
        {showNewHigh && (
          <span data-testid="hud-new-high-score">New high score!</span>
        )}
        <span data-testid="hud-time">{formatTime(snapshot.elapsedMs)}</span>
      </div>
    </div>
  );
}
