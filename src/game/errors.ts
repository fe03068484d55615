/**
 * Raised when a caller breaks a simulation invariant (for example an empty
 * snake body). These indicate a programming error and are never caught by
 * the core.
 */
export class SnakeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SnakeInvariantError";
  }
}
