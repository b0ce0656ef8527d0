import type { TerminalStatus } from "./gameOver.ts";

/** Recoverable, caller-facing reasons for rejecting a move. Returned, never thrown. */
export type MoveError =
  | { kind: "illegalMove"; reason: string }
  | { kind: "gameOver"; status: TerminalStatus };

/** Thrown when a caller tries to reconstruct a position that cannot occur in play. */
export class PositionSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PositionSetupError";
  }
}

/** Engine-internal corruption. Never caught inside the engine. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export function assertInvariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
