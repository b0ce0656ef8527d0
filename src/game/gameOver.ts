import type { Player } from "../types.ts";
import { opponentOf, playerName } from "../types.ts";
import { isKingInCheck } from "./attacks.ts";
import { generateLegalMoves } from "./legality.ts";
import type { Move } from "./moveTypes.ts";
import type { Position } from "./state.ts";

export type GameStatus =
  | { kind: "inProgress" }
  | { kind: "check"; color: Player }
  | { kind: "checkmate"; color: Player }
  | { kind: "stalemate" };

export type TerminalStatus = Extract<GameStatus, { kind: "checkmate" } | { kind: "stalemate" }>;

export function isTerminalStatus(status: GameStatus): status is TerminalStatus {
  return status.kind === "checkmate" || status.kind === "stalemate";
}

/**
 * Classifies `position` for its side to move. Draws other than stalemate
 * (repetition, material, move count) are not detected.
 * @param legalMoves - legal moves of the side to move, if already computed
 */
export function computeGameStatus(position: Position, legalMoves?: readonly Move[]): GameStatus {
  const color = position.toMove;
  const inCheck = isKingInCheck(position, color);
  const hasMoves = (legalMoves ?? generateLegalMoves(position)).length > 0;

  if (inCheck) return hasMoves ? { kind: "check", color } : { kind: "checkmate", color };
  return hasMoves ? { kind: "inProgress" } : { kind: "stalemate" };
}

export function getWinner(status: GameStatus): { winner: Player | null; reason: string | null } {
  if (status.kind === "checkmate") {
    const winner = opponentOf(status.color);
    return {
      winner,
      reason: `${playerName(winner)} wins: ${playerName(status.color)} is checkmated`,
    };
  }
  if (status.kind === "stalemate") {
    return { winner: null, reason: "Draw by stalemate" };
  }
  return { winner: null, reason: null };
}
