import { playerName } from "../types.ts";
import { occupantAt } from "./board.ts";
import type { Square } from "./coords.ts";
import { isSquare, sameSquare } from "./coords.ts";
import { formatMove, squareToA1 } from "./coordFormat.ts";
import type { Move } from "./moveTypes.ts";
import { sameMove } from "./moveTypes.ts";
import { generatePseudoMoves, generatePseudoMovesForPiece } from "./movegenChess.ts";
import { applyMoveChess } from "./applyMoveChess.ts";
import { isKingInCheck } from "./attacks.ts";
import type { Position } from "./state.ts";

/** Simulates `move` on a scratch position and asks whether the mover's king ends up attacked. */
export function leavesKingInCheck(position: Position, move: Move): boolean {
  const next = applyMoveChess(position, move);
  return isKingInCheck(next, move.piece.color);
}

/** Legal moves for the side to move. Callers must not rely on the order. */
export function generateLegalMoves(position: Position): Move[] {
  const legal: Move[] = [];
  for (const m of generatePseudoMoves(position)) {
    if (!leavesKingInCheck(position, m)) legal.push(m);
  }
  return legal;
}

export function legalMovesFrom(moves: readonly Move[], square: Square): Move[] {
  return moves.filter((m) => sameSquare(m.from, square));
}

export function findLegalMove(moves: readonly Move[], candidate: Move): Move | null {
  return moves.find((m) => sameMove(m, candidate)) ?? null;
}

/** Human-readable reason why `candidate` is not playable in `position`. */
export function explainIllegalMove(position: Position, candidate: Move): string {
  if (!isSquare(candidate.from) || !isSquare(candidate.to)) return "square off board";

  const piece = occupantAt(position.board, candidate.from);
  if (!piece) return `no piece at ${squareToA1(candidate.from)}`;
  if (piece.color !== position.toMove) {
    return `not your piece: ${squareToA1(candidate.from)} belongs to ${playerName(piece.color)}`;
  }

  const pseudo = Array.from(generatePseudoMovesForPiece(position, candidate.from, piece));
  const match = pseudo.find((m) => sameSquare(m.to, candidate.to));
  if (!match) return `${formatMove(candidate)} is not a legal move`;
  if (!sameMove(match, candidate)) return `${formatMove(candidate)} does not match the board`;
  if (leavesKingInCheck(position, match)) return `${formatMove(match)} leaves the king in check`;
  return `${formatMove(candidate)} is not a legal move`;
}
