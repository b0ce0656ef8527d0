import { opponentOf, samePiece } from "../types.ts";
import { clearSquare, cloneBoard, occupantAt, placePiece } from "./board.ts";
import { sameSquare } from "./coords.ts";
import { squareToA1 } from "./coordFormat.ts";
import { assertInvariant } from "./errors.ts";
import type { Move } from "./moveTypes.ts";
import type { Position } from "./state.ts";

/**
 * Returns the position after `move`. The input position is never touched;
 * the result owns a fresh board.
 *
 * Expects a move produced by the generator. Anything else is an engine bug
 * and throws an InvariantError.
 */
export function applyMoveChess(position: Position, move: Move): Position {
  const moving = occupantAt(position.board, move.from);
  assertInvariant(moving, `applyMoveChess: no piece at ${squareToA1(move.from)}`);
  assertInvariant(samePiece(moving, move.piece), `applyMoveChess: piece mismatch at ${squareToA1(move.from)}`);
  assertInvariant(moving.color === position.toMove, "applyMoveChess: not your piece");
  assertInvariant(!sameSquare(move.from, move.to), "applyMoveChess: null move");

  const target = occupantAt(position.board, move.to);
  if (move.kind === "capture") {
    assertInvariant(target && samePiece(target, move.captured), `applyMoveChess: no capture target at ${squareToA1(move.to)}`);
    assertInvariant(target.color !== moving.color, "applyMoveChess: cannot capture own piece");
  } else {
    assertInvariant(!target, `applyMoveChess: destination ${squareToA1(move.to)} is occupied`);
  }

  const nextBoard = cloneBoard(position.board);
  clearSquare(nextBoard, move.from);
  placePiece(nextBoard, move.to, moving);

  return {
    board: nextBoard,
    toMove: opponentOf(position.toMove),
    lastMove: {
      from: move.from,
      to: move.to,
      kind: moving.kind,
      doubleStep: move.kind === "double",
    },
  };
}
