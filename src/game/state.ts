import type { PieceKind, Player } from "../types.ts";
import { opponentOf, playerName } from "../types.ts";
import type { Board, Placement, ReadonlyBoard } from "./board.ts";
import { cloneBoard, countPieces, createEmptyBoard, occupantAt, placePiece } from "./board.ts";
import type { Square } from "./coords.ts";
import { BOARD_SIZE, isSquare } from "./coords.ts";
import { squareToA1 } from "./coordFormat.ts";
import { initialPlacements } from "./initialPosition.ts";
import { assertInvariant, PositionSetupError } from "./errors.ts";
import { isKingInCheck } from "./attacks.ts";

export interface LastMove {
  readonly from: Square;
  readonly to: Square;
  readonly kind: PieceKind;
  /** True when a pawn just advanced two ranks from its start rank. */
  readonly doubleStep: boolean;
}

export interface Position {
  readonly board: ReadonlyBoard;
  readonly toMove: Player;
  readonly lastMove: LastMove | null;
}

export interface PositionSetup {
  pieces: Placement[];
  toMove: Player;
  lastMove?: LastMove | null;
}

function boardFrom(placements: Placement[]): Board {
  const board = createEmptyBoard();
  for (const { square, piece } of placements) placePiece(board, square, piece);
  return board;
}

export function createInitialPosition(): Position {
  return {
    board: boardFrom(initialPlacements()),
    toMove: "W",
    lastMove: null,
  };
}

/**
 * Rebuilds a position from explicit placements.
 * Rejects input that cannot arise in play: duplicate squares, a missing or
 * extra king, or the side that just moved still standing in check.
 */
export function createPosition(setup: PositionSetup): Position {
  const board = createEmptyBoard();
  for (const { square, piece } of setup.pieces) {
    if (!isSquare(square)) throw new PositionSetupError(`createPosition: square off board: ${JSON.stringify(square)}`);
    if (occupantAt(board, square)) throw new PositionSetupError(`createPosition: square ${squareToA1(square)} occupied twice`);
    placePiece(board, square, piece);
  }

  const position: Position = { board, toMove: setup.toMove, lastMove: setup.lastMove ?? null };
  validatePosition(position, "createPosition");
  return position;
}

/** Throws `PositionSetupError` unless the position could arise in play. */
export function validatePosition(position: Position, caller = "validatePosition"): void {
  const expected = BOARD_SIZE * BOARD_SIZE;
  if (position.board.length !== expected) {
    throw new PositionSetupError(`${caller}: board has ${position.board.length} squares, expected ${expected}`);
  }

  for (const color of ["W", "B"] as const) {
    const kings = countPieces(position.board, color, "K");
    if (kings !== 1) {
      throw new PositionSetupError(`${caller}: ${playerName(color)} must have exactly one king (found ${kings})`);
    }
  }

  const waiting = opponentOf(position.toMove);
  if (isKingInCheck(position, waiting)) {
    throw new PositionSetupError(`${caller}: ${playerName(waiting)} is in check but it is not their turn`);
  }
}

export function clonePosition(position: Position): Position {
  return {
    board: cloneBoard(position.board),
    toMove: position.toMove,
    lastMove: position.lastMove ? { ...position.lastMove, from: { ...position.lastMove.from }, to: { ...position.lastMove.to } } : null,
  };
}

export function assertKingsPresent(position: Position): void {
  for (const color of ["W", "B"] as const) {
    const kings = countPieces(position.board, color, "K");
    assertInvariant(kings === 1, `assertKingsPresent: ${playerName(color)} has ${kings} kings`);
  }
}
