import type { Piece, Player } from "../types.ts";
import type { ReadonlyBoard } from "./board.ts";
import { isEmpty, occupantAt, pieceEntries } from "./board.ts";
import type { Square } from "./coords.ts";
import { offsetSquare } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import type { Position } from "./state.ts";

export interface Direction {
  readonly df: number;
  readonly dr: number;
}

export const DIAGONALS: readonly Direction[] = [
  { df: -1, dr: -1 },
  { df: 1, dr: -1 },
  { df: -1, dr: 1 },
  { df: 1, dr: 1 },
];

export const ORTHOGONALS: readonly Direction[] = [
  { df: 0, dr: -1 },
  { df: 0, dr: 1 },
  { df: -1, dr: 0 },
  { df: 1, dr: 0 },
];

export const ALL_DIRECTIONS: readonly Direction[] = [...DIAGONALS, ...ORTHOGONALS];

export const KNIGHT_JUMPS: readonly Direction[] = [
  { df: -1, dr: -2 },
  { df: 1, dr: -2 },
  { df: -2, dr: -1 },
  { df: 2, dr: -1 },
  { df: -2, dr: 1 },
  { df: 2, dr: 1 },
  { df: -1, dr: 2 },
  { df: 1, dr: 2 },
];

export function pawnDir(player: Player): number {
  // White starts on ranks 0/1 and moves toward rank 7.
  return player === "W" ? 1 : -1;
}

export function pawnStartRank(player: Player): number {
  return player === "W" ? 1 : 6;
}

/** Moves onto an empty square or onto an opposing piece, a king included. */
function* stepOrCapture(board: ReadonlyBoard, from: Square, piece: Piece, to: Square): Generator<Move> {
  const top = occupantAt(board, to);
  if (!top) {
    yield { kind: "move", from, to, piece };
  } else if (top.color !== piece.color) {
    yield { kind: "capture", from, to, piece, captured: top };
  }
}

function* generateSlidingMoves(board: ReadonlyBoard, from: Square, piece: Piece, dirs: readonly Direction[]): Generator<Move> {
  for (const { df, dr } of dirs) {
    let to = offsetSquare(from, df, dr);
    while (to) {
      const top = occupantAt(board, to);
      if (!top) {
        yield { kind: "move", from, to, piece };
      } else {
        if (top.color !== piece.color) yield { kind: "capture", from, to, piece, captured: top };
        break;
      }
      to = offsetSquare(to, df, dr);
    }
  }
}

function* generatePawnMoves(board: ReadonlyBoard, from: Square, piece: Piece): Generator<Move> {
  const dir = pawnDir(piece.color);

  // Forward 1
  const one = offsetSquare(from, 0, dir);
  if (one && isEmpty(board, one)) {
    yield { kind: "move", from, to: one, piece };

    // Forward 2 from start
    const two = from.rank === pawnStartRank(piece.color) ? offsetSquare(from, 0, 2 * dir) : null;
    if (two && isEmpty(board, two)) {
      yield { kind: "double", from, to: two, piece };
    }
  }

  // Captures
  for (const df of [-1, 1]) {
    const to = offsetSquare(from, df, dir);
    if (!to) continue;
    const top = occupantAt(board, to);
    if (top && top.color !== piece.color) {
      yield { kind: "capture", from, to, piece, captured: top };
    }
  }
}

/** Pseudo-legal moves of one piece, whatever the side to move. */
export function* generatePseudoMovesForPiece(position: Position, from: Square, piece: Piece): Generator<Move> {
  const board = position.board;
  switch (piece.kind) {
    case "P":
      yield* generatePawnMoves(board, from, piece);
      return;
    case "N":
      for (const { df, dr } of KNIGHT_JUMPS) {
        const to = offsetSquare(from, df, dr);
        if (to) yield* stepOrCapture(board, from, piece, to);
      }
      return;
    case "B":
      yield* generateSlidingMoves(board, from, piece, DIAGONALS);
      return;
    case "R":
      yield* generateSlidingMoves(board, from, piece, ORTHOGONALS);
      return;
    case "Q":
      yield* generateSlidingMoves(board, from, piece, ALL_DIRECTIONS);
      return;
    case "K":
      for (const { df, dr } of ALL_DIRECTIONS) {
        const to = offsetSquare(from, df, dr);
        if (to) yield* stepOrCapture(board, from, piece, to);
      }
      return;
    default: {
      const unknownKind: never = piece.kind;
      throw new Error(`generatePseudoMovesForPiece: unknown piece kind ${String(unknownKind)}`);
    }
  }
}

/** Lazy sequence of pseudo-legal moves for the side to move; king safety is not considered. */
export function* generatePseudoMoves(position: Position): Generator<Move> {
  for (const { square, piece } of pieceEntries(position.board, position.toMove)) {
    yield* generatePseudoMovesForPiece(position, square, piece);
  }
}
