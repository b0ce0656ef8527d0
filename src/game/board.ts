import type { Piece, Player } from "../types.ts";
import type { Square } from "./coords.ts";
import { BOARD_SIZE, squareFromIndex, squareIndex } from "./coords.ts";

export type Board = Array<Piece | null>;
export type ReadonlyBoard = ReadonlyArray<Piece | null>;

export interface Placement {
  square: Square;
  piece: Piece;
}

export function createEmptyBoard(): Board {
  return new Array<Piece | null>(BOARD_SIZE * BOARD_SIZE).fill(null);
}

export function occupantAt(board: ReadonlyBoard, sq: Square): Piece | null {
  return board[squareIndex(sq)] ?? null;
}

export function isEmpty(board: ReadonlyBoard, sq: Square): boolean {
  return occupantAt(board, sq) === null;
}

export function placePiece(board: Board, sq: Square, piece: Piece): void {
  board[squareIndex(sq)] = piece;
}

export function clearSquare(board: Board, sq: Square): void {
  board[squareIndex(sq)] = null;
}

// Pieces are frozen, so copying the slots is enough to unalias two boards.
export function cloneBoard(board: ReadonlyBoard): Board {
  return board.slice();
}

export function* pieceEntries(board: ReadonlyBoard, color?: Player): Generator<Placement> {
  for (let i = 0; i < board.length; i++) {
    const piece = board[i];
    if (!piece) continue;
    if (color && piece.color !== color) continue;
    const square = squareFromIndex(i);
    if (square) yield { square, piece };
  }
}

export function findKingSquare(board: ReadonlyBoard, color: Player): Square | null {
  for (const { square, piece } of pieceEntries(board, color)) {
    if (piece.kind === "K") return square;
  }
  return null;
}

export function countPieces(board: ReadonlyBoard, color: Player, kind: Piece["kind"]): number {
  let n = 0;
  for (const { piece } of pieceEntries(board, color)) {
    if (piece.kind === kind) n++;
  }
  return n;
}
