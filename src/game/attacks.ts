import type { Piece, Player } from "../types.ts";
import { opponentOf, playerName } from "../types.ts";
import type { ReadonlyBoard } from "./board.ts";
import { findKingSquare, occupantAt, pieceEntries } from "./board.ts";
import type { Direction } from "./movegenChess.ts";
import { ALL_DIRECTIONS, DIAGONALS, KNIGHT_JUMPS, ORTHOGONALS, pawnDir } from "./movegenChess.ts";
import type { Square } from "./coords.ts";
import { offsetSquare, squareIndex } from "./coords.ts";
import { assertInvariant } from "./errors.ts";
import type { Position } from "./state.ts";

function* rayTargets(board: ReadonlyBoard, from: Square, dirs: readonly Direction[]): Generator<Square> {
  for (const { df, dr } of dirs) {
    let sq = offsetSquare(from, df, dr);
    while (sq) {
      yield sq;
      if (occupantAt(board, sq)) break;
      sq = offsetSquare(sq, df, dr);
    }
  }
}

function* stepTargets(from: Square, steps: readonly Direction[]): Generator<Square> {
  for (const { df, dr } of steps) {
    const sq = offsetSquare(from, df, dr);
    if (sq) yield sq;
  }
}

/**
 * Squares a piece could capture on, occupied or not. Squares holding the
 * attacker's own pieces are included (they are defended).
 */
export function* attackTargets(board: ReadonlyBoard, from: Square, piece: Piece): Generator<Square> {
  switch (piece.kind) {
    case "P":
      yield* stepTargets(from, [
        { df: -1, dr: pawnDir(piece.color) },
        { df: 1, dr: pawnDir(piece.color) },
      ]);
      return;
    case "N":
      yield* stepTargets(from, KNIGHT_JUMPS);
      return;
    case "B":
      yield* rayTargets(board, from, DIAGONALS);
      return;
    case "R":
      yield* rayTargets(board, from, ORTHOGONALS);
      return;
    case "Q":
      yield* rayTargets(board, from, ALL_DIRECTIONS);
      return;
    case "K":
      yield* stepTargets(from, ALL_DIRECTIONS);
      return;
    default: {
      const unknownKind: never = piece.kind;
      throw new Error(`attackTargets: unknown piece kind ${String(unknownKind)}`);
    }
  }
}

/** Square indices attacked by `byPlayer`, regardless of whose turn it is. */
export function attackedSquares(position: Position, byPlayer: Player): Set<number> {
  const out = new Set<number>();
  for (const { square, piece } of pieceEntries(position.board, byPlayer)) {
    for (const target of attackTargets(position.board, square, piece)) out.add(squareIndex(target));
  }
  return out;
}

function isSquareAttackedByPawn(attacker: Player, from: Square, target: Square): boolean {
  return target.rank === from.rank + pawnDir(attacker) && Math.abs(target.file - from.file) === 1;
}

function isSquareAttackedByKnight(from: Square, target: Square): boolean {
  const df = Math.abs(target.file - from.file);
  const dr = Math.abs(target.rank - from.rank);
  return (df === 1 && dr === 2) || (df === 2 && dr === 1);
}

function isSquareAttackedByKing(from: Square, target: Square): boolean {
  const df = Math.abs(target.file - from.file);
  const dr = Math.abs(target.rank - from.rank);
  return df <= 1 && dr <= 1 && df + dr > 0;
}

function isSquareAttackedBySlider(board: ReadonlyBoard, from: Square, target: Square, dirs: readonly Direction[]): boolean {
  const df = Math.sign(target.file - from.file);
  const dr = Math.sign(target.rank - from.rank);
  if (df === 0 && dr === 0) return false;
  // Only the one direction that points at the target can reach it.
  const aligned =
    target.file - from.file === 0 || target.rank - from.rank === 0 || Math.abs(target.file - from.file) === Math.abs(target.rank - from.rank);
  if (!aligned || !dirs.some((d) => d.df === df && d.dr === dr)) return false;

  let sq = offsetSquare(from, df, dr);
  while (sq) {
    if (sq.file === target.file && sq.rank === target.rank) return true;
    if (occupantAt(board, sq)) return false;
    sq = offsetSquare(sq, df, dr);
  }
  return false;
}

export function isSquareAttacked(position: Position, square: Square, byPlayer: Player): boolean {
  const board = position.board;
  for (const { square: from, piece } of pieceEntries(board, byPlayer)) {
    switch (piece.kind) {
      case "P":
        if (isSquareAttackedByPawn(byPlayer, from, square)) return true;
        break;
      case "N":
        if (isSquareAttackedByKnight(from, square)) return true;
        break;
      case "B":
        if (isSquareAttackedBySlider(board, from, square, DIAGONALS)) return true;
        break;
      case "R":
        if (isSquareAttackedBySlider(board, from, square, ORTHOGONALS)) return true;
        break;
      case "Q":
        if (isSquareAttackedBySlider(board, from, square, ALL_DIRECTIONS)) return true;
        break;
      case "K":
        if (isSquareAttackedByKing(from, square)) return true;
        break;
      default:
        break;
    }
  }
  return false;
}

export function isKingInCheck(position: Position, player: Player): boolean {
  const kingSq = findKingSquare(position.board, player);
  assertInvariant(kingSq, `isKingInCheck: ${playerName(player)} king is missing`);
  return isSquareAttacked(position, kingSq, opponentOf(player));
}
