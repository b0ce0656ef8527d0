import type { Piece } from "../types.ts";
import { samePiece } from "../types.ts";
import type { Square } from "./coords.ts";
import { isSquare, sameSquare } from "./coords.ts";

interface MoveBase {
  from: Square;
  to: Square;
  piece: Piece;
}

export interface QuietMove extends MoveBase {
  kind: "move";
}

/** A pawn advancing two ranks from its start rank. */
export interface DoubleStepMove extends MoveBase {
  kind: "double";
}

export interface CaptureMove extends MoveBase {
  kind: "capture";
  captured: Piece;
}

export type Move = QuietMove | DoubleStepMove | CaptureMove;

export function capturedPiece(move: Move): Piece | null {
  return move.kind === "capture" ? move.captured : null;
}

export function sameMove(a: Move, b: Move): boolean {
  return (
    a.kind === b.kind &&
    sameSquare(a.from, b.from) &&
    sameSquare(a.to, b.to) &&
    samePiece(a.piece, b.piece) &&
    samePiece(capturedPiece(a), capturedPiece(b))
  );
}

/** Unaliased copy; pieces are interned and frozen so they are shared. */
export function cloneMove(move: Move): Move {
  return { ...move, from: { ...move.from }, to: { ...move.to } };
}

function isPieceLike(value: unknown): value is Piece {
  if (typeof value !== "object" || value === null) return false;
  if (!("color" in value) || !("kind" in value)) return false;
  return (value.color === "W" || value.color === "B") && typeof value.kind === "string" && "PNBRQK".includes(value.kind) && value.kind.length === 1;
}

/** Shape check for moves arriving from outside the engine (UI, transport). */
export function isWellFormedMove(value: unknown): value is Move {
  if (typeof value !== "object" || value === null) return false;
  if (!("kind" in value) || !("from" in value) || !("to" in value) || !("piece" in value)) return false;
  if (!isSquare(value.from) || !isSquare(value.to) || !isPieceLike(value.piece)) return false;
  if (value.kind === "move" || value.kind === "double") return true;
  if (value.kind !== "capture") return false;
  return "captured" in value && isPieceLike(value.captured);
}
