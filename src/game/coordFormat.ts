import type { Square } from "./coords.ts";
import { makeSquare } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import type { GameStatus } from "./gameOver.ts";

const FILE_LETTERS = "abcdefgh";
const A1_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

export function squareToA1(sq: Square): string {
  return `${FILE_LETTERS.charAt(sq.file)}${sq.rank + 1}`;
}

export function parseA1(text: string): Square | null {
  const match = A1_RE.exec(text.trim().toLowerCase());
  if (!match || !match.groups) return null;
  const file = FILE_LETTERS.indexOf(match.groups.file);
  const rank = Number(match.groups.rank) - 1;
  return makeSquare(file, rank);
}

/**
 * Long coordinate notation: `e2-e4`, `Ng1-f3`, `Qd8xh4`.
 * Pass the status reached after the move to get a `+` or `#` suffix.
 */
export function formatMove(move: Move, statusAfter?: GameStatus): string {
  const letter = move.piece.kind === "P" ? "" : move.piece.kind;
  const sep = move.kind === "capture" ? "x" : "-";
  let suffix = "";
  if (statusAfter?.kind === "check") suffix = "+";
  else if (statusAfter?.kind === "checkmate") suffix = "#";
  return `${letter}${squareToA1(move.from)}${sep}${squareToA1(move.to)}${suffix}`;
}
