export const BOARD_SIZE = 8;

export interface Square {
  readonly file: number;
  readonly rank: number;
}

export function inBounds(file: number, rank: number): boolean {
  return Number.isInteger(file) && Number.isInteger(rank) && file >= 0 && file < BOARD_SIZE && rank >= 0 && rank < BOARD_SIZE;
}

/** Returns null for anything off the 8×8 board. */
export function makeSquare(file: number, rank: number): Square | null {
  if (!inBounds(file, rank)) return null;
  return { file, rank };
}

export function offsetSquare(sq: Square, df: number, dr: number): Square | null {
  return makeSquare(sq.file + df, sq.rank + dr);
}

export function squareIndex(sq: Square): number {
  return sq.rank * BOARD_SIZE + sq.file;
}

export function squareFromIndex(index: number): Square | null {
  if (!Number.isInteger(index) || index < 0 || index >= BOARD_SIZE * BOARD_SIZE) return null;
  return { file: index % BOARD_SIZE, rank: Math.floor(index / BOARD_SIZE) };
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.file === b.file && a.rank === b.rank;
}

/** Narrows untrusted input (e.g. from a UI layer) to an on-board square. */
export function isSquare(value: unknown): value is Square {
  if (typeof value !== "object" || value === null) return false;
  if (!("file" in value) || !("rank" in value)) return false;
  const { file, rank } = value;
  return typeof file === "number" && typeof rank === "number" && inBounds(file, rank);
}

export function allSquares(): Square[] {
  const out: Square[] = [];
  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    for (let file = 0; file < BOARD_SIZE; file++) {
      out.push({ file, rank });
    }
  }
  return out;
}
