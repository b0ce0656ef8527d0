export type Player = "W" | "B";
export type PieceKind = "P" | "N" | "B" | "R" | "Q" | "K";

export interface Piece {
  readonly color: Player;
  readonly kind: PieceKind;
}

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function playerName(p: Player): string {
  return p === "W" ? "White" : "Black";
}

const PIECE_CACHE = new Map<string, Piece>();

/** Pieces are interned and frozen; two calls with the same arguments return the same object. */
export function makePiece(color: Player, kind: PieceKind): Piece {
  const key = `${color}${kind}`;
  const cached = PIECE_CACHE.get(key);
  if (cached) return cached;
  const piece: Piece = Object.freeze({ color, kind });
  PIECE_CACHE.set(key, piece);
  return piece;
}

export function samePiece(a: Piece | null | undefined, b: Piece | null | undefined): boolean {
  if (!a || !b) return !a && !b;
  return a.color === b.color && a.kind === b.kind;
}
