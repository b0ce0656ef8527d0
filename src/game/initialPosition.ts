import type { PieceKind, Player } from "../types.ts";
import { makePiece } from "../types.ts";
import type { Placement } from "./board.ts";

const BACK_RANK: readonly PieceKind[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

function homeRanks(color: Player): { back: number; pawns: number } {
  return color === "W" ? { back: 0, pawns: 1 } : { back: 7, pawns: 6 };
}

export function initialPlacements(): Placement[] {
  const out: Placement[] = [];
  for (const color of ["W", "B"] as const) {
    const { back, pawns } = homeRanks(color);
    BACK_RANK.forEach((kind, file) => {
      out.push({ square: { file, rank: back }, piece: makePiece(color, kind) });
      out.push({ square: { file, rank: pawns }, piece: makePiece(color, "P") });
    });
  }
  return out;
}
