import type { Piece } from "../types.ts";
import { occupantAt } from "../game/board.ts";
import { BOARD_SIZE } from "../game/coords.ts";
import type { Position } from "../game/state.ts";

function pieceChar(piece: Piece | null): string {
  if (!piece) return ".";
  return piece.color === "W" ? piece.kind : piece.kind.toLowerCase();
}

/** Rank 8 first; White upper-case, Black lower-case. */
export function renderBoardText(position: Position): string {
  const lines: string[] = [];
  for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
    const cells: string[] = [];
    for (let file = 0; file < BOARD_SIZE; file++) {
      cells.push(pieceChar(occupantAt(position.board, { file, rank })));
    }
    lines.push(`${rank + 1} ${cells.join(" ")}`);
  }
  lines.push("  a b c d e f g h");
  return lines.join("\n");
}
