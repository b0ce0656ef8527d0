import type { Square } from "../game/coords.ts";
import { isSquare, sameSquare } from "../game/coords.ts";
import { occupantAt } from "../game/board.ts";
import type { ChessGame, MoveResult } from "../game/chessGame.ts";
import type { Move } from "../game/moveTypes.ts";
import type { MoveError } from "../game/errors.ts";

export type SelectionPhase = "selectPiece" | "selectTarget";

export type ClickOutcome =
  | { kind: "selected"; square: Square; targets: Square[] }
  | { kind: "moved"; result: Extract<MoveResult, { ok: true }> }
  | { kind: "rejected"; error: MoveError }
  | { kind: "cleared" }
  | { kind: "ignored" };

/**
 * Click-driven turn flow: pick one of your pieces, then one of its
 * highlighted targets. Clicking another own piece switches the selection;
 * clicking anything else (or off the board) drops it.
 */
export class SelectionController {
  private readonly game: ChessGame;
  private selected: Square | null = null;
  private currentMoves: Move[] = [];

  constructor(game: ChessGame) {
    this.game = game;
  }

  get phase(): SelectionPhase {
    return this.selected ? "selectTarget" : "selectPiece";
  }

  getSelected(): Square | null {
    return this.selected;
  }

  getTargets(): Square[] {
    return this.currentMoves.map((m) => m.to);
  }

  click(square: Square | null): ClickOutcome {
    if (this.game.isGameOver()) {
      this.clearSelection();
      return { kind: "ignored" };
    }

    const target = square && isSquare(square) ? square : null;

    if (this.selected && target) {
      const move = this.currentMoves.find((m) => sameSquare(m.to, target));
      if (move) {
        this.clearSelection();
        const result = this.game.applyMove(move);
        return result.ok ? { kind: "moved", result } : { kind: "rejected", error: result.error };
      }
    }

    if (target && this.isOwnPiece(target)) {
      this.selected = target;
      this.currentMoves = this.game.legalMovesForSelected(target);
      return { kind: "selected", square: target, targets: this.getTargets() };
    }

    if (!this.selected) return { kind: "ignored" };
    this.clearSelection();
    return { kind: "cleared" };
  }

  clearSelection(): void {
    this.selected = null;
    this.currentMoves = [];
  }

  private isOwnPiece(square: Square): boolean {
    const piece = occupantAt(this.game.currentPosition().board, square);
    return Boolean(piece && piece.color === this.game.toMove());
  }
}
