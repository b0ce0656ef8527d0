import { describe, it, expect, vi } from "vitest";
import { makePiece } from "../types.ts";
import { occupantAt, countPieces, createEmptyBoard, placePiece } from "./board.ts";
import { ChessGame } from "./chessGame.ts";
import type { Move } from "./moveTypes.ts";
import { PositionSetupError } from "./errors.ts";
import type { Position } from "./state.ts";
import { playRandomMoves } from "../dev/randomPlayout.ts";
import { mkPosition, moveKeys, sq, targetNames } from "../test/positions.ts";

function foolsMate(game: ChessGame): void {
  for (const [from, to] of [
    ["f2", "f3"],
    ["e7", "e5"],
    ["g2", "g4"],
    ["d8", "h4"],
  ] as const) {
    const result = game.tryMoveFromTo(from, to);
    if (!result.ok) throw new Error(`setup move ${from}-${to} failed`);
  }
}

describe("ChessGame", () => {
  it("starts in progress with 20 legal moves for White", () => {
    const game = new ChessGame();
    expect(game.status()).toEqual({ kind: "inProgress" });
    expect(game.toMove()).toBe("W");
    expect(game.legalMoves()).toHaveLength(20);
    expect(game.isGameOver()).toBe(false);
  });

  it("1.e4 flips the turn and leaves Black 20 replies", () => {
    const game = new ChessGame();
    const result = game.tryMoveFromTo("e2", "e4");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.status).toEqual({ kind: "inProgress" });
      expect(result.move.kind).toBe("double");
    }

    const pos = game.currentPosition();
    expect(pos.toMove).toBe("B");
    expect(occupantAt(pos.board, sq("e2"))).toBe(null);
    expect(occupantAt(pos.board, sq("e4"))).toEqual({ color: "W", kind: "P" });
    expect(pos.lastMove).toEqual({ from: sq("e2"), to: sq("e4"), kind: "P", doubleStep: true });
    expect(game.legalMoves()).toHaveLength(20);
  });

  it("applies a move passed by value", () => {
    const game = new ChessGame();
    const move: Move = { kind: "move", from: sq("g1"), to: sq("f3"), piece: makePiece("W", "N") };
    const result = game.applyMove(move);
    expect(result).toEqual({ ok: true, move, status: { kind: "inProgress" } });
  });

  it("highlights the legal destinations of a selected piece", () => {
    const game = new ChessGame();
    expect(targetNames(game.legalMovesForSelected(sq("e2")))).toEqual(["e3", "e4"]);
    expect(targetNames(game.legalMovesForSelected(sq("g1")))).toEqual(["f3", "h3"]);
    expect(game.legalMovesForSelected(sq("e4"))).toEqual([]);
    expect(game.legalMovesForSelected(sq("e7"))).toEqual([]);
    expect(game.legalMovesForSelected({ file: 9, rank: 0 })).toEqual([]);
  });

  it("rejects an illegal move and leaves the board unchanged", () => {
    const game = new ChessGame();
    const before = game.currentPosition();
    const result = game.tryMoveFromTo("e2", "e5");
    expect(result).toEqual({ ok: false, error: { kind: "illegalMove", reason: "e2-e5 is not a legal move" } });
    expect(game.currentPosition()).toEqual(before);
    expect(game.history()).toEqual([]);
  });

  it("rejects moving the opponent's piece", () => {
    const game = new ChessGame();
    const result = game.applyMove({ kind: "move", from: sq("e7"), to: sq("e6"), piece: makePiece("B", "P") });
    expect(result).toEqual({ ok: false, error: { kind: "illegalMove", reason: "not your piece: e7 belongs to Black" } });
  });

  it("rejects moving into check", () => {
    const game = ChessGame.fromPosition(mkPosition({ e1: "WK", e2: "WB", e8: "BR", a8: "BK" }));
    const result = game.applyMove({ kind: "move", from: sq("e2"), to: sq("d3"), piece: makePiece("W", "B") });
    expect(result).toEqual({ ok: false, error: { kind: "illegalMove", reason: "Be2-d3 leaves the king in check" } });
  });

  it("rejects malformed and off-board input", () => {
    const game = new ChessGame();
    expect(game.tryMoveFromTo("e2", "e9")).toEqual({ ok: false, error: { kind: "illegalMove", reason: "square off board" } });
    expect(game.tryMoveFromTo({ file: -1, rank: 0 }, "a3")).toEqual({
      ok: false,
      error: { kind: "illegalMove", reason: "square off board" },
    });
    const bogus: Move = { kind: "move", from: sq("e2"), to: { file: 4, rank: 8 }, piece: makePiece("W", "P") };
    expect(game.applyMove(bogus)).toEqual({ ok: false, error: { kind: "illegalMove", reason: "malformed move" } });
  });

  it("fool's mate ends in checkmate for White", () => {
    const game = new ChessGame();
    foolsMate(game);
    expect(game.status()).toEqual({ kind: "checkmate", color: "W" });
    expect(game.legalMoves()).toEqual([]);
    expect(game.isGameOver()).toBe(true);
    expect(game.getWinner()).toEqual({ winner: "B", reason: "Black wins: White is checkmated" });
    expect(game.history().map((h) => h.notation)).toEqual(["f2-f3", "e7-e5", "g2-g4", "Qd8-h4#"]);
  });

  it("refuses any move once the game is over", () => {
    const game = new ChessGame();
    foolsMate(game);
    const move: Move = { kind: "move", from: sq("a2"), to: sq("a3"), piece: makePiece("W", "P") };
    expect(game.applyMove(move)).toEqual({ ok: false, error: { kind: "gameOver", status: { kind: "checkmate", color: "W" } } });
    expect(game.tryMoveFromTo("a2", "a3")).toEqual({
      ok: false,
      error: { kind: "gameOver", status: { kind: "checkmate", color: "W" } },
    });
  });

  it("a reconstructed stalemate is terminal from the start", () => {
    const game = ChessGame.fromPosition(mkPosition({ a1: "WK", c2: "BK", b3: "BQ" }, "W"));
    expect(game.status()).toEqual({ kind: "stalemate" });
    expect(game.tryMoveFromTo("a1", "b1")).toEqual({ ok: false, error: { kind: "gameOver", status: { kind: "stalemate" } } });
  });

  it("reaches stalemate by playing into it", () => {
    const game = ChessGame.fromPosition(mkPosition({ a1: "WK", c2: "BK", b5: "BQ" }, "B"));
    const result = game.tryMoveFromTo("b5", "b3");
    expect(result.ok && result.status).toEqual({ kind: "stalemate" });
    expect(game.getWinner()).toEqual({ winner: null, reason: "Draw by stalemate" });
  });

  it("reports check with the colour in check", () => {
    const game = ChessGame.fromPosition(mkPosition({ e2: "WK", a1: "WR", h7: "BK" }));
    const result = game.tryMoveFromTo("a1", "h1");
    expect(result.ok && result.status).toEqual({ kind: "check", color: "B" });
    expect(game.history().map((h) => h.notation)).toEqual(["Ra1-h1+"]);
  });

  it("a capture replaces the captured piece", () => {
    const game = new ChessGame();
    for (const [from, to] of [
      ["e2", "e4"],
      ["d7", "d5"],
    ] as const) {
      game.tryMoveFromTo(from, to);
    }
    const result = game.tryMoveFromTo("e4", "d5");
    expect(result.ok && result.move).toEqual({
      kind: "capture",
      from: sq("e4"),
      to: sq("d5"),
      piece: makePiece("W", "P"),
      captured: makePiece("B", "P"),
    });
    const pos = game.currentPosition();
    expect(occupantAt(pos.board, sq("d5"))).toEqual({ color: "W", kind: "P" });
    expect(occupantAt(pos.board, sq("e4"))).toBe(null);
    expect(countPieces(pos.board, "B", "P")).toBe(7);
    expect(game.history().map((h) => h.notation)).toEqual(["e2-e4", "d7-d5", "e4xd5"]);
  });

  it("snapshots are independent of the live game", () => {
    const game = new ChessGame();
    const snap = game.currentPosition();
    game.tryMoveFromTo("e2", "e4");
    expect(occupantAt(snap.board, sq("e2"))).toEqual({ color: "W", kind: "P" });
    expect(snap.toMove).toBe("W");
  });

  it("legal move enumeration is stable between calls", () => {
    const game = new ChessGame();
    game.tryMoveFromTo("d2", "d4");
    expect(moveKeys(game.legalMoves())).toEqual(moveKeys(game.legalMoves()));
  });

  it("notifies listeners after each applied move", () => {
    const game = new ChessGame();
    const listener = vi.fn();
    const unsubscribe = game.onChange(listener);
    game.tryMoveFromTo("e2", "e4");
    game.tryMoveFromTo("e2", "e5"); // rejected, no notification
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toEqual({ kind: "inProgress" });

    unsubscribe();
    game.tryMoveFromTo("e7", "e5");
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("keeps one king per colour and alternates turns over random games", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const game = new ChessGame();
      playRandomMoves(game, {
        seed,
        maxPlies: 120,
        afterMove: (move) => {
          const pos = game.currentPosition();
          expect(countPieces(pos.board, "W", "K")).toBe(1);
          expect(countPieces(pos.board, "B", "K")).toBe(1);
          expect(pos.toMove).not.toBe(move.piece.color);
          expect(occupantAt(pos.board, move.from)).toBe(null);
          expect(occupantAt(pos.board, move.to)).toEqual(move.piece);
        },
      });
    }
  });

  it("exports one snapshot per applied move", () => {
    const game = new ChessGame();
    game.tryMoveFromTo("e2", "e4");
    game.tryMoveFromTo("e7", "e5");
    const { positions, notation } = game.exportHistory();
    expect(positions).toHaveLength(2);
    expect(positions[1]?.toMove).toBe("W");
    expect(notation).toEqual(["e2-e4", "e7-e5"]);
  });
  it("hands out copies of its legal moves", () => {
    const game = new ChessGame();
    const push = game.legalMovesForSelected(sq("a2")).find((m) => m.kind === "move");
    if (!push) throw new Error("expected a2-a3");
    push.to = sq("a6");
    const all = game.legalMoves();
    for (const m of all) m.to = sq("a6");

    const result = game.applyMove({ kind: "move", from: sq("a2"), to: sq("a6"), piece: makePiece("W", "P") });
    expect(result).toEqual({ ok: false, error: { kind: "illegalMove", reason: "a2-a6 is not a legal move" } });
    expect(moveKeys(game.legalMovesForSelected(sq("a2")))).toEqual(["a2a3", "a2a4"]);
    expect(game.legalMoves()).toHaveLength(20);
  });

  it("returns a copy of the applied move", () => {
    const game = new ChessGame();
    const result = game.tryMoveFromTo("e2", "e4");
    if (!result.ok) throw new Error("e2-e4 rejected");
    result.move.to = sq("e8");
    expect(game.history()).toEqual([{ index: 0, mover: "W", notation: "e2-e4" }]);
    expect(occupantAt(game.currentPosition().board, sq("e4"))).toEqual(makePiece("W", "P"));
  });

  it("refuses a loaded position whose waiting king is capturable", () => {
    const board = createEmptyBoard();
    placePiece(board, sq("a1"), makePiece("W", "K"));
    placePiece(board, sq("e2"), makePiece("W", "R"));
    placePiece(board, sq("e8"), makePiece("B", "K"));
    const exposed: Position = { board, toMove: "W", lastMove: null };
    expect(() => ChessGame.fromPosition(exposed)).toThrow(PositionSetupError);
    expect(() => ChessGame.fromPosition(exposed)).toThrow("ChessGame: Black is in check but it is not their turn");
  });

  it("refuses a loaded position without both kings", () => {
    const board = createEmptyBoard();
    placePiece(board, sq("e1"), makePiece("W", "K"));
    const lonely: Position = { board, toMove: "W", lastMove: null };
    expect(() => ChessGame.fromPosition(lonely)).toThrow("ChessGame: Black must have exactly one king (found 0)");
  });
});
