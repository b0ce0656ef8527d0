import { createPrng } from "../shared/prng.ts";
import type { ChessGame } from "../game/chessGame.ts";
import type { Move } from "../game/moveTypes.ts";

export interface PlayoutOptions {
  seed: number;
  maxPlies: number;
  /** Return false to end the playout before `move` is played. */
  accept?: (move: Move, ply: number) => boolean;
  /** Called after each applied move. */
  afterMove?: (move: Move, ply: number) => void;
}

/**
 * Plays seeded random legal moves until the game ends, `maxPlies` is
 * reached, or `accept` declines. Returns the number of plies played.
 */
export function playRandomMoves(game: ChessGame, opts: PlayoutOptions): number {
  const prng = createPrng(opts.seed);
  let ply = 0;
  while (ply < opts.maxPlies && !game.isGameOver()) {
    const move = prng.pick(game.legalMoves());
    if (opts.accept && !opts.accept(move, ply)) break;
    const result = game.applyMove(move);
    if (!result.ok) throw new Error(`playRandomMoves: legal move rejected (${result.error.kind})`);
    ply++;
    opts.afterMove?.(move, ply);
  }
  return ply;
}
