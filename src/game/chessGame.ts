import type { Player } from "../types.ts";
import type { EngineConfig } from "../config.ts";
import { resolveEngineConfig } from "../config.ts";
import type { Logger } from "../log.ts";
import { createLogger } from "../log.ts";
import { renderBoardText } from "../dev/boardText.ts";
import type { Square } from "./coords.ts";
import { isSquare, sameSquare } from "./coords.ts";
import { formatMove, parseA1, squareToA1 } from "./coordFormat.ts";
import type { MoveError } from "./errors.ts";
import type { GameStatus } from "./gameOver.ts";
import { computeGameStatus, getWinner, isTerminalStatus } from "./gameOver.ts";
import { HistoryManager } from "./historyManager.ts";
import { applyMoveChess } from "./applyMoveChess.ts";
import { explainIllegalMove, findLegalMove, generateLegalMoves, legalMovesFrom } from "./legality.ts";
import type { Move } from "./moveTypes.ts";
import { cloneMove, isWellFormedMove } from "./moveTypes.ts";
import type { Position } from "./state.ts";
import { assertKingsPresent, clonePosition, createInitialPosition, validatePosition } from "./state.ts";

export type MoveResult =
  | { ok: true; move: Move; status: GameStatus }
  | { ok: false; error: MoveError };

export type SquareInput = Square | string;

export interface ChessGameOptions {
  config?: Partial<EngineConfig>;
}

export type ChangeListener = (status: GameStatus, move: Move) => void;

/**
 * One game session. `applyMove` is the only mutator; everything else reads
 * the current position. Not re-entrant: callers apply one move at a time.
 */
export class ChessGame {
  private position: Position;
  private currentStatus: GameStatus;
  private legal: Move[];
  private readonly moveLog = new HistoryManager();
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private listeners: ChangeListener[] = [];

  /** Starts from `start` (validated with `validatePosition`) or the standard arrangement. */
  constructor(options: ChessGameOptions = {}, start?: Position) {
    this.config = resolveEngineConfig(options.config);
    this.log = createLogger("game", this.config.log);
    if (start) validatePosition(start, "ChessGame");
    this.position = start ? clonePosition(start) : createInitialPosition();
    this.legal = generateLegalMoves(this.position);
    this.currentStatus = computeGameStatus(this.position, this.legal);
    if (start) this.log.debug(`loaded position, ${this.position.toMove} to move, status=${this.currentStatus.kind}`);
  }

  /** Starts from a reconstructed position (see `createPosition`). Its status may already be terminal. */
  static fromPosition(position: Position, options: ChessGameOptions = {}): ChessGame {
    return new ChessGame(options, position);
  }

  currentPosition(): Position {
    return clonePosition(this.position);
  }

  status(): GameStatus {
    return { ...this.currentStatus };
  }

  toMove(): Player {
    return this.position.toMove;
  }

  legalMoves(): Move[] {
    return this.legal.map(cloneMove);
  }

  legalMovesForSelected(square: Square): Move[] {
    if (!isSquare(square)) return [];
    return legalMovesFrom(this.legal, square).map(cloneMove);
  }

  isGameOver(): boolean {
    return isTerminalStatus(this.currentStatus);
  }

  getWinner(): { winner: Player | null; reason: string | null } {
    return getWinner(this.currentStatus);
  }

  history(): Array<{ index: number; mover: Player; notation: string }> {
    return this.moveLog.getHistory();
  }

  exportHistory(): { positions: Position[]; notation: string[] } {
    return this.moveLog.exportSnapshots();
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  applyMove(candidate: Move): MoveResult {
    if (isTerminalStatus(this.currentStatus)) {
      this.log.debug(`rejected move: game is over (${this.currentStatus.kind})`);
      return { ok: false, error: { kind: "gameOver", status: { ...this.currentStatus } } };
    }

    if (!isWellFormedMove(candidate)) {
      return this.reject("malformed move");
    }

    const move = findLegalMove(this.legal, candidate);
    if (!move) {
      return this.reject(explainIllegalMove(this.position, candidate));
    }

    const next = applyMoveChess(this.position, move);
    if (this.config.checkInvariants) assertKingsPresent(next);

    this.position = next;
    this.legal = generateLegalMoves(next);
    this.currentStatus = computeGameStatus(next, this.legal);

    const notation = formatMove(move, this.currentStatus);
    this.moveLog.push({ move, notation, position: next, status: this.currentStatus });

    this.log.debug(`applied ${notation}, status=${this.currentStatus.kind}`);
    if (this.log.enabled) this.log.debug(`board:\n${renderBoardText(next)}`);

    for (const listener of this.listeners) listener(this.status(), cloneMove(move));
    return { ok: true, move: cloneMove(move), status: this.status() };
  }

  /** Resolves the legal move with this source and destination, then applies it. */
  tryMoveFromTo(from: SquareInput, to: SquareInput): MoveResult {
    const src = this.resolveSquare(from);
    const dst = this.resolveSquare(to);
    if (!src || !dst) return this.reject("square off board");

    const move = legalMovesFrom(this.legal, src).find((m) => sameSquare(m.to, dst));
    if (move) return this.applyMove(move);
    if (isTerminalStatus(this.currentStatus)) {
      return { ok: false, error: { kind: "gameOver", status: { ...this.currentStatus } } };
    }
    return this.reject(`${squareToA1(src)}-${squareToA1(dst)} is not a legal move`);
  }

  private resolveSquare(input: SquareInput): Square | null {
    if (typeof input === "string") return parseA1(input);
    return isSquare(input) ? input : null;
  }

  private reject(reason: string): MoveResult {
    this.log.debug(`rejected move: ${reason}`);
    return { ok: false, error: { kind: "illegalMove", reason } };
  }
}
