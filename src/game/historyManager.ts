import type { Player } from "../types.ts";
import type { GameStatus } from "./gameOver.ts";
import type { Move } from "./moveTypes.ts";
import { cloneMove } from "./moveTypes.ts";
import type { Position } from "./state.ts";
import { clonePosition } from "./state.ts";

export interface MoveRecord {
  move: Move;
  notation: string;
  /** Position reached after the move. */
  position: Position;
  status: GameStatus;
}

/**
 * Append-only log of applied moves. Stores a snapshot after each move so a
 * move list or replay view can be drawn without touching the live game.
 */
export class HistoryManager {
  private records: MoveRecord[] = [];

  push(record: MoveRecord): void {
    this.records.push(this.cloneRecord(record));
  }

  /** Move list for display. */
  getHistory(): Array<{ index: number; mover: Player; notation: string }> {
    return this.records.map((r, idx) => ({
      index: idx,
      mover: r.move.piece.color,
      notation: r.notation,
    }));
  }

  exportSnapshots(): { positions: Position[]; notation: string[] } {
    return {
      positions: this.records.map((r) => clonePosition(r.position)),
      notation: this.records.map((r) => r.notation),
    };
  }

  lastRecord(): MoveRecord | null {
    const last = this.records[this.records.length - 1];
    return last ? this.cloneRecord(last) : null;
  }

  size(): number {
    return this.records.length;
  }

  private cloneRecord(record: MoveRecord): MoveRecord {
    return {
      move: cloneMove(record.move),
      notation: record.notation,
      position: clonePosition(record.position),
      status: { ...record.status },
    };
  }
}
