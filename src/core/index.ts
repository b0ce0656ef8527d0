// "Core" is the stable, deterministic rules surface (no DOM, no rendering).

export type { Piece, PieceKind, Player } from "../types.ts";
export type { Square } from "../game/coords.ts";
export type { Board, Placement, ReadonlyBoard } from "../game/board.ts";
export type { LastMove, Position, PositionSetup } from "../game/state.ts";
export type { Move, QuietMove, DoubleStepMove, CaptureMove } from "../game/moveTypes.ts";
export { cloneMove, sameMove, isWellFormedMove } from "../game/moveTypes.ts";
export type { GameStatus, TerminalStatus } from "../game/gameOver.ts";
export type { MoveError } from "../game/errors.ts";
export type { MoveResult, SquareInput, ChessGameOptions, ChangeListener } from "../game/chessGame.ts";
export type { MoveRecord } from "../game/historyManager.ts";
export type { ClickOutcome, SelectionPhase } from "../controller/selectionController.ts";
export type { EngineConfig } from "../config.ts";

export { makePiece, opponentOf, playerName } from "../types.ts";
export { makeSquare, sameSquare, isSquare } from "../game/coords.ts";
export { parseA1, squareToA1, formatMove } from "../game/coordFormat.ts";
export { occupantAt } from "../game/board.ts";
export { createInitialPosition, createPosition, clonePosition, validatePosition } from "../game/state.ts";
export { generatePseudoMoves, generatePseudoMovesForPiece } from "../game/movegenChess.ts";
export { attackedSquares, isSquareAttacked, isKingInCheck } from "../game/attacks.ts";
export { generateLegalMoves, leavesKingInCheck } from "../game/legality.ts";
export { applyMoveChess } from "../game/applyMoveChess.ts";
export { computeGameStatus, getWinner, isTerminalStatus } from "../game/gameOver.ts";
export { InvariantError, PositionSetupError } from "../game/errors.ts";
export { ChessGame } from "../game/chessGame.ts";
export { HistoryManager } from "../game/historyManager.ts";
export { SelectionController } from "../controller/selectionController.ts";
export { loadEngineConfig } from "../config.ts";
export { renderBoardText } from "../dev/boardText.ts";
