// "Core" is the stable, deterministic surface consumed by front ends (CLI, exporters, analysis).

export type { Piece, Player, Rank } from "../types.ts";
export type { GameState, NodeId } from "../game/state.ts";
export type { Move, QuietMove, CaptureMove } from "../game/moveTypes.ts";
export type { GameStatus } from "../game/gameOver.ts";
export type { CoordFormat } from "../game/coordFormat.ts";
export type { RuleOptions, VariantId } from "../variants/variantTypes.ts";
export type {
  AIConfig,
  AIDifficulty,
  EvalWeights,
  ScoredMove,
  SearchResult,
  SearchStats,
} from "../ai/aiTypes.ts";

export { CheckersBoard } from "./checkersBoard.ts";
export { CheckersAI } from "../ai/checkersAI.ts";

export { createInitialGameState, gameStateFromPieces, validateGameState } from "../game/state.ts";
export { generateLegalMoves, legalMovesFrom } from "../game/movegen.ts";
export { applyMove } from "../game/applyMove.ts";
export { getGameStatus, getWinner, isTerminal } from "../game/gameOver.ts";
export { HistoryManager } from "../game/historyManager.ts";
export { hashGameState } from "../game/hashState.ts";
export { formatMove, formatNodeId, parseMove } from "../game/coordFormat.ts";
export { VARIANTS, getVariantById, isVariantId } from "../variants/variantRegistry.ts";

export { evaluateState, evaluationBreakdown, DEFAULT_WEIGHTS } from "../ai/evaluate.ts";
export { searchBestMove, LOSS_SCORE } from "../ai/search.ts";
export { DIFFICULTY_PRESETS, resolveAIConfig } from "../ai/aiTypes.ts";

export { CheckersError, InvalidMoveError, InvalidStateError, NoLegalMoveError } from "../game/errors.ts";
