import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Player } from "../types.ts";
import type {
  AIConfig,
  AIDifficulty,
  PositionSource,
  ResolvedAIConfig,
  ScoredMove,
  SearchResult,
} from "./aiTypes.ts";
import { playerName } from "../types.ts";
import { DIFFICULTY_PRESETS, resolveAIConfig } from "./aiTypes.ts";
import { scoreAllMoves, scoreMove, searchBestMove } from "./search.ts";
import { evaluateState } from "./evaluate.ts";
import { formatMove } from "../game/coordFormat.ts";

function stateOf(board: GameState | PositionSource): GameState {
  return "state" in board ? board.state : board;
}

function formatScore(score: number): string {
  if (score > 0) return `+${score}`;
  return String(score);
}

/**
 * Computer player: depth-limited alpha-beta over the static evaluator.
 * Configuration is fixed at construction; each call owns its own search state.
 */
export class CheckersAI {
  readonly config: ResolvedAIConfig;

  constructor(config: AIConfig | number = DIFFICULTY_PRESETS.medium) {
    this.config = resolveAIConfig(config);
  }

  static forDifficulty(difficulty: AIDifficulty, overrides: Partial<AIConfig> = {}): CheckersAI {
    return new CheckersAI({ ...DIFFICULTY_PRESETS[difficulty], ...overrides });
  }

  get depth(): number {
    return this.config.depth;
  }

  /**
   * @throws NoLegalMoveError when `player` cannot move
   * @throws InvalidStateError for a malformed position, or when `player` is not the side to move
   */
  getBestMove(board: GameState | PositionSource, player: Player): Move {
    return this.search(board, player).move;
  }

  /** Best move with its backed-up score and search statistics. */
  search(board: GameState | PositionSource, player: Player): SearchResult {
    const result = searchBestMove(stateOf(board), this.config, player);

    // Console telemetry: one line per search.
    if (this.config.telemetry) {
      const { stats } = result;
      const parts = [
        "[ai:search]",
        playerName(player),
        formatMove(result.move),
        `eval=${formatScore(result.score)}`,
        `d=${stats.depthCompleted}`,
        `n=${stats.nodes}`,
        `cut=${stats.cutoffs}`,
        `ms=${Math.round(stats.elapsedMs)}`,
        stats.aborted ? "(budget)" : null,
      ].filter(Boolean);

      // eslint-disable-next-line no-console
      console.log(parts.join(" "));
    }

    return result;
  }

  /** All legal moves of `player` scored at this AI's depth, best first. */
  evaluateMoves(board: GameState | PositionSource, player: Player): ScoredMove[] {
    return scoreAllMoves(stateOf(board), this.config, player);
  }

  /** Value of `move` for the side playing it, searched at this AI's depth. */
  evaluateMove(board: GameState | PositionSource, move: Move): number {
    return scoreMove(stateOf(board), move, this.config);
  }

  /** Static evaluation with this AI's weights. */
  evaluate(board: GameState | PositionSource, perspective: Player): number {
    return evaluateState(stateOf(board), perspective, this.config.weights);
  }
}
