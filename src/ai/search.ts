import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Player } from "../types.ts";
import type { EvalWeights, ResolvedAIConfig, ScoredMove, SearchResult, SearchStats } from "./aiTypes.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { applyMove } from "../game/applyMove.ts";
import { NoLegalMoveError } from "../game/errors.ts";
import { validateGameState } from "../game/state.ts";
import { evaluateState } from "./evaluate.ts";

/** Score of a side that cannot move. Beyond any evaluator score. */
export const LOSS_SCORE = 1_000_000;

const INF = 1_000_000_000;

type SearchContext = {
  weights: EvalWeights;
  pruning: boolean;
  deadlineMs: number | null;
  maxNodes: number | null;
  // Budgets are only checked while true; the first iteration always runs to completion.
  budgetActive: boolean;
  stats: { nodes: number; cutoffs: number; maxPlyReached: number };
};

class SearchAborted extends Error {
  constructor() {
    super("search budget exhausted");
    this.name = "SearchAborted";
  }
}

function enterNode(ctx: SearchContext, ply: number): void {
  if (ctx.budgetActive) {
    const outOfNodes = ctx.maxNodes !== null && ctx.stats.nodes >= ctx.maxNodes;
    const outOfTime = ctx.deadlineMs !== null && performance.now() >= ctx.deadlineMs;
    if (outOfNodes || outOfTime) throw new SearchAborted();
  }
  ctx.stats.nodes++;
  if (ply > ctx.stats.maxPlyReached) ctx.stats.maxPlyReached = ply;
}

/**
 * Captures first, longer chains before shorter ones; otherwise generation order.
 * The sort is stable, so equal keys keep the order of the move generator.
 */
export function orderMoves(moves: readonly Move[]): Move[] {
  const rank = (m: Move) => (m.kind === "capture" ? 1 + m.captured.length : 0);
  return moves.slice().sort((a, b) => rank(b) - rank(a));
}

/**
 * Negamax with (fail-soft) alpha-beta. Returns the value for the side to move in `state`.
 */
function negamax(
  state: GameState,
  depth: number,
  alpha: number,
  beta: number,
  ply: number,
  ctx: SearchContext
): number {
  enterNode(ctx, ply);

  const moves = generateLegalMoves(state);
  if (moves.length === 0) return -LOSS_SCORE;

  if (depth <= 0) return evaluateState(state, state.toMove, ctx.weights);

  let best = -INF;
  for (const move of orderMoves(moves)) {
    const score = -negamax(applyMove(state, move), depth - 1, -beta, -alpha, ply + 1, ctx);
    if (score > best) best = score;

    if (!ctx.pruning) continue;
    if (best > alpha) alpha = best;
    if (alpha >= beta) {
      ctx.stats.cutoffs++;
      break;
    }
  }

  return best;
}

function searchRoot(
  state: GameState,
  ordered: readonly Move[],
  depth: number,
  ctx: SearchContext
): { move: Move; score: number } {
  enterNode(ctx, 0);

  let alpha = -INF;
  let bestMove = ordered[0];
  let bestScore = -INF;

  for (const move of ordered) {
    const window = ctx.pruning ? -alpha : INF;
    const score = -negamax(applyMove(state, move), depth - 1, -INF, window, 1, ctx);

    // Strictly greater: the first of equally good moves wins.
    if (score > bestScore) {
      bestScore = score;
      bestMove = move;
    }
    if (bestScore > alpha) alpha = bestScore;
  }

  return { move: bestMove, score: bestScore };
}

function createContext(config: ResolvedAIConfig, startMs: number): SearchContext {
  return {
    weights: config.weights,
    pruning: config.pruning,
    deadlineMs: config.timeBudgetMs !== null ? startMs + config.timeBudgetMs : null,
    maxNodes: config.maxNodes,
    budgetActive: false,
    stats: { nodes: 0, cutoffs: 0, maxPlyReached: 0 },
  };
}

/**
 * Best move for `player`, who must be the side to move.
 *
 * Without a budget this is one search to `config.depth`. With `timeBudgetMs` or
 * `maxNodes` the search deepens one ply at a time; an iteration interrupted by the
 * budget is thrown away and the deepest completed one answers.
 *
 * @throws NoLegalMoveError when `player` has no legal move
 * @throws InvalidStateError for a malformed position, or when `player` is not the side to move
 */
export function searchBestMove(
  state: GameState,
  config: ResolvedAIConfig,
  player: Player = state.toMove
): SearchResult {
  validateGameState(state);
  const moves = generateLegalMoves(state, player);
  if (moves.length === 0) throw new NoLegalMoveError(player);

  const start = performance.now();
  const ctx = createContext(config, start);
  const ordered = orderMoves(moves);

  const budgeted = config.timeBudgetMs !== null || config.maxNodes !== null;
  const depths = budgeted ? Array.from({ length: config.depth }, (_, i) => i + 1) : [config.depth];

  let best: { move: Move; score: number } | null = null;
  let depthCompleted = 0;
  let aborted = false;

  for (const depth of depths) {
    ctx.budgetActive = budgeted && depth > 1;
    try {
      best = searchRoot(state, ordered, depth, ctx);
      depthCompleted = depth;
    } catch (err) {
      if (!(err instanceof SearchAborted)) throw err;
      aborted = true;
      break;
    }
  }

  if (!best) throw new Error("search: first iteration did not complete");

  const stats: SearchStats = {
    nodes: ctx.stats.nodes,
    cutoffs: ctx.stats.cutoffs,
    maxPlyReached: ctx.stats.maxPlyReached,
    depthCompleted,
    elapsedMs: performance.now() - start,
    efficiency: ctx.stats.cutoffs / Math.max(1, ctx.stats.nodes),
    aborted,
  };

  return { move: best.move, score: best.score, stats };
}

/** Full-window value of playing `move` in `state`, from the mover's point of view. */
export function scoreMove(state: GameState, move: Move, config: ResolvedAIConfig): number {
  validateGameState(state);
  const ctx = createContext(config, performance.now());
  return -negamax(applyMove(state, move), config.depth - 1, -INF, INF, 1, ctx);
}

/** Every legal move with its own full-window value, best first. Budgets are ignored. */
export function scoreAllMoves(state: GameState, config: ResolvedAIConfig, player: Player = state.toMove): ScoredMove[] {
  validateGameState(state);
  const moves = orderMoves(generateLegalMoves(state, player));
  return moves
    .map((move) => ({ move, score: scoreMove(state, move, config) }))
    .sort((a, b) => b.score - a.score);
}
