import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import { DEFAULT_WEIGHTS, validateWeights } from "./evaluate.ts";

export type AIDifficulty = "easy" | "medium" | "advanced";

/** Integer weights of the static evaluator (see evaluate.ts). */
export interface EvalWeights {
  man: number;
  king: number;
  center: number;
  backRow: number;
  advancement: number;
  edge: number;
  mobility: number;
  /** Per capture chain available to a side. */
  threats: number;
  /** Per man within PROMOTION_THREAT_ROWS of crowning. */
  promotion: number;
}

export interface AIConfig {
  /** Plies to search. */
  depth: number;
  weights?: Partial<EvalWeights>;
  /** Wall-clock budget; enables iterative deepening. */
  timeBudgetMs?: number | null;
  /** Node budget; enables iterative deepening. */
  maxNodes?: number | null;
  /** Alpha-beta pruning. Off means plain minimax, for auditing. Default on. */
  pruning?: boolean;
  /** Log one line per search to the console. */
  telemetry?: boolean;
}

export interface ResolvedAIConfig {
  depth: number;
  weights: EvalWeights;
  timeBudgetMs: number | null;
  maxNodes: number | null;
  pruning: boolean;
  telemetry: boolean;
}

export interface SearchStats {
  nodes: number;
  cutoffs: number;
  /** Deepest ply entered, counting the root as 0. */
  maxPlyReached: number;
  /** Deepest iteration that finished; equals the configured depth without a budget. */
  depthCompleted: number;
  elapsedMs: number;
  /** Cutoffs per node visited. */
  efficiency: number;
  /** A budget interrupted an iteration. */
  aborted: boolean;
}

export type SearchResult = {
  move: Move;
  score: number;
  stats: SearchStats;
};

export type ScoredMove = {
  move: Move;
  score: number;
};

/** Anything carrying a position, such as the CheckersBoard facade. */
export interface PositionSource {
  readonly state: GameState;
}

export const DIFFICULTY_PRESETS: Record<AIDifficulty, AIConfig> = {
  easy: { depth: 2 },
  medium: { depth: 4 },
  advanced: { depth: 8, timeBudgetMs: 450 },
};

function checkBudget(name: string, value: number | null | undefined): number | null {
  if (value === undefined || value === null) return null;
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

export function resolveAIConfig(config: AIConfig | number): ResolvedAIConfig {
  const raw: AIConfig = typeof config === "number" ? { depth: config } : config;

  if (!Number.isInteger(raw.depth) || raw.depth < 1) {
    throw new RangeError(`Search depth must be a positive integer, got ${raw.depth}`);
  }

  const weights: EvalWeights = { ...DEFAULT_WEIGHTS, ...raw.weights };
  validateWeights(weights);

  return {
    depth: raw.depth,
    weights,
    timeBudgetMs: checkBudget("timeBudgetMs", raw.timeBudgetMs),
    maxNodes: checkBudget("maxNodes", raw.maxNodes),
    pruning: raw.pruning ?? true,
    telemetry: raw.telemetry ?? false,
  };
}
