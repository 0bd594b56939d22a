import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Player, Piece } from "../types.ts";
import type { EvalWeights } from "./aiTypes.ts";
import { otherPlayer } from "../types.ts";
import { backRow, colOf, promotionRow, rowOf } from "../game/board.ts";
import { legalMovesFor } from "../game/movegen.ts";

export const DEFAULT_WEIGHTS: Readonly<EvalWeights> = {
  man: 100,
  king: 250,
  center: 10,
  backRow: 15,
  advancement: 4,
  edge: 5,
  mobility: 2,
  threats: 15,
  promotion: 25,
};

/** Men this many rows (or fewer) from crowning count as promotion threats. */
export const PROMOTION_THREAT_ROWS = 2;

export type EvaluationBreakdown = {
  material: number;
  center: number;
  backRow: number;
  advancement: number;
  edge: number;
  mobility: number;
  threats: number;
  promotion: number;
  total: number;
};

export function validateWeights(weights: EvalWeights): void {
  for (const [name, value] of Object.entries(weights)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Evaluation weight "${name}" must be a non-negative integer, got ${value}`);
    }
  }
  if (weights.man === 0) throw new RangeError(`Evaluation weight "man" must be positive`);
}

// Rows 2–5, columns 2–5.
function isCenter(nodeId: string): boolean {
  const r = rowOf(nodeId);
  const c = colOf(nodeId);
  return r >= 2 && r <= 5 && c >= 2 && c <= 5;
}

function isEdge(nodeId: string): boolean {
  const c = colOf(nodeId);
  return c === 0 || c === 7;
}

// Rows a man has advanced from its own back row.
function rowsAdvanced(nodeId: string, piece: Piece): number {
  return Math.abs(rowOf(nodeId) - backRow(piece.owner));
}

/**
 * Every term is "perspective's pieces minus the opponent's", which makes
 * evaluateState(s, "R") === -evaluateState(s, "B") hold exactly.
 */
export function evaluationBreakdown(
  state: GameState,
  perspective: Player,
  weights: EvalWeights = DEFAULT_WEIGHTS
): EvaluationBreakdown {
  const out: EvaluationBreakdown = {
    material: 0,
    center: 0,
    backRow: 0,
    advancement: 0,
    edge: 0,
    mobility: 0,
    threats: 0,
    promotion: 0,
    total: 0,
  };

  for (const [nodeId, piece] of state.board.entries()) {
    const sgn = piece.owner === perspective ? 1 : -1;

    out.material += sgn * (piece.rank === "K" ? weights.king : weights.man);
    if (isCenter(nodeId)) out.center += sgn * weights.center;
    if (isEdge(nodeId)) out.edge += sgn * weights.edge;

    if (piece.rank === "M") {
      const advanced = rowsAdvanced(nodeId, piece);
      if (advanced === 0) out.backRow += sgn * weights.backRow;
      out.advancement += sgn * advanced * weights.advancement;
      if (Math.abs(rowOf(nodeId) - promotionRow(piece.owner)) <= PROMOTION_THREAT_ROWS) {
        out.promotion += sgn * weights.promotion;
      }
    }
  }

  // Capture chains on offer; mandatory capture makes them the whole move list when present.
  if (weights.mobility !== 0 || weights.threats !== 0) {
    const own = legalMovesFor(state, perspective);
    const opp = legalMovesFor(state, otherPlayer(perspective));
    const captures = (moves: readonly Move[]) => moves.filter((m) => m.kind === "capture").length;
    out.mobility = weights.mobility * own.length - weights.mobility * opp.length;
    out.threats = weights.threats * captures(own) - weights.threats * captures(opp);
  }

  out.total =
    out.material +
    out.center +
    out.backRow +
    out.advancement +
    out.edge +
    out.mobility +
    out.threats +
    out.promotion;
  return out;
}

/** Static score of `state`, positive when it favours `perspective`. Always an integer. */
export function evaluateState(state: GameState, perspective: Player, weights: EvalWeights = DEFAULT_WEIGHTS): number {
  return evaluationBreakdown(state, perspective, weights).total;
}
