import type { GameState, NodeId } from "./state.ts";
import type { Move, CaptureMove, QuietMove } from "./moveTypes.ts";
import type { Piece, Player, Rank } from "../types.ts";
import type { RuleOptions } from "../variants/variantTypes.ts";
import { ALL_NODES, DIRECTIONS, forwardDr, jumpTarget, promotionRow, rowOf, stepTarget } from "./board.ts";
import { rulesOf } from "./state.ts";
import { InvalidStateError } from "./errors.ts";

const ALL_DIRS: readonly number[] = [0, 1, 2, 3];
const FORWARD_DIRS: Record<Player, readonly number[]> = {
  R: ALL_DIRS.filter((i) => DIRECTIONS[i].dr === forwardDr("R")),
  B: ALL_DIRS.filter((i) => DIRECTIONS[i].dr === forwardDr("B")),
};

function directionsFor(owner: Player, rank: Rank, capturing: boolean, rules: RuleOptions): readonly number[] {
  if (rank === "K") return ALL_DIRS;
  if (capturing && rules.menCaptureBackward) return ALL_DIRS;
  return FORWARD_DIRS[owner];
}

function crownsOn(owner: Player, rank: Rank, id: NodeId): boolean {
  return rank === "M" && rowOf(id) === promotionRow(owner);
}

type Chain = {
  at: NodeId;
  rank: Rank;
  path: NodeId[];
  captured: NodeId[];
  promoted: boolean;
  // Set when the chain may not be extended further (crowned under "ends_move").
  closed: boolean;
};

/**
 * Every maximal capture chain for the piece on `from`, depth-first.
 *
 * During the chain the mover has left `from`, and no piece may be jumped twice.
 * Jumped pieces stay on the board until the move completes; with one-square jumps
 * a landing square is never a jumped square, so they never block a landing.
 */
function captureChainsFrom(state: GameState, from: NodeId, piece: Piece, rules: RuleOptions): CaptureMove[] {
  const out: CaptureMove[] = [];
  const occupant = (id: NodeId): Piece | undefined => (id === from ? undefined : state.board.get(id));

  const extend = (chain: Chain): void => {
    let extended = false;

    if (!chain.closed) {
      for (const dirIndex of directionsFor(piece.owner, chain.rank, true, rules)) {
        const jump = jumpTarget(chain.at, dirIndex);
        if (!jump) continue;
        if (chain.captured.includes(jump.over)) continue;

        const victim = occupant(jump.over);
        if (!victim || victim.owner === piece.owner) continue;
        if (occupant(jump.land)) continue;

        const crowned = crownsOn(piece.owner, chain.rank, jump.land);
        extended = true;
        extend({
          at: jump.land,
          rank: crowned ? "K" : chain.rank,
          path: [...chain.path, jump.land],
          captured: [...chain.captured, jump.over],
          promoted: chain.promoted || crowned,
          closed: crowned && rules.promotionDuringCapture === "ends_move",
        });
      }
    }

    if (!extended && chain.path.length > 0) {
      out.push({
        kind: "capture",
        from,
        path: chain.path,
        captured: chain.captured,
        promotes: chain.promoted,
      });
    }
  };

  extend({ at: from, rank: piece.rank, path: [], captured: [], promoted: false, closed: false });
  return out;
}

export function generateCaptureMoves(state: GameState): CaptureMove[] {
  const rules = rulesOf(state);
  const captures: CaptureMove[] = [];

  for (const fromId of ALL_NODES) {
    const piece = state.board.get(fromId);
    if (!piece || piece.owner !== state.toMove) continue;
    captures.push(...captureChainsFrom(state, fromId, piece, rules));
  }

  return captures;
}

export function generateQuietMoves(state: GameState): QuietMove[] {
  const rules = rulesOf(state);
  const moves: QuietMove[] = [];

  for (const fromId of ALL_NODES) {
    const piece = state.board.get(fromId);
    if (!piece || piece.owner !== state.toMove) continue;

    for (const dirIndex of directionsFor(piece.owner, piece.rank, false, rules)) {
      const to = stepTarget(fromId, dirIndex);
      if (!to || state.board.has(to)) continue;
      moves.push({
        kind: "move",
        from: fromId,
        path: [to],
        captured: [],
        promotes: crownsOn(piece.owner, piece.rank, to),
      });
    }
  }

  return moves;
}

/**
 * All legal moves for `side`, which must be the side to move.
 * Captures are mandatory: when any exists, only (maximal) capture chains are returned.
 *
 * The position is assumed well formed; this runs at every search node, so it does not
 * validate. Check positions from outside with `validateGameState` (the search and
 * `CheckersBoard.fromState` do).
 */
export function generateLegalMoves(state: GameState, side: Player = state.toMove): Move[] {
  if (side !== state.toMove) {
    throw new InvalidStateError(`Asked for ${side} moves but ${state.toMove} is to move`);
  }

  const captures = generateCaptureMoves(state);
  if (captures.length > 0) return captures; // mandatory capture

  return generateQuietMoves(state);
}

export function legalMovesFrom(state: GameState, from: NodeId): Move[] {
  return generateLegalMoves(state).filter((m) => m.from === from);
}

/** Legal moves of `side` regardless of whose turn it is; used by the evaluator. */
export function legalMovesFor(state: GameState, side: Player): Move[] {
  const view: GameState = side === state.toMove ? state : { ...state, toMove: side };
  return generateLegalMoves(view);
}

export function countLegalMovesFor(state: GameState, side: Player): number {
  return legalMovesFor(state, side).length;
}
