import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import type { VariantId } from "../variants/variantTypes.ts";
import type { Prng } from "../shared/prng.ts";
import { createInitialGameState } from "./state.ts";
import { generateLegalMoves } from "./movegen.ts";
import { applyMove } from "./applyMove.ts";

export type RandomPlayoutOptions = {
  plies: number;
  variantId?: VariantId;
  /** Starting position; defaults to the initial position of `variantId`. */
  from?: GameState;
  /** Called with every position reached, after each ply. */
  onPly?: (state: GameState, move: Move, before: GameState) => void;
};

/**
 * Play up to `plies` uniformly random legal moves.
 * Stops early at a position where the side to move has no move; that position is returned.
 */
export function randomPlayout(prng: Prng, opts: RandomPlayoutOptions): GameState {
  let state = opts.from ?? createInitialGameState(opts.variantId);

  for (let ply = 0; ply < opts.plies; ply++) {
    const moves = generateLegalMoves(state);
    if (moves.length === 0) break;
    const move = prng.pick(moves);
    const next = applyMove(state, move);
    opts.onPly?.(next, move, state);
    state = next;
  }

  return state;
}

/**
 * A reachable mid-game position: random playout of `minPlies..maxPlies` plies,
 * retried until the side to move still has a move.
 */
export function createRandomMidgameState(
  prng: Prng,
  opts: { minPlies?: number; maxPlies?: number; variantId?: VariantId } = {}
): GameState {
  const minPlies = opts.minPlies ?? 10;
  const maxPlies = opts.maxPlies ?? 30;

  for (let attempt = 0; attempt < 50; attempt++) {
    const state = randomPlayout(prng, { plies: prng.int(minPlies, maxPlies + 1), variantId: opts.variantId });
    if (generateLegalMoves(state).length > 0) return state;
  }
  throw new Error("randomState: no ongoing position found after 50 playouts");
}
