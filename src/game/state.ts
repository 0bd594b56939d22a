import type { Piece, Player } from "../types.ts";
import type { GameMeta, RuleOptions, VariantId } from "../variants/variantTypes.ts";
import { DEFAULT_RULES, DEFAULT_VARIANT_ID, metaForVariant } from "../variants/variantRegistry.ts";
import { BLACK_START_NODE_IDS, RED_START_NODE_IDS } from "./initialPosition.ts";
import { isPlayableNodeId } from "./coords.ts";
import { promotionRow, rowOf } from "./board.ts";
import { InvalidStateError } from "./errors.ts";

export type NodeId = string;
export type BoardState = ReadonlyMap<NodeId, Piece>;

/**
 * A position. Treated as an immutable value: `applyMove` builds a new board map and
 * never touches the one it was given, so search frames can share states freely.
 */
export interface GameState {
  board: BoardState;
  toMove: Player;
  meta?: GameMeta;
}

export function rulesOf(state: GameState): RuleOptions {
  return state.meta?.rules ?? DEFAULT_RULES;
}

export function createInitialGameState(variantId: VariantId = DEFAULT_VARIANT_ID): GameState {
  const board = new Map<NodeId, Piece>();

  for (const id of BLACK_START_NODE_IDS) {
    board.set(id, { owner: "B", rank: "M" });
  }
  for (const id of RED_START_NODE_IDS) {
    board.set(id, { owner: "R", rank: "M" });
  }

  return { board, toMove: "R", meta: metaForVariant(variantId) };
}

export function createEmptyGameState(toMove: Player = "R", variantId: VariantId = DEFAULT_VARIANT_ID): GameState {
  return { board: new Map(), toMove, meta: metaForVariant(variantId) };
}

/**
 * Build a position from explicit placements, validating it.
 * Useful for fixtures and for callers restoring a position they stored themselves.
 */
export function gameStateFromPieces(
  pieces: Iterable<readonly [NodeId, Piece]>,
  toMove: Player,
  variantId: VariantId = DEFAULT_VARIANT_ID
): GameState {
  const board = new Map<NodeId, Piece>();
  for (const [id, piece] of pieces) {
    if (board.has(id)) throw new InvalidStateError(`Two pieces placed on ${id}`);
    board.set(id, { owner: piece.owner, rank: piece.rank });
  }
  const state: GameState = { board, toMove, meta: metaForVariant(variantId) };
  validateGameState(state);
  return state;
}

export function validateGameState(state: GameState): void {
  if (state.toMove !== "R" && state.toMove !== "B") {
    throw new InvalidStateError(`Invalid side to move: ${String(state.toMove)}`);
  }
  for (const [id, piece] of state.board) {
    if (!isPlayableNodeId(id)) {
      throw new InvalidStateError(`Piece on non-playable square ${id}`);
    }
    if (piece.owner !== "R" && piece.owner !== "B") {
      throw new InvalidStateError(`Piece on ${id} has an unknown owner`);
    }
    if (piece.rank !== "M" && piece.rank !== "K") {
      throw new InvalidStateError(`Piece on ${id} has an unknown rank`);
    }
    if (piece.rank === "M" && rowOf(id) === promotionRow(piece.owner)) {
      throw new InvalidStateError(`Uncrowned man on its promotion row at ${id}`);
    }
  }
}

export function countPieces(state: GameState, p: Player): { men: number; kings: number } {
  const out = { men: 0, kings: 0 };
  for (const piece of state.board.values()) {
    if (piece.owner !== p) continue;
    if (piece.rank === "K") out.kings++;
    else out.men++;
  }
  return out;
}
