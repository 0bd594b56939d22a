import type { GameState, NodeId } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Piece, Player } from "../types.ts";
import type { VariantId } from "../variants/variantTypes.ts";
import type { GameStatus } from "../game/gameOver.ts";
import { createInitialGameState, validateGameState } from "../game/state.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { applyMove } from "../game/applyMove.ts";
import { getGameStatus } from "../game/gameOver.ts";
import { ALL_NODES } from "../game/board.ts";
import { isPlayableNodeId } from "../game/coords.ts";
import { sameMove } from "../game/moveTypes.ts";
import { formatMove } from "../game/coordFormat.ts";
import { InvalidMoveError, InvalidStateError } from "../game/errors.ts";

/**
 * Immutable board value. Every `apply` returns a new board; the legal move list
 * is computed once per board and reused.
 */
export class CheckersBoard {
  private legalCache: Move[] | null = null;

  private constructor(readonly state: GameState) {}

  static new(variantId?: VariantId): CheckersBoard {
    return new CheckersBoard(createInitialGameState(variantId));
  }

  /** @throws InvalidStateError for a malformed position */
  static fromState(state: GameState): CheckersBoard {
    validateGameState(state);
    return new CheckersBoard(state);
  }

  get toMove(): Player {
    return this.state.toMove;
  }

  /** @throws InvalidStateError when `side` is not the side to move */
  legalMoves(side: Player = this.state.toMove): Move[] {
    if (side !== this.state.toMove) {
      throw new InvalidStateError(`Asked for ${side} moves but ${this.state.toMove} is to move`);
    }
    this.legalCache ??= generateLegalMoves(this.state);
    return this.legalCache.slice();
  }

  /** @throws InvalidMoveError when `move` is not in the current legal set */
  apply(move: Move): CheckersBoard {
    const legal = this.legalMoves().find((m) => sameMove(m, move));
    if (!legal) {
      throw new InvalidMoveError(`${formatMove(move)} is not legal in this position`, move);
    }
    return new CheckersBoard(applyMove(this.state, legal));
  }

  isTerminal(): boolean {
    return this.legalMoves().length === 0;
  }

  pieceAt(square: NodeId): Piece | null {
    if (!isPlayableNodeId(square)) return null;
    return this.state.board.get(square) ?? null;
  }

  /** Occupied squares in row-major order. */
  pieces(): Array<[NodeId, Piece]> {
    const out: Array<[NodeId, Piece]> = [];
    for (const id of ALL_NODES) {
      const piece = this.state.board.get(id);
      if (piece) out.push([id, piece]);
    }
    return out;
  }

  /** Won or ongoing; draws need a HistoryManager. */
  status(): GameStatus {
    return getGameStatus(this.state);
  }
}
