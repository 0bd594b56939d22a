import type { GameState } from "./state.ts";
import type { Player } from "../types.ts";
import type { RepetitionHistory } from "./repetition.ts";
import { otherPlayer, playerName } from "../types.ts";
import { generateLegalMoves } from "./movegen.ts";
import { countPliesWithoutProgress, isThreefoldRepetition, NO_PROGRESS_PLY_LIMIT } from "./repetition.ts";

export type GameStatus =
  | { kind: "ongoing" }
  | { kind: "won"; winner: Player; reason: string }
  | { kind: "drawn"; reason: string };

/** The side to move has no legal move (which includes having no pieces). */
export function isTerminal(state: GameState): boolean {
  return generateLegalMoves(state).length === 0;
}

/**
 * The winner of a finished game: the side to move loses when it cannot move.
 * @returns the winner and reason, or nulls if the game continues
 */
export function getWinner(state: GameState): { winner: Player | null; reason: string | null } {
  const loser = state.toMove;
  const winner = otherPlayer(loser);

  let loserHasPieces = false;
  for (const piece of state.board.values()) {
    if (piece.owner === loser) {
      loserHasPieces = true;
      break;
    }
  }

  if (!loserHasPieces) {
    return { winner, reason: `${playerName(winner)} wins — ${playerName(loser)} has no pieces` };
  }

  if (isTerminal(state)) {
    return { winner, reason: `${playerName(winner)} wins — ${playerName(loser)} has no moves` };
  }

  return { winner: null, reason: null };
}

export type GameStatusOptions = {
  /** Plies without a capture or man move before the game is drawn. Defaults to NO_PROGRESS_PLY_LIMIT. */
  noProgressPlyLimit?: number;
};

/**
 * Win/loss comes from the position alone; draws need the game's history, so they
 * are only reported when one is supplied. `history.states[history.currentIndex]`
 * is expected to be `state`.
 */
export function getGameStatus(
  state: GameState,
  history?: RepetitionHistory,
  options: GameStatusOptions = {}
): GameStatus {
  const limit = options.noProgressPlyLimit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new RangeError(`noProgressPlyLimit must be a positive integer, got ${limit}`);
  }

  const { winner, reason } = getWinner(state);
  if (winner !== null && reason !== null) return { kind: "won", winner, reason };

  if (!history) return { kind: "ongoing" };

  if (isThreefoldRepetition(history)) {
    return { kind: "drawn", reason: "Draw — threefold repetition" };
  }

  const plyLimit = limit ?? NO_PROGRESS_PLY_LIMIT;
  if (countPliesWithoutProgress(history) >= plyLimit) {
    const span = plyLimit % 2 === 0 ? `${plyLimit / 2} moves each` : `${plyLimit} plies`;
    return { kind: "drawn", reason: `Draw — ${span} without a capture or a man moving` };
  }

  return { kind: "ongoing" };
}
