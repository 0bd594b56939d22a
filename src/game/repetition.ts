import type { GameState } from "./state.ts";
import { hashGameState } from "./hashState.ts";
import { ALL_NODES } from "./board.ts";

/** 40 moves by each side without a capture or a man moving. */
export const NO_PROGRESS_PLY_LIMIT = 80;

export type RepetitionHistory = {
  states: readonly GameState[];
  currentIndex: number;
};

function occurrences(history: RepetitionHistory, target: string): number {
  const end = history.currentIndex;
  let count = 0;
  for (let i = 0; i <= end && i < history.states.length; i++) {
    if (hashGameState(history.states[i]) === target) count++;
  }
  return count;
}

/**
 * Returns true if adding `nextState` would make that position occur 3 times
 * in the history prefix `[0..currentIndex]` (i.e., it already occurred twice).
 */
export function wouldCreateThreefoldRepetition(args: { history: RepetitionHistory; nextState: GameState }): boolean {
  const { history, nextState } = args;
  if (!Number.isInteger(history.currentIndex) || history.currentIndex < 0) return false;
  return occurrences(history, hashGameState(nextState)) >= 2;
}

/** The position at `currentIndex` has now occurred at least three times. */
export function isThreefoldRepetition(history: RepetitionHistory): boolean {
  const current = history.states[history.currentIndex];
  if (!current) return false;
  return occurrences(history, hashGameState(current)) >= 3;
}

function menSignature(state: GameState): string {
  const parts: string[] = [];
  for (const id of ALL_NODES) {
    const piece = state.board.get(id);
    if (piece && piece.rank === "M") parts.push(`${id}${piece.owner}`);
  }
  return parts.join(",");
}

function madeProgress(before: GameState, after: GameState): boolean {
  if (after.board.size < before.board.size) return true; // capture
  return menSignature(before) !== menSignature(after); // a man moved or was crowned
}

/** Consecutive plies, ending at `currentIndex`, in which only kings moved and nothing was captured. */
export function countPliesWithoutProgress(history: RepetitionHistory): number {
  let plies = 0;
  for (let i = Math.min(history.currentIndex, history.states.length - 1); i > 0; i--) {
    if (madeProgress(history.states[i - 1], history.states[i])) break;
    plies++;
  }
  return plies;
}
