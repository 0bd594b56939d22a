import type { GameState } from "./state.ts";
import { ALL_NODES } from "./board.ts";

/**
 * Key identifying a position for repetition detection.
 * Two states with the same hash are the same position with the same side to move.
 */
export function hashGameState(state: GameState): string {
  const parts: string[] = [];

  for (const nodeId of ALL_NODES) {
    const piece = state.board.get(nodeId);
    if (!piece) continue;
    parts.push(`${nodeId}${piece.owner}${piece.rank}`);
  }

  parts.push(`toMove:${state.toMove}`);
  return parts.join("|");
}
