import type { NodeId } from "./state.ts";
import type { Piece } from "../types.ts";
import { promotionRow, rowOf } from "./board.ts";

/** True for a man standing on the row where its side is crowned. */
export function shouldPromote(piece: Piece, nodeId: NodeId): boolean {
  return piece.rank === "M" && rowOf(nodeId) === promotionRow(piece.owner);
}

/**
 * Crown the man at `nodeId` if it has reached its promotion row.
 * The piece is replaced with a new king rather than mutated.
 * @returns true if promotion occurred
 */
export function promoteIfNeeded(board: Map<NodeId, Piece>, nodeId: NodeId): boolean {
  const piece = board.get(nodeId);
  if (!piece || !shouldPromote(piece, nodeId)) return false;
  board.set(nodeId, { owner: piece.owner, rank: "K" });
  return true;
}
