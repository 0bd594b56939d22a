import type { NodeId } from "./state.ts";
import { ALL_NODES, rowOf } from "./board.ts";

const START_ROWS = 3;

/** Black fills rows 0–2, Red rows 5–7: 12 men each on the dark squares. */
export function computeStartNodeIds(): { blackStartNodeIds: readonly NodeId[]; redStartNodeIds: readonly NodeId[] } {
  return {
    blackStartNodeIds: ALL_NODES.filter((id) => rowOf(id) < START_ROWS),
    redStartNodeIds: ALL_NODES.filter((id) => rowOf(id) >= 8 - START_ROWS),
  };
}

export const { blackStartNodeIds: BLACK_START_NODE_IDS, redStartNodeIds: RED_START_NODE_IDS } =
  computeStartNodeIds();
