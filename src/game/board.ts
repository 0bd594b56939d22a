import type { NodeId } from "./state.ts";
import type { Player } from "../types.ts";
import { BOARD_SIZE, makeNodeId, isPlayable, inBounds } from "./coords.ts";

export type Direction = { dr: -1 | 1; dc: -1 | 1 };

// Fixed order; move generation and therefore search tie-breaks depend on it.
export const DIRECTIONS: readonly Direction[] = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: +1 },
  { dr: +1, dc: -1 },
  { dr: +1, dc: +1 },
];

export function getAllNodes(): NodeId[] {
  const nodes: NodeId[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      if (isPlayable(r, c)) nodes.push(makeNodeId(r, c));
    }
  }
  return nodes;
}

/** Playable squares in row-major order. */
export const ALL_NODES: readonly NodeId[] = getAllNodes();

type Ray = { step: NodeId | null; over: NodeId | null; land: NodeId | null };

function buildRays(): Map<NodeId, Ray[]> {
  const table = new Map<NodeId, Ray[]>();
  for (const id of ALL_NODES) {
    const r = Number(id.slice(1, id.indexOf("c")));
    const c = Number(id.slice(id.indexOf("c") + 1));
    const rays: Ray[] = DIRECTIONS.map(({ dr, dc }) => {
      const step = isPlayable(r + dr, c + dc) ? makeNodeId(r + dr, c + dc) : null;
      const land = inBounds(r + 2 * dr, c + 2 * dc) ? makeNodeId(r + 2 * dr, c + 2 * dc) : null;
      return { step, over: land ? step : null, land };
    });
    table.set(id, rays);
  }
  return table;
}

const RAYS = buildRays();

function raysFor(id: NodeId): Ray[] {
  const rays = RAYS.get(id);
  if (!rays) throw new Error(`board: ${id} is not a playable square`);
  return rays;
}

/** Adjacent playable square in direction `dirIndex` (index into DIRECTIONS), if any. */
export function stepTarget(id: NodeId, dirIndex: number): NodeId | null {
  return raysFor(id)[dirIndex]?.step ?? null;
}

/** Jumped and landing squares in direction `dirIndex`, when both are on the board. */
export function jumpTarget(id: NodeId, dirIndex: number): { over: NodeId; land: NodeId } | null {
  const ray = raysFor(id)[dirIndex];
  if (!ray || !ray.over || !ray.land) return null;
  return { over: ray.over, land: ray.land };
}

export function diagNeighbors(id: NodeId): NodeId[] {
  const res: NodeId[] = [];
  for (const ray of raysFor(id)) {
    if (ray.step) res.push(ray.step);
  }
  return res;
}

export function jumpTargets(id: NodeId): Array<{ over: NodeId; land: NodeId }> {
  const res: Array<{ over: NodeId; land: NodeId }> = [];
  for (let i = 0; i < DIRECTIONS.length; i++) {
    const j = jumpTarget(id, i);
    if (j) res.push(j);
  }
  return res;
}

/** Row delta of a man's forward move: Red climbs toward row 0, Black descends toward row 7. */
export function forwardDr(p: Player): -1 | 1 {
  return p === "R" ? -1 : 1;
}

/** The row on which a man of `p` is crowned. */
export function promotionRow(p: Player): number {
  return p === "R" ? 0 : BOARD_SIZE - 1;
}

/** The row a side starts defending; its opponent's promotion row. */
export function backRow(p: Player): number {
  return p === "R" ? BOARD_SIZE - 1 : 0;
}

export function rowOf(id: NodeId): number {
  return Number(id.slice(1, id.indexOf("c")));
}

export function colOf(id: NodeId): number {
  return Number(id.slice(id.indexOf("c") + 1));
}
