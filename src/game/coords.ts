import type { NodeId } from "./state.ts";

export const BOARD_SIZE = 8;

export function parseNodeId(id: string): { r: number; c: number } {
  const m = /^r(\d+)c(\d+)$/.exec(id);
  if (!m) throw new Error(`Invalid node id: ${id}`);
  const r = Number(m[1]);
  const c = Number(m[2]);
  if (!Number.isInteger(r) || !Number.isInteger(c)) throw new Error(`Invalid node coordinates in id: ${id}`);
  return { r, c };
}

export function makeNodeId(r: number, c: number): NodeId {
  return `r${r}c${c}`;
}

export function inBounds(r: number, c: number): boolean {
  return r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

// Dark squares: the top-left corner (r0c0) is light.
export function isPlayable(r: number, c: number): boolean {
  return inBounds(r, c) && (r + c) % 2 === 1;
}

export function isPlayableNodeId(id: string): boolean {
  const m = /^r(\d)c(\d)$/.exec(id);
  if (!m) return false;
  return isPlayable(Number(m[1]), Number(m[2]));
}
