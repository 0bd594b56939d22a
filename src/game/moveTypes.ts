import type { NodeId } from "./state.ts";

export interface QuietMove {
  kind: "move";
  from: NodeId;
  /** Landing squares after `from`; a single step. */
  path: readonly [NodeId];
  captured: readonly [];
  promotes: boolean;
}

/**
 * A complete (maximal) capture chain. `captured[i]` is the piece jumped on the way
 * to `path[i]`, so both arrays have the same length.
 */
export interface CaptureMove {
  kind: "capture";
  from: NodeId;
  path: readonly NodeId[];
  captured: readonly NodeId[];
  promotes: boolean;
}

export type Move = QuietMove | CaptureMove;

export function destinationOf(move: Move): NodeId {
  return move.path[move.path.length - 1] ?? move.from;
}

export function moveKey(move: Move): string {
  return [move.from, ...move.path].join(move.kind === "capture" ? "x" : "-");
}

export function sameMove(a: Move, b: Move): boolean {
  return a.kind === b.kind && moveKey(a) === moveKey(b);
}
