import type { GameState, NodeId } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { BOARD_SIZE, isPlayable, makeNodeId, parseNodeId } from "./coords.ts";
import { destinationOf } from "./moveTypes.ts";
import { generateLegalMoves } from "./movegen.ts";
import { InvalidMoveError } from "./errors.ts";

/** `num`: standard 1–32 checkers numbering; `rc`: node ids; `a1`: file letter + rank from Red's side. */
export type CoordFormat = "num" | "rc" | "a1";

// Squares are numbered row by row from Black's side, four dark squares per row.
export function nodeIdToSquareNumber(nodeId: NodeId): number {
  const { r, c } = parseNodeId(nodeId);
  return r * 4 + Math.floor(c / 2) + 1;
}

export function squareNumberToNodeId(n: number): NodeId | null {
  if (!Number.isInteger(n) || n < 1 || n > 32) return null;
  const r = Math.floor((n - 1) / 4);
  const k = (n - 1) % 4;
  const c = r % 2 === 0 ? 2 * k + 1 : 2 * k;
  return makeNodeId(r, c);
}

export function nodeIdToA1(nodeId: NodeId): string {
  const { r, c } = parseNodeId(nodeId);
  const colLetter = String.fromCharCode("a".charCodeAt(0) + c);
  // Node ids count rows from the top (Black's side); ranks count from Red's side.
  return `${colLetter}${BOARD_SIZE - r}`;
}

export function formatNodeId(nodeId: NodeId, format: CoordFormat = "num"): string {
  if (format === "num") return String(nodeIdToSquareNumber(nodeId));
  if (format === "a1") return nodeIdToA1(nodeId);
  return nodeId;
}

/** `11-15` for a step, `15x22x29` for a capture chain. */
export function formatMove(move: Move, format: CoordFormat = "num"): string {
  const squares = [move.from, ...move.path].map((id) => formatNodeId(id, format));
  return squares.join(move.kind === "capture" ? "x" : "-");
}

function parseSquareToken(token: string): NodeId | null {
  if (/^\d{1,2}$/.test(token)) return squareNumberToNodeId(Number(token));

  const rc = /^r(\d)c(\d)$/.exec(token);
  if (rc) {
    const r = Number(rc[1]);
    const c = Number(rc[2]);
    return isPlayable(r, c) ? makeNodeId(r, c) : null;
  }

  const a1 = /^([a-h])([1-8])$/.exec(token);
  if (a1) {
    const c = a1[1].charCodeAt(0) - "a".charCodeAt(0);
    const r = BOARD_SIZE - Number(a1[2]);
    return isPlayable(r, c) ? makeNodeId(r, c) : null;
  }

  return null;
}

/**
 * Resolve move text against the legal moves of `state`.
 *
 * Accepts any of the square formats, separated by `-` or `x`. A full chain
 * (`1x10x19`) is matched exactly; two squares may also name a chain by its ends
 * (`1x19`) as long as only one legal move fits.
 */
export function parseMove(state: GameState, text: string): Move {
  const tokens = text.trim().toLowerCase().split(/\s*[-x:]\s*/).filter((t) => t.length > 0);
  if (tokens.length < 2) throw new InvalidMoveError(`Cannot read move "${text}"`);

  const squares: NodeId[] = [];
  for (const token of tokens) {
    const id = parseSquareToken(token);
    if (!id) throw new InvalidMoveError(`Unknown square "${token}" in "${text}"`);
    squares.push(id);
  }

  const legal = generateLegalMoves(state);
  const exact = legal.filter((m) => {
    const seq = [m.from, ...m.path];
    return seq.length === squares.length && seq.every((id, i) => id === squares[i]);
  });
  if (exact.length === 1) return exact[0];

  const byEnds =
    squares.length === 2
      ? legal.filter((m) => m.from === squares[0] && destinationOf(m) === squares[1])
      : [];
  if (byEnds.length === 1) return byEnds[0];
  if (byEnds.length > 1) {
    throw new InvalidMoveError(`"${text}" is ambiguous: ${byEnds.map((m) => formatMove(m)).join(", ")}`);
  }

  throw new InvalidMoveError(`"${text}" is not a legal move`);
}
