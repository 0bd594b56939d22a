import { describe, it, expect } from "vitest";
import { CheckersBoard } from "./checkersBoard.ts";
import { InvalidMoveError, InvalidStateError } from "../game/errors.ts";
import { parseMove } from "../game/coordFormat.ts";
import type { Move } from "../game/moveTypes.ts";

describe("CheckersBoard", () => {
  it("starts with twelve men a side and Red to move", () => {
    const board = CheckersBoard.new();
    expect(board.pieces().length).toBe(24);
    expect(board.toMove).toBe("R");
    expect(board.legalMoves().length).toBe(7);
    expect(board.isTerminal()).toBe(false);
    expect(board.status()).toEqual({ kind: "ongoing" });
  });

  it("lists pieces in row-major order", () => {
    const [first] = CheckersBoard.new().pieces();
    expect(first).toEqual(["r0c1", { owner: "B", rank: "M" }]);
  });

  it("returns a new board from apply and leaves the old one alone", () => {
    const board = CheckersBoard.new();
    const [move] = board.legalMoves();
    const next = board.apply(move);

    expect(next).not.toBe(board);
    expect(next.toMove).toBe("B");
    expect(next.pieceAt("r4c1")).toEqual({ owner: "R", rank: "M" });
    expect(next.pieceAt("r5c0")).toBeNull();
    expect(board.pieceAt("r5c0")).toEqual({ owner: "R", rank: "M" });
  });

  it("applies a move read from notation", () => {
    const board = CheckersBoard.new();
    const next = board.apply(parseMove(board.state, "22-18"));
    expect(next.pieceAt("r4c3")).toEqual({ owner: "R", rank: "M" });
  });

  it("rejects a move that is not legal here", () => {
    const board = CheckersBoard.new();
    const move: Move = { kind: "move", from: "r5c2", path: ["r6c3"], captured: [], promotes: false };
    expect(() => board.apply(move)).toThrow(InvalidMoveError);
    expect(() => board.apply(move)).toThrow("22-26 is not legal in this position");
  });

  it("rejects a quiet move when a capture is required", () => {
    const board = CheckersBoard.fromState({
      board: new Map([
        ["r5c2", { owner: "R", rank: "M" }],
        ["r4c3", { owner: "B", rank: "M" }],
        ["r5c6", { owner: "R", rank: "M" }],
      ]),
      toMove: "R",
    });
    const quiet: Move = { kind: "move", from: "r5c6", path: ["r4c7"], captured: [], promotes: false };
    expect(() => board.apply(quiet)).toThrow(InvalidMoveError);
  });

  it("hands out a copy of its move list", () => {
    const board = CheckersBoard.new();
    board.legalMoves().length = 0;
    expect(board.legalMoves().length).toBe(7);
  });

  it("only lists moves for the side to move", () => {
    expect(() => CheckersBoard.new().legalMoves("B")).toThrow(InvalidStateError);
  });

  it("answers null for light squares and empty ones", () => {
    const board = CheckersBoard.new();
    expect(board.pieceAt("r0c0")).toBeNull();
    expect(board.pieceAt("r4c3")).toBeNull();
    expect(board.pieceAt("r0c1")).toEqual({ owner: "B", rank: "M" });
  });

  it("validates positions it is built from", () => {
    expect(() =>
      CheckersBoard.fromState({ board: new Map([["r0c1", { owner: "R", rank: "M" }]]), toMove: "B" })
    ).toThrow("Uncrowned man on its promotion row at r0c1");
  });

  it("reports a finished game", () => {
    const board = CheckersBoard.fromState({ board: new Map([["r5c2", { owner: "R", rank: "K" }]]), toMove: "B" });
    expect(board.isTerminal()).toBe(true);
    expect(board.status()).toEqual({ kind: "won", winner: "R", reason: "Red wins — Black has no pieces" });
  });
});
