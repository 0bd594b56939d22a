import { describe, it, expect, vi, afterEach } from "vitest";
import { CheckersAI } from "./checkersAI.ts";
import { evaluateState } from "./evaluate.ts";
import { CheckersBoard } from "../core/checkersBoard.ts";
import { moveKey } from "../game/moveTypes.ts";
import { InvalidStateError } from "../game/errors.ts";
import type { GameState } from "../game/state.ts";

const forcedCapture: GameState = {
  board: new Map([
    ["r5c2", { owner: "R", rank: "M" }],
    ["r4c3", { owner: "B", rank: "M" }],
    ["r0c7", { owner: "B", rank: "M" }],
  ]),
  toMove: "R",
};

describe("CheckersAI configuration", () => {
  it("rejects a depth below one", () => {
    expect(() => new CheckersAI(0)).toThrow(RangeError);
    expect(() => new CheckersAI(0)).toThrow("Search depth must be a positive integer, got 0");
    expect(() => new CheckersAI(2.5)).toThrow(RangeError);
  });

  it("rejects budgets that are not positive", () => {
    expect(() => new CheckersAI({ depth: 2, maxNodes: -1 })).toThrow("maxNodes must be a positive number, got -1");
    expect(() => new CheckersAI({ depth: 2, timeBudgetMs: 0 })).toThrow(RangeError);
  });

  it("rejects bad weights", () => {
    expect(() => new CheckersAI({ depth: 2, weights: { king: -5 } })).toThrow(RangeError);
  });

  it("builds from a difficulty preset", () => {
    expect(CheckersAI.forDifficulty("easy").depth).toBe(2);
    expect(CheckersAI.forDifficulty("advanced").config.timeBudgetMs).toBe(450);
    expect(CheckersAI.forDifficulty("medium", { pruning: false }).config.pruning).toBe(false);
    expect(new CheckersAI().depth).toBe(4);
  });

  it("merges partial weights over the defaults", () => {
    const ai = new CheckersAI({ depth: 1, weights: { king: 300 } });
    expect(ai.config.weights.king).toBe(300);
    expect(ai.config.weights.man).toBe(100);
  });
});

describe("CheckersAI search", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints one telemetry line per search when enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const ai = new CheckersAI({ depth: 1, telemetry: true });
    const move = ai.getBestMove(forcedCapture, "R");

    expect(moveKey(move)).toBe("r5c2xr3c4");
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/^\[ai:search\] Red 22x15 eval=\+8 d=1 n=2 cut=0 ms=\d+$/);
  });

  it("refuses a malformed position", () => {
    const malformed: GameState = { board: new Map([["r0c1", { owner: "R", rank: "M" }]]), toMove: "R" };
    expect(() => new CheckersAI(2).getBestMove(malformed, "R")).toThrow(InvalidStateError);
  });

  it("is quiet by default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new CheckersAI(2).getBestMove(forcedCapture, "R");
    expect(log).not.toHaveBeenCalled();
  });

  it("scores a single move from the mover's side", () => {
    const ai = new CheckersAI(1);
    const [capture] = CheckersBoard.fromState(forcedCapture).legalMoves();
    expect(ai.evaluateMove(forcedCapture, capture)).toBe(8);
  });

  it("ranks every legal move best first", () => {
    const board = CheckersBoard.new();
    const scored = new CheckersAI(2).evaluateMoves(board, "R");
    expect(scored.length).toBe(7);
    for (let i = 1; i < scored.length; i++) {
      expect(scored[i - 1].score).toBeGreaterThanOrEqual(scored[i].score);
    }
  });

  it("accepts a board facade as well as a raw state", () => {
    const ai = new CheckersAI(3);
    const board = CheckersBoard.new();
    const move = ai.getBestMove(board, "R");
    expect(moveKey(move)).toBe(moveKey(ai.getBestMove(board.state, "R")));
    expect(board.apply(move).toMove).toBe("B");
  });

  it("evaluates statically with its own weights", () => {
    const ai = new CheckersAI({ depth: 1, weights: { mobility: 0 } });
    expect(ai.evaluate(forcedCapture, "R")).toBe(evaluateState(forcedCapture, "R", ai.config.weights));
  });
});
