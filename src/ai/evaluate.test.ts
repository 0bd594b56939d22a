import { describe, it, expect } from "vitest";
import { DEFAULT_WEIGHTS, evaluateState, evaluationBreakdown, validateWeights } from "./evaluate.ts";
import { createInitialGameState } from "../game/state.ts";
import { createRandomMidgameState } from "../game/randomState.ts";
import { createPrng } from "../shared/prng.ts";
import type { GameState } from "../game/state.ts";

describe("evaluateState", () => {
  it("scores the starting position as level", () => {
    const state = createInitialGameState();
    expect(evaluateState(state, "R")).toBe(0);
    expect(evaluateState(state, "B")).toBe(0);
  });

  it("breaks a position down term by term", () => {
    const state: GameState = {
      board: new Map([
        ["r7c0", { owner: "R", rank: "M" }],
        ["r3c4", { owner: "B", rank: "K" }],
      ]),
      toMove: "R",
    };
    expect(evaluationBreakdown(state, "R")).toEqual({
      material: -150,
      center: -10,
      backRow: 15,
      advancement: 0,
      edge: 5,
      mobility: -6,
      threats: 0,
      promotion: 0,
      total: -146,
    });
    expect(evaluateState(state, "B")).toBe(146);
  });

  it("rewards advanced men", () => {
    const state: GameState = {
      board: new Map([
        ["r2c1", { owner: "R", rank: "M" }],
        ["r0c7", { owner: "B", rank: "K" }],
      ]),
      toMove: "R",
    };
    // Five rows from Red's back row.
    expect(evaluationBreakdown(state, "R").advancement).toBe(20);
  });

  it("counts capture threats and men close to crowning", () => {
    const state: GameState = {
      board: new Map([
        ["r4c3", { owner: "R", rank: "M" }],
        ["r5c4", { owner: "R", rank: "M" }],
        ["r2c7", { owner: "R", rank: "M" }],
        ["r3c2", { owner: "B", rank: "M" }],
      ]),
      toMove: "R",
    };
    // Red can take r3c2; Black's reply jump over r4c3 is blocked by r5c4. r2c7 is two rows from crowning.
    expect(evaluationBreakdown(state, "R")).toEqual({
      material: 200,
      center: 10,
      backRow: 0,
      advancement: 28,
      edge: 5,
      mobility: 0,
      threats: 15,
      promotion: 25,
      total: 283,
    });
    expect(evaluateState(state, "B")).toBe(-283);
  });

  it("is antisymmetric and integral on random positions", () => {
    const prng = createPrng("eval-antisymmetry");
    for (let i = 0; i < 40; i++) {
      const state = createRandomMidgameState(prng, { minPlies: 4, maxPlies: 40 });
      const red = evaluateState(state, "R");
      const black = evaluateState(state, "B");
      expect(Number.isInteger(red)).toBe(true);
      expect(red + black).toBe(0);
    }
  });

  it("uses the weights it is given", () => {
    const state: GameState = {
      board: new Map([
        ["r5c2", { owner: "R", rank: "K" }],
        ["r2c3", { owner: "B", rank: "M" }],
      ]),
      toMove: "R",
    };
    const weights = {
      ...DEFAULT_WEIGHTS,
      center: 0,
      backRow: 0,
      advancement: 0,
      edge: 0,
      mobility: 0,
      threats: 0,
      promotion: 0,
    };
    expect(evaluateState(state, "R", weights)).toBe(150);
  });
});

describe("validateWeights", () => {
  it("accepts the defaults", () => {
    expect(() => validateWeights(DEFAULT_WEIGHTS)).not.toThrow();
  });

  it("rejects fractional and negative weights", () => {
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, center: 1.5 })).toThrow(
      'Evaluation weight "center" must be a non-negative integer, got 1.5'
    );
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, edge: -1 })).toThrow(RangeError);
  });

  it("requires men to be worth something", () => {
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, man: 0 })).toThrow('Evaluation weight "man" must be positive');
  });
});
