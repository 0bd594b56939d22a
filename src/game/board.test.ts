import { describe, it, expect } from "vitest";
import {
  ALL_NODES,
  backRow,
  diagNeighbors,
  forwardDr,
  jumpTarget,
  jumpTargets,
  promotionRow,
  stepTarget,
} from "./board.ts";

describe("board helpers", () => {
  it("has 32 playable squares in row-major order", () => {
    expect(ALL_NODES.length).toBe(32);
    expect(ALL_NODES.slice(0, 5)).toEqual(["r0c1", "r0c3", "r0c5", "r0c7", "r1c0"]);
    expect(ALL_NODES[31]).toBe("r7c6");
  });

  it("diagonal neighbors from center", () => {
    expect(diagNeighbors("r3c4")).toEqual(["r2c3", "r2c5", "r4c3", "r4c5"]);
  });

  it("diagonal neighbors on the edge", () => {
    expect(diagNeighbors("r7c0")).toEqual(["r6c1"]);
    expect(diagNeighbors("r0c7")).toEqual(["r1c6"]);
  });

  it("jump targets from center", () => {
    const formatted = jumpTargets("r3c4").map((j) => `${j.over}->${j.land}`);
    expect(formatted).toEqual(["r2c3->r1c2", "r2c5->r1c6", "r4c3->r5c2", "r4c5->r5c6"]);
  });

  it("jump targets stop at the edge", () => {
    expect(jumpTargets("r1c0")).toEqual([{ over: "r2c1", land: "r3c2" }]);
    expect(jumpTarget("r1c6", 1)).toBeNull();
    expect(stepTarget("r1c6", 1)).toBe("r0c7");
  });

  it("throws for a square that is not playable", () => {
    expect(() => diagNeighbors("r0c0")).toThrow("board: r0c0 is not a playable square");
  });

  it("orients the sides", () => {
    expect(forwardDr("R")).toBe(-1);
    expect(forwardDr("B")).toBe(1);
    expect(promotionRow("R")).toBe(0);
    expect(promotionRow("B")).toBe(7);
    expect(backRow("R")).toBe(7);
    expect(backRow("B")).toBe(0);
  });
});
