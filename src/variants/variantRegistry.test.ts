import { describe, it, expect } from "vitest";
import { DEFAULT_RULES, DEFAULT_VARIANT_ID, VARIANTS, getVariantById, isVariantId, metaForVariant } from "./variantRegistry.ts";
import { createInitialGameState, countPieces, rulesOf } from "../game/state.ts";

describe("variantRegistry", () => {
  it("defaults to English checkers", () => {
    expect(DEFAULT_VARIANT_ID).toBe("english_8");
    expect(DEFAULT_RULES).toEqual({ promotionDuringCapture: "ends_move", menCaptureBackward: false });
  });

  it("looks variants up by id", () => {
    expect(getVariantById("pool_8_short_king").rules.menCaptureBackward).toBe(true);
    expect(isVariantId("english_8_king_continues")).toBe(true);
    expect(isVariantId("international_10")).toBe(false);
  });

  it("hands out a copy of the rules", () => {
    const meta = metaForVariant("english_8");
    expect(meta.rules).toEqual(getVariantById("english_8").rules);
    expect(meta.rules).not.toBe(getVariantById("english_8").rules);
  });

  it("starts every variant with twelve men a side", () => {
    for (const v of VARIANTS) {
      const state = createInitialGameState(v.variantId);
      expect(state.meta?.variantId).toBe(v.variantId);
      expect(rulesOf(state)).toEqual(v.rules);
      expect(countPieces(state, "R")).toEqual({ men: v.piecesPerSide, kings: 0 });
      expect(countPieces(state, "B")).toEqual({ men: v.piecesPerSide, kings: 0 });
    }
  });
});
