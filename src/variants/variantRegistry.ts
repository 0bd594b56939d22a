import type { GameMeta, RuleOptions, VariantId, VariantSpec } from "./variantTypes.ts";

export const VARIANTS: readonly VariantSpec[] = [
  {
    variantId: "english_8",
    displayName: "Checkers",
    subtitle: "English draughts • 8×8 • Promotion ends the move",
    piecesPerSide: 12,
    rules: {
      promotionDuringCapture: "ends_move",
      menCaptureBackward: false,
    },
  },
  {
    variantId: "english_8_king_continues",
    displayName: "Checkers (crowned men keep jumping)",
    subtitle: "English draughts • 8×8 • A man crowned mid-chain continues as a king",
    piecesPerSide: 12,
    rules: {
      promotionDuringCapture: "continues_as_king",
      menCaptureBackward: false,
    },
  },
  {
    variantId: "pool_8_short_king",
    displayName: "Pool Checkers (short kings)",
    subtitle: "8×8 • Men capture backward • A man crowned mid-chain continues as a king",
    piecesPerSide: 12,
    rules: {
      promotionDuringCapture: "continues_as_king",
      menCaptureBackward: true,
    },
  },
] as const;

export const DEFAULT_VARIANT_ID: VariantId = "english_8";

export function getVariantById(id: VariantId): VariantSpec {
  const found = VARIANTS.find((v) => v.variantId === id);
  if (!found) throw new Error(`Unknown variantId: ${id}`);
  return found;
}

export function isVariantId(id: string): id is VariantId {
  return VARIANTS.some((v) => v.variantId === id);
}

export function metaForVariant(id: VariantId): GameMeta {
  const v = getVariantById(id);
  return { variantId: v.variantId, rules: { ...v.rules } };
}

export const DEFAULT_RULES: Readonly<RuleOptions> = getVariantById(DEFAULT_VARIANT_ID).rules;
