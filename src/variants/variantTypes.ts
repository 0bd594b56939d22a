/** What happens when a man reaches the farthest row in the middle of a capture chain. */
export type PromotionDuringCapture = "ends_move" | "continues_as_king";

export type VariantId = "english_8" | "english_8_king_continues" | "pool_8_short_king";

export interface RuleOptions {
  promotionDuringCapture: PromotionDuringCapture;
  /** Men may jump backward as well as forward. Quiet moves stay forward-only. */
  menCaptureBackward: boolean;
}

export interface GameMeta {
  variantId: VariantId;
  rules: RuleOptions;
}

export interface VariantSpec {
  variantId: VariantId;
  displayName: string;
  subtitle: string;
  rules: RuleOptions;
  piecesPerSide: 12;
}
