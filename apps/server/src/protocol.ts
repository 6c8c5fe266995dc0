import { z } from "zod";
import {
  HandCategory,
  StrengthTier,
  toWireCard,
  type EvaluationSource,
  type HandResult,
  type WireRank,
  type WireSuit
} from "@pokerbot/shared";

const wireCardSchema = z.object({
  rank: z.string(),
  suit: z.string()
});

const requestId = z.string().max(128).optional();
const holeCards = z.array(wireCardSchema).max(2);
const communityCards = z.array(wireCardSchema).max(5).default([]);

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("EVALUATE"), requestId, holeCards, communityCards }),
  z.object({
    type: z.literal("CLASSIFY"),
    requestId,
    holeCards,
    communityCards,
    isHeadsUp: z.boolean().default(false)
  }),
  z.object({ type: z.literal("VERSION"), requestId }),
  z.object({ type: z.literal("CHECK"), requestId })
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type CategoryName = keyof typeof HandCategory;
export type TierName = keyof typeof StrengthTier;

const CATEGORY_NAME: Record<HandCategory, CategoryName> = {
  [HandCategory.HIGH_CARD]: "HIGH_CARD",
  [HandCategory.ONE_PAIR]: "ONE_PAIR",
  [HandCategory.TWO_PAIR]: "TWO_PAIR",
  [HandCategory.THREE_OF_A_KIND]: "THREE_OF_A_KIND",
  [HandCategory.STRAIGHT]: "STRAIGHT",
  [HandCategory.FLUSH]: "FLUSH",
  [HandCategory.FULL_HOUSE]: "FULL_HOUSE",
  [HandCategory.FOUR_OF_A_KIND]: "FOUR_OF_A_KIND",
  [HandCategory.STRAIGHT_FLUSH]: "STRAIGHT_FLUSH",
  [HandCategory.ROYAL_FLUSH]: "ROYAL_FLUSH"
};

const TIER_NAME: Record<StrengthTier, TierName> = {
  [StrengthTier.TRASH]: "TRASH",
  [StrengthTier.MARGINAL]: "MARGINAL",
  [StrengthTier.WEAK_PLAYABLE]: "WEAK_PLAYABLE",
  [StrengthTier.DECENT]: "DECENT",
  [StrengthTier.STRONG]: "STRONG",
  [StrengthTier.PREMIUM]: "PREMIUM"
};

export interface HandResultPayload {
  category: CategoryName;
  primaryValue: number;
  secondaryValue: number;
  kickers: number[];
  description: string;
  cardsUsed: Array<{ rank: WireRank; suit: WireSuit }>;
}

export interface EvaluationResponse {
  type: "EVALUATION";
  requestId?: string;
  result: HandResultPayload;
  source: EvaluationSource;
}

export interface ClassificationResponse {
  type: "CLASSIFICATION";
  requestId?: string;
  tier: TierName;
  result: HandResultPayload;
  source: EvaluationSource;
}

export interface VersionResponse {
  type: "VERSION";
  requestId?: string;
  version: string;
}

export interface OkResponse {
  type: "OK";
  requestId?: string;
}

export interface ErrorResponse {
  type: "ERROR";
  requestId?: string;
  message: string;
}

export type ServerResponse =
  | EvaluationResponse
  | ClassificationResponse
  | VersionResponse
  | OkResponse
  | ErrorResponse;

export function tierName(tier: StrengthTier): TierName {
  return TIER_NAME[tier];
}

export function toPayload(result: HandResult): HandResultPayload {
  return {
    category: CATEGORY_NAME[result.category],
    primaryValue: result.primaryValue,
    secondaryValue: result.secondaryValue,
    kickers: [...result.kickers],
    description: result.description,
    cardsUsed: result.cardsUsed.map(toWireCard)
  };
}
