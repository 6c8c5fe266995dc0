export type Suit = "c" | "d" | "h" | "s";

export interface Card {
  readonly rank: number;
  readonly suit: Suit;
}

export type WireRank = "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | "10" | "J" | "Q" | "K" | "A";

export type WireSuit = "spades" | "hearts" | "diamonds" | "clubs";

/** Card as it appears in upstream game-state payloads and on the oracle wire. */
export interface WireCard {
  rank: string;
  suit: string;
}

export enum HandCategory {
  HIGH_CARD = 1,
  ONE_PAIR = 2,
  TWO_PAIR = 3,
  THREE_OF_A_KIND = 4,
  STRAIGHT = 5,
  FLUSH = 6,
  FULL_HOUSE = 7,
  FOUR_OF_A_KIND = 8,
  STRAIGHT_FLUSH = 9,
  ROYAL_FLUSH = 10
}

export interface HandResult {
  category: HandCategory;
  primaryValue: number;
  secondaryValue: number;
  /** Descending; only consulted when category, primary and secondary tie. */
  kickers: number[];
  description: string;
  cardsUsed: Card[];
}

export enum EvaluationSource {
  ORACLE = "ORACLE",
  LOCAL = "LOCAL"
}

export interface RankedHand {
  result: HandResult;
  source: EvaluationSource;
}

export enum StrengthTier {
  TRASH = 0,
  MARGINAL = 1,
  WEAK_PLAYABLE = 2,
  DECENT = 3,
  STRONG = 4,
  PREMIUM = 5
}

export interface ClassifiedHand extends RankedHand {
  tier: StrengthTier;
}

export interface BoardTexture {
  flushPossible: boolean;
  pairOnBoard: boolean;
  coordinated: boolean;
}
