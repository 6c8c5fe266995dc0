import { InvalidCardError } from "./errors";
import type { Card, Suit, WireCard, WireRank, WireSuit } from "./types";

const RANK_BY_LABEL = new Map<string, number>([
  ["2", 2],
  ["3", 3],
  ["4", 4],
  ["5", 5],
  ["6", 6],
  ["7", 7],
  ["8", 8],
  ["9", 9],
  ["10", 10],
  ["J", 11],
  ["Q", 12],
  ["K", 13],
  ["A", 14]
]);

const SUIT_BY_NAME = new Map<string, Suit>([
  ["spades", "s"],
  ["hearts", "h"],
  ["diamonds", "d"],
  ["clubs", "c"],
  ["s", "s"],
  ["h", "h"],
  ["d", "d"],
  ["c", "c"]
]);

const WIRE_SUIT: Record<Suit, WireSuit> = {
  s: "spades",
  h: "hearts",
  d: "diamonds",
  c: "clubs"
};

/** Tie order used only to make evaluation output deterministic. */
export const SUIT_ORDER: readonly Suit[] = ["s", "h", "d", "c"];

export function parseCard(rank: string, suit: string): Card {
  const value = RANK_BY_LABEL.get(rank);
  const s = SUIT_BY_NAME.get(suit.trim().toLowerCase());
  if (value === undefined || s === undefined) {
    throw new InvalidCardError(rank, suit);
  }
  return { rank: value, suit: s };
}

export function parseCards(cards: readonly WireCard[]): Card[] {
  return cards.map((c) => parseCard(c.rank, c.suit));
}

export function rankValue(card: Card): number {
  return card.rank;
}

export function isBroadway(card: Card): boolean {
  return rankValue(card) >= 10;
}

export function rankLabel(value: number): WireRank {
  switch (value) {
    case 14:
      return "A";
    case 13:
      return "K";
    case 12:
      return "Q";
    case 11:
      return "J";
    case 10:
      return "10";
    case 9:
      return "9";
    case 8:
      return "8";
    case 7:
      return "7";
    case 6:
      return "6";
    case 5:
      return "5";
    case 4:
      return "4";
    case 3:
      return "3";
    case 2:
      return "2";
    default:
      throw new RangeError(`rank out of range: ${value}`);
  }
}

export function toWireCard(card: Card): { rank: WireRank; suit: WireSuit } {
  return { rank: rankLabel(card.rank), suit: WIRE_SUIT[card.suit] };
}

export function cardKey(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Short form for logs, e.g. "Th", "As". */
export function formatCard(card: Card): string {
  const label = card.rank === 10 ? "T" : rankLabel(card.rank);
  return `${label}${card.suit}`;
}

/** Rank descending, then suit order. */
export function compareCardsDesc(a: Card, b: Card): number {
  if (a.rank !== b.rank) return b.rank - a.rank;
  return SUIT_ORDER.indexOf(a.suit) - SUIT_ORDER.indexOf(b.suit);
}
