import { cardKey, compareCardsDesc, rankLabel } from "./cards";
import { InvalidHandError } from "./errors";
import { HandCategory, type Card, type HandResult } from "./types";

export const MAX_HAND_CARDS = 7;
export const INVALID_HOLE_CARDS = "Invalid hole cards";

type RankGroup = [rank: number, count: number];

function sortDesc(nums: number[]): number[] {
  return [...nums].sort((a, b) => b - a);
}

/** High card of a five-rank run; the wheel counts as 5-high. */
function findStraightHigh(ranks: number[]): number | null {
  const uniq = sortDesc([...new Set(ranks)]);
  if (uniq.length !== 5) return null;
  if (uniq[0] - uniq[4] === 4) return uniq[0];
  if (uniq[0] === 14 && uniq[1] === 5) return 5;
  return null;
}

function rankGroups(ranks: number[]): RankGroup[] {
  const rankCounts = new Map<number, number>();
  for (const r of ranks) {
    rankCounts.set(r, (rankCounts.get(r) ?? 0) + 1);
  }
  return [...rankCounts.entries()].sort((a, b) => {
    if (b[1] !== a[1]) return b[1] - a[1];
    return b[0] - a[0];
  });
}

function plural(rank: number): string {
  return `${rankLabel(rank)}s`;
}

export function describeHand(category: HandCategory, primary: number, secondary: number): string {
  switch (category) {
    case HandCategory.ROYAL_FLUSH:
      return "Royal Flush";
    case HandCategory.STRAIGHT_FLUSH:
      return `Straight Flush, ${rankLabel(primary)} high`;
    case HandCategory.FOUR_OF_A_KIND:
      return `Four of a Kind, ${plural(primary)}`;
    case HandCategory.FULL_HOUSE:
      return `Full House, ${plural(primary)} over ${plural(secondary)}`;
    case HandCategory.FLUSH:
      return `Flush, ${rankLabel(primary)} high`;
    case HandCategory.STRAIGHT:
      return `Straight, ${rankLabel(primary)} high`;
    case HandCategory.THREE_OF_A_KIND:
      return `Three of a Kind, ${plural(primary)}`;
    case HandCategory.TWO_PAIR:
      return `Two Pair, ${plural(primary)} and ${plural(secondary)}`;
    case HandCategory.ONE_PAIR:
      return `One Pair, ${plural(primary)}`;
    case HandCategory.HIGH_CARD:
      return `High Card, ${rankLabel(primary)}`;
  }
}

function made(
  category: HandCategory,
  primaryValue: number,
  secondaryValue: number,
  kickers: number[],
  cardsUsed: Card[]
): HandResult {
  return {
    category,
    primaryValue,
    secondaryValue,
    kickers,
    description: describeHand(category, primaryValue, secondaryValue),
    cardsUsed
  };
}

/**
 * Scores one to five cards already in canonical order. Straights and flushes
 * need all five.
 */
function scoreCards(cards: Card[]): HandResult {
  const ranks = cards.map((c) => c.rank);
  const groups = rankGroups(ranks);
  const five = cards.length === 5;
  const isFlush = five && cards.every((c) => c.suit === cards[0].suit);
  const straightHigh = five ? findStraightHigh(ranks) : null;
  const [top] = groups;
  const next: RankGroup | undefined = groups[1];
  const singles = (skip: number) => groups.slice(skip).map((g) => g[0]);

  if (isFlush && straightHigh !== null) {
    const category = straightHigh === 14 ? HandCategory.ROYAL_FLUSH : HandCategory.STRAIGHT_FLUSH;
    return made(category, straightHigh, 0, [], cards);
  }

  if (top[1] === 4) {
    return made(HandCategory.FOUR_OF_A_KIND, top[0], 0, singles(1), cards);
  }

  if (top[1] === 3 && next?.[1] === 2) {
    return made(HandCategory.FULL_HOUSE, top[0], next[0], [], cards);
  }

  if (isFlush) {
    const sorted = sortDesc(ranks);
    return made(HandCategory.FLUSH, sorted[0], 0, sorted.slice(1), cards);
  }

  if (straightHigh !== null) {
    return made(HandCategory.STRAIGHT, straightHigh, 0, [], cards);
  }

  if (top[1] === 3) {
    return made(HandCategory.THREE_OF_A_KIND, top[0], 0, singles(1), cards);
  }

  if (top[1] === 2 && next?.[1] === 2) {
    return made(HandCategory.TWO_PAIR, top[0], next[0], singles(2), cards);
  }

  if (top[1] === 2) {
    return made(HandCategory.ONE_PAIR, top[0], 0, singles(1), cards);
  }

  const sorted = sortDesc(ranks);
  return made(HandCategory.HIGH_CARD, sorted[0], 0, sorted.slice(1), cards);
}

export function compareHandResults(a: HandResult, b: HandResult): -1 | 0 | 1 {
  const av = [a.category, a.primaryValue, a.secondaryValue, ...a.kickers];
  const bv = [b.category, b.primaryValue, b.secondaryValue, ...b.kickers];
  const n = Math.max(av.length, bv.length);
  for (let i = 0; i < n; i += 1) {
    const ar = av[i] ?? 0;
    const br = bv[i] ?? 0;
    if (ar !== br) return ar > br ? 1 : -1;
  }
  return 0;
}

export function combinations<T>(items: readonly T[], k: number): T[][] {
  if (k === 0) return [[]];
  const out: T[][] = [];
  for (let i = 0; i <= items.length - k; i += 1) {
    for (const rest of combinations(items.slice(i + 1), k - 1)) {
      out.push([items[i], ...rest]);
    }
  }
  return out;
}

export function invalidHoleCardsResult(): HandResult {
  return {
    category: HandCategory.HIGH_CARD,
    primaryValue: 0,
    secondaryValue: 0,
    kickers: [],
    description: INVALID_HOLE_CARDS,
    cardsUsed: []
  };
}

/** Pre-flop descriptor: "Pocket Qs", "Suited KQ", "Offsuit A7". */
export function describeStartingHand(a: Card, b: Card): HandResult {
  const [high, low] = [a, b].sort(compareCardsDesc);
  const labels = `${rankLabel(high.rank)}${rankLabel(low.rank)}`;
  let description: string;
  if (high.rank === low.rank) {
    description = `Pocket ${plural(high.rank)}`;
  } else if (high.suit === low.suit) {
    description = `Suited ${labels}`;
  } else {
    description = `Offsuit ${labels}`;
  }
  return {
    category: HandCategory.HIGH_CARD,
    primaryValue: high.rank,
    secondaryValue: low.rank,
    kickers: [high.rank, low.rank],
    description,
    cardsUsed: [high, low]
  };
}

export function assertDistinct(cards: readonly Card[]): void {
  const seen = new Set<string>();
  for (const c of cards) {
    const key = cardKey(c);
    if (seen.has(key)) throw new InvalidHandError(`duplicate card ${key}`);
    seen.add(key);
  }
}

export function evaluateFive(cards: readonly Card[]): HandResult {
  if (cards.length !== 5) {
    throw new InvalidHandError(`expected 5 cards, got ${cards.length}`);
  }
  assertDistinct(cards);
  return scoreCards([...cards].sort(compareCardsDesc));
}

/**
 * Best five-card hand out of 2..7 distinct cards. Two cards give a starting
 * hand descriptor; fewer give the invalid-hole-cards sentinel.
 */
export function evaluateHand(cards: readonly Card[]): HandResult {
  if (cards.length > MAX_HAND_CARDS) {
    throw new InvalidHandError(`expected at most ${MAX_HAND_CARDS} cards, got ${cards.length}`);
  }
  if (cards.length < 2) return invalidHoleCardsResult();
  assertDistinct(cards);

  const sorted = [...cards].sort(compareCardsDesc);
  if (sorted.length === 2) return describeStartingHand(sorted[0], sorted[1]);
  if (sorted.length < 5) return scoreCards(sorted);

  return combinations(sorted, 5)
    .map(scoreCards)
    .reduce((best, hand) => (compareHandResults(hand, best) > 0 ? hand : best));
}

export function compareHands(a: readonly Card[], b: readonly Card[]): -1 | 0 | 1 {
  return compareHandResults(evaluateHand(a), evaluateHand(b));
}
