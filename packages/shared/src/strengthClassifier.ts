import { isBroadway } from "./cards";
import { DEFAULT_CLASSIFIER_CONFIG, type ClassifierConfig, type PostflopThresholds } from "./config";
import type { HybridHandRanker } from "./hybridRanker";
import {
  HandCategory,
  StrengthTier,
  type BoardTexture,
  type Card,
  type ClassifiedHand,
  type HandResult
} from "./types";

const FLOP_SIZE = 3;

function countBy<T>(items: readonly T[]): Map<T, number> {
  const counts = new Map<T, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return counts;
}

export function analyzeBoard(board: readonly Card[]): BoardTexture {
  if (board.length < FLOP_SIZE) {
    return { flushPossible: false, pairOnBoard: false, coordinated: false };
  }

  const suitCounts = countBy(board.map((c) => c.suit));
  const rankCounts = countBy(board.map((c) => c.rank));
  const ranks = board.map((c) => c.rank).sort((a, b) => a - b);

  // a paired board counts as coordinated
  let coordinated = false;
  for (let i = 0; i + 1 < ranks.length; i += 1) {
    if (ranks[i + 1] - ranks[i] <= 2) coordinated = true;
  }

  return {
    flushPossible: [...suitCounts.values()].some((n) => n >= 3),
    pairOnBoard: [...rankCounts.values()].some((n) => n >= 2),
    coordinated
  };
}

/** Three distinct ranks no wider than `span`, or A-2-3. */
function hasStraightDraw(ranks: readonly number[], span: number): boolean {
  const distinct = [...new Set(ranks)].sort((a, b) => a - b);
  for (let i = 0; i + 2 < distinct.length; i += 1) {
    if (distinct[i + 2] - distinct[i] <= span) return true;
  }
  return [14, 2, 3].every((r) => distinct.includes(r));
}

/**
 * Live draws for an unmade hand: an overcard to the board, a hole card's suit
 * repeated on the board, or ranks close enough to run into a straight.
 */
export function hasDrawPotential(
  hole: readonly Card[],
  board: readonly Card[],
  thresholds: PostflopThresholds = DEFAULT_CLASSIFIER_CONFIG.postflop
): boolean {
  if (hole.length !== 2 || board.length < FLOP_SIZE) return false;

  const boardHigh = Math.max(...board.map((c) => c.rank));
  if (hole.some((c) => c.rank > boardHigh)) return true;

  const all = [...hole, ...board];
  const suitCounts = countBy(all.map((c) => c.suit));
  if (hole.some((c) => (suitCounts.get(c.suit) ?? 0) >= thresholds.flushDrawSuitMin)) return true;

  return hasStraightDraw(all.map((c) => c.rank), thresholds.straightDrawSpanMax);
}

function demote(tier: StrengthTier): StrengthTier {
  return Math.max(StrengthTier.MARGINAL, tier - 1);
}

/**
 * Buckets a hand into the coarse tier betting logic works from. Stateless:
 * the result depends only on the cards, the board and the heads-up flag.
 */
export class HandStrengthClassifier {
  private readonly ranker: HybridHandRanker;
  private readonly config: ClassifierConfig;

  constructor(ranker: HybridHandRanker, config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG) {
    this.ranker = ranker;
    this.config = config;
  }

  async classify(hole: readonly Card[], board: readonly Card[], isHeadsUp: boolean): Promise<StrengthTier> {
    const { tier } = await this.assess(hole, board, isHeadsUp);
    return tier;
  }

  async assess(hole: readonly Card[], board: readonly Card[], isHeadsUp: boolean): Promise<ClassifiedHand> {
    const ranked = await this.ranker.evaluate(hole, board);
    if (hole.length !== 2) {
      return { ...ranked, tier: StrengthTier.TRASH };
    }
    const tier =
      board.length < FLOP_SIZE
        ? this.classifyPreflop(hole, isHeadsUp)
        : this.classifyMadeHand(hole, board, ranked.result);
    return { ...ranked, tier };
  }

  classifyPreflop(hole: readonly Card[], isHeadsUp: boolean): StrengthTier {
    if (hole.length !== 2) return StrengthTier.TRASH;

    const [a, b] = hole;
    const hi = Math.max(a.rank, b.rank);
    const lo = Math.min(a.rank, b.rank);
    const gap = hi - lo;
    const pair = gap === 0;
    const suited = a.suit === b.suit;
    const p = this.config.preflop;
    const hu = this.config.headsUp;

    if ((pair && hi >= p.strongPairMin) || (hi === 14 && (lo === 13 || lo === 12))) {
      return StrengthTier.STRONG;
    }

    const decent =
      pair ||
      hi >= p.decentHighCardMin ||
      (suited && gap <= p.decentSuitedGapMax) ||
      hi === 14 ||
      hi === 13 ||
      (isBroadway(a) && isBroadway(b));
    const decentHeadsUp = isHeadsUp && ((suited && gap <= hu.decentSuitedGapMax) || lo >= hu.decentBothCardsMin);
    if (decent || decentHeadsUp) return StrengthTier.DECENT;

    const weak = suited || gap <= p.weakConnectedGapMax || hi >= p.weakHighCardMin || lo >= p.weakBothCardsMin;
    const weakHeadsUp = isHeadsUp && (gap <= hu.weakConnectedGapMax || hi >= hu.weakHighCardMin);
    if (weak || weakHeadsUp) return StrengthTier.WEAK_PLAYABLE;

    if (hi >= p.marginalHighCardMin || (suited && gap <= p.marginalSuitedGapMax) || gap <= p.marginalGapMax) {
      return StrengthTier.MARGINAL;
    }
    return StrengthTier.TRASH;
  }

  classifyMadeHand(hole: readonly Card[], board: readonly Card[], result: HandResult): StrengthTier {
    const texture = analyzeBoard(board);
    const q = this.config.postflop;
    const dangerous = texture.pairOnBoard || texture.flushPossible;

    switch (result.category) {
      case HandCategory.ROYAL_FLUSH:
      case HandCategory.STRAIGHT_FLUSH:
      case HandCategory.FOUR_OF_A_KIND:
      case HandCategory.FULL_HOUSE:
      case HandCategory.FLUSH:
        return StrengthTier.PREMIUM;
      case HandCategory.STRAIGHT:
        return dangerous ? StrengthTier.STRONG : StrengthTier.PREMIUM;
      case HandCategory.THREE_OF_A_KIND:
        return StrengthTier.STRONG;
      case HandCategory.TWO_PAIR: {
        const base = result.primaryValue >= q.twoPairStrongMin ? StrengthTier.STRONG : StrengthTier.DECENT;
        return dangerous ? demote(base) : base;
      }
      case HandCategory.ONE_PAIR: {
        let base: StrengthTier;
        if (result.primaryValue >= q.topPairStrongMin) base = StrengthTier.STRONG;
        else if (result.primaryValue >= q.pairDecentMin) base = StrengthTier.DECENT;
        else if (texture.coordinated) base = StrengthTier.WEAK_PLAYABLE;
        else base = StrengthTier.DECENT;
        return dangerous ? demote(base) : base;
      }
      case HandCategory.HIGH_CARD:
        return hasDrawPotential(hole, board, q) ? StrengthTier.WEAK_PLAYABLE : StrengthTier.MARGINAL;
    }
  }
}
