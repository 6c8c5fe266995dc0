import { compareCardsDesc, sameCard } from "./cards";
import type { OracleConfig } from "./config";
import { InvalidHandError, OracleUnavailableError } from "./errors";
import { assertDistinct, describeHand, evaluateHand, invalidHoleCardsResult } from "./handEvaluator";
import { RankOracleClient, type OracleResult, type RankOracle } from "./rankOracle";
import { EvaluationSource, HandCategory, type Card, type HandResult, type RankedHand } from "./types";

const MAX_COMMUNITY_CARDS = 5;

const KICKER_COUNT: Record<HandCategory, number> = {
  [HandCategory.HIGH_CARD]: 4,
  [HandCategory.ONE_PAIR]: 3,
  [HandCategory.TWO_PAIR]: 1,
  [HandCategory.THREE_OF_A_KIND]: 2,
  [HandCategory.STRAIGHT]: 0,
  [HandCategory.FLUSH]: 4,
  [HandCategory.FULL_HOUSE]: 0,
  [HandCategory.FOUR_OF_A_KIND]: 1,
  [HandCategory.STRAIGHT_FLUSH]: 0,
  [HandCategory.ROYAL_FLUSH]: 0
};

function hasSecondary(category: HandCategory): boolean {
  return category === HandCategory.FULL_HOUSE || category === HandCategory.TWO_PAIR;
}

function isRankValue(v: number): boolean {
  return Number.isInteger(v) && v >= 2 && v <= 14;
}

/**
 * The oracle lists the cards forming the combination in cards_used; kickers
 * come from whatever else it returned.
 */
export function reconstructKickers(r: OracleResult): number[] {
  const count = KICKER_COUNT[r.category];
  if (count === 0) return [];

  let pool: number[];
  if (r.category === HandCategory.FLUSH) {
    pool = r.cardsUsed.map((c) => c.rank);
  } else if (r.category === HandCategory.HIGH_CARD) {
    pool = r.cards.map((c) => c.rank);
  } else {
    pool = r.cards.filter((c) => !r.cardsUsed.some((u) => sameCard(u, c))).map((c) => c.rank);
  }

  if (r.category === HandCategory.FLUSH || r.category === HandCategory.HIGH_CARD) {
    const top = pool.indexOf(r.value);
    if (top >= 0) pool.splice(top, 1);
  }

  return pool.sort((a, b) => b - a).slice(0, count);
}

export function fromOracleResult(r: OracleResult): HandResult {
  const secondaryValue = hasSecondary(r.category) ? r.secondValue : 0;
  if (!isRankValue(r.value) || (hasSecondary(r.category) && !isRankValue(secondaryValue))) {
    throw new OracleUnavailableError(`rank oracle returned out-of-range values ${r.value}/${r.secondValue}`);
  }
  return {
    category: r.category,
    primaryValue: r.value,
    secondaryValue,
    kickers: reconstructKickers(r),
    description: describeHand(r.category, r.value, secondaryValue),
    cardsUsed: [...r.cardsUsed].sort(compareCardsDesc)
  };
}

export interface HybridHandRankerOptions {
  /** Absent means local evaluation only. */
  oracle?: RankOracle;
  logger?: Pick<Console, "warn">;
}

/**
 * Asks the rank oracle first when there is a full hand to rank, and falls
 * back to the local evaluator on any oracle failure.
 */
export class HybridHandRanker {
  private readonly oracle: RankOracle | undefined;
  private readonly logger: Pick<Console, "warn">;

  constructor(options: HybridHandRankerOptions = {}) {
    this.oracle = options.oracle;
    this.logger = options.logger ?? console;
  }

  get oracleEnabled(): boolean {
    return this.oracle !== undefined;
  }

  async evaluate(holeCards: readonly Card[], communityCards: readonly Card[]): Promise<RankedHand> {
    if (holeCards.length !== 2) {
      return { result: invalidHoleCardsResult(), source: EvaluationSource.LOCAL };
    }
    if (communityCards.length > MAX_COMMUNITY_CARDS) {
      throw new InvalidHandError(`expected at most ${MAX_COMMUNITY_CARDS} community cards, got ${communityCards.length}`);
    }

    const cards = [...holeCards, ...communityCards];
    assertDistinct(cards);

    if (cards.length >= 5 && this.oracle) {
      try {
        const ranked = await this.oracle.rank(cards);
        return { result: fromOracleResult(ranked), source: EvaluationSource.ORACLE };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[ranker] rank oracle unavailable, using local evaluation: ${reason}`);
      }
    }

    return { result: evaluateHand(cards), source: EvaluationSource.LOCAL };
  }
}

export function createHandRanker(
  config: OracleConfig,
  deps: { fetch?: typeof fetch; logger?: Pick<Console, "warn"> } = {}
): HybridHandRanker {
  const oracle = config.enabled
    ? new RankOracleClient({
        url: config.url,
        requestTimeoutMs: config.requestTimeoutMs,
        budgetMs: config.budgetMs,
        fetch: deps.fetch
      })
    : undefined;
  return new HybridHandRanker({ oracle, logger: deps.logger });
}
