import { z } from "zod";
import { parseCards, toWireCard } from "./cards";
import type { OracleConfig } from "./config";
import { InvalidCardError, OracleUnavailableError } from "./errors";
import { HandCategory, type Card } from "./types";

const wireCardSchema = z.object({
  rank: z.string(),
  suit: z.string()
});

const oracleResponseSchema = z.object({
  rank: z.number().int().min(0).max(8),
  value: z.number().int(),
  second_value: z.number().int(),
  kickers: z.array(z.number().int()),
  cards_used: z.array(wireCardSchema),
  cards: z.array(wireCardSchema)
});

export type OracleResponse = z.infer<typeof oracleResponseSchema>;

export interface OracleResult {
  code: number;
  category: HandCategory;
  value: number;
  secondValue: number;
  kickers: number[];
  cardsUsed: Card[];
  cards: Card[];
}

export interface RankOracle {
  rank(cards: readonly Card[]): Promise<OracleResult>;
}

export interface RankOracleClientOptions
  extends Pick<OracleConfig, "url" | "requestTimeoutMs" | "budgetMs"> {
  fetch?: typeof fetch;
}

const CATEGORY_BY_CODE: readonly HandCategory[] = [
  HandCategory.HIGH_CARD,
  HandCategory.ONE_PAIR,
  HandCategory.TWO_PAIR,
  HandCategory.THREE_OF_A_KIND,
  HandCategory.STRAIGHT,
  HandCategory.FLUSH,
  HandCategory.FULL_HOUSE,
  HandCategory.FOUR_OF_A_KIND,
  HandCategory.STRAIGHT_FLUSH
];

/**
 * The oracle reports straight flushes and royal flushes under the same code;
 * an ace-high code 8 is a royal flush.
 */
export function categoryFromOracleCode(code: number, value: number): HandCategory {
  const category = CATEGORY_BY_CODE[code];
  if (category === undefined) {
    throw new OracleUnavailableError(`unknown rank code ${code}`);
  }
  if (category === HandCategory.STRAIGHT_FLUSH && value === 14) {
    return HandCategory.ROYAL_FLUSH;
  }
  return category;
}

export function toOracleResult(body: OracleResponse): OracleResult {
  return {
    code: body.rank,
    category: categoryFromOracleCode(body.rank, body.value),
    value: body.value,
    secondValue: body.second_value,
    kickers: body.kickers,
    cardsUsed: parseCards(body.cards_used),
    cards: parseCards(body.cards)
  };
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Single-attempt client for the external hand ranking service. Every failure
 * surfaces as OracleUnavailableError.
 */
export class RankOracleClient implements RankOracle {
  private readonly url: string;
  private readonly requestTimeoutMs: number;
  private readonly budgetMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RankOracleClientOptions) {
    this.url = options.url;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.budgetMs = Math.max(options.budgetMs, options.requestTimeoutMs);
    this.fetchImpl = options.fetch ?? fetch.bind(globalThis);
  }

  async rank(cards: readonly Card[]): Promise<OracleResult> {
    const controller = new AbortController();
    const hardTimer = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    let budgetTimer: ReturnType<typeof setTimeout> | undefined;
    const budget = new Promise<never>((_, reject) => {
      budgetTimer = setTimeout(
        () => reject(new OracleUnavailableError(`no answer within ${this.budgetMs}ms`)),
        this.budgetMs
      );
    });

    try {
      return await Promise.race([this.request(cards, controller.signal), budget]);
    } catch (err) {
      if (err instanceof OracleUnavailableError) throw err;
      throw new OracleUnavailableError(`rank oracle call failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(hardTimer);
      clearTimeout(budgetTimer);
      controller.abort();
    }
  }

  private async request(cards: readonly Card[], signal: AbortSignal): Promise<OracleResult> {
    const url = new URL(this.url);
    url.searchParams.set("cards", JSON.stringify(cards.map(toWireCard)));

    const res = await this.fetchImpl(url, { method: "GET", signal });
    if (!res.ok) {
      throw new OracleUnavailableError(`rank oracle returned status ${res.status}`);
    }

    const body: unknown = await res.json();
    const parsed = oracleResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OracleUnavailableError(`malformed rank oracle response: ${parsed.error.message}`);
    }

    try {
      return toOracleResult(parsed.data);
    } catch (err) {
      if (err instanceof InvalidCardError) {
        throw new OracleUnavailableError(`rank oracle returned ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}
