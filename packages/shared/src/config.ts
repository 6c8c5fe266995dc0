import { z } from "zod";

export interface OracleConfig {
  enabled: boolean;
  url: string;
  /** Hard deadline on the request itself; the fetch is aborted. */
  requestTimeoutMs: number;
  /** Caller-visible budget for the whole call, body included. */
  budgetMs: number;
}

export interface PreflopThresholds {
  strongPairMin: number;
  decentHighCardMin: number;
  decentSuitedGapMax: number;
  weakConnectedGapMax: number;
  weakHighCardMin: number;
  weakBothCardsMin: number;
  marginalHighCardMin: number;
  marginalSuitedGapMax: number;
  marginalGapMax: number;
}

/** Extra predicates ORed in when only two players are left. */
export interface HeadsUpWidening {
  decentSuitedGapMax: number;
  decentBothCardsMin: number;
  weakConnectedGapMax: number;
  weakHighCardMin: number;
}

export interface PostflopThresholds {
  topPairStrongMin: number;
  pairDecentMin: number;
  twoPairStrongMin: number;
  /** Cards of a hole card's suit, board included, that count as a flush draw. */
  flushDrawSuitMin: number;
  /** Widest spread of three distinct ranks that counts as a straight draw. */
  straightDrawSpanMax: number;
}

export interface ClassifierConfig {
  preflop: PreflopThresholds;
  headsUp: HeadsUpWidening;
  postflop: PostflopThresholds;
}

export interface AppConfig {
  server: { port: number };
  oracle: OracleConfig;
  classifier: ClassifierConfig;
}

export const DEFAULT_ORACLE_URL = "https://rainman.leanpoker.org/rank";

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = deepFreeze({
  preflop: {
    strongPairMin: 10,
    decentHighCardMin: 9,
    decentSuitedGapMax: 2,
    weakConnectedGapMax: 1,
    weakHighCardMin: 11,
    weakBothCardsMin: 8,
    marginalHighCardMin: 10,
    marginalSuitedGapMax: 3,
    marginalGapMax: 2
  },
  headsUp: {
    decentSuitedGapMax: 3,
    decentBothCardsMin: 7,
    weakConnectedGapMax: 2,
    weakHighCardMin: 8
  },
  postflop: {
    topPairStrongMin: 13,
    pairDecentMin: 10,
    twoPairStrongMin: 10,
    flushDrawSuitMin: 3,
    straightDrawSpanMax: 4
  }
});

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v) => !["0", "false", "off", "no"].includes(v));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  RANK_ORACLE_ENABLED: booleanFlag.default("true"),
  RANK_ORACLE_URL: z.string().url().default(DEFAULT_ORACLE_URL),
  RANK_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  RANK_ORACLE_BUDGET_MS: z.coerce.number().int().positive().default(5000)
});

function deepFreeze<T extends object>(value: T): T {
  for (const v of Object.values(value)) {
    if (typeof v === "object" && v !== null) deepFreeze(v);
  }
  return Object.freeze(value);
}

export function withClassifierOverrides(
  base: ClassifierConfig,
  overrides: {
    preflop?: Partial<PreflopThresholds>;
    headsUp?: Partial<HeadsUpWidening>;
    postflop?: Partial<PostflopThresholds>;
  }
): ClassifierConfig {
  return deepFreeze({
    preflop: { ...base.preflop, ...overrides.preflop },
    headsUp: { ...base.headsUp, ...overrides.headsUp },
    postflop: { ...base.postflop, ...overrides.postflop }
  });
}

/**
 * Builds the process-wide configuration once at startup. Throws a ZodError on
 * malformed values.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  classifier: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG
): AppConfig {
  const parsed = envSchema.parse(env);
  return deepFreeze({
    server: { port: parsed.PORT },
    oracle: {
      enabled: parsed.RANK_ORACLE_ENABLED,
      url: parsed.RANK_ORACLE_URL,
      requestTimeoutMs: parsed.RANK_ORACLE_TIMEOUT_MS,
      budgetMs: Math.max(parsed.RANK_ORACLE_BUDGET_MS, parsed.RANK_ORACLE_TIMEOUT_MS)
    },
    classifier
  });
}
