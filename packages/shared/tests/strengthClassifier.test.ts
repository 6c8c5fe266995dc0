import { describe, expect, it } from "vitest";
import { DEFAULT_CLASSIFIER_CONFIG, withClassifierOverrides } from "../src/config";
import { combinations } from "../src/handEvaluator";
import { HybridHandRanker } from "../src/hybridRanker";
import { analyzeBoard, HandStrengthClassifier, hasDrawPotential } from "../src/strengthClassifier";
import { EvaluationSource, StrengthTier } from "../src/types";
import { fullDeck, hand, silentLogger } from "./helpers";

const classifier = new HandStrengthClassifier(new HybridHandRanker({ logger: silentLogger }));

describe("pre-flop classification", () => {
  it.each([
    ["As Ah", StrengthTier.STRONG],
    ["10c 10d", StrengthTier.STRONG],
    ["As Kd", StrengthTier.STRONG],
    ["Qh As", StrengthTier.STRONG],
    ["9s 9h", StrengthTier.DECENT],
    ["2c 2d", StrengthTier.DECENT],
    ["As Jd", StrengthTier.DECENT],
    ["9d 2c", StrengthTier.DECENT],
    ["8s 6s", StrengthTier.DECENT],
    ["Ks 3d", StrengthTier.DECENT],
    ["9s 8s", StrengthTier.DECENT],
    ["8s 7h", StrengthTier.WEAK_PLAYABLE],
    ["7c 2c", StrengthTier.WEAK_PLAYABLE],
    ["5c 4d", StrengthTier.WEAK_PLAYABLE],
    ["6s 4d", StrengthTier.MARGINAL],
    ["8h 5d", StrengthTier.TRASH],
    ["7d 2s", StrengthTier.TRASH]
  ])("classifies %s", (labels, tier) => {
    expect(classifier.classifyPreflop(hand(labels), false)).toBe(tier);
  });

  it.each([
    ["8h 5d", StrengthTier.WEAK_PLAYABLE],
    ["6s 4d", StrengthTier.WEAK_PLAYABLE],
    ["8c 7d", StrengthTier.DECENT],
    ["7s 4s", StrengthTier.DECENT],
    ["7d 2s", StrengthTier.TRASH]
  ])("widens %s heads-up", (labels, tier) => {
    expect(classifier.classifyPreflop(hand(labels), true)).toBe(tier);
  });

  it("gives every starting hand one tier and never a lower one heads-up", () => {
    const starting = combinations(fullDeck(), 2);
    expect(starting).toHaveLength(1326);
    for (const hole of starting) {
      const normal = classifier.classifyPreflop(hole, false);
      const headsUp = classifier.classifyPreflop(hole, true);
      expect(normal).toBeGreaterThanOrEqual(StrengthTier.TRASH);
      expect(normal).toBeLessThanOrEqual(StrengthTier.STRONG);
      expect(headsUp).toBeGreaterThanOrEqual(normal);
    }
  });

  it("takes its heads-up thresholds from config", () => {
    const strict = new HandStrengthClassifier(
      new HybridHandRanker({ logger: silentLogger }),
      withClassifierOverrides(DEFAULT_CLASSIFIER_CONFIG, { headsUp: { weakHighCardMin: 14 } })
    );
    expect(strict.classifyPreflop(hand("8h 5d"), true)).toBe(StrengthTier.TRASH);
  });

  it("treats malformed hole cards as trash", async () => {
    expect(classifier.classifyPreflop(hand("As"), false)).toBe(StrengthTier.TRASH);
    expect(await classifier.classify(hand("As"), [], true)).toBe(StrengthTier.TRASH);
    expect(await classifier.classify([], hand("Ah Kh Qh"), false)).toBe(StrengthTier.TRASH);
  });

  it("reports the starting hand alongside the tier", async () => {
    const assessed = await classifier.assess(hand("As Ah"), [], false);
    expect(assessed.tier).toBe(StrengthTier.STRONG);
    expect(assessed.result.description).toBe("Pocket As");
    expect(assessed.source).toBe(EvaluationSource.LOCAL);
  });
});

describe("post-flop classification", () => {
  it.each([
    ["As Ks", "Ah 7d 2c", StrengthTier.STRONG],
    ["As Ks", "Ah 7h 2h", StrengthTier.DECENT],
    ["Qs Jd", "Qh 9c 3d", StrengthTier.DECENT],
    ["6s 5s", "6h 8c 9d", StrengthTier.WEAK_PLAYABLE],
    ["6s 5s", "6h Kc 2d", StrengthTier.DECENT],
    ["4s 3d", "Kh Kd 8c", StrengthTier.DECENT],
    ["6s 5d", "6h Kc Kd", StrengthTier.DECENT],
    ["9s 8s", "7d 6c 5h", StrengthTier.PREMIUM],
    ["9s 8c", "7d 6d 5d", StrengthTier.STRONG],
    ["7s 7d", "7c Kh 2s", StrengthTier.STRONG],
    ["Ah 4h", "Kh 9h 2h", StrengthTier.PREMIUM],
    ["9s 9h", "9d 9c 2s", StrengthTier.PREMIUM],
    ["As 3d", "Kh 9c 5s", StrengthTier.WEAK_PLAYABLE],
    ["Qh 3h", "Kh 8h 2c", StrengthTier.WEAK_PLAYABLE],
    ["6c 5d", "8s 7h Kd", StrengthTier.WEAK_PLAYABLE],
    ["9h 8c", "Kh 4h 2d", StrengthTier.WEAK_PLAYABLE],
    ["6c 5d", "Kh 9s 2d", StrengthTier.WEAK_PLAYABLE],
    ["4s 2d", "Kh 9c 7s", StrengthTier.MARGINAL]
  ])("classifies %s on %s", async (hole, board, tier) => {
    expect(await classifier.classify(hand(hole), hand(board), false)).toBe(tier);
  });

  it("ignores the heads-up flag once the board is out", async () => {
    for (const [hole, board] of [
      ["6s 5s", "6h 8c 9d"],
      ["4s 2d", "Kh 9c 7s"],
      ["As Ks", "Ah 7h 2h"]
    ]) {
      expect(await classifier.classify(hand(hole), hand(board), true)).toBe(
        await classifier.classify(hand(hole), hand(board), false)
      );
    }
  });

  it("takes its draw thresholds from config", async () => {
    const tight = new HandStrengthClassifier(
      new HybridHandRanker({ logger: silentLogger }),
      withClassifierOverrides(DEFAULT_CLASSIFIER_CONFIG, { postflop: { flushDrawSuitMin: 4, straightDrawSpanMax: 3 } })
    );
    expect(await tight.classify(hand("9h 8c"), hand("Kh 4h 2d"), false)).toBe(StrengthTier.MARGINAL);
    expect(await tight.classify(hand("6c 5d"), hand("Kh 9s 2d"), false)).toBe(StrengthTier.MARGINAL);
  });

  it("uses the whole board on later streets", async () => {
    expect(await classifier.classify(hand("As Ks"), hand("Ah 7d 2c 9s Jd"), false)).toBe(StrengthTier.STRONG);
  });
});

describe("board texture", () => {
  it("counts a paired board as coordinated", () => {
    expect(analyzeBoard(hand("Kh Kd 2s"))).toEqual({
      flushPossible: false,
      pairOnBoard: true,
      coordinated: true
    });
  });

  it("spots a monotone connected board", () => {
    expect(analyzeBoard(hand("9h 8h 7h"))).toEqual({
      flushPossible: true,
      pairOnBoard: false,
      coordinated: true
    });
  });

  it("leaves a dry board alone", () => {
    expect(analyzeBoard(hand("Kh 8d 2c"))).toEqual({
      flushPossible: false,
      pairOnBoard: false,
      coordinated: false
    });
  });

  it("reports nothing before the flop", () => {
    expect(analyzeBoard(hand("Ah Kh"))).toEqual({
      flushPossible: false,
      pairOnBoard: false,
      coordinated: false
    });
    expect(hasDrawPotential(hand("Ah Kh"), hand("Qh Jh"))).toBe(false);
  });
});

describe("draw potential", () => {
  it("counts three of a hole card's suit as a flush draw", () => {
    expect(hasDrawPotential(hand("9h 8c"), hand("Kh 4h 2d"))).toBe(true);
  });

  it("counts three ranks within four as a straight draw", () => {
    expect(hasDrawPotential(hand("6c 5d"), hand("Kh 9s 2d"))).toBe(true);
    expect(hasDrawPotential(hand("5c 4d"), hand("Kh 3s 2d"))).toBe(true);
  });

  it("counts A-2-3 as a wheel draw", () => {
    expect(hasDrawPotential(hand("3c 2d"), hand("As 9h Kd"))).toBe(true);
  });

  it("finds nothing on a spread rainbow board", () => {
    expect(hasDrawPotential(hand("4s 2d"), hand("Kh 9c 7s"))).toBe(false);
  });
});
