import { parseCard, SUIT_ORDER } from "../src/cards";
import type { Card } from "../src/types";

/** "As", "10h", "Qd" */
export const c = (label: string): Card => parseCard(label.slice(0, -1), label.slice(-1));

export const hand = (labels: string): Card[] => labels.split(" ").map(c);

export const silentLogger = { warn: () => undefined };

export function fullDeck(): Card[] {
  return SUIT_ORDER.flatMap((suit) => Array.from({ length: 13 }, (_, i) => ({ rank: i + 2, suit })));
}

/** mulberry32: values in [0, 1), reproducible per seed. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export const dealCards = (count: number, seed: number): Card[] =>
  shuffled(fullDeck(), seededRandom(seed)).slice(0, count);
