import type { Action } from "./types";
import { Knowledge, neighbourBuckets } from "./knowledge";
import { pickRandom, RandomSource } from "./rng";

export type Deduction =
  | { kind: "certain"; action: Action }
  | { kind: "guess"; action: Action }
  | { kind: "none" };

/**
 * Single-point rules: each numbered cell is judged on its own neighbourhood.
 * All mine deductions are tried before any safe one, and only one action is
 * returned per call.
 */
export function deduceSinglePoint(knowledge: Knowledge, rng: RandomSource): Deduction {
  for (const cell of knowledge.numbers.values()) {
    const { covered, flaggedCount } = neighbourBuckets(knowledge, cell);
    if (covered.length > 0 && cell.value - flaggedCount === covered.length) {
      return { kind: "certain", action: { kind: "flag", cell: covered[0], reason: "single-point" } };
    }
  }

  for (const cell of knowledge.numbers.values()) {
    const { covered, flaggedCount } = neighbourBuckets(knowledge, cell);
    if (covered.length > 0 && cell.value - flaggedCount === 0) {
      return { kind: "certain", action: { kind: "reveal", cell: covered[0], reason: "single-point" } };
    }
  }

  if (knowledge.covered.size === 0) return { kind: "none" };

  const cell = pickRandom(Array.from(knowledge.covered.values()), rng);
  return { kind: "guess", action: { kind: "reveal", cell, reason: "random" } };
}
