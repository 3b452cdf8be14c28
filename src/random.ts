import { createHash } from "node:crypto";

export type RandomSource = {
  next(): number;
};

/**
 * Deterministic generator for reproducible rounds: the same seed string
 * yields the same sequence in every session.
 */
export class SeededRandom implements RandomSource {
  private seed: number;

  constructor(seed: string) {
    const hash = createHash("sha256").update(seed).digest("hex");
    this.seed = parseInt(hash.substring(0, 8), 16) % 233280;
  }

  next(): number {
    this.seed = (this.seed * 9301 + 49297) % 233280;
    return this.seed / 233280;
  }
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

export function createRandom(seed?: string | null): RandomSource {
  return seed ? new SeededRandom(seed) : systemRandom;
}

export function randomInt(random: RandomSource, max: number): number {
  return Math.floor(random.next() * max);
}

export function shuffle<T>(list: T[], random: RandomSource = systemRandom): T[] {
  const copy = [...list];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = randomInt(random, i + 1);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

export function permutation(length: number, random: RandomSource = systemRandom): number[] {
  return shuffle(
    Array.from({ length }, (_, index) => index),
    random
  );
}
