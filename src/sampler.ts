import { createHash } from "node:crypto";
import { createRandom, permutation } from "./random";
import { SampleMode, SubsetSelection } from "./types";

export type SampleItem = {
  de: string;
  en: string;
};

export type SampleOptions = {
  mode: SampleMode;
  k?: number;
  seed?: string;
  stateKey: string;
  force?: boolean;
};

export function fingerprintEntries(items: SampleItem[]): string {
  const hash = createHash("sha256");
  for (const item of items) {
    hash.update(`${item.de}\u0000${item.en}\n`);
  }
  return hash.digest("hex");
}

/**
 * Keeps one sampled subset per state key and hands back the same array until
 * the source items, the mode or k change, or a redraw is forced.
 */
export class SubsetSampler<T extends SampleItem = SampleItem> {
  private selections = new Map<string, SubsetSelection<T>>();

  sample(items: T[], options: SampleOptions): T[] {
    const { mode, k = items.length, seed = "", stateKey, force = false } = options;
    const fingerprint = fingerprintEntries(items);
    const previous = this.selections.get(stateKey);

    const stale =
      !previous ||
      force ||
      previous.fingerprint !== fingerprint ||
      previous.mode !== mode ||
      (mode === "k" && previous.k !== k);
    if (previous && !stale) return previous.chosen;

    const draw = previous && force ? previous.draw + 1 : 0;
    const selection: SubsetSelection<T> = {
      fingerprint,
      mode,
      k,
      draw,
      chosen: drawSubset(items, mode, k, seed, draw),
    };
    this.selections.set(stateKey, selection);
    return selection.chosen;
  }

  current(stateKey: string): SubsetSelection<T> | undefined {
    return this.selections.get(stateKey);
  }

  invalidate(stateKey?: string) {
    if (stateKey === undefined) {
      this.selections.clear();
      return;
    }
    this.selections.delete(stateKey);
  }
}

function drawSubset<T>(items: T[], mode: SampleMode, k: number, seed: string, draw: number): T[] {
  if (mode === "all" || k >= items.length) return [...items];
  const random = createRandom(seed ? `${seed}:${draw}` : null);
  const size = Math.max(2, k);
  return permutation(items.length, random)
    .slice(0, size)
    .map((index) => items[index]);
}
