import { SubsetSampler } from "../sampler";
import { MemoryRound, MemoryTile, VocabEntry } from "../types";

export const MIN_MEMORY_PAIRS = 2;

export type MemoryDrawOptions = {
  pairCount: number;
  seed?: string;
  stateKey: string;
  force?: boolean;
};

export function createMemoryRound(chosen: VocabEntry[]): MemoryRound {
  const pairs = chosen.map((entry, index) => ({ pairId: `p${index + 1}`, de: entry.de, en: entry.en }));
  const tiles: MemoryTile[] = pairs.flatMap((pair) => [
    { tileId: `${pair.pairId}-de`, pairId: pair.pairId, lang: "de" as const, text: pair.de },
    { tileId: `${pair.pairId}-en`, pairId: pair.pairId, lang: "en" as const, text: pair.en },
  ]);
  return { pairs, tiles };
}

export function drawMemoryRound(
  sampler: SubsetSampler<VocabEntry>,
  entries: VocabEntry[],
  options: MemoryDrawOptions
): MemoryRound {
  if (entries.length < MIN_MEMORY_PAIRS) {
    throw new Error(`Word matching needs at least ${MIN_MEMORY_PAIRS} vocabulary entries.`);
  }
  const chosen = sampler.sample(entries, {
    mode: "k",
    k: options.pairCount,
    seed: options.seed,
    stateKey: options.stateKey,
    force: options.force,
  });
  return createMemoryRound(chosen);
}

export function tilesMatch(a: MemoryTile, b: MemoryTile): boolean {
  return a.tileId !== b.tileId && a.pairId === b.pairId;
}

export function solutionTable(round: MemoryRound): { de: string; en: string }[] {
  return round.pairs.map(({ de, en }) => ({ de, en }));
}
