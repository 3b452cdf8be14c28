import { describe, expect, it } from "vitest";
import { SubsetSampler } from "../sampler";
import { VocabEntry } from "../types";
import { createMemoryRound, drawMemoryRound, solutionTable, tilesMatch } from "./memory";

const entry = (de: string, en: string): VocabEntry => ({ classe: 9, page: 5, de, en });
const entries = [entry("Hund", "dog"), entry("Katze", "cat"), entry("Haus", "house"), entry("Baum", "tree")];

describe("memory round", () => {
  it("tags every pair with a stable id and two tiles", () => {
    const round = createMemoryRound(entries.slice(0, 2));
    expect(round.pairs).toEqual([
      { pairId: "p1", de: "Hund", en: "dog" },
      { pairId: "p2", de: "Katze", en: "cat" },
    ]);
    expect(round.tiles.map((tile) => tile.tileId)).toEqual(["p1-de", "p1-en", "p2-de", "p2-en"]);
  });

  it("matches tiles by pair id only", () => {
    const [hund, dog, katze] = createMemoryRound(entries.slice(0, 2)).tiles;
    expect(tilesMatch(hund, dog)).toBe(true);
    expect(tilesMatch(dog, hund)).toBe(true);
    expect(tilesMatch(hund, katze)).toBe(false);
    expect(tilesMatch(hund, hund)).toBe(false);
  });

  it("draws the same subset until a new one is requested", () => {
    const sampler = new SubsetSampler<VocabEntry>();
    const options = { pairCount: 2, seed: "m", stateKey: "memory|k9" };
    const first = drawMemoryRound(sampler, entries, options);
    expect(first.pairs).toHaveLength(2);
    expect(drawMemoryRound(sampler, entries, options)).toEqual(first);

    drawMemoryRound(sampler, entries, { ...options, force: true });
    expect(sampler.current("memory|k9")?.draw).toBe(1);
  });

  it("lists the solution", () => {
    const round = createMemoryRound(entries.slice(0, 1).concat(entries[3]));
    expect(solutionTable(round)).toEqual([
      { de: "Hund", en: "dog" },
      { de: "Baum", en: "tree" },
    ]);
  });

  it("needs at least two entries", () => {
    expect(() => drawMemoryRound(new SubsetSampler<VocabEntry>(), [entries[0]], { pairCount: 8, stateKey: "m" })).toThrow();
  });
});
