import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./config";
import { guessLetter } from "./games/hangman";
import { submitAnswer } from "./games/inputQuiz";
import { silentLogger } from "./logger";
import { buildPracticeView, openHangman, openMemory, openQuiz, openVerbs, PracticeRequest } from "./practice";
import { roundKey, SessionStore, updateRound } from "./session";
import { createRepository, VocabRepository } from "./vocab";

let root: string;

function writeCsv(relative: string, content: string) {
  const full = join(root, relative);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "practice-"));
  writeCsv("pages/klasse9/klasse9_page5.csv", "de,en\nHund,dog\ngehen,to go\netwas tun,to do sth\n");
  writeCsv("pages/klasse9/klasse9_page6.csv", "de,en\nBaum,tree\n");
  writeCsv("pages/klasse9/klasse9_page7.csv", "de,en\nwohlbekannt,well-known\n");
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

const page = (n: number): PracticeRequest => ({ selection: { classe: 9, page: n } });

describe("buildPracticeView", () => {
  it("reports missing data instead of failing", () => {
    const view = buildPracticeView(new VocabRepository(join(root, "nothing"), silentLogger), page(5));
    expect(view.games).toEqual([]);
    expect(view.advisories.map((a) => a.kind)).toEqual(["data_unavailable"]);
  });

  it("reports an empty page", () => {
    const view = buildPracticeView(new VocabRepository(root, silentLogger), page(9));
    expect(view.entries).toEqual([]);
    expect(view.advisories.map((a) => a.kind)).toEqual(["data_unavailable"]);
    expect(view.games.filter((g) => g.enabled).map((g) => g.game)).toEqual(["verbs"]);
  });

  it("enables every game for a full page", () => {
    const view = buildPracticeView(new VocabRepository(root, silentLogger), page(5));
    expect(view.entries).toHaveLength(3);
    expect(view.advisories).toEqual([]);
    expect(view.games.every((g) => g.enabled)).toBe(true);
  });

  it("disables matching for a single entry", () => {
    const view = buildPracticeView(new VocabRepository(root, silentLogger), page(6));
    const memory = view.games.find((g) => g.game === "memory");
    expect(memory?.enabled).toBe(false);
    expect(memory?.advisory?.kind).toBe("insufficient_data");
    expect(view.games.find((g) => g.game === "hangman")?.enabled).toBe(true);
  });

  it("applies the simple-word filter and reports when it removes everything", () => {
    const repository = new VocabRepository(root, silentLogger);
    const filtered = buildPracticeView(repository, { ...page(5), simpleOnly: true });
    expect(filtered.entries.map((e) => e.en)).toEqual(["dog", "to go"]);

    const exhausted = buildPracticeView(repository, { ...page(7), simpleOnly: true });
    expect(exhausted.entries).toEqual([]);
    expect(exhausted.advisories.map((a) => a.kind)).toEqual(["filter_exhaustion"]);
    expect(exhausted.games.map((g) => g.game)).toEqual(["verbs"]);
  });

  it("surfaces an unreadable file and keeps the rows of the others", () => {
    writeCsv("pages/klasse9_e/klasse9_e_page5.csv", "de,en\nBaum,tree\n");
    const repository = new VocabRepository(root, silentLogger);
    expect(repository.files()).toHaveLength(4);
    rmSync(join(root, "pages/klasse9_e"), { recursive: true });

    const view = buildPracticeView(repository, page(5));
    expect(view.entries.map((e) => e.en)).toEqual(["dog", "to go", "to do sth"]);
    expect(view.advisories.map((a) => a.kind)).toEqual(["file_parse_error"]);
    expect(view.games.every((g) => g.enabled)).toBe(true);
  });
});

describe("configuration", () => {
  it("roots the repository at the configured data directory", () => {
    const repository = createRepository({ ...DEFAULT_CONFIG, dataDir: join(root, "pages") }, silentLogger);
    expect(repository.root).toBe(join(root, "pages"));
    expect(repository.select(9, 5)).toHaveLength(3);
  });

  it("falls back to the configured filter for the view and the round key", () => {
    const config = { ...DEFAULT_CONFIG, filter: { ...DEFAULT_CONFIG.filter, minLength: 3 } };
    const request = { ...page(5), simpleOnly: true };
    const view = buildPracticeView(new VocabRepository(root, silentLogger), request, config);
    expect(view.entries.map((e) => e.en)).toEqual(["dog"]);

    const store = new SessionStore();
    openQuiz(store, request, view.entries, config, 0);
    expect(Array.from(store.quiz.keys())).toEqual(["quiz|k9|-|s5|simple:113|seed:"]);
  });

  it("lets the request filter win over the configured one", () => {
    const config = { ...DEFAULT_CONFIG, filter: { ...DEFAULT_CONFIG.filter, minLength: 3 } };
    const request = { ...page(5), simpleOnly: true, filter: { minLength: 2 } };
    const view = buildPracticeView(new VocabRepository(root, silentLogger), request, config);
    expect(view.entries.map((e) => e.en)).toEqual(["dog", "to go"]);
  });
});

describe("opening rounds from the session store", () => {
  it("keeps a hangman round across re-runs and separates pages", () => {
    const repository = new VocabRepository(root, silentLogger);
    const store = new SessionStore();
    const entries = buildPracticeView(repository, page(5)).entries;

    const first = openHangman(store, page(5), entries, DEFAULT_CONFIG, 0);
    const key = roundKey("hangman", page(5).selection, {});
    const guessed = updateRound(store.hangman, key, (current) => guessLetter(current ?? first, "z", 100));
    expect(openHangman(store, page(5), entries, DEFAULT_CONFIG, 200)).toBe(guessed);
    expect(guessed.maxFails).toBe(8);

    const other = openHangman(store, page(6), buildPracticeView(repository, page(6)).entries, DEFAULT_CONFIG, 0);
    expect(other.target).toBe("tree");
    expect(store.hangman.size).toBe(2);
  });

  it("keeps quiz progress across re-runs", () => {
    const store = new SessionStore();
    const entries = buildPracticeView(new VocabRepository(root, silentLogger), page(5)).entries;
    const round = openQuiz(store, page(5), entries, DEFAULT_CONFIG, 0);
    const key = roundKey("quiz", page(5).selection, {});
    store.quiz.set(key, submitAnswer(round, "x", 10));
    expect(openQuiz(store, page(5), entries, DEFAULT_CONFIG, 20).total).toBe(1);
  });

  it("redraws the matching subset only on request", () => {
    const store = new SessionStore();
    const entries = buildPracticeView(new VocabRepository(root, silentLogger), page(5)).entries;
    const request = { ...page(5), seed: "class-9" };
    const config = { ...DEFAULT_CONFIG, matchingPairs: 2 };
    const first = openMemory(store, request, entries, config);
    expect(openMemory(store, request, entries, config)).toEqual(first);
    openMemory(store, request, entries, config, true);
    expect(store.sampler.current(roundKey("memory", request.selection, { seed: "class-9" }))?.draw).toBe(1);
  });

  it("keeps one verb game per seed", () => {
    const store = new SessionStore();
    const game = openVerbs(store, "s", 0);
    expect(openVerbs(store, "s", 10)).toBe(game);
    expect(store.verbs.size).toBe(1);
  });
});
