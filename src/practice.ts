import { AppConfig, DEFAULT_CONFIG } from "./config";
import { createHangmanRound } from "./games/hangman";
import { ensureQuizRound } from "./games/inputQuiz";
import { createIrregularVerbGame } from "./games/irregularVerbs";
import { drawMemoryRound, MIN_MEMORY_PAIRS } from "./games/memory";
import { createRandom } from "./random";
import { fingerprintEntries } from "./sampler";
import { roundKey, SessionStore, updateRound } from "./session";
import {
  Advisory,
  GameId,
  HangmanRound,
  InputQuizRound,
  IrregularVerbGame,
  MemoryRound,
  PageSelection,
  SimpleWordOptions,
  VocabEntry,
} from "./types";
import { filterSimpleWords } from "./utils";
import { courseLabel, VocabRepository } from "./vocab";

export type PracticeRequest = {
  selection: PageSelection;
  simpleOnly?: boolean;
  filter?: SimpleWordOptions;
  seed?: string;
};

export type GameAvailability = {
  game: GameId;
  enabled: boolean;
  advisory: Advisory | null;
};

export type PracticeView = {
  entries: VocabEntry[];
  advisories: Advisory[];
  games: GameAvailability[];
};

const GAMES: GameId[] = ["hangman", "memory", "quiz", "verbs"];

const MIN_ENTRIES: Record<GameId, number> = {
  hangman: 1,
  memory: MIN_MEMORY_PAIRS,
  quiz: 1,
  verbs: 0,
};

const GAME_TITLES: Record<GameId, string> = {
  hangman: "Galgenmännchen",
  memory: "Wörter ziehen",
  quiz: "Eingabe (DE → EN)",
  verbs: "Unregelmäßige Verben",
};

export function availableGames(entries: VocabEntry[]): GameAvailability[] {
  return GAMES.map((game) => {
    const needed = MIN_ENTRIES[game];
    if (entries.length >= needed) return { game, enabled: true, advisory: null };
    return {
      game,
      enabled: false,
      advisory: {
        kind: "insufficient_data",
        message: `${GAME_TITLES[game]} braucht mindestens ${needed} Vokabeln.`,
      },
    };
  });
}

function describe(selection: PageSelection): string {
  const course = selection.course ? ` (${courseLabel(selection.course)})` : "";
  return `Klasse ${selection.classe}${course}, Seite ${selection.page}`;
}

export function buildPracticeView(
  repository: VocabRepository,
  request: PracticeRequest,
  config: AppConfig = DEFAULT_CONFIG
): PracticeView {
  if (repository.files().length === 0) {
    return {
      entries: [],
      advisories: [{ kind: "data_unavailable", message: `Keine CSV-Dateien im Verzeichnis ${repository.root} gefunden.` }],
      games: [],
    };
  }

  const { selection } = request;
  let entries = repository.select(selection.classe, selection.page, selection.course);
  const advisories: Advisory[] = [...repository.warnings];

  if (entries.length === 0) {
    advisories.push({ kind: "data_unavailable", message: `Keine Vokabeln für ${describe(selection)}.` });
    return { entries, advisories, games: availableGames(entries) };
  }

  if (request.simpleOnly) {
    entries = filterSimpleWords(entries, request.filter ?? config.filter);
    if (entries.length === 0) {
      advisories.push({
        kind: "filter_exhaustion",
        message: "Der Filter entfernt alle Vokabeln. Passe die Einstellungen an.",
      });
      return { entries, advisories, games: availableGames(entries).filter((g) => g.game === "verbs") };
    }
  }

  const games = availableGames(entries);
  games.forEach((g) => {
    if (g.advisory) advisories.push(g.advisory);
  });
  return { entries, advisories, games };
}

function keyFor(game: GameId, request: PracticeRequest, config: AppConfig): string {
  return roundKey(game, request.selection, {
    simpleOnly: request.simpleOnly,
    filter: request.filter ?? config.filter,
    seed: request.seed,
  });
}

export function openHangman(
  store: SessionStore,
  request: PracticeRequest,
  entries: VocabEntry[],
  config: AppConfig,
  now: number
): HangmanRound {
  const fingerprint = fingerprintEntries(entries);
  return updateRound(store.hangman, keyFor("hangman", request, config), (current) => {
    if (current && fingerprintEntries(current.items) === fingerprint) return current;
    return createHangmanRound(entries, {
      maxFails: config.hangmanMaxFails,
      random: createRandom(request.seed),
      now,
    });
  });
}

export function openQuiz(
  store: SessionStore,
  request: PracticeRequest,
  entries: VocabEntry[],
  config: AppConfig,
  now: number
): InputQuizRound {
  return updateRound(store.quiz, keyFor("quiz", request, config), (current) =>
    ensureQuizRound(current, entries, { random: createRandom(request.seed), now })
  );
}

export function openMemory(
  store: SessionStore,
  request: PracticeRequest,
  entries: VocabEntry[],
  config: AppConfig,
  force = false
): MemoryRound {
  const key = keyFor("memory", request, config);
  return updateRound(store.memory, key, () =>
    drawMemoryRound(store.sampler, entries, {
      pairCount: config.matchingPairs,
      seed: request.seed,
      stateKey: key,
      force,
    })
  );
}

export function openVerbs(store: SessionStore, seed: string | undefined, now: number): IrregularVerbGame {
  return updateRound(
    store.verbs,
    roundKey("verbs", null, { seed }),
    (current) => current ?? createIrregularVerbGame(createRandom(seed), now)
  );
}
