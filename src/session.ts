import { SubsetSampler } from "./sampler";
import {
  GameId,
  HangmanRound,
  InputQuizRound,
  IrregularVerbGame,
  MemoryRound,
  PageSelection,
  SimpleWordOptions,
  VocabEntry,
} from "./types";

export type RoundParams = {
  simpleOnly?: boolean;
  filter?: SimpleWordOptions;
  seed?: string;
};

export function roundKey(game: GameId, selection: PageSelection | null, params: RoundParams = {}): string {
  const parts: string[] = [game];
  if (selection) {
    parts.push(`k${selection.classe}`, selection.course ?? "-", `s${selection.page}`);
  }
  if (params.simpleOnly) {
    const { ignoreArticles = true, ignoreAbbrev = true, minLength = 2 } = params.filter ?? {};
    parts.push(`simple:${Number(ignoreArticles)}${Number(ignoreAbbrev)}${minLength}`);
  }
  parts.push(`seed:${params.seed ?? ""}`);
  return parts.join("|");
}

export function updateRound<T>(rounds: Map<string, T>, key: string, fn: (current: T | undefined) => T): T {
  const next = fn(rounds.get(key));
  rounds.set(key, next);
  return next;
}

/**
 * Session-scoped home of every round. The page is re-run on each
 * interaction, so callers read a round, apply one operation and write it
 * back through `updateRound`.
 */
export class SessionStore {
  readonly sampler = new SubsetSampler<VocabEntry>();
  readonly hangman = new Map<string, HangmanRound>();
  readonly memory = new Map<string, MemoryRound>();
  readonly quiz = new Map<string, InputQuizRound>();
  readonly verbs = new Map<string, IrregularVerbGame>();

  discard(game: GameId, key: string) {
    this[game].delete(key);
    if (game === "memory") this.sampler.invalidate(key);
  }

  clearRounds() {
    this.hangman.clear();
    this.memory.clear();
    this.quiz.clear();
    this.verbs.clear();
    this.sampler.invalidate();
  }
}
