import { permutation, RandomSource, randomInt, systemRandom } from "../random";
import { createStopwatch, elapsedMs, pauseStopwatch, startStopwatch } from "../stopwatch";
import { HangmanRound, VocabEntry } from "../types";
import { addUnique, answersEqual, isLetter, lettersOf, maskWord, normalizeText } from "../utils";

export const HANGMAN_STAGES = [
  "",
  "\n\n\n\n\n\n----",
  "\n\n\n\n\n |\n----",
  "\n\n\n\n  |\n  |\n----",
  "\n  O\n\n\n  |\n----",
  "\n  O\n  |\n\n  |\n----",
  "\n  O\n /|\n\n  |\n----",
  "\n  O\n /|\n / \n  |\n----",
  "\n  O\n /|\n / \n  |\n / \\\n----",
];

export const DEFAULT_MAX_FAILS = HANGMAN_STAGES.length - 1;

export type HangmanOptions = {
  maxFails?: number;
  random?: RandomSource;
  now: number;
};

export function createHangmanRound(items: VocabEntry[], options: HangmanOptions): HangmanRound {
  if (items.length === 0) {
    throw new Error("Hangman needs at least one vocabulary entry.");
  }
  const { maxFails = DEFAULT_MAX_FAILS, random = systemRandom, now } = options;
  const order = permutation(items.length, random);
  return startWord({ items, order, maxFails }, 0, now);
}

function startWord(
  base: Pick<HangmanRound, "items" | "order" | "maxFails">,
  position: number,
  now: number
): HangmanRound {
  const entry = base.items[base.order[position]];
  const round: HangmanRound = {
    ...base,
    position,
    target: entry.en,
    hint: entry.de,
    guessed: [],
    missed: [],
    failCount: 0,
    status: "in_progress",
    timer: startStopwatch(createStopwatch(), now),
    finalElapsedMs: null,
  };
  // a target without letters has nothing left to guess
  return settle(round, now);
}

function settle(round: HangmanRound, now: number): HangmanRound {
  const solved = lettersOf(round.target).every((letter) => round.guessed.includes(letter));
  if (solved) return finish(round, "solved", now);
  if (round.failCount >= round.maxFails) return finish(round, "failed", now);
  return round;
}

function finish(round: HangmanRound, status: "solved" | "failed", now: number): HangmanRound {
  const timer = pauseStopwatch(round.timer, now);
  return { ...round, status, timer, finalElapsedMs: timer.elapsedMs };
}

export function guessLetter(round: HangmanRound, letter: string, now: number): HangmanRound {
  const folded = normalizeText(letter);
  if (round.status !== "in_progress") return round;
  if (folded.length !== 1 || !isLetter(folded)) return round;
  if (round.guessed.includes(folded) || round.missed.includes(folded)) return round;

  if (normalizeText(round.target).includes(folded)) {
    return settle({ ...round, guessed: addUnique(round.guessed, folded) }, now);
  }
  return settle(
    { ...round, missed: addUnique(round.missed, folded), failCount: round.failCount + 1 },
    now
  );
}

export function guessWord(round: HangmanRound, text: string, now: number): HangmanRound {
  if (round.status !== "in_progress") return round;
  if (!normalizeText(text)) return round;
  if (answersEqual(text, round.target)) {
    const guessed = lettersOf(round.target).reduce(addUnique, round.guessed);
    return settle({ ...round, guessed }, now);
  }
  return settle({ ...round, failCount: round.failCount + 1 }, now);
}

export function revealSolution(round: HangmanRound): string {
  return round.target;
}

export function nextWord(round: HangmanRound, random: RandomSource, now: number): HangmanRound {
  const position = round.position + 1;
  if (position < round.order.length) {
    return startWord(round, position, now);
  }
  return startWord({ ...round, order: permutation(round.items.length, random) }, 0, now);
}

export function newWord(round: HangmanRound, random: RandomSource, now: number): HangmanRound {
  const current = round.order[round.position];
  let index = randomInt(random, round.items.length);
  if (round.items.length > 1 && index === current) {
    index = (index + 1 + randomInt(random, round.items.length - 1)) % round.items.length;
  }
  const order = [...round.order];
  order[round.position] = index;
  return startWord({ ...round, order }, round.position, now);
}

export function maskedWord(round: HangmanRound): string {
  return maskWord(round.target, round.guessed);
}

export function hangmanStage(round: HangmanRound): string {
  const scaled = Math.round((round.failCount / round.maxFails) * DEFAULT_MAX_FAILS);
  return HANGMAN_STAGES[Math.min(scaled, DEFAULT_MAX_FAILS)];
}

export function hangmanElapsed(round: HangmanRound, now: number): number {
  return round.finalElapsedMs ?? elapsedMs(round.timer, now);
}
