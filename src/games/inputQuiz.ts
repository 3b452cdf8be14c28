import { permutation, RandomSource, systemRandom } from "../random";
import { fingerprintEntries } from "../sampler";
import { createStopwatch, elapsedMs, pauseStopwatch, startStopwatch } from "../stopwatch";
import { InputQuizRound, QuizRecord, VocabEntry } from "../types";
import { answersEqual } from "../utils";

export type QuizOptions = {
  random?: RandomSource;
  now: number;
};

export function createQuizRound(items: VocabEntry[], options: QuizOptions): InputQuizRound {
  if (items.length === 0) {
    throw new Error("The typing quiz needs at least one vocabulary entry.");
  }
  const { random = systemRandom, now } = options;
  return {
    items,
    fingerprint: fingerprintEntries(items),
    order: permutation(items.length, random),
    position: 0,
    score: 0,
    total: 0,
    history: [],
    timer: startStopwatch(createStopwatch(), now),
    finalElapsedMs: null,
  };
}

// Keeps the running round unless the vocabulary behind it changed.
export function ensureQuizRound(
  current: InputQuizRound | undefined,
  items: VocabEntry[],
  options: QuizOptions
): InputQuizRound {
  if (current && current.fingerprint === fingerprintEntries(items)) return current;
  return createQuizRound(items, options);
}

export function isQuizFinished(round: InputQuizRound): boolean {
  return round.position >= round.order.length;
}

export function currentQuestion(round: InputQuizRound): VocabEntry | null {
  if (isQuizFinished(round)) return null;
  return round.items[round.order[round.position]];
}

function advance(round: InputQuizRound, record: QuizRecord, now: number): InputQuizRound {
  const next = { ...round, position: round.position + 1, history: [...round.history, record] };
  return isQuizFinished(next) ? freeze(next, now) : next;
}

function freeze(round: InputQuizRound, now: number): InputQuizRound {
  const timer = pauseStopwatch(round.timer, now);
  return { ...round, timer, finalElapsedMs: timer.elapsedMs };
}

export function submitAnswer(round: InputQuizRound, answer: string, now: number): InputQuizRound {
  const question = currentQuestion(round);
  if (!question) return round;
  const correct = answersEqual(answer, question.en);
  return advance(
    { ...round, total: round.total + 1, score: correct ? round.score + 1 : round.score },
    { de: question.de, answer, en: question.en, result: correct ? "correct" : "wrong" },
    now
  );
}

export function skipQuestion(round: InputQuizRound, now: number): InputQuizRound {
  const question = currentQuestion(round);
  if (!question) return round;
  return advance(round, { de: question.de, answer: "", en: question.en, result: "skipped" }, now);
}

export function revealAnswer(round: InputQuizRound): string | null {
  return currentQuestion(round)?.en ?? null;
}

export function finishQuiz(round: InputQuizRound, now: number): InputQuizRound {
  if (isQuizFinished(round)) return round;
  return freeze({ ...round, position: round.order.length }, now);
}

export function quizElapsed(round: InputQuizRound, now: number): number {
  return round.finalElapsedMs ?? elapsedMs(round.timer, now);
}
