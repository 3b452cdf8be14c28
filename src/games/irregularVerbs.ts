import verbTable from "../data/irregularVerbs.json";
import { RandomSource, randomInt, shuffle } from "../random";
import { createStopwatch, elapsedMs, pauseStopwatch, startStopwatch } from "../stopwatch";
import { IrregularVerb, IrregularVerbGame, IrregularVerbRound, VerbField } from "../types";
import { answerVariants, normalizeText } from "../utils";

export const IRREGULAR_VERBS: IrregularVerb[] = verbTable;

export const VERB_FIELDS: VerbField[] = ["infinitive", "pastSimple", "pastParticiple", "meaning"];

export type MatchResult = "match" | "miss" | "ignored";

export function createVerbRound(verb: IrregularVerb, random: RandomSource, now: number): IrregularVerbRound {
  const tiles = shuffle(
    VERB_FIELDS.map((target) => ({ text: verb[target], target, hidden: false })),
    random
  );
  return {
    verb,
    tiles,
    matches: { infinitive: null, pastSimple: null, pastParticiple: null, meaning: null },
    selected: null,
    timer: startStopwatch(createStopwatch(), now),
    completed: false,
    finalElapsedMs: null,
  };
}

function drawVerb(verbs: IrregularVerb[], random: RandomSource): IrregularVerb {
  if (verbs.length === 0) {
    throw new Error("The irregular verb table is empty.");
  }
  return verbs[randomInt(random, verbs.length)];
}

export function createIrregularVerbGame(
  random: RandomSource,
  now: number,
  verbs: IrregularVerb[] = IRREGULAR_VERBS
): IrregularVerbGame {
  return { round: createVerbRound(drawVerb(verbs, random), random, now), score: 0 };
}

export function newVerbRound(
  game: IrregularVerbGame,
  random: RandomSource,
  now: number,
  verbs: IrregularVerb[] = IRREGULAR_VERBS
): IrregularVerbGame {
  return { ...game, round: createVerbRound(drawVerb(verbs, random), random, now) };
}

export function resetScore(game: IrregularVerbGame): IrregularVerbGame {
  if (game.score === 0) return game;
  return { ...game, score: 0 };
}

export function selectTile(game: IrregularVerbGame, index: number): IrregularVerbGame {
  const { round } = game;
  const tile = round.tiles[index];
  if (!tile || tile.hidden || round.completed || round.selected === index) return game;
  return { ...game, round: { ...round, selected: index } };
}

// A German meaning may contain "/" as plain text, so only the verb forms split into variants.
export function acceptedForms(verb: IrregularVerb, target: VerbField): string[] {
  return answerVariants(verb[target], { splitVariants: target !== "meaning" });
}

export function attemptMatch(
  game: IrregularVerbGame,
  target: VerbField,
  now: number
): { game: IrregularVerbGame; result: MatchResult } {
  const { round } = game;
  if (round.completed || round.selected === null || round.matches[target] !== null) {
    return { game, result: "ignored" };
  }
  const index = round.selected;
  const tile = round.tiles[index];
  if (!tile || tile.hidden) return { game, result: "ignored" };

  const text = normalizeText(tile.text, { strict: true });
  if (!acceptedForms(round.verb, target).includes(text)) {
    return { game: { ...game, round: { ...round, selected: null } }, result: "miss" };
  }

  const tiles = round.tiles.map((t, i) => (i === index ? { ...t, hidden: true } : t));
  const matches = { ...round.matches, [target]: index };
  const completed = VERB_FIELDS.every((field) => matches[field] !== null);
  let next: IrregularVerbRound = { ...round, tiles, matches, selected: null, completed };
  if (completed) {
    const timer = pauseStopwatch(round.timer, now);
    next = { ...next, timer, finalElapsedMs: timer.elapsedMs };
  }
  return { game: { round: next, score: game.score + 1 }, result: "match" };
}

export function verbElapsed(round: IrregularVerbRound, now: number): number {
  return round.finalElapsedMs ?? elapsedMs(round.timer, now);
}
