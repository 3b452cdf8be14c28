import { SimpleWordOptions, VocabEntry } from "./types";

export type NormalizeOptions = {
  strict?: boolean;
};

export function normalizeText(value: unknown, options: NormalizeOptions = {}): string {
  if (typeof value !== "string") return "";
  let text = value.trim().toLowerCase().normalize("NFKD").replace(/\p{M}/gu, "");
  if (options.strict) {
    text = text.replace(/[^\p{L}\p{N}\s/-]/gu, "");
  }
  return text.replace(/\s+/g, " ").trim();
}

export function answerVariants(accepted: unknown, options: { splitVariants?: boolean } = {}): string[] {
  const whole = normalizeText(accepted, { strict: true });
  const variants = whole ? [whole] : [];
  if (options.splitVariants === false || typeof accepted !== "string") return variants;
  for (const piece of accepted.split("/")) {
    const clean = normalizeText(piece, { strict: true });
    if (clean) variants.push(clean);
  }
  return Array.from(new Set(variants));
}

// Grading for every free-text answer: any "/"-separated variant may match.
export function answersEqual(userAnswer: unknown, accepted: unknown): boolean {
  const answer = normalizeText(userAnswer, { strict: true });
  if (!answer || typeof accepted !== "string") return false;
  return accepted.split("/").some((variant) => normalizeText(variant, { strict: true }) === answer);
}

export function isLetter(char: string): boolean {
  return /^\p{L}$/u.test(char);
}

export function lettersOf(value: string): string[] {
  const letters = Array.from(normalizeText(value)).filter(isLetter);
  return Array.from(new Set(letters));
}

export function maskWord(value: string, revealed: string[]): string {
  return Array.from(value)
    .map((char) => {
      if (!isLetter(char)) return char;
      return lettersOf(char).every((letter) => revealed.includes(letter)) ? char : "_";
    })
    .join(" ");
}

export function addUnique(list: string[], value: string): string[] {
  const clean = value.trim();
  if (!clean) return list;
  if (list.includes(clean)) return list;
  return [...list, clean];
}

const ARTICLE_PREFIX = /^(to\s+|the\s+|a\s+|an\s+)/i;
const ABBREVIATIONS = /\b(sth|sb|etc|e\.g|i\.e)\b/i;

export function isSimpleWord(word: unknown, options: SimpleWordOptions = {}): boolean {
  const { ignoreArticles = true, ignoreAbbrev = true, minLength = 2 } = options;
  if (typeof word !== "string") return false;
  let w = word.trim();
  if (ignoreArticles) {
    w = w.replace(ARTICLE_PREFIX, "");
  }
  if (w.includes("/")) return false;
  if (w.includes(" ") || w.includes("-")) return false;
  if (ignoreAbbrev && ABBREVIATIONS.test(w)) return false;
  if (w.includes(".")) return false;
  return w.length >= minLength;
}

export function filterSimpleWords(entries: VocabEntry[], options: SimpleWordOptions = {}): VocabEntry[] {
  return entries.filter((entry) => isSimpleWord(entry.en, options));
}
