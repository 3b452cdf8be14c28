import { SimpleWordOptions } from "./types";

export type AppConfig = {
  dataDir: string;
  hangmanMaxFails: number;
  matchingPairs: number;
  filter: Required<SimpleWordOptions>;
};

export const DEFAULT_CONFIG: AppConfig = {
  dataDir: "data",
  hangmanMaxFails: 8,
  matchingPairs: 8,
  filter: {
    ignoreArticles: true,
    ignoreAbbrev: true,
    minLength: 2,
  },
};

const HANGMAN_FAIL_LIMITS = [6, 8];

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const config: AppConfig = { ...DEFAULT_CONFIG, filter: { ...DEFAULT_CONFIG.filter } };

  const dataDir = env.VOCAB_DATA_DIR?.trim();
  if (dataDir) config.dataDir = dataDir;

  const maxFails = env.HANGMAN_MAX_FAILS?.trim();
  if (maxFails) {
    const value = Number(maxFails);
    if (!HANGMAN_FAIL_LIMITS.includes(value)) {
      throw new Error(`HANGMAN_MAX_FAILS must be one of ${HANGMAN_FAIL_LIMITS.join(", ")}, got "${maxFails}".`);
    }
    config.hangmanMaxFails = value;
  }

  const pairs = env.MATCHING_PAIRS?.trim();
  if (pairs) {
    const value = Number(pairs);
    if (!Number.isInteger(value) || value < 2) {
      throw new Error(`MATCHING_PAIRS must be an integer of at least 2, got "${pairs}".`);
    }
    config.matchingPairs = value;
  }

  return config;
}
