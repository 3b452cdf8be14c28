export type Course = "E" | "G" | "French";

export type VocabEntry = {
  classe: number | null;
  page: number | null;
  de: string;
  en: string;
};

export type VocabFileDescriptor = {
  classe: number;
  page: number;
  course: Course | null;
  path: string;
  label: string;
};

export type PageSelection = {
  classe: number;
  page: number;
  course?: Course | null;
};

export type SimpleWordOptions = {
  ignoreArticles?: boolean;
  ignoreAbbrev?: boolean;
  minLength?: number;
};

export type AdvisoryKind =
  | "data_unavailable"
  | "file_parse_error"
  | "schema_mismatch"
  | "filter_exhaustion"
  | "insufficient_data";

export type Advisory = {
  kind: AdvisoryKind;
  message: string;
  path?: string;
};

export type Stopwatch = {
  running: boolean;
  startedAt: number | null;
  elapsedMs: number;
};

export type SampleMode = "all" | "k";

export type SubsetSelection<T> = {
  fingerprint: string;
  mode: SampleMode;
  k: number;
  draw: number;
  chosen: T[];
};

export type GameId = "hangman" | "memory" | "quiz" | "verbs";

export type HangmanStatus = "in_progress" | "solved" | "failed";

export type HangmanRound = {
  items: VocabEntry[];
  order: number[];
  position: number;
  target: string;
  hint: string;
  guessed: string[];
  missed: string[];
  failCount: number;
  maxFails: number;
  status: HangmanStatus;
  timer: Stopwatch;
  finalElapsedMs: number | null;
};

export type MemoryPair = {
  pairId: string;
  de: string;
  en: string;
};

export type MemoryTile = {
  tileId: string;
  pairId: string;
  lang: "de" | "en";
  text: string;
};

export type MemoryRound = {
  pairs: MemoryPair[];
  tiles: MemoryTile[];
};

export type QuizResult = "correct" | "wrong" | "skipped";

export type QuizRecord = {
  de: string;
  answer: string;
  en: string;
  result: QuizResult;
};

export type InputQuizRound = {
  items: VocabEntry[];
  fingerprint: string;
  order: number[];
  position: number;
  score: number;
  total: number;
  history: QuizRecord[];
  timer: Stopwatch;
  finalElapsedMs: number | null;
};

export type IrregularVerb = {
  infinitive: string;
  pastSimple: string;
  pastParticiple: string;
  meaning: string;
};

export type VerbField = keyof IrregularVerb;

export type VerbTile = {
  text: string;
  target: VerbField;
  hidden: boolean;
};

export type IrregularVerbRound = {
  verb: IrregularVerb;
  tiles: VerbTile[];
  matches: Record<VerbField, number | null>;
  selected: number | null;
  timer: Stopwatch;
  completed: boolean;
  finalElapsedMs: number | null;
};

export type IrregularVerbGame = {
  round: IrregularVerbRound;
  score: number;
};
