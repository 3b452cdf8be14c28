export * from "./types";
export * from "./utils";
export * from "./random";
export * from "./stopwatch";
export * from "./sampler";
export * from "./vocab";
export * from "./config";
export * from "./logger";
export * from "./session";
export * from "./practice";
export * from "./games/hangman";
export * from "./games/memory";
export * from "./games/inputQuiz";
export * from "./games/irregularVerbs";
export * from "./MatchingBoard";
