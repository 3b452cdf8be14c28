import { isUtf8 } from "node:buffer";
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import * as XLSX from "xlsx";
import { AppConfig } from "./config";
import { consoleLogger, Logger } from "./logger";
import { Advisory, Course, VocabEntry, VocabFileDescriptor } from "./types";
import { normalizeText } from "./utils";

type Column = "classe" | "page" | "de" | "en";
type Delimiter = ";" | ",";
type Encoding = "utf-8" | "latin1";

export type ParsedVocabFile = {
  entries: VocabEntry[];
  warning: Advisory | null;
  encoding: Encoding | null;
  delimiter: Delimiter | null;
};

const COLUMNS: Column[] = ["classe", "page", "de", "en"];

const HEADER_SYNONYMS: Record<Column, string[]> = {
  classe: ["klasse", "class", "classe", "jahrgang", "stufe"],
  page: ["page", "seite", "pg", "s"],
  de: ["de", "deutsch", "german", "ger", "wort", "deutsch (de)"],
  en: [
    "en",
    "englisch",
    "english",
    "eng",
    "fr",
    "franzosisch",
    "franzoesisch",
    "french",
    "francais",
    "fra",
    "englisch (en)",
    "franzosisch (fr)",
  ],
};

const COURSE_ALIASES: Record<string, Course> = {
  e: "E",
  g: "G",
  franzosisch: "French",
  franzoesisch: "French",
  french: "French",
};

const COURSE_LABELS: Record<Course, string> = {
  E: "E-Kurs",
  G: "G-Kurs",
  French: "Französisch",
};

const PAGE_PATH = /(?:^|\/)klasse(\d+)(?:_([^/]+?))?\/klasse(\d+)(?:_([^/]+?))?_page(\d+)\.csv$/;

export function courseLabel(course: Course | null): string {
  return course ? COURSE_LABELS[course] : "";
}

export function parsePagePath(path: string): VocabFileDescriptor | null {
  const clean = path.replace(/\\/g, "/").normalize("NFC").toLowerCase();
  const match = PAGE_PATH.exec(clean);
  if (!match) return null;
  const [, folderClass, folderCourse, fileClass, fileCourse, pageText] = match;
  if (folderClass !== fileClass || folderCourse !== fileCourse) return null;

  let course: Course | null = null;
  if (fileCourse !== undefined) {
    const alias = COURSE_ALIASES[normalizeText(fileCourse)];
    if (!alias) return null;
    course = alias;
  }

  const classe = parseInt(fileClass, 10);
  const page = parseInt(pageText, 10);
  const courseText = course ? ` (${COURSE_LABELS[course]})` : "";
  return {
    classe,
    page,
    course,
    path,
    label: `Klasse ${classe}${courseText} – Seite ${page}`,
  };
}

export function discoverVocabFiles(root: string): string[] {
  if (!existsSync(root)) return [];
  const found: string[] = [];
  const walk = (dir: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".csv")) {
        found.push(full);
      }
    }
  };
  walk(root);
  return found.sort();
}

function decodeCandidates(buffer: Uint8Array): { encoding: Encoding; text: string }[] {
  const bytes = Buffer.from(buffer);
  const candidates: { encoding: Encoding; text: string }[] = [];
  if (isUtf8(bytes)) candidates.push({ encoding: "utf-8", text: bytes.toString("utf8") });
  candidates.push({ encoding: "latin1", text: bytes.toString("latin1") });
  return candidates.map((candidate) => ({ ...candidate, text: candidate.text.replace(/^\uFEFF/, "") }));
}

export function detectDelimiters(text: string): Delimiter[] {
  const newline = text.search(/\r?\n/);
  const header = newline === -1 ? text : text.slice(0, newline);
  let semicolons = 0;
  let commas = 0;
  let quoted = false;
  for (const char of header) {
    if (char === '"') quoted = !quoted;
    else if (!quoted && char === ";") semicolons += 1;
    else if (!quoted && char === ",") commas += 1;
  }
  return semicolons >= commas && semicolons > 0 ? [";", ","] : [",", ";"];
}

function readTable(text: string, delimiter: Delimiter): string[][] {
  const body = text.replace(/^sep=.\r?\n/i, "");
  const workbook = XLSX.read(`sep=${delimiter}\n${body}`, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];
  const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    raw: true,
    defval: "",
    blankrows: false,
  });
  return rows.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
}

export function mapHeaders(header: string[]): Partial<Record<Column, number>> {
  const mapping: Partial<Record<Column, number>> = {};
  header.forEach((name, index) => {
    const key = normalizeText(name);
    for (const column of COLUMNS) {
      if (mapping[column] === undefined && HEADER_SYNONYMS[column].includes(key)) {
        mapping[column] = index;
      }
    }
  });
  return mapping;
}

function toInteger(value: string): number | null {
  const clean = value.trim();
  if (!/^\d+(\.0+)?$/.test(clean)) return null;
  return parseInt(clean, 10);
}

function entryKey(entry: VocabEntry): string {
  return [entry.classe, entry.page, entry.de, entry.en].join("\u0000");
}

export function dedupeEntries(entries: VocabEntry[]): VocabEntry[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    const key = entryKey(entry);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function rowsToEntries(table: string[][], mapping: Partial<Record<Column, number>>): VocabEntry[] {
  const cell = (row: string[], column: Column) => {
    const index = mapping[column];
    return index === undefined ? "" : row[index] ?? "";
  };
  const entries = table.slice(1).map((row) => ({
    classe: toInteger(cell(row, "classe")),
    page: toInteger(cell(row, "page")),
    de: cell(row, "de").trim(),
    en: cell(row, "en").trim(),
  }));
  return dedupeEntries(entries.filter((entry) => entry.de !== "" && entry.en !== ""));
}

export function parseVocabCsv(buffer: Uint8Array, path = "<memory>"): ParsedVocabFile {
  let parsedAny = false;
  let lastError: unknown = null;

  for (const { encoding, text } of decodeCandidates(buffer)) {
    for (const delimiter of detectDelimiters(text)) {
      let table: string[][];
      try {
        table = readTable(text, delimiter);
      } catch (error) {
        lastError = error;
        continue;
      }
      parsedAny = true;
      const mapping = mapHeaders(table[0] ?? []);
      if (mapping.de === undefined || mapping.en === undefined) continue;
      return { entries: rowsToEntries(table, mapping), warning: null, encoding, delimiter };
    }
  }

  if (parsedAny) {
    return {
      entries: [],
      warning: {
        kind: "schema_mismatch",
        path,
        message: `Spalten "de"/"en" fehlen in ${path}; die Datei liefert keine Vokabeln.`,
      },
      encoding: null,
      delimiter: null,
    };
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  return {
    entries: [],
    warning: { kind: "file_parse_error", path, message: `Fehler beim Laden von ${path}: ${reason}` },
    encoding: null,
    delimiter: null,
  };
}

export class VocabRepository {
  private fileList: string[] | null = null;
  private descriptors: VocabFileDescriptor[] | null = null;
  private parsed = new Map<string, ParsedVocabFile>();

  constructor(readonly root: string, private readonly logger: Logger = consoleLogger) {}

  files(): string[] {
    if (!this.fileList) {
      this.fileList = discoverVocabFiles(this.root);
      this.logger.info(`${this.fileList.length} CSV-Dateien unter ${this.root} gefunden.`);
    }
    return this.fileList;
  }

  discover(): VocabFileDescriptor[] {
    if (!this.descriptors) {
      this.descriptors = this.files()
        .map(parsePagePath)
        .filter((descriptor): descriptor is VocabFileDescriptor => descriptor !== null);
    }
    return this.descriptors;
  }

  load(path: string): VocabEntry[] {
    let file = this.parsed.get(path);
    if (!file) {
      file = this.parseFile(path);
      if (file.warning?.kind === "file_parse_error") this.logger.error(file.warning.message);
      else if (file.warning) this.logger.warn(file.warning.message);
      this.parsed.set(path, file);
    }
    return file.entries;
  }

  get warnings(): Advisory[] {
    const warnings: Advisory[] = [];
    this.parsed.forEach((file) => {
      if (file.warning) warnings.push(file.warning);
    });
    return warnings;
  }

  select(classe: number, page: number, course?: Course | null): VocabEntry[] {
    const rows = this.discover()
      .filter((d) => d.classe === classe && d.page === page)
      .filter((d) => course === undefined || d.course === course)
      .flatMap((d) => this.load(d.path));
    return dedupeEntries(rows.filter((row) => row.classe === classe && row.page === page));
  }

  classes(): number[] {
    return uniqueSorted(this.discover().map((d) => d.classe));
  }

  courses(classe: number): (Course | null)[] {
    const courses = new Set(this.discover().filter((d) => d.classe === classe).map((d) => d.course));
    return Array.from(courses).sort((a, b) => courseLabel(a).localeCompare(courseLabel(b)));
  }

  pages(classe: number, course?: Course | null): number[] {
    return uniqueSorted(
      this.discover()
        .filter((d) => d.classe === classe)
        .filter((d) => course === undefined || d.course === course)
        .map((d) => d.page)
    );
  }

  clearCache() {
    this.fileList = null;
    this.descriptors = null;
    this.parsed.clear();
  }

  private parseFile(path: string): ParsedVocabFile {
    let buffer: Buffer;
    try {
      buffer = readFileSync(path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        entries: [],
        warning: { kind: "file_parse_error", path, message: `Fehler beim Laden von ${path}: ${reason}` },
        encoding: null,
        delimiter: null,
      };
    }
    const file = parseVocabCsv(buffer, path);
    const descriptor = parsePagePath(path);
    if (!descriptor) return file;
    const entries = file.entries.map((entry) => ({ ...entry, classe: descriptor.classe, page: descriptor.page }));
    return { ...file, entries: dedupeEntries(entries) };
  }
}

export function createRepository(config: AppConfig, logger: Logger = consoleLogger): VocabRepository {
  return new VocabRepository(config.dataDir, logger);
}

function uniqueSorted(values: number[]): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}
