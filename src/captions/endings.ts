import { readFileSync } from "node:fs";
import { isRecord } from "./guards.js";

export type EndingKind = "question" | "statement";

export type Ending = {
  readonly suffix: string;
  readonly kind: EndingKind;
};

/** Sentence-final suffixes, longest first. */
export type EndingTable = readonly Ending[];

export type EndingLists = {
  question: readonly string[];
  statement: readonly string[];
};

/**
 * Expand bare endings into the suffixes a caption line can end with and sort
 * them longest first, so `있어요` is tried before the `어요` it contains.
 *
 * Statements also match with a trailing `.`; questions with `.` or `?`. A
 * suffix listed under both kinds counts as a question.
 */
export function buildEndingTable(lists: EndingLists): EndingTable {
  const kinds = new Map<string, EndingKind>();

  for (const ending of lists.statement) {
    for (const suffix of [ending, `${ending}.`]) {
      if (!kinds.has(suffix)) kinds.set(suffix, "statement");
    }
  }
  for (const ending of lists.question) {
    for (const suffix of [ending, `${ending}.`, `${ending}?`]) {
      kinds.set(suffix, "question");
    }
  }

  const table = [...kinds].map(([suffix, kind]) => Object.freeze({ suffix, kind }));
  table.sort((a, b) => b.suffix.length - a.suffix.length);
  return Object.freeze(table);
}

/** The longest ending `text` ends with, or `null`. */
export function matchEnding(table: EndingTable, text: string): Ending | null {
  for (const ending of table) {
    if (text.endsWith(ending.suffix)) return ending;
  }
  return null;
}

/** Read `{ "question": [...], "statement": [...] }` from a JSON file. */
export function loadEndingLists(file: URL | string): EndingLists {
  const parsed: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!isRecord(parsed) || !isStringList(parsed.question) || !isStringList(parsed.statement)) {
    throw new Error(`Ending list ${String(file)} must hold "question" and "statement" string arrays`);
  }
  return { question: parsed.question, statement: parsed.statement };
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string" && v.length > 0);
}
