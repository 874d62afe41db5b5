import { ParsingError, errorMessage } from "./errors.js";
import { koreanRefiner } from "./refine-ko.js";

/** Merges caption lines into sentences separated by blank lines. */
export type RefineStrategy = {
  readonly name: string;
  refine(lines: readonly string[]): string;
};

/** Language code (sanitized) to strategy. */
export type RefinerRegistry = ReadonlyMap<string, RefineStrategy>;

export const SENTENCE_SEPARATOR = "\n\n";

export function createRefinerRegistry(
  entries: Record<string, RefineStrategy>,
): RefinerRegistry {
  return new Map(Object.entries(entries));
}

export const defaultRegistry: RefinerRegistry = createRefinerRegistry({
  ko: koreanRefiner,
});

/**
 * Default refiner for languages that already punctuate their captions:
 * flatten everything, then cut after each `.`, `?` or `!`. An unterminated
 * tail gets a period.
 */
export const punctuationRefiner: RefineStrategy = {
  name: "default",
  refine(lines) {
    const parts = lines.join(" ").split(/([.?!])/);
    const sentences: string[] = [];

    let i = 0;
    for (; i < parts.length - 1; i += 2) {
      const text = parts[i].trim();
      if (text) sentences.push(text + parts[i + 1]);
    }

    const tail = i < parts.length ? parts[i].trim() : "";
    if (tail) sentences.push(`${tail}.`);

    return sentences.join(SENTENCE_SEPARATOR);
  },
};

/** Strip everything but ASCII letters and digits: `en-US` → `enUS`. */
export function sanitizeLang(lang: string): string {
  return lang.replace(/[^A-Za-z0-9]/g, "");
}

export function selectRefiner(
  lang: string,
  registry: RefinerRegistry = defaultRegistry,
): RefineStrategy {
  return registry.get(sanitizeLang(lang)) ?? punctuationRefiner;
}

/**
 * Refine caption lines into sentences using the strategy registered for
 * `lang`, or the punctuation-based default.
 *
 * @throws {ParsingError} when the strategy itself fails.
 */
export function refineSentences(
  lines: readonly string[],
  lang: string,
  registry: RefinerRegistry = defaultRegistry,
): string {
  const refiner = selectRefiner(lang, registry);
  try {
    return refiner.refine(lines);
  } catch (err) {
    throw new ParsingError(`An error occurred in the '${refiner.name}' refiner: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
