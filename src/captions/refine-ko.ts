import { buildEndingTable, loadEndingLists, matchEnding, type EndingTable } from "./endings.js";
import type { RefineStrategy } from "./refine.js";

/** Built once at load; shared read-only by every call. */
export const KOREAN_ENDINGS: EndingTable = buildEndingTable(
  loadEndingLists(new URL("../../data/ko-endings.json", import.meta.url)),
);

// Stage directions like (웃음) or [박수], and the >> speaker-change marker.
const NOISE = /\[.*?\]|\(.*?\)|>>/g;

const TERMINATED = /[.?!]$/;

/**
 * Korean auto-captions rarely carry punctuation, and a caption line often
 * stops mid-sentence after a connective. Lines are buffered until one ends
 * in a sentence-final ending; the buffer then becomes one sentence, closed
 * with `?` or `.` according to that ending.
 */
export function createKoreanRefiner(table: EndingTable = KOREAN_ENDINGS): RefineStrategy {
  const close = (buffer: string[]): string => {
    const sentence = buffer.join(" ");
    if (TERMINATED.test(sentence)) return sentence;
    const last = buffer[buffer.length - 1];
    return sentence + (matchEnding(table, last)?.kind === "question" ? "?" : ".");
  };

  return {
    name: "ko",
    refine(lines) {
      const sentences: string[] = [];
      let buffer: string[] = [];
      let previous: string | undefined;

      const emit = () => {
        const sentence = close(buffer);
        if (sentence !== previous) {
          sentences.push(sentence);
          previous = sentence;
        }
        buffer = [];
      };

      for (const raw of lines) {
        const line = raw.replace(NOISE, "").trim();
        if (!line) continue;

        buffer.push(line);
        if (matchEnding(table, line)) emit();
      }

      if (buffer.length > 0) emit();

      return sentences.join("\n\n");
    },
  };
}

export const koreanRefiner: RefineStrategy = createKoreanRefiner();
