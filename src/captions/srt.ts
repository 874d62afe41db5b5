import { readFile } from "node:fs/promises";
import { ParsingError, errorMessage } from "./errors.js";
import type { CaptionSegment } from "./types.js";

const BLOCK_SEPARATOR = /\r?\n\r?\n/;

/**
 * Turn caption block text into an ordered list of text lines.
 *
 * Each block is `index`, `timing`, then one or more text lines. The first two
 * lines are dropped, the rest joined with a space. Auto-captions repeat the
 * previous line while the next one scrolls in, so a line equal to the one
 * kept just before it is skipped. Repeats further apart are kept.
 */
export function normalizeTranscript(raw: string): string[] {
  const lines: string[] = [];
  let last: string | undefined;

  for (const block of raw.trim().split(BLOCK_SEPARATOR)) {
    const blockLines = block.trim().split(/\r?\n/);
    if (blockLines.length < 3) continue;

    const text = blockLines.slice(2).join(" ").trim().replaceAll(">>", "").trim();
    if (!text || text === last) continue;

    lines.push(text);
    last = text;
  }

  return lines;
}

/** Strict UTF-8 decode; a leading BOM is dropped. */
export function decodeTranscript(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ParsingError(`Caption data is not valid UTF-8: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/** Read a caption file from disk and normalize it. */
export async function readTranscriptFile(path: string): Promise<string[]> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new ParsingError(`Failed to read caption file: ${errorMessage(err)}\nFile: ${path}`, {
      cause: err,
    });
  }
  return normalizeTranscript(decodeTranscript(bytes));
}

/** Render timed segments as numbered caption blocks. */
export function renderSrt(segments: readonly CaptionSegment[]): string {
  return segments
    .filter((s) => s.text.trim())
    .map((s, i) => {
      const timing = `${formatTimestamp(s.startMs)} --> ${formatTimestamp(s.startMs + s.durationMs)}`;
      return `${i + 1}\n${timing}\n${s.text.trim()}`;
    })
    .join("\n\n");
}

function formatTimestamp(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}
