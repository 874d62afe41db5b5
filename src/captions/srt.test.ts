import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ParsingError } from "./errors.js";
import { decodeTranscript, normalizeTranscript, readTranscriptFile, renderSrt } from "./srt.js";

function block(index: number, text: string): string {
  return `${index}\n00:00:0${index},000 --> 00:00:0${index + 1},000\n${text}`;
}

describe("normalizeTranscript", () => {
  it("collapses consecutive duplicate lines", () => {
    const raw = [block(1, "hi"), block(2, "hi"), block(3, "bye")].join("\n\n");
    expect(normalizeTranscript(raw)).toEqual(["hi", "bye"]);
  });

  it("keeps repeats that are not adjacent", () => {
    const raw = [block(1, "hi"), block(2, "bye"), block(3, "hi")].join("\n\n");
    expect(normalizeTranscript(raw)).toEqual(["hi", "bye", "hi"]);
  });

  it("joins multi-line block text with a space", () => {
    const raw = "1\n00:00:01,000 --> 00:00:02,000\nfirst half\nsecond half";
    expect(normalizeTranscript(raw)).toEqual(["first half second half"]);
  });

  it("strips speaker-change markers", () => {
    const raw = block(1, ">> welcome back");
    expect(normalizeTranscript(raw)).toEqual(["welcome back"]);
  });

  it("skips blocks without text and blocks that are too short", () => {
    const raw = ["1\n00:00:01,000 --> 00:00:02,000", block(2, "   "), block(3, "kept")].join(
      "\n\n",
    );
    expect(normalizeTranscript(raw)).toEqual(["kept"]);
  });

  it("accepts CRLF line endings", () => {
    const raw = "1\r\n00:00:01,000 --> 00:00:02,000\r\nhello\r\n\r\n2\r\n00:00:02,000 --> 00:00:03,000\r\nworld";
    expect(normalizeTranscript(raw)).toEqual(["hello", "world"]);
  });

  it("returns an empty list for empty input", () => {
    expect(normalizeTranscript("")).toEqual([]);
  });
});

describe("decodeTranscript", () => {
  it("decodes UTF-8 and drops a BOM", () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode("안녕")]);
    expect(decodeTranscript(bytes)).toBe("안녕");
  });

  it("rejects invalid UTF-8", () => {
    expect(() => decodeTranscript(new Uint8Array([0xff, 0xfe, 0xfd]))).toThrow(ParsingError);
  });
});

describe("readTranscriptFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "srt-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and normalizes a caption file", async () => {
    const path = join(dir, "captions.srt");
    await writeFile(path, [block(1, "one"), block(2, "one"), block(3, "two")].join("\n\n"));
    await expect(readTranscriptFile(path)).resolves.toEqual(["one", "two"]);
  });

  it("reports a missing file as a parsing error", async () => {
    await expect(readTranscriptFile(join(dir, "missing.srt"))).rejects.toThrow(
      "Failed to read caption file",
    );
  });
});

describe("renderSrt", () => {
  it("renders numbered blocks with timings", () => {
    const srt = renderSrt([
      { text: "Hello world", startMs: 0, durationMs: 2500 },
      { text: "Later on", startMs: 3_723_004, durationMs: 1000 },
    ]);
    expect(srt).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nHello world\n\n" +
        "2\n01:02:03,004 --> 01:02:04,004\nLater on",
    );
  });

  it("skips empty segments and renumbers", () => {
    const srt = renderSrt([
      { text: " ", startMs: 0, durationMs: 1000 },
      { text: "kept", startMs: 1000, durationMs: 1000 },
    ]);
    expect(srt).toBe("1\n00:00:01,000 --> 00:00:02,000\nkept");
  });

  it("round-trips through the normalizer", () => {
    const srt = renderSrt([
      { text: "same", startMs: 0, durationMs: 1000 },
      { text: "same", startMs: 1000, durationMs: 1000 },
      { text: "next", startMs: 2000, durationMs: 1000 },
    ]);
    expect(normalizeTranscript(srt)).toEqual(["same", "next"]);
  });
});
