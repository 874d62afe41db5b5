import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage } from "./errors.js";
import { isRecord } from "./guards.js";
import { warn } from "./log.js";
import { decodeTranscript } from "./srt.js";
import type { CacheEntry, CaptionCache } from "./types.js";

/** Entries older than this are refetched. */
export const CACHE_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

export function placeholderTitle(videoId: string): string {
  return `Cached Video (${videoId})`;
}

export type FileCaptionCacheOptions = {
  /** Clock override, milliseconds since epoch. */
  now?: () => number;
  retentionMs?: number;
};

/**
 * Flat-file transcript cache.
 *
 * Each (video, language) pair is two files in `dir`: the raw caption payload
 * `<id>.<lang>.srt` and a `<id>.<lang>.meta.json` sidecar holding the title.
 * An entry is served only when both exist; age is taken from the payload's
 * mtime. Expired entries are removed on the lookup that finds them.
 */
export class FileCaptionCache implements CaptionCache {
  readonly dir: string;
  private readonly now: () => number;
  private readonly retentionMs: number;

  constructor(dir: string, opts?: FileCaptionCacheOptions) {
    this.dir = dir;
    this.now = opts?.now ?? Date.now;
    this.retentionMs = opts?.retentionMs ?? CACHE_RETENTION_MS;
  }

  paths(videoId: string, lang: string): { payload: string; meta: string } {
    const base = `${videoId}.${safeLang(lang)}`;
    return {
      payload: join(this.dir, `${base}.srt`),
      meta: join(this.dir, `${base}.meta.json`),
    };
  }

  async lookup(videoId: string, lang: string): Promise<CacheEntry | null> {
    const { payload, meta } = this.paths(videoId, lang);

    const [payloadStat, metaExists] = await Promise.all([statOrNull(payload), exists(meta)]);
    if (!payloadStat || !metaExists) return null;

    if (this.now() - payloadStat.mtimeMs > this.retentionMs) {
      await this.evict(videoId, lang);
      return null;
    }

    let stored: { title: unknown; transcript: string };
    try {
      stored = await readEntry(payload, meta);
    } catch (err) {
      warn("caption-cache", `ignoring unreadable entry ${videoId}/${lang}: ${errorMessage(err)}`);
      return null;
    }

    return {
      videoId,
      lang,
      transcript: stored.transcript,
      title: typeof stored.title === "string" ? stored.title : placeholderTitle(videoId),
      createdAt: new Date(payloadStat.mtimeMs),
    };
  }

  async put(videoId: string, lang: string, transcript: string, title: string): Promise<void> {
    const { payload, meta } = this.paths(videoId, lang);
    await mkdir(this.dir, { recursive: true });
    // Drop the old sidecar first so a failed write below leaves a payload-only miss.
    await rm(meta, { force: true });
    await writeFile(payload, transcript, "utf8");
    await writeFile(meta, JSON.stringify({ title }), "utf8");
  }

  async evict(videoId: string, lang: string): Promise<void> {
    const { payload, meta } = this.paths(videoId, lang);
    const results = await Promise.allSettled([rm(payload, { force: true }), rm(meta, { force: true })]);
    for (const r of results) {
      if (r.status === "rejected") {
        warn("caption-cache", `could not delete ${videoId}/${lang}: ${errorMessage(r.reason)}`);
      }
    }
  }
}

async function readEntry(
  payload: string,
  meta: string,
): Promise<{ title: unknown; transcript: string }> {
  const parsed: unknown = JSON.parse(await readFile(meta, "utf8"));
  if (!isRecord(parsed)) throw new Error("metadata is not an object");
  return { title: parsed.title, transcript: decodeTranscript(await readFile(payload)) };
}

/** Language codes become part of a file name; keep only safe characters. */
function safeLang(lang: string): string {
  return lang.replace(/[^A-Za-z0-9_-]/g, "") || "default";
}

async function statOrNull(path: string) {
  try {
    const s = await stat(path);
    return s.isFile() ? s : null;
  } catch {
    return null;
  }
}

async function exists(path: string): Promise<boolean> {
  return (await statOrNull(path)) !== null;
}
