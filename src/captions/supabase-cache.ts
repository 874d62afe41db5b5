import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { CACHE_RETENTION_MS, placeholderTitle } from "./cache.js";
import { isRecord } from "./guards.js";
import { warn } from "./log.js";
import type { CacheEntry, CaptionCache, FetchFn } from "./types.js";

export type SupabaseCaptionCacheOptions = {
  supabaseUrl: string;
  supabaseKey: string;
  /** Table holding one row per (video_id, lang). Default: `caption_cache`. */
  table?: string;
  fetchFn?: FetchFn;
  now?: () => number;
  retentionMs?: number;
};

type CacheRow = {
  video_id: string;
  lang: string;
  transcript: string;
  title: string | null;
  created_at: string;
};

const COLUMNS = "video_id, lang, transcript, title, created_at";

/**
 * Transcript cache backed by a Supabase (PostgREST) table.
 *
 * Upserts on the `(video_id, lang)` unique constraint. Same retention rules
 * as the file cache, with `created_at` standing in for the payload mtime.
 */
export class SupabaseCaptionCache implements CaptionCache {
  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly now: () => number;
  private readonly retentionMs: number;

  constructor(opts: SupabaseCaptionCacheOptions) {
    this.client = createClient(opts.supabaseUrl, opts.supabaseKey, {
      auth: { persistSession: false, autoRefreshToken: false },
      global: opts.fetchFn ? { fetch: opts.fetchFn } : {},
    });
    this.table = opts.table ?? "caption_cache";
    this.now = opts.now ?? Date.now;
    this.retentionMs = opts.retentionMs ?? CACHE_RETENTION_MS;
  }

  async lookup(videoId: string, lang: string): Promise<CacheEntry | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select(COLUMNS)
      .eq("video_id", videoId)
      .eq("lang", lang)
      .maybeSingle();

    if (error) {
      warn("caption-cache", `lookup failed for ${videoId}/${lang}: ${error.message}`);
      return null;
    }
    if (data === null) return null;

    const row: unknown = data;
    if (!isCacheRow(row)) {
      warn("caption-cache", `ignoring malformed row ${videoId}/${lang}`);
      return null;
    }

    const createdAt = Date.parse(row.created_at);
    if (Number.isNaN(createdAt)) {
      warn("caption-cache", `ignoring row with bad created_at ${videoId}/${lang}`);
      return null;
    }

    if (this.now() - createdAt > this.retentionMs) {
      await this.evict(videoId, lang);
      return null;
    }

    return {
      videoId,
      lang,
      transcript: row.transcript,
      title: row.title ?? placeholderTitle(videoId),
      createdAt: new Date(createdAt),
    };
  }

  async put(videoId: string, lang: string, transcript: string, title: string): Promise<void> {
    const row: CacheRow = {
      video_id: videoId,
      lang,
      transcript,
      title,
      created_at: new Date(this.now()).toISOString(),
    };

    const { error } = await this.client
      .from(this.table)
      .upsert(row, { onConflict: "video_id,lang" });

    if (error) {
      throw new Error(`Supabase cache write failed: ${error.message}`);
    }
  }

  async evict(videoId: string, lang: string): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .delete()
      .eq("video_id", videoId)
      .eq("lang", lang);

    if (error) {
      warn("caption-cache", `could not delete ${videoId}/${lang}: ${error.message}`);
    }
  }
}

function isCacheRow(value: unknown): value is CacheRow {
  return (
    isRecord(value) &&
    typeof value.video_id === "string" &&
    typeof value.lang === "string" &&
    typeof value.transcript === "string" &&
    (value.title === null || typeof value.title === "string") &&
    typeof value.created_at === "string"
  );
}
