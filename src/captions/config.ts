/** Env var validation with fail-fast. Never logs actual values. */
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileCaptionCache } from "./cache.js";
import { SupabaseCaptionCache } from "./supabase-cache.js";
import type { CaptionCache, FetchFn } from "./types.js";

export type CacheBackend = "file" | "supabase";

export type CaptionConfig = {
  backend: CacheBackend;
  cacheDir: string;
  table: string;
  defaultLang: string;
  supabaseUrl?: string;
  supabaseKey?: string;
};

function required(env: NodeJS.ProcessEnv, name: string): string {
  const val = env[name];
  if (!val) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return val;
}

function optional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[name] || undefined;
}

function parseBackend(value: string | undefined): CacheBackend {
  if (value === undefined || value === "file") return "file";
  if (value === "supabase") return value;
  throw new Error(`Unknown CAPTION_CACHE_BACKEND: ${value} (expected "file" or "supabase")`);
}

/** `CAPTION_DEFAULT_LANG`, else "ko". Reads nothing else. */
export function getDefaultLang(env: NodeJS.ProcessEnv = process.env): string {
  return optional(env, "CAPTION_DEFAULT_LANG") ?? "ko";
}

/** Read settings from the environment. Throws if a required var is missing. */
export function getCaptionConfig(env: NodeJS.ProcessEnv = process.env): CaptionConfig {
  const backend = parseBackend(optional(env, "CAPTION_CACHE_BACKEND"));

  const config: CaptionConfig = {
    backend,
    cacheDir: optional(env, "CAPTION_CACHE_DIR") ?? join(tmpdir(), "caption_cache"),
    table: optional(env, "CAPTION_CACHE_TABLE") ?? "caption_cache",
    defaultLang: getDefaultLang(env),
  };

  if (backend === "supabase") {
    config.supabaseUrl = required(env, "SUPABASE_URL");
    config.supabaseKey = required(env, "SUPABASE_SERVICE_KEY");
  }

  return config;
}

export function createCaptionCache(config: CaptionConfig, fetchFn?: FetchFn): CaptionCache {
  if (config.backend === "supabase") {
    if (!config.supabaseUrl) throw new Error("SUPABASE_URL is not set");
    if (!config.supabaseKey) throw new Error("SUPABASE_SERVICE_KEY is not set");
    return new SupabaseCaptionCache({
      supabaseUrl: config.supabaseUrl,
      supabaseKey: config.supabaseKey,
      table: config.table,
      fetchFn,
    });
  }
  return new FileCaptionCache(config.cacheDir);
}
