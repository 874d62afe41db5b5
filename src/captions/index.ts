export { fetchCaptionText } from "./service.js";
export type { FetchCaptionTextOptions } from "./service.js";
export { parseYouTubeVideoId } from "./parse-url.js";
export { CACHE_RETENTION_MS, FileCaptionCache } from "./cache.js";
export type { FileCaptionCacheOptions } from "./cache.js";
export { SupabaseCaptionCache } from "./supabase-cache.js";
export type { SupabaseCaptionCacheOptions } from "./supabase-cache.js";
export { createCaptionCache, getCaptionConfig } from "./config.js";
export type { CacheBackend, CaptionConfig } from "./config.js";
export { decodeTranscript, normalizeTranscript, readTranscriptFile, renderSrt } from "./srt.js";
export {
  createRefinerRegistry,
  defaultRegistry,
  punctuationRefiner,
  refineSentences,
  sanitizeLang,
  selectRefiner,
} from "./refine.js";
export type { RefineStrategy, RefinerRegistry } from "./refine.js";
export { KOREAN_ENDINGS, createKoreanRefiner, koreanRefiner } from "./refine-ko.js";
export { buildEndingTable, loadEndingLists, matchEnding } from "./endings.js";
export type { Ending, EndingKind, EndingLists, EndingTable } from "./endings.js";
export { CaptionSourceError, YouTubeCaptionSource } from "./source.js";
export type { CaptionSourceFailure, YouTubeCaptionSourceOptions } from "./source.js";
export {
  CaptionError,
  InvalidIdentityError,
  ParsingError,
  UnavailableError,
} from "./errors.js";
export type { CaptionErrorCode, UnavailableReason } from "./errors.js";
export type {
  CacheEntry,
  CaptionCache,
  CaptionSegment,
  CaptionSource,
  CaptionTextResult,
  FetchFn,
  FetchedCaptions,
} from "./types.js";
