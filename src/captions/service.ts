import { createCaptionCache, getCaptionConfig, getDefaultLang } from "./config.js";
import { InvalidIdentityError, ParsingError, UnavailableError, errorMessage } from "./errors.js";
import { warn } from "./log.js";
import { parseYouTubeVideoId } from "./parse-url.js";
import { defaultRegistry, refineSentences, type RefinerRegistry } from "./refine.js";
import { CaptionSourceError, YouTubeCaptionSource, type CaptionSourceFailure } from "./source.js";
import { normalizeTranscript } from "./srt.js";
import type {
  CaptionCache,
  CaptionSource,
  CaptionTextResult,
  FetchFn,
  FetchedCaptions,
} from "./types.js";

export type FetchCaptionTextOptions = {
  /** Caption language code. Default: CAPTION_DEFAULT_LANG, then "ko". */
  lang?: string;
  /** Skip the cache lookup and fetch again; the fresh copy is still cached. */
  forceRefresh?: boolean;
  /** Override the cache built from the environment. */
  cache?: CaptionCache;
  /** Override the YouTube caption source. */
  source?: CaptionSource;
  /** Used by the default source (and the Supabase cache) when given. */
  fetchFn?: FetchFn;
  registry?: RefinerRegistry;
};

const UNAVAILABLE_MESSAGES: Record<CaptionSourceFailure, string> = {
  "not-found": "Video not found",
  "access-denied": "Access denied: YouTube may require sign-in",
  "rate-limited": "Too many requests: YouTube is rate limiting, try again later",
  "transcript-disabled": "Captions are not available",
};

/**
 * Main entry point: turn a YouTube URL into refined caption text.
 *
 * Serves the raw transcript from the cache when a fresh copy exists,
 * otherwise fetches it and writes it through. Refinement always runs on the
 * raw transcript, so refiner changes apply to cached videos too.
 */
export async function fetchCaptionText(
  videoUrl: string,
  opts?: FetchCaptionTextOptions,
): Promise<CaptionTextResult> {
  const videoId = parseYouTubeVideoId(videoUrl);
  if (!videoId) {
    throw new InvalidIdentityError(videoUrl);
  }

  const lang = opts?.lang ?? getDefaultLang();
  const cache = opts?.cache ?? createCaptionCache(getCaptionConfig(), opts?.fetchFn);

  let title: string;
  let transcript: string;

  const cached = opts?.forceRefresh ? null : await cache.lookup(videoId, lang);
  const fromCache = cached !== null;
  if (cached) {
    ({ title, transcript } = cached);
  } else {
    const source = opts?.source ?? new YouTubeCaptionSource({ fetchFn: opts?.fetchFn });
    ({ title, transcript } = await fetchFromSource(source, videoId, lang));
  }

  const lines = normalizeTranscript(transcript);
  if (lines.length === 0) {
    throw new ParsingError(`No text could be extracted from the '${lang}' captions`);
  }

  // Only transcripts that yield text are cached.
  if (!fromCache) {
    try {
      await cache.put(videoId, lang, transcript, title);
    } catch (err) {
      warn("captions", `cache write failed for ${videoId}/${lang}: ${errorMessage(err)}`);
    }
  }

  const text = refineSentences(lines, lang, opts?.registry ?? defaultRegistry);

  return { videoId, lang, title, text, lines, fromCache };
}

async function fetchFromSource(
  source: CaptionSource,
  videoId: string,
  lang: string,
): Promise<FetchedCaptions> {
  try {
    return await source.fetchCaptions(videoId, lang);
  } catch (err) {
    if (err instanceof CaptionSourceError) {
      throw new UnavailableError(err.reason, `${UNAVAILABLE_MESSAGES[err.reason]}: ${err.message}`, {
        cause: err,
      });
    }
    throw new UnavailableError("unknown", `Failed to fetch captions: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
