/** A single timed caption segment as delivered by the caption provider. */
export type CaptionSegment = {
  text: string;
  startMs: number;
  durationMs: number;
};

/** A cached transcript for one (video, language) pair. */
export type CacheEntry = {
  videoId: string;
  lang: string;
  /** Raw caption block text exactly as fetched. */
  transcript: string;
  title: string;
  createdAt: Date;
};

/**
 * Storage for fetched transcripts, keyed by video id and language.
 *
 * `lookup` resolves `null` for anything it cannot serve (absent, expired or
 * corrupt); it never rejects because of the stored data.
 */
export interface CaptionCache {
  lookup(videoId: string, lang: string): Promise<CacheEntry | null>;
  put(videoId: string, lang: string, transcript: string, title: string): Promise<void>;
  evict(videoId: string, lang: string): Promise<void>;
}

/** What a caption source hands back for a video. */
export type FetchedCaptions = {
  title: string;
  /** Caption blocks (index, timing, text) separated by blank lines. */
  transcript: string;
};

export interface CaptionSource {
  fetchCaptions(videoId: string, lang: string): Promise<FetchedCaptions>;
}

/** Result of turning a video URL into refined caption text. */
export type CaptionTextResult = {
  videoId: string;
  lang: string;
  title: string;
  /** Sentences separated by blank lines. */
  text: string;
  /** Normalized caption lines the text was refined from. */
  lines: string[];
  fromCache: boolean;
};

export type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;
