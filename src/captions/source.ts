import { renderSrt } from "./srt.js";
import type { CaptionSegment, CaptionSource, FetchFn, FetchedCaptions } from "./types.js";

export type CaptionSourceFailure =
  | "not-found"
  | "access-denied"
  | "rate-limited"
  | "transcript-disabled";

/** Failure reported by a caption source. The service translates it. */
export class CaptionSourceError extends Error {
  readonly reason: CaptionSourceFailure;

  constructor(reason: CaptionSourceFailure, message: string) {
    super(message);
    this.name = "CaptionSourceError";
    this.reason = reason;
  }
}

export type YouTubeCaptionSourceOptions = {
  fetchFn?: FetchFn;
};

const BROWSER_UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

/**
 * Fetch captions straight from YouTube.
 *
 *  1. Scrape the watch page for `ytInitialPlayerResponse` (title, playability,
 *     caption tracks)
 *  2. Download the track for the requested language, auto-generated first,
 *     and render it as caption blocks
 */
export class YouTubeCaptionSource implements CaptionSource {
  private readonly fetchFn: FetchFn;

  constructor(opts?: YouTubeCaptionSourceOptions) {
    this.fetchFn = opts?.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
  }

  async fetchCaptions(videoId: string, lang: string): Promise<FetchedCaptions> {
    const pageUrl = `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
    const pageRes = await this.fetchFn(pageUrl, {
      headers: { "User-Agent": BROWSER_UA, "Accept-Language": lang },
    });
    checkStatus(pageRes, "YouTube page fetch");
    const html = await pageRes.text();

    const player = extractPlayerResponse(html);
    if (!player) {
      throw new CaptionSourceError("not-found", "Could not find ytInitialPlayerResponse in page");
    }
    checkPlayability(player);

    const title = player.videoDetails?.title ?? "Untitled";
    const tracks = player.captions?.playerCaptionsTracklistRenderer?.captionTracks ?? [];
    if (tracks.length === 0) {
      throw new CaptionSourceError(
        "transcript-disabled",
        "No caption tracks available for this video",
      );
    }

    const track = pickTrack(tracks, lang);
    if (!track) {
      throw new CaptionSourceError(
        "transcript-disabled",
        `No captions available for language '${lang}'`,
      );
    }

    const xmlRes = await this.fetchFn(track.baseUrl, {
      headers: { "User-Agent": BROWSER_UA },
    });
    checkStatus(xmlRes, "Timedtext fetch");
    const segments = parseTimedText(await xmlRes.text());

    return { title, transcript: renderSrt(segments) };
  }
}

// --- helpers ---

type CaptionTrack = {
  baseUrl: string;
  languageCode?: string;
  kind?: string;
};

type PlayerResponse = {
  playabilityStatus?: { status?: string; reason?: string };
  videoDetails?: { title?: string };
  captions?: {
    playerCaptionsTracklistRenderer?: { captionTracks?: CaptionTrack[] };
  };
};

function checkStatus(res: Response, what: string): void {
  if (res.ok) return;
  if (res.status === 429) {
    throw new CaptionSourceError("rate-limited", `${what} failed: 429 Too Many Requests`);
  }
  if (res.status === 403) {
    throw new CaptionSourceError("access-denied", `${what} failed: 403`);
  }
  throw new CaptionSourceError("not-found", `${what} failed: ${res.status}`);
}

function checkPlayability(player: PlayerResponse): void {
  const status = player.playabilityStatus?.status;
  const reason = player.playabilityStatus?.reason ?? "";
  if (!status || status === "OK") return;

  if (status === "LOGIN_REQUIRED" || /sign in|not a bot/i.test(reason)) {
    throw new CaptionSourceError("access-denied", reason || "Sign-in required");
  }
  if (status === "ERROR") {
    throw new CaptionSourceError("not-found", reason || "Video unavailable");
  }
  throw new CaptionSourceError("access-denied", reason || `Video is ${status.toLowerCase()}`);
}

function extractPlayerResponse(html: string): PlayerResponse | null {
  const marker = "var ytInitialPlayerResponse = ";
  const start = html.indexOf(marker);
  if (start === -1) return null;

  const jsonStart = start + marker.length;
  let depth = 0;
  let inString = false;
  let end = -1;
  for (let i = jsonStart; i < html.length; i++) {
    const ch = html[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        end = i + 1;
        break;
      }
    }
  }

  if (end === -1) return null;
  try {
    return JSON.parse(html.slice(jsonStart, end)) as PlayerResponse;
  } catch {
    return null;
  }
}

/** Exact language match, auto-generated (`asr`) track first. */
function pickTrack(tracks: CaptionTrack[], lang: string): CaptionTrack | undefined {
  const matching = tracks.filter((t) => t.languageCode === lang);
  return matching.find((t) => t.kind === "asr") ?? matching[0];
}

/** Out-of-range code points stay as the original entity text. */
function fromCodePoint(code: number, entity: string): string {
  return code <= 0x10ffff ? String.fromCodePoint(code) : entity;
}

function htmlDecode(s: string): string {
  return s
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (entity, n: string) => fromCodePoint(Number(n), entity))
    .replace(/&#x([\da-f]+);/gi, (entity, n: string) => fromCodePoint(parseInt(n, 16), entity))
    .replace(/&amp;/g, "&")
    .replace(/\n/g, " ");
}

export function parseTimedText(xml: string): CaptionSegment[] {
  const segments: CaptionSegment[] = [];
  const re = /<text\s+start="([\d.]+)"(?:\s+dur="([\d.]+)")?[^>]*>([\s\S]*?)<\/text>/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(xml)) !== null) {
    segments.push({
      text: htmlDecode(m[3]).trim(),
      startMs: Math.round(Number(m[1]) * 1000),
      durationMs: Math.round(Number(m[2] ?? 0) * 1000),
    });
  }
  return segments;
}
