/** 11-char base64-ish id (letters, digits, hyphens, underscores). */
const VIDEO_ID = /^[\w-]{11}$/;

const WATCH_HOSTS = new Set(["youtube.com", "m.youtube.com", "music.youtube.com"]);

/**
 * Extract a YouTube video ID from common URL formats.
 *
 * Handles:
 *  - youtube.com/watch?v=ID
 *  - youtu.be/ID
 *  - youtube.com/embed/ID (also youtube-nocookie.com)
 *  - youtube.com/shorts/ID
 *
 * The ID is returned exactly as it appears in the URL. Returns `null` when
 * the URL isn't a recognised YouTube link or the ID is not 11 characters.
 */
export function parseYouTubeVideoId(url: string): string | null {
  let u: URL;
  try {
    u = new URL(url.trim());
  } catch {
    return null;
  }

  const host = u.hostname.replace(/^www\./, "");

  if (host === "youtu.be") {
    return asVideoId(u.pathname.split("/")[1]);
  }

  if (WATCH_HOSTS.has(host)) {
    const v = asVideoId(u.searchParams.get("v"));
    if (v) return v;
  }

  if (WATCH_HOSTS.has(host) || host === "youtube-nocookie.com") {
    const match = u.pathname.match(/^\/(embed|shorts)\/([^/]+)/);
    if (match) return asVideoId(match[2]);
  }

  return null;
}

function asVideoId(candidate: string | null | undefined): string | null {
  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
}
