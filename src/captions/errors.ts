export type CaptionErrorCode = "INVALID_IDENTITY" | "UNAVAILABLE" | "PARSING";

/** Base class for failures whose message is meant for the end user. */
export class CaptionError extends Error {
  readonly code: CaptionErrorCode;

  constructor(code: CaptionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaptionError";
    this.code = code;
  }
}

/** The URL carries no recognisable video id. */
export class InvalidIdentityError extends CaptionError {
  readonly url: string;

  constructor(url: string) {
    super("INVALID_IDENTITY", `Invalid YouTube URL: ${url}`);
    this.name = "InvalidIdentityError";
    this.url = url;
  }
}

export type UnavailableReason =
  | "not-found"
  | "access-denied"
  | "rate-limited"
  | "transcript-disabled"
  | "unknown";

/** No transcript could be obtained for the video. */
export class UnavailableError extends CaptionError {
  readonly reason: UnavailableReason;

  constructor(reason: UnavailableReason, message: string, options?: { cause?: unknown }) {
    super("UNAVAILABLE", message, options);
    this.name = "UnavailableError";
    this.reason = reason;
  }
}

/** Obtained content could not be normalized or refined. */
export class ParsingError extends CaptionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSING", message, options);
    this.name = "ParsingError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
