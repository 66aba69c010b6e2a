/**
 * PlaybackErrors - failure taxonomy for item loading and playback
 *
 * Load-phase failures keep an item from reaching readyToPlay and surface as a
 * `false` load result. Runtime failures are logged to the item's ErrorLog and
 * playback carries on. Nothing here retries; retry policy belongs to the
 * fetch collaborator.
 */

export enum PlaybackErrorCode {
  /** Playlist or first-segment fetch failed, or the playlist is unusable */
  LOAD_FAILURE = "LOAD_FAILURE",
  /** Required parameter blocks absent from the first segment */
  FORMAT_EXTRACTION_FAILURE = "FORMAT_EXTRACTION_FAILURE",
  /** Mid-playback segment fetch failed; the segment is skipped */
  SEGMENT_FETCH_FAILURE = "SEGMENT_FETCH_FAILURE",
  /** One decode unit failed; the session continues */
  DECODE_FAILURE = "DECODE_FAILURE",
  /** Decoder rejected the stream format */
  SESSION_CREATION_FAILURE = "SESSION_CREATION_FAILURE",
}

export type PlaybackErrorPhase = "load" | "runtime";

export const PLAYBACK_ERROR_PHASE: Record<PlaybackErrorCode, PlaybackErrorPhase> = {
  [PlaybackErrorCode.LOAD_FAILURE]: "load",
  [PlaybackErrorCode.FORMAT_EXTRACTION_FAILURE]: "load",
  [PlaybackErrorCode.SESSION_CREATION_FAILURE]: "load",
  [PlaybackErrorCode.SEGMENT_FETCH_FAILURE]: "runtime",
  [PlaybackErrorCode.DECODE_FAILURE]: "runtime",
};

export const PLAYBACK_ERROR_MESSAGES: Record<PlaybackErrorCode, string> = {
  [PlaybackErrorCode.LOAD_FAILURE]: "Failed to load item",
  [PlaybackErrorCode.FORMAT_EXTRACTION_FAILURE]: "Stream format parameters not found",
  [PlaybackErrorCode.SEGMENT_FETCH_FAILURE]: "Failed to load segment",
  [PlaybackErrorCode.DECODE_FAILURE]: "Decode error",
  [PlaybackErrorCode.SESSION_CREATION_FAILURE]: "Decoder rejected stream format",
};

export class PlaybackError extends Error {
  readonly code: PlaybackErrorCode;
  readonly segmentIndex?: number;

  constructor(
    code: PlaybackErrorCode,
    detail: string,
    options: { segmentIndex?: number; cause?: unknown } = {}
  ) {
    super(detail, { cause: options.cause });
    this.name = "PlaybackError";
    this.code = code;
    this.segmentIndex = options.segmentIndex;
  }

  get phase(): PlaybackErrorPhase {
    return PLAYBACK_ERROR_PHASE[this.code];
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}

/**
 * Format a failure as an ErrorLog message, e.g.
 * `Failed to load segment (segment 3): HTTP 404`.
 */
export function describePlaybackError(error: PlaybackError): string {
  const base = PLAYBACK_ERROR_MESSAGES[error.code];
  const where = error.segmentIndex !== undefined ? ` (segment ${error.segmentIndex})` : "";
  return `${base}${where}: ${error.message}`;
}
