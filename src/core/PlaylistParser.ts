/**
 * PlaylistParser - segmented-media playlist reader
 *
 * Recognized subset:
 *   #EXT-X-STREAM-INF...      variant (quality) reference, locator read from the same line
 *   #EXTINF:<seconds>,<title> duration of the next locator line
 *   any other #-line          ignored
 *   blank line                ignored
 *   anything else             a locator
 *
 * The only state carried between lines is the pending duration. A second
 * #EXTINF before any locator replaces the first (last wins), a locator with
 * no pending duration is ignored, and an #EXTINF whose number does not parse
 * clears the pending duration.
 */

import type { Locator, Playlist, Segment } from "../types";

export const VARIANT_STREAM_MARKER = "#EXT-X-STREAM-INF";
export const DURATION_MARKER = "#EXTINF:";

/** `NAME=` at the start of an attribute list, e.g. `BANDWIDTH=1280000,...` */
const ATTRIBUTE_LIST_PATTERN = /^[A-Z0-9-]+=/;

export type ParseResult = { ok: true; playlist: Playlist } | { ok: false; error: string };

/**
 * Decode playlist bytes as UTF-8, returning null when they are not valid text.
 */
export function decodePlaylistText(data: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch {
    return null;
  }
}

/**
 * Read the seconds field of an #EXTINF line. Returns null when the field is
 * missing, not a finite number, or negative.
 */
export function parseDurationLine(line: string): number | null {
  const field = line.slice(DURATION_MARKER.length).split(",")[0].trim();
  if (field === "") return null;
  const seconds = Number(field);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

/**
 * Read a locator from an #EXT-X-STREAM-INF line. Only a bare locator after the
 * tag yields a result; the usual attribute-list form yields null.
 */
export function parseVariantLine(line: string): Locator | null {
  let rest = line.slice(VARIANT_STREAM_MARKER.length);
  if (rest.startsWith(":")) rest = rest.slice(1);
  const candidate = rest.trim();

  if (candidate === "" || candidate.startsWith("#")) return null;
  if (/\s/.test(candidate)) return null;
  if (ATTRIBUTE_LIST_PATTERN.test(candidate)) return null;
  return candidate;
}

export function parsePlaylist(text: string): Playlist {
  const segments: Segment[] = [];
  const variants: Locator[] = [];
  let pendingDuration: number | null = null;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (line === "") continue;

    if (line.startsWith(VARIANT_STREAM_MARKER)) {
      const variant = parseVariantLine(line);
      if (variant !== null) variants.push(variant);
      continue;
    }

    if (line.startsWith(DURATION_MARKER)) {
      pendingDuration = parseDurationLine(line);
      continue;
    }

    if (line.startsWith("#")) continue;

    if (pendingDuration !== null) {
      segments.push(Object.freeze({ url: line, duration: pendingDuration }));
      pendingDuration = null;
    }
  }

  return { segments, variants };
}

export class PlaylistParser {
  private debug: boolean;

  constructor(options: { debug?: boolean } = {}) {
    this.debug = options.debug ?? false;
  }

  /**
   * Parse playlist text or raw bytes. Fails only when bytes are not valid
   * UTF-8; an empty segment list is a valid result.
   */
  parse(data: string | Uint8Array): ParseResult {
    const text = typeof data === "string" ? data : decodePlaylistText(data);
    if (text === null) {
      console.warn("[PlaylistParser] Playlist is not valid UTF-8 text");
      return { ok: false, error: "Playlist is not valid UTF-8 text" };
    }

    const playlist = parsePlaylist(text);
    if (this.debug) {
      console.log(
        `[PlaylistParser] Parsed ${playlist.segments.length} segments, ${playlist.variants.length} variants`
      );
    }
    return { ok: true, playlist };
  }
}

/**
 * Start offset in seconds of the segment at index (sum of earlier durations).
 */
export function segmentStartTime(segments: readonly Segment[], index: number): number {
  let total = 0;
  const end = Math.min(index, segments.length);
  for (let i = 0; i < end; i++) {
    total += segments[i].duration;
  }
  return total;
}

/**
 * Index of the first segment whose cumulative end time reaches targetSeconds.
 * Falls back to 0 when no segment reaches it (including an empty list).
 */
export function findSegmentIndexForTime(segments: readonly Segment[], targetSeconds: number): number {
  let accumulated = 0;
  for (let i = 0; i < segments.length; i++) {
    accumulated += segments[i].duration;
    if (accumulated >= targetSeconds) {
      return i;
    }
  }
  return 0;
}
