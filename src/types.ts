/**
 * Shared data types for the playback engine.
 */

/** A fetchable media location, kept exactly as written in the playlist. */
export type Locator = string;

export interface Segment {
  readonly url: Locator;
  /** Seconds, always >= 0 */
  readonly duration: number;
}

export interface Playlist {
  readonly segments: readonly Segment[];
  /** Variant (quality) locators in appearance order */
  readonly variants: readonly Locator[];
}

export type Quality = { kind: "auto" } | { kind: "explicit"; index: number };

export type ActionAtItemEnd = "pause" | "stop" | "loop";

export type ItemStatus = "unknown" | "readyToPlay" | "failed";

export type PlaybackStateName = "idle" | "playing" | "paused" | "stopped";

export interface PresentationSize {
  width: number;
  height: number;
}

export interface BufferFlags {
  isBufferEmpty: boolean;
  likelyToKeepUp: boolean;
  isBufferFull: boolean;
}

export interface PlaybackState {
  state: PlaybackStateName;
  isPlaying: boolean;
  currentSegmentIndex: number;
  actionAtItemEnd: ActionAtItemEnd;
  /** Seconds */
  currentTime: number;
}

export interface ErrorLogEvent {
  /** Wall clock, ms since epoch */
  readonly timestamp: number;
  readonly message: string;
}

/**
 * Stream format derived from the first segment's parameter blocks.
 */
export interface FormatDescriptor {
  /** e.g. "avc1.64001f" */
  codec: string;
  /** SPS-analog block, starting at its marker byte */
  sps: Uint8Array;
  /** PPS-analog block, starting at its marker byte */
  pps: Uint8Array;
  /** Decoder configuration record built from both blocks */
  description: Uint8Array;
}

export interface DecodedFrame {
  width: number;
  height: number;
  /** Opaque decoder output, handed to the display sink untouched */
  image: unknown;
}
