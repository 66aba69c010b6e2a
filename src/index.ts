/**
 * segplay-core
 *
 * Headless segmented-media playback engine. This package provides:
 * - PlaybackController: play/pause/stop/seek state machine with end-of-item actions
 * - PlayerItem: playlist, buffering flags, status and error log for one locator
 * - PlaylistParser, SegmentScheduler, DecodePipeline, BufferMonitor
 *
 * Decoding, rendering, audio output and transport are supplied by the host
 * through the capability interfaces in MediaCapabilities.
 */

export * from "./core";
export type * from "./types";
