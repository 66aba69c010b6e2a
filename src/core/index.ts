/**
 * Core playback engine
 *
 * Exports the controller, the per-item model and the components it drives.
 */

// Controller and item
export { PlaybackController } from "./PlaybackController";
export type { PlaybackControllerConfig, PlaybackControllerEvents } from "./PlaybackController";
export { PlayerItem } from "./PlayerItem";
export type { PlayerItemEvents, PlayerItemOptions } from "./PlayerItem";
export { ErrorLog } from "./ErrorLog";

// Playlist parsing
export {
  PlaylistParser,
  parsePlaylist,
  parseDurationLine,
  parseVariantLine,
  decodePlaylistText,
  segmentStartTime,
  findSegmentIndexForTime,
  VARIANT_STREAM_MARKER,
  DURATION_MARKER,
} from "./PlaylistParser";
export type { ParseResult } from "./PlaylistParser";

// Fetching and scheduling
export { SegmentScheduler } from "./SegmentScheduler";
export type { SegmentSchedulerOptions, StartedSegment } from "./SegmentScheduler";
export { HttpFetcher, resolveLocator } from "./HttpFetcher";
export type { HttpFetcherOptions } from "./HttpFetcher";

// Decoding
export { DecodePipeline } from "./DecodePipeline";
export type { DecodePipelineOptions, EstablishResult } from "./DecodePipeline";
export {
  extractFormatDescriptor,
  findStartCode,
  findNextBoundary,
  codecStringFromSps,
  buildAvcConfigurationRecord,
  START_CODE,
  SPS_MARKER,
  PPS_MARKER,
} from "./ParameterSets";

// Buffering
export { BufferMonitor } from "./BufferMonitor";
export type { BufferMonitorOptions, BufferStatusTarget } from "./BufferMonitor";

// Collaborator capabilities
export { MicrotaskPresentationContext, ImmediatePresentationContext } from "./MediaCapabilities";
export type {
  FetchOptions,
  SegmentFetcher,
  DecoderSession,
  DecodeUnit,
  VideoDecoderCapability,
  DisplaySink,
  AudioSamples,
  AudioSink,
  PresentationContext,
} from "./MediaCapabilities";

// Errors
export {
  PlaybackError,
  PlaybackErrorCode,
  PLAYBACK_ERROR_PHASE,
  PLAYBACK_ERROR_MESSAGES,
  describePlaybackError,
  toError,
} from "./PlaybackErrors";
export type { PlaybackErrorPhase } from "./PlaybackErrors";

// Infrastructure
export { TypedEventEmitter } from "./EventEmitter";
export { BaseDisposable, disposeAll } from "./Disposable";
export type { Disposable } from "./Disposable";
export { TimerManager } from "./TimerManager";
export { Mailbox } from "./Mailbox";
export type { MessageHandler } from "./Mailbox";
export type {
  EngineMessage,
  SchedulerMessage,
  DecoderMessage,
  SegmentLoadedMessage,
  SegmentFailedMessage,
  FrameDecodedMessage,
  DecodeFailedMessage,
} from "./EngineMessages";
