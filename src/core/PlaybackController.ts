/**
 * PlaybackController.ts
 *
 * Headless player: owns the playback state machine, the current item, the
 * segment scheduler, the decode pipeline and the buffer monitor.
 *
 * States: idle -> playing <-> paused, and stopped (until play() restarts).
 *
 * Control calls (play/pause/stop/seek) run directly on the caller's context.
 * Fetch and decode completions are posted to a Mailbox and handled one at a
 * time by handleMessage(), which is the only place they touch state.
 *
 * Playback is paced by segment duration: starting segment i schedules the
 * next advance after duration(i) / rate seconds. An advance that finds the
 * list exhausted ends the item according to actionAtItemEnd.
 */

import { TypedEventEmitter } from "./EventEmitter";
import { BufferMonitor, type BufferMonitorOptions } from "./BufferMonitor";
import { DecodePipeline } from "./DecodePipeline";
import { HttpFetcher, resolveLocator } from "./HttpFetcher";
import { Mailbox } from "./Mailbox";
import { PlayerItem } from "./PlayerItem";
import { findSegmentIndexForTime, segmentStartTime } from "./PlaylistParser";
import { SegmentScheduler, type StartedSegment } from "./SegmentScheduler";
import { TimerManager } from "./TimerManager";
import { disposeAll, type Disposable } from "./Disposable";
import { PlaybackError, PlaybackErrorCode, toError } from "./PlaybackErrors";
import {
  MicrotaskPresentationContext,
  type AudioSink,
  type DisplaySink,
  type PresentationContext,
  type SegmentFetcher,
  type VideoDecoderCapability,
} from "./MediaCapabilities";
import type { EngineMessage } from "./EngineMessages";
import type {
  ActionAtItemEnd,
  Locator,
  PlaybackState,
  PlaybackStateName,
  Quality,
  Segment,
} from "../types";

// ============================================================================
// Types
// ============================================================================

export interface PlaybackControllerConfig {
  decoder: VideoDecoderCapability;
  displaySink: DisplaySink;
  audioSink: AudioSink;
  /** Playlist and segment transport. Defaults to HttpFetcher. */
  fetcher?: SegmentFetcher;
  /** Display delivery context. Defaults to MicrotaskPresentationContext. */
  presentationContext?: PresentationContext;
  actionAtItemEnd?: ActionAtItemEnd;
  /** 0..1 */
  volume?: number;
  rate?: number;
  defaultRate?: number;
  bufferMonitor?: Omit<BufferMonitorOptions, "now">;
  /** Clock in ms for buffer windows and error-log timestamps */
  now?: () => number;
  debug?: boolean;
}

export interface PlaybackControllerEvents {
  stateChange: { state: PlaybackStateName; previous: PlaybackStateName };
  /** Current item replaced (null when cleared) */
  itemChange: { item: PlayerItem | null };
  /** playNextSegment() started a segment */
  segmentStarted: StartedSegment;
  /** The current item played to its end; fired after the end action ran */
  itemEnded: { item: PlayerItem };
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_ACTION_AT_ITEM_END: ActionAtItemEnd = "pause";
const DEFAULT_VOLUME = 1.0;
const DEFAULT_RATE = 1.0;
const ADVANCE_TIMER = "advance";

// ============================================================================
// PlaybackController
// ============================================================================

/**
 * @example
 * ```typescript
 * const player = new PlaybackController({ decoder, displaySink, audioSink });
 * player.actionAtItemEnd = "loop";
 *
 * if (await player.load("https://cdn.example.com/vod/index.m3u8")) {
 *   player.play();
 * }
 * ```
 */
export class PlaybackController
  extends TypedEventEmitter<PlaybackControllerEvents>
  implements Disposable
{
  private readonly fetcher: SegmentFetcher;
  private readonly audioSink: AudioSink;
  private readonly scheduler: SegmentScheduler;
  private readonly pipeline: DecodePipeline;
  private readonly bufferMonitor: BufferMonitor;
  private readonly mailbox: Mailbox<EngineMessage>;
  private readonly timers: TimerManager;
  private readonly now: () => number;
  private readonly debug: boolean;

  private _state: PlaybackStateName = "idle";
  private _currentItem: PlayerItem | null = null;
  private _currentQuality: Quality = { kind: "auto" };
  private _actionAtItemEnd: ActionAtItemEnd;
  private _volume: number;
  private _rate: number;
  private _defaultRate: number;
  private _currentTime = 0;
  private _disposed = false;

  /** Bumped by every replaceCurrentItem(); stale loads compare against it */
  private loadToken = 0;
  private loadAbort: AbortController | null = null;

  constructor(config: PlaybackControllerConfig) {
    super();
    this.debug = config.debug ?? false;
    this.now = config.now ?? Date.now;
    this.fetcher = config.fetcher ?? new HttpFetcher({ debug: this.debug });
    this.audioSink = config.audioSink;
    this._actionAtItemEnd = config.actionAtItemEnd ?? DEFAULT_ACTION_AT_ITEM_END;
    this._volume = config.volume ?? DEFAULT_VOLUME;
    this._rate = config.rate ?? DEFAULT_RATE;
    this._defaultRate = config.defaultRate ?? DEFAULT_RATE;

    this.mailbox = new Mailbox<EngineMessage>((message) => this.handleMessage(message), {
      debug: this.debug,
    });
    this.scheduler = new SegmentScheduler({
      fetcher: this.fetcher,
      post: (message) => this.mailbox.post(message),
      isPlaying: () => this.isPlaying,
      debug: this.debug,
    });
    this.pipeline = new DecodePipeline({
      decoder: config.decoder,
      displaySink: config.displaySink,
      audioSink: config.audioSink,
      presentationContext: config.presentationContext ?? new MicrotaskPresentationContext(),
      post: (message) => this.mailbox.post(message),
      debug: this.debug,
    });
    this.bufferMonitor = new BufferMonitor({ ...config.bufferMonitor, now: this.now });
    this.timers = new TimerManager({ debug: this.debug });

    this.audioSink.setVolume(this._volume);
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get disposed(): boolean {
    return this._disposed;
  }

  get state(): PlaybackStateName {
    return this._state;
  }

  get isPlaying(): boolean {
    return this._state === "playing";
  }

  get currentItem(): PlayerItem | null {
    return this._currentItem;
  }

  get availableQualities(): readonly Locator[] {
    return this._currentItem?.availableQualities ?? [];
  }

  get currentQuality(): Quality {
    return this._currentQuality;
  }

  get actionAtItemEnd(): ActionAtItemEnd {
    return this._actionAtItemEnd;
  }

  set actionAtItemEnd(action: ActionAtItemEnd) {
    this._actionAtItemEnd = action;
  }

  get volume(): number {
    return this._volume;
  }

  set volume(level: number) {
    if (!Number.isFinite(level)) return;
    this._volume = Math.min(1, Math.max(0, level));
    this.audioSink.setVolume(this._volume);
  }

  get rate(): number {
    return this._rate;
  }

  set rate(rate: number) {
    this._rate = rate;
  }

  get defaultRate(): number {
    return this._defaultRate;
  }

  set defaultRate(rate: number) {
    this._defaultRate = rate;
  }

  private get hasPlayableItem(): boolean {
    return this._currentItem?.status === "readyToPlay";
  }

  /**
   * Start offset in seconds of the segment last started or seeked to.
   */
  currentTime(): number {
    return this._currentTime;
  }

  getState(): PlaybackState {
    return {
      state: this._state,
      isPlaying: this.isPlaying,
      currentSegmentIndex: this.scheduler.currentSegmentIndex,
      actionAtItemEnd: this._actionAtItemEnd,
      currentTime: this._currentTime,
    };
  }

  // ==========================================================================
  // Item loading
  // ==========================================================================

  /**
   * Create an item for locator and make it current.
   * @returns true once the item is readyToPlay
   */
  load(locator: Locator, preferredQualityIndex = 0): Promise<boolean> {
    return this.replaceCurrentItem(
      new PlayerItem(locator, { now: this.now, debug: this.debug }),
      preferredQualityIndex
    );
  }

  /**
   * Replace the current item. Work still in flight for the previous item is
   * cancelled and its decode session torn down.
   *
   * Load failures never throw: they are recorded on the item and the promise
   * resolves false. A load superseded by a later call also resolves false.
   * Passing null clears the current item and resolves true.
   */
  async replaceCurrentItem(item: PlayerItem | null, preferredQualityIndex = 0): Promise<boolean> {
    if (this._disposed) return false;

    const token = ++this.loadToken;
    this.releaseCurrentItem();

    if (!item) {
      this.emit("itemChange", { item: null });
      return true;
    }

    const ac = new AbortController();
    this.loadAbort = ac;
    const isSuperseded = () => token !== this.loadToken || this._disposed;

    const loaded = await item.loadPlaylist(this.fetcher, ac.signal);
    if (isSuperseded() || !loaded) return false;

    const segments = item.segments;
    if (segments.length === 0) {
      item.recordError(new PlaybackError(PlaybackErrorCode.LOAD_FAILURE, "Playlist contains no segments"));
      return false;
    }

    this._currentItem = item;
    this._currentQuality =
      preferredQualityIndex >= 0 && preferredQualityIndex < item.availableQualities.length
        ? { kind: "explicit", index: preferredQualityIndex }
        : { kind: "auto" };
    this.scheduler.setSegments(segments, item.locator);
    this.bufferMonitor.reset();
    this.bufferMonitor.attach(item);
    this._currentTime = 0;
    this.setState("idle");
    this.emit("itemChange", { item });

    const payload = await this.fetchFirstSegment(item, segments[0], ac.signal);
    if (isSuperseded() || !payload) return false;

    const format = this.pipeline.extractFormat(payload);
    if (format instanceof PlaybackError) {
      item.recordError(format);
      return false;
    }
    item.setFormatDescriptor(format);

    const established = this.pipeline.establish(format);
    if (!established.ok) {
      item.recordError(established.error);
      return false;
    }

    item.markReadyToPlay();
    this.log(`Item ready: ${segments.length} segments, quality ${describeQuality(this._currentQuality)}`);
    this.scheduler.loadSegment(this.scheduler.currentSegmentIndex);
    return true;
  }

  // ==========================================================================
  // Transport controls
  // ==========================================================================

  /**
   * Start or resume playback. Ignored until the current item is readyToPlay,
   * so a failed or still-loading item never plays partially.
   */
  play(): void {
    if (this._disposed || this.isPlaying) return;
    if (!this.hasPlayableItem) {
      this.log("play ignored, no item ready to play");
      return;
    }

    if (this._state === "stopped") {
      this.reopenSession();
    }

    this.setState("playing");
    this.audioSink.play();
    this.pipeline.setFrameDelivery(true);
    this.advance();
  }

  pause(): void {
    if (!this.isPlaying) return;

    this.setState("paused");
    this.audioSink.pause();
    this.pipeline.setFrameDelivery(false);
    this.timers.cancel(ADVANCE_TIMER);
  }

  stop(): void {
    if (this._disposed) return;

    this.timers.cancel(ADVANCE_TIMER);
    this.scheduler.cancel();
    this.scheduler.setCurrentSegmentIndex(0);
    this._currentTime = 0;
    this.pipeline.setFrameDelivery(false);
    this.audioSink.stop();
    this.pipeline.teardown();
    this.setState("stopped");
  }

  /**
   * Jump to the first segment whose cumulative end reaches targetSeconds.
   * A target past the end selects segment 0. While playing, pacing restarts
   * at the new index right away.
   */
  seek(targetSeconds: number): void {
    const item = this._currentItem;
    if (this._disposed || !item || !this.hasPlayableItem) {
      this.log("seek ignored, no item ready to play");
      return;
    }

    const wasPlaying = this.isPlaying;
    const index = findSegmentIndexForTime(item.segments, targetSeconds);
    this.scheduler.setCurrentSegmentIndex(index);
    this._currentTime = segmentStartTime(item.segments, index);
    this.log(`Seek to ${targetSeconds}s -> segment ${index}`);
    this.scheduler.loadSegment(index);

    if (wasPlaying) {
      this.play();
      this.timers.schedule(ADVANCE_TIMER, () => this.onAdvanceTimer(), 0);
    }
  }

  destroy(): void {
    this.dispose();
  }

  dispose(): void {
    if (this._disposed) return;
    this.stop();
    this._disposed = true;
    this.loadToken++;
    this.loadAbort?.abort();
    this.loadAbort = null;
    this.timers.cancelAll();
    this.mailbox.close();
    this.bufferMonitor.attach(null);
    disposeAll(this.scheduler, this.pipeline);
    this._currentItem = null;
    this.removeAllListeners();
  }

  // ==========================================================================
  // Pacing and end of item
  // ==========================================================================

  private advance(): void {
    const started = this.scheduler.playNextSegment();
    if (started) {
      const item = this._currentItem;
      this._currentTime = item ? segmentStartTime(item.segments, started.index) : 0;
      this.emit("segmentStarted", started);
      this.scheduleAdvance(started.segment);
      return;
    }

    if (
      this.isPlaying &&
      this._currentItem &&
      this.scheduler.currentSegmentIndex >= this.scheduler.segmentCount
    ) {
      this.handleEndOfItem();
    }
  }

  private scheduleAdvance(segment: Segment): void {
    const rate = this._rate > 0 ? this._rate : DEFAULT_RATE;
    this.timers.schedule(ADVANCE_TIMER, () => this.onAdvanceTimer(), (segment.duration * 1000) / rate);
  }

  private onAdvanceTimer(): void {
    if (!this.isPlaying) return;
    this.advance();
  }

  private handleEndOfItem(): void {
    const item = this._currentItem;
    if (!item) return;
    this.log(`End of item, action ${this._actionAtItemEnd}`);

    switch (this._actionAtItemEnd) {
      case "pause":
        this.pause();
        break;
      case "stop":
        this.stop();
        break;
      case "loop":
        this.seek(0);
        this.play();
        break;
    }

    item.notifyPlayToEnd();
    this.emit("itemEnded", { item });
  }

  // ==========================================================================
  // Completion handling (mailbox)
  // ==========================================================================

  private handleMessage(message: EngineMessage): void {
    const item = this._currentItem;

    switch (message.type) {
      case "segmentLoaded": {
        if (!item || !this.scheduler.isCurrentGeneration(message.generation)) {
          this.log(`Dropped stale segment ${message.index}`);
          return;
        }
        this.bufferMonitor.recordResult(true);
        this.bufferMonitor.addBufferedDuration(this.scheduler.segmentAt(message.index)?.duration ?? 0);
        this.bufferMonitor.check();
        this.pipeline.decode(message.index, message.payload);
        return;
      }

      case "segmentFailed": {
        if (!item || !this.scheduler.isCurrentGeneration(message.generation)) return;
        this.bufferMonitor.recordResult(false);
        this.bufferMonitor.check();
        item.notifyNewErrorEntry(
          new PlaybackError(PlaybackErrorCode.SEGMENT_FETCH_FAILURE, message.error.message, {
            segmentIndex: message.index,
            cause: message.error,
          })
        );
        return;
      }

      case "frameDecoded": {
        if (!item || !this.pipeline.isCurrentSession(message.sessionKey)) return;
        this.pipeline.present(message.frame, (frame) => {
          if (this._currentItem === item) {
            item.updatePresentationSize({ width: frame.width, height: frame.height });
          }
        });
        return;
      }

      case "decodeFailed": {
        if (!item || !this.pipeline.isCurrentSession(message.sessionKey)) return;
        item.notifyNewErrorEntry(
          new PlaybackError(PlaybackErrorCode.DECODE_FAILURE, message.error.message, {
            segmentIndex: message.index,
            cause: message.error,
          })
        );
        return;
      }
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async fetchFirstSegment(
    item: PlayerItem,
    segment: Segment,
    signal: AbortSignal
  ): Promise<Uint8Array | null> {
    try {
      return await this.fetcher.fetch(resolveLocator(item.locator, segment.url), { signal });
    } catch (err) {
      if (signal.aborted) {
        this.log("First segment fetch aborted");
        return null;
      }
      item.recordError(
        new PlaybackError(PlaybackErrorCode.LOAD_FAILURE, `First segment fetch failed: ${toError(err).message}`, {
          segmentIndex: 0,
          cause: err,
        })
      );
      return null;
    }
  }

  /**
   * Reopen a decode session torn down by stop(), from the item's format.
   */
  private reopenSession(): void {
    const item = this._currentItem;
    const format = item?.formatDescriptor;
    if (!item || !format || this.pipeline.hasSession) return;

    const established = this.pipeline.establish(format);
    if (!established.ok) {
      item.notifyNewErrorEntry(established.error);
    }
  }

  private releaseCurrentItem(): void {
    this.loadAbort?.abort();
    this.loadAbort = null;
    this.timers.cancel(ADVANCE_TIMER);
    this.scheduler.setSegments([], null);
    this.pipeline.teardown();
    this.pipeline.setFrameDelivery(false);
    if (this._state === "playing" || this._state === "paused") {
      this.audioSink.stop();
    }
    this.bufferMonitor.attach(null);
    this._currentItem = null;
    this._currentQuality = { kind: "auto" };
    this._currentTime = 0;
    this.setState("idle");
  }

  private setState(state: PlaybackStateName): void {
    const previous = this._state;
    if (previous === state) return;
    this._state = state;
    this.log(`State ${previous} -> ${state}`);
    this.emit("stateChange", { state, previous });
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[PlaybackController] ${message}`);
    }
  }
}

function describeQuality(quality: Quality): string {
  return quality.kind === "auto" ? "auto" : `#${quality.index}`;
}

export default PlaybackController;
