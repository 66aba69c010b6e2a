/**
 * PlayerItem - one playable locator and everything learned about it
 *
 * Holds the parsed playlist, the buffering flags published by BufferMonitor,
 * load status, presentation size and the item's ErrorLog. The player that
 * currently owns the item mutates it; observers subscribe to its events.
 */

import { TypedEventEmitter } from "./EventEmitter";
import { ErrorLog } from "./ErrorLog";
import { PlaylistParser } from "./PlaylistParser";
import {
  PlaybackError,
  PlaybackErrorCode,
  describePlaybackError,
  toError,
} from "./PlaybackErrors";
import type { BufferStatusTarget } from "./BufferMonitor";
import type { SegmentFetcher } from "./MediaCapabilities";
import type {
  BufferFlags,
  ErrorLogEvent,
  FormatDescriptor,
  ItemStatus,
  Locator,
  Playlist,
  PresentationSize,
  Segment,
} from "../types";

export interface PlayerItemEvents {
  /** Playback reached the end of the segment list */
  playedToEnd: { item: PlayerItem };
  /** Item failed to load */
  failed: { item: PlayerItem; error: PlaybackError };
  /** A runtime failure was appended to the error log */
  newErrorLogEntry: { item: PlayerItem; event: ErrorLogEvent };
  bufferStatusChange: { item: PlayerItem; flags: BufferFlags };
  statusChange: { item: PlayerItem; status: ItemStatus; previous: ItemStatus };
  presentationSizeChange: { item: PlayerItem; size: PresentationSize };
}

export interface PlayerItemOptions {
  /** Clock for error-log timestamps */
  now?: () => number;
  debug?: boolean;
}

export class PlayerItem extends TypedEventEmitter<PlayerItemEvents> implements BufferStatusTarget {
  readonly locator: Locator;
  readonly errorLog: ErrorLog;

  // Passive variant preferences; nothing in the engine evaluates them
  startsOnFirstEligibleVariant = true;
  preferredPeakBitRate = 0;

  private _playlist: Playlist | null = null;
  private _bufferEmpty = false;
  private _likelyToKeepUp = true;
  private _bufferFull = true;
  private _status: ItemStatus = "unknown";
  private _presentationSize: PresentationSize = { width: 0, height: 0 };
  private _errorOccurred = false;
  private _formatDescriptor: FormatDescriptor | null = null;
  private parser: PlaylistParser;
  private debug: boolean;

  constructor(locator: Locator, options: PlayerItemOptions = {}) {
    super();
    this.locator = locator;
    this.errorLog = new ErrorLog(options.now);
    this.debug = options.debug ?? false;
    this.parser = new PlaylistParser({ debug: this.debug });
  }

  get playlist(): Playlist | null {
    return this._playlist;
  }

  get segments(): readonly Segment[] {
    return this._playlist?.segments ?? [];
  }

  get availableQualities(): readonly Locator[] {
    return this._playlist?.variants ?? [];
  }

  get bufferEmpty(): boolean {
    return this._bufferEmpty;
  }

  get likelyToKeepUp(): boolean {
    return this._likelyToKeepUp;
  }

  get bufferFull(): boolean {
    return this._bufferFull;
  }

  get status(): ItemStatus {
    return this._status;
  }

  get presentationSize(): PresentationSize {
    return { ...this._presentationSize };
  }

  get errorOccurred(): boolean {
    return this._errorOccurred;
  }

  /** Format derived from the first segment; kept to reopen a session after stop */
  get formatDescriptor(): FormatDescriptor | null {
    return this._formatDescriptor;
  }

  /**
   * Fetch and parse the playlist. The parsed result replaces any earlier one
   * only when the whole fetch and parse succeed.
   *
   * Failures are recorded on the item; an aborted fetch is not.
   */
  async loadPlaylist(fetcher: SegmentFetcher, signal?: AbortSignal): Promise<boolean> {
    let data: Uint8Array;
    try {
      data = await fetcher.fetch(this.locator, { signal });
    } catch (err) {
      if (signal?.aborted) {
        this.log("Playlist fetch aborted");
        return false;
      }
      this.recordError(
        new PlaybackError(PlaybackErrorCode.LOAD_FAILURE, `Playlist fetch failed: ${toError(err).message}`, {
          cause: err,
        })
      );
      return false;
    }

    if (signal?.aborted) return false;

    const result = this.parser.parse(data);
    if (!result.ok) {
      this.recordError(new PlaybackError(PlaybackErrorCode.LOAD_FAILURE, result.error));
      return false;
    }

    this._playlist = result.playlist;
    this.log(`Playlist loaded: ${result.playlist.segments.length} segments`);
    return true;
  }

  setFormatDescriptor(format: FormatDescriptor): void {
    this._formatDescriptor = format;
  }

  markReadyToPlay(): void {
    this.setStatus("readyToPlay");
  }

  updateBufferStatus(flags: BufferFlags): void {
    this._bufferEmpty = flags.isBufferEmpty;
    this._likelyToKeepUp = flags.likelyToKeepUp;
    this._bufferFull = flags.isBufferFull;
    this.emit("bufferStatusChange", { item: this, flags: { ...flags } });
  }

  updatePresentationSize(size: PresentationSize): void {
    if (size.width === this._presentationSize.width && size.height === this._presentationSize.height) {
      return;
    }
    this._presentationSize = { width: size.width, height: size.height };
    this.emit("presentationSizeChange", { item: this, size: { ...this._presentationSize } });
  }

  /**
   * Record a load failure: the item is marked failed and observers get `failed`.
   */
  recordError(error: PlaybackError): void {
    const event = this.errorLog.append(describePlaybackError(error));
    this._errorOccurred = true;
    console.warn(`[PlayerItem] ${event.message}`);
    this.setStatus("failed");
    this.emit("failed", { item: this, error });
  }

  /**
   * Record a runtime failure. Playback is not affected.
   */
  notifyNewErrorEntry(error: PlaybackError): ErrorLogEvent {
    const event = this.errorLog.append(describePlaybackError(error));
    console.warn(`[PlayerItem] ${event.message}`);
    this.emit("newErrorLogEntry", { item: this, event });
    return event;
  }

  notifyPlayToEnd(): void {
    this.emit("playedToEnd", { item: this });
  }

  private setStatus(status: ItemStatus): void {
    const previous = this._status;
    if (previous === status) return;
    this._status = status;
    this.emit("statusChange", { item: this, status, previous });
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[PlayerItem] ${message}`);
    }
  }
}

export default PlayerItem;
