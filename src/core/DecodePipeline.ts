/**
 * DecodePipeline - decode session ownership and output routing
 *
 * Flow:
 * 1. establish(format) opens the one live session for the current item
 * 2. decode(index, payload) submits the whole segment as one decode unit and
 *    hands the same bytes to the audio sink
 * 3. Decoder completions come back as mailbox messages tagged with the
 *    session key; the controller calls present() for frames of the live
 *    session, and present() delivers on the presentation context
 *
 * Submissions to a session are chained so only one is outstanding at a time.
 * A failed unit is reported and skipped; the session stays up.
 */

import { BaseDisposable } from "./Disposable";
import { extractFormatDescriptor } from "./ParameterSets";
import { PlaybackError, PlaybackErrorCode, toError } from "./PlaybackErrors";
import {
  ImmediatePresentationContext,
  type AudioSink,
  type DecoderSession,
  type DisplaySink,
  type PresentationContext,
  type VideoDecoderCapability,
} from "./MediaCapabilities";
import type { DecoderMessage } from "./EngineMessages";
import type { DecodedFrame, FormatDescriptor } from "../types";

export interface DecodePipelineOptions {
  decoder: VideoDecoderCapability;
  displaySink: DisplaySink;
  audioSink: AudioSink;
  /** Where display delivery runs. Defaults to an ImmediatePresentationContext. */
  presentationContext?: PresentationContext;
  /** Completion sink, normally the controller's mailbox */
  post: (message: DecoderMessage) => void;
  debug?: boolean;
}

interface LiveSession {
  key: number;
  handle: DecoderSession;
  format: FormatDescriptor;
  /** Settles when the last submitted unit has settled */
  tail: Promise<void>;
}

export type EstablishResult =
  | { ok: true; sessionKey: number }
  | { ok: false; error: PlaybackError };

export class DecodePipeline extends BaseDisposable {
  private options: DecodePipelineOptions;
  private presentationContext: PresentationContext;
  private live: LiveSession | null = null;
  private nextSessionKey = 1;
  private frameDelivery = false;
  private debug: boolean;

  constructor(options: DecodePipelineOptions) {
    super();
    this.options = options;
    this.presentationContext = options.presentationContext ?? new ImmediatePresentationContext();
    this.debug = options.debug ?? false;
  }

  /**
   * Derive the stream format from a segment payload, or fail the load.
   */
  extractFormat(payload: Uint8Array): FormatDescriptor | PlaybackError {
    const format = extractFormatDescriptor(payload);
    if (!format) {
      return new PlaybackError(
        PlaybackErrorCode.FORMAT_EXTRACTION_FAILURE,
        "Parameter blocks not found in first segment",
        { segmentIndex: 0 }
      );
    }
    this.log(`Format ${format.codec} (sps ${format.sps.length}B, pps ${format.pps.length}B)`);
    return format;
  }

  /**
   * Open a session for format, replacing any live session.
   */
  establish(format: FormatDescriptor): EstablishResult {
    this.throwIfDisposed("establish");
    this.teardown();

    let handle: DecoderSession;
    try {
      handle = this.options.decoder.establish(format);
    } catch (err) {
      return {
        ok: false,
        error: new PlaybackError(
          PlaybackErrorCode.SESSION_CREATION_FAILURE,
          `Decoder rejected ${format.codec}: ${toError(err).message}`,
          { cause: err }
        ),
      };
    }

    const key = this.nextSessionKey++;
    this.live = { key, handle, format, tail: Promise.resolve() };
    this.log(`Session ${key} established for ${format.codec}`);
    return { ok: true, sessionKey: key };
  }

  get hasSession(): boolean {
    return this.live !== null;
  }

  isCurrentSession(key: number): boolean {
    return this.live?.key === key;
  }

  /**
   * Close and forget the live session. Completions still in flight for it
   * will no longer match isCurrentSession().
   */
  teardown(): void {
    const live = this.live;
    if (!live) return;
    this.live = null;
    try {
      this.options.decoder.close(live.handle);
    } catch (err) {
      console.warn(`[DecodePipeline] Error closing session ${live.key}:`, err);
    }
    this.log(`Session ${live.key} (${live.format.codec}) torn down`);
  }

  /**
   * Submit one segment payload.
   *
   * Audio gets the raw bytes directly; there is no audio decode step. Video
   * goes to the live session and completes via the mailbox. With no live
   * session (after stop(), before a restart) the video half is dropped.
   *
   * @returns Whether the unit reached a decode session
   */
  decode(index: number, payload: Uint8Array): boolean {
    if (this.disposed) return false;

    this.options.audioSink.enqueue(payload);

    const live = this.live;
    if (!live) {
      this.log(`No session, segment ${index} not decoded`);
      return false;
    }

    live.tail = live.tail.then(() => this.submitUnit(live, index, payload));
    return true;
  }

  setFrameDelivery(active: boolean): void {
    this.frameDelivery = active;
  }

  /**
   * Deliver a decoded frame to the display sink on the presentation context.
   * Frames reaching the context while delivery is inactive are dropped.
   */
  present(frame: DecodedFrame, onPresented?: (frame: DecodedFrame) => void): void {
    this.presentationContext.post(() => {
      if (this.disposed || !this.frameDelivery) return;
      this.options.displaySink.present(frame);
      onPresented?.(frame);
    });
  }

  private async submitUnit(live: LiveSession, index: number, data: Uint8Array): Promise<void> {
    if (this.live !== live) return;
    try {
      const frame = await this.options.decoder.submit(live.handle, { data, segmentIndex: index });
      this.options.post({ type: "frameDecoded", sessionKey: live.key, index, frame });
    } catch (err) {
      this.options.post({ type: "decodeFailed", sessionKey: live.key, index, error: toError(err) });
    }
  }

  protected onDispose(): void {
    this.teardown();
    this.frameDelivery = false;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[DecodePipeline] ${message}`);
    }
  }
}

export default DecodePipeline;
