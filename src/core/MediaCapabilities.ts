/**
 * Collaborator capabilities
 *
 * The engine never decodes, renders, mixes or touches the network itself.
 * These are the interfaces it needs from whoever does.
 */

import type { DecodedFrame, FormatDescriptor, Locator } from "../types";

export interface FetchOptions {
  /** Aborted when the item is replaced, stopped or the player destroyed */
  signal?: AbortSignal;
}

export interface SegmentFetcher {
  /**
   * Fetch a playlist or segment. One call per segment; no retries expected
   * from the engine's side.
   */
  fetch(locator: Locator, options?: FetchOptions): Promise<Uint8Array>;
}

/** Handle returned by the decoder; opaque to the engine */
export type DecoderSession = unknown;

export interface DecodeUnit {
  /** Whole segment payload, submitted as one unit */
  data: Uint8Array;
  segmentIndex: number;
}

export interface VideoDecoderCapability {
  /**
   * Open a session bound to one stream format.
   * @throws when the decoder rejects the format
   */
  establish(format: FormatDescriptor): DecoderSession;
  /**
   * Decode one unit. Settles on whatever context the decoder likes, possibly
   * out of submission order.
   */
  submit(session: DecoderSession, unit: DecodeUnit): Promise<DecodedFrame>;
  close(session: DecoderSession): void;
}

export interface DisplaySink {
  /** Always invoked from the presentation context. Aspect fitting is the sink's job. */
  present(frame: DecodedFrame): void;
}

/**
 * Raw segment bytes. The audio path hands segment payloads over unchanged;
 * there is no audio decode step in this engine.
 */
export type AudioSamples = Uint8Array;

export interface AudioSink {
  enqueue(samples: AudioSamples): void;
  play(): void;
  pause(): void;
  stop(): void;
  setVolume(level: number): void;
}

/**
 * Single serialized execution context for display delivery.
 */
export interface PresentationContext {
  post(task: () => void): void;
}

/**
 * FIFO queue drained on a microtask, one task at a time.
 */
export class MicrotaskPresentationContext implements PresentationContext {
  private queue: Array<() => void> = [];
  private scheduled = false;

  post(task: () => void): void {
    this.queue.push(task);
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    const tasks = this.queue;
    this.queue = [];
    for (const task of tasks) {
      runPresentationTask(task);
    }
  }
}

/**
 * Runs tasks synchronously, but never re-entrantly: a task posted from inside
 * another runs after it. Handy for tests and for hosts that are already on
 * their presentation thread.
 */
export class ImmediatePresentationContext implements PresentationContext {
  private queue: Array<() => void> = [];
  private running = false;

  post(task: () => void): void {
    this.queue.push(task);
    if (this.running) return;
    this.running = true;
    try {
      let next = this.queue.shift();
      while (next) {
        runPresentationTask(next);
        next = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }
}

function runPresentationTask(task: () => void): void {
  try {
    task();
  } catch (e) {
    console.error("[PresentationContext] Task error:", e);
  }
}
