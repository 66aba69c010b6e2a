/**
 * SegmentScheduler - sequential segment fetching
 *
 * Fetches segments by index and advances the playback cursor. There is no
 * request queue: call sites issue one fetch at a time by convention.
 *
 * playNextSegment() advances the cursor as soon as the fetch is issued, not
 * when it completes, so a failed fetch still moves playback past its segment
 * and completions may arrive after the cursor has moved on. Completions are
 * posted as messages tagged with the generation they were issued under;
 * cancel() bumps the generation and aborts everything in flight.
 */

import { BaseDisposable } from "./Disposable";
import { resolveLocator } from "./HttpFetcher";
import { toError } from "./PlaybackErrors";
import type { SchedulerMessage } from "./EngineMessages";
import type { SegmentFetcher } from "./MediaCapabilities";
import type { Locator, Segment } from "../types";

export interface SegmentSchedulerOptions {
  fetcher: SegmentFetcher;
  /** Completion sink, normally the controller's mailbox */
  post: (message: SchedulerMessage) => void;
  /** Whether playback is currently running */
  isPlaying: () => boolean;
  debug?: boolean;
}

export interface StartedSegment {
  index: number;
  segment: Segment;
}

export class SegmentScheduler extends BaseDisposable {
  private options: SegmentSchedulerOptions;
  private segments: readonly Segment[] = [];
  private baseLocator: Locator | null = null;
  private cursor = 0;
  private _generation = 0;
  private abortController = new AbortController();
  private debug: boolean;

  constructor(options: SegmentSchedulerOptions) {
    super();
    this.options = options;
    this.debug = options.debug ?? false;
  }

  get currentSegmentIndex(): number {
    return this.cursor;
  }

  get segmentCount(): number {
    return this.segments.length;
  }

  get generation(): number {
    return this._generation;
  }

  /**
   * Point the scheduler at a new segment list. Anything in flight for the
   * previous list is cancelled and the cursor returns to 0.
   */
  setSegments(segments: readonly Segment[], baseLocator: Locator | null): void {
    this.cancel();
    this.segments = segments;
    this.baseLocator = baseLocator;
    this.cursor = 0;
  }

  segmentAt(index: number): Segment | undefined {
    return this.segments[index];
  }

  /**
   * Move the cursor, clamped to [0, segmentCount].
   */
  setCurrentSegmentIndex(index: number): void {
    const whole = Number.isFinite(index) ? Math.trunc(index) : 0;
    this.cursor = Math.min(Math.max(0, whole), this.segments.length);
  }

  isCurrentGeneration(generation: number): boolean {
    return generation === this._generation;
  }

  /**
   * Abort in-flight fetches; their completions will be ignored.
   */
  cancel(): void {
    this.abortController.abort();
    this.abortController = new AbortController();
    this._generation++;
  }

  /**
   * Fetch the segment at index. Out-of-range indices are a no-op. No retry on
   * failure.
   */
  loadSegment(index: number): void {
    if (this.disposed) return;
    const segment = this.segments[index];
    if (index < 0 || !segment) return;

    void this.fetchSegment(index, segment, this._generation, this.abortController.signal);
  }

  /**
   * Load the segment under the cursor and advance the cursor. Only proceeds
   * while playing and before the end of the list.
   *
   * @returns The segment started, or null when nothing was started
   */
  playNextSegment(): StartedSegment | null {
    if (!this.options.isPlaying() || this.cursor >= this.segments.length) {
      return null;
    }
    const index = this.cursor;
    const segment = this.segments[index];
    this.loadSegment(index);
    this.cursor++;
    return { index, segment };
  }

  private async fetchSegment(
    index: number,
    segment: Segment,
    generation: number,
    signal: AbortSignal
  ): Promise<void> {
    const locator = this.baseLocator ? resolveLocator(this.baseLocator, segment.url) : segment.url;
    this.log(`Fetching segment ${index}: ${locator}`);

    try {
      const payload = await this.options.fetcher.fetch(locator, { signal });
      if (signal.aborted) {
        this.log(`Discarding segment ${index}, cancelled`);
        return;
      }
      this.options.post({ type: "segmentLoaded", generation, index, payload });
    } catch (err) {
      if (signal.aborted) {
        this.log(`Segment ${index} fetch aborted`);
        return;
      }
      this.options.post({ type: "segmentFailed", generation, index, error: toError(err) });
    }
  }

  protected onDispose(): void {
    this.cancel();
    this.segments = [];
    this.cursor = 0;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[SegmentScheduler] ${message}`);
    }
  }
}

export default SegmentScheduler;
