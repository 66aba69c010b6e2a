/**
 * BufferMonitor - buffering heuristic from rolling read counters
 *
 * Flags derived on every check():
 *   isBufferEmpty  = failedReads >= maxFailedReadsForEmptyBuffer
 *   likelyToKeepUp = successfulReads > failedReads
 *   isBufferFull   = bufferDuration >= requiredBufferSeconds
 *
 * Counters cover a rolling window: when a check comes more than
 * checkIntervalMs after the window opened, they are zeroed after the flags
 * are computed, so that check still reports the pre-reset state. The flags
 * are written to the attached target on every check.
 */

import type { BufferFlags } from "../types";

const DEFAULT_MAX_FAILED_READS = 3;
const DEFAULT_REQUIRED_BUFFER_SECONDS = 5.0;
const DEFAULT_CHECK_INTERVAL_MS = 1000;

export interface BufferMonitorOptions {
  maxFailedReadsForEmptyBuffer?: number;
  /** Seconds of buffered media that count as full */
  requiredBufferSeconds?: number;
  /** Counter window length */
  checkIntervalMs?: number;
  /** Clock in ms, defaults to Date.now */
  now?: () => number;
}

/** Whatever owns the published flags, normally the current PlayerItem */
export interface BufferStatusTarget {
  updateBufferStatus(flags: BufferFlags): void;
}

export class BufferMonitor {
  private target: BufferStatusTarget | null = null;
  private successfulReads = 0;
  private failedReads = 0;
  private bufferDuration = 0;
  private lastCheckTimestamp: number;

  private readonly maxFailedReads: number;
  private readonly requiredBufferSeconds: number;
  private readonly checkIntervalMs: number;
  private readonly now: () => number;

  constructor(options: BufferMonitorOptions = {}) {
    this.maxFailedReads = options.maxFailedReadsForEmptyBuffer ?? DEFAULT_MAX_FAILED_READS;
    this.requiredBufferSeconds = options.requiredBufferSeconds ?? DEFAULT_REQUIRED_BUFFER_SECONDS;
    this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.lastCheckTimestamp = this.now();
  }

  /**
   * Publish flags to target on every check(). Pass null to detach.
   */
  attach(target: BufferStatusTarget | null): void {
    this.target = target;
  }

  recordResult(success: boolean): void {
    if (success) {
      this.successfulReads++;
    } else {
      this.failedReads++;
    }
  }

  addBufferedDuration(seconds: number): void {
    if (Number.isFinite(seconds) && seconds > 0) {
      this.bufferDuration += seconds;
    }
  }

  check(): BufferFlags {
    const flags: BufferFlags = {
      isBufferEmpty: this.failedReads >= this.maxFailedReads,
      likelyToKeepUp: this.successfulReads > this.failedReads,
      isBufferFull: this.bufferDuration >= this.requiredBufferSeconds,
    };

    const now = this.now();
    if (now - this.lastCheckTimestamp > this.checkIntervalMs) {
      this.successfulReads = 0;
      this.failedReads = 0;
      this.bufferDuration = 0;
      this.lastCheckTimestamp = now;
    }

    this.target?.updateBufferStatus(flags);
    return flags;
  }

  /**
   * Zero the counters and open a new window (item replaced).
   */
  reset(): void {
    this.successfulReads = 0;
    this.failedReads = 0;
    this.bufferDuration = 0;
    this.lastCheckTimestamp = this.now();
  }
}

export default BufferMonitor;
