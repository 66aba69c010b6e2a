/**
 * HttpFetcher - default SegmentFetcher over the global fetch API
 *
 * No retries: the engine records a failed segment and moves on, so any retry
 * policy belongs in a wrapping fetcher.
 */

import type { Locator } from "../types";
import type { FetchOptions, SegmentFetcher } from "./MediaCapabilities";

export interface HttpFetcherOptions {
  /** Extra request headers (auth tokens etc.) */
  headers?: Record<string, string>;
  /** Fail a request after this many ms. 0 disables. */
  timeoutMs?: number;
  debug?: boolean;
}

/**
 * Resolve a playlist-relative locator against the playlist's own locator.
 * When the base is not an absolute URL the locator is returned unchanged.
 *
 * @example
 * ```ts
 * resolveLocator("https://cdn.example.com/vod/index.m3u8", "seg0.ts")
 * // => "https://cdn.example.com/vod/seg0.ts"
 * ```
 */
export function resolveLocator(base: Locator, locator: Locator): Locator {
  try {
    return new URL(locator, base).toString();
  } catch {
    return locator;
  }
}

export class HttpFetcher implements SegmentFetcher {
  private headers: Record<string, string>;
  private timeoutMs: number;
  private debug: boolean;

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? 0;
    this.debug = options.debug ?? false;
  }

  async fetch(locator: Locator, options: FetchOptions = {}): Promise<Uint8Array> {
    const ac = new AbortController();
    const onAbort = () => ac.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (options.signal?.aborted) ac.abort();

    let timedOut = false;
    const timeoutId =
      this.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            this.log(`Timed out after ${this.timeoutMs}ms: ${locator}`, "warn");
            ac.abort();
          }, this.timeoutMs)
        : null;

    try {
      this.log(`GET ${locator}`);
      const response = await fetch(locator, { headers: this.headers, signal: ac.signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      return new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      // Our own timeout is a transport failure, not a cancellation
      if (timedOut && !options.signal?.aborted) {
        throw new Error(`Timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw err;
    } finally {
      if (timeoutId !== null) clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private log(message: string, level: "info" | "warn" = "info"): void {
    if (!this.debug && level === "info") return;
    console[level](`[HttpFetcher] ${message}`);
  }
}

export default HttpFetcher;
