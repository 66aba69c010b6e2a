import { describe, expect, it, vi } from "vitest";

import { SegmentScheduler } from "../src/core/SegmentScheduler";
import type { SchedulerMessage } from "../src/core/EngineMessages";
import type { Segment } from "../src/types";
import { BASE, Deferred, PLAIN_PAYLOAD, PLAYLIST_URL, createFetcher, flushMicrotasks } from "./helpers/fakes";

const SEGMENTS: Segment[] = [
  { url: "seg0.ts", duration: 4 },
  { url: "seg1.ts", duration: 6 },
];

function createScheduler(routes: Parameters<typeof createFetcher>[0] = {}) {
  const { fetcher, fetch, urls } = createFetcher(routes);
  const messages: SchedulerMessage[] = [];
  let playing = true;
  const scheduler = new SegmentScheduler({
    fetcher,
    post: (message) => messages.push(message),
    isPlaying: () => playing,
  });
  scheduler.setSegments(SEGMENTS, PLAYLIST_URL);
  return {
    scheduler,
    fetch,
    urls,
    messages,
    setPlaying(value: boolean) {
      playing = value;
    },
  };
}

describe("SegmentScheduler", () => {
  it("fetches segments resolved against the playlist locator", async () => {
    const { scheduler, urls, messages } = createScheduler({ [`${BASE}seg1.ts`]: PLAIN_PAYLOAD });

    scheduler.loadSegment(1);
    await flushMicrotasks();

    expect(urls()).toEqual([`${BASE}seg1.ts`]);
    expect(messages).toEqual([
      { type: "segmentLoaded", generation: scheduler.generation, index: 1, payload: PLAIN_PAYLOAD },
    ]);
  });

  it("ignores out-of-range indices", () => {
    const { scheduler, fetch } = createScheduler();

    scheduler.loadSegment(-1);
    scheduler.loadSegment(2);

    expect(fetch).not.toHaveBeenCalled();
  });

  describe("playNextSegment", () => {
    it("starts the segment under the cursor and advances", () => {
      const { scheduler, urls } = createScheduler();

      expect(scheduler.playNextSegment()).toEqual({ index: 0, segment: SEGMENTS[0] });
      expect(scheduler.currentSegmentIndex).toBe(1);
      expect(urls()).toEqual([`${BASE}seg0.ts`]);
    });

    it("does nothing while not playing", () => {
      const { scheduler, fetch, setPlaying } = createScheduler();
      setPlaying(false);

      expect(scheduler.playNextSegment()).toBeNull();
      expect(scheduler.currentSegmentIndex).toBe(0);
      expect(fetch).not.toHaveBeenCalled();
    });

    it("does nothing at the end of the list", () => {
      const { scheduler } = createScheduler();
      scheduler.setCurrentSegmentIndex(2);

      expect(scheduler.playNextSegment()).toBeNull();
      expect(scheduler.currentSegmentIndex).toBe(2);
    });

    it("advances even when the fetch fails", async () => {
      const { scheduler, messages } = createScheduler();

      scheduler.playNextSegment();
      await flushMicrotasks();

      expect(scheduler.currentSegmentIndex).toBe(1);
      expect(messages).toHaveLength(1);
      expect(messages[0]).toMatchObject({ type: "segmentFailed", index: 0 });
      if (messages[0].type === "segmentFailed") {
        expect(messages[0].error.message).toBe("HTTP 404");
      }
    });
  });

  it("clamps the cursor to [0, segmentCount]", () => {
    const { scheduler } = createScheduler();

    scheduler.setCurrentSegmentIndex(-3);
    expect(scheduler.currentSegmentIndex).toBe(0);
    scheduler.setCurrentSegmentIndex(99);
    expect(scheduler.currentSegmentIndex).toBe(2);
    scheduler.setCurrentSegmentIndex(1.7);
    expect(scheduler.currentSegmentIndex).toBe(1);
  });

  it("setSegments resets the cursor and starts a new generation", () => {
    const { scheduler } = createScheduler();
    scheduler.setCurrentSegmentIndex(1);
    const before = scheduler.generation;

    scheduler.setSegments([SEGMENTS[1]], PLAYLIST_URL);

    expect(scheduler.currentSegmentIndex).toBe(0);
    expect(scheduler.segmentCount).toBe(1);
    expect(scheduler.generation).toBe(before + 1);
    expect(scheduler.isCurrentGeneration(before)).toBe(false);
  });

  it("cancel aborts in-flight fetches and drops their completions", async () => {
    const pending = new Deferred<Uint8Array>();
    const signals: (AbortSignal | undefined)[] = [];
    const { scheduler, messages } = createScheduler({
      [`${BASE}seg0.ts`]: (signal) => {
        signals.push(signal);
        return pending.promise;
      },
    });

    scheduler.loadSegment(0);
    scheduler.cancel();
    pending.resolve(PLAIN_PAYLOAD);
    await flushMicrotasks();

    expect(signals[0]?.aborted).toBe(true);
    expect(messages).toEqual([]);
  });

  it("does not post a failure for an aborted fetch", async () => {
    const pending = new Deferred<Uint8Array>();
    const { scheduler, messages } = createScheduler({ [`${BASE}seg0.ts`]: () => pending.promise });

    scheduler.loadSegment(0);
    scheduler.cancel();
    pending.reject(new Error("socket closed"));
    await flushMicrotasks();

    expect(messages).toEqual([]);
  });

  it("stops fetching once disposed", () => {
    const { scheduler, fetch } = createScheduler();

    scheduler.dispose();
    scheduler.loadSegment(0);

    expect(fetch).not.toHaveBeenCalled();
    expect(scheduler.segmentCount).toBe(0);
  });

  it("logs fetches in debug mode", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const { fetcher } = createFetcher({});
    const scheduler = new SegmentScheduler({ fetcher, post: () => {}, isPlaying: () => true, debug: true });
    scheduler.setSegments(SEGMENTS, null);

    scheduler.loadSegment(0);

    expect(logSpy).toHaveBeenCalledWith("[SegmentScheduler] Fetching segment 0: seg0.ts");
    logSpy.mockRestore();
  });
});
