import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PlayerItem } from "../src/core/PlayerItem";
import { PlaybackError, PlaybackErrorCode } from "../src/core/PlaybackErrors";
import { PLAYLIST_URL, createFetcher, text } from "./helpers/fakes";

const PLAYLIST = "#EXTM3U\n#EXT-X-STREAM-INF:hd/index.m3u8\n#EXTINF:4.0,\nseg0.ts\n#EXTINF:6.0,\nseg1.ts\n";

describe("PlayerItem", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts unknown with optimistic buffer flags", () => {
    const item = new PlayerItem(PLAYLIST_URL);

    expect(item.status).toBe("unknown");
    expect(item.bufferEmpty).toBe(false);
    expect(item.likelyToKeepUp).toBe(true);
    expect(item.bufferFull).toBe(true);
    expect(item.presentationSize).toEqual({ width: 0, height: 0 });
    expect(item.errorOccurred).toBe(false);
    expect(item.startsOnFirstEligibleVariant).toBe(true);
    expect(item.preferredPeakBitRate).toBe(0);
    expect(item.segments).toEqual([]);
  });

  describe("loadPlaylist", () => {
    it("parses segments and qualities", async () => {
      const { fetcher } = createFetcher({ [PLAYLIST_URL]: text(PLAYLIST) });
      const item = new PlayerItem(PLAYLIST_URL);

      await expect(item.loadPlaylist(fetcher)).resolves.toBe(true);

      expect(item.segments).toEqual([
        { url: "seg0.ts", duration: 4 },
        { url: "seg1.ts", duration: 6 },
      ]);
      expect(item.availableQualities).toEqual(["hd/index.m3u8"]);
      expect(item.status).toBe("unknown");
    });

    it("records a fetch failure and marks the item failed", async () => {
      const { fetcher } = createFetcher({});
      const item = new PlayerItem(PLAYLIST_URL, { now: () => 1234 });
      const onFailed = vi.fn();
      const onStatus = vi.fn();
      item.on("failed", onFailed);
      item.on("statusChange", onStatus);

      await expect(item.loadPlaylist(fetcher)).resolves.toBe(false);

      expect(item.status).toBe("failed");
      expect(item.errorOccurred).toBe(true);
      expect(item.errorLog.all()).toEqual([
        { timestamp: 1234, message: "Failed to load item: Playlist fetch failed: HTTP 404" },
      ]);
      expect(onFailed).toHaveBeenCalledTimes(1);
      expect(onFailed.mock.calls[0][0].error.code).toBe(PlaybackErrorCode.LOAD_FAILURE);
      expect(onStatus).toHaveBeenCalledWith({ item, status: "failed", previous: "unknown" });
      expect(console.warn).toHaveBeenCalledWith(
        "[PlayerItem] Failed to load item: Playlist fetch failed: HTTP 404"
      );
    });

    it("records undecodable playlist bytes", async () => {
      const { fetcher } = createFetcher({ [PLAYLIST_URL]: new Uint8Array([0xff, 0xfe]) });
      const item = new PlayerItem(PLAYLIST_URL);

      await expect(item.loadPlaylist(fetcher)).resolves.toBe(false);

      expect(item.errorLog.last()?.message).toBe("Failed to load item: Playlist is not valid UTF-8 text");
      expect(item.playlist).toBeNull();
    });

    it("records nothing for an aborted fetch", async () => {
      const ac = new AbortController();
      ac.abort();
      const { fetcher } = createFetcher({
        [PLAYLIST_URL]: async (signal) => {
          if (signal?.aborted) {
            const error = new Error("aborted");
            error.name = "AbortError";
            throw error;
          }
          return text(PLAYLIST);
        },
      });
      const item = new PlayerItem(PLAYLIST_URL);

      await expect(item.loadPlaylist(fetcher, ac.signal)).resolves.toBe(false);

      expect(item.status).toBe("unknown");
      expect(item.errorLog.size).toBe(0);
    });
  });

  it("publishes buffer flags", () => {
    const item = new PlayerItem(PLAYLIST_URL);
    const listener = vi.fn();
    item.on("bufferStatusChange", listener);

    item.updateBufferStatus({ isBufferEmpty: true, likelyToKeepUp: false, isBufferFull: false });

    expect(item.bufferEmpty).toBe(true);
    expect(item.likelyToKeepUp).toBe(false);
    expect(item.bufferFull).toBe(false);
    expect(listener).toHaveBeenCalledWith({
      item,
      flags: { isBufferEmpty: true, likelyToKeepUp: false, isBufferFull: false },
    });
  });

  it("emits presentationSizeChange only when the size changes", () => {
    const item = new PlayerItem(PLAYLIST_URL);
    const listener = vi.fn();
    item.on("presentationSizeChange", listener);

    item.updatePresentationSize({ width: 640, height: 360 });
    item.updatePresentationSize({ width: 640, height: 360 });
    item.updatePresentationSize({ width: 1280, height: 720 });

    expect(listener).toHaveBeenCalledTimes(2);
    expect(item.presentationSize).toEqual({ width: 1280, height: 720 });
  });

  it("logs runtime errors without failing the item", () => {
    const item = new PlayerItem(PLAYLIST_URL, { now: () => 50 });
    const listener = vi.fn();
    item.on("newErrorLogEntry", listener);

    const event = item.notifyNewErrorEntry(
      new PlaybackError(PlaybackErrorCode.DECODE_FAILURE, "corrupt unit", { segmentIndex: 2 })
    );

    expect(event).toEqual({ timestamp: 50, message: "Decode error (segment 2): corrupt unit" });
    expect(listener).toHaveBeenCalledWith({ item, event });
    expect(item.status).toBe("unknown");
    expect(item.errorOccurred).toBe(false);
  });

  it("emits statusChange on readyToPlay and playedToEnd on notify", () => {
    const item = new PlayerItem(PLAYLIST_URL);
    const onStatus = vi.fn();
    const onEnd = vi.fn();
    item.on("statusChange", onStatus);
    item.on("playedToEnd", onEnd);

    item.markReadyToPlay();
    item.markReadyToPlay();
    item.notifyPlayToEnd();

    expect(onStatus).toHaveBeenCalledTimes(1);
    expect(onStatus).toHaveBeenCalledWith({ item, status: "readyToPlay", previous: "unknown" });
    expect(onEnd).toHaveBeenCalledWith({ item });
  });
});
