import { describe, expect, it } from "vitest";

import {
  PLAYBACK_ERROR_MESSAGES,
  PlaybackError,
  PlaybackErrorCode,
  describePlaybackError,
  toError,
} from "../src/core/PlaybackErrors";

describe("PlaybackError", () => {
  it("carries code, segment index and cause", () => {
    const cause = new Error("HTTP 404");
    const error = new PlaybackError(PlaybackErrorCode.SEGMENT_FETCH_FAILURE, "HTTP 404", {
      segmentIndex: 3,
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("PlaybackError");
    expect(error.code).toBe(PlaybackErrorCode.SEGMENT_FETCH_FAILURE);
    expect(error.segmentIndex).toBe(3);
    expect(error.cause).toBe(cause);
  });

  it("maps codes to load and runtime phases", () => {
    expect(new PlaybackError(PlaybackErrorCode.LOAD_FAILURE, "x").phase).toBe("load");
    expect(new PlaybackError(PlaybackErrorCode.FORMAT_EXTRACTION_FAILURE, "x").phase).toBe("load");
    expect(new PlaybackError(PlaybackErrorCode.SESSION_CREATION_FAILURE, "x").phase).toBe("load");
    expect(new PlaybackError(PlaybackErrorCode.SEGMENT_FETCH_FAILURE, "x").phase).toBe("runtime");
    expect(new PlaybackError(PlaybackErrorCode.DECODE_FAILURE, "x").phase).toBe("runtime");
  });

  it("has a message for every code", () => {
    for (const code of Object.values(PlaybackErrorCode)) {
      expect(PLAYBACK_ERROR_MESSAGES[code]).toBeTruthy();
    }
  });
});

describe("describePlaybackError", () => {
  it("includes the segment index when present", () => {
    const error = new PlaybackError(PlaybackErrorCode.SEGMENT_FETCH_FAILURE, "HTTP 404", { segmentIndex: 3 });

    expect(describePlaybackError(error)).toBe("Failed to load segment (segment 3): HTTP 404");
  });

  it("omits the index otherwise", () => {
    const error = new PlaybackError(PlaybackErrorCode.LOAD_FAILURE, "Playlist contains no segments");

    expect(describePlaybackError(error)).toBe("Failed to load item: Playlist contains no segments");
  });
});

describe("toError", () => {
  it("passes errors through and wraps anything else", () => {
    const error = new Error("boom");

    expect(toError(error)).toBe(error);
    expect(toError("bad gateway").message).toBe("bad gateway");
    expect(toError(42).message).toBe("42");
  });
});
