/**
 * Messages posted from asynchronous boundaries (fetch and decode completion)
 * back to the controller's mailbox. Each carries the generation or session
 * key it was issued under so stale completions can be recognised.
 */

import type { DecodedFrame } from "../types";

export interface SegmentLoadedMessage {
  type: "segmentLoaded";
  generation: number;
  index: number;
  payload: Uint8Array;
}

export interface SegmentFailedMessage {
  type: "segmentFailed";
  generation: number;
  index: number;
  error: Error;
}

export interface FrameDecodedMessage {
  type: "frameDecoded";
  sessionKey: number;
  index: number;
  frame: DecodedFrame;
}

export interface DecodeFailedMessage {
  type: "decodeFailed";
  sessionKey: number;
  index: number;
  error: Error;
}

export type SchedulerMessage = SegmentLoadedMessage | SegmentFailedMessage;

export type DecoderMessage = FrameDecodedMessage | DecodeFailedMessage;

export type EngineMessage = SchedulerMessage | DecoderMessage;
