/**
 * ParameterSets - stream format extraction from the first segment
 *
 * The format is described by two parameter blocks (SPS/PPS in H.264 terms).
 * Each is located by a 4-byte start code `00 00 00 01` followed by its marker
 * byte, and runs up to the next start code or the end of the payload.
 */

import type { FormatDescriptor } from "../types";

export const START_CODE = Object.freeze([0x00, 0x00, 0x00, 0x01]);
/** Marker byte of the sequence-parameter block (NAL header 0x67) */
export const SPS_MARKER = 0x67;
/** Marker byte of the picture-parameter block (NAL header 0x68) */
export const PPS_MARKER = 0x68;

/**
 * Find `00 00 00 01 <marker>` at or after `from`.
 *
 * @returns Index of the marker byte, or -1
 */
export function findStartCode(data: Uint8Array, marker: number, from = 0): number {
  const last = data.length - START_CODE.length - 1;
  for (let i = from; i <= last; i++) {
    if (
      data[i] === 0x00 &&
      data[i + 1] === 0x00 &&
      data[i + 2] === 0x00 &&
      data[i + 3] === 0x01 &&
      data[i + 4] === marker
    ) {
      return i + START_CODE.length;
    }
  }
  return -1;
}

/**
 * Index of the next 3- or 4-byte start code at or after `from`, or the
 * payload length when there is none.
 */
export function findNextBoundary(data: Uint8Array, from: number): number {
  for (let j = from; j < data.length - 2; j++) {
    if (data[j] !== 0x00 || data[j + 1] !== 0x00) continue;
    if (data[j + 2] === 0x01) return j;
    if (j + 3 < data.length && data[j + 2] === 0x00 && data[j + 3] === 0x01) return j;
  }
  return data.length;
}

function toHex(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

/**
 * Codec string from the profile/constraint/level bytes that follow the SPS
 * marker, e.g. `avc1.64001f`. Plain `avc1` when the block is too short.
 */
export function codecStringFromSps(sps: Uint8Array): string {
  if (sps.length < 4) return "avc1";
  return `avc1.${toHex(sps[1])}${toHex(sps[2])}${toHex(sps[3])}`;
}

/**
 * Build an AVCDecoderConfigurationRecord (ISO/IEC 14496-15 §5.3.3.1.2) with
 * 4-byte NAL length fields.
 */
export function buildAvcConfigurationRecord(sps: Uint8Array, pps: Uint8Array): Uint8Array {
  const record = new Uint8Array(6 + 2 + sps.length + 1 + 2 + pps.length);
  const view = new DataView(record.buffer);
  let offset = 0;

  record[offset++] = 0x01; // configurationVersion
  record[offset++] = sps.length > 3 ? sps[1] : 0; // profile_idc
  record[offset++] = sps.length > 3 ? sps[2] : 0; // constraint_set_flags
  record[offset++] = sps.length > 3 ? sps[3] : 0; // level_idc
  record[offset++] = 0xff; // reserved(6) + lengthSizeMinusOne(2) = 3
  record[offset++] = 0xe1; // reserved(3) + numSPS = 1

  view.setUint16(offset, sps.length);
  offset += 2;
  record.set(sps, offset);
  offset += sps.length;

  record[offset++] = 0x01; // numPPS

  view.setUint16(offset, pps.length);
  offset += 2;
  record.set(pps, offset);

  return record;
}

/**
 * Locate both parameter blocks in a segment payload and describe the stream.
 * Returns null when either block is missing or empty.
 */
export function extractFormatDescriptor(payload: Uint8Array): FormatDescriptor | null {
  const spsStart = findStartCode(payload, SPS_MARKER);
  const ppsStart = findStartCode(payload, PPS_MARKER);
  if (spsStart < 0 || ppsStart < 0) return null;

  const sps = payload.slice(spsStart, findNextBoundary(payload, spsStart + 1));
  const pps = payload.slice(ppsStart, findNextBoundary(payload, ppsStart + 1));
  // A block holding only its marker byte carries no parameters
  if (sps.length < 2 || pps.length < 2) return null;

  return {
    codec: codecStringFromSps(sps),
    sps,
    pps,
    description: buildAvcConfigurationRecord(sps, pps),
  };
}
