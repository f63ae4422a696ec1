// vlq.ts — variable-length quantities: 7 bits per byte, high bit = "more follows"

import { MalformedEventError, TruncatedStreamError } from "./errors";
import type { ByteReader } from "./reader";

export interface VarLenResult {
  value: number;
  /** Bytes the quantity occupied in the stream. */
  byteLength: number;
}

/**
 * Reads one quantity from `reader`. Accumulates with multiplication rather
 * than `<<` so values stay exact past 32 bits.
 */
export function readVarLen(
  reader: ByteReader,
  maxBytes: number = Infinity,
): VarLenResult {
  const start = reader.offset;
  let value = 0;
  let byteLength = 0;
  for (;;) {
    if (byteLength >= maxBytes) {
      throw new MalformedEventError(
        `Variable-length quantity longer than ${maxBytes} bytes`,
        start,
      );
    }
    const byte = reader.readUint8();
    byteLength += 1;
    value = value * 0x80 + (byte & 0x7f);
    if ((byte & 0x80) === 0) return { value, byteLength };
  }
}

/** Same as `readVarLen`, over a plain byte array. */
export function decodeVarLen(
  bytes: ArrayLike<number>,
  offset: number = 0,
): VarLenResult {
  let value = 0;
  let position = offset;
  for (;;) {
    const byte = bytes[position];
    if (byte === undefined || position >= bytes.length) {
      throw new TruncatedStreamError(
        "Unexpected end of data inside variable-length quantity",
        position,
      );
    }
    position += 1;
    value = value * 0x80 + (byte & 0x7f);
    if ((byte & 0x80) === 0) return { value, byteLength: position - offset };
  }
}

/**
 * Minimal encoding of a non-negative integer. Zero is the single byte 0x00.
 */
export function encodeVarLen(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `Variable-length quantity must be a non-negative safe integer, got ${value}`,
    );
  }

  const groups: number[] = [value % 0x80];
  let remaining = Math.floor(value / 0x80);
  while (remaining > 0) {
    groups.unshift((remaining % 0x80) | 0x80);
    remaining = Math.floor(remaining / 0x80);
  }
  return Uint8Array.from(groups);
}
