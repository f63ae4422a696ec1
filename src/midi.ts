// midi.ts — lossless Standard MIDI File codec
//
// Only note on/off events are interpreted. Every other event keeps the bytes
// it was read from, so parse → encode reproduces the input byte for byte.

import { FormatError, UnsupportedTimingError } from "./errors";
import { ByteReader } from "./reader";
import { encodeTrack, parseTrack } from "./track";
import type { MidiFile, MidiTrack, ParseOptions } from "./types";
import { ByteWriter } from "./writer";

export const HEADER_CHUNK_ID = "MThd";
export const MIN_HEADER_LENGTH = 6;

const SMPTE_DIVISION_FLAG = 0x8000;

function resolveOptions(options: ParseOptions): Required<ParseOptions> {
  return {
    maxVarLenBytes: options.maxVarLenBytes ?? Infinity,
    allowTrailingData: options.allowTrailingData ?? true,
  };
}

export function parseMidi(
  input: ArrayBuffer | Uint8Array,
  options: ParseOptions = {},
): MidiFile {
  const opts = resolveOptions(options);
  const reader = new ByteReader(input);

  const headerType = reader.readFourCC();
  if (headerType !== HEADER_CHUNK_ID) {
    throw new FormatError(
      `Invalid MIDI file: expected "${HEADER_CHUNK_ID}", found "${headerType}"`,
      0,
    );
  }

  const headerLength = reader.readUint32();
  if (headerLength < MIN_HEADER_LENGTH) {
    throw new FormatError(
      `Invalid MIDI header length ${headerLength} (minimum ${MIN_HEADER_LENGTH})`,
      4,
    );
  }

  const format = reader.readUint16();
  const numTracks = reader.readUint16();
  const divisionOffset = reader.offset;
  const division = reader.readUint16();

  if (division & SMPTE_DIVISION_FLAG) {
    throw new UnsupportedTimingError(
      "SMPTE time division is not supported; only ticks per quarter note",
      divisionOffset,
    );
  }

  const headerTrailing = reader.readBytes(headerLength - MIN_HEADER_LENGTH);

  const tracks: MidiTrack[] = [];
  for (let i = 0; i < numTracks; i++) {
    tracks.push(parseTrack(reader, opts));
  }

  if (!opts.allowTrailingData && reader.remaining > 0) {
    throw new FormatError(
      `${reader.remaining} unexpected bytes after the last track`,
      reader.offset,
    );
  }

  return {
    format,
    ticksPerQuarter: division,
    headerLength,
    headerTrailing,
    tracks,
  };
}

/**
 * Encodes a file. The header length is written back as it was read; the
 * track count comes from `file.tracks` and each track length from its events.
 */
export function encodeMidi(file: MidiFile): Uint8Array {
  const writer = new ByteWriter()
    .writeFourCC(HEADER_CHUNK_ID)
    .writeUint32(file.headerLength)
    .writeUint16(file.format)
    .writeUint16(file.tracks.length)
    .writeUint16(file.ticksPerQuarter & 0x7fff)
    .writeBytes(file.headerTrailing);

  for (const track of file.tracks) {
    writer.writeBytes(encodeTrack(track));
  }

  return writer.toUint8Array();
}
