// track.ts — "MTrk" chunks

import { MalformedTrackError } from "./errors";
import { encodeEvent, parseEvent } from "./event";
import type { ByteReader } from "./reader";
import type { MidiEvent, MidiTrack, ParseOptions } from "./types";
import { ByteWriter } from "./writer";

export const TRACK_CHUNK_ID = "MTrk";

/**
 * Parses one track chunk. Events are read until their byte lengths add up to
 * the declared chunk length exactly; an event that runs past it is an error.
 */
export function parseTrack(
  reader: ByteReader,
  options: Required<ParseOptions>,
): MidiTrack {
  const chunkOffset = reader.offset;
  const chunkId = reader.readFourCC();
  if (chunkId !== TRACK_CHUNK_ID) {
    throw new MalformedTrackError(
      `Invalid track chunk: expected "${TRACK_CHUNK_ID}", found "${chunkId}"`,
      chunkOffset,
    );
  }

  const declaredLength = reader.readUint32();
  const events: MidiEvent[] = [];
  let remaining = declaredLength;

  while (remaining > 0) {
    const eventOffset = reader.offset;
    const { event, byteLength } = parseEvent(reader, options);
    if (byteLength > remaining) {
      throw new MalformedTrackError(
        `Event of ${byteLength} bytes overruns track length ${declaredLength} (${remaining} bytes left)`,
        eventOffset,
      );
    }
    events.push(event);
    remaining -= byteLength;
  }

  return { events };
}

/** The chunk length is always recomputed from the encoded events. */
export function encodeTrack(track: MidiTrack): Uint8Array {
  const body = new ByteWriter();
  for (const event of track.events) {
    body.writeBytes(encodeEvent(event));
  }

  return new ByteWriter()
    .writeFourCC(TRACK_CHUNK_ID)
    .writeUint32(body.length)
    .writeBytes(body.toUint8Array())
    .toUint8Array();
}
