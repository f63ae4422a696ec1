// event.ts — one delta-time + status + payload unit

import { MalformedEventError } from "./errors";
import type { ByteReader } from "./reader";
import type {
  EventClass,
  MidiEvent,
  NoteEvent,
  ParseOptions,
} from "./types";
import { encodeVarLen, readVarLen } from "./vlq";
import { ByteWriter } from "./writer";

export interface ParsedEvent {
  event: MidiEvent;
  /** Bytes consumed: delta-time + status + payload. */
  byteLength: number;
}

const META_STATUS = 0xff;

/** Payload size of the classes whose size is fixed by the status byte. */
const FIXED_PAYLOAD_LENGTH = {
  noteOff: 2,
  noteOn: 2,
  polyAftertouch: 2,
  controlChange: 2,
  programChange: 1,
  channelPressure: 1,
  pitchBend: 2,
} as const satisfies Record<Exclude<EventClass, "system">, number>;

/**
 * Classifies a status byte by its high nibble. Returns `undefined` for
 * 0x00–0x7F, which is a data byte rather than a status.
 */
export function eventClassOf(status: number): EventClass | undefined {
  switch (status >> 4) {
    case 0x8:
      return "noteOff";
    case 0x9:
      return "noteOn";
    case 0xa:
      return "polyAftertouch";
    case 0xb:
      return "controlChange";
    case 0xc:
      return "programChange";
    case 0xd:
      return "channelPressure";
    case 0xe:
      return "pitchBend";
    case 0xf:
      return "system";
    default:
      return undefined;
  }
}

/** Channel 0–15 of a channel event; `undefined` for system and meta events. */
export function channelOf(event: MidiEvent): number | undefined {
  return event.status >= 0xf0 ? undefined : event.status & 0x0f;
}

/** A note event that starts a note (0x9n with non-zero velocity). */
export function isNoteOn(event: MidiEvent): event is NoteEvent {
  return (
    event.type === "note" && event.status >> 4 === 0x9 && event.velocity > 0
  );
}

export function isMetaEvent(event: MidiEvent): boolean {
  return event.status === META_STATUS;
}

export function parseEvent(
  reader: ByteReader,
  options: Required<ParseOptions>,
): ParsedEvent {
  const start = reader.offset;
  const { value: delta } = readVarLen(reader, options.maxVarLenBytes);

  const statusOffset = reader.offset;
  const status = reader.readUint8();
  const eventClass = eventClassOf(status);
  const payloadStart = reader.offset;

  let event: MidiEvent;
  switch (eventClass) {
    case "noteOff":
    case "noteOn":
      event = {
        type: "note",
        delta,
        status,
        note: reader.readUint8(),
        velocity: reader.readUint8(),
      };
      break;

    case "polyAftertouch":
    case "controlChange":
    case "programChange":
    case "channelPressure":
    case "pitchBend":
      event = {
        type: "raw",
        delta,
        status,
        payload: reader.readBytes(FIXED_PAYLOAD_LENGTH[eventClass]),
      };
      break;

    case "system": {
      if (status === META_STATUS) reader.readUint8(); // meta type
      const { value: length } = readVarLen(reader, options.maxVarLenBytes);
      reader.readBytes(length);
      event = {
        type: "raw",
        delta,
        status,
        payload: reader.bytesSince(payloadStart),
      };
      break;
    }

    case undefined:
      throw new MalformedEventError(
        `Invalid status byte 0x${status.toString(16).padStart(2, "0")} (running status is not supported)`,
        statusOffset,
      );

    default: {
      const unreachable: never = eventClass;
      throw new MalformedEventError(
        `Unhandled event class ${String(unreachable)}`,
        statusOffset,
      );
    }
  }

  return { event, byteLength: reader.offset - start };
}

function byteField(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`${field} does not fit in one byte: ${value}`);
  }
  return value;
}

/**
 * Encodes an event. Note and velocity are written as they are, without
 * clamping to 0–127; only values that do not fit in a byte are refused.
 */
export function encodeEvent(event: MidiEvent): Uint8Array {
  const writer = new ByteWriter()
    .writeBytes(encodeVarLen(event.delta))
    .writeUint8(event.status);

  if (event.type === "note") {
    writer
      .writeUint8(byteField(event.note, "note"))
      .writeUint8(byteField(event.velocity, "velocity"));
  } else {
    writer.writeBytes(event.payload);
  }

  return writer.toUint8Array();
}
