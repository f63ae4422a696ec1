// types.ts — the editable tree produced by `parseMidi` and consumed by `encodeMidi`

export interface MidiFile {
  /** Stored as read; 0, 1 or 2 in practice, never checked. */
  format: number;
  ticksPerQuarter: number;
  /** Declared header chunk length (>= 6), written back unchanged. */
  headerLength: number;
  /** Header bytes past the six standard ones. */
  headerTrailing: Uint8Array;
  tracks: MidiTrack[];
}

export interface MidiTrack {
  events: MidiEvent[];
}

/** Note on (status 0x9n) or note off (status 0x8n). */
export interface NoteEvent {
  type: "note";
  delta: number;
  readonly status: number;
  note: number;
  velocity: number;
}

/**
 * Any event that is not a note. `payload` holds every byte after the status
 * byte exactly as read; for meta events that includes the meta type and the
 * length prefix.
 */
export interface RawEvent {
  type: "raw";
  delta: number;
  readonly status: number;
  readonly payload: Uint8Array;
}

export type MidiEvent = NoteEvent | RawEvent;

/** What the high nibble of a status byte says about the bytes that follow. */
export type EventClass =
  | "noteOff"
  | "noteOn"
  | "polyAftertouch"
  | "controlChange"
  | "programChange"
  | "channelPressure"
  | "pitchBend"
  | "system";

export interface ParseOptions {
  /** Longest accepted variable-length quantity, in bytes. */
  maxVarLenBytes?: number;
  /** Ignore bytes after the last declared track instead of failing. */
  allowTrailingData?: boolean;
}
