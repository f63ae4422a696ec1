// errors.ts — failures raised while decoding a Standard MIDI File

/**
 * Base class for every decoding failure. The message carries the byte offset
 * where the problem was detected.
 */
export class MidiParseError extends Error {
  constructor(message: string, public offset: number) {
    super(`${message} (at 0x${offset.toString(16)})`);
    this.name = new.target.name;
  }
}

/** Chunk ids or header fields that do not describe an SMF. */
export class FormatError extends MidiParseError {}

/** An `MTrk` chunk whose id or event bytes disagree with its declared length. */
export class MalformedTrackError extends FormatError {}

/** The division field selects SMPTE time code instead of ticks per quarter note. */
export class UnsupportedTimingError extends MidiParseError {}

/**
 * An event that cannot be decoded. A data byte (0x00–0x7F) in the status
 * position lands here too: running status is not accepted.
 */
export class MalformedEventError extends MidiParseError {}

/** The input ended before a declared length was satisfied. */
export class TruncatedStreamError extends MidiParseError {}
