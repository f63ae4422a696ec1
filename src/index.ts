export type {
  EventClass,
  MidiEvent,
  MidiFile,
  MidiTrack,
  NoteEvent,
  ParseOptions,
  RawEvent,
} from "./types";
export {
  FormatError,
  MalformedEventError,
  MalformedTrackError,
  MidiParseError,
  TruncatedStreamError,
  UnsupportedTimingError,
} from "./errors";
export { encodeMidi, parseMidi } from "./midi";
export { encodeTrack, parseTrack } from "./track";
export {
  channelOf,
  encodeEvent,
  eventClassOf,
  isMetaEvent,
  isNoteOn,
  parseEvent,
  type ParsedEvent,
} from "./event";
export {
  decodeVarLen,
  encodeVarLen,
  readVarLen,
  type VarLenResult,
} from "./vlq";
export { ByteReader } from "./reader";
export { ByteWriter } from "./writer";
export {
  addChorus,
  addDelay,
  clampNote,
  setVelocity,
  transpose,
} from "./edits";
