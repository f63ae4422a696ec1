import { describe, expect, it } from "vitest";
import {
  ByteReader,
  channelOf,
  encodeEvent,
  eventClassOf,
  isMetaEvent,
  isNoteOn,
  MalformedEventError,
  type MidiEvent,
  parseEvent,
  type ParseOptions,
  TruncatedStreamError,
} from "../index";

const defaults: Required<ParseOptions> = {
  maxVarLenBytes: Infinity,
  allowTrailingData: true,
};

function parse(bytes: number[], options = defaults) {
  return parseEvent(new ByteReader(new Uint8Array(bytes)), options);
}

describe("Event codec", () => {
  describe("Note events", () => {
    it("should parse Note On into note and velocity", () => {
      const { event, byteLength } = parse([0x00, 0x93, 0x3c, 0x64]);
      expect(event).toEqual({
        type: "note",
        delta: 0,
        status: 0x93,
        note: 60,
        velocity: 100,
      });
      expect(byteLength).toBe(4);
      expect(channelOf(event)).toBe(3);
      expect(isNoteOn(event)).toBe(true);
    });

    it("should parse Note Off with a two-byte delta", () => {
      const { event, byteLength } = parse([0x81, 0x00, 0x80, 0x40, 0x00]);
      expect(event).toEqual({
        type: "note",
        delta: 128,
        status: 0x80,
        note: 64,
        velocity: 0,
      });
      expect(byteLength).toBe(5);
      expect(isNoteOn(event)).toBe(false);
    });

    it("should keep Note On with zero velocity as is", () => {
      const { event } = parse([0x00, 0x90, 0x3c, 0x00]);
      expect(event.type).toBe("note");
      expect(event.status).toBe(0x90);
      expect(isNoteOn(event)).toBe(false);
    });
  });

  describe("Fixed-length channel events", () => {
    const cases: Array<[string, number[], number[]]> = [
      ["polyAftertouch", [0x00, 0xa1, 0x3c, 0x20], [0x3c, 0x20]],
      ["controlChange", [0x05, 0xb2, 0x07, 0x64], [0x07, 0x64]],
      ["programChange", [0x00, 0xc1, 0x05], [0x05]],
      ["channelPressure", [0x00, 0xd0, 0x30], [0x30]],
      ["pitchBend", [0x10, 0xef, 0x00, 0x40], [0x00, 0x40]],
    ];

    it.each(cases)("should store %s payload opaquely", (eventClass, bytes, payload) => {
      const { event, byteLength } = parse(bytes);
      expect(eventClassOf(event.status)).toBe(eventClass);
      expect(event.type).toBe("raw");
      if (event.type === "raw") {
        expect(Array.from(event.payload)).toEqual(payload);
      }
      expect(byteLength).toBe(bytes.length);
    });

    it("should expose the channel of opaque channel events", () => {
      expect(channelOf(parse([0x00, 0xb2, 0x07, 0x64]).event)).toBe(2);
    });
  });

  describe("System and meta events", () => {
    it("should keep meta type, length and data in the payload", () => {
      const { event, byteLength } = parse([
        0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20,
      ]);
      expect(event.type).toBe("raw");
      expect(isMetaEvent(event)).toBe(true);
      expect(channelOf(event)).toBeUndefined();
      if (event.type === "raw") {
        expect(Array.from(event.payload)).toEqual([
          0x51, 0x03, 0x07, 0xa1, 0x20,
        ]);
      }
      expect(byteLength).toBe(7);
    });

    it("should read SysEx without a meta type byte", () => {
      const { event, byteLength } = parse([
        0x00, 0xf0, 0x03, 0x7e, 0x01, 0xf7,
      ]);
      expect(isMetaEvent(event)).toBe(false);
      expect(eventClassOf(event.status)).toBe("system");
      if (event.type === "raw") {
        expect(Array.from(event.payload)).toEqual([0x03, 0x7e, 0x01, 0xf7]);
      }
      expect(byteLength).toBe(6);
    });

    it("should follow a multi-byte meta length", () => {
      const text = new Array<number>(200).fill(0x41);
      const bytes = [0x00, 0xff, 0x01, 0x81, 0x48, ...text, 0x00, 0xff, 0x2f, 0x00];
      const reader = new ByteReader(new Uint8Array(bytes));
      const { byteLength } = parseEvent(reader, defaults);
      expect(byteLength).toBe(205);
      expect(reader.offset).toBe(205);
      expect(parseEvent(reader, defaults).byteLength).toBe(4);
    });

    it("should not read past the declared meta length", () => {
      const reader = new ByteReader(
        new Uint8Array([0x00, 0xff, 0x2f, 0x00, 0x99]),
      );
      expect(parseEvent(reader, defaults).byteLength).toBe(4);
      expect(reader.remaining).toBe(1);
    });
  });

  describe("Rejection", () => {
    it.each([0x00, 0x10, 0x20, 0x30, 0x40, 0x50, 0x60, 0x7f])(
      "should reject status byte %i",
      (status) => {
        expect(() => parse([0x00, status, 0x40])).toThrow(MalformedEventError);
      },
    );

    it("should report running status at the offending byte", () => {
      expect(() => parse([0x00, 0x3c, 0x40])).toThrow(
        "Invalid status byte 0x3c (running status is not supported) (at 0x1)",
      );
    });

    it("should throw TruncatedStreamError for a cut-off payload", () => {
      expect(() => parse([0x00, 0x90, 0x3c])).toThrow(TruncatedStreamError);
      expect(() => parse([0x00, 0xff, 0x01, 0x05, 0x41])).toThrow(
        TruncatedStreamError,
      );
    });

    it("should apply maxVarLenBytes to delta-times", () => {
      const options = { ...defaults, maxVarLenBytes: 2 };
      expect(() => parse([0x81, 0x80, 0x00, 0x90, 0x3c, 0x40], options)).toThrow(
        MalformedEventError,
      );
    });

    it("should apply maxVarLenBytes to meta lengths", () => {
      const options = { ...defaults, maxVarLenBytes: 1 };
      expect(() => parse([0x00, 0xff, 0x01, 0x80, 0x01, 0x41], options)).toThrow(
        MalformedEventError,
      );
    });
  });

  describe("encodeEvent", () => {
    const wellFormed: number[][] = [
      [0x00, 0x93, 0x3c, 0x64],
      [0x81, 0x00, 0x80, 0x40, 0x00],
      [0x00, 0xa1, 0x3c, 0x20],
      [0x05, 0xb2, 0x07, 0x64],
      [0x00, 0xc1, 0x05],
      [0x00, 0xd0, 0x30],
      [0x10, 0xef, 0x00, 0x40],
      [0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20],
      [0x00, 0xf0, 0x03, 0x7e, 0x01, 0xf7],
      [0x83, 0x60, 0xf7, 0x02, 0x43, 0xf7],
      // non-minimal meta length survives because it is never re-encoded
      [0x00, 0xff, 0x01, 0x80, 0x02, 0x41, 0x42],
    ];

    it.each(wellFormed)("should reproduce event %# byte for byte", (...bytes) => {
      expect(Array.from(encodeEvent(parse(bytes).event))).toEqual(bytes);
    });

    it("should re-encode a mutated delta minimally", () => {
      const { event } = parse([0x00, 0x90, 0x3c, 0x64]);
      event.delta = 480;
      expect(Array.from(encodeEvent(event))).toEqual([
        0x83, 0x60, 0x90, 0x3c, 0x64,
      ]);
    });

    it("should write out-of-range note values without clamping", () => {
      const { event } = parse([0x00, 0x90, 0x00, 0x64]);
      if (event.type !== "note") throw new Error("expected a note event");
      event.note = event.note + 200;
      expect(Array.from(encodeEvent(event))).toEqual([0x00, 0x90, 200, 0x64]);
    });

    it("should refuse values that do not fit in a byte", () => {
      const event: MidiEvent = {
        type: "note",
        delta: 0,
        status: 0x90,
        note: 260,
        velocity: 64,
      };
      expect(() => encodeEvent(event)).toThrow(RangeError);
    });

    it("should refuse a note pushed past a byte and a negative delta", () => {
      const { event } = parse([0x00, 0x90, 0x3c, 0x64]);
      if (event.type !== "note") throw new Error("expected a note event");
      event.note += 200;
      expect(() => encodeEvent(event)).toThrow("note does not fit in one byte: 260");
      event.note = 60;
      event.delta = -1;
      expect(() => encodeEvent(event)).toThrow(RangeError);
    });

    it("should keep velocities above 127 as written", () => {
      const { event } = parse([0x00, 0x80, 0x3c, 0x40]);
      if (event.type !== "note") throw new Error("expected a note event");
      event.velocity = 255;
      expect(Array.from(encodeEvent(event))).toEqual([0x00, 0x80, 0x3c, 0xff]);
    });

    it("should copy payloads out of the input buffer", () => {
      const input = new Uint8Array([0x00, 0xb0, 0x07, 0x64]);
      const { event } = parseEvent(new ByteReader(input), defaults);
      input[2] = 0x0a;
      expect(Array.from(encodeEvent(event))).toEqual([0x00, 0xb0, 0x07, 0x64]);
    });
  });
});
