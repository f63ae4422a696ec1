// edits.ts — note-level transformations over decoded tracks
//
// These work on the data model only; the codec never calls them. Each one
// mutates the given tracks in place.

import type { MidiEvent, MidiTrack, NoteEvent } from "./types";

export const NOTE_MIN = 0;
export const NOTE_MAX = 127;

export function clampNote(note: number): number {
  return Math.max(NOTE_MIN, Math.min(NOTE_MAX, note));
}

function isNote(event: MidiEvent): event is NoteEvent {
  return event.type === "note";
}

/** Shifts every note by `semitones`, clamped to the MIDI note range. */
export function transpose(tracks: MidiTrack[], semitones: number): void {
  for (const track of tracks) {
    for (const event of track.events) {
      if (isNote(event)) event.note = clampNote(event.note + semitones);
    }
  }
}

/**
 * Sets the velocity of every sounding note event. Zero velocities (note-on
 * used as a release) are left alone.
 */
export function setVelocity(tracks: MidiTrack[], velocity: number): void {
  if (!Number.isInteger(velocity) || velocity < 1 || velocity > 127) {
    throw new RangeError(`Velocity must be an integer 1-127, got ${velocity}`);
  }
  for (const track of tracks) {
    for (const event of track.events) {
      if (isNote(event) && event.velocity !== 0) event.velocity = velocity;
    }
  }
}

/**
 * After every note event, inserts simultaneous copies shifted by each of
 * `intervals` semitones (e.g. `[4, 7]` for a major triad). The copies follow
 * the note in the order `intervals` lists them.
 */
export function addChorus(tracks: MidiTrack[], intervals: number[]): void {
  for (const track of tracks) {
    const { events } = track;
    for (let index = events.length - 1; index >= 0; index--) {
      const event = events[index];
      if (!isNote(event)) continue;
      const voices = intervals.map(
        (interval): NoteEvent => ({
          ...event,
          delta: 0,
          note: clampNote(event.note + interval),
        }),
      );
      events.splice(index + 1, 0, ...voices);
    }
  }
}

/**
 * Echoes every note event `n` sixteenth notes later for each `n` in
 * `sixteenths`. Deltas of the events after an echo are adjusted so their
 * absolute times do not move.
 */
export function addDelay(
  tracks: MidiTrack[],
  sixteenths: number[],
  ticksPerQuarter: number,
): void {
  const offsets = sixteenths.map((count) => {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(
        `Delay must be a positive number of sixteenths, got ${count}`,
      );
    }
    return Math.floor((ticksPerQuarter * count) / 4);
  });

  for (const track of tracks) {
    const { events } = track;
    for (let index = events.length - 1; index >= 0; index--) {
      const event = events[index];
      if (!isNote(event)) continue;
      for (const ticks of offsets) {
        insertAfter(events, index, { ...event }, ticks);
      }
    }
  }
}

/** Places `echo` `ticks` after `events[index]`, keeping later events in time. */
function insertAfter(
  events: MidiEvent[],
  index: number,
  echo: NoteEvent,
  ticks: number,
): void {
  let position = index + 1;
  let remaining = ticks;
  for (;;) {
    const next = events[position];
    if (next === undefined || next.delta > remaining) break;
    remaining -= next.delta;
    position++;
  }

  echo.delta = remaining;
  const following = events[position];
  if (following) following.delta -= remaining;
  events.splice(position, 0, echo);
}
