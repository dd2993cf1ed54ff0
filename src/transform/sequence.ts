// ─── Sequence Helpers ───────────────────────────────────────────────────────
//
// Shared iteration logic for the transforms: note pairing, onset grouping,
// time ordering and event copying.
// ─────────────────────────────────────────────────────────────────────────────

import { compare, equals, fixedKey, type Fixed } from "../midi/fixed.js";
import {
  isNoteEvent,
  isNoteRelease,
  isSoundingNoteOn,
  type MidiEvent,
  type NoteEvent,
  type NoteOnEvent,
  type Performance,
} from "../midi/types.js";

// ─── Note Pairing ───────────────────────────────────────────────────────────

/** Note-on ↔ note-off links, keyed by sequence index. */
export interface NotePairs {
  /** Index of a sounding note-on → index of its release. */
  releaseOf: Map<number, number>;
  /** Index of a release → index of the note-on it ends. */
  onsetOf: Map<number, number>;
}

/**
 * Pair each sounding note-on with the next release (note-off or velocity-0
 * note-on) of the same channel and note, first-in first-out.
 */
export function pairNotes(performance: Performance): NotePairs {
  const releaseOf = new Map<number, number>();
  const onsetOf = new Map<number, number>();
  const pending = new Map<string, number[]>();

  performance.forEach((event, index) => {
    if (!isNoteEvent(event)) return;
    const key = `${event.channel}:${event.note}`;

    if (isSoundingNoteOn(event)) {
      const queue = pending.get(key);
      if (queue) queue.push(index);
      else pending.set(key, [index]);
    } else if (isNoteRelease(event)) {
      const onset = pending.get(key)?.shift();
      if (onset !== undefined) {
        releaseOf.set(onset, index);
        onsetOf.set(index, onset);
      }
    }
  });

  return { releaseOf, onsetOf };
}

/** Look up the note event at an index produced by pairNotes. */
export function noteAt(performance: Performance, index: number): NoteEvent {
  const event = performance[index];
  if (event === undefined || !isNoteEvent(event)) {
    throw new Error(`Expected a note event at index ${index}`);
  }
  return event;
}

// ─── Onset Grouping ─────────────────────────────────────────────────────────

/** Note-ons sharing one onset time and channel. */
export interface OnsetGroup {
  time: Fixed;
  channel: number;
  /** Sequence indices, in sequence order. */
  indices: number[];
  notes: NoteOnEvent[];
}

/**
 * Group sounding note-ons by identical (time, channel). Groups come back in
 * order of their first member. `accept` can exclude individual note-ons.
 */
export function groupOnsets(
  performance: Performance,
  accept: (event: NoteOnEvent, index: number) => boolean = () => true,
): OnsetGroup[] {
  const groups = new Map<string, OnsetGroup>();

  performance.forEach((event, index) => {
    if (!isSoundingNoteOn(event) || !accept(event, index)) return;
    const key = `${event.channel}@${fixedKey(event.time)}`;
    const group = groups.get(key);
    if (group) {
      group.indices.push(index);
      group.notes.push(event);
    } else {
      groups.set(key, { time: event.time, channel: event.channel, indices: [index], notes: [event] });
    }
  });

  return [...groups.values()];
}

// ─── Ordering ───────────────────────────────────────────────────────────────

/** Both absent, or both present and equal. */
export function sameTime(a: Fixed | undefined, b: Fixed | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return equals(a, b);
}

/**
 * Stable sort by time: timed events ascending, then untimed events in
 * their original relative order.
 */
export function sortByTime(events: readonly MidiEvent[]): MidiEvent[] {
  return [...events].sort((a, b) => {
    if (a.time === undefined) return b.time === undefined ? 0 : 1;
    if (b.time === undefined) return -1;
    return compare(a.time, b.time);
  });
}

/** Shallow copy, so outputs never alias input events. */
export function copyEvent<E extends MidiEvent>(event: E): E {
  return { ...event };
}
