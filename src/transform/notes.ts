// ─── Note Manipulation ──────────────────────────────────────────────────────
//
// Transforms over note-on / note-off events: transpose, reverse, quantize,
// extract by range, and time scaling. Each returns a new performance and
// leaves its input untouched.
// ─────────────────────────────────────────────────────────────────────────────

import {
  TransformError,
  assertNever,
  clampToDomain,
  requireInteger,
} from "../errors.js";
import {
  isNegative,
  mul,
  roundToMultiple,
  sub,
  toFixed,
  type Fixed,
} from "../midi/fixed.js";
import {
  MIDDLE_C,
  NOTE_MAX,
  NOTE_MIN,
  type MidiEvent,
  type Performance,
} from "../midi/types.js";
import { performanceLength } from "./analysis.js";
import { copyEvent, noteAt, pairNotes, sortByTime } from "./sequence.js";

// ─── Options ────────────────────────────────────────────────────────────────

/** What reverseNotes does with events that are not notes. */
export type NonNoteReversal = "keep" | "mirror";

export interface ReverseOptions {
  /** "keep" (default) leaves their time as is; "mirror" reflects it too. */
  nonNoteEvents?: NonNoteReversal;

  /** Stably sort the result by its new times (default: false). */
  reorder?: boolean;
}

export interface ExtractOptions {
  /** Keep non-note events alongside the extracted notes (default: false). */
  keepContext?: boolean;

  /** Center of the band (default: 60, middle C). */
  center?: number;
}

function clampNote(note: number): number {
  return clampToDomain(note, NOTE_MIN, NOTE_MAX);
}

// ─── Transpose ──────────────────────────────────────────────────────────────

/**
 * Shift every note-on / note-off by `semitones`, clamping at 0 and 127.
 * Other events pass through in place.
 */
export function transposeNotes(performance: Performance, semitones: number): MidiEvent[] {
  requireInteger(semitones, "transposeNotes", "semitones");

  return performance.map((event): MidiEvent => {
    switch (event.type) {
      case "noteOn":
      case "noteOff":
        return { ...event, note: clampNote(event.note + semitones) };
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "setTempo":
      case "timeSignature":
        return copyEvent(event);
      default:
        return assertNever(event, "transposeNotes");
    }
  });
}

// ─── Reverse ────────────────────────────────────────────────────────────────

/**
 * Mirror every note's sounding interval about the performance length L:
 * a note sounding over [on, off] sounds over [L - off, L - on] afterwards.
 * The note-on takes L - off and its release takes L - on, so the pair still
 * starts with the note-on. Unpaired note events are reflected alone.
 */
export function reverseNotes(performance: Performance, options: ReverseOptions = {}): MidiEvent[] {
  const nonNoteEvents = options.nonNoteEvents ?? "keep";
  if (nonNoteEvents !== "keep" && nonNoteEvents !== "mirror") {
    throw new TransformError("InvalidArgument", "reverseNotes", `Unknown nonNoteEvents policy: "${nonNoteEvents}"`);
  }

  const length = performanceLength(performance);
  const { releaseOf, onsetOf } = pairNotes(performance);
  const mirror = (time: Fixed): Fixed => sub(length, time);
  const mirrorOther = nonNoteEvents === "mirror";

  const reversed = performance.map((event, index): MidiEvent => {
    switch (event.type) {
      case "noteOn":
      case "noteOff": {
        const partner = releaseOf.get(index) ?? onsetOf.get(index);
        const source = partner === undefined ? event : noteAt(performance, partner);
        return { ...event, time: mirror(source.time) };
      }
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
        return mirrorOther ? { ...event, time: mirror(event.time) } : copyEvent(event);
      case "setTempo":
      case "timeSignature":
        return mirrorOther && event.time !== undefined
          ? { ...event, time: mirror(event.time) }
          : copyEvent(event);
      default:
        return assertNever(event, "reverseNotes");
    }
  });

  return options.reorder ? sortByTime(reversed) : reversed;
}

// ─── Quantize ───────────────────────────────────────────────────────────────

/**
 * Snap note-on / note-off times to the nearest multiple of `gridSize`
 * ticks. Exact half-way times go to the later grid line.
 */
export function quantizeNotes(performance: Performance, gridSize: number): MidiEvent[] {
  requireInteger(gridSize, "quantizeNotes", "gridSize", 1);

  return performance.map((event): MidiEvent => {
    switch (event.type) {
      case "noteOn":
      case "noteOff":
        return { ...event, time: roundToMultiple(event.time, gridSize) };
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "setTempo":
      case "timeSignature":
        return copyEvent(event);
      default:
        return assertNever(event, "quantizeNotes");
    }
  });
}

// ─── Extract ────────────────────────────────────────────────────────────────

/**
 * Keep only note events strictly inside (center - range, center + range),
 * with the bounds clamped to 0..127. Everything else is dropped unless
 * `keepContext` is set.
 */
export function extractNotes(
  performance: Performance,
  noteRange: number,
  options: ExtractOptions = {},
): MidiEvent[] {
  requireInteger(noteRange, "extractNotes", "noteRange", 0);
  const center = options.center ?? MIDDLE_C;
  requireInteger(center, "extractNotes", "center", NOTE_MIN, NOTE_MAX);

  const low = Math.max(NOTE_MIN, center - noteRange);
  const high = Math.min(NOTE_MAX, center + noteRange);
  const keepContext = options.keepContext ?? false;
  const result: MidiEvent[] = [];

  for (const event of performance) {
    switch (event.type) {
      case "noteOn":
      case "noteOff":
        if (event.note > low && event.note < high) result.push(copyEvent(event));
        break;
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "setTempo":
      case "timeSignature":
        if (keepContext) result.push(copyEvent(event));
        break;
      default:
        assertNever(event, "extractNotes");
    }
  }

  return result;
}

// ─── Duration ───────────────────────────────────────────────────────────────

/**
 * Multiply every event time by `factor`, stretching (> 1) or compressing
 * (< 1) the whole performance. Absent times stay absent. Note that this
 * scales absolute onsets too, not only the gap between on and off.
 */
export function changeNoteDuration(performance: Performance, factor: number | Fixed): MidiEvent[] {
  if (typeof factor === "number" && !Number.isFinite(factor)) {
    throw new TransformError("InvalidArgument", "changeNoteDuration", `factor must be finite, got ${factor}`);
  }
  if (typeof factor === "number" ? factor < 0 : isNegative(factor)) {
    throw new TransformError("InvalidArgument", "changeNoteDuration", "factor must not be negative");
  }
  const scale = toFixed(factor);

  return performance.map((event): MidiEvent => {
    switch (event.type) {
      case "noteOn":
      case "noteOff":
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
        return { ...event, time: mul(event.time, scale) };
      case "setTempo":
      case "timeSignature":
        return event.time === undefined ? copyEvent(event) : { ...event, time: mul(event.time, scale) };
      default:
        return assertNever(event, "changeNoteDuration");
    }
  });
}
