// ─── Global Manipulation ────────────────────────────────────────────────────
//
// Transforms that act on tempo, controller and placement of events rather
// than on individual notes.
// ─────────────────────────────────────────────────────────────────────────────

import { TransformError, assertNever, requireInteger } from "../errors.js";
import { nextInFamily } from "../instruments.js";
import { validateEvent } from "../midi/schema.js";
import {
  CHANNEL_MAX,
  TEMPO_MAX,
  type MidiEvent,
  type Performance,
} from "../midi/types.js";
import { copyEvent, sameTime, sortByTime } from "./sequence.js";

// ─── Tempo ──────────────────────────────────────────────────────────────────

/**
 * Rewrite the tempo of every set-tempo event, leaving its time alone.
 * A performance without tempo events comes back unchanged; no event is
 * ever inserted.
 */
export function changeTempo(performance: Performance, newTempo: number): MidiEvent[] {
  requireInteger(newTempo, "changeTempo", "newTempo", 0, TEMPO_MAX);

  return performance.map((event): MidiEvent => {
    switch (event.type) {
      case "setTempo":
        return { ...event, tempo: newTempo };
      case "noteOn":
      case "noteOff":
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "timeSignature":
        return copyEvent(event);
      default:
        return assertNever(event, "changeTempo");
    }
  });
}

// ─── Instruments ────────────────────────────────────────────────────────────

/**
 * For control-change events on `channel`, replace the value with the next
 * program in the same General MIDI family (wrapping to the family's first
 * member). Other channels and event types pass through.
 */
export function remapInstruments(performance: Performance, channel: number): MidiEvent[] {
  requireInteger(channel, "remapInstruments", "channel", 0, CHANNEL_MAX);

  return performance.map((event): MidiEvent => {
    switch (event.type) {
      case "controlChange":
        return event.channel === channel
          ? { ...event, value: nextInFamily(event.value) }
          : copyEvent(event);
      case "noteOn":
      case "noteOff":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "setTempo":
      case "timeSignature":
        return copyEvent(event);
      default:
        return assertNever(event, "remapInstruments");
    }
  });
}

// ─── Set Message ────────────────────────────────────────────────────────────

/**
 * Two events occupy the same timeline slot when they share type and time
 * and, for channel events, channel plus note (notes, poly touch) or
 * controller number (control change).
 */
export function sameSlot(a: MidiEvent, b: MidiEvent): boolean {
  if (!sameTime(a.time, b.time)) return false;

  switch (a.type) {
    case "noteOn":
      return b.type === "noteOn" && b.channel === a.channel && b.note === a.note;
    case "noteOff":
      return b.type === "noteOff" && b.channel === a.channel && b.note === a.note;
    case "polyTouch":
      return b.type === "polyTouch" && b.channel === a.channel && b.note === a.note;
    case "controlChange":
      return b.type === "controlChange" && b.channel === a.channel && b.control === a.control;
    case "pitchWheel":
      return b.type === "pitchWheel" && b.channel === a.channel;
    case "afterTouch":
      return b.type === "afterTouch" && b.channel === a.channel;
    case "setTempo":
    case "timeSignature":
      return b.type === a.type;
    default:
      return assertNever(a, "setMessage");
  }
}

/**
 * Insert `message`, or replace the first event occupying its slot. The
 * result is ordered by time; untimed events follow all timed ones in their
 * original relative order.
 */
export function setMessage(performance: Performance, message: MidiEvent): MidiEvent[] {
  const issues = validateEvent(message);
  if (issues.length > 0) {
    const detail = issues.map(i => `${i.field}: ${i.message}`).join("; ");
    throw new TransformError("InvalidArgument", "setMessage", `Invalid message (${detail})`);
  }

  const events = performance.map(copyEvent);
  const slot = events.findIndex(event => sameSlot(event, message));
  if (slot === -1) events.push(copyEvent(message));
  else events[slot] = copyEvent(message);

  return sortByTime(events);
}
