// ─── Event Constructors ─────────────────────────────────────────────────────
//
// Small factories so callers (and tests) can write `noteOn(0, 60, 100, 0)`
// instead of spelling out Fixed times by hand.
// ─────────────────────────────────────────────────────────────────────────────

import { toFixed, type Fixed } from "./fixed.js";
import type {
  NoteOnEvent,
  NoteOffEvent,
  ControlChangeEvent,
  PitchWheelEvent,
  AfterTouchEvent,
  PolyTouchEvent,
  SetTempoEvent,
  TimeSignatureEvent,
} from "./types.js";

type Time = number | Fixed;

export function noteOn(channel: number, note: number, velocity: number, time: Time): NoteOnEvent {
  return { type: "noteOn", channel, note, velocity, time: toFixed(time) };
}

export function noteOff(channel: number, note: number, velocity: number, time: Time): NoteOffEvent {
  return { type: "noteOff", channel, note, velocity, time: toFixed(time) };
}

export function controlChange(channel: number, control: number, value: number, time: Time): ControlChangeEvent {
  return { type: "controlChange", channel, control, value, time: toFixed(time) };
}

export function pitchWheel(channel: number, pitch: number, time: Time): PitchWheelEvent {
  return { type: "pitchWheel", channel, pitch, time: toFixed(time) };
}

export function afterTouch(channel: number, value: number, time: Time): AfterTouchEvent {
  return { type: "afterTouch", channel, value, time: toFixed(time) };
}

export function polyTouch(channel: number, note: number, value: number, time: Time): PolyTouchEvent {
  return { type: "polyTouch", channel, note, value, time: toFixed(time) };
}

/** Tempo event; omit `time` for an unplaced event. */
export function setTempo(tempo: number, time?: Time): SetTempoEvent {
  return time === undefined ? { type: "setTempo", tempo } : { type: "setTempo", tempo, time: toFixed(time) };
}

export function timeSignature(
  numerator: number,
  denominator: number,
  clocksPerClick = 24,
  time?: Time,
): TimeSignatureEvent {
  const event: TimeSignatureEvent = { type: "timeSignature", numerator, denominator, clocksPerClick };
  return time === undefined ? event : { ...event, time: toFixed(time) };
}
