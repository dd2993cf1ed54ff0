// ─── MIDI Event Types ───────────────────────────────────────────────────────
//
// The event model every transform reads and writes. A Performance is an
// ordered, immutable list of these events with absolute tick times.
// Sequence order is meaningful and is not assumed to be sorted by time.
// ─────────────────────────────────────────────────────────────────────────────

import type { Fixed } from "./fixed.js";

// ─── Domains ────────────────────────────────────────────────────────────────

export const NOTE_MIN = 0;
export const NOTE_MAX = 127;
/** Upper bound of 7-bit data bytes (velocity, controller value, ...). */
export const DATA_MAX = 127;
export const CHANNEL_MAX = 15;
export const PITCH_MIN = -8192;
export const PITCH_MAX = 8191;
/** Largest tempo a 24-bit set-tempo meta event can carry. */
export const TEMPO_MAX = 0xffffff;
/** Middle C (C4). */
export const MIDDLE_C = 60;

// ─── Channel Events ─────────────────────────────────────────────────────────

export interface NoteOnEvent {
  type: "noteOn";
  /** MIDI channel (0-15). */
  channel: number;
  /** MIDI note number (0-127). 60 = middle C. */
  note: number;
  /** Velocity (0-127). 0 acts as a note-off. */
  velocity: number;
  /** Absolute time in ticks. */
  time: Fixed;
}

export interface NoteOffEvent {
  type: "noteOff";
  channel: number;
  note: number;
  /** Release velocity (0-127). */
  velocity: number;
  time: Fixed;
}

export interface ControlChangeEvent {
  type: "controlChange";
  channel: number;
  /** Controller number (0-127). */
  control: number;
  value: number;
  time: Fixed;
}

export interface PitchWheelEvent {
  type: "pitchWheel";
  channel: number;
  /** Signed bend, -8192 to 8191. 0 = centered. */
  pitch: number;
  time: Fixed;
}

/** Channel pressure. */
export interface AfterTouchEvent {
  type: "afterTouch";
  channel: number;
  value: number;
  time: Fixed;
}

/** Polyphonic key pressure. */
export interface PolyTouchEvent {
  type: "polyTouch";
  channel: number;
  note: number;
  value: number;
  time: Fixed;
}

// ─── Global Events ──────────────────────────────────────────────────────────

export interface SetTempoEvent {
  type: "setTempo";
  /** Microseconds per quarter note. */
  tempo: number;
  /** Absent = no explicit placement on the timeline. */
  time?: Fixed;
}

export interface TimeSignatureEvent {
  type: "timeSignature";
  numerator: number;
  /** Actual denominator (4 = quarter note), not the power-of-two exponent. */
  denominator: number;
  /** MIDI clocks per metronome click. */
  clocksPerClick: number;
  time?: Fixed;
}

// ─── Unions ─────────────────────────────────────────────────────────────────

export type NoteEvent = NoteOnEvent | NoteOffEvent;

export type ChannelEvent =
  | NoteOnEvent
  | NoteOffEvent
  | ControlChangeEvent
  | PitchWheelEvent
  | AfterTouchEvent
  | PolyTouchEvent;

export type GlobalEvent = SetTempoEvent | TimeSignatureEvent;

export type MidiEvent = ChannelEvent | GlobalEvent;

export type MidiEventType = MidiEvent["type"];

/** An ordered, read-only event sequence. */
export type Performance = readonly MidiEvent[];

// ─── Guards ─────────────────────────────────────────────────────────────────

export function isNoteEvent(event: MidiEvent): event is NoteEvent {
  return event.type === "noteOn" || event.type === "noteOff";
}

/** A note-on with velocity > 0, i.e. one that starts a sounding note. */
export function isSoundingNoteOn(event: MidiEvent): event is NoteOnEvent {
  return event.type === "noteOn" && event.velocity > 0;
}

/** A note-off, or a note-on with velocity 0. */
export function isNoteRelease(event: MidiEvent): event is NoteEvent {
  return event.type === "noteOff" || (event.type === "noteOn" && event.velocity === 0);
}
