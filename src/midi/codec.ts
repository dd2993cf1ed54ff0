// ─── Standard MIDI File Codec ───────────────────────────────────────────────
//
// Converts between Standard MIDI File bytes and a Performance, using
// midi-file for the byte-level parsing and writing.
//
// Decoding merges every track onto one timeline of absolute ticks.
// Encoding writes a single-track (format 0) file.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import {
  parseMidi,
  writeMidi,
  type MidiData,
  type MidiEvent as SmfEvent,
} from "midi-file";
import { toTicks } from "./fixed.js";
import {
  noteOn,
  noteOff,
  controlChange,
  pitchWheel,
  afterTouch,
  polyTouch,
  setTempo,
  timeSignature,
} from "./events.js";
import { validatePerformance } from "./schema.js";
import type { MidiEvent, Performance } from "./types.js";
import { assertNever } from "../errors.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_TICKS_PER_BEAT = 480;

/** Default 32nd notes per quarter written with a time signature. */
const THIRTY_SECONDS_PER_BEAT = 8;

// ─── Types ───────────────────────────────────────────────────────────────────

/** An event the model cannot represent, skipped during decoding. */
export interface CodecWarning {
  /** e.g. "track 1, event 4". */
  location: string;
  /** midi-file event type, e.g. "programChange". */
  type: string;
  message: string;
}

export interface DecodedPerformance {
  performance: MidiEvent[];
  /** Ticks per quarter note of the source file. */
  ticksPerBeat: number;
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  format: number;
  warnings: CodecWarning[];
}

export interface EncodeOptions {
  /** Resolution of the written file (default: 480). */
  ticksPerBeat?: number;
}

// ─── Decoding ────────────────────────────────────────────────────────────────

function fromSmf(event: SmfEvent, tick: number): MidiEvent | null {
  switch (event.type) {
    case "noteOn":
      return noteOn(event.channel, event.noteNumber, event.velocity, tick);
    case "noteOff":
      return noteOff(event.channel, event.noteNumber, event.velocity, tick);
    case "controller":
      return controlChange(event.channel, event.controllerType, event.value, tick);
    case "pitchBend":
      return pitchWheel(event.channel, event.value, tick);
    case "channelAftertouch":
      return afterTouch(event.channel, event.amount, tick);
    case "noteAftertouch":
      return polyTouch(event.channel, event.noteNumber, event.amount, tick);
    case "setTempo":
      return setTempo(event.microsecondsPerBeat, tick);
    case "timeSignature":
      return timeSignature(event.numerator, event.denominator, event.metronome, tick);
    default:
      return null;
  }
}

/**
 * Decode a Standard MIDI File. Events from all tracks are merged by
 * absolute tick; at equal ticks, earlier tracks come first and each
 * track keeps its own order.
 */
export function decodePerformance(bytes: Uint8Array): DecodedPerformance {
  const midi = parseMidi(bytes);
  const { ticksPerBeat, format } = midi.header;
  if (ticksPerBeat === undefined) {
    throw new Error("SMPTE-timed MIDI files are not supported (no ticksPerBeat in header)");
  }

  const placed: Array<{ tick: number; track: number; order: number; event: MidiEvent }> = [];
  const warnings: CodecWarning[] = [];

  midi.tracks.forEach((track, trackIndex) => {
    let tick = 0;
    track.forEach((smf, order) => {
      tick += smf.deltaTime;
      const event = fromSmf(smf, tick);
      if (event) {
        placed.push({ tick, track: trackIndex, order, event });
      } else if (smf.type !== "endOfTrack") {
        warnings.push({
          location: `track ${trackIndex}, event ${order}`,
          type: smf.type,
          message: "not represented in the event model",
        });
      }
    });
  });

  placed.sort((a, b) => a.tick - b.tick || a.track - b.track || a.order - b.order);

  return {
    performance: placed.map(p => p.event),
    ticksPerBeat,
    format,
    warnings,
  };
}

// ─── Encoding ────────────────────────────────────────────────────────────────

function toSmf(event: MidiEvent, deltaTime: number): SmfEvent {
  switch (event.type) {
    case "noteOn": {
      const smf = { deltaTime, type: "noteOn" as const, channel: event.channel, noteNumber: event.note, velocity: event.velocity };
      return smf;
    }
    case "noteOff": {
      const smf = { deltaTime, type: "noteOff" as const, channel: event.channel, noteNumber: event.note, velocity: event.velocity };
      return smf;
    }
    case "controlChange": {
      const smf = { deltaTime, type: "controller" as const, channel: event.channel, controllerType: event.control, value: event.value };
      return smf;
    }
    case "pitchWheel": {
      const smf = { deltaTime, type: "pitchBend" as const, channel: event.channel, value: event.pitch };
      return smf;
    }
    case "afterTouch": {
      const smf = { deltaTime, type: "channelAftertouch" as const, channel: event.channel, amount: event.value };
      return smf;
    }
    case "polyTouch": {
      const smf = { deltaTime, type: "noteAftertouch" as const, channel: event.channel, noteNumber: event.note, amount: event.value };
      return smf;
    }
    case "setTempo": {
      const smf = { deltaTime, meta: true as const, type: "setTempo" as const, microsecondsPerBeat: event.tempo };
      return smf;
    }
    case "timeSignature": {
      const smf = {
        deltaTime,
        meta: true as const,
        type: "timeSignature" as const,
        numerator: event.numerator,
        denominator: event.denominator,
        metronome: event.clocksPerClick,
        thirtyseconds: THIRTY_SECONDS_PER_BEAT,
      };
      return smf;
    }
    default:
      return assertNever(event, "encodePerformance");
  }
}

/**
 * Encode a performance as a format-0 Standard MIDI File.
 *
 * Times are rounded to whole ticks (half up) and negative times clamp to 0.
 * Events are written in tick order, keeping sequence order at equal ticks;
 * an untimed tempo or time-signature event is placed at the tick of the
 * event before it.
 */
export function encodePerformance(performance: Performance, options: EncodeOptions = {}): Uint8Array {
  const issues = validatePerformance(performance);
  if (issues.length > 0) {
    const detail = issues.map(i => `  ${i.field}: ${i.message}`).join("\n");
    throw new Error(`Cannot encode invalid performance:\n${detail}`);
  }

  let previous = 0;
  const placed = performance.map((event, order) => {
    const tick = event.time === undefined ? previous : Math.max(0, toTicks(event.time));
    previous = tick;
    return { tick, order, event };
  });
  placed.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const track: SmfEvent[] = [];
  let lastTick = 0;
  for (const { tick, event } of placed) {
    track.push(toSmf(event, tick - lastTick));
    lastTick = tick;
  }
  const endOfTrack = { deltaTime: 0, meta: true as const, type: "endOfTrack" as const };
  track.push(endOfTrack);

  const header = { format: 0 as const, numTracks: 1, ticksPerBeat: options.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT };
  const data: MidiData = { header, tracks: [track] };
  return new Uint8Array(writeMidi(data));
}

// ─── Files ───────────────────────────────────────────────────────────────────

/**
 * Read and decode a .mid file. Skipped events are reported on stderr.
 */
export async function readPerformanceFile(filePath: string): Promise<DecodedPerformance> {
  const bytes = await readFile(filePath);
  const decoded = decodePerformance(new Uint8Array(bytes));
  for (const w of decoded.warnings) {
    console.error(`  SKIP ${basename(filePath)} ${w.location}: ${w.type} ${w.message}`);
  }
  return decoded;
}

/** Encode and write a performance to a .mid file. */
export async function writePerformanceFile(
  filePath: string,
  performance: Performance,
  options: EncodeOptions = {},
): Promise<void> {
  await writeFile(filePath, encodePerformance(performance, options));
}
