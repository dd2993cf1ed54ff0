// ─── midi-reshape: Engine ────────────────────────────────────────────────────
//
// Binds every transform to one EngineConfig so that policy choices
// (reverse mode, extract context, harmony degrees, arpeggio style) are made
// once. Per-call options still win over the config.
//
// Usage:
//   const engine = createEngine({ extract: { keepContext: true } });
//   const up = engine.transposeNotes(performance, 12);
//   const band = engine.extractNotes(up, 24);
// ─────────────────────────────────────────────────────────────────────────────

import type { Fixed } from "./midi/fixed.js";
import type { MidiEvent, Performance } from "./midi/types.js";
import {
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from "./config/schema.js";
import {
  transposeNotes,
  reverseNotes,
  quantizeNotes,
  extractNotes,
  changeNoteDuration,
  type ReverseOptions,
  type ExtractOptions,
} from "./transform/notes.js";
import { changeTempo, remapInstruments, setMessage } from "./transform/global.js";
import {
  getBpm,
  analyzeChords,
  performanceLength,
  type ChordReading,
} from "./transform/analysis.js";
import {
  generateHarmony,
  arpeggiateChords,
  editDynamics,
  type ArpeggioPattern,
  type DynamicsCurve,
} from "./transform/advanced.js";
import type { ScaleMode } from "./transform/scales.js";
import { encodePerformance } from "./midi/codec.js";
import { TransformError } from "./errors.js";
import { ZodError } from "zod";

/** The full operation catalogue, bound to a config. */
export interface Engine {
  readonly config: EngineConfig;

  transposeNotes(performance: Performance, semitones: number): MidiEvent[];
  reverseNotes(performance: Performance, options?: ReverseOptions): MidiEvent[];
  quantizeNotes(performance: Performance, gridSize: number): MidiEvent[];
  extractNotes(performance: Performance, noteRange: number, options?: ExtractOptions): MidiEvent[];
  changeNoteDuration(performance: Performance, factor: number | Fixed): MidiEvent[];

  changeTempo(performance: Performance, newTempo: number): MidiEvent[];
  remapInstruments(performance: Performance, channel: number): MidiEvent[];
  setMessage(performance: Performance, message: MidiEvent): MidiEvent[];

  getBpm(performance: Performance): number;
  performanceLength(performance: Performance): Fixed;
  analyzeChords(performance: Performance): ChordReading[];

  generateHarmony(performance: Performance, mode: ScaleMode): MidiEvent[];
  arpeggiateChords(performance: Performance, pattern?: ArpeggioPattern): MidiEvent[];
  editDynamics(performance: Performance, curve: DynamicsCurve): MidiEvent[];

  /** Standard MIDI File bytes at the configured resolution. */
  encode(performance: Performance): Uint8Array;
}

/**
 * Create an engine. Throws a TransformError (InvalidArgument) when the
 * config does not validate.
 */
export function createEngine(input: EngineConfigInput = {}): Engine {
  let config: EngineConfig;
  try {
    config = resolveEngineConfig(input);
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues.map(i => `${i.path.join(".") || "root"}: ${i.message}`).join("; ");
      throw new TransformError("InvalidArgument", "createEngine", `Invalid config (${detail})`);
    }
    throw err;
  }

  return {
    config,

    transposeNotes,
    reverseNotes: (performance, options = {}) =>
      reverseNotes(performance, { ...config.reverse, ...options }),
    quantizeNotes,
    extractNotes: (performance, noteRange, options = {}) =>
      extractNotes(performance, noteRange, {
        keepContext: config.extract.keepContext,
        center: config.extractCenter,
        ...options,
      }),
    changeNoteDuration,

    changeTempo,
    remapInstruments,
    setMessage,

    getBpm,
    performanceLength,
    analyzeChords,

    generateHarmony: (performance, mode) =>
      generateHarmony(performance, { ...mode, degrees: mode.degrees ?? config.harmonyDegrees }),
    arpeggiateChords: (performance, pattern = config.arpeggioPattern) =>
      arpeggiateChords(performance, pattern),
    editDynamics,

    encode: (performance) => encodePerformance(performance, { ticksPerBeat: config.ticksPerBeat }),
  };
}
