// ─── midi-reshape ────────────────────────────────────────────────────────────
//
// Non-destructive transformation and analysis of MIDI performances:
// ordered, immutable sequences of time-stamped events.
//
// Usage:
//   import { readPerformanceFile, transposeNotes, getBpm } from "midi-reshape";
//   const { performance } = await readPerformanceFile("song.mid");
//   const up = transposeNotes(performance, 12);
// ─────────────────────────────────────────────────────────────────────────────

// Export event model
export {
  NOTE_MIN,
  NOTE_MAX,
  DATA_MAX,
  CHANNEL_MAX,
  PITCH_MIN,
  PITCH_MAX,
  TEMPO_MAX,
  MIDDLE_C,
  isNoteEvent,
  isSoundingNoteOn,
  isNoteRelease,
} from "./midi/types.js";

export type {
  MidiEventType,
  NoteOnEvent,
  NoteOffEvent,
  ControlChangeEvent,
  PitchWheelEvent,
  AfterTouchEvent,
  PolyTouchEvent,
  SetTempoEvent,
  TimeSignatureEvent,
  NoteEvent,
  ChannelEvent,
  GlobalEvent,
  MidiEvent,
  Performance,
} from "./midi/types.js";

export {
  noteOn,
  noteOff,
  controlChange,
  pitchWheel,
  afterTouch,
  polyTouch,
  setTempo,
  timeSignature,
} from "./midi/events.js";

// Export fixed-point time
export {
  FRACTION_BITS,
  ZERO,
  ONE,
  fixed,
  fromRatio,
  toFixed,
  add,
  sub,
  mul,
  mulDiv,
  divInt,
  compare,
  equals,
  isNegative,
  maxOf,
  roundToMultiple,
  toTicks,
  toNumber,
  fixedKey,
} from "./midi/fixed.js";
export type { Fixed } from "./midi/fixed.js";

// Export validation schemas
export {
  FixedSchema,
  MidiEventSchema,
  PerformanceSchema,
  validatePerformance,
  validateEvent,
} from "./midi/schema.js";
export type { PerformanceIssue } from "./midi/schema.js";

// Export errors
export { TransformError, isTransformError } from "./errors.js";
export type { TransformErrorKind } from "./errors.js";

// Export note manipulation
export {
  transposeNotes,
  reverseNotes,
  quantizeNotes,
  extractNotes,
  changeNoteDuration,
} from "./transform/notes.js";
export type { ReverseOptions, ExtractOptions, NonNoteReversal } from "./transform/notes.js";

// Export global manipulation
export { changeTempo, remapInstruments, setMessage, sameSlot } from "./transform/global.js";

// Export analysis
export { getBpm, tempoToBpm, performanceLength, analyzeChords } from "./transform/analysis.js";
export type { ChordReading } from "./transform/analysis.js";
export { detectChord, midiNotesToNames } from "./chord-detect.js";

// Export advanced manipulation
export {
  generateHarmony,
  arpeggiateChords,
  editDynamics,
  ARPEGGIO_PATTERNS,
  DynamicsEnvelopeSchema,
} from "./transform/advanced.js";
export type {
  ArpeggioPattern,
  DynamicsContext,
  VelocityMapper,
  DynamicsEnvelope,
  DynamicsCurve,
} from "./transform/advanced.js";

export { MODES, DEFAULT_HARMONY_DEGREES, ScaleModeSchema, scaleMode } from "./transform/scales.js";
export type { ModeName, ScaleMode } from "./transform/scales.js";

// Export instrument lookup
export {
  instrumentName,
  instrumentFamily,
  nextInFamily,
  findProgram,
  loadInstrumentTable,
} from "./instruments.js";
export type { InstrumentFamily, InstrumentTable } from "./instruments.js";

// Export engine + config
export { createEngine } from "./engine.js";
export type { Engine } from "./engine.js";
export {
  EngineConfigSchema,
  validateEngineConfig,
  resolveEngineConfig,
} from "./config/schema.js";
export type { EngineConfig, EngineConfigInput, ConfigError } from "./config/schema.js";
export { loadEngineConfig } from "./config/loader.js";

// Export MIDI file codec
export {
  decodePerformance,
  encodePerformance,
  readPerformanceFile,
  writePerformanceFile,
  DEFAULT_TICKS_PER_BEAT,
} from "./midi/codec.js";
export type { DecodedPerformance, CodecWarning, EncodeOptions } from "./midi/codec.js";
