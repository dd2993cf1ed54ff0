// ─── Performance Schema ─────────────────────────────────────────────────────
//
// Runtime validation for events arriving from untyped callers.
// The static types in ./types.ts remain the source of truth; these
// schemas mirror them field for field.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import {
  NOTE_MAX,
  DATA_MAX,
  CHANNEL_MAX,
  PITCH_MIN,
  PITCH_MAX,
  TEMPO_MAX,
} from "./types.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const FixedSchema = z.object({
  negative: z.boolean(),
  magnitude: z.bigint().nonnegative(),
});

const channel = z.number().int().min(0).max(CHANNEL_MAX);
const dataByte = z.number().int().min(0).max(DATA_MAX);
const noteNumber = z.number().int().min(0).max(NOTE_MAX);

export const NoteOnSchema = z.object({
  type: z.literal("noteOn"),
  channel,
  note: noteNumber,
  velocity: dataByte,
  time: FixedSchema,
});

export const NoteOffSchema = z.object({
  type: z.literal("noteOff"),
  channel,
  note: noteNumber,
  velocity: dataByte,
  time: FixedSchema,
});

export const ControlChangeSchema = z.object({
  type: z.literal("controlChange"),
  channel,
  control: dataByte,
  value: dataByte,
  time: FixedSchema,
});

export const PitchWheelSchema = z.object({
  type: z.literal("pitchWheel"),
  channel,
  pitch: z.number().int().min(PITCH_MIN).max(PITCH_MAX),
  time: FixedSchema,
});

export const AfterTouchSchema = z.object({
  type: z.literal("afterTouch"),
  channel,
  value: dataByte,
  time: FixedSchema,
});

export const PolyTouchSchema = z.object({
  type: z.literal("polyTouch"),
  channel,
  note: noteNumber,
  value: dataByte,
  time: FixedSchema,
});

export const SetTempoSchema = z.object({
  type: z.literal("setTempo"),
  tempo: z.number().int().min(0).max(TEMPO_MAX),
  time: FixedSchema.optional(),
});

export const TimeSignatureSchema = z.object({
  type: z.literal("timeSignature"),
  numerator: z.number().int().min(1).max(255),
  denominator: z
    .number()
    .int()
    .min(1)
    .refine((d) => (d & (d - 1)) === 0, "denominator must be a power of two"),
  clocksPerClick: z.number().int().min(0).max(255),
  time: FixedSchema.optional(),
});

export const MidiEventSchema = z.discriminatedUnion("type", [
  NoteOnSchema,
  NoteOffSchema,
  ControlChangeSchema,
  PitchWheelSchema,
  AfterTouchSchema,
  PolyTouchSchema,
  SetTempoSchema,
  TimeSignatureSchema,
]);

export const PerformanceSchema = z.array(MidiEventSchema);

// ─── Validation ──────────────────────────────────────────────────────────────

export interface PerformanceIssue {
  field: string;
  message: string;
}

function toIssues(error: z.ZodError): PerformanceIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Validate an unknown value as a Performance.
 * Returns an empty array if valid.
 */
export function validatePerformance(value: unknown): PerformanceIssue[] {
  const result = PerformanceSchema.safeParse(value);
  return result.success ? [] : toIssues(result.error);
}

/** Validate a single event. Returns an empty array if valid. */
export function validateEvent(value: unknown): PerformanceIssue[] {
  const result = MidiEventSchema.safeParse(value);
  return result.success ? [] : toIssues(result.error);
}
