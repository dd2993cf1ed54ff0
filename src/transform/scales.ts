// ─── Scales & Modes ─────────────────────────────────────────────────────────
//
// Scale descriptors for generateHarmony(): a tonic pitch class plus the
// step pattern of one octave, e.g. major = [2, 2, 1, 2, 2, 2, 1].
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { TransformError } from "../errors.js";

/** Step patterns (semitones between successive degrees) of common scales. */
export const MODES = {
  major:           [2, 2, 1, 2, 2, 2, 1],
  ionian:          [2, 2, 1, 2, 2, 2, 1],
  dorian:          [2, 1, 2, 2, 2, 1, 2],
  phrygian:        [1, 2, 2, 2, 1, 2, 2],
  lydian:          [2, 2, 2, 1, 2, 2, 1],
  mixolydian:      [2, 2, 1, 2, 2, 1, 2],
  minor:           [2, 1, 2, 2, 1, 2, 2],
  aeolian:         [2, 1, 2, 2, 1, 2, 2],
  locrian:         [1, 2, 2, 1, 2, 2, 2],
  harmonicMinor:   [2, 1, 2, 2, 1, 3, 1],
  melodicMinor:    [2, 1, 2, 2, 2, 2, 1],
  majorPentatonic: [2, 2, 3, 2, 3],
  minorPentatonic: [3, 2, 2, 3, 2],
  blues:           [3, 2, 1, 1, 3, 2],
} as const satisfies Record<string, readonly number[]>;

export type ModeName = keyof typeof MODES;

/** Default harmony: a third and a fifth above (two and four degrees up). */
export const DEFAULT_HARMONY_DEGREES: readonly number[] = [2, 4];

export const ScaleModeSchema = z.object({
  /** Pitch class of the tonic, 0 = C ... 11 = B. */
  tonic: z.number().int().min(0).max(11),
  intervals: z.array(z.number().int().positive()),
  /** Scale-degree offsets above the melody note. */
  degrees: z.array(z.number().int().positive()).optional(),
});

export type ScaleMode = z.infer<typeof ScaleModeSchema>;

/** Build a descriptor from a named mode. */
export function scaleMode(tonic: number, name: ModeName, degrees?: readonly number[]): ScaleMode {
  const mode: ScaleMode = { tonic, intervals: [...MODES[name]] };
  return degrees === undefined ? mode : { ...mode, degrees: [...degrees] };
}

/**
 * Validate a descriptor and return the offset of each degree from the
 * tonic (major → [0, 2, 4, 5, 7, 9, 11]). Empty intervals give [].
 */
export function degreeOffsets(mode: ScaleMode, operation: string): number[] {
  const parsed = ScaleModeSchema.safeParse(mode);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".") || "mode"}: ${i.message}`).join("; ");
    throw new TransformError("InvalidArgument", operation, `Invalid scale mode (${detail})`);
  }
  const { intervals } = parsed.data;
  if (intervals.length === 0) return [];

  const total = intervals.reduce((sum, step) => sum + step, 0);
  if (total !== 12) {
    throw new TransformError("InvalidArgument", operation, `Scale intervals must span 12 semitones, got ${total}`);
  }

  const offsets = [0];
  for (const step of intervals.slice(0, -1)) {
    offsets.push(offsets[offsets.length - 1] + step);
  }
  return offsets;
}

/**
 * Pitch `degrees` scale steps above `note`. A note outside the scale is
 * measured from the highest scale tone below it, and keeps that chromatic
 * offset in the result. May leave 0..127; callers clamp.
 */
export function degreeAbove(note: number, degrees: number, tonic: number, offsets: readonly number[]): number {
  const relative = note - tonic;
  const octave = Math.floor(relative / 12);
  const pitchClass = relative - octave * 12;

  let degree = 0;
  offsets.forEach((offset, d) => {
    if (offset <= pitchClass) degree = d;
  });
  const chromatic = pitchClass - offsets[degree];

  const target = degree + degrees;
  const targetOctave = Math.floor(target / offsets.length);
  const targetDegree = target - targetOctave * offsets.length;

  return tonic + (octave + targetOctave) * 12 + offsets[targetDegree] + chromatic;
}
