// ─── midi-reshape: Chord Naming ──────────────────────────────────────────────
//
// Names a set of MIDI note numbers by matching its pitch classes against
// known chord patterns. Used by analyzeChords().
//
// Usage:
//   import { detectChord } from "./chord-detect.js";
//   detectChord([60, 64, 67]);  // → "C"
//   detectChord([55, 58, 62]);  // → "Gm"
//   detectChord([64, 67, 72]);  // → "C/E"
// ─────────────────────────────────────────────────────────────────────────────

export const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

/** Intervals from the root as semitones, plus the name suffix. */
interface ChordPattern {
  intervals: readonly number[];
  suffix: string;
}

/**
 * Seventh chords come first so that a full seventh is not reported as the
 * triad it contains; among equal sizes, the earlier entry wins.
 */
const PATTERNS: readonly ChordPattern[] = [
  { intervals: [0, 4, 7, 11], suffix: "maj7" },
  { intervals: [0, 3, 7, 10], suffix: "m7" },
  { intervals: [0, 4, 7, 10], suffix: "7" },
  { intervals: [0, 3, 6, 10], suffix: "m7b5" },
  { intervals: [0, 3, 6, 9],  suffix: "dim7" },
  { intervals: [0, 4, 8, 11], suffix: "maj7#5" },
  { intervals: [0, 3, 7, 11], suffix: "mMaj7" },

  { intervals: [0, 4, 7], suffix: "" },
  { intervals: [0, 3, 7], suffix: "m" },
  { intervals: [0, 3, 6], suffix: "dim" },
  { intervals: [0, 4, 8], suffix: "aug" },
  { intervals: [0, 5, 7], suffix: "sus4" },
  { intervals: [0, 2, 7], suffix: "sus2" },

  { intervals: [0, 7], suffix: "5" },
];

/**
 * Name the chord formed by the given notes, or null when fewer than two
 * pitch classes are present or nothing matches. The pitch set must equal
 * the pattern exactly; the bass note is tried as root first, and a
 * different bass is written as a slash chord.
 */
export function detectChord(midiNotes: readonly number[]): string | null {
  const pitchClasses = [...new Set(midiNotes.map(n => n % 12))];
  if (pitchClasses.length < 2) return null;

  const bassPc = Math.min(...midiNotes) % 12;
  const roots = [bassPc, ...pitchClasses.filter(pc => pc !== bassPc).sort((a, b) => a - b)];

  for (const pattern of PATTERNS) {
    if (pattern.intervals.length !== pitchClasses.length) continue;
    for (const root of roots) {
      const intervals = pitchClasses.map(pc => (pc - root + 12) % 12);
      if (!pattern.intervals.every(i => intervals.includes(i))) continue;
      const name = NOTE_NAMES[root] + pattern.suffix;
      return root === bassPc ? name : `${name}/${NOTE_NAMES[bassPc]}`;
    }
  }

  return null;
}

/** Compact note names for display, low to high: "C4 E4 G4". */
export function midiNotesToNames(midiNotes: readonly number[]): string {
  return [...midiNotes]
    .sort((a, b) => a - b)
    .map(midi => `${NOTE_NAMES[midi % 12]}${Math.floor(midi / 12) - 1}`)
    .join(" ");
}
