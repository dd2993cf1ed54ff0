// ─── Analysis ───────────────────────────────────────────────────────────────
//
// Scalar and summary readings of a performance. Nothing here builds a new
// performance.
// ─────────────────────────────────────────────────────────────────────────────

import { maxOf, ZERO, type Fixed } from "../midi/fixed.js";
import type { Performance } from "../midi/types.js";
import { detectChord } from "../chord-detect.js";
import { groupOnsets } from "./sequence.js";

/**
 * Tempo (microseconds per beat) of the last set-tempo event in sequence
 * order, i.e. the tempo in effect once every change has applied.
 * Returns 0 when there is none.
 */
export function getBpm(performance: Performance): number {
  let tempo = 0;
  for (const event of performance) {
    if (event.type === "setTempo") tempo = event.tempo;
  }
  return tempo;
}

/** Microseconds per beat → beats per minute (rounded). 0 stays 0. */
export function tempoToBpm(microsecondsPerBeat: number): number {
  if (microsecondsPerBeat <= 0) return 0;
  return Math.round(60_000_000 / microsecondsPerBeat);
}

/** Latest time carried by any event; zero for an empty or untimed performance. */
export function performanceLength(performance: Performance): Fixed {
  const times: Fixed[] = [];
  for (const event of performance) {
    if (event.time !== undefined) times.push(event.time);
  }
  return maxOf(times) ?? ZERO;
}

/** A simultaneous-onset chord found in a performance. */
export interface ChordReading {
  time: Fixed;
  channel: number;
  /** Note numbers in sequence order. */
  notes: number[];
  /** Chord name such as "Cmaj7" or "Am/C"; null when unrecognized. */
  name: string | null;
}

/**
 * Find every group of two or more sounding note-ons sharing an onset time
 * and channel, and name it.
 */
export function analyzeChords(performance: Performance): ChordReading[] {
  return groupOnsets(performance)
    .filter(group => group.notes.length >= 2)
    .map(group => {
      const notes = group.notes.map(n => n.note);
      return { time: group.time, channel: group.channel, notes, name: detectChord(notes) };
    });
}
