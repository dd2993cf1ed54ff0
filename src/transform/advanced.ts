// ─── Advanced Manipulation ──────────────────────────────────────────────────
//
// Harmony generation, chord arpeggiation and velocity curves.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import {
  TransformError,
  assertNever,
  clampToDomain,
} from "../errors.js";
import { add, compare, mulDiv, sub, toNumber, type Fixed } from "../midi/fixed.js";
import {
  DATA_MAX,
  NOTE_MAX,
  NOTE_MIN,
  type MidiEvent,
  type NoteEvent,
  type NoteOnEvent,
  type Performance,
} from "../midi/types.js";
import {
  DEFAULT_HARMONY_DEGREES,
  degreeAbove,
  degreeOffsets,
  type ScaleMode,
} from "./scales.js";
import { copyEvent, groupOnsets, noteAt, pairNotes } from "./sequence.js";

// ─── Harmony ────────────────────────────────────────────────────────────────

/**
 * Add harmony notes at scale-degree intervals above every note-on and
 * note-off. Each harmony event copies the original's channel, velocity and
 * time and follows it directly in the sequence, so on/off pairs stay
 * matched. Empty intervals or degrees return a plain copy.
 */
export function generateHarmony(performance: Performance, mode: ScaleMode): MidiEvent[] {
  const offsets = degreeOffsets(mode, "generateHarmony");
  const degrees = mode.degrees ?? DEFAULT_HARMONY_DEGREES;
  const result: MidiEvent[] = [];

  for (const event of performance) {
    switch (event.type) {
      case "noteOn":
      case "noteOff":
        result.push(copyEvent(event));
        if (offsets.length === 0) break;
        for (const degree of degrees) {
          const note = degreeAbove(event.note, degree, mode.tonic, offsets);
          result.push({ ...event, note: clampToDomain(note, NOTE_MIN, NOTE_MAX) });
        }
        break;
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "setTempo":
      case "timeSignature":
        result.push(copyEvent(event));
        break;
      default:
        assertNever(event, "generateHarmony");
    }
  }

  return result;
}

// ─── Arpeggiation ───────────────────────────────────────────────────────────

export const ARPEGGIO_PATTERNS = ["up", "down", "upDown", "downUp", "asPlayed"] as const;

/**
 * Step order for an arpeggiated chord:
 *   up, down        low to high, high to low
 *   upDown, downUp  there and back, without repeating the turning note
 *   asPlayed        sequence order of the original note-ons
 */
export type ArpeggioPattern = (typeof ARPEGGIO_PATTERNS)[number];

interface ChordMember {
  on: NoteOnEvent;
  release: NoteEvent;
}

interface Chord {
  onset: Fixed;
  end: Fixed;
  members: ChordMember[];
}

function stepOrder(members: ChordMember[], pattern: ArpeggioPattern): ChordMember[] {
  const up = [...members].sort((a, b) => a.on.note - b.on.note);
  const down = [...up].reverse();
  switch (pattern) {
    case "up":       return up;
    case "down":     return down;
    case "upDown":   return [...up, ...up.slice(1, -1).reverse()];
    case "downUp":   return [...down, ...down.slice(1, -1).reverse()];
    case "asPlayed": return [...members];
    default:         return assertNever(pattern, "arpeggiateChords");
  }
}

/**
 * Replace each chord (two or more paired note-ons with identical time and
 * channel) by consecutive on/off pairs in `pattern` order. The chord span
 * runs from the onset to its latest release and is split into equal steps.
 * The generated events take the sequence position of the chord's first
 * note-on; the chord's original note events are dropped.
 */
export function arpeggiateChords(performance: Performance, pattern: ArpeggioPattern): MidiEvent[] {
  if (!ARPEGGIO_PATTERNS.includes(pattern)) {
    throw new TransformError("InvalidArgument", "arpeggiateChords", `Unknown pattern: "${pattern}"`);
  }

  const { releaseOf } = pairNotes(performance);
  const groups = groupOnsets(performance, (_, index) => releaseOf.has(index))
    .filter(group => group.indices.length >= 2);

  const chordAt = new Map<number, Chord>();
  const consumed = new Set<number>();

  for (const group of groups) {
    const members: ChordMember[] = [];
    let end = group.time;
    group.indices.forEach((index, i) => {
      const releaseIndex = releaseOf.get(index);
      if (releaseIndex === undefined) return;
      const release = noteAt(performance, releaseIndex);
      members.push({ on: group.notes[i], release });
      if (compare(release.time, end) > 0) end = release.time;
      consumed.add(index);
      consumed.add(releaseIndex);
    });
    chordAt.set(group.indices[0], { onset: group.time, end, members });
  }

  const result: MidiEvent[] = [];
  performance.forEach((event, index) => {
    const chord = chordAt.get(index);
    if (chord) {
      result.push(...arpeggiate(chord, pattern));
    } else if (!consumed.has(index)) {
      result.push(copyEvent(event));
    }
  });
  return result;
}

function arpeggiate(chord: Chord, pattern: ArpeggioPattern): MidiEvent[] {
  const steps = stepOrder(chord.members, pattern);
  const span = sub(chord.end, chord.onset);
  const at = (step: number): Fixed => add(chord.onset, mulDiv(span, step, steps.length));

  return steps.flatMap(({ on, release }, i): MidiEvent[] => [
    { type: "noteOn", channel: on.channel, note: on.note, velocity: on.velocity, time: at(i) },
    { type: "noteOff", channel: on.channel, note: on.note, velocity: release.velocity, time: at(i + 1) },
  ]);
}

// ─── Dynamics ───────────────────────────────────────────────────────────────

/** What a velocity curve sees for each rewritten note-on. */
export interface DynamicsContext {
  /** Position in the performance. */
  index: number;
  /** Position among the rewritten note-ons (0-based). */
  noteIndex: number;
  time: Fixed;
  note: number;
  channel: number;
  /** Current velocity. */
  velocity: number;
}

export type VelocityMapper = (context: DynamicsContext) => number;

export const DynamicsEnvelopeSchema = z.object({
  points: z
    .array(z.object({
      /** Time in ticks. */
      time: z.number().finite(),
      velocity: z.number().min(0).max(DATA_MAX),
    }))
    .min(1, "envelope needs at least one point"),
});

/** Breakpoints interpolated linearly over time, held flat past either end. */
export type DynamicsEnvelope = z.infer<typeof DynamicsEnvelopeSchema>;

export type DynamicsCurve = VelocityMapper | DynamicsEnvelope;

function envelopeMapper(envelope: DynamicsEnvelope): VelocityMapper {
  const parsed = DynamicsEnvelopeSchema.safeParse(envelope);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".") || "curve"}: ${i.message}`).join("; ");
    throw new TransformError("InvalidArgument", "editDynamics", `Invalid envelope (${detail})`);
  }
  const points = [...parsed.data.points].sort((a, b) => a.time - b.time);
  const first = points[0];
  const last = points[points.length - 1];

  return ({ time }) => {
    const t = toNumber(time);
    if (t <= first.time) return first.velocity;
    if (t >= last.time) return last.velocity;
    for (let i = 1; i < points.length; i++) {
      const a = points[i - 1];
      const b = points[i];
      if (t < b.time) {
        return a.velocity + ((b.velocity - a.velocity) * (t - a.time)) / (b.time - a.time);
      }
    }
    return last.velocity;
  };
}

/**
 * Rewrite the velocity of every sounding note-on through `curve`, rounded
 * and clamped to 1..127 so that it stays sounding. Velocity-0 note-ons act
 * as releases and are left alone, as are note-off velocities and every
 * other event.
 */
export function editDynamics(performance: Performance, curve: DynamicsCurve): MidiEvent[] {
  const mapper = typeof curve === "function" ? curve : envelopeMapper(curve);
  let noteIndex = 0;

  return performance.map((event, index): MidiEvent => {
    switch (event.type) {
      case "noteOn": {
        if (event.velocity === 0) return copyEvent(event);
        const velocity = mapper({
          index,
          noteIndex: noteIndex++,
          time: event.time,
          note: event.note,
          channel: event.channel,
          velocity: event.velocity,
        });
        if (!Number.isFinite(velocity)) {
          throw new TransformError("InvalidArgument", "editDynamics", `Curve returned ${velocity} at index ${index}`);
        }
        return { ...event, velocity: clampToDomain(Math.round(velocity), 1, DATA_MAX) };
      }
      case "noteOff":
      case "controlChange":
      case "pitchWheel":
      case "afterTouch":
      case "polyTouch":
      case "setTempo":
      case "timeSignature":
        return copyEvent(event);
      default:
        return assertNever(event, "editDynamics");
    }
  });
}
