import { describe, it, expect } from "vitest";
import {
  transposeNotes,
  reverseNotes,
  quantizeNotes,
  extractNotes,
  changeNoteDuration,
} from "./notes.js";
import { getBpm } from "./analysis.js";
import { noteOn, noteOff, controlChange, setTempo } from "../midi/events.js";
import { fixed } from "../midi/fixed.js";
import type { MidiEvent, Performance } from "../midi/types.js";
import { isTransformError } from "../errors.js";

function notesOf(performance: readonly MidiEvent[]): number[] {
  return performance.flatMap(e => (e.type === "noteOn" || e.type === "noteOff" ? [e.note] : []));
}

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isTransformError(err)) return err.kind;
    throw err;
  }
  return undefined;
}

// ─── A single middle C with a tempo ──────────────────────────────────────────

const middleC: Performance = [
  noteOn(0, 60, 100, 0),
  setTempo(120),
  noteOff(0, 60, 64, 480),
];

describe("middle C walkthrough", () => {
  it("reads the tempo", () => {
    expect(getBpm(middleC)).toBe(120);
  });

  it("transposes an octave up", () => {
    expect(notesOf(transposeNotes(middleC, 12))).toEqual([72, 72]);
  });

  it("extracts nothing with a zero range", () => {
    expect(extractNotes(middleC, 0)).toEqual([]);
  });
});

// ─── transposeNotes ──────────────────────────────────────────────────────────

describe("transposeNotes", () => {
  it("leaves non-note events equal but not shared", () => {
    const result = transposeNotes(middleC, 5);
    expect(result[1]).toEqual(middleC[1]);
    expect(result[1]).not.toBe(middleC[1]);
  });

  it("does not mutate its input", () => {
    transposeNotes(middleC, 12);
    expect(notesOf(middleC)).toEqual([60, 60]);
  });

  it("clamps at both ends of the note range", () => {
    const edges = [noteOn(0, 120, 100, 0), noteOn(0, 5, 100, 0)];
    expect(notesOf(transposeNotes(edges, 12))).toEqual([127, 17]);
    expect(notesOf(transposeNotes(edges, -12))).toEqual([108, 0]);
  });

  it("composes by adding semitones", () => {
    expect(transposeNotes(transposeNotes(middleC, 5), 7)).toEqual(transposeNotes(middleC, 12));
  });

  it("rejects fractional semitones", () => {
    expect(kindOf(() => transposeNotes(middleC, 1.5))).toBe("InvalidArgument");
  });
});

// ─── reverseNotes ────────────────────────────────────────────────────────────

const twoNotes: Performance = [
  setTempo(500_000, 0),
  noteOn(0, 60, 100, 0),
  noteOff(0, 60, 0, 480),
  noteOn(0, 64, 100, 480),
  noteOff(0, 64, 0, 960),
];

describe("reverseNotes", () => {
  it("mirrors each note interval about the performance length", () => {
    const result = reverseNotes(twoNotes);
    expect(result.map(e => e.time)).toEqual([
      fixed(0),
      fixed(480),
      fixed(960),
      fixed(0),
      fixed(480),
    ]);
  });

  it("keeps non-note events in place by default", () => {
    expect(reverseNotes(twoNotes)[0]).toEqual(setTempo(500_000, 0));
  });

  it("mirrors non-note events on request", () => {
    const result = reverseNotes(twoNotes, { nonNoteEvents: "mirror" });
    expect(result[0]).toEqual(setTempo(500_000, 960));
  });

  it("leaves untimed events untimed when mirroring", () => {
    const result = reverseNotes([setTempo(1), ...twoNotes.slice(1)], { nonNoteEvents: "mirror" });
    expect("time" in result[0]).toBe(false);
  });

  it("reorders by time when asked", () => {
    const result = reverseNotes(twoNotes, { reorder: true });
    expect(result.map(e => e.type)).toEqual(["setTempo", "noteOn", "noteOn", "noteOff", "noteOff"]);
    expect(notesOf(result)).toEqual([64, 60, 64, 60]);
  });

  it("reflects unpaired notes alone", () => {
    const result = reverseNotes([noteOn(0, 60, 100, 100), controlChange(0, 7, 100, 300)]);
    expect(result[0].time).toEqual(fixed(200));
  });

  it("rejects an unknown policy", () => {
    const options = JSON.parse('{"nonNoteEvents":"drop"}');
    expect(kindOf(() => reverseNotes(twoNotes, options))).toBe("InvalidArgument");
  });
});

// ─── quantizeNotes ───────────────────────────────────────────────────────────

describe("quantizeNotes", () => {
  const loose: Performance = [
    noteOn(0, 60, 100, 50),
    controlChange(0, 64, 127, 50),
    noteOn(0, 62, 100, 60),
    noteOff(0, 60, 0, 170),
    noteOff(0, 62, 0, 250),
  ];

  it("snaps note times to the grid", () => {
    const result = quantizeNotes(loose, 120);
    expect(result.map(e => e.time)).toEqual([
      fixed(0),
      fixed(50),
      fixed(120),
      fixed(120),
      fixed(240),
    ]);
  });

  it("is idempotent", () => {
    const once = quantizeNotes(loose, 120);
    expect(quantizeNotes(once, 120)).toEqual(once);
  });

  it("rejects grids that are not positive integers", () => {
    expect(kindOf(() => quantizeNotes(loose, 0))).toBe("InvalidArgument");
    expect(kindOf(() => quantizeNotes(loose, -5))).toBe("InvalidArgument");
    expect(kindOf(() => quantizeNotes(loose, 1.5))).toBe("InvalidArgument");
  });
});

// ─── extractNotes ────────────────────────────────────────────────────────────

describe("extractNotes", () => {
  const spread: Performance = [
    controlChange(0, 7, 100, 0),
    noteOn(0, 59, 100, 0),
    noteOn(0, 60, 100, 0),
    noteOn(0, 61, 100, 0),
    noteOn(0, 70, 100, 0),
    noteOn(0, 71, 100, 0),
  ];

  it("keeps notes strictly inside the band", () => {
    expect(notesOf(extractNotes(spread, 11))).toEqual([59, 60, 61, 70]);
  });

  it("drops non-note events by default", () => {
    expect(extractNotes(spread, 11).some(e => e.type === "controlChange")).toBe(false);
  });

  it("keeps non-note events with keepContext", () => {
    expect(extractNotes(spread, 11, { keepContext: true })[0]).toEqual(controlChange(0, 7, 100, 0));
  });

  it("centers the band on another note", () => {
    expect(notesOf(extractNotes(spread, 2, { center: 70 }))).toEqual([70, 71]);
  });

  it("clamps the band to the note range, still excluding its ends", () => {
    const edges = [noteOn(0, 0, 100, 0), noteOn(0, 1, 100, 0), noteOn(0, 126, 100, 0), noteOn(0, 127, 100, 0)];
    expect(notesOf(extractNotes(edges, 100))).toEqual([1, 126]);
  });

  it("rejects a negative range", () => {
    expect(kindOf(() => extractNotes(spread, -1))).toBe("InvalidArgument");
  });
});

// ─── changeNoteDuration ──────────────────────────────────────────────────────

describe("changeNoteDuration", () => {
  it("scales every present time", () => {
    const result = changeNoteDuration(middleC, 2);
    expect(result[0].time).toEqual(fixed(0));
    expect(result[2].time).toEqual(fixed(960));
  });

  it("keeps absent times absent", () => {
    expect("time" in changeNoteDuration(middleC, 2)[1]).toBe(false);
  });

  it("is the identity for a factor of one", () => {
    expect(changeNoteDuration(middleC, 1)).toEqual(middleC);
  });

  it("produces fractional ticks", () => {
    const result = changeNoteDuration([noteOn(0, 60, 100, 3)], 0.5);
    expect(result[0].time).toEqual(fixed(1.5));
  });

  it("rejects negative and non-finite factors", () => {
    expect(kindOf(() => changeNoteDuration(middleC, -1))).toBe("InvalidArgument");
    expect(kindOf(() => changeNoteDuration(middleC, NaN))).toBe("InvalidArgument");
  });

  it("rejects negative factors too small to survive conversion", () => {
    expect(kindOf(() => changeNoteDuration(middleC, -1e-12))).toBe("InvalidArgument");
  });

  it("rejects a negative fixed-point factor", () => {
    expect(kindOf(() => changeNoteDuration(middleC, fixed(-0.5)))).toBe("InvalidArgument");
  });
});
