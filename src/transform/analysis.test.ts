import { describe, it, expect } from "vitest";
import { getBpm, tempoToBpm, performanceLength, analyzeChords } from "./analysis.js";
import { noteOn, noteOff, setTempo } from "../midi/events.js";
import { ZERO, fixed } from "../midi/fixed.js";

describe("getBpm", () => {
  it("returns 0 without tempo events", () => {
    expect(getBpm([])).toBe(0);
    expect(getBpm([noteOn(0, 60, 100, 0)])).toBe(0);
  });

  it("returns the last tempo in sequence order", () => {
    expect(getBpm([setTempo(500_000, 0), setTempo(400_000, 960)])).toBe(400_000);
  });
});

describe("tempoToBpm", () => {
  it("converts microseconds per beat", () => {
    expect(tempoToBpm(500_000)).toBe(120);
    expect(tempoToBpm(400_000)).toBe(150);
  });

  it("maps 0 to 0", () => {
    expect(tempoToBpm(0)).toBe(0);
  });
});

describe("performanceLength", () => {
  it("is zero for empty and untimed performances", () => {
    expect(performanceLength([])).toEqual(ZERO);
    expect(performanceLength([setTempo(1)])).toEqual(ZERO);
  });

  it("takes the latest time regardless of order", () => {
    const p = [noteOn(0, 60, 100, 0), noteOff(0, 60, 0, 960), noteOn(0, 62, 100, 480)];
    expect(performanceLength(p)).toEqual(fixed(960));
  });
});

describe("analyzeChords", () => {
  const progression = [
    noteOn(0, 60, 100, 0),
    noteOn(0, 64, 100, 0),
    noteOn(1, 62, 100, 0),
    noteOn(0, 67, 100, 0),
    noteOn(0, 57, 100, 480),
    noteOn(0, 60, 100, 480),
    noteOn(0, 64, 100, 480),
    noteOn(0, 72, 0, 480),
  ];

  it("names each simultaneous group on a channel", () => {
    expect(analyzeChords(progression)).toEqual([
      { time: fixed(0), channel: 0, notes: [60, 64, 67], name: "C" },
      { time: fixed(480), channel: 0, notes: [57, 60, 64], name: "Am" },
    ]);
  });

  it("reports unrecognized groups with a null name", () => {
    const cluster = [noteOn(0, 60, 100, 0), noteOn(0, 61, 100, 0), noteOn(0, 62, 100, 0)];
    expect(analyzeChords(cluster)).toEqual([
      { time: fixed(0), channel: 0, notes: [60, 61, 62], name: null },
    ]);
  });
});
