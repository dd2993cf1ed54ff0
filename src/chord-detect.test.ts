import { describe, it, expect } from "vitest";
import { detectChord, midiNotesToNames } from "./chord-detect.js";

describe("detectChord", () => {
  it("names major and minor triads", () => {
    expect(detectChord([60, 64, 67])).toBe("C");
    expect(detectChord([55, 58, 62])).toBe("Gm");
  });

  it("names seventh chords", () => {
    expect(detectChord([60, 64, 67, 71])).toBe("Cmaj7");
    expect(detectChord([55, 59, 62, 65])).toBe("G7");
  });

  it("writes inversions as slash chords", () => {
    expect(detectChord([64, 67, 72])).toBe("C/E");
    expect(detectChord([60, 64, 69])).toBe("Am/C");
  });

  it("names power chords", () => {
    expect(detectChord([60, 67])).toBe("C5");
  });

  it("returns null for single pitch classes and clusters", () => {
    expect(detectChord([60])).toBeNull();
    expect(detectChord([60, 72])).toBeNull();
    expect(detectChord([60, 61, 62])).toBeNull();
  });
});

describe("midiNotesToNames", () => {
  it("lists names low to high without touching the input", () => {
    const notes = [67, 60, 64];
    expect(midiNotesToNames(notes)).toBe("C4 E4 G4");
    expect(notes).toEqual([67, 60, 64]);
  });
});
