import { describe, it, expect } from "vitest";
import {
  instrumentName,
  instrumentFamily,
  nextInFamily,
  findProgram,
  loadInstrumentTable,
} from "./instruments.js";
import { isTransformError } from "./errors.js";

describe("instrument table", () => {
  it("loads 128 programs in 16 families", () => {
    const table = loadInstrumentTable();
    expect(table.programs).toHaveLength(128);
    expect(table.families).toHaveLength(16);
  });

  it("names programs", () => {
    expect(instrumentName(0)).toBe("Acoustic Grand Piano");
    expect(instrumentName(40)).toBe("Violin");
    expect(instrumentName(127)).toBe("Gunshot");
  });

  it("finds the enclosing family", () => {
    expect(instrumentFamily(42)).toEqual({ index: 5, name: "Strings", first: 40, last: 47 });
  });

  it("finds programs by name, ignoring case", () => {
    expect(findProgram("violin")).toBe(40);
    expect(() => findProgram("theremin")).toThrow("Unknown instrument");
  });
});

describe("nextInFamily", () => {
  it("steps to the next member", () => {
    expect(nextInFamily(3)).toBe(4);
  });

  it("wraps from the last member to the first", () => {
    expect(nextInFamily(7)).toBe(0);
    expect(nextInFamily(47)).toBe(40);
    expect(nextInFamily(127)).toBe(120);
  });

  it("rejects programs outside 0..127", () => {
    try {
      nextInFamily(128);
      expect.unreachable();
    } catch (err) {
      expect(isTransformError(err, "InvalidArgument")).toBe(true);
    }
  });
});
