import { describe, it, expect } from "vitest";
import { changeTempo, remapInstruments, setMessage } from "./global.js";
import { noteOn, noteOff, controlChange, setTempo } from "../midi/events.js";
import { TransformError } from "../errors.js";
import type { Performance } from "../midi/types.js";

describe("changeTempo", () => {
  const tempos: Performance = [
    setTempo(500_000, 0),
    noteOn(0, 60, 100, 0),
    setTempo(400_000),
  ];

  it("rewrites every tempo event in place", () => {
    expect(changeTempo(tempos, 600_000)).toEqual([
      setTempo(600_000, 0),
      noteOn(0, 60, 100, 0),
      setTempo(600_000),
    ]);
  });

  it("is idempotent", () => {
    const once = changeTempo(tempos, 600_000);
    expect(changeTempo(once, 600_000)).toEqual(once);
  });

  it("never inserts a tempo event", () => {
    const plain = [noteOn(0, 60, 100, 0)];
    expect(changeTempo(plain, 600_000)).toEqual(plain);
  });

  it("rejects tempos outside 24 bits", () => {
    expect(() => changeTempo(tempos, -1)).toThrow(TransformError);
    expect(() => changeTempo(tempos, 0x1000000)).toThrow("newTempo must be between 0 and 16777215");
    expect(() => changeTempo(tempos, 1.5)).toThrow("newTempo must be an integer");
  });
});

describe("remapInstruments", () => {
  const controls: Performance = [
    controlChange(0, 0, 7, 0),
    controlChange(0, 0, 0, 0),
    controlChange(0, 0, 47, 0),
    controlChange(1, 0, 7, 0),
    noteOn(0, 7, 100, 0),
  ];

  it("steps values on the channel to the next family member", () => {
    const result = remapInstruments(controls, 0);
    expect(result.slice(0, 3)).toEqual([
      controlChange(0, 0, 0, 0),
      controlChange(0, 0, 1, 0),
      controlChange(0, 0, 40, 0),
    ]);
  });

  it("leaves other channels and event types alone", () => {
    const result = remapInstruments(controls, 0);
    expect(result[3]).toEqual(controlChange(1, 0, 7, 0));
    expect(result[4]).toEqual(noteOn(0, 7, 100, 0));
  });

  it("rejects channels outside 0..15", () => {
    expect(() => remapInstruments(controls, 16)).toThrow("channel must be between 0 and 15");
  });
});

describe("setMessage", () => {
  const phrase: Performance = [
    noteOn(0, 60, 100, 0),
    noteOff(0, 60, 0, 480),
    setTempo(500_000),
  ];

  it("inserts a new event in time order", () => {
    expect(setMessage(phrase, controlChange(0, 7, 90, 240))).toEqual([
      noteOn(0, 60, 100, 0),
      controlChange(0, 7, 90, 240),
      noteOff(0, 60, 0, 480),
      setTempo(500_000),
    ]);
  });

  it("replaces the event in the same slot", () => {
    const result = setMessage(phrase, noteOn(0, 60, 80, 0));
    expect(result).toHaveLength(3);
    expect(result[0]).toEqual(noteOn(0, 60, 80, 0));
  });

  it("matches an untimed tempo only against untimed tempos", () => {
    expect(setMessage(phrase, setTempo(400_000))).toEqual([
      noteOn(0, 60, 100, 0),
      noteOff(0, 60, 0, 480),
      setTempo(400_000),
    ]);
    expect(setMessage(phrase, setTempo(400_000, 0))).toEqual([
      noteOn(0, 60, 100, 0),
      setTempo(400_000, 0),
      noteOff(0, 60, 0, 480),
      setTempo(500_000),
    ]);
  });

  it("sorts an out-of-order input", () => {
    const shuffled = [noteOff(0, 60, 0, 480), noteOn(0, 60, 100, 0)];
    expect(setMessage(shuffled, controlChange(0, 7, 90, 100))).toEqual([
      noteOn(0, 60, 100, 0),
      controlChange(0, 7, 90, 100),
      noteOff(0, 60, 0, 480),
    ]);
  });

  it("rejects an invalid message", () => {
    expect(() => setMessage(phrase, noteOn(0, 200, 100, 0))).toThrow("setMessage: Invalid message");
  });
});
