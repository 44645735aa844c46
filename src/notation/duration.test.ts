import { describe, it, expect } from "vitest";
import {
  beatTypeMap,
  getBeatCount,
  describeDuration,
  duration,
  isRepresentable,
  POSSIBLE_NOTE_LENGTHS,
  UNREPRESENTABLE,
} from "./duration.js";

describe("beatTypeMap", () => {
  it("1.0 beats at beat type 2 is a quarter note", () => {
    expect(beatTypeMap(1.0, 2)).toEqual({ base: "quarter", modifier: "none" });
  });

  it("0.75 beats at beat type 2 is a dotted eighth", () => {
    expect(beatTypeMap(0.75, 2)).toEqual({ base: "eighth", modifier: "dotted" });
  });

  it("1.0 beats at beat type 3 is an eighth note", () => {
    expect(beatTypeMap(1.0, 3)).toEqual({ base: "eighth", modifier: "none" });
  });

  it("1.0 beats at beat type 1 is a half note", () => {
    expect(beatTypeMap(1.0, 1)).toEqual({ base: "half", modifier: "none" });
  });

  it("2.0 beats at beat type 3 is a quarter note", () => {
    expect(beatTypeMap(2.0, 3)).toEqual({ base: "quarter", modifier: "none" });
  });

  it("7.0 beats is a double-dotted whole note", () => {
    expect(beatTypeMap(7.0, 2)).toEqual({ base: "whole", modifier: "double-dotted" });
  });

  it("0.0625 beats is a sixty-fourth note", () => {
    expect(beatTypeMap(0.0625, 2)).toEqual({ base: "sixty-fourth", modifier: "none" });
  });

  it("returns unrepresentable for lengths outside the table", () => {
    expect(beatTypeMap(1.25, 2)).toEqual(UNREPRESENTABLE);
    expect(beatTypeMap(0.3, 2).base).toBe("unrepresentable");
  });

  it("returns unrepresentable when the shift runs past a whole note", () => {
    expect(beatTypeMap(4.0, 1).base).toBe("unrepresentable");
  });

  it("returns unrepresentable when the shift runs past a sixty-fourth", () => {
    expect(beatTypeMap(0.0625, 3).base).toBe("unrepresentable");
  });
});

describe("getBeatCount", () => {
  it("quarter at beat type 2 = 1.0", () => {
    expect(getBeatCount(duration("quarter"), 2)).toBe(1.0);
  });

  it("quarter at beat type 3 = 2.0", () => {
    expect(getBeatCount(duration("quarter"), 3)).toBe(2.0);
  });

  it("dotted quarter at beat type 2 = 1.5", () => {
    expect(getBeatCount(duration("quarter", "dotted"), 2)).toBe(1.5);
  });

  it("dotted eighth at beat type 3 = 1.5", () => {
    expect(getBeatCount(duration("eighth", "dotted"), 3)).toBe(1.5);
  });

  it("eighth, sixteenth and thirty-second at beat type 2", () => {
    expect(getBeatCount(duration("eighth"), 2)).toBe(0.5);
    expect(getBeatCount(duration("sixteenth"), 2)).toBe(0.25);
    expect(getBeatCount(duration("thirty-second"), 2)).toBe(0.125);
  });

  it("double-dotted half at beat type 2 = 3.5", () => {
    expect(getBeatCount(duration("half", "double-dotted"), 2)).toBe(3.5);
  });

  it("unrepresentable counts as zero beats", () => {
    expect(getBeatCount(UNREPRESENTABLE, 2)).toBe(0);
  });

  it("inverts beatTypeMap for every canonical length", () => {
    for (const beatType of [1, 2, 3, 4]) {
      for (const beats of POSSIBLE_NOTE_LENGTHS) {
        const d = beatTypeMap(beats, beatType);
        if (!isRepresentable(d)) continue;
        expect(getBeatCount(d, beatType)).toBe(beats);
      }
    }
  });
});

describe("POSSIBLE_NOTE_LENGTHS", () => {
  it("holds 21 ascending lengths from a sixty-fourth to a double-dotted whole", () => {
    expect(POSSIBLE_NOTE_LENGTHS).toHaveLength(21);
    expect(POSSIBLE_NOTE_LENGTHS[0]).toBe(0.0625);
    expect(POSSIBLE_NOTE_LENGTHS[20]).toBe(7.0);
    expect([...POSSIBLE_NOTE_LENGTHS].sort((a, b) => a - b)).toEqual(POSSIBLE_NOTE_LENGTHS);
  });
});

describe("describeDuration", () => {
  it("names plain durations", () => {
    expect(describeDuration(duration("quarter"))).toBe("quarter note");
  });

  it("prefixes modifiers", () => {
    expect(describeDuration(duration("eighth", "dotted"))).toBe("dotted eighth note");
    expect(describeDuration(duration("thirty-second", "double-dotted")))
      .toBe("double-dotted thirty-second note");
  });

  it("names unrepresentable durations as unknown", () => {
    expect(describeDuration(UNREPRESENTABLE)).toBe("unknown note");
  });
});
