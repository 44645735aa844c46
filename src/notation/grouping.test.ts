import { describe, it, expect } from "vitest";
import {
  groupIntervals,
  groupChords,
  classifyLength,
  isTripletCandidate,
  type GroupingContext,
} from "./grouping.js";
import { gridSlot, type QuantizedInterval } from "./quantize.js";
import { REST, type BaseDuration, type DurationModifier, type NoteNode } from "../types.js";

const CTX: GroupingContext = { precisionBeats: 0.125, beatType: 2, triplets: false };
const TRIPLET_CTX: GroupingContext = { ...CTX, triplets: true };

function iv(
  pitch: number,
  onsetBeats: number,
  beats: number,
  endBeats = onsetBeats + beats,
): QuantizedInterval {
  return {
    pitch,
    velocity: pitch === REST ? 0 : 64,
    onsetBeats,
    slot: gridSlot(onsetBeats, CTX.precisionBeats),
    beats,
    endBeats,
  };
}

function note(
  pitch: number,
  base: BaseDuration,
  modifier: DurationModifier = "none",
  velocity = 64,
): NoteNode {
  return { kind: "note", pitch, duration: { base, modifier }, velocity };
}

describe("classifyLength", () => {
  it("returns a leaf for a canonical length", () => {
    expect(classifyLength(60, 64, 1.0, CTX)).toEqual(note(60, "quarter"));
  });

  it("returns a rest leaf for the rest sentinel", () => {
    expect(classifyLength(REST, 0, 0.75, CTX)).toEqual({
      kind: "rest",
      duration: { base: "eighth", modifier: "dotted" },
      velocity: 0,
    });
  });

  it("returns a tied group for a non-canonical length", () => {
    const node = classifyLength(60, 64, 1.25, CTX);
    expect(node.kind).toBe("tied");
  });
});

describe("groupChords", () => {
  it("collapses two pitches sharing an onset into one chord, in input order", () => {
    const [grouped] = groupChords([iv(64, 0, 1), iv(60, 0, 1)], CTX);
    expect(grouped.position).toBe(0);
    expect(grouped.node).toEqual({
      kind: "chord",
      children: [note(64, "quarter"), note(60, "quarter")],
    });
  });

  it("keeps a single note bare", () => {
    const grouped = groupChords([iv(60, 0, 1)], CTX);
    expect(grouped.map(g => g.node)).toEqual([note(60, "quarter")]);
  });

  it("keeps one child per distinct pitch", () => {
    const grouped = groupChords([iv(60, 0, 0.5), iv(60, 0.05, 0.125)], CTX);
    expect(grouped.map(g => g.node)).toEqual([note(60, "eighth")]);
  });

  it("places a rest starting in a note's cell after the note", () => {
    const grouped = groupChords([iv(60, 0, 0.125, 0.0625), iv(REST, 0.0625, 0.875, 1)], CTX);
    expect(grouped).toEqual([
      { position: 0, node: note(60, "thirty-second") },
      {
        position: 0.125,
        node: { kind: "rest", duration: { base: "eighth", modifier: "double-dotted" }, velocity: 0 },
      },
    ]);
  });

  it("absorbs less than one grid unit of silence after a note", () => {
    const grouped = groupChords([iv(60, 0, 0.125, 0.0625), iv(REST, 0.0625, 0.125, 0.125)], CTX);
    expect(grouped.map(g => g.node)).toEqual([note(60, "thirty-second")]);
  });

  it("separates onsets in different grid cells", () => {
    const grouped = groupChords([iv(60, 0, 1), iv(62, 1, 0.5)], CTX);
    expect(grouped.map(g => g.position)).toEqual([0, 1]);
  });
});

describe("isTripletCandidate", () => {
  it("accepts three evenly spaced onsets", () => {
    expect(isTripletCandidate([0, 8, 16], 24)).toBe(true);
  });

  it("counts distinct subdivisions only", () => {
    expect(isTripletCandidate([0, 8, 8, 16], 24)).toBe(true);
  });

  it("tolerates gaps within two subdivisions of each other", () => {
    expect(isTripletCandidate([0, 9, 16], 24)).toBe(true);
  });

  it("rejects four onsets", () => {
    expect(isTripletCandidate([0, 6, 12, 18], 24)).toBe(false);
  });

  it("rejects straight sixteenths", () => {
    expect(isTripletCandidate([0, 6, 12], 24)).toBe(false);
  });

  it("rejects an eighth followed by two sixteenths", () => {
    expect(isTripletCandidate([0, 12, 18], 24)).toBe(false);
  });
});

describe("groupIntervals", () => {
  const tripletBeat = [
    iv(60, 0, 0.25),
    iv(62, 1 / 3, 0.25),
    iv(64, 2 / 3, 0.25),
    iv(65, 1, 1),
  ];

  it("orders plain notes by onset", () => {
    const nodes = groupIntervals([iv(60, 0, 1), iv(62, 1, 0.5), iv(64, 1.5, 0.5)], CTX);
    expect(nodes).toEqual([note(60, "quarter"), note(62, "eighth"), note(64, "eighth")]);
  });

  it("renders three onsets in one beat as a triplet of eighths", () => {
    const nodes = groupIntervals(tripletBeat, TRIPLET_CTX);
    expect(nodes).toEqual([
      {
        kind: "triplet",
        children: [note(60, "eighth"), note(62, "eighth"), note(64, "eighth")],
      },
      note(65, "quarter"),
    ]);
  });

  it("leaves the same beat to the grid when the scan is off", () => {
    const nodes = groupIntervals(tripletBeat, CTX);
    expect(nodes).toEqual([
      note(60, "sixteenth"),
      note(62, "sixteenth"),
      note(64, "sixteenth"),
      note(65, "quarter"),
    ]);
  });

  it("does not relabel straight sixteenths", () => {
    const nodes = groupIntervals(
      [iv(60, 0, 0.25), iv(62, 0.25, 0.25), iv(64, 0.5, 0.5)],
      TRIPLET_CTX,
    );
    expect(nodes).toEqual([note(60, "sixteenth"), note(62, "sixteenth"), note(64, "eighth")]);
  });

  it("writes simultaneous triplet onsets as a chord", () => {
    const nodes = groupIntervals(
      [iv(60, 0, 0.25), iv(67, 0, 0.25), iv(62, 1 / 3, 0.25), iv(64, 2 / 3, 0.25)],
      TRIPLET_CTX,
    );
    expect(nodes).toEqual([
      {
        kind: "triplet",
        children: [
          { kind: "chord", children: [note(60, "eighth"), note(67, "eighth")] },
          note(62, "eighth"),
          note(64, "eighth"),
        ],
      },
    ]);
  });

  it("recognises detached triplets separated by rests", () => {
    const nodes = groupIntervals([
      iv(60, 0, 0.25),
      iv(REST, 0.25, 0.125, 1 / 3),
      iv(62, 1 / 3, 0.25),
      iv(REST, 7 / 12, 0.125, 2 / 3),
      iv(64, 2 / 3, 0.25),
      iv(REST, 11 / 12, 0.125, 1),
      iv(65, 1, 1),
    ], TRIPLET_CTX);
    expect(nodes).toEqual([
      {
        kind: "triplet",
        children: [note(60, "eighth"), note(62, "eighth"), note(64, "eighth")],
      },
      note(65, "quarter"),
    ]);
  });

  it("writes silence running past a triplet beat as a rest after it", () => {
    const nodes = groupIntervals([
      iv(60, 0, 0.25),
      iv(62, 1 / 3, 0.25),
      iv(64, 2 / 3, 0.25),
      iv(REST, 11 / 12, 1, 2),
      iv(65, 2, 1),
    ], TRIPLET_CTX);
    expect(nodes).toEqual([
      {
        kind: "triplet",
        children: [note(60, "eighth"), note(62, "eighth"), note(64, "eighth")],
      },
      { kind: "rest", duration: { base: "quarter", modifier: "none" }, velocity: 0 },
      note(65, "quarter"),
    ]);
  });

  it("places a triplet on a later beat after the notes before it", () => {
    const nodes = groupIntervals(
      [iv(59, 0, 1), iv(60, 1, 0.25), iv(62, 4 / 3, 0.25), iv(64, 5 / 3, 0.25)],
      TRIPLET_CTX,
    );
    expect(nodes.map(n => n.kind)).toEqual(["note", "triplet"]);
  });
});
