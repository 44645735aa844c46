// ─── Notation Node Builders ──────────────────────────────────────────────────

import {
  REST,
  type CanonicalDuration,
  type ChordNode,
  type DurationType,
  type LeafNode,
  type NotationNode,
  type TripletNode,
} from "../types.js";
import { UnrepresentableDurationError } from "../errors.js";

/** A rest for the REST sentinel pitch, a note otherwise. */
export function buildLeaf(pitch: number, duration: DurationType, velocity: number): LeafNode {
  const { base, modifier } = duration;
  if (base === "unrepresentable") {
    throw new UnrepresentableDurationError(`No canonical duration for pitch ${pitch}`);
  }
  const canonical: CanonicalDuration = Object.freeze({ base, modifier });
  if (pitch === REST) {
    return Object.freeze({ kind: "rest", duration: canonical, velocity: 0 });
  }
  return Object.freeze({ kind: "note", pitch, duration: canonical, velocity });
}

/** One member stays a bare node; several become a chord. */
export function buildChord(members: readonly NotationNode[]): NotationNode {
  if (members.length === 1) return members[0];
  const chord: ChordNode = { kind: "chord", children: Object.freeze([...members]) };
  return Object.freeze(chord);
}

export function buildTriplet(children: readonly NotationNode[]): TripletNode {
  return Object.freeze({ kind: "triplet", children: Object.freeze([...children]) });
}
