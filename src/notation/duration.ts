// ─── Duration Classifier ─────────────────────────────────────────────────────
//
// Maps beat counts onto canonical (base, modifier) durations and back.
// Beat values are measured against a quarter-note beat and shifted by the
// time signature's beat type: at beat type 3 (eighth-note beat) one beat is
// an eighth note, at beat type 1 (half-note beat) it is a half note.
//
// Lookups are exact: callers must keep beat arithmetic in binary fractions.
// ─────────────────────────────────────────────────────────────────────────────

import {
  NOTE_DURATIONS,
  type BaseDuration,
  type CanonicalDuration,
  type DurationModifier,
  type DurationType,
  type NoteDuration,
} from "../types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Beat type whose beat is a quarter note; the table is written against it. */
const REFERENCE_BEAT_TYPE = 2;

const MODIFIER_FACTORS: Record<DurationModifier, number> = {
  "none": 1.0,
  "dotted": 1.5,
  "double-dotted": 1.75,
};

const BASE_BEATS: Record<BaseDuration, number> = {
  "whole": 4.0,
  "half": 2.0,
  "quarter": 1.0,
  "eighth": 0.5,
  "sixteenth": 0.25,
  "thirty-second": 0.125,
  "sixty-fourth": 0.0625,
};

/** Canonical beat lengths (quarter-note beat) and the durations they name. */
const CANONICAL_TABLE: ReadonlyArray<readonly [number, BaseDuration, DurationModifier]> = [
  [7.0, "whole", "double-dotted"],
  [6.0, "whole", "dotted"],
  [4.0, "whole", "none"],
  [3.5, "half", "double-dotted"],
  [3.0, "half", "dotted"],
  [2.0, "half", "none"],
  [1.75, "quarter", "double-dotted"],
  [1.5, "quarter", "dotted"],
  [1.0, "quarter", "none"],
  [0.875, "eighth", "double-dotted"],
  [0.75, "eighth", "dotted"],
  [0.5, "eighth", "none"],
  [0.4375, "sixteenth", "double-dotted"],
  [0.375, "sixteenth", "dotted"],
  [0.25, "sixteenth", "none"],
  [0.21875, "thirty-second", "double-dotted"],
  [0.1875, "thirty-second", "dotted"],
  [0.125, "thirty-second", "none"],
  [0.109375, "sixty-fourth", "double-dotted"],
  [0.09375, "sixty-fourth", "dotted"],
  [0.0625, "sixty-fourth", "none"],
];

const CANONICAL_LOOKUP = new Map(
  CANONICAL_TABLE.map(([beats, base, modifier]) => [beats, { base, modifier }] as const),
);

/** Every canonical beat length, ascending. Used by tied decomposition. */
export const POSSIBLE_NOTE_LENGTHS: readonly number[] = CANONICAL_TABLE
  .map(([beats]) => beats)
  .sort((a, b) => a - b);

export const UNREPRESENTABLE: DurationType = Object.freeze({
  base: "unrepresentable",
  modifier: "none",
});

/** Default quantization precision: a plain thirty-second note. */
export const DEFAULT_PRECISION: CanonicalDuration = Object.freeze({
  base: "thirty-second",
  modifier: "none",
});

// ─── Public API ──────────────────────────────────────────────────────────────

export function duration(base: NoteDuration, modifier: DurationModifier = "none"): DurationType {
  return Object.freeze({ base, modifier });
}

export function isRepresentable(d: DurationType): boolean {
  return d.base !== "unrepresentable";
}

/**
 * Map a beat count onto a canonical duration.
 *
 * beatTypeMap(1.0, 2)  → quarter
 * beatTypeMap(0.75, 2) → dotted eighth
 * beatTypeMap(1.0, 3)  → eighth
 * beatTypeMap(1.0, 1)  → half
 */
export function beatTypeMap(beats: number, beatType: number): DurationType {
  const entry = CANONICAL_LOOKUP.get(beats);
  if (!entry) return UNREPRESENTABLE;

  const base = shift(entry.base, beatType - REFERENCE_BEAT_TYPE);
  if (base === "unrepresentable") return UNREPRESENTABLE;
  return duration(base, entry.modifier);
}

/**
 * Number of beats a duration lasts at the given beat type.
 * getBeatCount(dotted eighth, 3) → 1.5
 */
export function getBeatCount(d: DurationType, beatType: number): number {
  if (d.base === "unrepresentable") return 0;
  const scale = Math.pow(2, beatType - REFERENCE_BEAT_TYPE);
  return BASE_BEATS[d.base] * scale * MODIFIER_FACTORS[d.modifier];
}

/** Human-readable name: "dotted eighth note", "thirty-second note". */
export function describeDuration(d: DurationType): string {
  if (d.base === "unrepresentable") return "unknown note";
  const prefix = d.modifier === "none" ? "" : `${d.modifier} `;
  return `${prefix}${d.base} note`;
}

// ─── Internal ────────────────────────────────────────────────────────────────

/** Move `steps` positions toward shorter values (negative: longer). */
function shift(base: BaseDuration, steps: number): NoteDuration {
  const index = NOTE_DURATIONS.indexOf(base) + steps;
  if (index < 0 || index >= NOTE_DURATIONS.length) return "unrepresentable";
  return NOTE_DURATIONS[index];
}
