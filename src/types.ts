// ─── midi-notation: Core Types ───────────────────────────────────────────────
//
// The notation model produced by the transcription pipeline. Every value is
// built once per track and frozen; re-parsing yields a fresh tree.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Durations ───────────────────────────────────────────────────────────────

/** Base note values, longest first. */
export const NOTE_DURATIONS = [
  "whole",
  "half",
  "quarter",
  "eighth",
  "sixteenth",
  "thirty-second",
  "sixty-fourth",
] as const;

export type BaseDuration = (typeof NOTE_DURATIONS)[number];

/** `unrepresentable` only ever triggers tied decomposition; it is never emitted. */
export type NoteDuration = BaseDuration | "unrepresentable";

export const DURATION_MODIFIERS = ["none", "dotted", "double-dotted"] as const;

export type DurationModifier = (typeof DURATION_MODIFIERS)[number];

export interface DurationType {
  readonly base: NoteDuration;
  readonly modifier: DurationModifier;
}

/** A duration known to have a name. */
export interface CanonicalDuration extends DurationType {
  readonly base: BaseDuration;
}

// ─── Time ────────────────────────────────────────────────────────────────────

export interface TimeSignature {
  /** Numerator: beats in a measure. */
  readonly beatsPerMeasure: number;
  /** Denominator exponent as stored in the file (2 = quarter-note beat). */
  readonly beatType: number;
  /** Denominator as written (2 ** beatType). */
  readonly denominator: number;
  /** Cumulative tick at which the signature takes effect. */
  readonly tick: number;
}

// ─── Intervals ───────────────────────────────────────────────────────────────

/** Pitch value marking a synthesised rest. */
export const REST = 255;

/** A sounding (or silent) span extracted from a track, in ticks. */
export interface RawInterval {
  /** MIDI note number 0-127, or REST. */
  pitch: number;
  /** Absolute onset in ticks. */
  onset: number;
  /** Length in ticks, always > 0. */
  length: number;
  /** 0 for rests. */
  velocity: number;
  /** MIDI channel the note sounded on (-1 for rests). */
  channel: number;
}

// ─── Notation Nodes ──────────────────────────────────────────────────────────

export interface NoteNode {
  readonly kind: "note";
  readonly pitch: number;
  readonly duration: CanonicalDuration;
  readonly velocity: number;
}

export interface RestNode {
  readonly kind: "rest";
  readonly duration: CanonicalDuration;
  readonly velocity: 0;
}

export interface ChordNode {
  readonly kind: "chord";
  readonly children: readonly NotationNode[];
}

export interface TiedNode {
  readonly kind: "tied";
  readonly children: readonly NotationNode[];
}

export interface TripletNode {
  readonly kind: "triplet";
  readonly children: readonly NotationNode[];
}

export type LeafNode = NoteNode | RestNode;
export type GroupNode = ChordNode | TiedNode | TripletNode;
export type NotationNode = LeafNode | GroupNode;

// ─── Piece ───────────────────────────────────────────────────────────────────

export interface Track {
  readonly name: string;
  readonly notes: readonly NotationNode[];
}

export interface Piece {
  /** Initial tempo, 0 when the file has no tempo event. */
  readonly tempoBpm: number;
  readonly timeSignatures: readonly TimeSignature[];
  readonly ticksPerBeat: number;
  readonly tracks: readonly Track[];
}
