// ─── Beat Grid / Quantizer ───────────────────────────────────────────────────
//
// Snaps interval lengths and onsets to a grid whose unit is the configured
// precision duration, and buckets onsets into per-beat subdivisions for
// triplet detection.
// ─────────────────────────────────────────────────────────────────────────────

import { NOTE_DURATIONS, type DurationType, type RawInterval } from "../types.js";
import { ConfigurationError } from "../errors.js";
import {
  DEFAULT_PRECISION,
  POSSIBLE_NOTE_LENGTHS,
  beatTypeMap,
  duration,
  describeDuration,
  getBeatCount,
  isRepresentable,
} from "./duration.js";

/** Absorbs tick-to-beat rounding before flooring onto the grid. */
const GRID_EPSILON = 1e-9;

// ─── Types ───────────────────────────────────────────────────────────────────

/** An interval converted to beats and placed on the grid. */
export interface QuantizedInterval {
  pitch: number;
  velocity: number;
  /** Unquantized onset in beats. */
  onsetBeats: number;
  /** Grid cell holding the onset. */
  slot: number;
  /** Length snapped to a whole number of grid units. */
  beats: number;
  /** Unquantized end in beats. */
  endBeats: number;
}

/** Onsets of one beat, keyed by subdivision index within the beat. */
export interface BeatBucket {
  beat: number;
  entries: Array<{ subdivision: number; interval: QuantizedInterval }>;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Beat length of one precision unit. The unit must itself be a canonical
 * length at this beat type, so tied decomposition can always finish with it.
 */
export function getPrecisionBeats(precision: DurationType, beatType: number): number {
  const beats = usableBeats(precision, beatType);
  if (beats === undefined) {
    throw new ConfigurationError(
      `Precision "${describeDuration(precision)}" cannot be used with beat type ${beatType}`,
    );
  }
  return beats;
}

/**
 * Grid unit for a track. An explicit precision must be usable at the beat
 * type. Without one the default is used, or, where the default has no name
 * (x/1 time), the finest plain duration that does.
 */
export function resolvePrecisionBeats(
  precision: DurationType | undefined,
  beatType: number,
): number {
  if (precision) return getPrecisionBeats(precision, beatType);

  const finestFirst = [...NOTE_DURATIONS].reverse().map(base => duration(base));
  for (const candidate of [DEFAULT_PRECISION, ...finestFirst]) {
    const beats = usableBeats(candidate, beatType);
    if (beats !== undefined) return beats;
  }
  throw new ConfigurationError(`No precision can be used with beat type ${beatType}`);
}

/**
 * Snap a length to the grid: floor to a whole number of units, never
 * shorter than one unit. Idempotent on grid multiples.
 */
export function quantizeBeats(beats: number, precisionBeats: number): number {
  if (beats < precisionBeats) return precisionBeats;
  return Math.floor(beats / precisionBeats + GRID_EPSILON) * precisionBeats;
}

/** Whole grid units in a leftover span; 0 when less than one unit is left. */
export function floorToGrid(beats: number, precisionBeats: number): number {
  const units = Math.floor(beats / precisionBeats + GRID_EPSILON);
  return units > 0 ? units * precisionBeats : 0;
}

/** Index of the grid cell an onset falls in. */
export function gridSlot(onsetBeats: number, precisionBeats: number): number {
  return Math.floor(onsetBeats / precisionBeats + GRID_EPSILON);
}

/** Convert tick intervals to beats and place them on the grid. */
export function quantizeIntervals(
  intervals: readonly RawInterval[],
  ticksPerBeat: number,
  precisionBeats: number,
): QuantizedInterval[] {
  return intervals.map(interval => {
    const onsetBeats = interval.onset / ticksPerBeat;
    return {
      pitch: interval.pitch,
      velocity: interval.velocity,
      onsetBeats,
      slot: gridSlot(onsetBeats, precisionBeats),
      beats: quantizeBeats(interval.length / ticksPerBeat, precisionBeats),
      endBeats: (interval.onset + interval.length) / ticksPerBeat,
    };
  });
}

/**
 * Subdivisions per beat fine enough to tell three equal onsets from the
 * straight grid: three slots per grid unit in a beat.
 */
export function getTripletDivisions(precisionBeats: number): number {
  return 3 * Math.max(1, Math.ceil(1 / precisionBeats - GRID_EPSILON));
}

/**
 * Group onsets by beat, each rounded to the nearest subdivision. An onset
 * that rounds up to the next beat line belongs to that beat.
 */
export function bucketBySubdivision(
  intervals: readonly QuantizedInterval[],
  divisions: number,
): BeatBucket[] {
  const buckets = new Map<number, BeatBucket>();

  for (const interval of intervals) {
    const position = Math.round(interval.onsetBeats * divisions);
    const beat = Math.floor(position / divisions);
    const subdivision = position - beat * divisions;

    let bucket = buckets.get(beat);
    if (!bucket) {
      bucket = { beat, entries: [] };
      buckets.set(beat, bucket);
    }
    bucket.entries.push({ subdivision, interval });
  }

  return [...buckets.values()].sort((a, b) => a.beat - b.beat);
}

// ─── Internal ────────────────────────────────────────────────────────────────

function usableBeats(precision: DurationType, beatType: number): number | undefined {
  const beats = getBeatCount(precision, beatType);
  const usable = isRepresentable(precision)
    && beats > 0
    && POSSIBLE_NOTE_LENGTHS.includes(beats)
    && isRepresentable(beatTypeMap(beats, beatType));
  return usable ? beats : undefined;
}
