// ─── Grouping Engine ─────────────────────────────────────────────────────────
//
// Turns quantized intervals into notation nodes: onsets sharing a grid cell
// become chords, and (when enabled) beats holding three evenly spaced
// onsets become triplets. Silence that outlasts a cell or a triplet beat is
// written as a rest starting where the notes before it end.
// ─────────────────────────────────────────────────────────────────────────────

import { REST, type NotationNode } from "../types.js";
import { beatTypeMap, isRepresentable } from "./duration.js";
import { buildChord, buildLeaf, buildTriplet } from "./nodes.js";
import { buildTiedGroup } from "./ties.js";
import {
  bucketBySubdivision,
  floorToGrid,
  getTripletDivisions,
  type BeatBucket,
  type QuantizedInterval,
} from "./quantize.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface GroupingContext {
  /** Beat length of one grid unit. */
  precisionBeats: number;
  /** Beat type of the governing time signature. */
  beatType: number;
  /** Scan for triplets. */
  triplets: boolean;
}

export interface PositionedNode {
  /** Onset of the node in beats, used for ordering. */
  position: number;
  node: NotationNode;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Build the ordered notation sequence for one track's quantized intervals.
 * Input must be sorted by onset.
 */
export function groupIntervals(
  intervals: readonly QuantizedInterval[],
  ctx: GroupingContext,
): NotationNode[] {
  const positioned: PositionedNode[] = [];
  let ordinary = intervals;

  if (ctx.triplets) {
    const claimed = new Set<QuantizedInterval>();
    for (const triplet of findTriplets(intervals, ctx)) {
      positioned.push({ position: triplet.bucket.beat, node: triplet.node });
      for (const entry of triplet.bucket.entries) claimed.add(entry.interval);
      positioned.push(...trailingRests(
        triplet.bucket.entries.map(e => e.interval),
        triplet.bucket.beat + 1,
        ctx,
      ));
    }
    ordinary = intervals.filter(i => !claimed.has(i));
  }

  positioned.push(...groupChords(ordinary, ctx));

  return positioned
    .sort((a, b) => a.position - b.position)
    .map(p => p.node);
}

/**
 * A single canonical leaf when the length has a name, otherwise a tied group.
 */
export function classifyLength(
  pitch: number,
  velocity: number,
  beats: number,
  ctx: GroupingContext,
): NotationNode {
  const duration = beatTypeMap(beats, ctx.beatType);
  if (isRepresentable(duration)) {
    return buildLeaf(pitch, duration, velocity);
  }
  return buildTiedGroup(pitch, velocity, beats, ctx.precisionBeats, ctx.beatType);
}

/**
 * Collapse intervals that share a grid cell. One member stays bare; several
 * become a chord with one child per distinct pitch, in input order. A rest
 * starting in a cell with notes follows them, shortened by the time the
 * notes already take.
 */
export function groupChords(
  intervals: readonly QuantizedInterval[],
  ctx: GroupingContext,
): PositionedNode[] {
  const result: PositionedNode[] = [];
  let i = 0;

  while (i < intervals.length) {
    const slot = intervals[i].slot;
    const cell: QuantizedInterval[] = [];
    while (i < intervals.length && intervals[i].slot === slot) {
      cell.push(intervals[i]);
      i++;
    }

    const position = slot * ctx.precisionBeats;
    const sounding = distinctPitches(cell.filter(m => m.pitch !== REST));
    if (sounding.length === 0) {
      const [rest] = cell;
      result.push({ position, node: classifyLength(REST, 0, rest.beats, ctx) });
      continue;
    }

    const members = sounding.map(m => classifyLength(m.pitch, m.velocity, m.beats, ctx));
    result.push({ position, node: buildChord(members) });

    const covered = position + Math.max(...sounding.map(m => m.beats));
    result.push(...trailingRests(cell, covered, ctx));
  }

  return result;
}

/**
 * Triplet heuristic: exactly three distinct onsets in the beat, inter-onset
 * gaps within two subdivisions of each other, and the longest gap wider
 * than a quarter of the beat.
 */
export function isTripletCandidate(subdivisions: readonly number[], divisions: number): boolean {
  const onsets = [...new Set(subdivisions)].sort((a, b) => a - b);
  if (onsets.length !== 3) return false;

  const gaps = [onsets[1] - onsets[0], onsets[2] - onsets[1]];
  const longest = Math.max(...gaps);
  const shortest = Math.min(...gaps);
  return longest - shortest <= 2 && longest > divisions / 4;
}

// ─── Internal: Triplets ──────────────────────────────────────────────────────

function findTriplets(
  intervals: readonly QuantizedInterval[],
  ctx: GroupingContext,
): Array<{ bucket: BeatBucket; node: NotationNode }> {
  // Each triplet member is written with the duplet value of half a beat.
  const duplet = beatTypeMap(0.5, ctx.beatType);
  if (!isRepresentable(duplet)) return [];

  const divisions = getTripletDivisions(ctx.precisionBeats);
  const found: Array<{ bucket: BeatBucket; node: NotationNode }> = [];

  for (const bucket of bucketBySubdivision(intervals, divisions)) {
    const onsets = bucket.entries.filter(e => e.interval.pitch !== REST);
    if (!isTripletCandidate(onsets.map(e => e.subdivision), divisions)) continue;

    const bySubdivision = new Map<number, QuantizedInterval[]>();
    for (const { subdivision, interval } of onsets) {
      const cell = bySubdivision.get(subdivision) ?? [];
      cell.push(interval);
      bySubdivision.set(subdivision, cell);
    }

    const children = [...bySubdivision.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, cell]) =>
        buildChord(distinctPitches(cell).map(m => buildLeaf(m.pitch, duplet, m.velocity))));

    found.push({ bucket, node: buildTriplet(children) });
  }

  return found;
}

// ─── Internal: Cells ─────────────────────────────────────────────────────────

/** First interval of each pitch, in input order. */
function distinctPitches(cell: readonly QuantizedInterval[]): QuantizedInterval[] {
  const seen = new Set<number>();
  const members: QuantizedInterval[] = [];
  for (const interval of cell) {
    if (seen.has(interval.pitch)) continue;
    seen.add(interval.pitch);
    members.push(interval);
  }
  return members;
}

/**
 * Rests among `intervals` that run past `from`, re-placed at `from` with the
 * whole grid units left. Anything under one unit is absorbed.
 */
function trailingRests(
  intervals: readonly QuantizedInterval[],
  from: number,
  ctx: GroupingContext,
): PositionedNode[] {
  const rests: PositionedNode[] = [];
  for (const interval of intervals) {
    if (interval.pitch !== REST) continue;
    const beats = floorToGrid(interval.endBeats - from, ctx.precisionBeats);
    if (beats > 0) {
      rests.push({ position: from, node: classifyLength(REST, 0, beats, ctx) });
    }
  }
  return rests;
}
