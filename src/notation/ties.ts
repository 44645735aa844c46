// ─── Tied-Note Decomposer ────────────────────────────────────────────────────
//
// Splits a length with no single canonical name into a descending run of
// canonical lengths, largest first, rendered as one tied group.
// ─────────────────────────────────────────────────────────────────────────────

import type { LeafNode, TiedNode } from "../types.js";
import { UnrepresentableDurationError } from "../errors.js";
import { POSSIBLE_NOTE_LENGTHS, beatTypeMap, isRepresentable } from "./duration.js";
import { buildLeaf } from "./nodes.js";

/**
 * Greedy decomposition of `beats` into canonical lengths.
 *
 * Each step takes the largest table length that fits in the remainder, is a
 * whole number of precision units and has a name at this beat type. The
 * precision unit is always a candidate, so a grid-aligned length finishes.
 */
export function decomposeBeats(
  beats: number,
  precisionBeats: number,
  beatType: number,
): number[] {
  const parts: number[] = [];
  let remaining = beats;

  while (remaining > 0) {
    const part = largestFitting(remaining, precisionBeats, beatType);
    if (part === undefined) {
      throw new UnrepresentableDurationError(
        `Cannot represent ${beats} beat(s) at beat type ${beatType}`,
      );
    }
    parts.push(part);
    remaining -= part;
  }

  return parts;
}

/** Render a length as a tied group of notes (or rests) of one pitch. */
export function buildTiedGroup(
  pitch: number,
  velocity: number,
  beats: number,
  precisionBeats: number,
  beatType: number,
): TiedNode {
  const children: LeafNode[] = decomposeBeats(beats, precisionBeats, beatType)
    .map(part => buildLeaf(pitch, beatTypeMap(part, beatType), velocity));
  return Object.freeze({ kind: "tied", children: Object.freeze(children) });
}

function largestFitting(
  remaining: number,
  precisionBeats: number,
  beatType: number,
): number | undefined {
  let best: number | undefined;
  for (const length of POSSIBLE_NOTE_LENGTHS) {
    if (length > remaining) break;
    if (length % precisionBeats !== 0) continue;
    if (!isRepresentable(beatTypeMap(length, beatType))) continue;
    best = length;
  }
  return best;
}
