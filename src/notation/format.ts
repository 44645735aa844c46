// ─── Notation Formatter ──────────────────────────────────────────────────────
//
// Renders a Piece as plain text. Tied groups, chords and triplets are each
// wrapped in their own banner:
//
//   ====Tied Notes====    ++++++Chord+++++++    -----Triplet------
//   ...                   ...                   ...
//   ==================    ++++++++++++++++++    ------------------
// ─────────────────────────────────────────────────────────────────────────────

import type { GroupNode, NotationNode, Piece, Track } from "../types.js";
import { describeDuration } from "./duration.js";

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

const BANNERS: Record<GroupNode["kind"], { open: string; close: string }> = {
  tied: { open: "====Tied Notes====", close: "==================" },
  chord: { open: "++++++Chord+++++++", close: "++++++++++++++++++" },
  triplet: { open: "-----Triplet------", close: "------------------" },
};

type WorkItem = { node: NotationNode } | { line: string };

/**
 * Convert a MIDI note number to scientific pitch notation.
 * 60 → "C4", 69 → "A4", 48 → "C3"
 */
export function midiNoteToScientific(noteNumber: number): string {
  const octave = Math.floor(noteNumber / 12) - 1;
  return `${NOTE_NAMES[noteNumber % 12]}${octave}`;
}

/** One line for a leaf, e.g. "Note: C4 (60) | Duration: quarter note | Velocity: 64". */
export function formatLeaf(node: NotationNode): string {
  switch (node.kind) {
    case "note":
      return `Note: ${midiNoteToScientific(node.pitch)} (${node.pitch}) | ` +
        `Duration: ${describeDuration(node.duration)} | Velocity: ${node.velocity}`;
    case "rest":
      return `Rest | Duration: ${describeDuration(node.duration)}`;
    default:
      return BANNERS[node.kind].open;
  }
}

/**
 * Lines for a sequence of nodes. Walks the tree with an explicit stack so
 * nesting depth never touches the call stack.
 */
export function formatNodes(nodes: readonly NotationNode[]): string[] {
  const lines: string[] = [];
  const stack: WorkItem[] = [...nodes].reverse().map(node => ({ node }));

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;

    if ("line" in item) {
      lines.push(item.line);
      continue;
    }

    const { node } = item;
    if (node.kind === "note" || node.kind === "rest") {
      lines.push(formatLeaf(node));
      continue;
    }

    lines.push(BANNERS[node.kind].open);
    stack.push({ line: BANNERS[node.kind].close });
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i] });
    }
  }

  return lines;
}

export function formatTrack(track: Track): string[] {
  return [
    `=============== ${track.name} ===============`,
    ...formatNodes(track.notes),
  ];
}

/** Full text rendering of a piece. */
export function formatPiece(piece: Piece): string {
  const lines = [`BPM: ${piece.tempoBpm}`];
  for (const ts of piece.timeSignatures) {
    lines.push(`Time signature: ${ts.beatsPerMeasure}/${ts.denominator} @ tick ${ts.tick}`);
  }
  for (const track of piece.tracks) {
    lines.push(...formatTrack(track));
  }
  return lines.join("\n");
}
