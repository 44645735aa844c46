// ─── MIDI → Notation Transcriber ─────────────────────────────────────────────
//
// Runs the pipeline for every track:
//   header → intervals → grid → durations / ties → chords & triplets
//
// Tracks are independent and processed in input order. Any failure aborts
// the whole parse.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import type { Piece, TimeSignature, Track } from "./types.js";
import type { DecodedMidi, TrackEvent } from "./midi/types.js";
import { decodeMidi } from "./midi/decode.js";
import { getTempoBpm, getTicksPerBeat, getTimeSignatures, getTrackName } from "./midi/header.js";
import { extractIntervals } from "./midi/intervals.js";
import { quantizeIntervals, resolvePrecisionBeats } from "./notation/quantize.js";
import { groupIntervals, type GroupingContext } from "./notation/grouping.js";
import {
  resolveOptions,
  type TranscriptionOptions,
  type TranscriptionOptionsInput,
} from "./config/schema.js";
import { MissingTimeSignatureError } from "./errors.js";

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Transcribe a decoded MIDI file into a notation Piece.
 */
export function transcribeMidi(
  midi: DecodedMidi,
  options: TranscriptionOptionsInput = {},
): Piece {
  const resolved = resolveOptions(options);
  const ticksPerBeat = getTicksPerBeat(midi.timing);
  const conductor = midi.tracks[0] ?? [];
  const timeSignatures = getTimeSignatures(conductor);

  const tracks = midi.tracks.map(events =>
    transcribeTrack(events, ticksPerBeat, timeSignatures, resolved));

  return Object.freeze({
    tempoBpm: getTempoBpm(conductor),
    timeSignatures: Object.freeze(timeSignatures.map(ts => Object.freeze(ts))),
    ticksPerBeat,
    tracks: Object.freeze(tracks),
  });
}

/** Decode raw .mid bytes and transcribe them. */
export function transcribeBuffer(
  bytes: Uint8Array,
  options: TranscriptionOptionsInput = {},
): Piece {
  return transcribeMidi(decodeMidi(bytes), options);
}

/** Read a .mid file and transcribe it. */
export async function transcribeFile(
  path: string,
  options: TranscriptionOptionsInput = {},
): Promise<Piece> {
  const bytes = await readFile(path);
  return transcribeBuffer(new Uint8Array(bytes), options);
}

/**
 * Build one track. Classification uses the first time signature's beat type
 * for the whole track; later signature changes are not applied.
 */
export function transcribeTrack(
  events: readonly TrackEvent[],
  ticksPerBeat: number,
  timeSignatures: readonly TimeSignature[],
  options: TranscriptionOptions,
): Track {
  const signature = timeSignatures[0];
  if (!signature) throw new MissingTimeSignatureError();

  const precisionBeats = resolvePrecisionBeats(options.precision, signature.beatType);
  const ctx: GroupingContext = {
    precisionBeats,
    beatType: signature.beatType,
    triplets: options.triplets,
  };

  const intervals = extractIntervals(events);
  const quantized = quantizeIntervals(intervals, ticksPerBeat, precisionBeats);
  const notes = groupIntervals(quantized, ctx);

  return Object.freeze({
    name: getTrackName(events),
    notes: Object.freeze(notes),
  });
}
