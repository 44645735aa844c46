// ─── Header & Signature Reader ───────────────────────────────────────────────
//
// Derives ticks-per-beat from the header and tempo / time signatures from
// track 0's meta-events.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiTiming, TrackEvent } from "./types.js";
import type { TimeSignature } from "../types.js";
import { UnsupportedTimingError } from "../errors.js";

/**
 * Ticks per beat from the header. Only metrical timing is supported; SMPTE
 * timing aborts the parse.
 */
export function getTicksPerBeat(timing: MidiTiming): number {
  if (timing.kind !== "metrical") {
    throw new UnsupportedTimingError(
      `Timing format not supported: SMPTE ${timing.framesPerSecond} fps / ${timing.ticksPerFrame} ticks per frame`,
    );
  }
  if (timing.ticksPerBeat <= 0) {
    throw new UnsupportedTimingError(`Invalid ticks per beat: ${timing.ticksPerBeat}`);
  }
  return timing.ticksPerBeat;
}

/** Initial tempo in whole BPM (truncated), or 0 without a tempo event. */
export function getTempoBpm(track: readonly TrackEvent[]): number {
  for (const event of track) {
    if (event.type === "setTempo" && event.microsecondsPerBeat > 0) {
      return Math.trunc(60_000_000 / event.microsecondsPerBeat);
    }
  }
  return 0;
}

/** Every time signature on the track, with its cumulative tick. */
export function getTimeSignatures(track: readonly TrackEvent[]): TimeSignature[] {
  const signatures: TimeSignature[] = [];
  let tick = 0;
  for (const event of track) {
    tick += event.deltaTime;
    if (event.type === "timeSignature") {
      signatures.push({
        beatsPerMeasure: event.numerator,
        beatType: Math.round(Math.log2(event.denominator)),
        denominator: event.denominator,
        tick,
      });
    }
  }
  return signatures;
}

/** Instrument name, else track name, else "". */
export function getTrackName(track: readonly TrackEvent[]): string {
  let trackName: string | undefined;
  for (const event of track) {
    if (event.type === "instrumentName") return event.text;
    if (event.type === "trackName" && trackName === undefined) trackName = event.text;
  }
  return trackName ?? "";
}
