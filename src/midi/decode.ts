// ─── MIDI Decoder Adapter ────────────────────────────────────────────────────
//
// Byte-level parsing is midi-file's job. This module maps its MidiData onto
// the DecodedMidi boundary the transcription core reads.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData, type MidiEvent } from "midi-file";
import type { DecodedMidi, MidiTiming, TrackEvent } from "./types.js";

/**
 * Decode a standard MIDI file from raw bytes.
 */
export function decodeMidi(bytes: Uint8Array): DecodedMidi {
  return fromMidiData(parseMidi(bytes));
}

/** Convert an already-parsed midi-file structure. */
export function fromMidiData(midi: MidiData): DecodedMidi {
  return {
    format: midi.header.format,
    timing: toTiming(midi),
    tracks: midi.tracks.map(track => track.map(toTrackEvent)),
  };
}

function toTiming(midi: MidiData): MidiTiming {
  const { ticksPerBeat, framesPerSecond, ticksPerFrame } = midi.header;
  if (ticksPerBeat !== undefined) {
    return { kind: "metrical", ticksPerBeat };
  }
  return {
    kind: "timecode",
    framesPerSecond: framesPerSecond ?? 0,
    ticksPerFrame: ticksPerFrame ?? 0,
  };
}

function toTrackEvent(event: MidiEvent): TrackEvent {
  const { deltaTime } = event;
  switch (event.type) {
    case "noteOn":
    case "noteOff":
      return {
        type: event.type,
        deltaTime,
        channel: event.channel,
        noteNumber: event.noteNumber,
        velocity: event.velocity,
      };
    case "setTempo":
      return { type: "setTempo", deltaTime, microsecondsPerBeat: event.microsecondsPerBeat };
    case "timeSignature":
      return {
        type: "timeSignature",
        deltaTime,
        numerator: event.numerator,
        denominator: event.denominator,
      };
    case "trackName":
    case "instrumentName":
      return { type: event.type, deltaTime, text: event.text };
    default:
      return { type: "other", deltaTime };
  }
}
