// ─── Decoded MIDI Types ──────────────────────────────────────────────────────
//
// The boundary between the byte decoder (midi-file) and the transcription
// core. Only the event kinds the core reads are modelled; everything else
// is carried as "other" so delta times still accumulate.
// ─────────────────────────────────────────────────────────────────────────────

/** Header timing: ticks per beat, or SMPTE frames (unsupported downstream). */
export type MidiTiming =
  | { kind: "metrical"; ticksPerBeat: number }
  | { kind: "timecode"; framesPerSecond: number; ticksPerFrame: number };

export interface NoteOnEvent {
  type: "noteOn";
  deltaTime: number;
  channel: number;
  noteNumber: number;
  velocity: number;
}

export interface NoteOffEvent {
  type: "noteOff";
  deltaTime: number;
  channel: number;
  noteNumber: number;
  velocity: number;
}

export interface SetTempoEvent {
  type: "setTempo";
  deltaTime: number;
  microsecondsPerBeat: number;
}

export interface TimeSignatureEvent {
  type: "timeSignature";
  deltaTime: number;
  numerator: number;
  /** Denominator as written, e.g. 4 for 3/4. */
  denominator: number;
}

export interface NameEvent {
  type: "trackName" | "instrumentName";
  deltaTime: number;
  text: string;
}

export interface OtherEvent {
  type: "other";
  deltaTime: number;
}

export type TrackEvent =
  | NoteOnEvent
  | NoteOffEvent
  | SetTempoEvent
  | TimeSignatureEvent
  | NameEvent
  | OtherEvent;

/** A decoded standard MIDI file. */
export interface DecodedMidi {
  format: number;
  timing: MidiTiming;
  tracks: TrackEvent[][];
}
