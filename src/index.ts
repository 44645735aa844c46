// ─── midi-notation ───────────────────────────────────────────────────────────
//
// Turns MIDI note events into notation: notes, rests, chords, ties and
// triplets with named durations instead of tick counts.
//
// Usage:
//   import { transcribeFile, formatPiece } from "midi-notation";
//   const piece = await transcribeFile("song.mid", { triplets: true });
//   console.log(formatPiece(piece));
// ─────────────────────────────────────────────────────────────────────────────

// Pipeline
export {
  transcribeMidi,
  transcribeBuffer,
  transcribeFile,
  transcribeTrack,
} from "./transcribe.js";

// MIDI boundary
export { decodeMidi, fromMidiData } from "./midi/decode.js";
export { getTicksPerBeat, getTempoBpm, getTimeSignatures, getTrackName } from "./midi/header.js";
export { extractIntervals } from "./midi/intervals.js";

// Durations
export {
  beatTypeMap,
  getBeatCount,
  describeDuration,
  duration,
  isRepresentable,
  POSSIBLE_NOTE_LENGTHS,
  DEFAULT_PRECISION,
  UNREPRESENTABLE,
} from "./notation/duration.js";

// Grid, ties, grouping
export {
  getPrecisionBeats,
  resolvePrecisionBeats,
  quantizeBeats,
  floorToGrid,
  quantizeIntervals,
  gridSlot,
  getTripletDivisions,
  bucketBySubdivision,
} from "./notation/quantize.js";
export { decomposeBeats, buildTiedGroup } from "./notation/ties.js";
export {
  groupIntervals,
  groupChords,
  classifyLength,
  isTripletCandidate,
} from "./notation/grouping.js";

// Formatting
export {
  formatPiece,
  formatTrack,
  formatNodes,
  formatLeaf,
  midiNoteToScientific,
} from "./notation/format.js";

// Configuration
export {
  resolveOptions,
  parsePrecision,
  TranscriptionOptionsSchema,
  DurationTypeSchema,
} from "./config/schema.js";

// Errors
export {
  NotationError,
  UnsupportedTimingError,
  MissingTimeSignatureError,
  UnrepresentableDurationError,
  ConfigurationError,
} from "./errors.js";

// Types
export { NOTE_DURATIONS, DURATION_MODIFIERS, REST } from "./types.js";

export type {
  BaseDuration,
  NoteDuration,
  DurationModifier,
  DurationType,
  CanonicalDuration,
  TimeSignature,
  RawInterval,
  NoteNode,
  RestNode,
  ChordNode,
  TiedNode,
  TripletNode,
  LeafNode,
  GroupNode,
  NotationNode,
  Track,
  Piece,
} from "./types.js";

export type { DecodedMidi, MidiTiming, TrackEvent } from "./midi/types.js";
export type { QuantizedInterval, BeatBucket } from "./notation/quantize.js";
export type { GroupingContext } from "./notation/grouping.js";
export type { TranscriptionOptions, TranscriptionOptionsInput } from "./config/schema.js";
