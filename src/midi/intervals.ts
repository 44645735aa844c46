// ─── Raw Interval Extractor ──────────────────────────────────────────────────
//
// Pairs note-on with note-off per channel and fills silent gaps with rests.
// Each channel holds at most one sounding note: a note-on arriving while the
// channel is busy is ignored.
// ─────────────────────────────────────────────────────────────────────────────

import type { TrackEvent } from "./types.js";
import { REST, type RawInterval } from "../types.js";

interface SoundingNote {
  pitch: number;
  velocity: number;
  onset: number;
  order: number;
}

interface ExtractState {
  tick: number;
  /** Offset of the latest closed note on any channel. */
  lastOffset: number;
  /** Monotonic counter fixing the order of intervals sharing an onset. */
  order: number;
  sounding: Map<number, SoundingNote>;
  emitted: Array<{ interval: RawInterval; order: number }>;
}

/**
 * Extract ordered intervals (ticks) from a track's events.
 *
 * A rest is emitted before a note-on when no channel is sounding and time
 * has passed since the last note-off. Notes left sounding when the track
 * ends are dropped.
 */
export function extractIntervals(events: readonly TrackEvent[]): RawInterval[] {
  const state: ExtractState = {
    tick: 0,
    lastOffset: 0,
    order: 0,
    sounding: new Map(),
    emitted: [],
  };

  for (const event of events) {
    state.tick += event.deltaTime;

    if (event.type === "noteOn" && event.velocity > 0) {
      noteOn(state, event.channel, event.noteNumber, event.velocity);
    } else if (event.type === "noteOff" || event.type === "noteOn") {
      noteOff(state, event.channel, event.noteNumber);
    }
  }

  return state.emitted
    .sort((a, b) => a.interval.onset - b.interval.onset || a.order - b.order)
    .map(e => e.interval);
}

function noteOn(state: ExtractState, channel: number, pitch: number, velocity: number): void {
  if (state.sounding.has(channel)) return;

  const gap = state.tick - state.lastOffset;
  if (state.sounding.size === 0 && gap > 0) {
    state.emitted.push({
      interval: { pitch: REST, onset: state.lastOffset, length: gap, velocity: 0, channel: -1 },
      order: state.order++,
    });
  }

  state.sounding.set(channel, { pitch, velocity, onset: state.tick, order: state.order++ });
}

function noteOff(state: ExtractState, channel: number, pitch: number): void {
  const current = state.sounding.get(channel);
  if (!current || current.pitch !== pitch) return;

  state.sounding.delete(channel);
  state.lastOffset = Math.max(state.lastOffset, state.tick);

  const length = state.tick - current.onset;
  if (length <= 0) return;

  state.emitted.push({
    interval: {
      pitch: current.pitch,
      onset: current.onset,
      length,
      velocity: current.velocity,
      channel,
    },
    order: current.order,
  });
}
