// ─── midi-notation: Errors ───────────────────────────────────────────────────
//
// Every failure aborts the whole parse. There is no partial output and
// nothing to retry: the pipeline is deterministic.
// ─────────────────────────────────────────────────────────────────────────────

export class NotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotationError";
  }
}

/** The MIDI header uses SMPTE (frame-based) timing instead of ticks per beat. */
export class UnsupportedTimingError extends NotationError {
  constructor(message = "Timing format not supported: only metrical (ticks per beat) timing is accepted") {
    super(message);
    this.name = "UnsupportedTimingError";
  }
}

/** Track 0 carries no time-signature meta-event, so there is no beat type. */
export class MissingTimeSignatureError extends NotationError {
  constructor() {
    super("No time signature found on track 0");
    this.name = "MissingTimeSignatureError";
  }
}

/** A length could not be decomposed into canonical durations. */
export class UnrepresentableDurationError extends NotationError {
  constructor(message: string) {
    super(message);
    this.name = "UnrepresentableDurationError";
  }
}

export class ConfigurationError extends NotationError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
