// ─── Transcription Options ───────────────────────────────────────────────────
//
// The configuration surface: a quantization precision and the triplet scan
// flag. Validated with zod; precision names such as "dotted-eighth" are
// accepted wherever options come from text (CLI flags, MCP tool calls).
// An omitted precision is resolved per track against its beat type.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import {
  NOTE_DURATIONS,
  DURATION_MODIFIERS,
  type BaseDuration,
  type CanonicalDuration,
} from "../types.js";
import { ConfigurationError } from "../errors.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const DurationTypeSchema = z.object({
  base: z.enum(NOTE_DURATIONS),
  modifier: z.enum(DURATION_MODIFIERS).default("none"),
});

export const TranscriptionOptionsSchema = z.object({
  /** Omitted: the default precision, or the finest one usable at the beat type. */
  precision: DurationTypeSchema.optional(),
  triplets: z.boolean().default(false),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type TranscriptionOptions = z.infer<typeof TranscriptionOptionsSchema>;
export type TranscriptionOptionsInput = z.input<typeof TranscriptionOptionsSchema>;

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Fill defaults and validate. Throws ConfigurationError listing every issue.
 */
export function resolveOptions(input: unknown = {}): TranscriptionOptions {
  const result = TranscriptionOptionsSchema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues
    .map(i => `${i.path.join(".") || "root"}: ${i.message}`)
    .join("; ");
  throw new ConfigurationError(`Invalid transcription options: ${issues}`);
}

/**
 * Parse a precision name.
 *
 *   "eighth"                 → eighth, none
 *   "dotted-quarter"         → quarter, dotted
 *   "double-dotted-half"     → half, double-dotted
 */
export function parsePrecision(name: string): CanonicalDuration {
  const normalized = name.trim().toLowerCase();
  for (const modifier of ["double-dotted", "dotted"] as const) {
    const prefix = `${modifier}-`;
    if (normalized.startsWith(prefix)) {
      return { base: parseBase(normalized.slice(prefix.length), name), modifier };
    }
  }
  return { base: parseBase(normalized, name), modifier: "none" };
}

function parseBase(value: string, original: string): BaseDuration {
  const base = NOTE_DURATIONS.find(d => d === value);
  if (!base) {
    throw new ConfigurationError(
      `Unknown precision: "${original}". Available: ${NOTE_DURATIONS.join(", ")} (optionally prefixed with dotted- or double-dotted-)`,
    );
  }
  return base;
}
