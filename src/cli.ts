#!/usr/bin/env node
// ─── midi-notation: CLI Entry Point ──────────────────────────────────────────
//
// Usage:
//   midi-notation <file.mid>                       # Print notation
//   midi-notation <file.mid> --precision eighth    # Coarser grid
//   midi-notation <file.mid> --triplets            # Scan for triplets
//   midi-notation <file.mid> --json                # Emit the Piece as JSON
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { transcribeFile } from "./transcribe.js";
import { formatPiece } from "./notation/format.js";
import { parsePrecision } from "./config/schema.js";
import { NOTE_DURATIONS } from "./types.js";
import { NotationError } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Get the value following a flag, if present. */
function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function cmdHelp(): void {
  console.log(`
midi-notation — Transcribe MIDI files into note durations, chords, ties and triplets

Usage:
  midi-notation <file.mid> [options]

Options:
  --precision <name>         Finest duration resolved (default: thirty-second)
                             ${NOTE_DURATIONS.join(", ")}
                             optionally prefixed with dotted- or double-dotted-
  --triplets                 Scan each beat for triplets (slower)
  --json                     Print the notation tree as JSON
  --help                     Show this help
`);
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const target = args[0];

  if (!target || hasFlag(args, "--help") || hasFlag(args, "-h")) {
    cmdHelp();
    return;
  }

  if (!existsSync(target)) {
    console.error(`File not found: "${target}"`);
    process.exit(1);
  }

  const precisionArg = getFlag(args, "--precision");
  const piece = await transcribeFile(target, {
    precision: precisionArg ? parsePrecision(precisionArg) : undefined,
    triplets: hasFlag(args, "--triplets"),
  });

  if (hasFlag(args, "--json")) {
    console.log(JSON.stringify(piece, null, 2));
  } else {
    console.log(formatPiece(piece));
  }
}

main().catch((err) => {
  if (err instanceof NotationError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
