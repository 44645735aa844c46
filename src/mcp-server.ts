#!/usr/bin/env node
// ─── midi-notation: MCP Server ───────────────────────────────────────────────
//
// Exposes the transcriber as MCP tools so an LLM can read a MIDI file as
// notation instead of raw ticks.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   transcribe_midi    — transcribe a .mid file into notes, chords, ties, triplets
//   classify_duration  — name the duration of a beat count at a beat type
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { existsSync } from "node:fs";
import { transcribeFile } from "./transcribe.js";
import { formatPiece } from "./notation/format.js";
import { beatTypeMap, describeDuration, isRepresentable } from "./notation/duration.js";
import { parsePrecision } from "./config/schema.js";

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "midi-notation",
  version: "0.1.0",
});

// ─── Tool: transcribe_midi ──────────────────────────────────────────────────

server.tool(
  "transcribe_midi",
  "Transcribe a standard MIDI file into notation: named note durations, rests, chords, tied notes and (optionally) triplets.",
  {
    path: z.string().describe("Path to a .mid file"),
    precision: z.string().optional().describe("Finest duration resolved, e.g. 'sixteenth' or 'dotted-eighth' (default: thirty-second)"),
    triplets: z.boolean().optional().describe("Scan each beat for triplets"),
    format: z.enum(["text", "json"]).optional().describe("Output format (default: text)"),
  },
  async ({ path, precision, triplets, format }) => {
    if (!existsSync(path)) {
      return {
        content: [{ type: "text", text: `File not found: "${path}"` }],
        isError: true,
      };
    }

    try {
      const piece = await transcribeFile(path, {
        precision: precision ? parsePrecision(precision) : undefined,
        triplets: triplets ?? false,
      });
      const text = format === "json" ? JSON.stringify(piece, null, 2) : formatPiece(piece);
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return {
        content: [{
          type: "text",
          text: `Transcription failed: ${err instanceof Error ? err.message : String(err)}`,
        }],
        isError: true,
      };
    }
  }
);

// ─── Tool: classify_duration ────────────────────────────────────────────────

server.tool(
  "classify_duration",
  "Name the note value of a beat count, e.g. 0.75 beats in 4/4 is a dotted eighth note.",
  {
    beats: z.number().positive().describe("Length in beats"),
    beatType: z.number().int().min(0).max(6).optional()
      .describe("Time signature denominator exponent: 2 for x/4, 3 for x/8 (default: 2)"),
  },
  async ({ beats, beatType }) => {
    const duration = beatTypeMap(beats, beatType ?? 2);
    const text = isRepresentable(duration)
      ? describeDuration(duration)
      : `${beats} beat(s) has no single note value; it is written as tied notes.`;
    return { content: [{ type: "text", text }] };
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("midi-notation MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
