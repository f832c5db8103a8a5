/**
 * Terminal command keys.
 *
 * One command per input line: a single key, optionally followed by an
 * argument (`l exports/recording_20260101_120000.json`).
 */

import type { EngineStatus } from "../engine/GloveEngine";

export type TerminalCommand =
  | { kind: "recalibrate" }
  | { kind: "toggleRecording" }
  | { kind: "togglePlayback" }
  | { kind: "exportSnapshot" }
  | { kind: "saveRecording" }
  | { kind: "loadRecording"; path: string }
  | { kind: "help" }
  | { kind: "quit" };

export type ParsedCommand =
  | { ok: true; command: TerminalCommand }
  | { ok: false; message: string };

export const COMMAND_HELP = [
  "Commands:",
  "  c         recalibrate (current pose becomes zero)",
  "  r         start / stop recording",
  "  p         start / stop looping playback of the last recording",
  "  e         export snapshot CSV of both hands",
  "  w         save the last recording (CSV + JSON)",
  "  l <path>  load a recording JSON for playback",
  "  ?         show this help",
  "  q         quit",
].join("\n");

const SIMPLE_COMMANDS: Record<string, TerminalCommand> = {
  c: { kind: "recalibrate" },
  r: { kind: "toggleRecording" },
  p: { kind: "togglePlayback" },
  e: { kind: "exportSnapshot" },
  w: { kind: "saveRecording" },
  "?": { kind: "help" },
  h: { kind: "help" },
  q: { kind: "quit" },
};

export function parseCommand(line: string): ParsedCommand | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const [key, ...rest] = trimmed.split(/\s+/);
  const normalized = key.toLowerCase();

  if (normalized === "l") {
    const path = rest.join(" ");
    if (!path) {
      return { ok: false, message: "Usage: l <path-to-recording.json>" };
    }
    return { ok: true, command: { kind: "loadRecording", path } };
  }

  const command = SIMPLE_COMMANDS[normalized];
  if (!command || rest.length > 0) {
    return { ok: false, message: `Unknown command "${trimmed}" (? for help)` };
  }
  return { ok: true, command };
}

/** `Packets: L=120 R=118 | REC 42 frames | PLAY 3/42` */
export function formatStatusLine(status: EngineStatus): string {
  const parts = [`Packets: L=${status.packets.left} R=${status.packets.right}`];

  if (status.listenerStats.decodeErrors > 0) {
    parts.push(`dropped ${status.listenerStats.decodeErrors}`);
  }
  if (status.recorder === "recording") {
    parts.push(
      `REC ${status.recordedFrames} frames ${(status.recordingElapsedMs / 1000).toFixed(1)}s`,
    );
  }
  if (status.playback === "playing" && status.playbackCursor) {
    parts.push(
      `PLAY frame ${status.playbackCursor.index} loop ${status.playbackCursor.loops}`,
    );
  }
  if (!status.calibrated) {
    parts.push("uncalibrated");
  }

  return parts.join(" | ");
}
