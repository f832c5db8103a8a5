import { HANDS, NUM_JOINTS } from "../hand/joints";
import type { Frame, JointSample, Recording } from "../hand/types";

export const DEFAULT_EXPORT_CHUNK_SIZE = 2000;

export interface BuildRecordingCsvInput {
  recording: Recording;
  includeOrientation?: boolean;
  chunkSize?: number;
  onProgress?: (progress: { processed: number; total: number }) => void;
}

const DECIMALS = 6;

function columnNames(includeOrientation: boolean): string[] {
  const axes = includeOrientation
    ? ["x", "y", "z", "qw", "qx", "qy", "qz"]
    : ["x", "y", "z"];
  const columns = ["frame", "timestamp_ms"];
  for (const hand of HANDS) {
    for (let i = 0; i < NUM_JOINTS; i++) {
      for (const axis of axes) columns.push(`${hand}_${i}_${axis}`);
    }
  }
  return columns;
}

function jointValues(sample: JointSample, includeOrientation: boolean): number[] {
  const { position: p, orientation: q } = sample;
  return includeOrientation
    ? [p.x, p.y, p.z, q.w, q.x, q.y, q.z]
    : [p.x, p.y, p.z];
}

function formatFrameLine(frame: Frame, includeOrientation: boolean): string {
  const cells = [String(frame.index), frame.timestamp.toFixed(3)];
  for (const hand of HANDS) {
    for (const sample of frame[hand]) {
      for (const v of jointValues(sample, includeOrientation)) {
        cells.push(v.toFixed(DECIMALS));
      }
    }
  }
  return cells.join(",");
}

/**
 * One row per frame, both hands, calibrated values. Returns null for an
 * empty recording.
 */
export function buildRecordingCsv({
  recording,
  includeOrientation = false,
  chunkSize = DEFAULT_EXPORT_CHUNK_SIZE,
  onProgress,
}: BuildRecordingCsvInput): string | null {
  const { frames } = recording;
  if (frames.length === 0) {
    return null;
  }

  const lines: string[] = [];
  lines.push("# Glove Recording Export");
  lines.push(`# Recording: ${recording.id}`);
  lines.push(`# Date: ${new Date(recording.startedAt).toISOString()}`);
  lines.push(`# Duration: ${(recording.durationMs / 1000).toFixed(2)}s`);
  lines.push(`# Sample Rate: ${recording.sampleRateHz} Hz`);
  lines.push(`# Frames: ${recording.frameCount}`);
  lines.push("#");
  lines.push(columnNames(includeOrientation).join(","));

  const total = frames.length;
  for (let index = 0; index < total; index += chunkSize) {
    const end = Math.min(index + chunkSize, total);
    for (let i = index; i < end; i += 1) {
      lines.push(formatFrameLine(frames[i], includeOrientation));
    }
    onProgress?.({ processed: end, total });
  }

  return lines.join("\n") + "\n";
}
