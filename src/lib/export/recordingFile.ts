/**
 * Recording persistence (JSON).
 *
 * Format version 1:
 *   { version, id, startedAt, sampleRateHz, frames: [{ index, timestamp,
 *     left: [[x,y,z,qw,qx,qy,qz] x26], right: [...] }] }
 *
 * frameCount and durationMs are derived on load, never trusted from the file.
 */

import { z } from "zod";
import { RecordingFormatError } from "../errors";
import { NUM_JOINTS, type Hand } from "../hand/joints";
import { sampleFromValues } from "../hand/jointSample";
import type { Frame, JointSample, Recording } from "../hand/types";

export const RECORDING_FILE_VERSION = 1;

const jointValuesSchema = z.array(z.number().finite()).length(7);
const handValuesSchema = z.array(jointValuesSchema).length(NUM_JOINTS);

const frameSchema = z.object({
  index: z.number().int().nonnegative(),
  timestamp: z.number().finite().nonnegative(),
  left: handValuesSchema,
  right: handValuesSchema,
});

export const recordingFileSchema = z
  .object({
    version: z.literal(RECORDING_FILE_VERSION),
    id: z.string().min(1),
    startedAt: z.number().finite(),
    sampleRateHz: z.number().positive().max(1000),
    frames: z.array(frameSchema),
  })
  .superRefine((file, ctx) => {
    for (let i = 1; i < file.frames.length; i++) {
      const prev = file.frames[i - 1];
      const frame = file.frames[i];
      if (frame.index <= prev.index) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["frames", i, "index"],
          message: "frame indices must be strictly increasing",
        });
      }
      if (frame.timestamp <= prev.timestamp) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["frames", i, "timestamp"],
          message: "timestamps must be strictly increasing",
        });
      }
    }
  });

export type RecordingFile = z.infer<typeof recordingFileSchema>;

function sampleValues(sample: JointSample): number[] {
  const { position: p, orientation: q } = sample;
  return [p.x, p.y, p.z, q.w, q.x, q.y, q.z];
}

export function toRecordingFile(recording: Recording): RecordingFile {
  return {
    version: RECORDING_FILE_VERSION,
    id: recording.id,
    startedAt: recording.startedAt,
    sampleRateHz: recording.sampleRateHz,
    frames: recording.frames.map((frame) => ({
      index: frame.index,
      timestamp: frame.timestamp,
      left: frame.left.map(sampleValues),
      right: frame.right.map(sampleValues),
    })),
  };
}

export function serializeRecording(recording: Recording): string {
  return JSON.stringify(toRecordingFile(recording));
}

function handSamples(hand: Hand, values: number[][]): JointSample[] {
  return values.map((joint, index) => sampleFromValues(hand, index, joint));
}

/**
 * Parse and validate a serialized Recording.
 * @throws RecordingFormatError when the text is not JSON or fails validation
 */
export function parseRecording(text: string): Recording {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new RecordingFormatError("Recording file is not valid JSON", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = recordingFileSchema.safeParse(raw);
  if (!result.success) {
    throw new RecordingFormatError(
      "Recording file failed validation",
      result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      }),
    );
  }

  const file = result.data;
  const frames: Frame[] = file.frames.map((frame) =>
    Object.freeze({
      index: frame.index,
      timestamp: frame.timestamp,
      left: Object.freeze(handSamples("left", frame.left)),
      right: Object.freeze(handSamples("right", frame.right)),
    }),
  );

  const last = frames[frames.length - 1];
  return Object.freeze({
    id: file.id,
    startedAt: file.startedAt,
    sampleRateHz: file.sampleRateHz,
    frameCount: frames.length,
    durationMs: last ? last.timestamp : 0,
    frames: Object.freeze(frames),
  });
}
