/**
 * Recording Store - fixed-rate capture of calibrated hand poses.
 *
 * State machine: idle → recording → idle.
 * - start() while recording is a no-op; otherwise the previous Recording is
 *   discarded and a fresh one begins
 * - a FixedRateTicker (default 60 Hz) samples both hands, decoupled from
 *   packet arrival
 * - stop() cancels the ticker before returning, freezes the Recording and
 *   returns the frame count (0 when idle)
 *
 * Frames are kept out of the store state while recording; subscribers only
 * see frameCount / elapsedMs change.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { Hand } from "../lib/hand/joints";
import type { Frame, JointSample, Recording } from "../lib/hand/types";
import { recordingLog } from "../lib/logger";
import { FixedRateTicker } from "../lib/timing/FixedRateTicker";

export const DEFAULT_SAMPLE_RATE_HZ = 60;

export type RecorderStatus = "idle" | "recording";

/** Where the recorder reads calibrated poses from. */
export interface CalibratedPoseSource {
  calibratedSnapshot: (hand: Hand) => JointSample[];
}

export interface RecordingState {
  status: RecorderStatus;
  sampleRateHz: number;
  /** Retained after stop(); null while recording or before the first take */
  recording: Recording | null;
  frameCount: number;
  elapsedMs: number;

  start: () => void;
  stop: () => number;
  sampleFrame: () => Frame | null;
  getRecording: () => Recording | null;
}

export type RecordingStore = StoreApi<RecordingState>;

export interface RecordingStoreOptions {
  source: CalibratedPoseSource;
  sampleRateHz?: number;
  /** Monotonic clock in ms (default performance.now) */
  now?: () => number;
  /** Wall clock for Recording.startedAt (default Date.now) */
  wallClock?: () => number;
}

function freezeFrame(frame: Frame): Frame {
  Object.freeze(frame.left);
  Object.freeze(frame.right);
  return Object.freeze(frame);
}

export function createRecordingStore({
  source,
  sampleRateHz = DEFAULT_SAMPLE_RATE_HZ,
  now = () => performance.now(),
  wallClock = Date.now,
}: RecordingStoreOptions): RecordingStore {
  const ticker = new FixedRateTicker({ rateHz: sampleRateHz, now });

  // Active take (not in store state)
  let frames: Frame[] = [];
  let startTime = 0;
  let startedAt = 0;
  let takeNumber = 0;

  return createStore<RecordingState>()((set, get) => ({
    status: "idle",
    sampleRateHz,
    recording: null,
    frameCount: 0,
    elapsedMs: 0,

    start: () => {
      if (get().status === "recording") return;

      frames = [];
      startTime = now();
      startedAt = wallClock();
      takeNumber += 1;

      set({ status: "recording", recording: null, frameCount: 0, elapsedMs: 0 });
      ticker.start(() => {
        get().sampleFrame();
      });

      recordingLog.info(`Recording started (${sampleRateHz} Hz)`);
    },

    stop: () => {
      if (get().status !== "recording") return 0;

      ticker.stop();

      const last = frames[frames.length - 1];
      const recording: Recording = Object.freeze({
        id: `take-${startedAt}-${takeNumber}`,
        startedAt,
        sampleRateHz,
        frameCount: frames.length,
        durationMs: last ? last.timestamp : 0,
        frames: Object.freeze(frames),
      });
      frames = [];

      set({
        status: "idle",
        recording,
        frameCount: recording.frameCount,
        elapsedMs: recording.durationMs,
      });

      if (ticker.skippedTicks > 0) {
        recordingLog.warn(
          `Sampler fell behind and skipped ${ticker.skippedTicks} ticks`,
        );
      }
      recordingLog.info(
        `Recording stopped: ${recording.frameCount} frames, ${(recording.durationMs / 1000).toFixed(2)}s`,
      );
      return recording.frameCount;
    },

    sampleFrame: () => {
      if (get().status !== "recording") return null;

      const timestamp = now() - startTime;
      const previous = frames[frames.length - 1];
      if (previous && timestamp <= previous.timestamp) {
        // Clock did not advance; a duplicate timestamp would break ordering
        recordingLog.debug(`Skipped sample at ${timestamp}ms (no clock advance)`);
        return null;
      }

      const frame = freezeFrame({
        index: frames.length,
        timestamp,
        left: source.calibratedSnapshot("left"),
        right: source.calibratedSnapshot("right"),
      });
      frames.push(frame);
      set({ frameCount: frames.length, elapsedMs: timestamp });
      return frame;
    },

    getRecording: () => {
      const { status, recording } = get();
      return status === "recording" ? null : recording;
    },
  }));
}
