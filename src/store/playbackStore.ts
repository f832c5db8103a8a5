/**
 * Session Playback Store
 * =======================
 *
 * Loops a retained Recording on its own clock:
 * - start(recording) places the cursor on frame 0 and ticks at the
 *   recording's sample rate
 * - each tick advances one frame; past the last frame the cursor wraps to 0
 *   (looping is the only mode)
 * - stop() cancels the ticker before returning and drops the cursor
 *
 * Strictly a read path: nothing here touches the joint state store.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import { EmptyRecordingError } from "../lib/errors";
import type { Frame, PlaybackCursor, Recording } from "../lib/hand/types";
import { playbackLog } from "../lib/logger";
import { FixedRateTicker } from "../lib/timing/FixedRateTicker";

export type PlaybackStatus = "stopped" | "playing";

export interface PlaybackState {
  status: PlaybackStatus;
  recording: Recording | null;
  cursor: PlaybackCursor | null;

  start: (recording: Recording) => void;
  stop: () => void;
  /** Move the cursor one frame (called by the ticker) */
  advance: () => void;
  currentFrame: () => Frame | null;
}

export type PlaybackStore = StoreApi<PlaybackState>;

export interface PlaybackStoreOptions {
  /** Monotonic clock in ms (default performance.now) */
  now?: () => number;
}

export function createPlaybackStore(
  options: PlaybackStoreOptions = {},
): PlaybackStore {
  const now = options.now ?? (() => performance.now());
  let ticker: FixedRateTicker | null = null;

  const cancelTicker = () => {
    ticker?.stop();
    ticker = null;
  };

  return createStore<PlaybackState>()((set, get) => ({
    status: "stopped",
    recording: null,
    cursor: null,

    start: (recording) => {
      // Any previous playback ends here, even if this start is rejected
      if (get().status === "playing") get().stop();

      if (recording.frames.length === 0) {
        playbackLog.warn("Refusing to play an empty recording");
        throw new EmptyRecordingError();
      }

      // Throws RangeError for an unusable rate before any state changes
      const next = new FixedRateTicker({ rateHz: recording.sampleRateHz, now });

      set({
        status: "playing",
        recording,
        cursor: { index: 0, looping: true, loops: 0 },
      });

      ticker = next;
      ticker.start(() => get().advance());

      playbackLog.info(
        `Playing ${recording.id}: ${recording.frames.length} frames @ ${recording.sampleRateHz} Hz (looping)`,
      );
    },

    stop: () => {
      cancelTicker();
      if (get().status === "stopped") return;

      set({ status: "stopped", recording: null, cursor: null });
      playbackLog.info("Playback stopped");
    },

    advance: () => {
      const { status, recording, cursor } = get();
      if (status !== "playing" || !recording || !cursor) return;

      const next = cursor.index + 1;
      const wrapped = next >= recording.frames.length;
      set({
        cursor: {
          index: wrapped ? 0 : next,
          looping: true,
          loops: wrapped ? cursor.loops + 1 : cursor.loops,
        },
      });
    },

    currentFrame: () => {
      const { recording, cursor } = get();
      if (!recording || !cursor) return null;
      return recording.frames[cursor.index] ?? null;
    },
  }));
}
