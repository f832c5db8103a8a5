/**
 * Calibration Store - baseline pose management
 * =============================================
 *
 * Holds the CalibrationBaseline that raw joint samples are offset by before
 * anyone outside the Listener sees them. The baseline starts as identity
 * (calibration is optional) and is replaced wholesale by recalibrate(): a
 * single set() swaps the frozen object, so readers see either the old or the
 * new baseline, never a mix.
 *
 * Accessed during:
 *   - Recording (each sampled frame)
 *   - Export (snapshot record)
 *   - Telemetry reads (calibratedSnapshot)
 *
 * @module calibrationStore
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import {
  applyBaseline,
  applyBaselineToHand,
  baselineFor,
  captureBaseline,
  identityBaseline,
} from "../calibration/baseline";
import type { Hand } from "../lib/hand/joints";
import type { CalibrationBaseline, JointSample } from "../lib/hand/types";
import { calibLog } from "../lib/logger";
import type { JointStateStore } from "./JointStateStore";

export interface CalibrationState {
  baseline: CalibrationBaseline;
  calibrateOrientation: boolean;
  /** Number of recalibrations since start */
  calibrationCount: number;

  recalibrate: () => CalibrationBaseline;
  reset: () => void;
  apply: (sample: JointSample) => JointSample;
  calibratedSnapshot: (hand: Hand) => JointSample[];
}

export type CalibrationStore = StoreApi<CalibrationState>;

export interface CalibrationStoreOptions {
  jointState: JointStateStore;
  calibrateOrientation?: boolean;
  now?: () => number;
}

export function createCalibrationStore({
  jointState,
  calibrateOrientation = true,
  now = Date.now,
}: CalibrationStoreOptions): CalibrationStore {
  return createStore<CalibrationState>()((set, get) => ({
    baseline: identityBaseline(),
    calibrateOrientation,
    calibrationCount: 0,

    recalibrate: () => {
      const baseline = captureBaseline(
        jointState.snapshot("left"),
        jointState.snapshot("right"),
        now(),
      );
      set((state) => ({
        baseline,
        calibrationCount: state.calibrationCount + 1,
      }));

      const counts = jointState.packetCounts();
      calibLog.info(
        `Baseline captured (packets L=${counts.left} R=${counts.right})`,
      );
      return baseline;
    },

    reset: () => {
      set({ baseline: identityBaseline() });
      calibLog.info("Baseline reset to identity");
    },

    apply: (sample) => {
      const { baseline, calibrateOrientation } = get();
      return applyBaseline(
        sample,
        baselineFor(baseline, sample.hand, sample.jointIndex),
        { calibrateOrientation },
      );
    },

    calibratedSnapshot: (hand) => {
      // One baseline read per hand
      const { baseline, calibrateOrientation } = get();
      return applyBaselineToHand(jointState.snapshot(hand), baseline, hand, {
        calibrateOrientation,
      });
    },
  }));
}
