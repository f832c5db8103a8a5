import { createJointSample, isUnsetSample, unsetHand } from "../lib/hand/jointSample";
import type { Hand } from "../lib/hand/joints";
import type { CalibrationBaseline, JointSample } from "../lib/hand/types";
import { tareOrientation, tarePosition } from "../lib/math/quaternionTare";

export interface ApplyBaselineOptions {
  /** Compose out the baseline orientation too (default true) */
  calibrateOrientation?: boolean;
}

/** Pre-calibration baseline: zero position, identity orientation for every joint. */
export function identityBaseline(): CalibrationBaseline {
  return Object.freeze({
    left: unsetHand("left"),
    right: unsetHand("right"),
    capturedAt: null,
  });
}

export function captureBaseline(
  left: readonly JointSample[],
  right: readonly JointSample[],
  capturedAt: number,
): CalibrationBaseline {
  return Object.freeze({
    left: Object.freeze(left.slice()),
    right: Object.freeze(right.slice()),
    capturedAt,
  });
}

export function baselineFor(
  baseline: CalibrationBaseline,
  hand: Hand,
  jointIndex: number,
): JointSample {
  return baseline[hand][jointIndex];
}

/**
 * Offset a raw sample by its baseline.
 *
 * position    = raw − baseline
 * orientation = raw × inverse(baseline)
 *
 * Pure; an unset sample passes through untouched.
 */
export function applyBaseline(
  sample: JointSample,
  baselineSample: JointSample,
  options: ApplyBaselineOptions = {},
): JointSample {
  if (isUnsetSample(sample)) return sample;

  const calibrateOrientation = options.calibrateOrientation ?? true;
  return createJointSample(
    sample.hand,
    sample.jointIndex,
    tarePosition(sample.position, baselineSample.position),
    calibrateOrientation
      ? tareOrientation(sample.orientation, baselineSample.orientation)
      : sample.orientation,
  );
}

export function applyBaselineToHand(
  samples: readonly JointSample[],
  baseline: CalibrationBaseline,
  hand: Hand,
  options: ApplyBaselineOptions = {},
): JointSample[] {
  return samples.map((sample, i) =>
    applyBaseline(sample, baselineFor(baseline, hand, i), options),
  );
}
