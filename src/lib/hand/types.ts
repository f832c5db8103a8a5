import type { Hand } from "./joints";

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Unit quaternion, scalar first. */
export interface Quat {
  readonly w: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface JointSample {
  readonly hand: Hand;
  readonly jointIndex: number;
  readonly position: Vec3;
  readonly orientation: Quat;
}

/** Read view of one hand in the joint state store. */
export interface HandState {
  hand: Hand;
  /** 26 slots, unset sentinels until the first packet for that joint */
  joints: readonly JointSample[];
  /** Packets applied to this hand (monotonically non-decreasing) */
  packetCount: number;
  /** Wall-clock ms of the last applied packet, null before the first */
  lastUpdate: number | null;
  deviceName: string | null;
  hasData: boolean;
}

export interface PacketCounts {
  left: number;
  right: number;
}

/**
 * Pose treated as "zero" for each joint of each hand.
 * capturedAt is null for the default identity baseline.
 */
export interface CalibrationBaseline {
  readonly left: readonly JointSample[];
  readonly right: readonly JointSample[];
  readonly capturedAt: number | null;
}

/** One recorded snapshot pair, post-calibration. */
export interface Frame {
  readonly index: number;
  /** ms since recording start */
  readonly timestamp: number;
  readonly left: readonly JointSample[];
  readonly right: readonly JointSample[];
}

export interface Recording {
  readonly id: string;
  /** Wall-clock ms when recording started */
  readonly startedAt: number;
  readonly sampleRateHz: number;
  readonly frameCount: number;
  readonly durationMs: number;
  readonly frames: readonly Frame[];
}

export interface PlaybackCursor {
  readonly index: number;
  readonly looping: true;
  /** Completed wrap-arounds since playback started */
  readonly loops: number;
}
