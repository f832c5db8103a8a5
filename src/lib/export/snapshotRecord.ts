import { JOINT_NAMES, type Hand } from "../hand/joints";
import type { HandState, JointSample } from "../hand/types";

export interface SnapshotJointRow {
  index: number;
  name: string;
  x: number;
  y: number;
  z: number;
  qw: number;
  qx: number;
  qy: number;
  qz: number;
}

export interface SnapshotHand {
  deviceName: string | null;
  hasData: boolean;
  joints: SnapshotJointRow[];
}

/** One export event: calibrated pose of both hands at capture time. */
export interface SnapshotRecord {
  /** Wall-clock ms */
  capturedAt: number;
  /** "both_hands_YYYYMMDD_HHMMSS", local time */
  fileStem: string;
  hands: Record<Hand, SnapshotHand>;
}

export interface SnapshotHandInput {
  state: Pick<HandState, "deviceName" | "hasData">;
  /** Calibrated samples, 26 per hand */
  joints: readonly JointSample[];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** YYYYMMDD_HHMMSS in local time */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function snapshotFileStem(capturedAt: number): string {
  return `both_hands_${formatFileTimestamp(new Date(capturedAt))}`;
}

function toRow(sample: JointSample): SnapshotJointRow {
  const { position: p, orientation: q } = sample;
  return {
    index: sample.jointIndex,
    name: JOINT_NAMES[sample.jointIndex],
    x: p.x,
    y: p.y,
    z: p.z,
    qw: q.w,
    qx: q.x,
    qy: q.y,
    qz: q.z,
  };
}

export function buildSnapshotRecord(
  hands: Record<Hand, SnapshotHandInput>,
  capturedAt: number,
): SnapshotRecord {
  const build = ({ state, joints }: SnapshotHandInput): SnapshotHand => ({
    deviceName: state.deviceName,
    hasData: state.hasData,
    joints: joints.map(toRow),
  });

  return {
    capturedAt,
    fileStem: snapshotFileStem(capturedAt),
    hands: {
      left: build(hands.left),
      right: build(hands.right),
    },
  };
}
