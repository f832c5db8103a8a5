import { HANDS, NUM_JOINTS, isJointIndex, type Hand } from "./joints";
import type { JointSample, Quat, Vec3 } from "./types";

export const ZERO_POSITION: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });
export const IDENTITY_ORIENTATION: Quat = Object.freeze({
  w: 1,
  x: 0,
  y: 0,
  z: 0,
});

function assertFinite(label: string, values: readonly number[]): void {
  for (const v of values) {
    if (!Number.isFinite(v)) {
      throw new RangeError(`${label} has a non-finite component: ${v}`);
    }
  }
}

/**
 * Build a frozen JointSample.
 * @throws RangeError for an index outside 0-25 or a non-finite component
 */
export function createJointSample(
  hand: Hand,
  jointIndex: number,
  position: Vec3,
  orientation: Quat,
): JointSample {
  if (!isJointIndex(jointIndex)) {
    throw new RangeError(`Joint index out of range: ${jointIndex}`);
  }
  assertFinite("position", [position.x, position.y, position.z]);
  assertFinite("orientation", [
    orientation.w,
    orientation.x,
    orientation.y,
    orientation.z,
  ]);

  return Object.freeze({
    hand,
    jointIndex,
    position: Object.freeze({ x: position.x, y: position.y, z: position.z }),
    orientation: Object.freeze({
      w: orientation.w,
      x: orientation.x,
      y: orientation.y,
      z: orientation.z,
    }),
  });
}

/** [x, y, z, qw, qx, qy, qz] wire order */
export function sampleFromValues(
  hand: Hand,
  jointIndex: number,
  values: readonly number[],
): JointSample {
  return createJointSample(
    hand,
    jointIndex,
    { x: values[0], y: values[1], z: values[2] },
    { w: values[3], x: values[4], y: values[5], z: values[6] },
  );
}

// One shared identity sample per slot; identity comparison marks a slot as never written.
const UNSET_SAMPLES: Record<Hand, readonly JointSample[]> = {
  left: buildUnset("left"),
  right: buildUnset("right"),
};

const UNSET_SET = new Set<JointSample>(
  HANDS.flatMap((hand) => UNSET_SAMPLES[hand]),
);

function buildUnset(hand: Hand): readonly JointSample[] {
  return Object.freeze(
    Array.from({ length: NUM_JOINTS }, (_, i) =>
      createJointSample(hand, i, ZERO_POSITION, IDENTITY_ORIENTATION),
    ),
  );
}

export function unsetSample(hand: Hand, jointIndex: number): JointSample {
  return UNSET_SAMPLES[hand][jointIndex];
}

export function unsetHand(hand: Hand): readonly JointSample[] {
  return UNSET_SAMPLES[hand];
}

export function isUnsetSample(sample: JointSample): boolean {
  return UNSET_SET.has(sample);
}
