/**
 * Quaternion Tare Utilities
 * =========================
 *
 * Single convention for taring joint orientations:
 *
 *   tared = raw × offset
 *   where offset = inverse(raw_at_tare_time)
 *
 * The offset is applied in the joint's local frame, so the pose captured at
 * tare time maps exactly to identity. Positions are tared by plain vector
 * subtraction.
 *
 * @module quaternionTare
 */

import * as THREE from "three";
import type { Quat, Vec3 } from "../hand/types";

export function toThreeQuaternion(q: Quat): THREE.Quaternion {
  return new THREE.Quaternion(q.x, q.y, q.z, q.w);
}

export function fromThreeQuaternion(q: THREE.Quaternion): Quat {
  return { w: q.w, x: q.x, y: q.y, z: q.z };
}

/**
 * Compute tare offset from the orientation at tare time.
 *
 * @returns Offset to be applied as: tared = raw × offset
 */
export function computeTareOffset(
  rawAtTareTime: THREE.Quaternion,
): THREE.Quaternion {
  // invert() is the conjugate, valid for unit quaternions
  return rawAtTareTime.clone().invert();
}

/**
 * Apply tare offset in the local frame (raw × offset, NOT offset × raw).
 */
export function applyTareOffset(
  raw: THREE.Quaternion,
  offset: THREE.Quaternion,
): THREE.Quaternion {
  return raw.clone().multiply(offset);
}

/**
 * One-shot tare on plain quaternions: raw × inverse(baseline).
 */
export function tareOrientation(raw: Quat, baseline: Quat): Quat {
  const offset = computeTareOffset(toThreeQuaternion(baseline));
  return fromThreeQuaternion(applyTareOffset(toThreeQuaternion(raw), offset));
}

export function tarePosition(raw: Vec3, baseline: Vec3): Vec3 {
  const v = new THREE.Vector3(raw.x, raw.y, raw.z).sub(
    new THREE.Vector3(baseline.x, baseline.y, baseline.z),
  );
  return { x: v.x, y: v.y, z: v.z };
}

/**
 * Angle (radians) between a quaternion and identity.
 */
export function angleFromIdentity(q: Quat): number {
  return 2 * Math.acos(Math.min(1, Math.abs(q.w)));
}

export function quaternionNorm(q: Quat): number {
  return Math.sqrt(q.w * q.w + q.x * q.x + q.y * q.y + q.z * q.z);
}

/**
 * Validate that a tare offset maps the tare-time pose to identity.
 */
export function validateTareOffset(
  rawAtTare: THREE.Quaternion,
  offset: THREE.Quaternion,
): boolean {
  const result = applyTareOffset(rawAtTare, offset);
  return angleFromIdentity(fromThreeQuaternion(result)) < 0.001; // Less than 0.06° error
}
