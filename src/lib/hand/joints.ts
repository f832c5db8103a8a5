/**
 * OpenXR hand joint layout (XR_HAND_JOINT_*), 26 joints per hand.
 */

export type Hand = "left" | "right";

export const HANDS: readonly Hand[] = ["left", "right"];

export const NUM_JOINTS = 26;

export const JOINT_NAMES: readonly string[] = [
  "Palm",
  "Wrist",
  "Thumb metacarpal",
  "Thumb proximal",
  "Thumb distal",
  "Thumb tip",
  "Index metacarpal",
  "Index proximal",
  "Index intermediate",
  "Index distal",
  "Index tip",
  "Middle metacarpal",
  "Middle proximal",
  "Middle intermediate",
  "Middle distal",
  "Middle tip",
  "Ring metacarpal",
  "Ring proximal",
  "Ring intermediate",
  "Ring distal",
  "Ring tip",
  "Little metacarpal",
  "Little proximal",
  "Little intermediate",
  "Little distal",
  "Little tip",
];

export function isJointIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < NUM_JOINTS;
}

export function parseHand(value: string): Hand | null {
  switch (value.toLowerCase()) {
    case "left":
    case "l":
      return "left";
    case "right":
    case "r":
      return "right";
    default:
      return null;
  }
}

/**
 * Route a glove by its advertised device name,
 * e.g. "Reality Glove (L)" / "Reality Glove (R)". Anything not marked left is right.
 */
export function handFromDeviceName(deviceName: string): Hand {
  const name = deviceName.toLowerCase();
  return name.includes("(l)") || name.includes("left") ? "left" : "right";
}
