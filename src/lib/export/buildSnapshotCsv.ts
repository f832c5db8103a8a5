import type { Hand } from "../hand/joints";
import type { SnapshotHand, SnapshotRecord } from "./snapshotRecord";

export interface SnapshotCsvOptions {
  includeOrientation?: boolean;
}

const SECTION_TITLES: Record<Hand, string> = {
  left: "=== LEFT GLOVE ===",
  right: "=== RIGHT GLOVE ===",
};

const DECIMALS = 6;

function section(
  hand: Hand,
  data: SnapshotHand,
  includeOrientation: boolean,
): string[] {
  const header = ["Index", "Joint Name", "X", "Y", "Z"];
  if (includeOrientation) header.push("QW", "QX", "QY", "QZ");

  const lines = [SECTION_TITLES[hand], header.join(",")];
  for (const joint of data.joints) {
    const values = [joint.x, joint.y, joint.z];
    if (includeOrientation) values.push(joint.qw, joint.qx, joint.qy, joint.qz);
    lines.push(
      [
        String(joint.index),
        joint.name,
        ...values.map((v) => v.toFixed(DECIMALS)),
      ].join(","),
    );
  }
  return lines;
}

/**
 * Two-section CSV (left glove, blank line, right glove), one row per joint.
 */
export function buildSnapshotCsv(
  record: SnapshotRecord,
  { includeOrientation = false }: SnapshotCsvOptions = {},
): string {
  const lines = [
    ...section("left", record.hands.left, includeOrientation),
    "",
    ...section("right", record.hands.right, includeOrientation),
  ];
  return lines.join("\n") + "\n";
}
