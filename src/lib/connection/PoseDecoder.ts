/**
 * PoseDecoder - turns one glove datagram into joint samples.
 *
 * Accepted OSC addresses:
 * - /<hand>/joint/<index>   seven args: X Y Z qW qX qY qZ
 * - /joint/<index>          same, when the receiving port is assigned a hand
 * - /.../kinematic...       whole-hand frame: 5 header args (device name at 3)
 *                           followed by 26 joints × 7 values
 *
 * Bad input never throws: the result carries a DecodeError instead.
 */

import { DecodeError } from "../errors";
import { sampleFromValues } from "../hand/jointSample";
import {
  NUM_JOINTS,
  handFromDeviceName,
  isJointIndex,
  parseHand,
  type Hand,
} from "../hand/joints";
import type { JointSample } from "../hand/types";
import { quaternionNorm } from "../math/quaternionTare";
import {
  OscParseError,
  OscParser,
  type OscArgument,
  type OscMessage,
} from "../osc/OscParser";

export const VALUES_PER_JOINT = 7; // x, y, z, qw, qx, qy, qz
export const KINEMATIC_HEADER_ARGS = 5;
export const KINEMATIC_MIN_ARGS =
  KINEMATIC_HEADER_ARGS + NUM_JOINTS * VALUES_PER_JOINT; // 187
const KINEMATIC_DEVICE_NAME_ARG = 3;

// Same acceptance window the sensor parser uses for quaternion magnitude
const QUAT_NORM_MIN = 0.8;
const QUAT_NORM_MAX = 1.2;

const JOINT_ADDRESS = /^\/(?:([a-z]+)\/)?joint\/(\d+)$/i;

export type DecodedPacket =
  | { kind: "joint"; sample: JointSample }
  | {
      kind: "hand";
      hand: Hand;
      deviceName: string;
      samples: JointSample[];
    };

export type DecodeResult =
  | { ok: true; packets: DecodedPacket[] }
  | { ok: false; error: DecodeError };

export interface DecodeContext {
  /** Hand assigned to the port the datagram arrived on, if any */
  portHand?: Hand;
}

function toNumbers(
  args: readonly OscArgument[],
  start: number,
  count: number,
): number[] {
  const values: number[] = [];
  for (let i = start; i < start + count; i++) {
    const arg = args[i];
    if (typeof arg !== "number" || !Number.isFinite(arg)) {
      throw new DecodeError(
        "invalid-argument",
        `Argument ${i} is not a finite number`,
      );
    }
    values.push(arg);
  }
  return values;
}

/**
 * Reject quaternions outside the norm window and rescale the rest to unit
 * length, so every stored orientation is a rotation.
 */
function normalizeOrientation(
  values: readonly number[],
  label: string,
): number[] {
  const [x, y, z, qw, qx, qy, qz] = values;
  const norm = quaternionNorm({ w: qw, x: qx, y: qy, z: qz });
  if (norm < QUAT_NORM_MIN || norm > QUAT_NORM_MAX) {
    throw new DecodeError(
      "invalid-argument",
      `${label} quaternion norm ${norm.toFixed(3)} outside [${QUAT_NORM_MIN}, ${QUAT_NORM_MAX}]`,
    );
  }
  return [x, y, z, qw / norm, qx / norm, qy / norm, qz / norm];
}

function decodeJointMessage(
  message: OscMessage,
  match: RegExpExecArray,
  context: DecodeContext,
): DecodedPacket {
  const [, handToken, indexToken] = match;

  const hand = handToken === undefined ? context.portHand : parseHand(handToken);
  if (!hand) {
    throw new DecodeError(
      "unknown-address",
      `No hand mapping for ${message.address}`,
    );
  }

  const jointIndex = Number(indexToken);
  if (!isJointIndex(jointIndex)) {
    throw new DecodeError(
      "unknown-address",
      `Joint index ${indexToken} out of range in ${message.address}`,
    );
  }

  if (message.args.length !== VALUES_PER_JOINT) {
    throw new DecodeError(
      "argument-count",
      `Expected ${VALUES_PER_JOINT} arguments, got ${message.args.length}`,
    );
  }

  const values = normalizeOrientation(
    toNumbers(message.args, 0, VALUES_PER_JOINT),
    `Joint ${jointIndex}`,
  );
  return { kind: "joint", sample: sampleFromValues(hand, jointIndex, values) };
}

function decodeKinematicMessage(message: OscMessage): DecodedPacket {
  const { args } = message;
  if (args.length < KINEMATIC_MIN_ARGS) {
    throw new DecodeError(
      "argument-count",
      `Kinematic frame needs at least ${KINEMATIC_MIN_ARGS} arguments, got ${args.length}`,
    );
  }

  const nameArg = args[KINEMATIC_DEVICE_NAME_ARG];
  const deviceName = typeof nameArg === "string" ? nameArg : String(nameArg);
  const hand = handFromDeviceName(deviceName);

  const samples: JointSample[] = [];
  for (let i = 0; i < NUM_JOINTS; i++) {
    const values = normalizeOrientation(
      toNumbers(args, KINEMATIC_HEADER_ARGS + i * VALUES_PER_JOINT, VALUES_PER_JOINT),
      `Joint ${i}`,
    );
    samples.push(sampleFromValues(hand, i, values));
  }

  return { kind: "hand", hand, deviceName, samples };
}

export function decodeMessage(
  message: OscMessage,
  context: DecodeContext = {},
): DecodedPacket {
  const match = JOINT_ADDRESS.exec(message.address);
  if (match) {
    return decodeJointMessage(message, match, context);
  }
  if (message.address.toLowerCase().includes("/kinematic")) {
    return decodeKinematicMessage(message);
  }
  throw new DecodeError(
    "unknown-address",
    `Unrecognized address ${message.address}`,
  );
}

/**
 * Decode a raw datagram. A bundle decodes all-or-nothing: one bad element
 * rejects the whole datagram.
 */
export function decodeDatagram(
  data: Uint8Array,
  context: DecodeContext = {},
): DecodeResult {
  try {
    const packet = OscParser.parse(data);
    const packets = OscParser.messages(packet).map((m) =>
      decodeMessage(m, context),
    );
    if (packets.length === 0) {
      return {
        ok: false,
        error: new DecodeError("malformed-packet", "Bundle has no messages"),
      };
    }
    return { ok: true, packets };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    if (error instanceof OscParseError) {
      return {
        ok: false,
        error: new DecodeError("malformed-packet", error.message),
      };
    }
    throw error;
  }
}
