/**
 * Listener → store → calibration properties over every joint of both hands.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { decodeDatagram } from "../lib/connection/PoseDecoder";
import { UdpListener } from "../lib/connection/UdpListener";
import { HANDS, NUM_JOINTS, type Hand } from "../lib/hand/joints";
import { createCalibrationStore, type CalibrationStore } from "../store/calibrationStore";
import { JointStateStore } from "../store/JointStateStore";
import { fakeNetwork, type FakeNetwork } from "./helpers/fakeSocket";
import { encodeMessage, floats, jointDatagram } from "./helpers/oscEncoder";

const PORTS = [9000, 9001, 9002, 9003, 9004, 9005];

/** Distinct, exactly representable float32 pose per (hand, joint, variant). */
function poseValues(hand: Hand, joint: number, variant = 0): number[] {
  const sign = hand === "left" ? 1 : -1;
  return [sign * (joint + 0.5), joint / 4, variant + 0.25, 0.5, 0.5, 0.5, 0.5];
}

describe("telemetry properties", () => {
  let network: FakeNetwork;
  let store: JointStateStore;
  let calibration: CalibrationStore;

  beforeEach(async () => {
    network = fakeNetwork();
    store = new JointStateStore();
    calibration = createCalibrationStore({ jointState: store });
    await new UdpListener({
      host: "127.0.0.1",
      ports: PORTS,
      sink: store,
      createSocket: network.createSocket,
    }).connect();
  });

  function send(port: number, data: Uint8Array): void {
    network.sockets.get(port)?.receive(data);
  }

  it("should store each well-formed datagram exactly and count it once", () => {
    HANDS.forEach((hand, h) => {
      for (let joint = 0; joint < NUM_JOINTS; joint++) {
        const data = jointDatagram(hand, joint, poseValues(hand, joint));
        const decoded = decodeDatagram(data);
        const before = store.packetCounts()[hand];

        send(PORTS[(joint + h) % PORTS.length], data);

        expect(decoded.ok).toBe(true);
        if (decoded.ok && decoded.packets[0].kind === "joint") {
          expect(store.snapshot(hand)[joint]).toEqual(decoded.packets[0].sample);
        }
        expect(store.packetCounts()[hand]).toBe(before + 1);
      }
    });
  });

  it("should leave snapshots and counters untouched by malformed datagrams", () => {
    send(9000, jointDatagram("left", 1, poseValues("left", 1)));
    const left = store.snapshot("left");
    const right = store.snapshot("right");
    const counts = store.packetCounts();

    const garbage = [
      new Uint8Array([0x2f, 0x6c, 0x00]),
      jointDatagram("left", 1, [1, 2, 3]),
      jointDatagram("left", 99, poseValues("left", 1)),
      jointDatagram("right", 1, [0, 0, 0, 0, 0, 0, 0]),
      encodeMessage("/left/joint/1", [...floats([1, 2, 3, 1, 0, 0]), { type: "s", value: "x" }]),
    ];
    for (const data of garbage) send(9001, data);

    expect(store.snapshot("left")).toEqual(left);
    expect(store.snapshot("right")).toEqual(right);
    expect(store.packetCounts()).toEqual(counts);
  });

  it("should calibrate every joint of both hands to zero and identity", () => {
    for (const hand of HANDS) {
      for (let joint = 0; joint < NUM_JOINTS; joint++) {
        send(9000, jointDatagram(hand, joint, poseValues(hand, joint)));
      }
    }

    calibration.getState().recalibrate();

    for (const hand of HANDS) {
      const raw = store.snapshot(hand);
      raw.forEach((sample) => {
        const calibrated = calibration.getState().apply(sample);
        expect(calibrated.position).toEqual({ x: 0, y: 0, z: 0 });
        expect(calibrated.orientation.w).toBeCloseTo(1, 6);
        expect(calibrated.orientation.x).toBeCloseTo(0, 6);
        expect(calibrated.orientation.y).toBeCloseTo(0, 6);
        expect(calibrated.orientation.z).toBeCloseTo(0, 6);
      });
    }
  });

  it("should calibrate a near-unit quaternion to identity", () => {
    send(9000, jointDatagram("left", 3, [1, 2, 3, 1.1, 0, 0, 0]));
    send(9000, jointDatagram("right", 5, [0, 0, 0, 0, 0.95, 0, 0]));

    calibration.getState().recalibrate();

    const left = calibration.getState().apply(store.snapshot("left")[3]);
    expect(left.orientation.w).toBeCloseTo(1, 6);
    expect(left.orientation.x).toBeCloseTo(0, 6);

    const right = calibration.getState().apply(store.snapshot("right")[5]);
    expect(right.orientation.w).toBeCloseTo(1, 6);
    expect(right.orientation.x).toBeCloseTo(0, 6);
  });

  it("should keep exactly one write per slot under interleaved producers", () => {
    // One producer per port, each cycling over every slot with its own variant
    const issued = new Map<string, Set<string>>();
    const calls: Record<Hand, number> = { left: 0, right: 0 };
    const rounds = 3;

    for (let round = 0; round < rounds; round++) {
      for (let joint = 0; joint < NUM_JOINTS; joint++) {
        for (const hand of HANDS) {
          PORTS.forEach((port, producer) => {
            const values = poseValues(hand, joint, producer);
            const key = `${hand}:${joint}`;
            const writes = issued.get(key) ?? new Set<string>();
            writes.add(JSON.stringify(values));
            issued.set(key, writes);

            send(port, jointDatagram(hand, joint, values));
            calls[hand] += 1;
          });
        }
      }
    }

    for (const hand of HANDS) {
      store.snapshot(hand).forEach((sample, joint) => {
        const { position: p, orientation: q } = sample;
        const stored = JSON.stringify([p.x, p.y, p.z, q.w, q.x, q.y, q.z]);
        expect(issued.get(`${hand}:${joint}`)?.has(stored)).toBe(true);
      });
    }
    expect(store.packetCounts()).toEqual(calls);
    expect(calls.left).toBe(rounds * NUM_JOINTS * PORTS.length);
  });
});
