/**
 * Joint State Store - single source of truth for the current hand pose.
 *
 * Holds the latest JointSample per joint per hand. Each slot is overwritten in
 * place by the Listener; readers get copies. Slots are written independently,
 * so a snapshot may mix joints from different physical instants (the glove
 * sends one datagram per joint). No frame buffering.
 *
 * Plain class rather than a zustand store: writes arrive at packet rate and
 * nothing subscribes to individual slots.
 */

import { unsetHand } from "../lib/hand/jointSample";
import { HANDS, NUM_JOINTS, isJointIndex, type Hand } from "../lib/hand/joints";
import type { HandState, JointSample, PacketCounts } from "../lib/hand/types";

export interface PoseSink {
  update(sample: JointSample): void;
  updateHand(hand: Hand, samples: readonly JointSample[], deviceName?: string): void;
}

interface MutableHandState {
  slots: JointSample[];
  packetCount: number;
  lastUpdate: number | null;
  deviceName: string | null;
}

export interface JointStateStoreOptions {
  /** Wall clock used for lastUpdate (default Date.now) */
  now?: () => number;
}

function emptyHand(hand: Hand): MutableHandState {
  return {
    slots: unsetHand(hand).slice(),
    packetCount: 0,
    lastUpdate: null,
    deviceName: null,
  };
}

export class JointStateStore implements PoseSink {
  private hands: Record<Hand, MutableHandState> = {
    left: emptyHand("left"),
    right: emptyHand("right"),
  };
  private readonly now: () => number;

  constructor(options: JointStateStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Replace one slot and count one packet for that hand.
   * @throws RangeError for a joint index outside 0-25
   */
  update(sample: JointSample): void {
    if (!isJointIndex(sample.jointIndex)) {
      throw new RangeError(`Joint index out of range: ${sample.jointIndex}`);
    }
    const state = this.hands[sample.hand];
    state.slots[sample.jointIndex] = sample;
    state.packetCount += 1;
    state.lastUpdate = this.now();
  }

  /**
   * Replace all 26 slots from one whole-hand packet; counts as one packet.
   */
  updateHand(
    hand: Hand,
    samples: readonly JointSample[],
    deviceName?: string,
  ): void {
    if (samples.length !== NUM_JOINTS) {
      throw new RangeError(
        `Expected ${NUM_JOINTS} samples for a hand update, got ${samples.length}`,
      );
    }
    for (const sample of samples) {
      if (sample.hand !== hand) {
        throw new RangeError(
          `Sample for ${sample.hand} hand in a ${hand} hand update`,
        );
      }
    }

    const state = this.hands[hand];
    for (const sample of samples) {
      state.slots[sample.jointIndex] = sample;
    }
    if (deviceName !== undefined) state.deviceName = deviceName;
    state.packetCount += 1;
    state.lastUpdate = this.now();
  }

  /** Copy of the 26 current samples for one hand. */
  snapshot(hand: Hand): JointSample[] {
    return this.hands[hand].slots.slice();
  }

  packetCounts(): PacketCounts {
    return {
      left: this.hands.left.packetCount,
      right: this.hands.right.packetCount,
    };
  }

  handState(hand: Hand): HandState {
    const state = this.hands[hand];
    return {
      hand,
      joints: state.slots.slice(),
      packetCount: state.packetCount,
      lastUpdate: state.lastUpdate,
      deviceName: state.deviceName,
      hasData: state.packetCount > 0,
    };
  }

  hasData(): boolean {
    return HANDS.some((hand) => this.hands[hand].packetCount > 0);
  }

  reset(): void {
    this.hands = {
      left: emptyHand("left"),
      right: emptyHand("right"),
    };
  }
}
