import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Hand } from "../lib/hand/joints";
import type { JointSample } from "../lib/hand/types";
import { createRecordingStore, type CalibratedPoseSource } from "./recordingStore";
import { handSamples } from "../tests/helpers/samples";

const STARTED_AT = 1_700_000_000_000;

function fakeSource(): CalibratedPoseSource & { setOffset(value: number): void } {
  let offset = 0;
  return {
    setOffset: (value) => {
      offset = value;
    },
    calibratedSnapshot: (hand: Hand): JointSample[] => handSamples(hand, offset),
  };
}

describe("recordingStore", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function setup(sampleRateHz = 60) {
    const source = fakeSource();
    const store = createRecordingStore({
      source,
      sampleRateHz,
      now: () => Date.now(),
      wallClock: () => STARTED_AT,
    });
    return { source, store };
  }

  it("should start idle with no recording", () => {
    const { store } = setup();

    expect(store.getState().status).toBe("idle");
    expect(store.getState().getRecording()).toBeNull();
  });

  it("should record about 60 frames per second", () => {
    const { store } = setup();

    store.getState().start();
    vi.advanceTimersByTime(1000);
    const count = store.getState().stop();

    expect(count).toBe(60);
    expect(store.getState().getRecording()?.frameCount).toBe(60);
  });

  it("should record frames with strictly increasing indices and timestamps", () => {
    const { store } = setup();

    store.getState().start();
    vi.advanceTimersByTime(500);
    store.getState().stop();

    const frames = store.getState().getRecording()?.frames ?? [];
    expect(frames.length).toBe(30);
    frames.forEach((frame, i) => {
      expect(frame.index).toBe(i);
      if (i > 0) {
        expect(frame.timestamp).toBeGreaterThan(frames[i - 1].timestamp);
      }
    });
  });

  it("should hide the recording while recording", () => {
    const { store } = setup();

    store.getState().start();
    vi.advanceTimersByTime(100);

    expect(store.getState().status).toBe("recording");
    expect(store.getState().getRecording()).toBeNull();
    expect(store.getState().frameCount).toBe(6);
  });

  it("should sample the calibrated source on each tick", () => {
    const { source, store } = setup(10);

    store.getState().start();
    vi.advanceTimersByTime(100);
    source.setOffset(0.5);
    vi.advanceTimersByTime(100);
    store.getState().stop();

    const frames = store.getState().getRecording()?.frames ?? [];
    expect(frames.map((f) => f.left[3].position.x)).toEqual([3, 3.5]);
    expect(frames.map((f) => f.timestamp)).toEqual([100, 200]);
    expect(frames[0].right[3].hand).toBe("right");
  });

  it("should freeze the finished recording", () => {
    const { store } = setup(10);

    store.getState().start();
    vi.advanceTimersByTime(300);
    store.getState().stop();

    const recording = store.getState().getRecording();
    expect(recording).toMatchObject({
      id: `take-${STARTED_AT}-1`,
      startedAt: STARTED_AT,
      sampleRateHz: 10,
      frameCount: 3,
      durationMs: 300,
    });
    expect(Object.isFrozen(recording)).toBe(true);
    expect(Object.isFrozen(recording?.frames)).toBe(true);
    expect(Object.isFrozen(recording?.frames[0])).toBe(true);
  });

  it("should stop sampling before stop() returns", () => {
    const { store } = setup();

    store.getState().start();
    vi.advanceTimersByTime(200);
    const count = store.getState().stop();
    vi.advanceTimersByTime(1000);

    expect(store.getState().getRecording()?.frameCount).toBe(count);
    expect(store.getState().frameCount).toBe(count);
  });

  it("should return 0 from stop() when idle", () => {
    const { store } = setup();

    expect(store.getState().stop()).toBe(0);
    expect(store.getState().status).toBe("idle");
  });

  it("should ignore start() while recording", () => {
    const { store } = setup(10);

    store.getState().start();
    vi.advanceTimersByTime(200);
    store.getState().start();
    vi.advanceTimersByTime(100);

    expect(store.getState().stop()).toBe(3);
  });

  it("should discard the previous recording on a new start()", () => {
    const { store } = setup(10);
    store.getState().start();
    vi.advanceTimersByTime(500);
    store.getState().stop();

    store.getState().start();
    vi.advanceTimersByTime(200);
    store.getState().stop();

    const recording = store.getState().getRecording();
    expect(recording?.frameCount).toBe(2);
    expect(recording?.id).toBe(`take-${STARTED_AT}-2`);
  });

  it("should produce an empty recording when stopped before the first tick", () => {
    const { store } = setup();

    store.getState().start();
    expect(store.getState().stop()).toBe(0);

    expect(store.getState().getRecording()).toMatchObject({
      frameCount: 0,
      durationMs: 0,
      frames: [],
    });
  });

  it("should skip a sample whose timestamp did not advance", () => {
    const { store } = setup();

    store.getState().start();
    vi.advanceTimersByTime(17);
    const duplicate = store.getState().sampleFrame();
    store.getState().stop();

    expect(duplicate).toBeNull();
    expect(store.getState().getRecording()?.frameCount).toBe(1);
  });
});
