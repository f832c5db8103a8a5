/**
 * GloveEngine - command and telemetry surface of the telemetry engine.
 *
 * Owns one of each: joint state store, calibration store, recorder, playback
 * store and UDP listener. Front ends (terminal, tests) talk to this class only.
 */

import { readFile } from "node:fs/promises";
import { loadConfig, type GloveConfig } from "../lib/config";
import {
  ExportError,
  EmptyRecordingError,
  RecordingFormatError,
  describeError,
} from "../lib/errors";
import {
  buildRecordingCsv,
  buildSnapshotCsv,
  buildSnapshotRecord,
  formatFileTimestamp,
  parseRecording,
  serializeRecording,
  writeArtifact,
  type SnapshotRecord,
} from "../lib/export";
import type { Hand } from "../lib/hand/joints";
import type {
  CalibrationBaseline,
  Frame,
  HandState,
  JointSample,
  PacketCounts,
  PlaybackCursor,
  Recording,
} from "../lib/hand/types";
import type {
  ConnectionStatus,
  ListenerStats,
} from "../lib/connection/IConnection";
import { UdpListener, type SocketFactory } from "../lib/connection/UdpListener";
import { engineLog, setLogLevel } from "../lib/logger";
import {
  createCalibrationStore,
  type CalibrationStore,
} from "../store/calibrationStore";
import { JointStateStore } from "../store/JointStateStore";
import {
  createPlaybackStore,
  type PlaybackStatus,
  type PlaybackStore,
} from "../store/playbackStore";
import {
  createRecordingStore,
  type RecorderStatus,
  type RecordingStore,
} from "../store/recordingStore";

export interface GloveEngineOptions {
  config?: GloveConfig;
  createSocket?: SocketFactory;
  /** Monotonic clock in ms for the recorder and playback tickers */
  now?: () => number;
  /** Wall clock in ms for timestamps that end up in files */
  wallClock?: () => number;
}

export interface EngineStatus {
  listener: ConnectionStatus;
  boundPorts: number[];
  packets: PacketCounts;
  listenerStats: ListenerStats;
  recorder: RecorderStatus;
  recordedFrames: number;
  recordingElapsedMs: number;
  playback: PlaybackStatus;
  playbackCursor: PlaybackCursor | null;
  calibrated: boolean;
}

export interface SavedRecordingPaths {
  csv: string;
  json: string;
}

export class GloveEngine {
  readonly config: GloveConfig;
  readonly jointState: JointStateStore;
  readonly calibration: CalibrationStore;
  readonly recorder: RecordingStore;
  readonly playback: PlaybackStore;
  readonly listener: UdpListener;

  private readonly wallClock: () => number;
  /** Clip started by startPlayback() without an argument */
  private clip: Recording | null = null;

  constructor(options: GloveEngineOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.wallClock = options.wallClock ?? Date.now;
    const now = options.now ?? (() => performance.now());

    setLogLevel(this.config.logLevel);

    this.jointState = new JointStateStore({ now: this.wallClock });
    this.calibration = createCalibrationStore({
      jointState: this.jointState,
      calibrateOrientation: this.config.calibrateOrientation,
      now: this.wallClock,
    });
    this.recorder = createRecordingStore({
      source: {
        calibratedSnapshot: (hand) =>
          this.calibration.getState().calibratedSnapshot(hand),
      },
      sampleRateHz: this.config.sampleRateHz,
      now,
      wallClock: this.wallClock,
    });
    this.playback = createPlaybackStore({ now });
    this.listener = new UdpListener({
      host: this.config.host,
      ports: this.config.ports,
      portHands: this.config.portHands,
      sink: this.jointState,
      createSocket: options.createSocket,
      now: this.wallClock,
    });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /** Bind every configured port. @throws BindError */
  async start(): Promise<void> {
    await this.listener.connect();
    engineLog.info(
      `Engine running on ${this.config.host}:${this.config.ports.join(",")}`,
    );
  }

  async stop(): Promise<void> {
    this.playback.getState().stop();
    this.stopRecording();
    await this.listener.disconnect();
    engineLog.info("Engine stopped");
  }

  // ============================================================================
  // Commands
  // ============================================================================

  recalibrate(): CalibrationBaseline {
    return this.calibration.getState().recalibrate();
  }

  resetCalibration(): void {
    this.calibration.getState().reset();
  }

  /** Starting a new take discards the retained clip. */
  startRecording(): void {
    const recorder = this.recorder.getState();
    if (recorder.status === "recording") return;
    this.clip = null;
    recorder.start();
  }

  /** Frame count of the finished take, 0 when not recording. */
  stopRecording(): number {
    const recorder = this.recorder.getState();
    if (recorder.status !== "recording") return 0;
    const count = recorder.stop();
    this.clip = this.recorder.getState().getRecording();
    return count;
  }

  getRecording(): Recording | null {
    return this.recorder.getState().getRecording();
  }

  /**
   * Loop `recording`, or the latest finished / loaded clip.
   * @throws EmptyRecordingError when there is nothing to play
   */
  startPlayback(recording?: Recording): void {
    const target = recording ?? this.clip ?? this.getRecording();
    if (!target) {
      this.playback.getState().stop();
      throw new EmptyRecordingError();
    }
    this.playback.getState().start(target);
  }

  stopPlayback(): void {
    this.playback.getState().stop();
  }

  /** Calibrated pose of both hands, as of now. */
  exportSnapshot(): SnapshotRecord {
    const calibration = this.calibration.getState();
    return buildSnapshotRecord(
      {
        left: {
          state: this.jointState.handState("left"),
          joints: calibration.calibratedSnapshot("left"),
        },
        right: {
          state: this.jointState.handState("right"),
          joints: calibration.calibratedSnapshot("right"),
        },
      },
      this.wallClock(),
    );
  }

  /**
   * Write a snapshot as `<fileStem>.csv`.
   * @throws ExportError when neither hand has data or the write fails
   */
  async saveSnapshot(
    record: SnapshotRecord = this.exportSnapshot(),
    dir: string = this.config.exportDir,
  ): Promise<string> {
    if (!record.hands.left.hasData && !record.hands.right.hasData) {
      throw new ExportError("No hand data to export");
    }
    return writeArtifact(
      {
        content: buildSnapshotCsv(record, {
          includeOrientation: this.config.includeOrientationInExport,
        }),
        filename: `${record.fileStem}.csv`,
        mimeType: "text/csv",
      },
      dir,
    );
  }

  /**
   * Write a recording as CSV (for analysis) and JSON (for loadRecording).
   * @throws ExportError when there is no recording or a write fails
   */
  async saveRecording(
    recording: Recording | null = this.getRecording(),
    dir: string = this.config.exportDir,
  ): Promise<SavedRecordingPaths> {
    const csv = recording
      ? buildRecordingCsv({
          recording,
          includeOrientation: this.config.includeOrientationInExport,
        })
      : null;
    if (!recording || csv === null) {
      throw new ExportError("No recorded frames to save");
    }

    const stem = `recording_${formatFileTimestamp(new Date(recording.startedAt))}`;
    const csvPath = await writeArtifact(
      { content: csv, filename: `${stem}.csv`, mimeType: "text/csv" },
      dir,
    );
    const jsonPath = await writeArtifact(
      {
        content: serializeRecording(recording),
        filename: `${stem}.json`,
        mimeType: "application/json",
      },
      dir,
    );
    return { csv: csvPath, json: jsonPath };
  }

  /**
   * Read a recording saved by saveRecording(); it becomes the default clip.
   * @throws RecordingFormatError
   */
  async loadRecording(file: string): Promise<Recording> {
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      throw new RecordingFormatError(`Could not read ${file}`, [
        describeError(error),
      ]);
    }
    const recording = parseRecording(text);
    this.clip = recording;
    engineLog.info(
      `Loaded ${recording.id}: ${recording.frameCount} frames @ ${recording.sampleRateHz} Hz`,
    );
    return recording;
  }

  // ============================================================================
  // Telemetry reads
  // ============================================================================

  snapshot(hand: Hand): JointSample[] {
    return this.jointState.snapshot(hand);
  }

  calibratedSnapshot(hand: Hand): JointSample[] {
    return this.calibration.getState().calibratedSnapshot(hand);
  }

  handState(hand: Hand): HandState {
    return this.jointState.handState(hand);
  }

  packetCounts(): PacketCounts {
    return this.jointState.packetCounts();
  }

  currentFrame(): Frame | null {
    return this.playback.getState().currentFrame();
  }

  status(): EngineStatus {
    const recorder = this.recorder.getState();
    const playback = this.playback.getState();
    return {
      listener: this.listener.status,
      boundPorts: this.listener.boundPorts(),
      packets: this.packetCounts(),
      listenerStats: this.listener.getStats(),
      recorder: recorder.status,
      recordedFrames: recorder.frameCount,
      recordingElapsedMs: recorder.elapsedMs,
      playback: playback.status,
      playbackCursor: playback.cursor,
      calibrated: this.calibration.getState().baseline.capturedAt !== null,
    };
  }
}
