export { buildRecordingCsv, DEFAULT_EXPORT_CHUNK_SIZE } from "./buildRecordingCsv";
export { buildSnapshotCsv, type SnapshotCsvOptions } from "./buildSnapshotCsv";
export {
  parseRecording,
  RECORDING_FILE_VERSION,
  recordingFileSchema,
  serializeRecording,
  toRecordingFile,
  type RecordingFile,
} from "./recordingFile";
export {
  buildSnapshotRecord,
  formatFileTimestamp,
  snapshotFileStem,
  type SnapshotHand,
  type SnapshotHandInput,
  type SnapshotJointRow,
  type SnapshotRecord,
} from "./snapshotRecord";
export { writeArtifact, type ExportArtifact } from "./writeArtifact";
