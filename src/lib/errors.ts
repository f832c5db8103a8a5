/**
 * Error taxonomy for the telemetry engine.
 *
 * Only BindError and ExportError are meant to reach the operator.
 * DecodeError never leaves the Listener: it is returned by the decoder and
 * folded into counters.
 */

export type GloveErrorCode =
  | "BIND_FAILED"
  | "DECODE_FAILED"
  | "EMPTY_RECORDING"
  | "EXPORT_FAILED"
  | "RECORDING_FORMAT"
  | "INVALID_CONFIG";

export abstract class GloveError extends Error {
  abstract readonly code: GloveErrorCode;
}

export class BindError extends GloveError {
  readonly code = "BIND_FAILED";

  constructor(
    public readonly port: number,
    public readonly host: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not bind UDP ${host}:${port}`, options);
    this.name = "BindError";
  }
}

export type DecodeErrorReason =
  | "malformed-packet"
  | "unknown-address"
  | "argument-count"
  | "invalid-argument";

export class DecodeError extends GloveError {
  readonly code = "DECODE_FAILED";

  constructor(
    public readonly reason: DecodeErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

export class EmptyRecordingError extends GloveError {
  readonly code = "EMPTY_RECORDING";

  constructor() {
    super("Cannot play back a recording with no frames");
    this.name = "EmptyRecordingError";
  }
}

export class ExportError extends GloveError {
  readonly code = "EXPORT_FAILED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
  }
}

export class RecordingFormatError extends GloveError {
  readonly code = "RECORDING_FORMAT";

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "RecordingFormatError";
  }
}

export class ConfigError extends GloveError {
  readonly code = "INVALID_CONFIG";

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
