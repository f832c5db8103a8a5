import type { DecodeErrorReason } from "../errors";

export type ConnectionStatus =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

export interface ListenerStats {
  datagrams: number;
  decodeErrors: number;
  decodeErrorsByReason: Record<DecodeErrorReason, number>;
  samplesApplied: number;
  /** Wall-clock ms of the last datagram, null before the first */
  lastDatagramAt: number | null;
}

export interface IConnection {
  type: "udp";
  status: ConnectionStatus;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  // Callbacks
  onStatus(callback: (status: ConnectionStatus) => void): () => void;

  getStats(): ListenerStats;
}
