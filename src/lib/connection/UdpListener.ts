/**
 * UdpListener - owns the glove UDP sockets.
 *
 * One socket per configured port. Every datagram is decoded on arrival and
 * the samples go straight into the pose sink (the joint state store); nothing
 * here waits on a consumer. Bad datagrams are counted and dropped.
 *
 * A port that cannot be bound aborts connect(): sockets opened so far are
 * closed and a BindError for that port is thrown.
 */

import * as dgram from "node:dgram";
import { BindError, describeError, type DecodeErrorReason } from "../errors";
import type { Hand } from "../hand/joints";
import { listenerLog } from "../logger";
import type { PoseSink } from "../../store/JointStateStore";
import type {
  ConnectionStatus,
  IConnection,
  ListenerStats,
} from "./IConnection";
import { decodeDatagram, type DecodedPacket } from "./PoseDecoder";

/** The slice of dgram.Socket the listener uses. */
export interface DatagramSocket {
  bind(port: number, address: string): unknown;
  close(callback?: () => void): unknown;
  on(event: "message", listener: (msg: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  once(event: "listening", listener: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  off(event: "error", listener: (err: Error) => void): unknown;
}

export type SocketFactory = (port: number) => DatagramSocket;

export interface UdpListenerOptions {
  host: string;
  ports: readonly number[];
  sink: PoseSink;
  /** Hand for per-port addresses without a hand segment */
  portHands?: Readonly<Record<string, Hand>>;
  createSocket?: SocketFactory;
  now?: () => number;
}

const DECODE_ERROR_LOG_INTERVAL_MS = 5000;

const defaultSocketFactory: SocketFactory = () =>
  dgram.createSocket({ type: "udp4", reuseAddr: false });

function emptyReasonCounts(): Record<DecodeErrorReason, number> {
  return {
    "malformed-packet": 0,
    "unknown-address": 0,
    "argument-count": 0,
    "invalid-argument": 0,
  };
}

export class UdpListener implements IConnection {
  readonly type = "udp" as const;
  status: ConnectionStatus = "disconnected";

  private readonly options: UdpListenerOptions;
  private readonly createSocket: SocketFactory;
  private readonly now: () => number;
  private sockets = new Map<number, DatagramSocket>();
  private statusListeners = new Set<(status: ConnectionStatus) => void>();

  private stats: ListenerStats = {
    datagrams: 0,
    decodeErrors: 0,
    decodeErrorsByReason: emptyReasonCounts(),
    samplesApplied: 0,
    lastDatagramAt: null,
  };
  private lastDecodeErrorLog = 0;
  private suppressedDecodeErrors = 0;

  constructor(options: UdpListenerOptions) {
    this.options = options;
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.now = options.now ?? Date.now;
  }

  async connect(): Promise<void> {
    if (this.status === "connected" || this.status === "connecting") return;
    this.setStatus("connecting");

    const { host, ports } = this.options;
    try {
      for (const port of ports) {
        const socket = this.createSocket(port);
        socket.on("message", (msg) => this.handleDatagram(port, msg));
        await this.bindSocket(socket, port, host);
        socket.on("error", (err) => {
          listenerLog.error(`Socket error on port ${port}`, err);
        });
        this.sockets.set(port, socket);
        listenerLog.info(`Listening on ${host}:${port}`);
      }
    } catch (error) {
      await this.closeAll();
      this.setStatus("error");
      listenerLog.error(describeError(error));
      throw error;
    }

    this.setStatus("connected");
  }

  async disconnect(): Promise<void> {
    if (this.sockets.size === 0 && this.status === "disconnected") return;
    await this.closeAll();
    this.setStatus("disconnected");
    listenerLog.info("All sockets closed");
  }

  onStatus(callback: (status: ConnectionStatus) => void): () => void {
    this.statusListeners.add(callback);
    return () => {
      this.statusListeners.delete(callback);
    };
  }

  getStats(): ListenerStats {
    return {
      ...this.stats,
      decodeErrorsByReason: { ...this.stats.decodeErrorsByReason },
    };
  }

  boundPorts(): number[] {
    return Array.from(this.sockets.keys());
  }

  /**
   * Decode one datagram and apply it. Exposed for replaying captured traffic.
   */
  handleDatagram(port: number, data: Uint8Array): void {
    this.stats.datagrams += 1;
    this.stats.lastDatagramAt = this.now();

    const portHand = this.options.portHands?.[String(port)];
    const result = decodeDatagram(data, { portHand });
    if (!result.ok) {
      this.stats.decodeErrors += 1;
      this.stats.decodeErrorsByReason[result.error.reason] += 1;
      this.reportDecodeError(port, result.error.message);
      return;
    }

    for (const packet of result.packets) {
      this.apply(packet);
    }
  }

  private apply(packet: DecodedPacket): void {
    const { sink } = this.options;
    if (packet.kind === "joint") {
      sink.update(packet.sample);
      this.stats.samplesApplied += 1;
    } else {
      sink.updateHand(packet.hand, packet.samples, packet.deviceName);
      this.stats.samplesApplied += packet.samples.length;
    }
  }

  private reportDecodeError(port: number, message: string): void {
    const now = this.now();
    if (now - this.lastDecodeErrorLog < DECODE_ERROR_LOG_INTERVAL_MS) {
      this.suppressedDecodeErrors += 1;
      return;
    }
    const suppressed = this.suppressedDecodeErrors;
    this.lastDecodeErrorLog = now;
    this.suppressedDecodeErrors = 0;
    listenerLog.debug(
      `Dropped datagram on port ${port}: ${message}` +
        (suppressed > 0 ? ` (+${suppressed} more since last report)` : ""),
    );
  }

  private bindSocket(
    socket: DatagramSocket,
    port: number,
    host: string,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        try {
          socket.close();
        } catch (closeError) {
          listenerLog.debug(
            `Close after failed bind on ${port}: ${describeError(closeError)}`,
          );
        }
        reject(new BindError(port, host, { cause: err }));
      };
      socket.once("error", onError);
      socket.once("listening", () => {
        socket.off("error", onError);
        resolve();
      });
      socket.bind(port, host);
    });
  }

  private async closeAll(): Promise<void> {
    const sockets = Array.from(this.sockets.values());
    this.sockets.clear();
    await Promise.all(
      sockets.map(
        (socket) =>
          new Promise<void>((resolve) => {
            socket.close(() => resolve());
          }),
      ),
    );
  }

  private setStatus(status: ConnectionStatus): void {
    if (this.status === status) return;
    this.status = status;
    for (const listener of this.statusListeners) {
      listener(status);
    }
  }
}
