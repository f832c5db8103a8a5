import { EventEmitter } from "node:events";
import type { DatagramSocket, SocketFactory } from "../../lib/connection/UdpListener";

/**
 * In-process stand-in for a dgram socket: bind() succeeds on the next tick
 * unless the port is listed as busy.
 */
export class FakeSocket extends EventEmitter implements DatagramSocket {
  boundTo: { port: number; address: string } | null = null;
  closed = false;

  constructor(private readonly busy: boolean) {
    super();
  }

  bind(port: number, address: string): this {
    queueMicrotask(() => {
      if (this.busy) {
        const error = Object.assign(new Error(`bind EADDRINUSE ${address}:${port}`), {
          code: "EADDRINUSE",
        });
        this.emit("error", error);
        return;
      }
      this.boundTo = { port, address };
      this.emit("listening");
    });
    return this;
  }

  close(callback?: () => void): this {
    this.closed = true;
    if (callback) queueMicrotask(callback);
    return this;
  }

  /** Deliver a datagram as if it arrived from the network. */
  receive(data: Uint8Array): void {
    this.emit("message", Buffer.from(data));
  }
}

export interface FakeNetwork {
  createSocket: SocketFactory;
  sockets: Map<number, FakeSocket>;
}

export function fakeNetwork(busyPorts: number[] = []): FakeNetwork {
  const sockets = new Map<number, FakeSocket>();
  return {
    sockets,
    createSocket: (port) => {
      const socket = new FakeSocket(busyPorts.includes(port));
      sockets.set(port, socket);
      return socket;
    },
  };
}
