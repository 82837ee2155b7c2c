// Byte transport consumed by FrameStream, plus an adapter for Node
// duplex streams (a net.Socket or tls.TLSSocket after the HTTP upgrade).

import type { Duplex } from "node:stream";
import { ByteBuffer } from "./bytebuffer.js";
import { ConnectionClosedError } from "./errors.js";

/**
 * Duplex byte channel. Each call settles exactly once.
 *
 * - `read` resolves with the number of bytes copied into `into`; 0 means
 *   the peer closed. Rejecting with ConnectionClosedError is the same
 *   signal. Any other rejection is a transport error.
 * - `write` resolves with the number of bytes accepted, which may be
 *   fewer than `from.length`.
 */
export interface Transport {
  read(into: Uint8Array): Promise<number>;
  write(from: Uint8Array): Promise<number>;
  destroy(): void;
}

// --- SocketTransport ---

/** Transport over a Node `Duplex`. Inbound chunks queue until read. */
export class SocketTransport implements Transport {
  private socket: Duplex;
  private inbound = new ByteBuffer();

  constructor(socket: Duplex) {
    this.socket = socket;

    this.socket.on("data", (chunk: Buffer) => this.inbound.push(chunk));
    this.socket.on("end", () => this.inbound.close());
    this.socket.on("close", () => this.inbound.close());
    this.socket.on("error", (err: Error) => this.inbound.close(err));
  }

  read(into: Uint8Array): Promise<number> {
    return this.inbound.readInto(into);
  }

  write(from: Uint8Array): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      this.socket.write(from, (err?: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve(from.length);
        }
      });
    });
  }

  destroy(): void {
    this.inbound.close(new ConnectionClosedError("transport destroyed"));
    this.socket.destroy();
  }
}
