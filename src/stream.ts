// FrameStream: one WebSocket connection's frame layer, between a byte
// transport and the session layer.

import { FrameAssembler } from "./assembler.js";
import { ConnectionClosedError, StreamDestroyedError } from "./errors.js";
import type { Frame } from "./frame.js";
import { type Logger, silentLogger } from "./logger.js";
import { type MaskingKeyGenerator, randomMaskingKey } from "./masking.js";
import { FrameWriter } from "./serializer.js";
import type { Transport } from "./transport.js";

export interface FrameStreamOptions {
  /** Bytes read during the handshake that belong to the first frame(s). */
  carryover?: Uint8Array;
  /** Negotiated Sec-WebSocket-Extensions value. */
  extensions?: string;
  /** Negotiated Sec-WebSocket-Protocol value. */
  subProtocol?: string;
  /** Defaults to 4 random bytes per frame. */
  generateMaskingKey?: MaskingKeyGenerator;
  acceptMaskedFrames?: boolean;
  /** Size of each transport read. Defaults to 4096. */
  readBufferSize?: number;
  logger?: Logger;
}

/** Callbacks for push-based frame consumption. */
export interface FrameListener {
  onFrame: (frame: Frame) => void;
  onError?: (err: Error) => void;
  onEnd?: () => void;
}

/**
 * Owns a transport and exposes frame-level reads and writes over it.
 *
 * At most one `readFrames` and one `writeFrames` may be outstanding at a
 * time; the two are independent of each other.
 */
export class FrameStream implements AsyncIterable<Frame> {
  private transport: Transport;
  private assembler: FrameAssembler;
  private writer: FrameWriter;
  private extensions: string;
  private subProtocol: string;
  private logger: Logger;
  private destroyed = false;

  constructor(transport: Transport, options: FrameStreamOptions = {}) {
    this.transport = transport;
    this.extensions = options.extensions ?? "";
    this.subProtocol = options.subProtocol ?? "";
    this.logger = options.logger ?? silentLogger;
    this.assembler = new FrameAssembler(transport, {
      carryover: options.carryover,
      acceptMaskedFrames: options.acceptMaskedFrames,
      readBufferSize: options.readBufferSize,
      logger: this.logger,
    });
    this.writer = new FrameWriter(transport, {
      generateMaskingKey: options.generateMaskingKey ?? randomMaskingKey,
      logger: this.logger,
    });
  }

  /**
   * Append at least one frame to `out`.
   *
   * Rejects with ConnectionClosedError on orderly close and ProtocolError
   * on a framing violation; both are terminal. Transport errors reject
   * unchanged. Frames appended before a rejection stay in `out`.
   */
  readFrames(out: Frame[]): Promise<void> {
    return this.assembler.readFrames(out);
  }

  /** Write all frames, masked, in order. Resolves once every byte is written. */
  writeFrames(frames: readonly Frame[]): Promise<void> {
    return this.writer.writeFrames(frames);
  }

  getExtensions(): string {
    return this.extensions;
  }

  getSubProtocol(): string {
    return this.subProtocol;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Destroy the transport. Outstanding and later operations reject with
   * StreamDestroyedError.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    const err = new StreamDestroyedError();
    this.assembler.fail(err);
    this.writer.fail(err);
    this.transport.destroy();
    this.logger.debug("websocket stream destroyed");
  }

  /** Iterate over frames until the connection closes. */
  async *[Symbol.asyncIterator](): AsyncIterator<Frame> {
    for (;;) {
      const frames: Frame[] = [];
      try {
        await this.readFrames(frames);
      } catch (e) {
        yield* frames;
        if (e instanceof ConnectionClosedError) return;
        throw e;
      }
      yield* frames;
    }
  }

  /**
   * Push-based consumption: starts a background read loop that
   * dispatches to callbacks.
   *
   * @example
   * stream.listen({
   *   onFrame: (frame) => session.handleFrame(frame),
   *   onError: (err) => session.fail(err),
   *   onEnd: () => session.closed(),
   * });
   */
  listen(callbacks: FrameListener): void {
    void this.readLoop(callbacks);
  }

  private async readLoop(cb: FrameListener): Promise<void> {
    try {
      for await (const frame of this) {
        cb.onFrame(frame);
      }
      cb.onEnd?.();
    } catch (e) {
      this.report(cb, e instanceof Error ? e : new Error(String(e)));
    }
  }

  // Nothing awaits the read loop, so a throwing onError ends up here.
  private report(cb: FrameListener, err: Error): void {
    if (!cb.onError) {
      this.logger.warn(`websocket read loop failed: ${err.message}`);
      return;
    }
    try {
      cb.onError(err);
    } catch (cbErr) {
      this.logger.warn("websocket onError callback threw", cbErr);
    }
  }
}
