// Read side of FrameStream: drives transport reads, decodes headers and
// applies RFC 6455 fragmentation and control-frame rules.
//
// Data frames are surfaced piecewise, one piece per read chunk, so a
// large payload is never buffered whole. Control frames are held back
// until complete and surfaced as a single final frame.

import {
  type Frame,
  MAX_CONTROL_PAYLOAD,
  Opcode,
  isControlOpcode,
  isReservedOpcode,
} from "./frame.js";
import { ConnectionClosedError, OperationInProgressError, ProtocolError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { applyMask } from "./masking.js";
import { type FrameHeader, parseFrameHeader } from "./parser.js";
import type { Transport } from "./transport.js";

export const DEFAULT_READ_BUFFER_SIZE = 4096;

export interface FrameAssemblerOptions {
  /** Bytes the handshake read past the end of the HTTP response. */
  carryover?: Uint8Array;
  /** Accept (and unmask) masked inbound frames instead of failing. */
  acceptMaskedFrames?: boolean;
  readBufferSize?: number;
  logger?: Logger;
}

// Progress through the payload of the wire frame being delivered.
interface PayloadProgress {
  header: FrameHeader;
  received: number;
}

interface ControlProgress extends PayloadProgress {
  payload: Uint8Array;
}

/** The fields of a header that policy is checked against. */
interface HeaderFields {
  final: boolean;
  opcode: Opcode;
  masked: boolean;
}

export class FrameAssembler {
  private transport: Transport;
  private carryover: Uint8Array | null;
  private acceptMaskedFrames: boolean;
  private logger: Logger;
  private readBuffer: Uint8Array;

  private buffer = new Uint8Array(0);
  private inMessage = false;
  private messageOpcode: Opcode = Opcode.Continuation;
  private currentData: PayloadProgress | null = null;
  private pendingControl: ControlProgress | null = null;

  private reading = false;
  private failure: Error | null = null;
  // Rejects the transport read in flight, if any.
  private interrupt: ((err: Error) => void) | null = null;

  constructor(transport: Transport, options: FrameAssemblerOptions = {}) {
    const readBufferSize = options.readBufferSize ?? DEFAULT_READ_BUFFER_SIZE;
    if (!Number.isInteger(readBufferSize) || readBufferSize <= 0) {
      throw new RangeError(`readBufferSize must be a positive integer, got ${readBufferSize}`);
    }
    this.transport = transport;
    this.carryover = options.carryover && options.carryover.length > 0 ? options.carryover : null;
    this.acceptMaskedFrames = options.acceptMaskedFrames ?? false;
    this.logger = options.logger ?? silentLogger;
    this.readBuffer = new Uint8Array(readBufferSize);
  }

  /** Opcode of the data message whose fragments are still arriving, if any. */
  get openMessageOpcode(): Opcode | null {
    return this.inMessage ? this.messageOpcode : null;
  }

  /**
   * Append at least one frame to `out`, reading from the transport as
   * needed. Frames appended before a rejection stay in `out`.
   */
  async readFrames(out: Frame[]): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.reading) throw new OperationInProgressError("readFrames");

    this.reading = true;
    try {
      await this.fill(out);
    } catch (err) {
      if (!this.failure && (err instanceof ProtocolError || err instanceof ConnectionClosedError)) {
        this.fail(err);
      }
      throw err;
    } finally {
      this.reading = false;
    }
  }

  /**
   * Make the assembler terminal. An outstanding read rejects with `err`
   * at once, without waiting for its transport read.
   */
  fail(err: Error): void {
    if (err instanceof ProtocolError) {
      this.logger.warn(`websocket read failed: ${err.reason}`);
    }
    this.failure = err;
    this.interrupt?.(err);
    this.buffer = new Uint8Array(0);
    this.currentData = null;
    this.pendingControl = null;
    this.inMessage = false;
  }

  private async fill(out: Frame[]): Promise<void> {
    const start = out.length;

    if (this.carryover) {
      this.append(this.carryover);
      this.carryover = null;
    }
    this.drain(out);

    while (out.length === start) {
      this.append(await this.readChunk());
      this.drain(out);
    }
    this.logger.debug(`websocket read surfaced ${out.length - start} frame(s)`);
  }

  private async readChunk(): Promise<Uint8Array> {
    let n: number;
    try {
      n = await this.untilFailed(this.transport.read(this.readBuffer));
    } catch (err) {
      if (this.failure) throw this.failure;
      throw err;
    }
    if (this.failure) throw this.failure;
    if (n === 0) throw new ConnectionClosedError();
    return this.readBuffer.subarray(0, n);
  }

  /** Settles with `op`, or rejects as soon as `fail` is called. */
  private untilFailed<T>(op: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.interrupt = reject;
      op.then(resolve, reject);
    }).finally(() => {
      this.interrupt = null;
    });
  }

  private append(bytes: Uint8Array): void {
    if (this.buffer.length === 0) {
      this.buffer = bytes.slice();
      return;
    }
    const joined = new Uint8Array(this.buffer.length + bytes.length);
    joined.set(this.buffer, 0);
    joined.set(bytes, this.buffer.length);
    this.buffer = joined;
  }

  private take(n: number): Uint8Array {
    const taken = this.buffer.slice(0, n);
    this.buffer = this.buffer.subarray(n);
    return taken;
  }

  // Surface everything the buffered bytes allow. Leaves at most a
  // partial header in the buffer.
  private drain(out: Frame[]): void {
    for (;;) {
      if (this.pendingControl) {
        if (!this.continueControl(out)) return;
      } else if (this.currentData) {
        if (!this.continueData(out)) return;
      } else if (!this.startFrame()) {
        return;
      }
    }
  }

  private startFrame(): boolean {
    const result = parseFrameHeader(this.buffer);
    switch (result.status) {
      case "incomplete":
        // Two bytes are enough to reject a control frame, before any
        // extended length arrives.
        if (result.prefix) {
          this.checkHeader(result.prefix, result.prefix.lengthCode);
        }
        return false;

      case "invalid":
        throw new ProtocolError(result.reason);

      case "complete": {
        const { header, headerLength } = result;
        this.checkHeader(header, header.payloadLength);
        this.take(headerLength);
        if (isControlOpcode(header.opcode)) {
          this.pendingControl = {
            header,
            received: 0,
            payload: new Uint8Array(header.payloadLength),
          };
        } else {
          this.currentData = { header, received: 0 };
        }
        return true;
      }
    }
  }

  private checkHeader(header: HeaderFields, declaredLength: number): void {
    const { final, opcode, masked } = header;
    if (isReservedOpcode(opcode)) {
      throw new ProtocolError(`reserved opcode 0x${opcode.toString(16)}`);
    }
    if (masked && !this.acceptMaskedFrames) {
      throw new ProtocolError("unexpected masked frame");
    }
    if (isControlOpcode(opcode)) {
      if (!final) {
        throw new ProtocolError("control frame is fragmented");
      }
      if (declaredLength > MAX_CONTROL_PAYLOAD) {
        throw new ProtocolError(`control frame payload exceeds ${MAX_CONTROL_PAYLOAD} bytes`);
      }
      return;
    }
    if (opcode === Opcode.Continuation && !this.inMessage) {
      throw new ProtocolError("continuation frame outside a message");
    }
    if (opcode !== Opcode.Continuation && this.inMessage) {
      throw new ProtocolError("expected a continuation frame");
    }
  }

  private continueControl(out: Frame[]): boolean {
    const progress = this.pendingControl;
    if (!progress) return false;
    const { header, payload } = progress;

    const want = header.payloadLength - progress.received;
    const piece = this.take(Math.min(want, this.buffer.length));
    if (header.maskingKey) {
      applyMask(piece, header.maskingKey, progress.received);
    }
    payload.set(piece, progress.received);
    progress.received += piece.length;

    if (progress.received < header.payloadLength) return false;

    this.pendingControl = null;
    out.push({
      opcode: header.opcode,
      final: true,
      masked: header.masked,
      payloadLength: payload.length,
      payload,
    });
    return true;
  }

  private continueData(out: Frame[]): boolean {
    const progress = this.currentData;
    if (!progress) return false;
    const { header } = progress;

    const remaining = header.payloadLength - progress.received;
    if (remaining > 0 && this.buffer.length === 0) return false;

    const firstPiece = progress.received === 0;
    const piece = this.take(Math.min(remaining, this.buffer.length));
    if (header.maskingKey) {
      applyMask(piece, header.maskingKey, progress.received);
    }
    progress.received += piece.length;

    const complete = progress.received === header.payloadLength;
    const final = header.final && complete;
    if (firstPiece && header.opcode !== Opcode.Continuation) {
      this.messageOpcode = header.opcode;
    }
    this.inMessage = !final;
    if (complete) {
      this.currentData = null;
    }

    out.push({
      opcode: firstPiece ? header.opcode : Opcode.Continuation,
      final,
      masked: header.masked,
      payloadLength: piece.length,
      payload: piece,
    });
    return true;
  }
}
