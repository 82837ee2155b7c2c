// Write side of FrameStream: encodes masked frames and drives transport
// writes until every byte has been accepted.

import {
  type Frame,
  MAX_CONTROL_PAYLOAD,
  isControlOpcode,
  isReservedOpcode,
} from "./frame.js";
import { OperationInProgressError, ProtocolError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { MASKING_KEY_LENGTH, type MaskingKeyGenerator, applyMask } from "./masking.js";
import { BASE_HEADER_SIZE } from "./parser.js";
import type { Transport } from "./transport.js";

const FIN_BIT = 0x80;
const MASK_BIT = 0x80;

/** Size of the masked header for a payload of `payloadLength` bytes. */
export function frameHeaderSize(payloadLength: number): number {
  let size = BASE_HEADER_SIZE + MASKING_KEY_LENGTH;
  if (payloadLength > 0xffff) {
    size += 8;
  } else if (payloadLength > MAX_CONTROL_PAYLOAD) {
    size += 2;
  }
  return size;
}

/**
 * Encode `frame` as masked wire bytes: header with the narrowest length
 * encoding, the masking key, then the masked payload. `frame.payload` is
 * left untouched.
 */
export function encodeFrame(frame: Frame, maskingKey: Uint8Array): Uint8Array {
  if (maskingKey.length !== MASKING_KEY_LENGTH) {
    throw new RangeError(`masking key must be ${MASKING_KEY_LENGTH} bytes, got ${maskingKey.length}`);
  }

  const { payload } = frame;
  const headerSize = frameHeaderSize(payload.length);
  const out = new Uint8Array(headerSize + payload.length);
  const view = new DataView(out.buffer);

  out[0] = (frame.final ? FIN_BIT : 0) | (frame.opcode & 0x0f);
  let offset = BASE_HEADER_SIZE;
  if (payload.length > 0xffff) {
    out[1] = MASK_BIT | 127;
    view.setBigUint64(offset, BigInt(payload.length), false);
    offset += 8;
  } else if (payload.length > MAX_CONTROL_PAYLOAD) {
    out[1] = MASK_BIT | 126;
    view.setUint16(offset, payload.length, false);
    offset += 2;
  } else {
    out[1] = MASK_BIT | payload.length;
  }

  out.set(maskingKey, offset);
  offset += MASKING_KEY_LENGTH;

  const body = out.subarray(offset);
  body.set(payload);
  applyMask(body, maskingKey);
  return out;
}

function checkOutboundFrame(frame: Frame): void {
  if (!Number.isInteger(frame.opcode) || frame.opcode < 0 || frame.opcode > 0x0f) {
    throw new ProtocolError(`invalid opcode ${frame.opcode}`);
  }
  if (isReservedOpcode(frame.opcode)) {
    throw new ProtocolError(`cannot send reserved opcode 0x${frame.opcode.toString(16)}`);
  }
  if (isControlOpcode(frame.opcode)) {
    if (!frame.final) {
      throw new ProtocolError("cannot send a fragmented control frame");
    }
    if (frame.payload.length > MAX_CONTROL_PAYLOAD) {
      throw new ProtocolError(`control frame payload exceeds ${MAX_CONTROL_PAYLOAD} bytes`);
    }
  }
}

// --- FrameWriter ---

export interface FrameWriterOptions {
  generateMaskingKey: MaskingKeyGenerator;
  logger?: Logger;
}

/** Serializes frame lists and writes them in order, one list at a time. */
export class FrameWriter {
  private transport: Transport;
  private generateMaskingKey: MaskingKeyGenerator;
  private logger: Logger;

  // Write progress for the outstanding writeFrames call.
  private pending: Uint8Array | null = null;
  private cursor = 0;
  private failure: Error | null = null;
  private interrupt: ((err: Error) => void) | null = null;

  constructor(transport: Transport, options: FrameWriterOptions) {
    this.transport = transport;
    this.generateMaskingKey = options.generateMaskingKey;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Write every frame, in order. Resolves only once the transport has
   * accepted the last byte; a transport error rejects unchanged.
   */
  async writeFrames(frames: readonly Frame[]): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.pending) throw new OperationInProgressError("writeFrames");

    for (const frame of frames) {
      checkOutboundFrame(frame);
    }
    const encoded = frames.map((frame) => encodeFrame(frame, this.generateMaskingKey()));
    const total = encoded.reduce((sum, bytes) => sum + bytes.length, 0);
    if (total === 0) return;

    const buffer = new Uint8Array(total);
    let offset = 0;
    for (const bytes of encoded) {
      buffer.set(bytes, offset);
      offset += bytes.length;
    }

    this.pending = buffer;
    this.cursor = 0;
    try {
      while (this.cursor < buffer.length) {
        const written = await this.untilFailed(this.transport.write(buffer.subarray(this.cursor)));
        if (written === 0) {
          // Not ready yet: give timers and I/O a turn before retrying.
          await new Promise<void>((resolve) => setImmediate(resolve));
        }
        if (this.failure) throw this.failure;
        this.cursor += written;
      }
      this.logger.debug(`websocket wrote ${frames.length} frame(s), ${total} bytes`);
    } catch (err) {
      if (this.failure) throw this.failure;
      throw err;
    } finally {
      this.pending = null;
      this.cursor = 0;
    }
  }

  /** Make the writer terminal; an outstanding write rejects with `err` at once. */
  fail(err: Error): void {
    this.failure = err;
    this.interrupt?.(err);
  }

  private untilFailed<T>(op: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.interrupt = reject;
      op.then(resolve, reject);
    }).finally(() => {
      this.interrupt = null;
    });
  }
}
