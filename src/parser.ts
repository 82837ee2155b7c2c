// Stateless RFC 6455 frame header decoder.
//
// Header: [FIN:1][RSV:3][opcode:4] [MASK:1][len:7] [ext len:0/16/64] [key:0/32]
// Lengths must use the narrowest encoding that fits.

import type { Opcode } from "./frame.js";
import { MASKING_KEY_LENGTH } from "./masking.js";

const FIN_BIT = 0x80;
const RSV_BITS = 0x70;
const OPCODE_BITS = 0x0f;
const MASK_BIT = 0x80;
const LENGTH_BITS = 0x7f;

const LENGTH_16 = 126;
const LENGTH_64 = 127;

export const BASE_HEADER_SIZE = 2;

/** What the first two header bytes say, before any extended length. */
export interface FramePrefix {
  final: boolean;
  opcode: Opcode;
  masked: boolean;
  /** The raw 7-bit length field: a length, or 126/127 for an extension. */
  lengthCode: number;
}

export interface FrameHeader {
  final: boolean;
  opcode: Opcode;
  masked: boolean;
  maskingKey: Uint8Array | null;
  payloadLength: number;
}

export type HeaderParseResult =
  | { status: "incomplete"; prefix: FramePrefix | null }
  | { status: "invalid"; reason: string }
  | { status: "complete"; header: FrameHeader; headerLength: number };

/** Number of extended length bytes that follow the 7-bit length field. */
export function extendedLengthSize(lengthCode: number): 0 | 2 | 8 {
  if (lengthCode === LENGTH_64) return 8;
  if (lengthCode === LENGTH_16) return 2;
  return 0;
}

/** Decode the header starting at `offset`. Payload bytes are not inspected. */
export function parseFrameHeader(bytes: Uint8Array, offset = 0): HeaderParseResult {
  const available = bytes.length - offset;
  if (available < BASE_HEADER_SIZE) {
    return { status: "incomplete", prefix: null };
  }

  const b0 = bytes[offset];
  const b1 = bytes[offset + 1];
  if ((b0 & RSV_BITS) !== 0) {
    return { status: "invalid", reason: "reserved bits must be zero" };
  }

  const prefix: FramePrefix = {
    final: (b0 & FIN_BIT) !== 0,
    opcode: b0 & OPCODE_BITS,
    masked: (b1 & MASK_BIT) !== 0,
    lengthCode: b1 & LENGTH_BITS,
  };

  const extSize = extendedLengthSize(prefix.lengthCode);
  const keySize = prefix.masked ? MASKING_KEY_LENGTH : 0;
  const headerLength = BASE_HEADER_SIZE + extSize + keySize;
  if (available < headerLength) {
    return { status: "incomplete", prefix };
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, headerLength);
  let payloadLength = prefix.lengthCode;
  if (extSize === 2) {
    payloadLength = view.getUint16(BASE_HEADER_SIZE, false);
    if (payloadLength < LENGTH_16) {
      return { status: "invalid", reason: `length ${payloadLength} encoded in 16 bits` };
    }
  } else if (extSize === 8) {
    const wide = view.getBigUint64(BASE_HEADER_SIZE, false);
    if (wide >> 63n !== 0n) {
      return { status: "invalid", reason: "most significant bit of 64-bit length is set" };
    }
    if (wide <= 0xffffn) {
      return { status: "invalid", reason: `length ${wide} encoded in 64 bits` };
    }
    if (wide > BigInt(Number.MAX_SAFE_INTEGER)) {
      return { status: "invalid", reason: `length ${wide} is too large` };
    }
    payloadLength = Number(wide);
  }

  let maskingKey: Uint8Array | null = null;
  if (prefix.masked) {
    const keyStart = offset + BASE_HEADER_SIZE + extSize;
    maskingKey = bytes.slice(keyStart, keyStart + MASKING_KEY_LENGTH);
  }

  return {
    status: "complete",
    header: {
      final: prefix.final,
      opcode: prefix.opcode,
      masked: prefix.masked,
      maskingKey,
      payloadLength,
    },
    headerLength,
  };
}
