// WebSocket frame model (RFC 6455 section 5.2).

// --- Opcodes ---

export const Opcode = {
  Continuation: 0x0,
  Text: 0x1,
  Binary: 0x2,
  Close: 0x8,
  Ping: 0x9,
  Pong: 0xa,
} as const;

/** A 4-bit opcode. Values outside the named ones are reserved. */
export type Opcode = number;

/** Control frames may not be fragmented and may not exceed this payload size. */
export const MAX_CONTROL_PAYLOAD = 125;

/** Close, Ping, Pong and the reserved control range 0xB-0xF. */
export function isControlOpcode(opcode: Opcode): boolean {
  return (opcode & 0x08) !== 0;
}

export function isDataOpcode(opcode: Opcode): boolean {
  return !isControlOpcode(opcode);
}

export function isReservedOpcode(opcode: Opcode): boolean {
  return (opcode >= 0x3 && opcode <= 0x7) || opcode >= 0xb;
}

// --- Frame ---

/**
 * One protocol frame as seen by the session layer.
 *
 * On the read side a frame may be a piece of a larger wire frame: its
 * `payloadLength` is the size of the bytes it carries, not the size the
 * wire header declared.
 */
export interface Frame {
  opcode: Opcode;
  final: boolean;
  masked: boolean;
  payloadLength: number;
  payload: Uint8Array;
}

export interface CreateFrameOptions {
  opcode: Opcode;
  final?: boolean;
  payload?: Uint8Array;
}

/** Build an outbound frame. Outbound frames are always masked. */
export function createFrame({
  opcode,
  final = true,
  payload = new Uint8Array(0),
}: CreateFrameOptions): Frame {
  return {
    opcode,
    final,
    masked: true,
    payloadLength: payload.length,
    payload,
  };
}
