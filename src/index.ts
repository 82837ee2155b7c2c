// Public API
export { FrameStream } from "./stream.js";
export type { FrameStreamOptions, FrameListener } from "./stream.js";
export { FrameAssembler, DEFAULT_READ_BUFFER_SIZE } from "./assembler.js";
export type { FrameAssemblerOptions } from "./assembler.js";
export { FrameWriter, encodeFrame, frameHeaderSize } from "./serializer.js";
export type { FrameWriterOptions } from "./serializer.js";
export { parseFrameHeader, extendedLengthSize } from "./parser.js";
export type { FrameHeader, FramePrefix, HeaderParseResult } from "./parser.js";
export {
  Opcode,
  MAX_CONTROL_PAYLOAD,
  createFrame,
  isControlOpcode,
  isDataOpcode,
  isReservedOpcode,
} from "./frame.js";
export type { Frame, CreateFrameOptions } from "./frame.js";
export {
  applyMask,
  nullMaskingKey,
  randomMaskingKey,
  MASKING_KEY_LENGTH,
} from "./masking.js";
export type { MaskingKeyGenerator } from "./masking.js";
export { SocketTransport } from "./transport.js";
export type { Transport } from "./transport.js";
export { ByteBuffer } from "./bytebuffer.js";
export {
  ConnectionClosedError,
  ProtocolError,
  OperationInProgressError,
  StreamDestroyedError,
} from "./errors.js";
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
