// Errors surfaced by FrameStream operations. Transport errors are not
// listed here: they reach the caller unchanged.

/** Orderly shutdown: zero-length read or the transport's closed signal. */
export class ConnectionClosedError extends Error {
  constructor(message = "connection closed") {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

/** The peer violated RFC 6455 framing. The stream must not be read again. */
export class ProtocolError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`websocket protocol error: ${reason}`);
    this.name = "ProtocolError";
    this.reason = reason;
  }
}

/** A second read (or write) was issued while one is still outstanding. */
export class OperationInProgressError extends Error {
  constructor(operation: "readFrames" | "writeFrames") {
    super(`${operation} already in progress`);
    this.name = "OperationInProgressError";
  }
}

/** The stream was destroyed before the operation completed. */
export class StreamDestroyedError extends Error {
  constructor() {
    super("stream destroyed");
    this.name = "StreamDestroyedError";
  }
}
