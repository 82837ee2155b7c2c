import { ByteBuffer } from "../bytebuffer.js";
import { ConnectionClosedError } from "../errors.js";
import type { Transport } from "../transport.js";

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Concatenate byte arrays and numbers (single bytes) into one array. */
export function bytes(...parts: Array<number | string | Uint8Array>): Uint8Array {
  const chunks = parts.map((p) => {
    if (typeof p === "number") return Uint8Array.of(p);
    if (typeof p === "string") return encoder.encode(p);
    return p;
  });
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0));
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}

/** Split `data` into chunks of `size` bytes; the last may be shorter. */
export function chunked(data: Uint8Array, size: number): Uint8Array[] {
  const out: Uint8Array[] = [];
  for (let i = 0; i < data.length; i += size) {
    out.push(data.subarray(i, i + size));
  }
  return out;
}

/** Resolves true if `p` settled before the event loop went idle for a turn. */
export async function isSettled(p: Promise<unknown>): Promise<boolean> {
  let settled = false;
  p.then(
    () => {
      settled = true;
    },
    () => {
      settled = true;
    },
  );
  await new Promise<void>((resolve) => setImmediate(resolve));
  return settled;
}

// --- ScriptedTransport ---

type IoMode = "sync" | "async";

export type ReadStep =
  | { mode: IoMode; data: Uint8Array }
  | { mode: IoMode; error: Error };

export type WriteStep =
  | { mode: IoMode; accept: number }
  | { mode: IoMode; error: Error };

function settle<T>(mode: IoMode, produce: () => T): Promise<T> {
  if (mode === "sync") {
    try {
      return Promise.resolve(produce());
    } catch (err) {
      return Promise.reject(err);
    }
  }
  return new Promise<T>((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(produce());
      } catch (err) {
        reject(err);
      }
    });
  });
}

/**
 * Transport that replays a script. "sync" steps settle immediately,
 * "async" steps on a later event-loop turn. Once the read script is used
 * up every read returns 0 (closed); once the write script is used up
 * every write accepts all bytes.
 */
export class ScriptedTransport implements Transport {
  readonly written: Uint8Array[] = [];
  readCalls = 0;
  writeCalls = 0;
  destroyed = false;
  private reads: ReadStep[];
  private writes: WriteStep[];

  constructor(reads: ReadStep[] = [], writes: WriteStep[] = []) {
    this.reads = [...reads];
    this.writes = [...writes];
  }

  /** Concatenation of every byte the transport accepted. */
  get writtenBytes(): Uint8Array {
    return bytes(...this.written);
  }

  read(into: Uint8Array): Promise<number> {
    this.readCalls++;
    const step = this.reads.shift();
    if (!step) return Promise.resolve(0);
    return settle(step.mode, () => {
      if ("error" in step) throw step.error;
      if (step.data.length > into.length) {
        throw new Error(`scripted chunk of ${step.data.length} bytes exceeds read buffer`);
      }
      into.set(step.data);
      return step.data.length;
    });
  }

  write(from: Uint8Array): Promise<number> {
    this.writeCalls++;
    const step: WriteStep = this.writes.shift() ?? { mode: "sync", accept: from.length };
    const copy = from.slice();
    return settle(step.mode, () => {
      if ("error" in step) throw step.error;
      const n = Math.min(step.accept, copy.length);
      this.written.push(copy.subarray(0, n));
      return n;
    });
  }

  destroy(): void {
    this.destroyed = true;
  }
}

/** Every chunk as a read step of the same mode. */
export function readsOf(mode: IoMode, chunks: Uint8Array[]): ReadStep[] {
  return chunks.map((data) => ({ mode, data }));
}

// --- ManualTransport ---

/**
 * Transport fed by hand from the test. Reads wait until `deliver`,
 * `end` or `fail` is called. Writes are looped to `peer` when set.
 */
export class ManualTransport implements Transport {
  destroyed = false;
  peer: ManualTransport | null = null;
  private inbound = new ByteBuffer();

  deliver(data: Uint8Array): void {
    this.inbound.push(data.slice());
  }

  end(): void {
    this.inbound.close();
  }

  fail(err: Error): void {
    this.inbound.close(err);
  }

  read(into: Uint8Array): Promise<number> {
    return this.inbound.readInto(into);
  }

  async write(from: Uint8Array): Promise<number> {
    if (this.destroyed) throw new ConnectionClosedError("transport destroyed");
    this.peer?.deliver(from);
    return from.length;
  }

  destroy(): void {
    this.destroyed = true;
    this.inbound.close(new ConnectionClosedError("transport destroyed"));
  }
}

/**
 * Creates a connected pair: writes on `a` appear as reads on `b` and
 * vice versa.
 */
export function createTransportPair(): [ManualTransport, ManualTransport] {
  const a = new ManualTransport();
  const b = new ManualTransport();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

/** Transport whose reads and writes never settle, even after destroy. */
export class StalledTransport implements Transport {
  destroyed = false;

  read(): Promise<number> {
    return new Promise<number>(() => {});
  }

  write(): Promise<number> {
    return new Promise<number>(() => {});
  }

  destroy(): void {
    this.destroyed = true;
  }
}
