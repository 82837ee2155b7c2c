/**
 * Accumulates incoming byte chunks for a single reader. Reads take
 * whatever is buffered, up to the caller's buffer size, and wait only
 * when nothing is buffered.
 */
export class ByteBuffer {
  private chunks: Uint8Array[] = [];
  private totalLen = 0;
  private waiting: {
    resolve: (n: number) => void;
    reject: (err: Error) => void;
    into: Uint8Array;
  } | null = null;
  private closed = false;
  private closeError: Error | null = null;

  /** Bytes buffered and not yet read. */
  get length(): number {
    return this.totalLen;
  }

  /** Append data. Completes a waiting read. */
  push(data: Uint8Array): void {
    if (this.closed) return;
    if (data.length === 0) return;
    this.chunks.push(data);
    this.totalLen += data.length;
    this.tryResolve();
  }

  /**
   * Signal that no more data will arrive. Buffered bytes stay readable;
   * after that reads resolve with 0, or reject with `err` when given.
   */
  close(err?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.closeError = err ?? null;
    if (this.waiting && this.totalLen === 0) {
      const { resolve, reject } = this.waiting;
      this.waiting = null;
      if (this.closeError) {
        reject(this.closeError);
      } else {
        resolve(0);
      }
    }
  }

  /** Copy up to `into.length` bytes into `into`, waiting while empty. */
  async readInto(into: Uint8Array): Promise<number> {
    if (into.length === 0) return 0;
    if (this.waiting) {
      throw new Error("ByteBuffer already has a waiting reader");
    }

    if (this.totalLen > 0) {
      return this.consume(into);
    }
    if (this.closed) {
      if (this.closeError) throw this.closeError;
      return 0;
    }
    return new Promise<number>((resolve, reject) => {
      this.waiting = { resolve, reject, into };
    });
  }

  private tryResolve(): void {
    if (!this.waiting) return;
    const { resolve, into } = this.waiting;
    this.waiting = null;
    resolve(this.consume(into));
  }

  private consume(into: Uint8Array): number {
    const n = Math.min(into.length, this.totalLen);
    let offset = 0;
    while (offset < n) {
      const chunk = this.chunks[0];
      const take = Math.min(chunk.length, n - offset);
      into.set(chunk.subarray(0, take), offset);
      offset += take;
      if (take === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(take);
      }
    }
    this.totalLen -= n;
    return n;
  }
}
