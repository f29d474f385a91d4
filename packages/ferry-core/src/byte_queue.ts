// Buffered reader over a chunked byte stream.
//
// Transports push chunks as they arrive; the reader asks for exact byte
// counts and waits until enough chunks have accumulated.

interface PendingRead {
  n: number;
  resolve: (bytes: Uint8Array | null) => void;
  reject: (error: unknown) => void;
}

/**
 * Accumulates pushed chunks and serves exact-length reads.
 *
 * After `end()` buffered bytes can still be read; a read that cannot be
 * satisfied resolves `null`. After `fail()` buffered bytes can still be read
 * and the first unsatisfiable read rejects with the failure.
 */
export class ByteQueue {
  private chunks: Uint8Array[] = [];
  private head = 0;
  private buffered = 0;
  private ended = false;
  private failure: unknown = null;
  private pending: PendingRead | null = null;

  /** Bytes buffered and not yet read. */
  get length(): number {
    return this.buffered;
  }

  /** Whether `end()` or `fail()` has been called. */
  get isEnded(): boolean {
    return this.ended;
  }

  push(chunk: Uint8Array): void {
    if (this.ended || chunk.length === 0) return;
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    this.settle();
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.settle();
  }

  fail(error: unknown): void {
    if (this.ended) return;
    this.failure = error;
    this.ended = true;
    this.settle();
  }

  readExactly(n: number): Promise<Uint8Array | null> {
    if (this.pending) {
      return Promise.reject(new Error("ByteQueue: a read is already pending"));
    }
    if (n === 0) {
      return Promise.resolve(new Uint8Array(0));
    }
    return new Promise((resolve, reject) => {
      this.pending = { n, resolve, reject };
      this.settle();
    });
  }

  private settle(): void {
    const read = this.pending;
    if (!read) return;

    if (this.buffered >= read.n) {
      this.pending = null;
      read.resolve(this.take(read.n));
    } else if (this.failure !== null) {
      this.pending = null;
      read.reject(this.failure);
    } else if (this.ended) {
      this.pending = null;
      read.resolve(null);
    }
  }

  private take(n: number): Uint8Array {
    const out = new Uint8Array(n);
    let filled = 0;
    while (filled < n) {
      const chunk = this.chunks[0];
      const count = Math.min(chunk.length - this.head, n - filled);
      out.set(chunk.subarray(this.head, this.head + count), filled);
      filled += count;
      this.head += count;
      if (this.head === chunk.length) {
        this.chunks.shift();
        this.head = 0;
      }
    }
    this.buffered -= n;
    return out;
  }
}
