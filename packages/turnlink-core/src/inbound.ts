// Inbound byte buffering shared by channel implementations.
//
// Chunks arrive from the transport in whatever sizes it likes; readers ask
// for exact byte counts. Bytes leave the buffer only when a read can be
// satisfied in full.

import { ChannelError } from "./channel.ts";

interface Waiter {
  n: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (err: ChannelError) => void;
}

/** Accumulates incoming chunks and serves exact-size reads. */
export class InboundBuffer {
  private buf: Uint8Array = new Uint8Array(0);
  private waiter: Waiter | null = null;
  private ended = false;
  private error: Error | null = null;

  /** Number of bytes currently buffered. */
  get length(): number {
    return this.buf.length;
  }

  /** True once `end()` has been called. */
  get isEnded(): boolean {
    return this.ended;
  }

  /** Append a chunk received from the transport. */
  push(chunk: Uint8Array): void {
    if (this.ended || chunk.length === 0) return;
    const next = new Uint8Array(this.buf.length + chunk.length);
    next.set(this.buf, 0);
    next.set(chunk, this.buf.length);
    this.buf = next;
    this.wake();
  }

  /** Mark the stream as finished, optionally because of `error`. */
  end(error: Error | null = null): void {
    if (this.ended) return;
    this.ended = true;
    this.error = error;
    this.wake();
  }

  /**
   * Take exactly `n` bytes if buffered.
   *
   * Returns null if more bytes may still arrive; throws once the stream has
   * ended without enough of them.
   */
  take(n: number): Uint8Array | null {
    if (this.buf.length >= n) {
      const out = this.buf.slice(0, n);
      this.buf = this.buf.subarray(n);
      return out;
    }
    if (this.error) {
      throw ChannelError.io(this.error);
    }
    if (this.ended) {
      throw this.buf.length === 0
        ? ChannelError.closed()
        : ChannelError.truncated(this.buf.length, n);
    }
    return null;
  }

  /** Wait for exactly `n` bytes. Only one read may be pending at a time. */
  read(n: number, signal?: AbortSignal): Promise<Uint8Array> {
    if (signal?.aborted) {
      return Promise.reject(ChannelError.aborted(signal.reason));
    }
    if (this.waiter) {
      return Promise.reject(ChannelError.io(new Error("a read is already pending")));
    }

    let ready: Uint8Array | null;
    try {
      ready = this.take(n);
    } catch (e) {
      return Promise.reject(e);
    }
    if (ready) {
      return Promise.resolve(ready);
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(ChannelError.aborted(signal?.reason));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.waiter = {
        n,
        resolve: (bytes) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(bytes);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    try {
      const bytes = this.take(waiter.n);
      if (bytes) {
        this.waiter = null;
        waiter.resolve(bytes);
      }
    } catch (e) {
      this.waiter = null;
      waiter.reject(e instanceof ChannelError ? e : ChannelError.io(e));
    }
  }
}
