// In-process channel pair.
//
// Two MemoryChannels wired back to back behave like the two ends of a
// reliable byte stream. Useful for tests and for running both players of a
// game in one process.

import { type ByteChannel, ChannelError } from "./channel.ts";
import { InboundBuffer } from "./inbound.ts";

/** One end of an in-process byte stream. */
export class MemoryChannel implements ByteChannel {
  private inbound = new InboundBuffer();
  private closeListeners: Array<(error: Error | null) => void> = [];
  private closeError: Error | null = null;
  private _closed = false;

  /** @internal Set by memoryChannelPair. */
  _peer: MemoryChannel | null = null;

  /** Total bytes accepted by `write`. */
  bytesWritten = 0;

  /** Number of successful `write` calls. */
  writeCount = 0;

  get closed(): boolean {
    return this._closed;
  }

  /** Bytes received but not yet read. */
  get buffered(): number {
    return this.inbound.length;
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this._closed || !this._peer) {
      throw ChannelError.io(this.closeError ?? new Error("channel closed"));
    }
    this._peer.inbound.push(bytes.slice());
    this.bytesWritten += bytes.length;
    this.writeCount += 1;
  }

  readExact(n: number, signal?: AbortSignal): Promise<Uint8Array> {
    return this.inbound.read(n, signal);
  }

  onClose(listener: (error: Error | null) => void): void {
    if (this._closed) {
      listener(this.closeError);
      return;
    }
    this.closeListeners.push(listener);
  }

  close(): void {
    if (this._closed) return;
    this.finish(null);
    this._peer?.finish(null);
  }

  /**
   * Simulate a transport failure on this end. The peer sees a clean close,
   * as it would when a process dies and the kernel resets the socket.
   */
  fail(error: Error): void {
    if (this._closed) return;
    this.finish(error);
    this._peer?.finish(null);
  }

  private finish(error: Error | null): void {
    if (this._closed) return;
    this._closed = true;
    this.closeError = error;
    this.inbound.end(error);
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener(error);
    }
  }
}

/** Create two connected in-process channels. */
export function memoryChannelPair(): [MemoryChannel, MemoryChannel] {
  const a = new MemoryChannel();
  const b = new MemoryChannel();
  a._peer = b;
  b._peer = a;
  return [a, b];
}
