// ByteChannel over a Node.js duplex stream.
//
// Incoming chunks are buffered until a reader asks for an exact byte count.
// Works with net.Socket and with any other Duplex.

import type { Duplex } from "node:stream";
import { type ByteChannel, ChannelError, InboundBuffer } from "@turnlink/core";

/**
 * A byte channel backed by a duplex stream.
 *
 * The channel owns the stream: closing the channel ends it, and the stream
 * ending or failing closes the channel.
 */
export class StreamChannel implements ByteChannel {
  private readonly stream: Duplex;
  private inbound = new InboundBuffer();
  private closeListeners: Array<(error: Error | null) => void> = [];
  private closeError: Error | null = null;
  private _closed = false;

  constructor(stream: Duplex) {
    this.stream = stream;

    stream.on("data", (chunk: Buffer | string) => {
      this.inbound.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });

    // The peer finished writing; whatever is buffered can still be read.
    stream.on("end", () => this.finish(null));

    stream.on("error", (err: Error) => this.finish(err));

    stream.on("close", () => this.finish(null));

    if (stream.destroyed || stream.readableEnded) {
      this.finish(stream.errored);
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  get buffered(): number {
    return this.inbound.length;
  }

  /** Get the underlying stream. */
  getStream(): Duplex {
    return this.stream;
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this._closed) {
        reject(ChannelError.io(this.closeError ?? new Error("channel closed")));
        return;
      }

      this.stream.write(bytes, (err) => {
        if (err) reject(ChannelError.io(err));
        else resolve();
      });
    });
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

  /**
   * End our side of the stream, then release it without waiting for the
   * peer. The peer sees a clean end of stream.
   */
  close(): void {
    if (this._closed) return;
    this.finish(null);
    this.stream.end(() => this.stream.destroy());
  }

  private finish(error: Error | null): void {
    if (this._closed) return;
    this._closed = true;
    this.closeError = error;
    this.inbound.end(error);

    if (error !== null || this.stream.readableEnded) {
      this.stream.destroy();
    }

    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener(error);
    }
  }
}
