// In-process duplex pair for tests.

import { Duplex } from "node:stream";

class PairedDuplex extends Duplex {
  peer: PairedDuplex | null = null;

  _read(): void {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.peer?.push(chunk);
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.peer?.push(null);
    callback();
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) this.peer.push(null);
    callback(error);
  }
}

/** Two duplex streams wired back to back, like the ends of a socket. */
export function duplexPair(): [Duplex, Duplex] {
  const a = new PairedDuplex();
  const b = new PairedDuplex();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
