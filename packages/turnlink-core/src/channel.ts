/**
 * Byte channel abstraction.
 *
 * This module defines the ByteChannel interface a session drives: an ordered,
 * reliable, bidirectional byte stream between exactly two peers.
 *
 * Implementations:
 * - MemoryChannel (this package) for in-process pairs
 * - StreamChannel (turnlink-tcp) for Node.js duplex streams and TCP sockets
 */

/** Error types for channel operations. */
export class ChannelError extends Error {
  constructor(
    public kind: "closed" | "truncated" | "io" | "aborted",
    message: string,
    /** Bytes that were buffered towards the failed read. */
    public buffered: number = 0,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ChannelError";
  }

  /** The stream ended cleanly with nothing pending. */
  static closed(): ChannelError {
    return new ChannelError("closed", "channel closed");
  }

  /** The stream ended with `buffered` of the requested bytes available. */
  static truncated(buffered: number, wanted: number): ChannelError {
    return new ChannelError(
      "truncated",
      `channel closed after ${buffered} of ${wanted} bytes`,
      buffered,
    );
  }

  static io(cause: unknown): ChannelError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ChannelError("io", message, 0, { cause });
  }

  static aborted(reason: unknown): ChannelError {
    const message = reason instanceof Error ? reason.message : "read aborted";
    return new ChannelError("aborted", message, 0, { cause: reason });
  }
}

/**
 * Interface for duplex byte streams a session can drive.
 *
 * Reads are atomic: `readExact(n)` takes bytes off the channel only once `n`
 * of them are available, so an aborted read leaves the stream position where
 * it was.
 */
export interface ByteChannel {
  /**
   * Write all of `bytes`. Resolves once the channel has accepted every byte;
   * rejects with a ChannelError if the channel fails or is closed.
   */
  write(bytes: Uint8Array): Promise<void>;

  /**
   * Read exactly `n` bytes.
   *
   * Rejects with a ChannelError:
   * - `closed` if the stream ended with nothing buffered
   * - `truncated` if it ended with fewer than `n` bytes buffered
   * - `io` on transport failure
   * - `aborted` if `signal` fired first (nothing consumed)
   */
  readExact(n: number, signal?: AbortSignal): Promise<Uint8Array>;

  /** Bytes received but not yet read. */
  readonly buffered: number;

  /** Register a listener for the end of the stream (at most one call). */
  onClose(listener: (error: Error | null) => void): void;

  /** True once either side has closed the stream or it failed. */
  readonly closed: boolean;

  /** Close the channel. Idempotent. */
  close(): void;
}
