// Fixed-size framing.
//
// A frame is exactly `frameSize` bytes with no header and no delimiter. The
// length is implicit, so a short read before stream end can never be a
// valid message.

import { type ByteChannel, ChannelError } from "./channel.ts";
import { NetcodeError } from "./errors.ts";

/** Reads and writes frames of one fixed size over a ByteChannel. */
export class FrameCodec {
  readonly frameSize: number;

  constructor(frameSize: number) {
    if (!Number.isSafeInteger(frameSize) || frameSize < 1) {
      throw new RangeError(`frame size must be a positive integer, got ${frameSize}`);
    }
    this.frameSize = frameSize;
  }

  /**
   * Check a caller-supplied payload. Returns the local framing error for a
   * payload of the wrong length, or null if it may be sent.
   */
  validate(payload: Uint8Array): NetcodeError | null {
    if (payload.length !== this.frameSize) {
      return NetcodeError.wrongSize(this.frameSize, payload.length);
    }
    return null;
  }

  /** Write one frame. A payload of the wrong size is rejected before any I/O. */
  async writeFrame(channel: ByteChannel, payload: Uint8Array): Promise<void> {
    const violation = this.validate(payload);
    if (violation) throw violation;
    try {
      await channel.write(payload);
    } catch (e) {
      throw toNetcodeError(e, this.frameSize);
    }
  }

  /** Wait for one whole frame. */
  async readFrame(channel: ByteChannel, signal?: AbortSignal): Promise<Uint8Array> {
    try {
      return await channel.readExact(this.frameSize, signal);
    } catch (e) {
      throw toNetcodeError(e, this.frameSize);
    }
  }

  /**
   * True if `readFrame` would settle without waiting: a whole frame is
   * buffered, or the channel has ended and the read will fail at once.
   */
  frameReady(channel: ByteChannel): boolean {
    return channel.buffered >= this.frameSize || channel.closed;
  }
}

/** Map a channel failure onto the session error it represents. */
export function toNetcodeError(e: unknown, frameSize: number): NetcodeError {
  if (e instanceof NetcodeError) return e;
  if (e instanceof ChannelError) {
    switch (e.kind) {
      case "truncated":
        return NetcodeError.truncated(frameSize, e.buffered);
      case "closed":
        return NetcodeError.transport("peer closed the connection", e);
      case "aborted":
        return NetcodeError.aborted(e.message);
      case "io":
        return NetcodeError.transport(`transport error: ${e.message}`, e);
    }
  }
  return NetcodeError.transport(`transport error: ${String(e)}`, e);
}
