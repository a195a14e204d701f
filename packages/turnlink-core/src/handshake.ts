// Session establishment.
//
// Role negotiation needs no messages: the side that dialled is the
// initiator. When both peers opt into the frame-size handshake, each side
// sends its frame size once as a little-endian u32 before play starts.

import type { ByteChannel } from "./channel.ts";
import { type SessionConfig, resolveSessionConfig } from "./config.ts";
import { NetcodeError } from "./errors.ts";
import { debugLog } from "./logging.ts";
import type { SessionMiddleware } from "./middleware.ts";
import { ConnectionSide } from "./role.ts";
import { TurnSession } from "./session.ts";

const HANDSHAKE_TIMEOUT_MS = 5000;
const MAX_HANDSHAKE_FRAME_SIZE = 0xffff_ffff;

/** Options for establishing a session. */
export interface SessionOptions extends Partial<SessionConfig> {
  /** Middleware run around every send and receive, in order. */
  middleware?: SessionMiddleware[];
}

/**
 * Establish a session over a freshly connected channel.
 *
 * Fails with a `setup` NetcodeError, and closes the channel, if the channel
 * is already closed or the handshake fails. No session exists afterwards.
 */
export async function establishSession<C extends ByteChannel>(
  channel: C,
  side: ConnectionSide,
  options: SessionOptions = {},
): Promise<TurnSession<C>> {
  const { middleware = [], ...settings } = options;
  const config = resolveSessionConfig(settings);

  if (channel.closed) {
    throw NetcodeError.setup("channel closed before the session was established");
  }

  if (config.handshake === "frame-size") {
    await exchangeFrameSize(channel, side, config.frameSize);
  }

  const session = new TurnSession(channel, side, config, middleware);
  debugLog("turnlink:session", "session established", {
    side,
    role: session.role,
    frameSize: config.frameSize,
  });
  return session;
}

/** Establish a session as the side that dialled. */
export function establishInitiator<C extends ByteChannel>(
  channel: C,
  options: SessionOptions = {},
): Promise<TurnSession<C>> {
  return establishSession(channel, ConnectionSide.Initiator, options);
}

/** Establish a session as the side that accepted. */
export function establishAcceptor<C extends ByteChannel>(
  channel: C,
  options: SessionOptions = {},
): Promise<TurnSession<C>> {
  return establishSession(channel, ConnectionSide.Acceptor, options);
}

/** Encode a frame size for the handshake. */
export function encodeFrameSize(frameSize: number): Uint8Array {
  if (!Number.isInteger(frameSize) || frameSize < 0 || frameSize > MAX_HANDSHAKE_FRAME_SIZE) {
    throw new RangeError(`frame size must fit in a u32, got ${frameSize}`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, frameSize, true);
  return out;
}

/** Decode a frame size received in the handshake. */
export function decodeFrameSize(bytes: Uint8Array): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true);
}

/**
 * Exchange frame sizes with the peer. The initiator speaks first; both
 * sides send before comparing so each learns about a mismatch.
 */
async function exchangeFrameSize(channel: ByteChannel, side: ConnectionSide, frameSize: number): Promise<void> {
  const signal = AbortSignal.timeout(HANDSHAKE_TIMEOUT_MS);

  let peerSize: number;
  try {
    const ours = encodeFrameSize(frameSize);
    if (side === ConnectionSide.Initiator) {
      await channel.write(ours);
      peerSize = decodeFrameSize(await channel.readExact(4, signal));
    } else {
      peerSize = decodeFrameSize(await channel.readExact(4, signal));
      await channel.write(ours);
    }
  } catch (e) {
    channel.close();
    const reason = e instanceof Error ? e.message : String(e);
    throw NetcodeError.setup(`frame-size handshake failed: ${reason}`, e);
  }

  if (peerSize !== frameSize) {
    channel.close();
    throw NetcodeError.setup(`frame size mismatch: local ${frameSize}, peer ${peerSize}`);
  }
}
