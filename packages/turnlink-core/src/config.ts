// Session configuration.

import { ConnectionSide } from "./role.ts";

/** How the peers confirm their settings before the first frame. */
export type HandshakeMode = "none" | "frame-size";

/** Configuration for a session. Both peers must agree on every field. */
export interface SessionConfig {
  /** Payload size in bytes of every frame. */
  frameSize: number;
  /** The side of the connection that moves first. */
  firstMover: ConnectionSide;
  /**
   * `"frame-size"` exchanges each side's frame size once before play and
   * refuses to start on a mismatch. `"none"` puts nothing but frames on the
   * wire.
   */
  handshake: HandshakeMode;
  /** Default timeout for `receive`, in milliseconds. Null waits forever. */
  receiveTimeoutMs: number | null;
}

/** Default session configuration. */
export function defaultSessionConfig(): SessionConfig {
  return {
    frameSize: 4,
    firstMover: ConnectionSide.Initiator,
    handshake: "none",
    receiveTimeoutMs: null,
  };
}

/** Fill in defaults and validate. Throws RangeError on bad values. */
export function resolveSessionConfig(config: Partial<SessionConfig> = {}): SessionConfig {
  const defaults = defaultSessionConfig();
  const resolved: SessionConfig = {
    frameSize: config.frameSize ?? defaults.frameSize,
    firstMover: config.firstMover ?? defaults.firstMover,
    handshake: config.handshake ?? defaults.handshake,
    receiveTimeoutMs:
      config.receiveTimeoutMs === undefined ? defaults.receiveTimeoutMs : config.receiveTimeoutMs,
  };

  if (!Number.isSafeInteger(resolved.frameSize) || resolved.frameSize < 1) {
    throw new RangeError(`frameSize must be a positive integer, got ${resolved.frameSize}`);
  }
  if (resolved.firstMover !== ConnectionSide.Initiator && resolved.firstMover !== ConnectionSide.Acceptor) {
    throw new RangeError(`firstMover must be "initiator" or "acceptor", got ${String(resolved.firstMover)}`);
  }
  if (resolved.handshake !== "none" && resolved.handshake !== "frame-size") {
    throw new RangeError(`handshake must be "none" or "frame-size", got ${String(resolved.handshake)}`);
  }
  if (
    resolved.receiveTimeoutMs !== null &&
    (!Number.isFinite(resolved.receiveTimeoutMs) || resolved.receiveTimeoutMs <= 0)
  ) {
    throw new RangeError(`receiveTimeoutMs must be positive, got ${resolved.receiveTimeoutMs}`);
  }

  return resolved;
}

/**
 * Read overrides from environment variables:
 *
 * - `TURNLINK_FRAME_SIZE`
 * - `TURNLINK_FIRST_MOVER` (`initiator` | `acceptor`)
 * - `TURNLINK_HANDSHAKE` (`none` | `frame-size`)
 * - `TURNLINK_RECEIVE_TIMEOUT_MS`
 *
 * Unset variables fall back to `base`.
 */
export function sessionConfigFromEnv(
  env: Record<string, string | undefined>,
  base: Partial<SessionConfig> = {},
): SessionConfig {
  const config: Partial<SessionConfig> = { ...base };

  const frameSize = env.TURNLINK_FRAME_SIZE;
  if (frameSize !== undefined && frameSize !== "") {
    config.frameSize = parseInteger("TURNLINK_FRAME_SIZE", frameSize);
  }

  const firstMover = env.TURNLINK_FIRST_MOVER;
  if (firstMover !== undefined && firstMover !== "") {
    if (firstMover !== ConnectionSide.Initiator && firstMover !== ConnectionSide.Acceptor) {
      throw new RangeError(`TURNLINK_FIRST_MOVER must be "initiator" or "acceptor", got "${firstMover}"`);
    }
    config.firstMover = firstMover;
  }

  const handshake = env.TURNLINK_HANDSHAKE;
  if (handshake !== undefined && handshake !== "") {
    if (handshake !== "none" && handshake !== "frame-size") {
      throw new RangeError(`TURNLINK_HANDSHAKE must be "none" or "frame-size", got "${handshake}"`);
    }
    config.handshake = handshake;
  }

  const timeout = env.TURNLINK_RECEIVE_TIMEOUT_MS;
  if (timeout !== undefined && timeout !== "") {
    config.receiveTimeoutMs = parseInteger("TURNLINK_RECEIVE_TIMEOUT_MS", timeout);
  }

  return resolveSessionConfig(config);
}

function parseInteger(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new RangeError(`${name} must be a positive integer, got "${value}"`);
  }
  return Number(value);
}
