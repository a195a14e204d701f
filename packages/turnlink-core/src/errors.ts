// Error types for turnlink sessions.
//
// Every failure surfaces as a NetcodeError. `fatal` errors have already
// closed the session by the time the caller sees them; the rest are local
// contract violations that left the channel and the turn untouched.

/** What went wrong. */
export type NetcodeErrorKind =
  | "setup"
  | "turnViolation"
  | "framing"
  | "transport"
  | "closed"
  | "aborted"
  | "busy";

/** Error raised by session operations. */
export class NetcodeError extends Error {
  constructor(
    public readonly kind: NetcodeErrorKind,
    message: string,
    public readonly fatal: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NetcodeError";
  }

  /** Transport failure or mismatch before the session existed. */
  static setup(message: string, cause?: unknown): NetcodeError {
    return new NetcodeError("setup", message, true, { cause });
  }

  /** The local caller tried to send without holding the turn. */
  static outOfTurn(): NetcodeError {
    return new NetcodeError("turnViolation", "cannot send: it is not our turn", false);
  }

  /** The peer sent a frame while we held the turn. */
  static peerOutOfTurn(): NetcodeError {
    return new NetcodeError(
      "turnViolation",
      "peer sent a frame while it did not hold the turn",
      true,
    );
  }

  /** The local caller passed a buffer of the wrong length. */
  static wrongSize(expected: number, actual: number): NetcodeError {
    return new NetcodeError(
      "framing",
      `payload must be exactly ${expected} bytes, got ${actual}`,
      false,
    );
  }

  /** The stream ended with part of a frame buffered. */
  static truncated(expected: number, received: number): NetcodeError {
    return new NetcodeError(
      "framing",
      `truncated frame: stream ended after ${received} of ${expected} bytes`,
      true,
    );
  }

  static transport(message: string, cause?: unknown): NetcodeError {
    return new NetcodeError("transport", message, true, { cause });
  }

  static closed(): NetcodeError {
    return new NetcodeError("closed", "session closed", false);
  }

  static aborted(reason: string): NetcodeError {
    return new NetcodeError("aborted", reason, false);
  }

  static busy(): NetcodeError {
    return new NetcodeError("busy", "a receive is already pending on this session", false);
  }
}

/** True if `e` is a NetcodeError of the given kind. */
export function isNetcodeError(e: unknown, kind?: NetcodeErrorKind): e is NetcodeError {
  return e instanceof NetcodeError && (kind === undefined || e.kind === kind);
}
