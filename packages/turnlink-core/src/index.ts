// @turnlink/core - turn-coordination protocol for two-player games
// This package provides roles, the turn state machine, fixed-size framing and
// the session facade, independent of any particular transport.

// Errors
export { NetcodeError, type NetcodeErrorKind, isNetcodeError } from "./errors.ts";

// Channel abstraction
export { type ByteChannel, ChannelError } from "./channel.ts";
export { InboundBuffer } from "./inbound.ts";
export { MemoryChannel, memoryChannelPair } from "./memory.ts";

// Protocol pieces
export { ConnectionSide, Role, negotiateRole, oppositeSide } from "./role.ts";
export { TurnState, TurnStateMachine, type TurnListener } from "./turn.ts";
export { FrameCodec, toNetcodeError } from "./framing.ts";

// Configuration
export {
  type SessionConfig,
  type HandshakeMode,
  defaultSessionConfig,
  resolveSessionConfig,
  sessionConfigFromEnv,
} from "./config.ts";

// Session facade and establishment
export { TurnSession, type ReceiveOptions, type SessionStatus } from "./session.ts";
export {
  type SessionOptions,
  establishSession,
  establishInitiator,
  establishAcceptor,
  encodeFrameSize,
  decodeFrameSize,
} from "./handshake.ts";

// Middleware and logging
export {
  ExchangeKey,
  Extensions,
  type ExchangeContext,
  type Exchange,
  type ExchangeOutcome,
  type RejectionCode,
  type Rejection,
  RejectionError,
  type SessionMiddleware,
} from "./middleware.ts";
export { loggingMiddleware, type LoggingOptions, debugLog, isEnabled, toHex } from "./logging.ts";
