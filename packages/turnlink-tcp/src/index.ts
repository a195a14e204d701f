// @turnlink/tcp - TCP transport for turnlink sessions (Node.js only)
//
// Provides the stream channel, host/join over TCP and join tickets.

export { StreamChannel } from "./stream.ts";
export { TcpPeer, TcpHost, type HostOptions, type StreamSession } from "./transport.ts";
export { type Ticket, TICKET_SCHEME, formatTicket, parseTicket } from "./ticket.ts";

// Re-export session types from core for convenience
export {
  TurnSession,
  TurnState,
  Role,
  ConnectionSide,
  NetcodeError,
  type NetcodeErrorKind,
  isNetcodeError,
  type SessionOptions,
  type ReceiveOptions,
  loggingMiddleware,
} from "@turnlink/core";
