// Join tickets.
//
// A ticket is what the host hands to the other player out of band:
//
//   turnlink://<host>:<port>?frame=<N>
//
// Carrying the frame size lets the joiner refuse a mismatched game before
// it ever dials.

import { NetcodeError } from "@turnlink/core";

export const TICKET_SCHEME = "turnlink:";

/** Where to reach a host, and the frame size it plays with. */
export interface Ticket {
  host: string;
  port: number;
  frameSize: number;
}

/** Render a ticket as a shareable string. */
export function formatTicket(ticket: Ticket): string {
  const host = ticket.host.includes(":") ? `[${ticket.host}]` : ticket.host;
  return `${TICKET_SCHEME}//${host}:${ticket.port}?frame=${ticket.frameSize}`;
}

/** Parse a ticket string. Throws a `setup` NetcodeError if it is malformed. */
export function parseTicket(text: string): Ticket {
  let url: URL;
  try {
    url = new URL(text.trim());
  } catch (e) {
    throw NetcodeError.setup(`invalid ticket: "${text}"`, e);
  }

  if (url.protocol !== TICKET_SCHEME) {
    throw NetcodeError.setup(`unsupported ticket scheme "${url.protocol}"`);
  }
  if (url.hostname === "") {
    throw NetcodeError.setup("ticket has no host");
  }
  if (url.port === "") {
    throw NetcodeError.setup("ticket has no port");
  }

  const frame = url.searchParams.get("frame") ?? "";
  const frameSize = /^\d+$/.test(frame) ? Number(frame) : 0;
  if (!Number.isSafeInteger(frameSize) || frameSize < 1) {
    throw NetcodeError.setup(`ticket has no valid frame size: "${frame}"`);
  }

  const host = url.hostname.startsWith("[") ? url.hostname.slice(1, -1) : url.hostname;
  return { host, port: Number(url.port), frameSize };
}
