// Tests for join tickets

import { describe, it, expect } from "vitest";
import { formatTicket, parseTicket } from "./ticket.ts";

describe("tickets", () => {
  it("formats and parses an IPv4 ticket", () => {
    const text = formatTicket({ host: "127.0.0.1", port: 4000, frameSize: 8 });

    expect(text).toBe("turnlink://127.0.0.1:4000?frame=8");
    expect(parseTicket(text)).toEqual({ host: "127.0.0.1", port: 4000, frameSize: 8 });
  });

  it("brackets IPv6 hosts", () => {
    const text = formatTicket({ host: "::1", port: 9000, frameSize: 4 });

    expect(text).toBe("turnlink://[::1]:9000?frame=4");
    expect(parseTicket(text)).toEqual({ host: "::1", port: 9000, frameSize: 4 });
  });

  it("accepts host names and surrounding whitespace", () => {
    expect(parseTicket("  turnlink://game-host:5000?frame=16\n")).toEqual({
      host: "game-host",
      port: 5000,
      frameSize: 16,
    });
  });

  it("rejects malformed tickets with setup errors", () => {
    expect(() => parseTicket("not a ticket")).toThrow('invalid ticket: "not a ticket"');
    expect(() => parseTicket("http://127.0.0.1:4000?frame=8")).toThrow('unsupported ticket scheme "http:"');
    expect(() => parseTicket("turnlink://127.0.0.1?frame=8")).toThrow("ticket has no port");
    expect(() => parseTicket("turnlink://127.0.0.1:4000")).toThrow('ticket has no valid frame size: ""');
    expect(() => parseTicket("turnlink://127.0.0.1:4000?frame=0")).toThrow('ticket has no valid frame size: "0"');
  });

  it("fails with a fatal setup error", () => {
    let thrown: unknown;
    try {
      parseTicket("turnlink://127.0.0.1:4000?frame=x");
    } catch (e) {
      thrown = e;
    }
    expect(thrown).toMatchObject({ kind: "setup", fatal: true, message: 'ticket has no valid frame size: "x"' });
  });
});
