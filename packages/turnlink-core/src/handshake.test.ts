// Tests for session establishment

import { describe, it, expect } from "vitest";
import { decodeFrameSize, encodeFrameSize, establishAcceptor, establishInitiator } from "./handshake.ts";
import { memoryChannelPair } from "./memory.ts";
import { Role } from "./role.ts";

describe("establishSession", () => {
  it("puts nothing on the wire without a handshake", async () => {
    const [a, b] = memoryChannelPair();

    const initiator = await establishInitiator(a, { frameSize: 8 });
    const acceptor = await establishAcceptor(b, { frameSize: 8 });

    expect(initiator.role).toBe(Role.FirstMover);
    expect(acceptor.role).toBe(Role.SecondMover);
    expect(a.writeCount).toBe(0);
    expect(b.writeCount).toBe(0);
  });

  it("fails with a setup error on a closed channel", async () => {
    const [a] = memoryChannelPair();
    a.close();

    await expect(establishInitiator(a)).rejects.toMatchObject({
      kind: "setup",
      fatal: true,
      message: "channel closed before the session was established",
    });
  });

  it("exchanges matching frame sizes before play", async () => {
    const [a, b] = memoryChannelPair();

    const [initiator, acceptor] = await Promise.all([
      establishInitiator(a, { frameSize: 8, handshake: "frame-size" }),
      establishAcceptor(b, { frameSize: 8, handshake: "frame-size" }),
    ]);

    expect(a.bytesWritten).toBe(4);
    expect(b.bytesWritten).toBe(4);
    expect(a.buffered).toBe(0);
    expect(b.buffered).toBe(0);

    const waiting = acceptor.receive();
    await initiator.send(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8));
    expect(await waiting).toEqual(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8));
  });

  it("refuses to start when frame sizes differ", async () => {
    const [a, b] = memoryChannelPair();

    const [initiator, acceptor] = await Promise.allSettled([
      establishInitiator(a, { frameSize: 8, handshake: "frame-size" }),
      establishAcceptor(b, { frameSize: 4, handshake: "frame-size" }),
    ]);

    expect(initiator).toMatchObject({
      status: "rejected",
      reason: { kind: "setup", message: "frame size mismatch: local 8, peer 4" },
    });
    expect(acceptor).toMatchObject({
      status: "rejected",
      reason: { kind: "setup", message: "frame size mismatch: local 4, peer 8" },
    });
    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
  });

  it("fails setup when the peer hangs up mid-handshake", async () => {
    const [a, b] = memoryChannelPair();

    const pending = establishAcceptor(b, { handshake: "frame-size" });
    a.close();

    await expect(pending).rejects.toMatchObject({
      kind: "setup",
      message: "frame-size handshake failed: channel closed",
    });
  });
});

describe("oversized frames", () => {
  it("fails setup instead of sending a wrapped size", async () => {
    const [a] = memoryChannelPair();

    await expect(establishInitiator(a, { frameSize: 2 ** 32 + 8, handshake: "frame-size" })).rejects.toMatchObject({
      kind: "setup",
      message: "frame-size handshake failed: frame size must fit in a u32, got 4294967304",
    });
    expect(a.writeCount).toBe(0);
    expect(a.closed).toBe(true);
  });
});

describe("frame size encoding", () => {
  it("is a little-endian u32", () => {
    expect(encodeFrameSize(8)).toEqual(Uint8Array.of(8, 0, 0, 0));
    expect(encodeFrameSize(0x01020304)).toEqual(Uint8Array.of(4, 3, 2, 1));
    expect(decodeFrameSize(Uint8Array.of(0, 1, 0, 0))).toBe(256);
    expect(encodeFrameSize(0xffff_ffff)).toEqual(Uint8Array.of(255, 255, 255, 255));
  });

  it("refuses sizes that do not fit in a u32", () => {
    expect(() => encodeFrameSize(2 ** 32 + 8)).toThrow("frame size must fit in a u32, got 4294967304");
  });
});
