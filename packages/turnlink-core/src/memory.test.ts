// Tests for in-process channels and inbound buffering

import { describe, it, expect } from "vitest";
import { memoryChannelPair } from "./memory.ts";
import { InboundBuffer } from "./inbound.ts";
import { ChannelError } from "./channel.ts";

describe("InboundBuffer", () => {
  it("serves exact reads across chunk boundaries", async () => {
    const inbound = new InboundBuffer();
    const pending = inbound.read(5);

    inbound.push(Uint8Array.of(1, 2));
    inbound.push(Uint8Array.of(3));
    inbound.push(Uint8Array.of(4, 5, 6));

    expect(await pending).toEqual(Uint8Array.of(1, 2, 3, 4, 5));
    expect(inbound.length).toBe(1);
  });

  it("consumes nothing when a read is aborted", async () => {
    const inbound = new InboundBuffer();
    const controller = new AbortController();
    inbound.push(Uint8Array.of(1, 2));

    const pending = inbound.read(4, controller.signal);
    controller.abort(new Error("gave up"));

    await expect(pending).rejects.toMatchObject({ kind: "aborted", message: "gave up" });
    expect(inbound.length).toBe(2);

    inbound.push(Uint8Array.of(3, 4));
    expect(await inbound.read(4)).toEqual(Uint8Array.of(1, 2, 3, 4));
  });

  it("rejects at once when the signal has already fired", async () => {
    const inbound = new InboundBuffer();
    const controller = new AbortController();
    controller.abort();

    await expect(inbound.read(1, controller.signal)).rejects.toMatchObject({ kind: "aborted" });
    expect(inbound.isEnded).toBe(false);
  });

  it("allows a single pending read", async () => {
    const inbound = new InboundBuffer();
    const first = inbound.read(1);

    await expect(inbound.read(1)).rejects.toMatchObject({ kind: "io", message: "a read is already pending" });

    inbound.push(Uint8Array.of(9));
    expect(await first).toEqual(Uint8Array.of(9));
  });

  it("distinguishes a clean end from a truncated one", async () => {
    const clean = new InboundBuffer();
    clean.end();
    await expect(clean.read(4)).rejects.toMatchObject({ kind: "closed" });

    const partial = new InboundBuffer();
    partial.push(Uint8Array.of(1));
    const pending = partial.read(4);
    partial.end();
    await expect(pending).rejects.toMatchObject({ kind: "truncated", buffered: 1 });
  });

  it("reports the transport error that ended the stream", async () => {
    const inbound = new InboundBuffer();
    inbound.end(new Error("ECONNRESET"));

    const failed = inbound.read(1);
    await expect(failed).rejects.toBeInstanceOf(ChannelError);
    await expect(failed).rejects.toMatchObject({ kind: "io", message: "ECONNRESET" });
  });

  it("still serves whole frames buffered before the end", async () => {
    const inbound = new InboundBuffer();
    inbound.push(Uint8Array.of(1, 2, 3));
    inbound.end();

    expect(await inbound.read(2)).toEqual(Uint8Array.of(1, 2));
    await expect(inbound.read(2)).rejects.toMatchObject({ kind: "truncated" });
  });
});

describe("MemoryChannel", () => {
  it("delivers bytes to the other end and counts writes", async () => {
    const [a, b] = memoryChannelPair();

    await a.write(Uint8Array.of(1, 2, 3));
    await a.write(Uint8Array.of(4));

    expect(a.writeCount).toBe(2);
    expect(a.bytesWritten).toBe(4);
    expect(b.buffered).toBe(4);
    expect(await b.readExact(4)).toEqual(Uint8Array.of(1, 2, 3, 4));
  });

  it("copies written bytes", async () => {
    const [a, b] = memoryChannelPair();
    const payload = Uint8Array.of(1, 2);

    await a.write(payload);
    payload[0] = 99;

    expect(await b.readExact(2)).toEqual(Uint8Array.of(1, 2));
  });

  it("closes both ends and notifies listeners once", async () => {
    const [a, b] = memoryChannelPair();
    const events: string[] = [];
    a.onClose((error) => events.push(`a:${error === null ? "clean" : error.message}`));
    b.onClose((error) => events.push(`b:${error === null ? "clean" : error.message}`));

    a.close();
    a.close();

    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
    expect(events).toEqual(["a:clean", "b:clean"]);
    await expect(b.write(Uint8Array.of(1))).rejects.toMatchObject({ kind: "io", message: "channel closed" });
  });

  it("fails one end with an error and closes the other cleanly", async () => {
    const [a, b] = memoryChannelPair();
    const errors: Array<Error | null> = [];
    b.onClose((error) => errors.push(error));

    a.fail(new Error("process exited"));

    expect(errors).toEqual([null]);
    await expect(a.write(Uint8Array.of(1))).rejects.toMatchObject({ message: "process exited" });
    await expect(b.readExact(1)).rejects.toMatchObject({ kind: "closed" });
  });

  it("calls late close listeners immediately", () => {
    const [a] = memoryChannelPair();
    a.close();

    let called = false;
    a.onClose(() => {
      called = true;
    });
    expect(called).toBe(true);
  });
});
