// Send a ping/pong, then echo an incrementing counter.
//
//   npm run example:ping-echo -- server
//   npm run example:ping-echo -- client --ticket=turnlink://127.0.0.1:4000?frame=4 [--rounds=5]

import { sessionConfigFromEnv } from "@turnlink/core";
import { TcpPeer, type StreamSession, isNetcodeError } from "@turnlink/tcp";
import { countFlag, isClient, ticketArg } from "./cli.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

async function runClient(session: StreamSession, rounds: number): Promise<void> {
  await session.send(encoder.encode("ping"));
  console.log("Client sent ping");

  const reply = await session.receive();
  if (decoder.decode(reply) !== "pong") {
    throw new Error(`expected pong, got ${decoder.decode(reply)}`);
  }
  console.log("Client received pong");

  for (let counter = 0; counter < rounds; counter++) {
    const bytes = Uint8Array.of(0, 0, 0, counter & 0xff);
    await session.send(bytes);
    console.log(`Client sent [${bytes.join(", ")}]`);

    const echoed = await session.receive();
    if (!sameBytes(echoed, bytes)) {
      throw new Error(`echo mismatch: sent [${bytes.join(", ")}], got [${echoed.join(", ")}]`);
    }
    console.log(`Client got [${echoed.join(", ")}] back`);
  }
}

async function runServer(session: StreamSession): Promise<void> {
  const ping = await session.receive();
  if (decoder.decode(ping) !== "ping") {
    throw new Error(`expected ping, got ${decoder.decode(ping)}`);
  }
  console.log("Server received ping");

  await session.send(encoder.encode("pong"));
  console.log("Server sent pong");

  for (;;) {
    const bytes = await session.receive();
    console.log(`Server received: [${bytes.join(", ")}]`);

    await session.send(bytes);
    console.log("Server echoed");
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const config = sessionConfigFromEnv(process.env, { frameSize: 4 });
  const peer = new TcpPeer(config);

  if (isClient(argv)) {
    const rounds = countFlag(argv, "rounds", 5);
    const session = await peer.join(ticketArg(argv));
    try {
      await runClient(session, rounds);
    } finally {
      session.close();
    }
    return;
  }

  const host = await peer.host();
  console.log(
    `hosting game. another player may join with\n\n  npm run example:ping-echo -- client --ticket=${host.ticket}\n`,
  );
  const session = await host.accept();
  try {
    await runServer(session);
  } finally {
    session.close();
  }
}

main().catch((e: unknown) => {
  if (isNetcodeError(e, "transport")) {
    console.log("peer disconnected");
    return;
  }
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
