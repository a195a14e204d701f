// pieceboard: move pieces around a shared board, one move per turn.
//
//   npm run example:pieceboard -- server
//   npm run example:pieceboard -- client --ticket=turnlink://127.0.0.1:4000?frame=4
//
// The joining player moves first and plays white.

import * as readline from "node:readline/promises";
import {
  ConnectionSide,
  NetcodeError,
  type SessionOptions,
  type StreamSession,
  TcpPeer,
  loggingMiddleware,
} from "@turnlink/tcp";
import type { SessionMiddleware } from "@turnlink/core";
import { isClient, ticketArg } from "../cli.ts";
import { Board, type Color, MOVE_SIZE, MoveError, decodeMove, encodeMove, formatTile, parseMove } from "./board.ts";

/** Refuse to put a move on the wire that the board would not accept. */
function legalMovesOnly(board: Board, color: Color): SessionMiddleware {
  return {
    pre(_ctx, exchange) {
      if (exchange.direction !== "send" || !exchange.payload) return;
      const reason = board.check(decodeMove(exchange.payload), color);
      if (reason) return { code: "illegal-move", message: reason };
    },
  };
}

async function openSession(argv: string[], options: SessionOptions): Promise<StreamSession> {
  const peer = new TcpPeer(options);
  if (isClient(argv)) {
    return peer.join(ticketArg(argv));
  }

  const host = await peer.host({ port: Number(process.env.PIECEBOARD_PORT ?? 0) });
  console.log(`hosting game. another player may join with\n\n  npm run example:pieceboard -- client --ticket=${host.ticket}\n`);
  return host.accept();
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const board = new Board();
  const side = isClient(argv) ? ConnectionSide.Initiator : ConnectionSide.Acceptor;
  const color: Color = side === ConnectionSide.Initiator ? "white" : "black";
  const opponent: Color = color === "white" ? "black" : "white";

  const session = await openSession(argv, {
    frameSize: MOVE_SIZE,
    middleware: [legalMovesOnly(board, color), loggingMiddleware({ namespace: "pieceboard:moves", logPayloads: true })],
  });
  console.log(`connected. you play ${color}.\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      console.log(board.render());

      if (session.isMyTurn()) {
        const answer = await rl.question("\nyour move (e.g. e2 e4, or q to quit): ");
        if (answer.trim() === "q") break;
        try {
          const move = parseMove(answer);
          await session.send(encodeMove(move));
          board.apply(move);
        } catch (e) {
          if (e instanceof NetcodeError && e.fatal) throw e;
          console.log(`  ${e instanceof Error ? e.message : String(e)}`);
        }
        continue;
      }

      console.log(`\nwaiting for ${opponent}...`);
      const move = decodeMove(await session.receive());
      const reason = board.check(move, opponent);
      if (reason) {
        throw new MoveError(`opponent played an illegal move: ${reason}`);
      }
      board.apply(move);
      console.log(`${opponent} moved ${formatTile(move.src)} → ${formatTile(move.dest)}`);
    }
  } finally {
    rl.close();
    session.close();
  }
}

main().catch((e: unknown) => {
  if (e instanceof NetcodeError && e.kind === "transport") {
    console.log("the other player left the game.");
    return;
  }
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
