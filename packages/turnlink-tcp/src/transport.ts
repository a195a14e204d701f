// TCP transport for turnlink sessions.

import net from "node:net";
import type { Duplex } from "node:stream";
import {
  ConnectionSide,
  NetcodeError,
  type SessionOptions,
  type TurnSession,
  debugLog,
  establishSession,
  resolveSessionConfig,
} from "@turnlink/core";
import { StreamChannel } from "./stream.ts";
import { formatTicket, parseTicket } from "./ticket.ts";

const LOG_NAMESPACE = "turnlink:tcp";

/** Options for hosting a game. */
export interface HostOptions {
  /** Interface to listen on. Defaults to 127.0.0.1. */
  host?: string;
  /** Port to listen on. Defaults to 0 (any free port). */
  port?: number;
  /** Host name to put in the ticket, if peers reach us under another name. */
  advertiseHost?: string;
}

/** A session backed by a TCP socket or another duplex stream. */
export type StreamSession = TurnSession<StreamChannel>;

/** Opens sessions over TCP. All sessions share the same session options. */
export class TcpPeer {
  readonly options: SessionOptions;

  constructor(options: SessionOptions = {}) {
    this.options = options;
  }

  /**
   * Listen for exactly one opponent. The returned host exposes a ticket to
   * share; `accept()` resolves once the opponent has joined.
   */
  async host(options: HostOptions = {}): Promise<TcpHost> {
    const { frameSize } = resolveSessionConfig(this.options);
    const server = net.createServer();
    const listenHost = options.host ?? "127.0.0.1";

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(NetcodeError.setup(`could not listen on ${listenHost}:${options.port ?? 0}: ${err.message}`, err));
      };
      server.once("error", onError);
      server.listen(options.port ?? 0, listenHost, () => {
        server.off("error", onError);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === "string") {
      server.close();
      throw NetcodeError.setup("listening socket has no TCP address");
    }

    const ticket = formatTicket({ host: options.advertiseHost ?? listenHost, port: address.port, frameSize });
    debugLog(LOG_NAMESPACE, "hosting", { ticket });
    return new TcpHost(this, server, ticket);
  }

  /** Join a game from the ticket its host shared. */
  async join(ticket: string): Promise<StreamSession> {
    const parsed = parseTicket(ticket);
    const { frameSize } = resolveSessionConfig(this.options);
    if (parsed.frameSize !== frameSize) {
      throw NetcodeError.setup(`ticket frame size ${parsed.frameSize} does not match local frame size ${frameSize}`);
    }
    const host = parsed.host.includes(":") ? `[${parsed.host}]` : parsed.host;
    return this.connect(`${host}:${parsed.port}`);
  }

  /** Dial `host:port` and establish a session as the initiator. */
  connect(addr: string): Promise<StreamSession> {
    return new Promise((resolve, reject) => {
      const lastColon = addr.lastIndexOf(":");
      const port = Number(addr.slice(lastColon + 1));
      if (lastColon < 0 || !Number.isInteger(port) || port < 1 || port > 65535) {
        reject(NetcodeError.setup(`invalid address: ${addr}`));
        return;
      }
      const host = addr.slice(0, lastColon).replace(/^\[(.*)\]$/, "$1");

      const onError = (err: Error) => {
        reject(NetcodeError.setup(`could not connect to ${addr}: ${err.message}`, err));
      };

      const socket = net.createConnection({ host, port }, () => {
        socket.setNoDelay(true);
        debugLog(LOG_NAMESPACE, "connected", { addr });
        const pending = this.attach(socket, ConnectionSide.Initiator);
        socket.off("error", onError);
        pending.then(resolve, reject);
      });

      socket.once("error", onError);
    });
  }

  /** Establish a session over an already connected stream. */
  attach<S extends Duplex>(stream: S, side: ConnectionSide): Promise<StreamSession> {
    return establishSession(new StreamChannel(stream), side, this.options);
  }
}

/** A listening host waiting for its one opponent. */
export class TcpHost {
  /** Share this with the other player. */
  readonly ticket: string;

  private readonly peer: TcpPeer;
  private readonly server: net.Server;
  private joined: net.Socket | null = null;
  private accepting = false;
  private waiting: { resolve: (socket: net.Socket) => void; reject: (err: NetcodeError) => void } | null = null;

  constructor(peer: TcpPeer, server: net.Server, ticket: string) {
    this.peer = peer;
    this.server = server;
    this.ticket = ticket;

    server.on("connection", (socket) => this.handleConnection(socket));
    server.on("close", () => {
      const waiting = this.waiting;
      this.waiting = null;
      waiting?.reject(NetcodeError.setup("host closed before a peer joined"));
    });
  }

  /** Port the host is listening on. */
  get port(): number {
    return parseTicket(this.ticket).port;
  }

  /** Wait for the opponent and establish a session as the acceptor. */
  async accept(): Promise<StreamSession> {
    if (this.accepting) {
      throw NetcodeError.setup("accept() was already called on this host");
    }
    this.accepting = true;
    const socket = await this.nextSocket();
    return this.peer.attach(socket, ConnectionSide.Acceptor);
  }

  /** Stop listening. A session already accepted stays open. */
  close(): Promise<void> {
    if (!this.server.listening) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private nextSocket(): Promise<net.Socket> {
    if (this.joined) return Promise.resolve(this.joined);
    if (!this.server.listening) {
      return Promise.reject(NetcodeError.setup("host closed before a peer joined"));
    }
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  private handleConnection(socket: net.Socket): void {
    if (this.joined) {
      debugLog(LOG_NAMESPACE, "refusing extra connection", { remote: socket.remoteAddress });
      socket.destroy();
      return;
    }

    this.joined = socket;
    socket.setNoDelay(true);
    socket.on("error", (err) => debugLog(LOG_NAMESPACE, "socket error", { message: err.message }));
    debugLog(LOG_NAMESPACE, "peer joined", { remote: socket.remoteAddress, port: socket.remotePort });

    // One opponent per game.
    this.server.close();

    const waiting = this.waiting;
    this.waiting = null;
    waiting?.resolve(socket);
  }
}
