// Turn session: the public face of the protocol.
//
// Composes the role, the turn state machine and the framer over one
// exclusively owned ByteChannel. Sends and receives use independent halves
// of the channel; each frame write and each frame read is applied to the
// turn state as a single step.

import type { ByteChannel } from "./channel.ts";
import type { SessionConfig } from "./config.ts";
import { NetcodeError } from "./errors.ts";
import { FrameCodec, toNetcodeError } from "./framing.ts";
import { debugLog } from "./logging.ts";
import {
  Extensions,
  RejectionError,
  type Exchange,
  type ExchangeContext,
  type ExchangeOutcome,
  type SessionMiddleware,
} from "./middleware.ts";
import { type ConnectionSide, type Role, negotiateRole } from "./role.ts";
import { TurnState, TurnStateMachine } from "./turn.ts";

const LOG_NAMESPACE = "turnlink:turn";

/** Options for a single receive. */
export interface ReceiveOptions {
  /** Abort the wait. Nothing is consumed and the turn is unchanged. */
  signal?: AbortSignal;
  /**
   * Give up after this many milliseconds, as if `signal` had fired.
   * Overrides the session's `receiveTimeoutMs`; null waits forever.
   */
  timeoutMs?: number | null;
}

/** Lifecycle status of a session. `reason` is null after a local close. */
export type SessionStatus =
  | { state: "active" }
  | { state: "closed"; reason: NetcodeError | null };

/**
 * A live pairing with a negotiated role.
 *
 * If it is our turn we may `send` once, after which it is the opponent's
 * turn. We may `receive` at any time: the call resolves once the opponent's
 * frame arrives, and then it is our turn again.
 */
export class TurnSession<C extends ByteChannel = ByteChannel> {
  readonly side: ConnectionSide;
  readonly role: Role;
  readonly config: Readonly<SessionConfig>;

  private readonly channel: C;
  private readonly codec: FrameCodec;
  private readonly turn: TurnStateMachine;
  private readonly middleware: SessionMiddleware[];
  private closeListeners: Array<(reason: NetcodeError | null) => void> = [];
  private sendInFlight = false;
  private receivePending = false;
  private _sent = 0;
  private _received = 0;
  private channelError: Error | null = null;

  constructor(channel: C, side: ConnectionSide, config: SessionConfig, middleware: SessionMiddleware[] = []) {
    this.channel = channel;
    this.side = side;
    this.config = config;
    this.role = negotiateRole(side, config.firstMover);
    this.codec = new FrameCodec(config.frameSize);
    this.turn = TurnStateMachine.forRole(this.role);
    this.middleware = middleware;

    this.turn.onTransition((from, to) => {
      debugLog(LOG_NAMESPACE, `${from} → ${to}`, { side: this.side, sent: this._sent, received: this._received });
      if (to === TurnState.Closed) {
        this.notifyClosed();
      }
    });
    channel.onClose((error) => this.handleChannelClosed(error));
  }

  /** Payload size of every frame. */
  get frameSize(): number {
    return this.codec.frameSize;
  }

  /** Frames successfully sent. */
  get sent(): number {
    return this._sent;
  }

  /** Frames successfully received. */
  get received(): number {
    return this._received;
  }

  /** Whose turn it is. Pure query. */
  currentTurn(): TurnState {
    return this.turn.state;
  }

  /** True if we hold the turn. */
  isMyTurn(): boolean {
    return this.turn.state === TurnState.MyTurn;
  }

  status(): SessionStatus {
    if (this.turn.state === TurnState.Closed) {
      return { state: "closed", reason: this.turn.closeReason };
    }
    return { state: "active" };
  }

  /** Get the underlying channel. */
  getChannel(): C {
    return this.channel;
  }

  /**
   * Register a listener called once when the session closes, with the error
   * that closed it or null for a local close.
   */
  onClose(listener: (reason: NetcodeError | null) => void): void {
    if (this.turn.state === TurnState.Closed) {
      listener(this.turn.closeReason);
      return;
    }
    this.closeListeners.push(listener);
  }

  /**
   * Send our move.
   *
   * Rejects without touching the channel if the session is closed, it is not
   * our turn (or a send is already writing), or the payload is not exactly
   * `frameSize` bytes. Otherwise resolves once the whole frame is written,
   * after which it is the opponent's turn.
   */
  async send(payload: Uint8Array): Promise<void> {
    this.turn.assertCanSend();
    if (this.sendInFlight) throw NetcodeError.outOfTurn();
    const violation = this.codec.validate(payload);
    if (violation) throw violation;

    this.sendInFlight = true;
    const exchange: Exchange = { direction: "send", sequence: this._sent + 1, payload };
    try {
      await this.runExchange(exchange, async () => {
        this.turn.assertCanSend();
        await this.codec.writeFrame(this.channel, payload);
        this.turn.sent();
        this._sent += 1;
        return payload;
      });
    } finally {
      this.sendInFlight = false;
      this.settle();
    }
  }

  /**
   * Wait for the opponent's move.
   *
   * Legal on either turn: waiting on our own turn is allowed, but a frame
   * that arrives before we have sent means the peer moved out of turn, which
   * closes the session. Resolves with exactly `frameSize` bytes, after which
   * it is our turn.
   */
  async receive(options: ReceiveOptions = {}): Promise<Uint8Array> {
    this.turn.assertOpen();
    if (this.receivePending) throw NetcodeError.busy();

    this.receivePending = true;
    const timeoutMs = options.timeoutMs === undefined ? this.config.receiveTimeoutMs : options.timeoutMs;
    const abort = linkAbort(options.signal, timeoutMs);
    const exchange: Exchange = { direction: "receive", sequence: this._received + 1, payload: null };
    try {
      return await this.runExchange(exchange, async () => {
        this.turn.assertOpen();
        const frame = await this.codec.readFrame(this.channel, abort.signal);
        this.turn.received();
        this._received += 1;
        return frame;
      });
    } finally {
      abort.dispose();
      this.receivePending = false;
      this.settle();
    }
  }

  /**
   * Poll for the opponent's move without waiting for the network.
   *
   * Resolves with the frame if one is already buffered (with the same
   * transitions as `receive`) and with null otherwise.
   */
  async tryReceive(): Promise<Uint8Array | null> {
    this.turn.assertOpen();
    if (this.receivePending) throw NetcodeError.busy();
    if (!this.codec.frameReady(this.channel)) return null;
    return this.receive({ timeoutMs: null });
  }

  /** Release the channel and move to Closed. Idempotent. */
  close(): void {
    this.turn.close(null);
    this.channel.close();
  }

  private async runExchange(exchange: Exchange, action: () => Promise<Uint8Array>): Promise<Uint8Array> {
    const ctx: ExchangeContext = { extensions: new Extensions() };

    for (const mw of this.middleware) {
      const rejection = await mw.pre?.(ctx, exchange);
      if (rejection) {
        const error = new RejectionError(rejection, exchange);
        await this.runPost(ctx, exchange, { ok: false, error });
        throw error;
      }
    }

    let outcome: ExchangeOutcome;
    try {
      outcome = { ok: true, payload: await action() };
    } catch (e) {
      const closedLocally = this.turn.state === TurnState.Closed && this.turn.closeReason === null;
      const error = closedLocally ? NetcodeError.closed() : toNetcodeError(e, this.codec.frameSize);
      if (error.fatal) this.fail(error);
      outcome = { ok: false, error };
    }

    await this.runPost(ctx, exchange, outcome);
    if (!outcome.ok) throw outcome.error;
    return outcome.payload;
  }

  private async runPost(ctx: ExchangeContext, exchange: Exchange, outcome: ExchangeOutcome): Promise<void> {
    // Reverse order: first added runs first on pre, last on post.
    for (let i = this.middleware.length - 1; i >= 0; i--) {
      const mw = this.middleware[i];
      if (!mw?.post) continue;
      try {
        await mw.post(ctx, exchange, outcome);
      } catch (e) {
        // Post hooks observe only; the exchange stands.
        debugLog("turnlink:session", "post hook failed", { direction: exchange.direction, error: String(e) });
      }
    }
  }

  /** Close because the wire or the peer can no longer be trusted. */
  private fail(error: NetcodeError): void {
    this.turn.close(error);
    this.channel.close();
  }

  private handleChannelClosed(error: Error | null): void {
    this.channelError = error;
    this.settle();
  }

  /**
   * Close the session once the channel has ended and nothing is left to
   * deliver. An exchange in progress reports the closure itself.
   */
  private settle(): void {
    if (this.sendInFlight || this.receivePending) return;
    if (!this.channel.closed || this.turn.state === TurnState.Closed) return;
    // Frames the peer sent before it closed are still owed to `receive`.
    if (this.channel.buffered >= this.codec.frameSize) return;
    this.fail(channelClosedError(this.channelError, this.channel.buffered, this.codec.frameSize));
  }

  private notifyClosed(): void {
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener(this.turn.closeReason);
    }
  }
}

function channelClosedError(error: Error | null, buffered: number, frameSize: number): NetcodeError {
  if (buffered > 0) return NetcodeError.truncated(frameSize, buffered);
  return error
    ? NetcodeError.transport(`transport error: ${error.message}`, error)
    : NetcodeError.transport("peer closed the connection");
}

/** Combine an optional caller signal with an optional timeout. */
function linkAbort(
  signal: AbortSignal | undefined,
  timeoutMs: number | null,
): { signal: AbortSignal | undefined; dispose: () => void } {
  if (timeoutMs === null) {
    return { signal, dispose: () => {} };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }
  const timer = setTimeout(() => {
    controller.abort(new Error(`no frame received within ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    },
  };
}
