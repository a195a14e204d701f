// Hooks around frame exchanges.
//
// Every send and every receive is one exchange. Middleware sees it before any
// byte moves and again once the frame has crossed (or failed to), which is
// enough for move validation, timing and replay capture.

/**
 * Names one slot of per-exchange state and the type stored in it.
 *
 * Create keys once at module level; two keys never collide, even with the
 * same description.
 */
export class ExchangeKey<T> {
  readonly description: string;
  // Never set; ties T to the key so get() and set() agree on it.
  private readonly valueType?: T;

  constructor(description: string) {
    this.description = description;
  }
}

/**
 * Scratch space that lives for one exchange.
 *
 * A pre hook leaves a value under its key and the matching post hook picks it
 * up; a fresh store is made for the next frame.
 *
 * @example
 * ```typescript
 * const MOVE = new ExchangeKey<string>("replay:move");
 * ctx.extensions.set(MOVE, describeMove(exchange.payload));
 * const move = ctx.extensions.get(MOVE); // string | undefined
 * ```
 */
export class Extensions {
  private slots = new Map<ExchangeKey<unknown>, unknown>();

  set<T>(key: ExchangeKey<T>, value: T): void {
    this.slots.set(key, value);
  }

  get<T>(key: ExchangeKey<T>): T | undefined {
    // set() is the only writer and is typed by the same key.
    return this.slots.get(key) as T | undefined;
  }

  has(key: ExchangeKey<unknown>): boolean {
    return this.slots.has(key);
  }

  delete(key: ExchangeKey<unknown>): boolean {
    return this.slots.delete(key);
  }
}

/** Handed to both hooks of a single exchange. */
export interface ExchangeContext {
  extensions: Extensions;
}

/** One frame crossing the session in either direction. */
export interface Exchange {
  readonly direction: "send" | "receive";
  /** 1-based index of this frame among frames in the same direction. */
  readonly sequence: number;
  /** The outgoing payload for sends; null for receives. */
  readonly payload: Uint8Array | null;
}

/** The frame that crossed, or why none did. */
export type ExchangeOutcome =
  | { ok: true; payload: Uint8Array }
  | { ok: false; error: Error };

/**
 * Why a hook refused a frame. Games use their own codes freely; the named
 * ones are what the bundled examples return.
 */
export type RejectionCode = "illegal-move" | "not-ready" | string;

/** Returned from a pre hook to stop a frame before it is written or awaited. */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/**
 * A pre hook refused the frame. Nothing reached the channel, nothing was
 * consumed from it, and the turn did not change, so the caller may retry.
 */
export class RejectionError extends Error {
  readonly code: RejectionCode;
  readonly direction: Exchange["direction"];
  readonly sequence: number;

  constructor(rejection: Rejection, exchange: Exchange) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
    this.direction = exchange.direction;
    this.sequence = exchange.sequence;
  }
}

/**
 * Hooks run around each exchange. Pre hooks run in the order given, post hooks
 * in reverse.
 *
 * @example
 * ```typescript
 * const onlyLegalMoves: SessionMiddleware = {
 *   pre(ctx, exchange) {
 *     if (exchange.direction === "send" && !board.isLegal(exchange.payload)) {
 *       return { code: "illegal-move", message: "that piece cannot move there" };
 *     }
 *   },
 * };
 * ```
 */
export interface SessionMiddleware {
  /** Runs before the frame is written, or before waiting for one. */
  pre?(ctx: ExchangeContext, exchange: Exchange): Promise<Rejection | void> | Rejection | void;

  /** Runs once the exchange has finished either way. Cannot change the result. */
  post?(ctx: ExchangeContext, exchange: Exchange, outcome: ExchangeOutcome): Promise<void> | void;
}
