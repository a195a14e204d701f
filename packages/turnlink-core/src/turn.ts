// Turn state machine.
//
// Each peer runs its own copy. The two stay in step because every successful
// send on one side is matched by exactly one successful receive on the
// other; nothing about the turn is ever put on the wire.

import { NetcodeError } from "./errors.ts";
import { Role } from "./role.ts";

/** Whose turn it is, from the local point of view. */
export const TurnState = {
  MyTurn: "my-turn",
  OpponentsTurn: "opponents-turn",
  Closed: "closed",
} as const;
export type TurnState = (typeof TurnState)[keyof typeof TurnState];

/** Observer for state changes. */
export type TurnListener = (from: TurnState, to: TurnState) => void;

/** Tracks the turn and guards transitions. `Closed` is terminal. */
export class TurnStateMachine {
  private _state: TurnState;
  private _closeReason: NetcodeError | null = null;
  private listeners: TurnListener[] = [];

  constructor(initial: TurnState) {
    this._state = initial;
  }

  /** Seed the machine from a negotiated role. */
  static forRole(role: Role): TurnStateMachine {
    return new TurnStateMachine(role === Role.FirstMover ? TurnState.MyTurn : TurnState.OpponentsTurn);
  }

  get state(): TurnState {
    return this._state;
  }

  /** The error that closed the machine, or null for a local shutdown. */
  get closeReason(): NetcodeError | null {
    return this._closeReason;
  }

  onTransition(listener: TurnListener): void {
    this.listeners.push(listener);
  }

  /**
   * Check that we may send now. Throws without changing state: `closed`
   * after closure, a local turn violation while it is the opponent's turn.
   */
  assertCanSend(): void {
    if (this._state === TurnState.Closed) throw NetcodeError.closed();
    if (this._state !== TurnState.MyTurn) throw NetcodeError.outOfTurn();
  }

  /** Check that the session is still open. */
  assertOpen(): void {
    if (this._state === TurnState.Closed) throw NetcodeError.closed();
  }

  /** A full frame was written: the turn passes to the opponent. */
  sent(): void {
    this.assertCanSend();
    this.transition(TurnState.OpponentsTurn);
  }

  /**
   * A full frame arrived. Legal only on the opponent's turn; arriving on ours
   * means the peer sent without holding the turn, which closes the machine
   * and throws the remote violation.
   */
  received(): void {
    this.assertOpen();
    if (this._state === TurnState.MyTurn) {
      const violation = NetcodeError.peerOutOfTurn();
      this.close(violation);
      throw violation;
    }
    this.transition(TurnState.MyTurn);
  }

  /**
   * Move to `Closed`. Returns false if already closed, in which case the
   * first reason is kept.
   */
  close(reason: NetcodeError | null = null): boolean {
    if (this._state === TurnState.Closed) return false;
    this._closeReason = reason;
    this.transition(TurnState.Closed);
    return true;
  }

  private transition(to: TurnState): void {
    const from = this._state;
    this._state = to;
    for (const listener of this.listeners) {
      listener(from, to);
    }
  }
}
