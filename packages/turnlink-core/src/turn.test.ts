// Tests for the turn state machine

import { describe, it, expect } from "vitest";
import { TurnState, TurnStateMachine } from "./turn.ts";
import { Role } from "./role.ts";
import { NetcodeError } from "./errors.ts";

describe("TurnStateMachine", () => {
  it("starts from the negotiated role", () => {
    expect(TurnStateMachine.forRole(Role.FirstMover).state).toBe(TurnState.MyTurn);
    expect(TurnStateMachine.forRole(Role.SecondMover).state).toBe(TurnState.OpponentsTurn);
  });

  it("alternates on send and receive", () => {
    const turn = TurnStateMachine.forRole(Role.FirstMover);
    const seen: string[] = [];
    turn.onTransition((from, to) => seen.push(`${from}>${to}`));

    turn.sent();
    expect(turn.state).toBe(TurnState.OpponentsTurn);
    turn.received();
    expect(turn.state).toBe(TurnState.MyTurn);

    expect(seen).toEqual(["my-turn>opponents-turn", "opponents-turn>my-turn"]);
  });

  it("refuses to send on the opponent's turn without changing state", () => {
    const turn = TurnStateMachine.forRole(Role.SecondMover);

    expect(() => turn.assertCanSend()).toThrow("cannot send: it is not our turn");
    expect(() => turn.sent()).toThrow(NetcodeError);
    expect(turn.state).toBe(TurnState.OpponentsTurn);
  });

  it("closes on a frame that arrives during our turn", () => {
    const turn = TurnStateMachine.forRole(Role.FirstMover);

    let thrown: unknown;
    try {
      turn.received();
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(NetcodeError);
    expect(thrown).toMatchObject({ kind: "turnViolation", fatal: true });
    expect(turn.state).toBe(TurnState.Closed);
    expect(turn.closeReason).toBe(thrown);
  });

  it("stays closed and keeps the first reason", () => {
    const turn = TurnStateMachine.forRole(Role.FirstMover);
    const reason = NetcodeError.transport("peer closed the connection");
    const seen: string[] = [];
    turn.onTransition((_from, to) => seen.push(to));

    expect(turn.close(reason)).toBe(true);
    expect(turn.close(null)).toBe(false);

    expect(turn.state).toBe(TurnState.Closed);
    expect(turn.closeReason).toBe(reason);
    expect(seen).toEqual(["closed"]);
    expect(() => turn.assertCanSend()).toThrow("session closed");
    expect(() => turn.assertOpen()).toThrow("session closed");
    expect(() => turn.received()).toThrow("session closed");
  });
});
