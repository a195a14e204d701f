// Role negotiation.
//
// The transport already knows which side dialled and which side accepted,
// so the first mover falls out of that without a round trip.

/** Which end of the connection we are. */
export const ConnectionSide = {
  /** Dialled the peer. */
  Initiator: "initiator",
  /** Accepted the peer's connection. */
  Acceptor: "acceptor",
} as const;
export type ConnectionSide = (typeof ConnectionSide)[keyof typeof ConnectionSide];

/** Turn role - determines who holds the turn first. */
export const Role = {
  FirstMover: "first-mover",
  SecondMover: "second-mover",
} as const;
export type Role = (typeof Role)[keyof typeof Role];

/** The other end of a connection. */
export function oppositeSide(side: ConnectionSide): ConnectionSide {
  return side === ConnectionSide.Initiator ? ConnectionSide.Acceptor : ConnectionSide.Initiator;
}

/**
 * Decide our role from our side of the connection.
 *
 * `firstMover` names the side that moves first and must be the same on both
 * peers; it defaults to the initiator. Two peers on opposite sides always
 * end up with complementary roles.
 */
export function negotiateRole(
  side: ConnectionSide,
  firstMover: ConnectionSide = ConnectionSide.Initiator,
): Role {
  return side === firstMover ? Role.FirstMover : Role.SecondMover;
}
