import { describe, it, expect } from "vitest";
import { Board, decodeMove, encodeMove, parseMove, parseTile } from "./board.ts";

describe("move codec", () => {
  it("encodes ranks as numbers and files as ASCII", () => {
    const move = parseMove("e2 e4");

    expect(encodeMove(move)).toEqual(Uint8Array.of(2, 0x65, 4, 0x65));
    expect(decodeMove(Uint8Array.of(7, 0x61, 5, 0x68))).toEqual({
      src: { rank: 7, file: "a" },
      dest: { rank: 5, file: "h" },
    });
  });

  it("rejects moves off the board", () => {
    expect(() => decodeMove(Uint8Array.of(9, 0x61, 1, 0x61))).toThrow("move leaves the board: [9, 97, 1, 97]");
    expect(() => decodeMove(Uint8Array.of(1, 0x69, 1, 0x61))).toThrow("move leaves the board");
    expect(() => decodeMove(Uint8Array.of(1, 0x61, 1))).toThrow("a move is 4 bytes, got 3");
  });

  it("parses typed moves", () => {
    expect(parseMove("b1-c3")).toEqual({ src: { file: "b", rank: 1 }, dest: { file: "c", rank: 3 } });
    expect(parseMove("G8F6")).toEqual({ src: { file: "g", rank: 8 }, dest: { file: "f", rank: 6 } });
    expect(() => parseMove("e2")).toThrow('expected a move like "e2 e4", got "e2"');
    expect(() => parseTile("z9")).toThrow('not a square: "z9"');
  });
});

describe("Board", () => {
  it("starts with two full ranks per side", () => {
    const board = new Board();

    expect(board.size).toBe(32);
    expect(board.count("white")).toBe(16);
    expect(board.count("black")).toBe(16);
    expect(board.render()).toBe(
      [
        "8 B B B B B B B B",
        "7 B B B B B B B B",
        "6 . . . . . . . .",
        "5 . . . . . . . .",
        "4 . . . . . . . .",
        "3 . . . . . . . .",
        "2 W W W W W W W W",
        "1 W W W W W W W W",
        "  a b c d e f g h",
      ].join("\n"),
    );
  });

  it("moves a piece", () => {
    const board = new Board();
    board.apply(parseMove("e2 e4"));

    expect(board.pieceAt(parseTile("e2"))).toBeUndefined();
    expect(board.pieceAt(parseTile("e4"))).toEqual({ color: "white", tile: { rank: 4, file: "e" } });
    expect(board.size).toBe(32);
  });

  it("captures whatever stands on the destination", () => {
    const board = new Board();
    board.apply(parseMove("a2 a7"));

    expect(board.pieceAt(parseTile("a7"))?.color).toBe("white");
    expect(board.count("black")).toBe(15);
    expect(board.size).toBe(31);
  });

  it("explains why a move is refused", () => {
    const board = new Board();

    expect(board.check(parseMove("e2 e4"), "white")).toBeNull();
    expect(board.check(parseMove("e4 e5"), "white")).toBe("no piece on e4");
    expect(board.check(parseMove("e7 e5"), "white")).toBe("the piece on e7 is not yours");
    expect(board.check(parseMove("e1 e2"), "white")).toBe("e2 holds one of your own pieces");
    expect(board.check(parseMove("e2 e2"), "white")).toBe("a piece must move to a different square");
  });
});
