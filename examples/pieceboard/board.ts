// Board state and the 4-byte move codec for pieceboard.
//
// A move travels as [srcRank, srcFile, destRank, destFile] with ranks 1-8
// and files as ASCII 'a'-'h'.

export const MOVE_SIZE = 4;

const FILES = "abcdefgh";

export type Color = "white" | "black";

/** A square on the board. */
export interface Tile {
  rank: number;
  file: string;
}

export interface Piece {
  color: Color;
  tile: Tile;
}

export interface Move {
  src: Tile;
  dest: Tile;
}

export class MoveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MoveError";
  }
}

export function isOnBoard(tile: Tile): boolean {
  return Number.isInteger(tile.rank) && tile.rank >= 1 && tile.rank <= 8 && tile.file.length === 1 && FILES.includes(tile.file);
}

export function sameTile(a: Tile, b: Tile): boolean {
  return a.rank === b.rank && a.file === b.file;
}

/** Parse a square like "e2". */
export function parseTile(text: string): Tile {
  const match = /^([a-h])([1-8])$/.exec(text.trim().toLowerCase());
  if (!match) throw new MoveError(`not a square: "${text}"`);
  return { file: match[1] ?? "", rank: Number(match[2]) };
}

export function formatTile(tile: Tile): string {
  return `${tile.file}${tile.rank}`;
}

/** Parse a move typed as "e2 e4" or "e2e4". */
export function parseMove(text: string): Move {
  const compact = text.replace(/[\s-]+/g, "");
  if (compact.length !== 4) throw new MoveError(`expected a move like "e2 e4", got "${text}"`);
  return { src: parseTile(compact.slice(0, 2)), dest: parseTile(compact.slice(2)) };
}

export function encodeMove(move: Move): Uint8Array {
  return Uint8Array.of(move.src.rank, move.src.file.charCodeAt(0), move.dest.rank, move.dest.file.charCodeAt(0));
}

export function decodeMove(bytes: Uint8Array): Move {
  if (bytes.length !== MOVE_SIZE) {
    throw new MoveError(`a move is ${MOVE_SIZE} bytes, got ${bytes.length}`);
  }
  const [srcRank = 0, srcFile = 0, destRank = 0, destFile = 0] = bytes;
  const move: Move = {
    src: { rank: srcRank, file: String.fromCharCode(srcFile) },
    dest: { rank: destRank, file: String.fromCharCode(destFile) },
  };
  if (!isOnBoard(move.src) || !isOnBoard(move.dest)) {
    throw new MoveError(`move leaves the board: [${Array.from(bytes).join(", ")}]`);
  }
  return move;
}

/** An 8x8 board with two back ranks of pieces per side. Captures replace. */
export class Board {
  private pieces: Piece[];

  constructor(pieces: Piece[] = Board.startingPieces()) {
    this.pieces = pieces.map((p) => ({ color: p.color, tile: { ...p.tile } }));
  }

  static startingPieces(): Piece[] {
    const pieces: Piece[] = [];
    const rows: Array<[Color, number]> = [
      ["white", 1],
      ["white", 2],
      ["black", 7],
      ["black", 8],
    ];
    for (const [color, rank] of rows) {
      for (const file of FILES) {
        pieces.push({ color, tile: { rank, file } });
      }
    }
    return pieces;
  }

  get size(): number {
    return this.pieces.length;
  }

  pieceAt(tile: Tile): Piece | undefined {
    return this.pieces.find((p) => sameTile(p.tile, tile));
  }

  count(color: Color): number {
    return this.pieces.filter((p) => p.color === color).length;
  }

  /**
   * Check a move for `color`. Returns the reason it is refused, or null if
   * the move may be played.
   */
  check(move: Move, color: Color): string | null {
    if (!isOnBoard(move.src) || !isOnBoard(move.dest)) return "that square is not on the board";
    if (sameTile(move.src, move.dest)) return "a piece must move to a different square";
    const piece = this.pieceAt(move.src);
    if (!piece) return `no piece on ${formatTile(move.src)}`;
    if (piece.color !== color) return `the piece on ${formatTile(move.src)} is not yours`;
    if (this.pieceAt(move.dest)?.color === color) return `${formatTile(move.dest)} holds one of your own pieces`;
    return null;
  }

  /** Apply a move, capturing whatever stood on the destination. */
  apply(move: Move): void {
    const piece = this.pieceAt(move.src);
    if (!piece) throw new MoveError(`no piece on ${formatTile(move.src)}`);
    if (sameTile(move.src, move.dest)) return;
    this.pieces = this.pieces.filter((p) => !sameTile(p.tile, move.dest));
    piece.tile = { ...move.dest };
  }

  /** Text rendering, rank 8 at the top. */
  render(): string {
    const lines: string[] = [];
    for (let rank = 8; rank >= 1; rank--) {
      const cells = Array.from(FILES, (file) => {
        const piece = this.pieceAt({ rank, file });
        if (!piece) return ".";
        return piece.color === "white" ? "W" : "B";
      });
      lines.push(`${rank} ${cells.join(" ")}`);
    }
    lines.push(`  ${FILES.split("").join(" ")}`);
    return lines.join("\n");
  }
}
