import type { Coord, Piece, PieceKind, Player } from "../types.ts";
import { BOARD_SIZE, isValidCoord } from "./coords.ts";

export type Cell = Piece | null;
export type Board = Cell[][];

const BACK_RANK: PieceKind[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, (): Cell => null));
}

/** Standard set-up: Black on rows 0-1, White on rows 6-7. */
export function createInitialBoard(): Board {
  const board = createEmptyBoard();
  for (let c = 0; c < BOARD_SIZE; c++) {
    board[0][c] = { owner: "B", kind: BACK_RANK[c] };
    board[1][c] = { owner: "B", kind: "P" };
    board[6][c] = { owner: "W", kind: "P" };
    board[7][c] = { owner: "W", kind: BACK_RANK[c] };
  }
  return board;
}

/** Safe accessor: off-board coordinates read as empty. */
export function getPiece(board: Board, coord: Coord): Cell {
  if (!isValidCoord(coord)) return null;
  return board[coord.row][coord.col];
}

/** Writes a cell in place. Returns false (and does nothing) off board. */
export function setPiece(board: Board, coord: Coord, piece: Cell): boolean {
  if (!isValidCoord(coord)) return false;
  board[coord.row][coord.col] = piece ? { ...piece } : null;
  return true;
}

export function clearCell(board: Board, coord: Coord): boolean {
  return setPiece(board, coord, null);
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => row.map((cell) => (cell ? { ...cell } : null)));
}

/** 180° rotation: cell (r, c) moves to (7 - r, 7 - c). */
export function flipBoard(board: Board): Board {
  const flipped = createEmptyBoard();
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const cell = board[r][c];
      flipped[BOARD_SIZE - 1 - r][BOARD_SIZE - 1 - c] = cell ? { ...cell } : null;
    }
  }
  return flipped;
}

export function boardsEqual(a: Board, b: Board): boolean {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const x = a[r][c];
      const y = b[r][c];
      if (x === null || y === null) {
        if (x !== y) return false;
        continue;
      }
      if (x.owner !== y.owner || x.kind !== y.kind) return false;
    }
  }
  return true;
}

export function findKing(board: Board, player: Player): Coord | null {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const cell = board[r][c];
      if (cell && cell.owner === player && cell.kind === "K") return { row: r, col: c };
    }
  }
  return null;
}

export function piecesOf(board: Board, player: Player): Array<{ coord: Coord; piece: Piece }> {
  const out: Array<{ coord: Coord; piece: Piece }> = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const cell = board[r][c];
      if (cell && cell.owner === player) out.push({ coord: { row: r, col: c }, piece: cell });
    }
  }
  return out;
}

const LETTER_TO_KIND: Record<string, PieceKind> = { p: "P", n: "N", b: "B", r: "R", q: "Q", k: "K" };

export function pieceFromLetter(letter: string): Piece | null {
  const kind = LETTER_TO_KIND[letter.toLowerCase()];
  if (!kind) return null;
  return { owner: letter === letter.toUpperCase() ? "W" : "B", kind };
}

/** Uppercase for White, lowercase for Black. */
export function pieceToLetter(piece: Piece): string {
  return piece.owner === "W" ? piece.kind : piece.kind.toLowerCase();
}

/**
 * Build a board from eight strings of eight characters, top row first.
 * Piece letters as in FEN, "." for an empty cell.
 */
export function boardFromRows(rows: readonly string[]): Board {
  if (rows.length !== BOARD_SIZE) throw new Error(`boardFromRows: expected ${BOARD_SIZE} rows, got ${rows.length}`);
  const board = createEmptyBoard();
  rows.forEach((line, r) => {
    if (line.length !== BOARD_SIZE) throw new Error(`boardFromRows: row ${r} must have ${BOARD_SIZE} cells`);
    for (let c = 0; c < BOARD_SIZE; c++) {
      const ch = line[c];
      if (ch === ".") continue;
      const piece = pieceFromLetter(ch);
      if (!piece) throw new Error(`boardFromRows: unknown piece letter "${ch}"`);
      board[r][c] = piece;
    }
  });
  return board;
}

export function boardToRows(board: Board): string[] {
  return board.map((row) => row.map((cell) => (cell ? pieceToLetter(cell) : ".")).join(""));
}
